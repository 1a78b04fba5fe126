import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import ExcelJS from "exceljs";

import { coerceCellValue, loadTable, loadWorkbook, saveWorkbook } from "../src/index.ts";

test("coerceCellValue reduces scalar cells to text", () => {
  assert.equal(coerceCellValue(null), "");
  assert.equal(coerceCellValue(undefined), "");
  assert.equal(coerceCellValue("Open panel"), "Open panel");
  assert.equal(coerceCellValue(12.5), "12.5");
  assert.equal(coerceCellValue(7), "7");
  assert.equal(coerceCellValue(true), "TRUE");
  assert.equal(coerceCellValue(false), "FALSE");
  assert.equal(coerceCellValue(new Date("2026-03-01T12:30:00.000Z")), "2026-03-01T12:30:00.000Z");
});

test("coerceCellValue reduces structured cells to their visible text", () => {
  assert.equal(coerceCellValue({ richText: [{ text: "Press " }, { text: "start" }] }), "Press start");
  assert.equal(coerceCellValue({ text: "Manual", hyperlink: "https://example.test/manual" }), "Manual");
  assert.equal(coerceCellValue({ error: "#N/A" }), "#N/A");
  assert.equal(coerceCellValue({ formula: "A1+1", result: 3, date1904: false }), "3");
  assert.equal(coerceCellValue({ formula: "B2", result: "Go", date1904: false }), "Go");
  assert.equal(coerceCellValue({ formula: "C3", date1904: false }), "");
});

test("xlsx workbooks keep every sheet and read back as strings", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-xlsx-"));
  const workbookPath = join(tmpRoot, "final.xlsx");

  try {
    await saveWorkbook(
      [
        { name: "mk_tw_in", columns: ["Code", "Title"], rows: [{ Code: "S1", Title: "0042" }] },
        { name: "ChangeLog", columns: ["Code", "Field", "From", "To"], rows: [] }
      ],
      workbookPath
    );

    const sheets = await loadWorkbook(workbookPath);
    assert.deepEqual(
      sheets.map((sheet) => sheet.name),
      ["mk_tw_in", "ChangeLog"]
    );
    assert.deepEqual(sheets[0]?.rows, [{ Code: "S1", Title: "0042" }]);
    assert.deepEqual(sheets[1]?.columns, ["Code", "Field", "From", "To"]);
    assert.deepEqual(sheets[1]?.rows, []);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("xlsx cells written by other tools are coerced on load", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-xlsx-"));
  const workbookPath = join(tmpRoot, "raw.xlsx");

  try {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet("Steps");
    worksheet.addRow(["Code", "Order", "Checked"]);
    worksheet.addRow(["S1", 3, true]);
    await workbook.xlsx.writeFile(workbookPath);

    const rowSet = await loadTable(workbookPath, { sheet: "steps" });
    assert.deepEqual(rowSet.columns, ["Code", "Order", "Checked"]);
    assert.deepEqual(rowSet.rows, [{ Code: "S1", Order: "3", Checked: "TRUE" }]);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});
