import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import {
  StagedWrites,
  TabularSourceError,
  loadTable,
  loadWorkbook,
  resolveEncoding,
  saveTable,
  saveWorkbook,
  secondarySheetPath,
  writeFileAtomically,
  type RowSet
} from "../src/index.ts";

const sampleRowSet: RowSet = {
  columns: ["Code", "Title", "UAP Label"],
  rows: [
    { Code: "S1", Title: "Open panel – step one", "UAP Label": "" },
    { Code: "S2", Title: "Close \"main\" panel", "UAP Label": "Go" }
  ]
};

async function expectTabularSourceError(
  operation: () => Promise<unknown>,
  code: TabularSourceError["code"]
): Promise<void> {
  await assert.rejects(operation, (error) => {
    assert.ok(error instanceof TabularSourceError);
    assert.equal(error.code, code);
    return true;
  });
}

test("resolveEncoding picks the encoding from the extension", () => {
  assert.equal(resolveEncoding("/data/raw.csv"), "csv");
  assert.equal(resolveEncoding("/data/RAW.XLSX"), "xlsx");
  assert.throws(
    () => resolveEncoding("/data/raw.json"),
    (error) => error instanceof TabularSourceError && error.code === "UNSUPPORTED_ENCODING"
  );
});

test("secondarySheetPath places a sheet beside its primary table", () => {
  assert.equal(secondarySheetPath("/out/SOP1_mk_tw_in_010326_0930.csv", "ChangeLog"), "/out/SOP1_mk_tw_in_010326_0930_ChangeLog.csv");
});

test("saveTable then loadTable round-trips csv and xlsx", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-tabular-"));

  try {
    for (const fileName of ["premerge.csv", "premerge.xlsx"]) {
      const path = join(tmpRoot, fileName);
      await saveTable(sampleRowSet, path, { sheetName: "PreMerge" });
      assert.deepEqual(await loadTable(path), sampleRowSet);
    }
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("saveWorkbook writes csv secondary sheets as siblings and loadWorkbook reads them back", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-tabular-"));
  const path = join(tmpRoot, "final.csv");

  try {
    const written = await saveWorkbook(
      [
        { name: "mk_tw_in", ...sampleRowSet },
        { name: "ChangeLog", columns: ["Code", "Field", "From", "To"], rows: [] }
      ],
      path
    );

    assert.deepEqual(written, [path, join(tmpRoot, "final_ChangeLog.csv")]);
    assert.equal(readFileSync(join(tmpRoot, "final_ChangeLog.csv"), "utf8"), "\uFEFFCode,Field,From,To\n");

    const sheets = await loadWorkbook(path);
    assert.deepEqual(
      sheets.map((sheet) => sheet.name),
      ["final", "ChangeLog"]
    );

    const changeLog = await loadTable(path, { sheet: "ChangeLog" });
    assert.deepEqual(changeLog.columns, ["Code", "Field", "From", "To"]);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("loadTable fails with SHEET_NOT_FOUND for a missing sheet", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-tabular-"));

  try {
    const csvPath = join(tmpRoot, "premerge.csv");
    const xlsxPath = join(tmpRoot, "premerge.xlsx");
    await saveTable(sampleRowSet, csvPath);
    await saveTable(sampleRowSet, xlsxPath, { sheetName: "PreMerge" });

    await expectTabularSourceError(() => loadTable(csvPath, { sheet: "ChangeLog" }), "SHEET_NOT_FOUND");
    await expectTabularSourceError(() => loadTable(xlsxPath, { sheet: "ChangeLog" }), "SHEET_NOT_FOUND");
    assert.deepEqual((await loadTable(xlsxPath, { sheet: "premerge" })).rows, sampleRowSet.rows);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("loadTable fails with SOURCE_UNREADABLE for a missing file", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-tabular-"));

  try {
    await expectTabularSourceError(() => loadTable(join(tmpRoot, "absent.csv")), "SOURCE_UNREADABLE");
    await expectTabularSourceError(() => loadTable(join(tmpRoot, "absent.xlsx")), "SOURCE_UNREADABLE");
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("writeFileAtomically leaves the previous file in place when the write fails", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-tabular-"));
  const path = join(tmpRoot, "premerge.csv");

  try {
    writeFileSync(path, "Code\nS1\n", "utf8");

    await expectTabularSourceError(
      () =>
        writeFileAtomically(path, (tempPath) => {
          writeFileSync(tempPath, "partial", "utf8");
          throw new Error("disk full");
        }),
      "WRITE_FAILED"
    );

    assert.equal(readFileSync(path, "utf8"), "Code\nS1\n");
    assert.deepEqual(readdirSync(tmpRoot), ["premerge.csv"]);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("saveWorkbook refuses an empty sheet list", async () => {
  await expectTabularSourceError(() => saveWorkbook([], "/tmp/never-written.csv"), "WRITE_FAILED");
});

test("StagedWrites leaves every target untouched when a later file fails to stage", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-tabular-"));
  const batch = new StagedWrites();

  try {
    await batch.stage(join(tmpRoot, "final.csv"), (tempPath) => writeFileSync(tempPath, "Code\nS1\n", "utf8"));
    await expectTabularSourceError(
      () =>
        batch.stage(join(tmpRoot, "final_ChangeLog.csv"), () => {
          throw new Error("disk full");
        }),
      "WRITE_FAILED"
    );
    batch.discard();

    assert.deepEqual(readdirSync(tmpRoot), []);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("StagedWrites.commit puts replaced files back when a rename fails", async () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "narration-merge-tabular-"));
  const keptDir = join(tmpRoot, "kept");
  const lostDir = join(tmpRoot, "lost");
  const keptPath = join(keptDir, "latest.csv");
  const batch = new StagedWrites();

  try {
    mkdirSync(keptDir);
    writeFileSync(keptPath, "old", "utf8");
    await batch.stage(keptPath, (tempPath) => writeFileSync(tempPath, "new", "utf8"));
    await batch.stage(join(lostDir, "latest_ChangeLog.csv"), (tempPath) => writeFileSync(tempPath, "log", "utf8"));
    assert.deepEqual(batch.paths, [keptPath, join(lostDir, "latest_ChangeLog.csv")]);
    rmSync(lostDir, { recursive: true, force: true });

    assert.throws(
      () => batch.commit(),
      (error) => {
        assert.ok(error instanceof TabularSourceError);
        assert.equal(error.code, "WRITE_FAILED");
        assert.equal(error.path, join(lostDir, "latest_ChangeLog.csv"));
        return true;
      }
    );

    assert.equal(readFileSync(keptPath, "utf8"), "old");
    assert.deepEqual(readdirSync(keptDir), ["latest.csv"]);
    assert.deepEqual(batch.paths, []);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});
