import assert from "node:assert/strict";
import test from "node:test";

import {
  TableContractError,
  parseKeyedTable,
  parseManualMap,
  parseNarrEntries,
  parseRawTable,
  requireTableColumns
} from "../src/index.ts";

const narrColumns = [
  "Code",
  "OPM_Step",
  "Source_Title",
  "Step_narr_out_simple",
  "Step_narr_out",
  "Step_narr_m_out_simple",
  "Step_narr_m_out"
];

function expectTableContractError(
  operation: () => unknown,
  expectation: { table: string; code: string; keys: string[]; message?: string }
): void {
  assert.throws(operation, (error) => {
    assert.ok(error instanceof TableContractError);
    assert.equal(error.table, expectation.table);
    assert.equal(error.code, expectation.code);
    assert.deepEqual(error.keys, expectation.keys);
    if (expectation.message !== undefined) {
      assert.equal(error.message, expectation.message);
    }
    return true;
  });
}

test("parseRawTable trims codes, keeps titles as written and drops rows without a code", () => {
  const raw = parseRawTable(
    {
      columns: ["Code", "Title", "next1_code", "Notes"],
      rows: [
        { Code: " S1 ", Title: " Open panel ", next1_code: " S2 ", Notes: "n" },
        { Code: "", Title: "orphan", next1_code: "", Notes: "" },
        { Code: "S2", Title: "Close panel", next1_code: "", Notes: "" }
      ]
    },
    "raw.csv"
  );

  assert.deepEqual(raw.columns, ["Code", "Title", "next1_code", "Notes"]);
  assert.equal(raw.steps.length, 2);
  assert.equal(raw.steps[0]?.code, "S1");
  assert.equal(raw.steps[0]?.title, " Open panel ");
  assert.deepEqual(raw.steps[0]?.nextCodes, ["S2", "", ""]);
  assert.deepEqual(Object.keys(raw.steps[0] ?? {}), ["code", "title", "nextCodes", "row"]);
  assert.equal(raw.steps[0]?.row.Notes, "n");
});

test("requireTableColumns names every missing column in one error", () => {
  expectTableContractError(
    () =>
      requireTableColumns(
        "narr-table",
        { columns: ["Code", "OPM_Step", "Source_Title", "Step_narr_out_simple", "Step_narr_out"], rows: [] },
        "narr.xlsx"
      ),
    {
      table: "narr-table",
      code: "MISSING_REQUIRED_COLUMN",
      keys: ["Step_narr_m_out_simple", "Step_narr_m_out"],
      message: "narr-table narr.xlsx is missing required column(s): Step_narr_m_out_simple, Step_narr_m_out"
    }
  );
});

test("parseRawTable rejects a table without Title before reading any row", () => {
  expectTableContractError(() => parseRawTable({ columns: ["Code"], rows: [{ Code: "S1" }] }, "raw.csv"), {
    table: "raw-table",
    code: "MISSING_REQUIRED_COLUMN",
    keys: ["Title"]
  });
});

test("parseRawTable rejects repeated codes and lists each once", () => {
  expectTableContractError(
    () =>
      parseRawTable(
        {
          columns: ["Code", "Title"],
          rows: [
            { Code: "S1", Title: "a" },
            { Code: "S1 ", Title: "b" },
            { Code: "S2", Title: "c" },
            { Code: "S1", Title: "d" }
          ]
        },
        "raw.csv"
      ),
    {
      table: "raw-table",
      code: "DUPLICATE_KEY",
      keys: ["S1"],
      message: "raw-table raw.csv repeats code(s): S1"
    }
  );
});

test("parseNarrEntries maps catalog columns onto entries", () => {
  const entries = parseNarrEntries(
    {
      columns: narrColumns,
      rows: [
        {
          Code: "M7",
          OPM_Step: "Start machine",
          Source_Title: "Press start",
          Step_narr_out_simple: "Start.",
          Step_narr_out: "Start the machine.",
          Step_narr_m_out_simple: "Press start",
          Step_narr_m_out: "Press the start button."
        }
      ]
    },
    "narr.csv"
  );

  assert.deepEqual(entries, [
    {
      code: "M7",
      opmStep: "Start machine",
      sourceTitle: "Press start",
      narrSimple: "Start.",
      narrFull: "Start the machine.",
      narrMSimple: "Press start",
      narrMFull: "Press the start button."
    }
  ]);
});

test("parseNarrEntries rejects duplicate narration codes", () => {
  const row = Object.fromEntries(narrColumns.map((column) => [column, column === "Code" ? "P1" : ""]));
  expectTableContractError(() => parseNarrEntries({ columns: narrColumns, rows: [row, { ...row }] }, "narr.csv"), {
    table: "narr-table",
    code: "DUPLICATE_KEY",
    keys: ["P1"]
  });
});

test("parseManualMap keeps the last entry for a repeated code and reports it", () => {
  const map = parseManualMap(
    {
      columns: ["CODE", "Match"],
      rows: [
        { CODE: "S1", Match: "M7" },
        { CODE: "S2", Match: "P2" },
        { CODE: "S1", Match: " P3 " }
      ]
    },
    "map.csv"
  );

  assert.deepEqual([...map.entries.values()], [
    { rawCode: "S1", matchToken: "P3" },
    { rawCode: "S2", matchToken: "P2" }
  ]);
  assert.deepEqual(map.issues, [
    {
      code: "DUPLICATE_MAP_ENTRY",
      rowKey: "S1",
      detail: 'Manual map lists S1 more than once; the last entry ("P3") is used'
    }
  ]);
});

test("parseManualMap falls back to OPM_Step when Match is blank", () => {
  const map = parseManualMap(
    {
      columns: ["CODE", "Match", "OPM_Step"],
      rows: [
        { CODE: "S1", Match: "", OPM_Step: "Gauge check" },
        { CODE: "S2", Match: "M7", OPM_Step: "Gauge check" }
      ]
    },
    "map.csv"
  );

  assert.equal(map.entries.get("S1")?.matchToken, "Gauge check");
  assert.equal(map.entries.get("S2")?.matchToken, "M7");
});

test("parseKeyedTable requires Code on edited tables and unique keys", () => {
  expectTableContractError(() => parseKeyedTable("edited-table", { columns: ["Title"], rows: [] }, "edited.csv"), {
    table: "edited-table",
    code: "MISSING_REQUIRED_COLUMN",
    keys: ["Code"]
  });

  expectTableContractError(
    () =>
      parseKeyedTable(
        "edited-table",
        { columns: ["Code"], rows: [{ Code: "S1" }, { Code: "S1" }] },
        "edited.csv"
      ),
    { table: "edited-table", code: "DUPLICATE_KEY", keys: ["S1"] }
  );
});
