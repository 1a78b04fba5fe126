import assert from "node:assert/strict";
import test from "node:test";

import { TabularSourceError, formatCsvText, parseCsvText } from "../src/index.ts";

function expectTabularSourceError(operation: () => unknown, code: TabularSourceError["code"]): void {
  assert.throws(operation, (error) => {
    assert.ok(error instanceof TabularSourceError);
    assert.equal(error.code, code);
    return true;
  });
}

test("parseCsvText strips a leading BOM, trims headers and drops blank rows", () => {
  const rowSet = parseCsvText("\uFEFFCode , Title\nS1,Open panel\n,\n S2 ,Close panel \n", "raw.csv");

  assert.deepEqual(rowSet.columns, ["Code", "Title"]);
  assert.deepEqual(rowSet.rows, [
    { Code: "S1", Title: "Open panel" },
    { Code: " S2 ", Title: "Close panel " }
  ]);
});

test("parseCsvText reads missing trailing cells as empty strings", () => {
  const rowSet = parseCsvText("Code,Title,next1_code\nS1,Open\n", "raw.csv");

  assert.deepEqual(rowSet.rows, [{ Code: "S1", Title: "Open", next1_code: "" }]);
});

test("parseCsvText drops a blank-header column that holds no data", () => {
  const rowSet = parseCsvText("Code,,Title\nS1,,Open\n", "raw.csv");

  assert.deepEqual(rowSet.columns, ["Code", "Title"]);
  assert.deepEqual(rowSet.rows, [{ Code: "S1", Title: "Open" }]);
});

test("parseCsvText rejects data under a blank header", () => {
  expectTabularSourceError(() => parseCsvText("Code,\nS1,stray\n", "raw.csv"), "INVALID_HEADER");
});

test("parseCsvText rejects duplicate headers", () => {
  expectTabularSourceError(() => parseCsvText("Code,Title,Code\nS1,Open,S1\n", "raw.csv"), "INVALID_HEADER");
});

test("parseCsvText rejects rows with content beyond the header", () => {
  expectTabularSourceError(() => parseCsvText("Code\nS1,extra\n", "raw.csv"), "ROW_WIDTH_MISMATCH");
});

test("parseCsvText accepts trailing blank cells beyond the header", () => {
  const rowSet = parseCsvText("Code\nS1,, \n", "raw.csv");

  assert.deepEqual(rowSet.rows, [{ Code: "S1" }]);
});

test("parseCsvText returns an empty row set for an empty file", () => {
  assert.deepEqual(parseCsvText("", "empty.csv"), { columns: [], rows: [] });
});

test("parseCsvText reports malformed quoting as unreadable", () => {
  expectTabularSourceError(() => parseCsvText('Code,Title\nS1,"unterminated\n', "raw.csv"), "SOURCE_UNREADABLE");
});

test("formatCsvText writes a BOM, quotes where needed and follows column order", () => {
  const text = formatCsvText({
    columns: ["Code", "Title"],
    rows: [{ Title: "Open, then close", Code: "S1" }]
  });

  assert.equal(text, '\uFEFFCode,Title\nS1,"Open, then close"\n');
});
