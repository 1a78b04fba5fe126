import { loadTable, type RowSet, type TabularRow } from "../../tabular/src/index.ts";

import { requireTableColumns, requireUniqueKeys, type TableKind } from "./contracts.ts";
import type { ManualMapEntry, NarrEntry, RawTable, RunIssue } from "./model.ts";

function cell(row: TabularRow, column: string): string {
  return row[column] ?? "";
}

function keyCell(row: TabularRow, column: string): string {
  return cell(row, column).trim();
}

/** Rows without a key cannot be joined on and are left out of every typed table. */
function keyedRows(rowSet: RowSet, keyColumn: string): TabularRow[] {
  return rowSet.rows.filter((row) => keyCell(row, keyColumn).length > 0);
}

export function parseRawTable(rowSet: RowSet, path: string): RawTable {
  requireTableColumns("raw-table", rowSet, path);
  const rows = keyedRows(rowSet, "Code");
  requireUniqueKeys(
    "raw-table",
    rows.map((row) => keyCell(row, "Code")),
    path
  );

  return {
    columns: [...rowSet.columns],
    steps: rows.map((row) => ({
      code: keyCell(row, "Code"),
      title: cell(row, "Title"),
      nextCodes: [keyCell(row, "next1_code"), keyCell(row, "next2_code"), keyCell(row, "next3_code")],
      row
    }))
  };
}

export function parseNarrEntries(rowSet: RowSet, path: string): NarrEntry[] {
  requireTableColumns("narr-table", rowSet, path);
  const rows = keyedRows(rowSet, "Code");
  requireUniqueKeys(
    "narr-table",
    rows.map((row) => keyCell(row, "Code")),
    path
  );

  return rows.map((row) => ({
    code: keyCell(row, "Code"),
    opmStep: cell(row, "OPM_Step"),
    sourceTitle: cell(row, "Source_Title"),
    narrSimple: cell(row, "Step_narr_out_simple"),
    narrFull: cell(row, "Step_narr_out"),
    narrMSimple: cell(row, "Step_narr_m_out_simple"),
    narrMFull: cell(row, "Step_narr_m_out")
  }));
}

export interface ManualMap {
  entries: Map<string, ManualMapEntry>;
  issues: RunIssue[];
}

/**
 * Reads a manual map keyed by `CODE`. A blank `Match` falls back to `OPM_Step` when that column
 * is present, so a reviewed suggestions sheet can be fed back as it is. A repeated `CODE` keeps
 * its last entry.
 */
export function parseManualMap(rowSet: RowSet, path: string): ManualMap {
  requireTableColumns("manual-map-table", rowSet, path);
  const entries = new Map<string, ManualMapEntry>();
  const issues: RunIssue[] = [];

  for (const row of keyedRows(rowSet, "CODE")) {
    const rawCode = keyCell(row, "CODE");
    const matchToken = keyCell(row, "Match") || keyCell(row, "OPM_Step");

    if (entries.has(rawCode)) {
      issues.push({
        code: "DUPLICATE_MAP_ENTRY",
        rowKey: rawCode,
        detail: `Manual map lists ${rawCode} more than once; the last entry ("${matchToken}") is used`
      });
    }

    entries.set(rawCode, { rawCode, matchToken });
  }

  return { entries, issues };
}

/** Validates a PreMerge or edited table and returns it unchanged, keyed by a unique `Code`. */
export function parseKeyedTable(table: TableKind, rowSet: RowSet, path: string): RowSet {
  requireTableColumns(table, rowSet, path);
  const rows = keyedRows(rowSet, "Code");
  requireUniqueKeys(
    table,
    rows.map((row) => keyCell(row, "Code")),
    path
  );

  return { columns: [...rowSet.columns], rows };
}

export async function loadRawTable(path: string): Promise<RawTable> {
  return parseRawTable(await loadTable(path), path);
}

export async function loadNarrEntries(path: string): Promise<NarrEntry[]> {
  return parseNarrEntries(await loadTable(path), path);
}

export async function loadManualMap(path: string): Promise<ManualMap> {
  return parseManualMap(await loadTable(path), path);
}

export async function loadKeyedTable(table: TableKind, path: string): Promise<RowSet> {
  return parseKeyedTable(table, await loadTable(path), path);
}
