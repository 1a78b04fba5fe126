import type { RowSet, TabularRow } from "../../tabular/src/index.ts";

import type { ChangeRecord, RunIssue } from "./model.ts";

export const CHANGE_MERGE_SKIPPED_COLUMNS = ["Code", "Mismatch"] as const;

export type ChangeMergeErrorCode = "START_HERE_VIOLATION";

export class ChangeMergeError extends Error {
  readonly code: ChangeMergeErrorCode;
  /** Codes of the rows marked as start; empty when none is. */
  readonly startCodes: string[];

  constructor(message: string, code: ChangeMergeErrorCode, startCodes: string[]) {
    super(message);
    this.name = "ChangeMergeError";
    this.code = code;
    this.startCodes = startCodes;
  }
}

export interface MergeEditsResult {
  table: RowSet;
  changes: ChangeRecord[];
  issues: RunIssue[];
}

const YES_VALUES = new Set(["yes", "y", "true"]);
const NO_VALUES = new Set(["no", "n", "false"]);

/** Canonical `Yes`/`No` for a start_here cell; blank reads as `No`, anything else is kept. */
export function normalizeStartHere(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (normalized.length === 0 || NO_VALUES.has(normalized)) {
    return "No";
  }
  if (YES_VALUES.has(normalized)) {
    return "Yes";
  }
  return value.trim();
}

function codeOf(row: TabularRow): string {
  return (row.Code ?? "").trim();
}

function isSkippedColumn(column: string): boolean {
  return (CHANGE_MERGE_SKIPPED_COLUMNS as readonly string[]).includes(column);
}

function collectColumnIssues(original: RowSet, edited: RowSet): RunIssue[] {
  const known = new Set(original.columns);
  return edited.columns
    .filter((column) => !known.has(column) && !isSkippedColumn(column))
    .map((column): RunIssue => ({
      code: "UNKNOWN_EDITED_COLUMN",
      rowKey: "",
      detail: `Edited column "${column}" is not in the PreMerge table and was ignored`
    }));
}

function comparableValue(column: string, value: string): string {
  return column === "start_here" ? normalizeStartHere(value) : value;
}

/**
 * Applies the non-empty cells of an edited PreMerge copy onto the original, one ChangeRecord
 * per cell that actually changes. Edited text is kept as written; a blank or whitespace-only
 * cell never clears a value. `Mismatch` is recomputed per row and exactly one row may end up
 * with `start_here = "Yes"`.
 */
export function mergeEdits(original: RowSet, edited: RowSet): MergeEditsResult {
  const issues = collectColumnIssues(original, edited);
  const changes: ChangeRecord[] = [];
  const originalCodes = new Set(original.rows.map((row) => codeOf(row)));
  const editedByCode = new Map(edited.rows.map((row): [string, TabularRow] => [codeOf(row), row]));
  const editedColumns = new Set(edited.columns);
  const mergeColumns = original.columns.filter((column) => editedColumns.has(column) && !isSkippedColumn(column));

  for (const row of edited.rows) {
    const code = codeOf(row);
    if (!originalCodes.has(code)) {
      issues.push({
        code: "UNKNOWN_EDITED_ROW",
        rowKey: code,
        detail: `Edited row ${code} has no PreMerge counterpart and was ignored`
      });
    }
  }

  const rows = original.rows.map((originalRow) => {
    const code = codeOf(originalRow);
    const merged: TabularRow = { ...originalRow };
    const editedRow = editedByCode.get(code);
    let rowChanged = false;

    if (!editedRow) {
      issues.push({
        code: "MISSING_EDITED_ROW",
        rowKey: code,
        detail: `PreMerge row ${code} is absent from the edited table and was kept as is`
      });
    } else {
      for (const column of mergeColumns) {
        const editedCell = editedRow[column] ?? "";
        if (editedCell.trim().length === 0) {
          continue;
        }

        const editedValue = comparableValue(column, editedCell);
        const originalValue = originalRow[column] ?? "";
        if (editedValue === comparableValue(column, originalValue)) {
          continue;
        }

        merged[column] = editedValue;
        changes.push({ code, field: column, from: originalValue, to: editedValue });
        rowChanged = true;
      }
    }

    merged.start_here = normalizeStartHere(merged.start_here ?? "");
    merged.Mismatch = rowChanged ? "Yes" : "No";
    return merged;
  });

  const columns = [...original.columns];
  for (const column of ["start_here", "Mismatch"]) {
    if (!columns.includes(column)) {
      columns.push(column);
    }
  }

  requireSingleStart(rows);
  return { table: { columns, rows }, changes, issues };
}

export function requireSingleStart(rows: readonly TabularRow[]): void {
  const startCodes = rows.filter((row) => row.start_here === "Yes").map((row) => codeOf(row));
  if (startCodes.length === 1) {
    return;
  }

  const detail = startCodes.length === 0 ? "no row" : `rows ${startCodes.join(", ")}`;
  throw new ChangeMergeError(
    `Exactly one row must have start_here = "Yes"; found ${detail}`,
    "START_HERE_VIOLATION",
    startCodes
  );
}
