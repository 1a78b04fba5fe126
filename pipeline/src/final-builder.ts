import type { RowSet, TabularSheet } from "../../tabular/src/index.ts";

import { mergeEdits, type MergeEditsResult } from "./change-merger.ts";
import { CHANGE_LOG_COLUMNS, type ChangeRecord } from "./model.ts";

export const FINAL_SHEET_NAME = "mk_tw_in";
export const CHANGE_LOG_SHEET_NAME = "ChangeLog";

export function toChangeLogTable(changes: readonly ChangeRecord[]): RowSet {
  return {
    columns: [...CHANGE_LOG_COLUMNS],
    rows: changes.map((change) => ({
      Code: change.code,
      Field: change.field,
      From: change.from,
      To: change.to
    }))
  };
}

export interface FinalBuildResult extends MergeEditsResult {
  sheets: TabularSheet[];
}

/**
 * Merges the edited copy onto the PreMerge table and lays out the Final artifact: the merged
 * rows first, then the change log, which is kept even when no cell changed. Throws before
 * anything is laid out when the start row is not unique.
 */
export function buildFinalTable(premerge: RowSet, edited: RowSet): FinalBuildResult {
  const merged = mergeEdits(premerge, edited);
  return {
    ...merged,
    sheets: [
      { name: FINAL_SHEET_NAME, ...merged.table },
      { name: CHANGE_LOG_SHEET_NAME, ...toChangeLogTable(merged.changes) }
    ]
  };
}
