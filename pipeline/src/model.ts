import type { TabularRow } from "../../tabular/src/index.ts";

export interface RawStep {
  code: string;
  title: string;
  nextCodes: [string, string, string];
  /** The source row as loaded, for passing untouched columns through. */
  row: TabularRow;
}

export interface NarrEntry {
  code: string;
  opmStep: string;
  sourceTitle: string;
  narrSimple: string;
  narrFull: string;
  narrMSimple: string;
  narrMFull: string;
}

export interface ManualMapEntry {
  rawCode: string;
  matchToken: string;
}

export interface RawTable {
  columns: string[];
  steps: RawStep[];
}

export type MatchClass = "M" | "NON_M" | "NONE";

export type UnmatchedReason = "NO_MAP_ENTRY" | "BLANK_TOKEN" | "UNMATCHED_TOKEN";

export type MatchResolution =
  | { class: "M"; entry: NarrEntry }
  | { class: "NON_M"; entry: NarrEntry }
  | { class: "NONE"; reason: UnmatchedReason };

export const PREMERGE_DERIVED_COLUMNS = [
  "match_code_OPM",
  "OPM_Step",
  "Source_Title",
  "Narr1",
  "Narr2",
  "Narr3",
  "Disp_next1",
  "Disp_next2",
  "Disp_next3",
  "UAP url",
  "UAP Label",
  "start_here",
  "Mismatch"
] as const;

export type PreMergeDerivedColumn = (typeof PREMERGE_DERIVED_COLUMNS)[number];

export type DerivedFields = Record<PreMergeDerivedColumn, string>;

export const CHANGE_LOG_COLUMNS = ["Code", "Field", "From", "To"] as const;

export interface ChangeRecord {
  code: string;
  field: string;
  from: string;
  to: string;
}

export const RUN_ISSUE_CODES = [
  "UNRESOLVED_REFERENCE",
  "UNMATCHED_MAP_TOKEN",
  "DUPLICATE_MAP_ENTRY",
  "UNKNOWN_MAP_CODE",
  "UNKNOWN_EDITED_ROW",
  "UNKNOWN_EDITED_COLUMN",
  "MISSING_EDITED_ROW"
] as const;

export type RunIssueCode = (typeof RUN_ISSUE_CODES)[number];

/** A non-fatal data-quality finding surfaced in the run summary. */
export interface RunIssue {
  code: RunIssueCode;
  rowKey: string;
  detail: string;
}

export type MatchClassCounts = Record<MatchClass, number>;

export function createMatchClassCounts(): MatchClassCounts {
  return { M: 0, NON_M: 0, NONE: 0 };
}
