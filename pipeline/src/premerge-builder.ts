import type { RowSet, TabularRow } from "../../tabular/src/index.ts";

import { createTitleIndex, deriveFields } from "./field-deriver.ts";
import { createNarrCatalog, resolveMatch } from "./match-resolver.ts";
import {
  PREMERGE_DERIVED_COLUMNS,
  createMatchClassCounts,
  type ManualMapEntry,
  type MatchClassCounts,
  type NarrEntry,
  type RawTable,
  type RunIssue
} from "./model.ts";
import type { ManualMap } from "./tables.ts";

export interface PreMergeInput {
  raw: RawTable;
  narr: readonly NarrEntry[];
  manualMap?: ManualMap;
  /** A previous PreMerge table; NON_M rows carry their `Narr3` forward from it. */
  prior?: RowSet;
}

export interface PreMergeOptions {
  mClassPrefix?: string;
}

export interface PreMergeResult {
  table: RowSet;
  matchCounts: MatchClassCounts;
  issues: RunIssue[];
}

export function preMergeColumns(rawColumns: readonly string[]): string[] {
  const derived: readonly string[] = PREMERGE_DERIVED_COLUMNS;
  return [...rawColumns.filter((column) => !derived.includes(column)), ...PREMERGE_DERIVED_COLUMNS];
}

function indexPriorNarr3(prior: RowSet | undefined): Map<string, string> {
  const carried = new Map<string, string>();
  for (const row of prior?.rows ?? []) {
    const code = (row.Code ?? "").trim();
    if (code.length > 0) {
      carried.set(code, row.Narr3 ?? "");
    }
  }
  return carried;
}

/**
 * Resolves and derives every RAW step into one PreMerge row. RAW columns pass through in their
 * original order, followed by the derived columns.
 */
export function buildPreMergeTable(input: PreMergeInput, options: PreMergeOptions = {}): PreMergeResult {
  const catalog = createNarrCatalog(input.narr);
  const titlesByCode = createTitleIndex(input.raw.steps);
  const carriedNarr3 = indexPriorNarr3(input.prior);
  const mapEntries = input.manualMap?.entries ?? new Map<string, ManualMapEntry>();
  const columns = preMergeColumns(input.raw.columns);
  const matchCounts = createMatchClassCounts();
  const issues: RunIssue[] = [...(input.manualMap?.issues ?? [])];

  for (const rawCode of mapEntries.keys()) {
    if (!titlesByCode.has(rawCode)) {
      issues.push({
        code: "UNKNOWN_MAP_CODE",
        rowKey: rawCode,
        detail: `Manual map entry ${rawCode} does not match any RAW step`
      });
    }
  }

  const rows = input.raw.steps.map((step) => {
    const mapEntry = mapEntries.get(step.code);
    const resolution = resolveMatch(step, catalog, mapEntry, { mClassPrefix: options.mClassPrefix });
    matchCounts[resolution.class] += 1;

    if (resolution.class === "NONE" && resolution.reason === "UNMATCHED_TOKEN") {
      issues.push({
        code: "UNMATCHED_MAP_TOKEN",
        rowKey: step.code,
        detail: `Manual map token "${mapEntry?.matchToken ?? ""}" matches no narration code or OPM_Step`
      });
    }

    const derived = deriveFields(step, resolution, {
      titlesByCode,
      carriedNarr3: carriedNarr3.get(step.code)
    });
    issues.push(...derived.issues);

    const row: TabularRow = {};
    for (const column of columns) {
      row[column] = step.row[column] ?? "";
    }
    row.Code = step.code;
    Object.assign(row, derived.fields);
    return row;
  });

  return { table: { columns, rows }, matchCounts, issues };
}
