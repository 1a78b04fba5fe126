import type { RowSet, TabularRow } from "../../tabular/src/index.ts";

import { TableContractError, requireTableColumns, requireUniqueKeys } from "./contracts.ts";
import { firstHalfOfTitle } from "./field-deriver.ts";
import type { NarrEntry, RawTable, RunIssue } from "./model.ts";

export const LEGACY_MATCH_COLUMNS = [
  "match_code_OPM",
  "match_code",
  "selected_code",
  "opm_code",
  "chosen_code",
  "OPM_Step"
] as const;

export const LEGACY_OUTPUT_COLUMNS = [
  "Code",
  "match_code_OPM",
  "Title",
  "Source_Title",
  "Narr1",
  "Narr2",
  "Narr3"
] as const;

const LEAD_CODE = /^\s*([A-Za-z]\d+[a-z]?)\b/;

export function leadCodeToken(value: string): string {
  return LEAD_CODE.exec(value)?.[1]?.toUpperCase() ?? "";
}

/** A title turned into a question: trailing stops, marks and spaces dropped, one `?` added. */
export function questionize(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    return "";
  }
  return `${trimmed.replace(/[.?!\s]+$/, "")}?`;
}

export function pickMatchColumn(columns: readonly string[]): string | undefined {
  for (const wanted of LEGACY_MATCH_COLUMNS) {
    const found = columns.find((column) => column.trim().toLowerCase() === wanted.toLowerCase());
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}

export interface LegacyMappingResult {
  table: RowSet;
  matched: number;
  issues: RunIssue[];
}

function legacyNarrations(lead: string, title: string, entry: NarrEntry | undefined): [string, string, string] {
  if (lead.startsWith("D")) {
    return [questionize(title), "", ""];
  }

  if (lead.startsWith("Y") || lead.startsWith("N")) {
    return [firstHalfOfTitle(title), "", ""];
  }

  const simple = entry?.narrSimple ?? "";
  const narr1 = simple.length > 0 ? simple : title;
  return lead.includes("M") ? [narr1, entry?.narrMSimple ?? "", entry?.narrMFull ?? ""] : [narr1, "", ""];
}

/**
 * Builds the downstream input straight from a mapping table, without a PreMerge review. Each
 * mapping row names a narration by the leading code token of its match cell. The node kind comes
 * from the leading code of the entry's `OPM_Step`, else from that token; decision (`D`) and yes/no
 * (`Y`, `N`) nodes take their narration from the RAW title instead.
 */
export function buildLegacyMapping(raw: RawTable, narr: readonly NarrEntry[], map: RowSet, mapPath: string): LegacyMappingResult {
  requireTableColumns("legacy-map-table", map, mapPath);
  const matchColumn = pickMatchColumn(map.columns);
  if (matchColumn === undefined) {
    throw new TableContractError({
      table: "legacy-map-table",
      code: "MISSING_REQUIRED_COLUMN",
      message: `legacy-map-table ${mapPath} has none of the match columns: ${LEGACY_MATCH_COLUMNS.join(", ")}`,
      path: mapPath,
      keys: [...LEGACY_MATCH_COLUMNS]
    });
  }

  const mapRows = map.rows.filter((row) => (row.Code ?? "").trim().length > 0);
  requireUniqueKeys(
    "legacy-map-table",
    mapRows.map((row) => (row.Code ?? "").trim()),
    mapPath
  );

  const matchByCode = new Map<string, string>();
  for (const row of mapRows) {
    matchByCode.set((row.Code ?? "").trim(), leadCodeToken(row[matchColumn] ?? ""));
  }

  const narrByCode = new Map<string, NarrEntry>();
  for (const entry of narr) {
    narrByCode.set(entry.code.toUpperCase(), entry);
  }

  const output: readonly string[] = LEGACY_OUTPUT_COLUMNS;
  const tail = raw.columns.filter((column) => !output.includes(column));
  const issues: RunIssue[] = [];
  let matched = 0;

  const rows = raw.steps.map((step) => {
    const mapLead = matchByCode.get(step.code) ?? "";
    const entry = mapLead.length > 0 ? narrByCode.get(mapLead) : undefined;
    if (entry) {
      matched += 1;
    } else if (mapLead.length > 0) {
      issues.push({
        code: "UNMATCHED_MAP_TOKEN",
        rowKey: step.code,
        detail: `Mapped code ${mapLead} matches no narration entry`
      });
    }

    // The matched entry's own OPM_Step code decides the node kind when it carries one.
    const lead = leadCodeToken(entry?.opmStep ?? "") || mapLead;
    const [narr1, narr2, narr3] = legacyNarrations(lead, step.title, entry);
    const row: TabularRow = {
      Code: step.code,
      match_code_OPM: mapLead,
      Title: step.title,
      Source_Title: entry?.sourceTitle ?? "",
      Narr1: narr1,
      Narr2: narr2,
      Narr3: narr3
    };
    for (const column of tail) {
      row[column] = step.row[column] ?? "";
    }
    return row;
  });

  return { table: { columns: [...LEGACY_OUTPUT_COLUMNS, ...tail], rows }, matched, issues };
}
