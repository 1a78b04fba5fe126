import type { TabularSheet } from "../../tabular/src/index.ts";

import {
  MAP_ENTRIES_COLUMNS,
  OPM_CODE_LOOKUP_COLUMNS,
  UNMATCHED_RAW_COLUMNS,
  findUnmatchedSteps,
  findUnusedEntries,
  suggestMatches,
  toMapEntryRow,
  toOpmCodeLookupRow,
  toUnmatchedRawRow
} from "./fuzzy-suggester.ts";
import type { NarrEntry, RawTable } from "./model.ts";
import type { SuggestionSettings } from "./run-config.ts";
import { resolveSimilarityScorer } from "./similarity.ts";

export const MAP_ENTRIES_SHEET_NAME = "Map_Entries";
export const OPM_CODE_LOOKUP_SHEET_NAME = "OPM_Code_Lookup";
export const UNMATCHED_RAW_SHEET_NAME = "Unmatched_RAW";
export const UNUSED_NARR_SHEET_NAME = "Unused_NARR";

export interface ManualSuggestionsResult {
  sheets: TabularSheet[];
  suggested: number;
  unmatched: number;
  unused: number;
}

/**
 * Lays out the manual-match workbook: one editable map entry per RAW step, pre-filled with the
 * best candidate, the full narration catalog for lookup, then the steps nothing was suggested for
 * and the catalog entries no step was pointed at.
 */
export function buildManualSuggestions(
  raw: RawTable,
  narr: readonly NarrEntry[],
  settings: SuggestionSettings
): ManualSuggestionsResult {
  const suggestions = suggestMatches(raw.steps, narr, {
    scorer: resolveSimilarityScorer(settings.scorer),
    threshold: settings.threshold,
    maxCandidates: settings.maxCandidates,
    ignoreCodePrefixes: settings.ignoreCodePrefixes,
    fields: settings.fields
  });

  const unmatched = findUnmatchedSteps(suggestions);
  const unused = findUnusedEntries(suggestions, narr, settings.ignoreCodePrefixes);

  return {
    sheets: [
      {
        name: MAP_ENTRIES_SHEET_NAME,
        columns: [...MAP_ENTRIES_COLUMNS],
        rows: suggestions.map((suggestion) => toMapEntryRow(suggestion))
      },
      {
        name: OPM_CODE_LOOKUP_SHEET_NAME,
        columns: [...OPM_CODE_LOOKUP_COLUMNS],
        rows: narr.map((entry) => toOpmCodeLookupRow(entry))
      },
      {
        name: UNMATCHED_RAW_SHEET_NAME,
        columns: [...UNMATCHED_RAW_COLUMNS],
        rows: unmatched.map((suggestion) => toUnmatchedRawRow(suggestion))
      },
      {
        name: UNUSED_NARR_SHEET_NAME,
        columns: [...OPM_CODE_LOOKUP_COLUMNS],
        rows: unused.map((entry) => toOpmCodeLookupRow(entry))
      }
    ],
    suggested: suggestions.length - unmatched.length,
    unmatched: unmatched.length,
    unused: unused.length
  };
}
