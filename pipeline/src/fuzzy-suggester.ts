import type { NarrEntry, RawStep } from "./model.ts";
import { resolveSimilarityScorer, type SimilarityScorer } from "./similarity.ts";

export const DEFAULT_SUGGESTION_THRESHOLD = 0.8;
export const DEFAULT_SUGGESTION_MAX_CANDIDATES = 3;
export const DEFAULT_SUGGESTION_IGNORE_CODE_PREFIXES = ["D", "N", "Y"] as const;
export const SUGGESTION_FIELDS = ["sourceTitle", "opmStep"] as const;

export type SuggestionField = (typeof SUGGESTION_FIELDS)[number];

export const DEFAULT_SUGGESTION_FIELDS: readonly SuggestionField[] = ["sourceTitle"];

export const MAP_ENTRIES_COLUMNS = [
  "CODE",
  "Title",
  "Match",
  "OPM_Step",
  "Source_Title",
  "Match_Conf",
  "Candidates"
] as const;

export const OPM_CODE_LOOKUP_COLUMNS = ["Code", "OPM_Step", "Source_Title", "Step_narr_out_simple"] as const;

export const UNMATCHED_RAW_COLUMNS = ["Code", "Title", "Match_Conf"] as const;

export type FuzzySuggesterErrorCode = "INVALID_OPTIONS";

export class FuzzySuggesterError extends Error {
  readonly code: FuzzySuggesterErrorCode;

  constructor(message: string, code: FuzzySuggesterErrorCode) {
    super(message);
    this.name = "FuzzySuggesterError";
    this.code = code;
  }
}

export interface SuggestMatchesOptions {
  scorer?: SimilarityScorer;
  threshold?: number;
  maxCandidates?: number;
  ignoreCodePrefixes?: readonly string[];
  fields?: readonly SuggestionField[];
}

export interface SuggestionCandidate {
  entry: NarrEntry;
  score: number;
}

export interface StepSuggestion {
  step: RawStep;
  /** Candidates at or above the threshold, best first, capped at `maxCandidates`. */
  candidates: SuggestionCandidate[];
  /** Highest score over every eligible entry, kept even when below the threshold. */
  bestScore: number;
}

interface NormalizedSuggestOptions {
  scorer: SimilarityScorer;
  threshold: number;
  maxCandidates: number;
  ignoreCodePrefixes: string[];
  fields: readonly SuggestionField[];
}

function normalizeIgnoreCodePrefixes(prefixes: readonly string[] = DEFAULT_SUGGESTION_IGNORE_CODE_PREFIXES): string[] {
  return prefixes.map((prefix) => prefix.trim().toUpperCase()).filter((prefix) => prefix.length > 0);
}

function normalizeSuggestOptions(options: SuggestMatchesOptions): NormalizedSuggestOptions {
  const threshold = options.threshold ?? DEFAULT_SUGGESTION_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new FuzzySuggesterError(`Suggestion threshold must be within [0, 1], got ${threshold}`, "INVALID_OPTIONS");
  }

  const maxCandidates = options.maxCandidates ?? DEFAULT_SUGGESTION_MAX_CANDIDATES;
  if (!Number.isInteger(maxCandidates) || maxCandidates < 1) {
    throw new FuzzySuggesterError(
      `Suggestion maxCandidates must be a positive integer, got ${maxCandidates}`,
      "INVALID_OPTIONS"
    );
  }

  const fields = options.fields ?? DEFAULT_SUGGESTION_FIELDS;
  if (fields.length === 0) {
    throw new FuzzySuggesterError("Suggestion fields must name at least one field", "INVALID_OPTIONS");
  }

  return {
    scorer: options.scorer ?? resolveSimilarityScorer(),
    threshold,
    maxCandidates,
    ignoreCodePrefixes: normalizeIgnoreCodePrefixes(options.ignoreCodePrefixes),
    fields
  };
}

export function isIgnoredCode(code: string, ignoreCodePrefixes: readonly string[]): boolean {
  const normalized = code.trim().toUpperCase();
  return ignoreCodePrefixes.some((prefix) => normalized.startsWith(prefix));
}

function fieldText(entry: NarrEntry, field: SuggestionField): string {
  return field === "sourceTitle" ? entry.sourceTitle : entry.opmStep;
}

function scoreEntry(title: string, entry: NarrEntry, options: NormalizedSuggestOptions): number {
  let best = 0;
  for (const field of options.fields) {
    const text = fieldText(entry, field);
    if (text.trim().length === 0) {
      continue;
    }
    best = Math.max(best, options.scorer.score(title, text));
  }
  return best;
}

/**
 * Scores every step title against every eligible narration entry. Advisory only: nothing here
 * feeds the PreMerge or Final tables.
 */
export function suggestMatches(
  steps: readonly RawStep[],
  entries: readonly NarrEntry[],
  options: SuggestMatchesOptions = {}
): StepSuggestion[] {
  const normalized = normalizeSuggestOptions(options);
  const eligible = entries.filter((entry) => !isIgnoredCode(entry.code, normalized.ignoreCodePrefixes));

  return steps.map((step) => {
    if (step.title.trim().length === 0) {
      return { step, candidates: [], bestScore: 0 };
    }

    const scored = eligible.map((entry, order) => ({ entry, order, score: scoreEntry(step.title, entry, normalized) }));
    const bestScore = scored.reduce((best, candidate) => Math.max(best, candidate.score), 0);
    const candidates = scored
      .filter((candidate) => candidate.score >= normalized.threshold)
      .sort((left, right) => right.score - left.score || left.order - right.order)
      .slice(0, normalized.maxCandidates)
      .map(({ entry, score }) => ({ entry, score }));

    return { step, candidates, bestScore };
  });
}

/** Percentage rounded up, computed on a rounded score so float noise cannot add a point. */
export function toMatchConfidence(score: number): string {
  return String(Math.ceil(Math.round(score * 1_000_000) / 10_000));
}

function formatCandidates(candidates: readonly SuggestionCandidate[]): string {
  return candidates.map((candidate) => `${candidate.entry.code} (${candidate.score.toFixed(2)})`).join("; ");
}

/**
 * One editable manual-map row. Only `Match` carries the suggestion: `OPM_Step` is the manual map's
 * fallback token and stays blank, so clearing `Match` rejects the suggestion outright.
 */
export function toMapEntryRow(suggestion: StepSuggestion): Record<(typeof MAP_ENTRIES_COLUMNS)[number], string> {
  return {
    CODE: suggestion.step.code,
    Title: suggestion.step.title,
    Match: suggestion.candidates[0]?.entry.code ?? "",
    OPM_Step: "",
    Source_Title: "",
    Match_Conf: toMatchConfidence(suggestion.bestScore),
    Candidates: formatCandidates(suggestion.candidates)
  };
}

export function toOpmCodeLookupRow(entry: NarrEntry): Record<(typeof OPM_CODE_LOOKUP_COLUMNS)[number], string> {
  return {
    Code: entry.code,
    OPM_Step: entry.opmStep,
    Source_Title: entry.sourceTitle,
    Step_narr_out_simple: entry.narrSimple
  };
}

/** Steps no candidate reached, blank titles included. */
export function findUnmatchedSteps(suggestions: readonly StepSuggestion[]): StepSuggestion[] {
  return suggestions.filter((suggestion) => suggestion.candidates.length === 0);
}

export function toUnmatchedRawRow(suggestion: StepSuggestion): Record<(typeof UNMATCHED_RAW_COLUMNS)[number], string> {
  return {
    Code: suggestion.step.code,
    Title: suggestion.step.title,
    Match_Conf: toMatchConfidence(suggestion.bestScore)
  };
}

/** Suggestible catalog entries that appear in no step's candidate list, in catalog order. */
export function findUnusedEntries(
  suggestions: readonly StepSuggestion[],
  entries: readonly NarrEntry[],
  ignoreCodePrefixes?: readonly string[]
): NarrEntry[] {
  const prefixes = normalizeIgnoreCodePrefixes(ignoreCodePrefixes);
  const reached = new Set(
    suggestions.flatMap((suggestion) => suggestion.candidates.map((candidate) => candidate.entry.code))
  );
  return entries.filter((entry) => !reached.has(entry.code) && !isIgnoredCode(entry.code, prefixes));
}
