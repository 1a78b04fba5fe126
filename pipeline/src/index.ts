import { randomUUID } from "node:crypto";
import { join } from "node:path";

import { TabularSourceError, loadTable, type TabularSheet } from "../../tabular/src/index.ts";

import { writeArtifact, writeArtifactText, type ArtifactStage, type WrittenArtifact } from "./artifact-writer.ts";
import { ChangeMergeError } from "./change-merger.ts";
import { TableContractError } from "./contracts.ts";
import { buildFinalTable } from "./final-builder.ts";
import { FuzzySuggesterError } from "./fuzzy-suggester.ts";
import { buildLegacyMapping } from "./legacy-mapping.ts";
import { buildManualSuggestions } from "./manual-suggestions.ts";
import { MatchResolutionError } from "./match-resolver.ts";
import type { MatchClassCounts, RunIssue } from "./model.ts";
import { buildPreMergeTable } from "./premerge-builder.ts";
import { RunConfigError, resolveInputPath, type RunContext } from "./run-config.ts";
import {
  RUN_LEDGER_SCHEMA_VERSION,
  emitRunLedgerEntry,
  runLedgerFileName,
  type RunLedgerEntryV1,
  type RunLedgerError
} from "./run-ledger.ts";
import { formatRunSummaryReport, type RunSummary } from "./run-summary.ts";
import { loadKeyedTable, loadManualMap, loadNarrEntries, loadRawTable } from "./tables.ts";

export const PIPELINE_MODES = [
  "build-premerge",
  "build-final-from-edits",
  "build-manual-suggestions",
  "legacy-direct-mapping"
] as const;

export type PipelineMode = (typeof PIPELINE_MODES)[number];

export const PIPELINE_INPUT_NAMES = ["raw", "narr", "map", "prior", "premerge", "edited"] as const;

export type PipelineInputName = (typeof PIPELINE_INPUT_NAMES)[number];

export type PipelineInputs = Partial<Record<PipelineInputName, string>>;

export const MODE_INPUTS: Record<PipelineMode, { required: PipelineInputName[]; optional: PipelineInputName[] }> = {
  "build-premerge": { required: ["raw", "narr"], optional: ["map", "prior"] },
  "build-final-from-edits": { required: ["premerge", "edited"], optional: [] },
  "build-manual-suggestions": { required: ["raw", "narr"], optional: [] },
  "legacy-direct-mapping": { required: ["raw", "narr", "map"], optional: [] }
};

export const PREMERGE_SHEET_NAME = "PreMerge";

export type PipelineRunErrorCode = "UNKNOWN_MODE" | "MODE_INPUT_MISSING";

export class PipelineRunError extends Error {
  readonly code: PipelineRunErrorCode;
  readonly mode: string;
  readonly missingInputs: string[];

  constructor(message: string, code: PipelineRunErrorCode, mode: string, missingInputs: string[] = []) {
    super(message);
    this.name = "PipelineRunError";
    this.code = code;
    this.mode = mode;
    this.missingInputs = missingInputs;
  }
}

export interface RunPipelineRequest {
  mode: string;
  inputs: PipelineInputs;
}

export interface RunPipelineOptions {
  now?: () => Date;
  runIdFactory?: () => string;
}

export interface RunPipelineResult {
  ok: true;
  runId: string;
  mode: PipelineMode;
  artifact: WrittenArtifact;
  summary: RunSummary;
  summaryPath: string;
  ledgerPath?: string;
}

interface StageOutput {
  stage: ArtifactStage;
  sheets: TabularSheet[];
  issues: RunIssue[];
  matchCounts?: MatchClassCounts;
  changeCount?: number;
  suggestedCount?: number;
  unmatchedCount?: number;
  unusedCount?: number;
  mappedCount?: number;
}

export function isPipelineMode(value: string): value is PipelineMode {
  return (PIPELINE_MODES as readonly string[]).includes(value);
}

function requirePipelineMode(mode: string): PipelineMode {
  if (!isPipelineMode(mode)) {
    throw new PipelineRunError(
      `Unknown mode "${mode}"; expected one of ${PIPELINE_MODES.join(", ")}`,
      "UNKNOWN_MODE",
      mode
    );
  }
  return mode;
}

/** Drops blank and undeclared inputs, resolves the rest against the SOP input directory. */
function resolveModeInputs(mode: PipelineMode, inputs: PipelineInputs, context: RunContext): Record<string, string> {
  const declared = [...MODE_INPUTS[mode].required, ...MODE_INPUTS[mode].optional];
  const resolved: Record<string, string> = {};
  for (const name of declared) {
    const value = inputs[name]?.trim();
    if (value) {
      resolved[name] = resolveInputPath(context, value);
    }
  }

  const missing = MODE_INPUTS[mode].required.filter((name) => resolved[name] === undefined);
  if (missing.length > 0) {
    throw new PipelineRunError(
      `Mode ${mode} requires input(s): ${missing.join(", ")}`,
      "MODE_INPUT_MISSING",
      mode,
      missing
    );
  }

  return resolved;
}

function requireInput(inputs: Record<string, string>, name: PipelineInputName): string {
  const path = inputs[name];
  if (path === undefined) {
    throw new PipelineRunError(`Input ${name} is required`, "MODE_INPUT_MISSING", "", [name]);
  }
  return path;
}

async function runStage(mode: PipelineMode, inputs: Record<string, string>, context: RunContext): Promise<StageOutput> {
  switch (mode) {
    case "build-premerge": {
      const raw = await loadRawTable(requireInput(inputs, "raw"));
      const narr = await loadNarrEntries(requireInput(inputs, "narr"));
      const manualMap = inputs.map !== undefined ? await loadManualMap(inputs.map) : undefined;
      const prior = inputs.prior !== undefined ? await loadKeyedTable("premerge-table", inputs.prior) : undefined;
      const result = buildPreMergeTable({ raw, narr, manualMap, prior }, { mClassPrefix: context.mClassPrefix });
      return {
        stage: "PreMerge",
        sheets: [{ name: PREMERGE_SHEET_NAME, ...result.table }],
        issues: result.issues,
        matchCounts: result.matchCounts
      };
    }
    case "build-final-from-edits": {
      const premerge = await loadKeyedTable("premerge-table", requireInput(inputs, "premerge"));
      const edited = await loadKeyedTable("edited-table", requireInput(inputs, "edited"));
      const result = buildFinalTable(premerge, edited);
      return {
        stage: "mk_tw_in",
        sheets: result.sheets,
        issues: result.issues,
        changeCount: result.changes.length
      };
    }
    case "build-manual-suggestions": {
      const raw = await loadRawTable(requireInput(inputs, "raw"));
      const narr = await loadNarrEntries(requireInput(inputs, "narr"));
      const result = buildManualSuggestions(raw, narr, context.suggestions);
      return {
        stage: "Manual_Match",
        sheets: result.sheets,
        issues: [],
        suggestedCount: result.suggested,
        unmatchedCount: result.unmatched,
        unusedCount: result.unused
      };
    }
    case "legacy-direct-mapping": {
      const raw = await loadRawTable(requireInput(inputs, "raw"));
      const narr = await loadNarrEntries(requireInput(inputs, "narr"));
      const mapPath = requireInput(inputs, "map");
      const result = buildLegacyMapping(raw, narr, await loadTable(mapPath), mapPath);
      return {
        stage: "mk_tw_in_legacy",
        sheets: [{ name: "mk_tw_in", ...result.table }],
        issues: result.issues,
        mappedCount: result.matched
      };
    }
  }
}

export function describeRunError(error: unknown): RunLedgerError {
  if (error instanceof Error) {
    return {
      name: error.name,
      code: resolveFailureCode(error),
      message: error.message
    };
  }

  return { name: "Error", code: "UNKNOWN_ERROR", message: String(error) };
}

function resolveFailureCode(error: Error): string {
  if (
    error instanceof PipelineRunError ||
    error instanceof RunConfigError ||
    error instanceof TableContractError ||
    error instanceof TabularSourceError ||
    error instanceof MatchResolutionError ||
    error instanceof ChangeMergeError ||
    error instanceof FuzzySuggesterError
  ) {
    return error.code;
  }

  return "UNKNOWN_ERROR";
}

function emitPipelineRunLedger(params: {
  ledgerPath: string;
  runId: string;
  startedAt: string;
  completedAt: string;
  mode: string;
  sop: string;
  inputs: Record<string, string>;
  summary?: RunSummary;
  error?: RunLedgerError;
}): boolean {
  const entry: RunLedgerEntryV1 = {
    schema_version: RUN_LEDGER_SCHEMA_VERSION,
    run_id: params.runId,
    started_at: params.startedAt,
    completed_at: params.completedAt,
    mode: params.mode,
    sop: params.sop,
    inputs: params.inputs,
    outcome:
      params.summary !== undefined
        ? {
            status: "success",
            outputs: params.summary.outputs,
            rows_written: params.summary.rowsWritten,
            change_count: params.summary.changeCount ?? 0,
            issue_count: params.summary.issues.length
          }
        : {
            status: "failure",
            error: params.error ?? { name: "Error", code: "UNKNOWN_ERROR", message: "run did not complete" }
          }
  };

  try {
    emitRunLedgerEntry(entry, { outputPath: params.ledgerPath });
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs one mode end to end: load and validate its inputs, build the stage's tables, write them
 * with the run summary beside them. Fatal errors propagate before any artifact is written. When
 * the context enables it, a ledger entry is appended whether the run succeeds or fails.
 */
export async function runPipeline(
  request: RunPipelineRequest,
  context: RunContext,
  options: RunPipelineOptions = {}
): Promise<RunPipelineResult> {
  const now = options.now ?? (() => new Date());
  const runId = options.runIdFactory?.().trim() || randomUUID();
  const startedAt = now().toISOString();
  const ledgerPath = context.runLedger ? join(context.outputDir, runLedgerFileName(context.sop)) : undefined;

  let inputs: Record<string, string> = {};
  let summary: RunSummary | undefined;
  let runError: RunLedgerError | undefined;
  try {
    const mode = requirePipelineMode(request.mode);
    inputs = resolveModeInputs(mode, request.inputs, context);
    const stage = await runStage(mode, inputs, context);
    const artifact = await writeArtifact(stage.stage, stage.sheets, context, { now });
    const summaryFileName = `${artifact.baseName}_summary.txt`;
    const rowsWritten = stage.sheets[0]?.rows.length ?? 0;

    summary = {
      runId,
      mode,
      sop: context.sop,
      startedAt,
      completedAt: now().toISOString(),
      inputs,
      rowsWritten,
      matchCounts: stage.matchCounts,
      changeCount: stage.changeCount,
      suggestedCount: stage.suggestedCount,
      unmatchedCount: stage.unmatchedCount,
      unusedCount: stage.unusedCount,
      mappedCount: stage.mappedCount,
      issues: stage.issues,
      outputs: [...artifact.paths, ...artifact.latestPaths, join(context.outputDir, summaryFileName)]
    };
    const summaryPath = await writeArtifactText(context.outputDir, summaryFileName, formatRunSummaryReport(summary));

    return { ok: true, runId, mode, artifact, summary, summaryPath, ledgerPath };
  } catch (error) {
    runError = describeRunError(error);
    throw error;
  } finally {
    if (ledgerPath !== undefined) {
      emitPipelineRunLedger({
        ledgerPath,
        runId,
        startedAt,
        completedAt: summary?.completedAt ?? now().toISOString(),
        mode: request.mode,
        sop: context.sop,
        inputs,
        summary: runError === undefined ? summary : undefined,
        error: runError
      });
    }
  }
}

export {
  ARTIFACT_STAGES,
  LATEST_ALIAS_SUFFIX,
  artifactBaseName,
  formatArtifactTimestamp,
  writeArtifact,
  writeArtifactText,
  type ArtifactStage,
  type WrittenArtifact
} from "./artifact-writer.ts";
export {
  CHANGE_MERGE_SKIPPED_COLUMNS,
  ChangeMergeError,
  mergeEdits,
  normalizeStartHere,
  requireSingleStart,
  type MergeEditsResult
} from "./change-merger.ts";
export {
  TABLE_KINDS,
  TableContractError,
  getSchemaValidator,
  requireTableColumns,
  requireUniqueKeys,
  type ContractValidationIssue,
  type TableContractErrorCode,
  type TableKind
} from "./contracts.ts";
export {
  createTitleIndex,
  deriveFields,
  deriveNarrations,
  firstHalfOfTitle,
  resolveNextDisplays,
  type DeriveFieldsContext,
  type Narrations
} from "./field-deriver.ts";
export { CHANGE_LOG_SHEET_NAME, FINAL_SHEET_NAME, buildFinalTable, toChangeLogTable } from "./final-builder.ts";
export {
  DEFAULT_SUGGESTION_FIELDS,
  DEFAULT_SUGGESTION_IGNORE_CODE_PREFIXES,
  DEFAULT_SUGGESTION_MAX_CANDIDATES,
  DEFAULT_SUGGESTION_THRESHOLD,
  FuzzySuggesterError,
  MAP_ENTRIES_COLUMNS,
  OPM_CODE_LOOKUP_COLUMNS,
  UNMATCHED_RAW_COLUMNS,
  findUnmatchedSteps,
  findUnusedEntries,
  isIgnoredCode,
  suggestMatches,
  toMapEntryRow,
  toMatchConfidence,
  toOpmCodeLookupRow,
  toUnmatchedRawRow,
  type StepSuggestion,
  type SuggestMatchesOptions,
  type SuggestionCandidate,
  type SuggestionField
} from "./fuzzy-suggester.ts";
export {
  LEGACY_MATCH_COLUMNS,
  LEGACY_OUTPUT_COLUMNS,
  buildLegacyMapping,
  leadCodeToken,
  pickMatchColumn,
  questionize
} from "./legacy-mapping.ts";
export {
  MAP_ENTRIES_SHEET_NAME,
  OPM_CODE_LOOKUP_SHEET_NAME,
  UNMATCHED_RAW_SHEET_NAME,
  UNUSED_NARR_SHEET_NAME,
  buildManualSuggestions,
  type ManualSuggestionsResult
} from "./manual-suggestions.ts";
export {
  DEFAULT_M_CLASS_PREFIX,
  MatchResolutionError,
  createNarrCatalog,
  isMClassCode,
  resolveMatch,
  type NarrCatalog
} from "./match-resolver.ts";
export {
  CHANGE_LOG_COLUMNS,
  PREMERGE_DERIVED_COLUMNS,
  type ChangeRecord,
  type DerivedFields,
  type ManualMapEntry,
  type MatchClass,
  type MatchClassCounts,
  type MatchResolution,
  type NarrEntry,
  type RawStep,
  type RawTable,
  type RunIssue,
  type RunIssueCode
} from "./model.ts";
export { buildPreMergeTable, preMergeColumns, type PreMergeInput, type PreMergeResult } from "./premerge-builder.ts";
export {
  DEFAULT_INPUT_ROOT,
  DEFAULT_OUTPUT_ROOT,
  DEFAULT_TIME_ZONE,
  RUN_CONFIG_SCHEMA_VERSION,
  RunConfigError,
  loadRunConfigFile,
  loadRunContext,
  resolveInputPath,
  resolveRunContext,
  validateRunConfig,
  type RunConfigFile,
  type RunConfigOverrides,
  type RunContext,
  type SuggestionSettings
} from "./run-config.ts";
export {
  RUN_LEDGER_SCHEMA_VERSION,
  emitRunLedgerEntry,
  runLedgerFileName,
  type RunLedgerEntryV1,
  type RunLedgerError
} from "./run-ledger.ts";
export { formatRunSummaryReport, type RunSummary } from "./run-summary.ts";
export {
  SIMILARITY_SCORER_IDS,
  countMatchingCharacters,
  gestaltScorer,
  isSimilarityScorerId,
  resolveSimilarityScorer,
  stripCodes,
  tokenDiceScorer,
  tokenizeForSearch,
  type SimilarityScorer,
  type SimilarityScorerId
} from "./similarity.ts";
export {
  loadKeyedTable,
  loadManualMap,
  loadNarrEntries,
  loadRawTable,
  parseKeyedTable,
  parseManualMap,
  parseNarrEntries,
  parseRawTable,
  type ManualMap
} from "./tables.ts";
