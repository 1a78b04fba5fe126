import { readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";

import { TABULAR_ENCODINGS, type TabularEncoding } from "../../tabular/src/index.ts";

import { getSchemaValidator, mapAjvIssues, type ContractValidationIssue } from "./contracts.ts";
import {
  DEFAULT_SUGGESTION_FIELDS,
  DEFAULT_SUGGESTION_IGNORE_CODE_PREFIXES,
  DEFAULT_SUGGESTION_MAX_CANDIDATES,
  DEFAULT_SUGGESTION_THRESHOLD,
  type SuggestionField
} from "./fuzzy-suggester.ts";
import { DEFAULT_M_CLASS_PREFIX } from "./match-resolver.ts";
import { DEFAULT_SIMILARITY_SCORER, type SimilarityScorerId } from "./similarity.ts";

export const RUN_CONFIG_SCHEMA_VERSION = "1.0.0";
export const DEFAULT_INPUT_ROOT = "input";
export const DEFAULT_OUTPUT_ROOT = "output";
export const DEFAULT_TIME_ZONE = "America/New_York";
export const DEFAULT_OUTPUT_ENCODINGS: readonly TabularEncoding[] = TABULAR_ENCODINGS;

export interface RunConfigFile {
  schema_version: string;
  sop: string;
  paths?: {
    input_root?: string;
    output_root?: string;
  };
  timestamp?: {
    time_zone?: string;
  };
  outputs?: {
    encodings?: TabularEncoding[];
    keep_latest?: boolean;
    run_ledger?: boolean;
  };
  matching?: {
    m_class_prefix?: string;
  };
  suggestions?: {
    threshold?: number;
    scorer?: SimilarityScorerId;
    ignore_code_prefixes?: string[];
    max_candidates?: number;
    fields?: SuggestionField[];
  };
}

export interface SuggestionSettings {
  threshold: number;
  scorer: SimilarityScorerId;
  ignoreCodePrefixes: string[];
  maxCandidates: number;
  fields: SuggestionField[];
}

/** Everything a run needs to know about where it reads, where it writes and how it matches. */
export interface RunContext {
  sop: string;
  inputDir: string;
  outputDir: string;
  timeZone: string;
  encodings: TabularEncoding[];
  keepLatest: boolean;
  runLedger: boolean;
  mClassPrefix: string;
  suggestions: SuggestionSettings;
}

export interface RunConfigOverrides {
  sop?: string;
  inputRoot?: string;
  outputRoot?: string;
  timeZone?: string;
  encodings?: TabularEncoding[];
  keepLatest?: boolean;
  runLedger?: boolean;
  threshold?: number;
  scorer?: SimilarityScorerId;
}

export type RunConfigErrorCode = "INVALID_RUN_CONFIG" | "VERSION_INCOMPATIBLE" | "CONFIG_UNREADABLE";

export class RunConfigError extends Error {
  readonly code: RunConfigErrorCode;
  readonly issues: ContractValidationIssue[];

  constructor(message: string, code: RunConfigErrorCode, issues: ContractValidationIssue[] = []) {
    super(message);
    this.name = "RunConfigError";
    this.code = code;
    this.issues = issues;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRunConfigFile(value: unknown): value is RunConfigFile {
  return getSchemaValidator("run-config")(value);
}

export function validateRunConfig(value: unknown): RunConfigFile {
  if (!isRecord(value)) {
    throw new RunConfigError("Run config must be a JSON object", "INVALID_RUN_CONFIG");
  }

  const schemaVersion = value.schema_version;
  if (typeof schemaVersion === "string" && schemaVersion !== RUN_CONFIG_SCHEMA_VERSION) {
    throw new RunConfigError(
      `Run config schema_version "${schemaVersion}" is incompatible; expected "${RUN_CONFIG_SCHEMA_VERSION}"`,
      "VERSION_INCOMPATIBLE",
      [{ instancePath: "/schema_version", keyword: "const", message: `expected "${RUN_CONFIG_SCHEMA_VERSION}"` }]
    );
  }

  if (!isRunConfigFile(value)) {
    const issues = mapAjvIssues(getSchemaValidator("run-config").errors);
    const summary = issues.map((issue) => `${issue.instancePath || "/"} ${issue.message}`).join("; ");
    throw new RunConfigError(`Run config failed schema validation: ${summary}`, "INVALID_RUN_CONFIG", issues);
  }

  return value;
}

export function loadRunConfigFile(path: string): RunConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new RunConfigError(`Cannot read run config ${path}: ${detail}`, "CONFIG_UNREADABLE");
  }

  return validateRunConfig(parsed);
}

function requireTimeZone(timeZone: string): string {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone }).format(0);
  } catch {
    throw new RunConfigError(`Unknown time zone "${timeZone}"`, "INVALID_RUN_CONFIG", [
      { instancePath: "/timestamp/time_zone", keyword: "format", message: "must be an IANA time zone" }
    ]);
  }

  return timeZone;
}

function requireSop(sop: string | undefined): string {
  const trimmed = sop?.trim() ?? "";
  if (!/^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(trimmed)) {
    throw new RunConfigError(
      `SOP "${sop ?? ""}" must be a non-empty name of letters, digits, ".", "_" or "-"`,
      "INVALID_RUN_CONFIG",
      [{ instancePath: "/sop", keyword: "pattern", message: "must name a single directory" }]
    );
  }

  return trimmed;
}

function resolveRoot(root: string, baseDir: string): string {
  return isAbsolute(root) ? root : resolve(baseDir, root);
}

/**
 * Merges a validated config, CLI overrides and defaults into the RunContext handed to every
 * component. Relative roots resolve against `baseDir`, and both directories are scoped to the SOP.
 */
export function resolveRunContext(
  config: RunConfigFile | undefined,
  overrides: RunConfigOverrides = {},
  baseDir: string = process.cwd()
): RunContext {
  const sop = requireSop(overrides.sop ?? config?.sop);
  const inputRoot = overrides.inputRoot ?? config?.paths?.input_root ?? DEFAULT_INPUT_ROOT;
  const outputRoot = overrides.outputRoot ?? config?.paths?.output_root ?? DEFAULT_OUTPUT_ROOT;
  const suggestions = config?.suggestions;
  const threshold = overrides.threshold ?? suggestions?.threshold ?? DEFAULT_SUGGESTION_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new RunConfigError(`Suggestion threshold must be within [0, 1], got ${threshold}`, "INVALID_RUN_CONFIG", [
      { instancePath: "/suggestions/threshold", keyword: "maximum", message: "must be within [0, 1]" }
    ]);
  }

  return {
    sop,
    inputDir: join(resolveRoot(inputRoot, baseDir), sop),
    outputDir: join(resolveRoot(outputRoot, baseDir), sop),
    timeZone: requireTimeZone(overrides.timeZone ?? config?.timestamp?.time_zone ?? DEFAULT_TIME_ZONE),
    encodings: [...(overrides.encodings ?? config?.outputs?.encodings ?? DEFAULT_OUTPUT_ENCODINGS)],
    keepLatest: overrides.keepLatest ?? config?.outputs?.keep_latest ?? true,
    runLedger: overrides.runLedger ?? config?.outputs?.run_ledger ?? true,
    mClassPrefix: config?.matching?.m_class_prefix ?? DEFAULT_M_CLASS_PREFIX,
    suggestions: {
      threshold,
      scorer: overrides.scorer ?? suggestions?.scorer ?? DEFAULT_SIMILARITY_SCORER,
      ignoreCodePrefixes: [...(suggestions?.ignore_code_prefixes ?? DEFAULT_SUGGESTION_IGNORE_CODE_PREFIXES)],
      maxCandidates: suggestions?.max_candidates ?? DEFAULT_SUGGESTION_MAX_CANDIDATES,
      fields: [...(suggestions?.fields ?? DEFAULT_SUGGESTION_FIELDS)]
    }
  };
}

/** Loads a config file and resolves it with relative roots taken from the file's directory. */
export function loadRunContext(configPath: string, overrides: RunConfigOverrides = {}): RunContext {
  return resolveRunContext(loadRunConfigFile(configPath), overrides, dirname(resolve(configPath)));
}

/** An input path as given when absolute, else inside the SOP's input directory. */
export function resolveInputPath(context: RunContext, path: string): string {
  return isAbsolute(path) ? path : join(context.inputDir, path);
}
