import { readFileSync } from "node:fs";
import { createRequire } from "node:module";

import type { ErrorObject, ValidateFunction } from "ajv/dist/2020.js";

import type { RowSet } from "../../tabular/src/index.ts";

export const TABLE_KINDS = [
  "raw-table",
  "narr-table",
  "manual-map-table",
  "premerge-table",
  "edited-table",
  "legacy-map-table"
] as const;

export type TableKind = (typeof TABLE_KINDS)[number];

export type SchemaName = TableKind | "run-config";

export type TableContractErrorCode = "MISSING_REQUIRED_COLUMN" | "DUPLICATE_KEY" | "INVALID_TABLE";

export interface ContractValidationIssue {
  instancePath: string;
  keyword: string;
  message: string;
}

export class TableContractError extends Error {
  readonly table: TableKind;
  readonly code: TableContractErrorCode;
  readonly path: string;
  /** Missing column names for MISSING_REQUIRED_COLUMN, duplicated codes for DUPLICATE_KEY. */
  readonly keys: string[];
  readonly issues: ContractValidationIssue[];

  constructor(params: {
    table: TableKind;
    code: TableContractErrorCode;
    message: string;
    path: string;
    keys?: string[];
    issues?: ContractValidationIssue[];
  }) {
    super(params.message);
    this.name = "TableContractError";
    this.table = params.table;
    this.code = params.code;
    this.path = params.path;
    this.keys = params.keys ?? [];
    this.issues = params.issues ?? [];
  }
}

type Ajv2020Constructor = new (options: { allErrors: boolean }) => {
  compile(schema: object): ValidateFunction;
};

const schemaValidators = new Map<SchemaName, ValidateFunction>();
let ajv2020Constructor: Ajv2020Constructor | null = null;

function resolveAjv2020Constructor(moduleValue: unknown): Ajv2020Constructor {
  const candidate = moduleValue as
    | Ajv2020Constructor
    | { default?: Ajv2020Constructor; Ajv2020?: Ajv2020Constructor };

  if (typeof candidate === "function") {
    return candidate;
  }
  if (candidate.default && typeof candidate.default === "function") {
    return candidate.default;
  }
  if (candidate.Ajv2020 && typeof candidate.Ajv2020 === "function") {
    return candidate.Ajv2020;
  }

  throw new Error("Unable to resolve Ajv2020 constructor");
}

function getAjv2020Constructor(): Ajv2020Constructor {
  if (ajv2020Constructor) {
    return ajv2020Constructor;
  }

  const nodeRequire = createRequire(import.meta.url);
  ajv2020Constructor = resolveAjv2020Constructor(nodeRequire("ajv/dist/2020.js"));
  return ajv2020Constructor;
}

function loadSchema(relativePathFromContractsSource: string): object {
  const fileContents = readFileSync(new URL(relativePathFromContractsSource, import.meta.url), "utf8");
  return JSON.parse(fileContents) as object;
}

export function getSchemaValidator(name: SchemaName): ValidateFunction {
  const cached = schemaValidators.get(name);
  if (cached) {
    return cached;
  }

  const Ajv2020Constructor = getAjv2020Constructor();
  const ajv = new Ajv2020Constructor({ allErrors: true });
  const validator = ajv.compile(loadSchema(`../../docs/contracts/schemas/${name}.schema.json`));
  schemaValidators.set(name, validator);
  return validator;
}

export function mapAjvIssues(errors: ErrorObject[] | null | undefined): ContractValidationIssue[] {
  return (errors ?? []).map((error) => ({
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? "validation failed"
  }));
}

function readMissingProperty(error: ErrorObject): string | undefined {
  if (error.keyword !== "required") {
    return undefined;
  }

  const params: Record<string, unknown> = error.params;
  return typeof params.missingProperty === "string" ? params.missingProperty : undefined;
}

function toHeaderRecord(columns: readonly string[]): Record<string, true> {
  const header: Record<string, true> = {};
  for (const column of columns) {
    header[column] = true;
  }
  return header;
}

/**
 * Checks a table's header against its schema. Every absent required column is reported in one
 * error so the caller can fix the source in a single pass.
 */
export function requireTableColumns(table: TableKind, rowSet: RowSet, path: string): void {
  const validate = getSchemaValidator(table);
  if (validate(toHeaderRecord(rowSet.columns))) {
    return;
  }

  const issues = mapAjvIssues(validate.errors);
  const missing = (validate.errors ?? [])
    .map((error) => readMissingProperty(error))
    .filter((column): column is string => column !== undefined);

  if (missing.length === 0) {
    throw new TableContractError({
      table,
      code: "INVALID_TABLE",
      message: `${table} ${path} failed header validation`,
      path,
      issues
    });
  }

  throw new TableContractError({
    table,
    code: "MISSING_REQUIRED_COLUMN",
    message: `${table} ${path} is missing required column(s): ${missing.join(", ")}`,
    path,
    keys: missing,
    issues
  });
}

/** Rejects repeated keys, listing each repeated key once in first-seen order. */
export function requireUniqueKeys(table: TableKind, keys: readonly string[], path: string): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];

  for (const key of keys) {
    if (seen.has(key) && !duplicates.includes(key)) {
      duplicates.push(key);
    }
    seen.add(key);
  }

  if (duplicates.length > 0) {
    throw new TableContractError({
      table,
      code: "DUPLICATE_KEY",
      message: `${table} ${path} repeats code(s): ${duplicates.join(", ")}`,
      path,
      keys: duplicates
    });
  }
}
