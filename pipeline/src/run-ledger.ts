import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export const RUN_LEDGER_SCHEMA_VERSION = "1.0.0";

export interface RunLedgerError {
  name: string;
  code: string;
  message: string;
}

export interface RunLedgerEntryV1 {
  schema_version: typeof RUN_LEDGER_SCHEMA_VERSION;
  run_id: string;
  started_at: string;
  completed_at: string;
  mode: string;
  sop: string;
  inputs: Record<string, string>;
  outcome:
    | {
        status: "success";
        outputs: string[];
        rows_written: number;
        change_count: number;
        issue_count: number;
      }
    | {
        status: "failure";
        error: RunLedgerError;
      };
}

export interface EmitRunLedgerEntryOptions {
  outputPath?: string;
}

export function emitRunLedgerEntry(entry: RunLedgerEntryV1, options: EmitRunLedgerEntryOptions = {}): void {
  if (!options.outputPath) {
    return;
  }

  mkdirSync(dirname(options.outputPath), { recursive: true });
  appendFileSync(options.outputPath, `${JSON.stringify(entry)}\n`, "utf8");
}

export function runLedgerFileName(sop: string): string {
  return `${sop}_run_ledger.ndjson`;
}
