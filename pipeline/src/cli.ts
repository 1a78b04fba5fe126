import { parseArgs } from "node:util";

import { TABULAR_ENCODINGS, type TabularEncoding } from "../../tabular/src/index.ts";

import {
  PIPELINE_MODES,
  describeRunError,
  isSimilarityScorerId,
  loadRunContext,
  resolveRunContext,
  runPipeline,
  type PipelineInputs,
  type RunConfigOverrides,
  type RunLedgerError
} from "./index.ts";

const USAGE = `Usage: narr-merge <${PIPELINE_MODES.join("|")}> --sop <name> [options]

Inputs (relative paths resolve inside <input-root>/<sop>):
  --raw <file>        RAW step table (.csv or .xlsx)
  --narr <file>       narration catalog
  --map <file>        manual map (build-premerge) or mapping table (legacy-direct-mapping)
  --prior <file>      previous PreMerge table, for carrying Narr3 forward
  --premerge <file>   PreMerge table the edits were made on
  --edited <file>     edited copy of the PreMerge table

Options:
  --config <file>       run config JSON; flags below override it
  --input-root <dir>    defaults to ./input
  --output-root <dir>   defaults to ./output
  --time-zone <tz>      time zone of artifact timestamps
  --encoding <csv|xlsx> output encoding, repeatable
  --threshold <0..1>    suggestion threshold
  --scorer <id>         suggestion scorer (gestalt, token-dice)
  --no-latest           do not refresh the _latest alias
  --no-ledger           do not append to the run ledger
`;

type CliOutput =
  | {
      ok: true;
      run_id: string;
      mode: string;
      sop: string;
      outputs: string[];
      summary_path: string;
      rows_written: number;
      issue_count: number;
    }
  | {
      ok: false;
      error: RunLedgerError;
      usage?: string;
    };

class CliUsageError extends Error {
  readonly code = "INVALID_ARGUMENTS";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function isTabularEncoding(value: string): value is TabularEncoding {
  return (TABULAR_ENCODINGS as readonly string[]).includes(value);
}

function parseEncodings(values: string[] | undefined): TabularEncoding[] | undefined {
  if (values === undefined || values.length === 0) {
    return undefined;
  }

  return values.map((value) => {
    const encoding = value.trim().toLowerCase();
    if (!isTabularEncoding(encoding)) {
      throw new CliUsageError(`--encoding must be one of ${TABULAR_ENCODINGS.join(", ")}, got "${value}"`);
    }
    return encoding;
  });
}

function parseThreshold(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const threshold = Number(value);
  if (!Number.isFinite(threshold)) {
    throw new CliUsageError(`--threshold must be a number, got "${value}"`);
  }
  return threshold;
}

function parseCli(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        sop: { type: "string" },
        config: { type: "string" },
        raw: { type: "string" },
        narr: { type: "string" },
        map: { type: "string" },
        prior: { type: "string" },
        premerge: { type: "string" },
        edited: { type: "string" },
        "input-root": { type: "string" },
        "output-root": { type: "string" },
        "time-zone": { type: "string" },
        encoding: { type: "string", multiple: true },
        threshold: { type: "string" },
        scorer: { type: "string" },
        "no-latest": { type: "boolean" },
        "no-ledger": { type: "boolean" }
      }
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export async function main(argv: string[]): Promise<number> {
  let output: CliOutput;

  try {
    const { values, positionals } = parseCli(argv);
    const mode = positionals[0];
    if (mode === undefined || positionals.length > 1) {
      throw new CliUsageError("Expected exactly one mode");
    }

    const scorer = values.scorer;
    if (scorer !== undefined && !isSimilarityScorerId(scorer)) {
      throw new CliUsageError(`--scorer must be gestalt or token-dice, got "${scorer}"`);
    }

    const overrides: RunConfigOverrides = {
      sop: values.sop,
      inputRoot: values["input-root"],
      outputRoot: values["output-root"],
      timeZone: values["time-zone"],
      encodings: parseEncodings(values.encoding),
      keepLatest: values["no-latest"] ? false : undefined,
      runLedger: values["no-ledger"] ? false : undefined,
      threshold: parseThreshold(values.threshold),
      scorer
    };
    const context =
      values.config !== undefined ? loadRunContext(values.config, overrides) : resolveRunContext(undefined, overrides);

    const inputs: PipelineInputs = {
      raw: values.raw,
      narr: values.narr,
      map: values.map,
      prior: values.prior,
      premerge: values.premerge,
      edited: values.edited
    };
    const result = await runPipeline({ mode, inputs }, context);

    output = {
      ok: true,
      run_id: result.runId,
      mode: result.mode,
      sop: context.sop,
      outputs: result.summary.outputs,
      summary_path: result.summaryPath,
      rows_written: result.summary.rowsWritten,
      issue_count: result.summary.issues.length
    };
  } catch (error) {
    const described = describeRunError(error);
    output = {
      ok: false,
      error: error instanceof CliUsageError ? { ...described, code: error.code } : described,
      usage: error instanceof CliUsageError ? USAGE : undefined
    };
  }

  process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  return output.ok ? 0 : 1;
}

process.exitCode = await main(process.argv.slice(2));
