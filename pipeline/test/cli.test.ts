import assert from "node:assert/strict";
import { execFileSync, spawnSync } from "node:child_process";
import { existsSync, readdirSync, rmSync } from "node:fs";
import { join, resolve } from "node:path";
import test from "node:test";
import { fileURLToPath } from "node:url";

import { createDemoWorkspace } from "./helpers/fixtures.ts";

interface CliSuccessOutput {
  ok: true;
  run_id: string;
  mode: string;
  sop: string;
  outputs: string[];
  summary_path: string;
  rows_written: number;
  issue_count: number;
}

interface CliFailureOutput {
  ok: false;
  error: { name: string; code: string; message: string };
  usage?: string;
}

const testDirectory = fileURLToPath(new URL(".", import.meta.url));
const repoRoot = resolve(testDirectory, "../..");
const cliPath = resolve(repoRoot, "pipeline/src/cli.ts");

function runCli(args: string[]): { status: number | null; output: CliFailureOutput } {
  const child = spawnSync("node", ["--import", "tsx", cliPath, ...args], {
    cwd: repoRoot,
    stdio: "pipe",
    encoding: "utf8"
  });
  return { status: child.status, output: JSON.parse(child.stdout) as CliFailureOutput };
}

test("CLI builds a PreMerge artifact and reports it as JSON", () => {
  const { root } = createDemoWorkspace("narr-merge-cli-");

  try {
    const rawStdout = execFileSync(
      "node",
      [
        "--import",
        "tsx",
        cliPath,
        "build-premerge",
        "--sop",
        "SOP1",
        "--input-root",
        join(root, "input"),
        "--output-root",
        join(root, "output"),
        "--raw",
        "raw.csv",
        "--narr",
        "narr.csv",
        "--map",
        "map.csv",
        "--encoding",
        "csv",
        "--no-latest",
        "--no-ledger"
      ],
      {
        cwd: repoRoot,
        stdio: "pipe",
        encoding: "utf8"
      }
    );
    const cliOutput = JSON.parse(rawStdout) as CliSuccessOutput;

    assert.equal(cliOutput.ok, true);
    assert.equal(cliOutput.mode, "build-premerge");
    assert.equal(cliOutput.sop, "SOP1");
    assert.equal(cliOutput.rows_written, 3);
    assert.equal(cliOutput.issue_count, 1);
    assert.equal(cliOutput.outputs.length, 2);
    assert.equal(cliOutput.outputs[1], cliOutput.summary_path);
    assert.equal(existsSync(cliOutput.summary_path), true);
    assert.equal(readdirSync(join(root, "output", "SOP1")).length, 2);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test("CLI reports a missing SOP as a config failure", () => {
  const { status, output } = runCli(["build-premerge", "--raw", "raw.csv", "--narr", "narr.csv"]);

  assert.equal(status, 1);
  assert.equal(output.ok, false);
  assert.equal(output.error.name, "RunConfigError");
  assert.equal(output.error.code, "INVALID_RUN_CONFIG");
  assert.equal(output.usage, undefined);
});

test("CLI prints usage for an unknown flag", () => {
  const { status, output } = runCli(["build-premerge", "--sop", "SOP1", "--bogus"]);

  assert.equal(status, 1);
  assert.equal(output.error.code, "INVALID_ARGUMENTS");
  assert.equal(output.usage?.startsWith("Usage: narr-merge <build-premerge|"), true);
});

test("CLI rejects an unknown encoding before running", () => {
  const { status, output } = runCli(["build-premerge", "--sop", "SOP1", "--encoding", "ods"]);

  assert.equal(status, 1);
  assert.equal(output.error.code, "INVALID_ARGUMENTS");
  assert.equal(output.error.message, '--encoding must be one of csv, xlsx, got "ods"');
});
