import { copyFileSync, mkdirSync, mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import type { NarrEntry, RawStep, RawTable, RunContext } from "../../src/index.ts";

export const DEMO_FIXTURE_FILES = ["raw.csv", "narr.csv", "map.csv", "legacy-map.csv"] as const;

export function demoFixturePath(fileName: (typeof DEMO_FIXTURE_FILES)[number]): string {
  return fileURLToPath(new URL(`../../../docs/contracts/examples/sop-demo/${fileName}`, import.meta.url));
}

export function rawStep(
  code: string,
  title: string,
  nextCodes: [string, string, string] = ["", "", ""],
  extra: Record<string, string> = {}
): RawStep {
  return {
    code,
    title,
    nextCodes,
    row: {
      Code: code,
      Title: title,
      next1_code: nextCodes[0],
      next2_code: nextCodes[1],
      next3_code: nextCodes[2],
      ...extra
    }
  };
}

export function rawTable(steps: RawStep[], extraColumns: string[] = []): RawTable {
  return {
    columns: ["Code", "Title", "next1_code", "next2_code", "next3_code", ...extraColumns],
    steps
  };
}

export function narrEntry(code: string, fields: Partial<Omit<NarrEntry, "code">> = {}): NarrEntry {
  return {
    code,
    opmStep: "",
    sourceTitle: "",
    narrSimple: "",
    narrFull: "",
    narrMSimple: "",
    narrMFull: "",
    ...fields
  };
}

/** A temp SOP workspace with the demo tables copied into its input directory. */
export function createDemoWorkspace(prefix: string): { root: string; context: RunContext } {
  const root = mkdtempSync(join(tmpdir(), prefix));
  const inputDir = join(root, "input", "SOP1");
  mkdirSync(inputDir, { recursive: true });
  for (const fileName of DEMO_FIXTURE_FILES) {
    copyFileSync(demoFixturePath(fileName), join(inputDir, fileName));
  }

  return {
    root,
    context: {
      sop: "SOP1",
      inputDir,
      outputDir: join(root, "output", "SOP1"),
      timeZone: "America/New_York",
      encodings: ["csv"],
      keepLatest: true,
      runLedger: true,
      mClassPrefix: "M",
      suggestions: {
        threshold: 0.8,
        scorer: "gestalt",
        ignoreCodePrefixes: ["D", "N", "Y"],
        maxCandidates: 3,
        fields: ["sourceTitle"]
      }
    }
  };
}

/** 2026-03-01 09:05 in New York, before the DST switch. */
export const FIXED_RUN_INSTANT = "2026-03-01T14:05:00.000Z";

export function fixedClock(iso: string = FIXED_RUN_INSTANT): () => Date {
  return () => new Date(iso);
}
