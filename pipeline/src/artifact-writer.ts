import { writeFileSync } from "node:fs";
import { join } from "node:path";

import {
  StagedWrites,
  stageWorkbook,
  writeFileAtomically,
  type TabularEncoding,
  type TabularSheet
} from "../../tabular/src/index.ts";

import type { RunContext } from "./run-config.ts";

export const ARTIFACT_STAGES = ["PreMerge", "mk_tw_in", "Manual_Match", "mk_tw_in_legacy"] as const;

export type ArtifactStage = (typeof ARTIFACT_STAGES)[number];

export const LATEST_ALIAS_SUFFIX = "latest";

export interface WrittenArtifact {
  stage: ArtifactStage;
  baseName: string;
  timestamp: string;
  /** Every file written for the stamped artifact, primary table first. */
  paths: string[];
  latestPaths: string[];
}

export interface WriteArtifactOptions {
  now?: () => Date;
}

function pickPart(parts: readonly Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
  const value = parts.find((part) => part.type === type)?.value ?? "";
  return value.padStart(2, "0");
}

/** `DDMMYY_HHMM` wall-clock time in `timeZone`, 24-hour. */
export function formatArtifactTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "2-digit",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);

  return `${pickPart(parts, "day")}${pickPart(parts, "month")}${pickPart(parts, "year")}_${pickPart(parts, "hour")}${pickPart(parts, "minute")}`;
}

export function artifactBaseName(sop: string, stage: ArtifactStage, stamp: string): string {
  return `${sop}_${stage}_${stamp}`;
}

async function stageEncodings(
  batch: StagedWrites,
  sheets: readonly TabularSheet[],
  outputDir: string,
  baseName: string,
  encodings: readonly TabularEncoding[]
): Promise<string[]> {
  const before = batch.paths.length;
  for (const encoding of encodings) {
    await stageWorkbook(batch, sheets, join(outputDir, `${baseName}.${encoding}`));
  }
  return batch.paths.slice(before);
}

/**
 * Writes a stage's sheets as `<SOP>_<stage>_<DDMMYY_HHMM>` in every configured encoding and,
 * with `keepLatest`, refreshes `<SOP>_<stage>_latest` with the same content. All files are staged
 * first and renamed together, so a failure leaves none of them behind.
 */
export async function writeArtifact(
  stage: ArtifactStage,
  sheets: readonly TabularSheet[],
  context: RunContext,
  options: WriteArtifactOptions = {}
): Promise<WrittenArtifact> {
  const now = options.now ?? (() => new Date());
  const timestamp = formatArtifactTimestamp(now(), context.timeZone);
  const baseName = artifactBaseName(context.sop, stage, timestamp);
  const batch = new StagedWrites();

  let paths: string[] = [];
  let latestPaths: string[] = [];
  try {
    paths = await stageEncodings(batch, sheets, context.outputDir, baseName, context.encodings);
    if (context.keepLatest) {
      latestPaths = await stageEncodings(
        batch,
        sheets,
        context.outputDir,
        artifactBaseName(context.sop, stage, LATEST_ALIAS_SUFFIX),
        context.encodings
      );
    }
  } catch (error) {
    batch.discard();
    throw error;
  }

  batch.commit();
  return { stage, baseName, timestamp, paths, latestPaths };
}

export async function writeArtifactText(outputDir: string, fileName: string, text: string): Promise<string> {
  const path = join(outputDir, fileName);
  await writeFileAtomically(path, (tempPath) => writeFileSync(tempPath, text, "utf8"));
  return path;
}
