import { existsSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { basename, dirname, extname, join } from "node:path";

import { StagedWrites } from "./atomic-write.ts";
import { formatCsvText, parseCsvText } from "./csv-codec.ts";
import {
  TABULAR_ENCODINGS,
  TabularSourceError,
  type RowSet,
  type TabularEncoding,
  type TabularSheet
} from "./row-set.ts";
import { readXlsxSheets, writeXlsxSheets } from "./xlsx-codec.ts";

export const DEFAULT_SHEET_NAME = "Sheet1";

export interface LoadTableOptions {
  /**
   * Worksheet to read from an `.xlsx` file, matched case-insensitively; the first sheet when
   * omitted. For `.csv`, names a secondary table written beside the primary one.
   */
  sheet?: string;
}

export interface SaveTableOptions {
  sheetName?: string;
}

function isTabularEncoding(value: string): value is TabularEncoding {
  return (TABULAR_ENCODINGS as readonly string[]).includes(value);
}

export function resolveEncoding(path: string): TabularEncoding {
  const extension = extname(path).toLowerCase().replace(/^\./, "");
  if (!isTabularEncoding(extension)) {
    throw new TabularSourceError(
      `Unsupported table encoding "${extname(path) || "(none)"}" for ${path}; expected .csv or .xlsx`,
      "UNSUPPORTED_ENCODING",
      path
    );
  }

  return extension;
}

function stemOf(path: string): string {
  return basename(path, extname(path));
}

export function secondarySheetPath(path: string, sheetName: string): string {
  return join(dirname(path), `${stemOf(path)}_${sheetName}${extname(path)}`);
}

function readCsvFile(path: string): RowSet {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TabularSourceError(`Cannot read table ${path}: ${detail}`, "SOURCE_UNREADABLE", path);
  }

  return parseCsvText(text, path);
}

function pickSheet(sheets: readonly TabularSheet[], requested: string | undefined, path: string): TabularSheet {
  if (requested === undefined) {
    const first = sheets[0];
    if (!first) {
      throw new TabularSourceError(`Workbook ${path} has no worksheets`, "SHEET_NOT_FOUND", path);
    }
    return first;
  }

  const wanted = requested.trim().toLowerCase();
  const match = sheets.find((sheet) => sheet.name.trim().toLowerCase() === wanted);
  if (!match) {
    throw new TabularSourceError(
      `Workbook ${path} has no worksheet named "${requested}"`,
      "SHEET_NOT_FOUND",
      path
    );
  }

  return match;
}

export async function loadTable(path: string, options: LoadTableOptions = {}): Promise<RowSet> {
  const encoding = resolveEncoding(path);

  if (encoding === "csv") {
    if (options.sheet === undefined) {
      return readCsvFile(path);
    }

    const siblingPath = secondarySheetPath(path, options.sheet);
    if (!existsSync(siblingPath)) {
      throw new TabularSourceError(
        `Table ${path} has no secondary table "${options.sheet}"`,
        "SHEET_NOT_FOUND",
        path
      );
    }

    return readCsvFile(siblingPath);
  }

  const sheet = pickSheet(await readXlsxSheets(path), options.sheet, path);
  return { columns: sheet.columns, rows: sheet.rows };
}

/**
 * Reads every table held by an artifact: all worksheets of an `.xlsx`, or a `.csv` (named after
 * its file stem) followed by its `<stem>_<Sheet>.csv` siblings in name order.
 */
export async function loadWorkbook(path: string): Promise<TabularSheet[]> {
  const encoding = resolveEncoding(path);
  if (encoding === "xlsx") {
    return readXlsxSheets(path);
  }

  const stem = stemOf(path);
  const primary = readCsvFile(path);
  const sheets: TabularSheet[] = [{ name: stem, ...primary }];
  const prefix = `${stem}_`;

  let siblings: string[];
  try {
    siblings = readdirSync(dirname(path))
      .filter((entry) => entry.startsWith(prefix) && extname(entry).toLowerCase() === ".csv")
      .sort((left, right) => left.localeCompare(right));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TabularSourceError(`Cannot list tables beside ${path}: ${detail}`, "SOURCE_UNREADABLE", path);
  }

  for (const sibling of siblings) {
    const siblingPath = join(dirname(path), sibling);
    sheets.push({ name: stemOf(sibling).slice(prefix.length), ...readCsvFile(siblingPath) });
  }

  return sheets;
}

export async function saveTable(rowSet: RowSet, path: string, options: SaveTableOptions = {}): Promise<void> {
  await saveWorkbook([{ name: options.sheetName ?? DEFAULT_SHEET_NAME, ...rowSet }], path);
}

/**
 * Stages the files of one artifact on `batch` without touching any target name. `.xlsx` gets one
 * worksheet per table; `.csv` gets the first table at `path` and each further table at
 * `<stem>_<Sheet>.csv`.
 */
export async function stageWorkbook(batch: StagedWrites, sheets: readonly TabularSheet[], path: string): Promise<void> {
  const encoding = resolveEncoding(path);
  if (sheets.length === 0) {
    throw new TabularSourceError(`Nothing to write to ${path}`, "WRITE_FAILED", path);
  }

  if (encoding === "xlsx") {
    await batch.stage(path, (tempPath) => writeXlsxSheets(sheets, tempPath));
    return;
  }

  for (const [index, sheet] of sheets.entries()) {
    const targetPath = index === 0 ? path : secondarySheetPath(path, sheet.name);
    const text = formatCsvText(sheet);
    await batch.stage(targetPath, (tempPath) => writeFileSync(tempPath, text, "utf8"));
  }
}

/** Writes tables to one artifact; every file lands together or none does. */
export async function saveWorkbook(sheets: readonly TabularSheet[], path: string): Promise<string[]> {
  const batch = new StagedWrites();
  try {
    await stageWorkbook(batch, sheets, path);
  } catch (error) {
    batch.discard();
    throw error;
  }

  return batch.commit();
}
