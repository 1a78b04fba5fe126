import ExcelJS from "exceljs";
import type { CellValue, Worksheet } from "exceljs";

import { TabularSourceError, buildRowSet, toCellLines, type TabularSheet } from "./row-set.ts";

/**
 * Reduces a workbook cell to the text the rest of the system sees.
 *
 * Numbers use `String(n)`, booleans become `TRUE`/`FALSE`, dates ISO-8601, formulas their cached
 * result, rich text its concatenated runs, hyperlinks their display text and error cells their
 * error token. Empty cells read as "".
 */
export function coerceCellValue(value: CellValue): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "number") {
    return String(value);
  }

  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }

  if ("hyperlink" in value) {
    return typeof value.text === "string" ? value.text : "";
  }

  if ("error" in value) {
    return value.error;
  }

  if ("result" in value && value.result !== undefined) {
    return coerceCellValue(value.result);
  }

  return "";
}

function readWorksheet(worksheet: Worksheet, path: string): TabularSheet {
  const width = worksheet.columnCount;
  const lines: string[][] = [];

  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    const cells: string[] = [];
    for (let columnNumber = 1; columnNumber <= width; columnNumber += 1) {
      cells.push(coerceCellValue(row.getCell(columnNumber).value));
    }
    lines.push(cells);
  }

  const [header, ...body] = lines;
  const rowSet = header ? buildRowSet(header, body, `${path}#${worksheet.name}`) : { columns: [], rows: [] };

  return {
    name: worksheet.name,
    columns: rowSet.columns,
    rows: rowSet.rows
  };
}

export async function readXlsxSheets(path: string): Promise<TabularSheet[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(path);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TabularSourceError(`Cannot read workbook ${path}: ${detail}`, "SOURCE_UNREADABLE", path);
  }

  return workbook.worksheets.map((worksheet) => readWorksheet(worksheet, path));
}

export async function writeXlsxSheets(sheets: readonly TabularSheet[], path: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();

  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name);
    worksheet.addRow([...sheet.columns]);
    for (const line of toCellLines(sheet)) {
      worksheet.addRow(line);
    }
  }

  await workbook.xlsx.writeFile(path);
}
