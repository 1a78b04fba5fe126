export type TabularRow = Record<string, string>;

export interface RowSet {
  columns: string[];
  rows: TabularRow[];
}

export interface TabularSheet extends RowSet {
  name: string;
}

export const TABULAR_ENCODINGS = ["csv", "xlsx"] as const;

export type TabularEncoding = (typeof TABULAR_ENCODINGS)[number];

export type TabularSourceErrorCode =
  | "UNSUPPORTED_ENCODING"
  | "SOURCE_UNREADABLE"
  | "SHEET_NOT_FOUND"
  | "INVALID_HEADER"
  | "ROW_WIDTH_MISMATCH"
  | "WRITE_FAILED";

export class TabularSourceError extends Error {
  readonly code: TabularSourceErrorCode;
  readonly path: string;

  constructor(message: string, code: TabularSourceErrorCode, path: string) {
    super(message);
    this.name = "TabularSourceError";
    this.code = code;
    this.path = path;
  }
}

export function isBlankCell(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

export function isBlankRow(row: TabularRow, columns: readonly string[]): boolean {
  return columns.every((column) => isBlankCell(row[column]));
}

/**
 * Builds a RowSet from a header line and raw cell lines, shared by both codecs.
 *
 * Header names are trimmed. A column whose header is blank is dropped when every cell under it
 * is blank as well; otherwise the header is rejected, as are duplicate names. Fully blank rows
 * are dropped.
 */
export function buildRowSet(header: readonly string[], lines: readonly string[][], path: string): RowSet {
  const trimmedHeader = header.map((name) => name.trim());
  const keptIndexes: number[] = [];
  const seen = new Set<string>();

  trimmedHeader.forEach((name, index) => {
    if (name.length === 0) {
      const hasContent = lines.some((line) => !isBlankCell(line[index]));
      if (hasContent) {
        throw new TabularSourceError(
          `Table ${path} has data under a blank header at column ${index + 1}`,
          "INVALID_HEADER",
          path
        );
      }
      return;
    }

    if (seen.has(name)) {
      throw new TabularSourceError(
        `Table ${path} declares column "${name}" more than once`,
        "INVALID_HEADER",
        path
      );
    }

    seen.add(name);
    keptIndexes.push(index);
  });

  const columns = keptIndexes.map((index) => trimmedHeader[index] ?? "");
  const rows: TabularRow[] = [];

  lines.forEach((line, lineIndex) => {
    for (let index = trimmedHeader.length; index < line.length; index += 1) {
      if (!isBlankCell(line[index])) {
        throw new TabularSourceError(
          `Table ${path} row ${lineIndex + 2} has more cells than the header declares`,
          "ROW_WIDTH_MISMATCH",
          path
        );
      }
    }

    const row: TabularRow = {};
    keptIndexes.forEach((index, position) => {
      row[columns[position] ?? ""] = line[index] ?? "";
    });

    if (!isBlankRow(row, columns)) {
      rows.push(row);
    }
  });

  return { columns, rows };
}

export function toCellLines(rowSet: RowSet): string[][] {
  return rowSet.rows.map((row) => rowSet.columns.map((column) => row[column] ?? ""));
}
