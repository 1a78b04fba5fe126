import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { TabularSourceError, buildRowSet, toCellLines, type RowSet } from "./row-set.ts";

function requireCellLines(records: unknown, path: string): string[][] {
  if (!Array.isArray(records)) {
    throw new TabularSourceError(`CSV parser returned no records for ${path}`, "SOURCE_UNREADABLE", path);
  }

  return records.map((record, index) => {
    if (!Array.isArray(record) || !record.every((cell) => typeof cell === "string")) {
      throw new TabularSourceError(
        `CSV record ${index + 1} of ${path} is not a list of text cells`,
        "SOURCE_UNREADABLE",
        path
      );
    }

    return record.map((cell) => String(cell));
  });
}

export function parseCsvText(text: string, path: string): RowSet {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true
    });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TabularSourceError(`Cannot parse CSV ${path}: ${detail}`, "SOURCE_UNREADABLE", path);
  }

  const lines = requireCellLines(records, path);
  const [header, ...body] = lines;
  if (!header) {
    return { columns: [], rows: [] };
  }

  return buildRowSet(header, body, path);
}

export function formatCsvText(rowSet: RowSet): string {
  return stringify([rowSet.columns, ...toCellLines(rowSet)], {
    bom: true,
    record_delimiter: "unix"
  });
}
