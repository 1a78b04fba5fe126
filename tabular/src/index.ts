export {
  TABULAR_ENCODINGS,
  TabularSourceError,
  isBlankCell,
  isBlankRow,
  type RowSet,
  type TabularEncoding,
  type TabularRow,
  type TabularSheet,
  type TabularSourceErrorCode
} from "./row-set.ts";
export { parseCsvText, formatCsvText } from "./csv-codec.ts";
export { coerceCellValue } from "./xlsx-codec.ts";
export { StagedWrites, writeFileAtomically } from "./atomic-write.ts";
export {
  DEFAULT_SHEET_NAME,
  loadTable,
  loadWorkbook,
  resolveEncoding,
  saveTable,
  saveWorkbook,
  secondarySheetPath,
  stageWorkbook,
  type LoadTableOptions,
  type SaveTableOptions
} from "./tabular-source.ts";
