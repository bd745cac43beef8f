export { extractDateFromHeader, pickDateLine, DATE_RULES, HEADER_TEXT_LENGTH } from './headerDate';
export {
  normalizeColumnName,
  COLUMN_RULES,
  PREV_SEVEN_DAY_TOTAL,
  SEVEN_DAY_TOTAL,
  CHANGE,
  PERCENT_CHANGE,
} from './columnNames';
export { coerceCellValue, parsePercentChange } from './cellValues';
export { buildTableRecords, buildRecord, normalizeHeaderRow } from './tableRecords';
export { computeSummary, isViolentOffense, VIOLENT_KEYWORDS } from './summary';
export { parseReport, parseReportDocument, MISSING_DATE_ERROR } from './reportPipeline';
export { jsonDocumentSource, parseJsonDocument } from './jsonDocument';
export { migrateReportKeys, migrateKey, RESERVED_KEYS } from './keyMigration';
export type { JsonValue } from './keyMigration';
export type { HeaderDateMatch } from './headerDate';
