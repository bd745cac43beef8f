import { normalizeColumnName } from './columnNames';
import { setField } from './tableRecords';

export const RESERVED_KEYS = new Set([
  'report_date',
  'extracted_date_text',
  'download_timestamp',
  'source_file',
  'crime_statistics',
  'summary',
  'parse_errors',
  'offense_type',
  'total_offense_types',
  'violent_crimes',
  'property_crimes',
  'violent_crime_count',
  'property_crime_count',
]);

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function migrateKey(
  key: string,
  referenceYear?: number | null,
  warnings?: string[]
): string {
  if (RESERVED_KEYS.has(key)) return key;
  return normalizeColumnName(key, referenceYear, warnings);
}

function referenceYearOf(data: JsonValue): number | null {
  if (data === null || typeof data !== 'object' || Array.isArray(data)) return null;
  const reportDate = data.report_date;
  if (typeof reportDate !== 'string') return null;
  const match = /^(\d{4})-\d{2}-\d{2}$/.exec(reportDate);
  return match ? Number(match[1]) : null;
}

function migrateValue(
  value: JsonValue,
  referenceYear: number | null,
  warnings?: string[]
): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => migrateValue(item, referenceYear, warnings));
  }
  if (value !== null && typeof value === 'object') {
    const migrated: { [key: string]: JsonValue } = {};
    for (const [key, child] of Object.entries(value)) {
      setField(
        migrated,
        migrateKey(key, referenceYear, warnings),
        migrateValue(child, referenceYear, warnings)
      );
    }
    return migrated;
  }
  return value;
}

export function migrateReportKeys(data: JsonValue, warnings?: string[]): JsonValue {
  return migrateValue(data, referenceYearOf(data), warnings);
}
