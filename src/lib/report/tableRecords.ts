import type { NormalizedRecord, RawCell, RawTable } from '../../types/crimeReport';
import { normalizeColumnName } from './columnNames';
import { coerceCellValue } from './cellValues';

const TITLE_ROWS = 1;

function isBlank(cell: RawCell): boolean {
  return cell === null || cell.trim() === '';
}

/** Own-property write; a `__proto__` column stays a field instead of reaching the prototype setter. */
export function setField(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function normalizeHeaderRow(
  header: RawCell[],
  referenceYear?: number | null,
  warnings?: string[]
): string[] {
  return header.map((cell) => {
    if (cell === null || cell.trim() === '') return '';
    const cleaned = cell.replace(/\r?\n/g, ' ').trim();
    return normalizeColumnName(cleaned, referenceYear, warnings);
  });
}

export function buildRecord(
  row: RawCell[],
  columns: string[]
): NormalizedRecord | null {
  if (row.length === 0 || row.every(isBlank)) return null;

  const offenseType = row[0];
  if (offenseType === null || offenseType.trim() === '') return null;

  const record: NormalizedRecord = { offense_type: offenseType.trim() };

  for (let i = 1; i < row.length && i < columns.length; i++) {
    const column = columns[i];
    const cell = row[i];
    if (!column || column === 'offense_type' || cell === null) continue;
    setField(record, column, coerceCellValue(column, cell));
  }

  return record;
}

export function buildTableRecords(
  table: RawTable,
  referenceYear?: number | null,
  warnings?: string[]
): NormalizedRecord[] {
  if (table.length < 2) return [];

  const columns = normalizeHeaderRow(table[TITLE_ROWS], referenceYear, warnings);

  const records: NormalizedRecord[] = [];
  for (const row of table.slice(TITLE_ROWS + 1)) {
    const record = buildRecord(row, columns);
    if (record) records.push(record);
  }
  return records;
}
