import type { CellValue } from '../../types/crimeReport';
import { PERCENT_CHANGE } from './columnNames';

const FLOAT = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;
const INTEGER = /^[-+]?\d+$/;

export function parsePercentChange(value: string): number | null {
  const numeric = value.replace(/[+%]/g, '').trim();
  if (!FLOAT.test(numeric)) return null;
  const parsed = Number(numeric);
  return Number.isFinite(parsed) ? parsed : null;
}

export function coerceCellValue(field: string, raw: string): CellValue {
  const value = raw.trim();

  if (field === PERCENT_CHANGE && value) {
    return parsePercentChange(value) ?? value;
  }

  if (INTEGER.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : value;
  }

  return value;
}
