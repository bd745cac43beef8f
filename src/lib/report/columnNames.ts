import { format, isExists } from 'date-fns';

export const PREV_SEVEN_DAY_TOTAL = 'prev_seven_day_total';
export const SEVEN_DAY_TOTAL = 'seven_day_total';
export const CHANGE = 'change';
export const PERCENT_CHANGE = 'percent_change';

const FIXED_COLUMNS = new Map<string, string>([
  ['7-day totals', SEVEN_DAY_TOTAL],
  ['+/-', CHANGE],
  ['% change', PERCENT_CHANGE],
]);

const WEEKDAY_DATE =
  /(?:Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday)\s+(\d{1,2})\/(\d{1,2})/i;
const YTD = /ytd\s+(\d{2})(?!\d)/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

interface ColumnContext {
  label: string;
  lower: string;
  referenceYear: number;
  warnings?: string[];
}

interface ColumnRule {
  name: string;
  apply: (ctx: ColumnContext) => string | null;
}

export const COLUMN_RULES: ColumnRule[] = [
  {
    name: 'weekday-date',
    apply: ({ label, referenceYear, warnings }) => {
      const match = WEEKDAY_DATE.exec(label);
      if (!match) return null;
      const month = Number(match[1]);
      const day = Number(match[2]);
      if (!isExists(referenceYear, month - 1, day)) {
        warnings?.push(`Invalid date in column name: ${label}`);
        return null;
      }
      return format(new Date(referenceYear, month - 1, day), 'yyyy-MM-dd');
    },
  },
  {
    name: 'rolling-window',
    apply: ({ lower }) => (lower.startsWith('prev. 7') ? PREV_SEVEN_DAY_TOTAL : null),
  },
  {
    name: 'year-to-date',
    apply: ({ lower }) => {
      const match = YTD.exec(lower);
      return match ? `ytd_20${match[1]}` : null;
    },
  },
  {
    name: 'fixed',
    apply: ({ lower }) => FIXED_COLUMNS.get(lower) ?? null,
  },
  {
    name: 'iso-date',
    apply: ({ label }) => (ISO_DATE.test(label.trim()) ? label.trim() : null),
  },
  {
    name: 'generic',
    apply: ({ lower }) =>
      lower.replace(/[^\w\s-]/g, '').replace(/[-\s]+/g, '_'),
  },
];

export function normalizeColumnName(
  rawLabel: string,
  referenceYear?: number | null,
  warnings?: string[]
): string {
  const label = rawLabel.replace(/\r?\n/g, ' ');
  const ctx: ColumnContext = {
    label,
    lower: label.toLowerCase().trim(),
    referenceYear: referenceYear ?? new Date().getFullYear(),
    warnings,
  };

  for (const rule of COLUMN_RULES) {
    const name = rule.apply(ctx);
    if (name !== null) return name;
  }
  return ctx.lower;
}
