import { format, isValid, parse } from 'date-fns';

export const HEADER_TEXT_LENGTH = 500;

const WEEKDAYS = [
  'sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday',
];

interface DateRule {
  name: string;
  pattern: RegExp;
  toDate: (captured: string) => Date | null;
}

export interface HeaderDateMatch {
  date: string | null;
  matchedText: string | null;
  rule: string | null;
}

const REFERENCE_DATE = new Date(2000, 0, 1);

// date-fns knows "Sep" but not the four-letter "Sept".
const MONTH_ALIASES: [RegExp, string][] = [[/\bsept\b/i, 'Sep']];

function parseWithFormats(text: string, formats: string[]): Date | null {
  let cleaned = text.replace(/\s+/g, ' ').trim();
  for (const [alias, month] of MONTH_ALIASES) cleaned = cleaned.replace(alias, month);
  for (const fmt of formats) {
    const parsed = parse(cleaned, fmt, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

function isWeekdayName(word: string): boolean {
  const lower = word.trim().toLowerCase();
  if (lower.length < 3) return false;
  return WEEKDAYS.some((d) => d === lower || d.slice(0, 3) === lower);
}

const MONTH_DAY_YEAR = ['MMMM d, yyyy', 'MMMM dd, yyyy'];
const NUMERIC_DATE = ['MM/dd/yyyy'];

function padNumericDate(text: string): string {
  return text.replace(/\b(\d)\b/g, '0$1');
}

export const DATE_RULES: DateRule[] = [
  {
    name: 'weekday-month-day-year',
    pattern: /(\w+,\s+\w+\s+\d{1,2},\s+\d{4})/i,
    toDate: (captured) => {
      const comma = captured.indexOf(',');
      if (!isWeekdayName(captured.slice(0, comma))) return null;
      return parseWithFormats(captured.slice(comma + 1), MONTH_DAY_YEAR);
    },
  },
  {
    name: 'month-day-year',
    pattern: /(\w+\s+\d{1,2},\s+\d{4})/i,
    toDate: (captured) => parseWithFormats(captured, MONTH_DAY_YEAR),
  },
  {
    name: 'numeric',
    pattern: /(\d{1,2}\/\d{1,2}\/\d{4})/i,
    toDate: (captured) => parseWithFormats(padNumericDate(captured), NUMERIC_DATE),
  },
  {
    name: 'labeled-numeric',
    pattern: /Date:\s*(\d{1,2}\/\d{1,2}\/\d{4})/i,
    toDate: (captured) => parseWithFormats(padNumericDate(captured), NUMERIC_DATE),
  },
];

export function extractDateFromHeader(
  text: string,
  warnings?: string[]
): HeaderDateMatch {
  for (const rule of DATE_RULES) {
    const match = rule.pattern.exec(text);
    if (!match) continue;

    const captured = match[1];
    const parsed = rule.toDate(captured);
    if (!parsed) {
      warnings?.push(`Failed to parse date '${captured}'`);
      continue;
    }

    return {
      date: format(parsed, 'yyyy-MM-dd'),
      matchedText: captured,
      rule: rule.name,
    };
  }

  return { date: null, matchedText: null, rule: null };
}

// Which line is kept is layout-dependent: prefer the line holding the date.
export function pickDateLine(
  headerText: string,
  matchedText: string | null
): string | null {
  const lines = headerText.split('\n');
  if (matchedText) {
    const line = lines.find((l) => l.includes(matchedText));
    if (line !== undefined) return line.trim();
  }
  return lines.length > 2 ? lines[2].trim() : null;
}
