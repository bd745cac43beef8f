import { describe, it, expect } from 'vitest';
import { migrateKey, migrateReportKeys } from '../keyMigration';
import type { JsonValue } from '../keyMigration';

describe('migrateReportKeys', () => {
  it('rewrites column keys using the stored report year', () => {
    const stored = {
      report_date: '2025-12-29',
      source_file: 'crime_report_temp.pdf',
      crime_statistics: [{ offense_type: 'Robbery', 'Monday 12/29': 4, '7-Day Totals': 10, 'YTD 25': 300 }],
      summary: { violent_crime_count: 1, violent_crimes: ['robbery'] },
      parse_errors: [],
    };
    expect(migrateReportKeys(stored)).toEqual({
      report_date: '2025-12-29',
      source_file: 'crime_report_temp.pdf',
      crime_statistics: [{ offense_type: 'Robbery', '2025-12-29': 4, seven_day_total: 10, ytd_2025: 300 }],
      summary: { violent_crime_count: 1, violent_crimes: ['robbery'] },
      parse_errors: [],
    });
  });

  it('leaves already canonical reports unchanged', () => {
    const canonical = {
      report_date: '2026-02-02',
      crime_statistics: [{ offense_type: 'Theft', '2026-02-02': 1, prev_seven_day_total: 5, percent_change: -20 }],
    };
    expect(migrateReportKeys(canonical)).toEqual(canonical);
  });

  it('uses the current year when the report has no date', () => {
    const result = migrateReportKeys({ report_date: null, crime_statistics: [{ 'Monday 2/2': 1 }] });
    expect(result).toEqual({
      report_date: null,
      crime_statistics: [{ [`${new Date().getFullYear()}-02-02`]: 1 }],
    });
  });

  it('keeps a stored __proto__ key as data', () => {
    const stored: JsonValue = JSON.parse('{"rows":[{"__proto__":1,"Total":2}]}');
    expect(JSON.stringify(migrateReportKeys(stored))).toBe('{"rows":[{"__proto__":1,"total":2}]}');
  });

  it('collects warnings for impossible dates', () => {
    const warnings: string[] = [];
    migrateReportKeys({ report_date: '2026-02-02', rows: [{ 'Monday 2/30': 1 }] }, warnings);
    expect(warnings).toEqual(['Invalid date in column name: Monday 2/30']);
  });
});

describe('migrateKey', () => {
  it('keeps reserved keys', () => {
    expect(migrateKey('parse_errors')).toBe('parse_errors');
    expect(migrateKey('violent_crime_count')).toBe('violent_crime_count');
    expect(migrateKey('% Change')).toBe('percent_change');
  });
});
