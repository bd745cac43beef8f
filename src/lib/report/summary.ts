import type { CrimeReportSummary, NormalizedRecord } from '../../types/crimeReport';

export const VIOLENT_KEYWORDS = [
  'murder',
  'sex',
  'rape',
  'assault',
  'robbery',
  'shooting',
  'carjacking',
];

export function isViolentOffense(offenseType: string): boolean {
  const lower = offenseType.toLowerCase();
  return VIOLENT_KEYWORDS.some((kw) => lower.includes(kw));
}

export function computeSummary(records: readonly NormalizedRecord[]): CrimeReportSummary {
  const violent: string[] = [];
  const property: string[] = [];

  for (const record of records) {
    const offenseType = (record.offense_type ?? '').toLowerCase();
    if (isViolentOffense(offenseType)) {
      violent.push(offenseType);
    } else {
      property.push(offenseType);
    }
  }

  return {
    total_offense_types: records.length,
    violent_crimes: violent,
    property_crimes: property,
    violent_crime_count: violent.length,
    property_crime_count: property.length,
  };
}
