import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { listReportJsonFiles } from '../storage/reportFiles';

export type FlatValue = string | number | boolean | null;
export type FlatRecord = Record<string, FlatValue>;

const storedReportSchema = z.object({
  report_date: z.string().nullable().optional(),
  extracted_date_text: z.string().nullable().optional(),
  crime_statistics: z.array(z.record(z.unknown())).default([]),
});

type StoredReport = z.infer<typeof storedReportSchema>;

const SINGLE_PRIORITY = ['report_date', 'offense_type'];
const COMBINED_PRIORITY = ['report_date', 'offense_type', 'source_file'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function listItemText(item: unknown): string {
  return typeof item === 'object' && item !== null ? JSON.stringify(item) : String(item);
}

export function flattenRecord(record: Record<string, unknown>, parentKey = ''): FlatRecord {
  const flat: FlatRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const flatKey = parentKey ? `${parentKey}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(flat, flattenRecord(value, flatKey));
    } else if (Array.isArray(value)) {
      flat[flatKey] = value.map(listItemText).join(', ');
    } else if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean' ||
      value === null
    ) {
      flat[flatKey] = value;
    } else {
      flat[flatKey] = null;
    }
  }
  return flat;
}

export function escapeCsv(value: FlatValue | undefined): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function csvColumns(rows: FlatRecord[], priority: string[]): string[] {
  const keys = new Set<string>();
  for (const row of rows) for (const key of Object.keys(row)) keys.add(key);
  const sorted = [...keys].sort();
  const front = priority.filter((k) => keys.has(k));
  return [...front, ...sorted.filter((k) => !front.includes(k))];
}

export function toCsv(rows: FlatRecord[], priority: string[] = SINGLE_PRIORITY): string {
  const columns = csvColumns(rows, priority);
  const lines = [
    columns.map((c) => escapeCsv(c)).join(','),
    ...rows.map((row) => columns.map((c) => escapeCsv(row[c])).join(',')),
  ];
  return `${lines.join('\n')}\n`;
}

export function reportRows(report: StoredReport, sourceFile?: string): FlatRecord[] {
  return report.crime_statistics.map((record) =>
    flattenRecord({
      report_date: report.report_date ?? null,
      extracted_date_text: report.extracted_date_text ?? null,
      ...(sourceFile !== undefined && { source_file: sourceFile }),
      ...record,
    })
  );
}

async function readStoredReport(jsonPath: string): Promise<StoredReport> {
  const raw: unknown = JSON.parse(await readFile(jsonPath, 'utf-8'));
  const parsed = storedReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid report file ${jsonPath}: ${parsed.error.issues[0]?.message ?? 'bad shape'}`);
  }
  return parsed.data;
}

async function writeCsv(outputPath: string, content: string): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, content, 'utf-8');
}

/** Returns false when the report holds no records. */
export async function jsonFileToCsv(
  jsonPath: string,
  csvPath: string,
  logger?: Logger
): Promise<boolean> {
  const rows = reportRows(await readStoredReport(jsonPath));
  if (rows.length === 0) {
    logger?.warn({ jsonPath }, 'No crime statistics found');
    return false;
  }
  await writeCsv(csvPath, toCsv(rows, SINGLE_PRIORITY));
  logger?.info({ csvPath, records: rows.length }, 'Converted report to CSV');
  return true;
}

export async function convertAllJsonFiles(
  jsonDir: string,
  csvDir: string,
  logger?: Logger
): Promise<number> {
  const files = await listReportJsonFiles(jsonDir);
  if (files.length === 0) {
    logger?.warn({ jsonDir }, 'No JSON files found');
    return 0;
  }

  let converted = 0;
  for (const file of files) {
    const csvPath = path.join(csvDir, `${path.parse(file).name}.csv`);
    try {
      if (await jsonFileToCsv(path.join(jsonDir, file), csvPath, logger)) converted++;
    } catch (err) {
      logger?.error({ file, err: err instanceof Error ? err.message : String(err) }, 'CSV conversion failed');
    }
  }
  logger?.info({ converted, total: files.length }, 'Converted JSON files');
  return converted;
}

export async function createCombinedCsv(
  jsonDir: string,
  outputPath: string,
  logger?: Logger
): Promise<boolean> {
  const files = await listReportJsonFiles(jsonDir);
  if (files.length === 0) {
    logger?.warn({ jsonDir }, 'No JSON files found');
    return false;
  }

  const rows: FlatRecord[] = [];
  for (const file of files) {
    rows.push(...reportRows(await readStoredReport(path.join(jsonDir, file)), file));
  }
  if (rows.length === 0) {
    logger?.warn('No crime statistics found in any JSON files');
    return false;
  }

  await writeCsv(outputPath, toCsv(rows, COMBINED_PRIORITY));
  logger?.info({ outputPath, records: rows.length, files: files.length }, 'Created combined CSV');
  return true;
}
