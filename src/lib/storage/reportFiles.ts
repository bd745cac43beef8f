import { constants } from 'node:fs';
import { access, copyFile, mkdir, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { format, isValid, parse } from 'date-fns';
import type { ParseResult } from '../../types/crimeReport';

export const MANIFEST_FILENAME = 'manifest.json';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface ReportPaths {
  jsonDir: string;
  pdfDir: string;
  csvDir: string;
}

export interface ReportManifest {
  files: string[];
  latest: string | null;
  count: number;
}

export function reportPaths(dataDir: string): ReportPaths {
  return {
    jsonDir: path.join(dataDir, 'json'),
    pdfDir: path.join(dataDir, 'pdf'),
    csvDir: path.join(dataDir, 'csv'),
  };
}

/** `YYYYMMDD` for the report date, or for `now` when the date is absent or malformed. */
export function dateFilename(
  reportDate: string | null | undefined,
  now: Date = new Date(),
  warnings?: string[]
): string {
  if (reportDate) {
    const parsed = parse(reportDate, 'yyyy-MM-dd', new Date(0));
    if (ISO_DATE.test(reportDate) && isValid(parsed)) {
      return format(parsed, 'yyyyMMdd');
    }
    warnings?.push(`Invalid date format: ${reportDate}, using today's date`);
  }
  return format(now, 'yyyyMMdd');
}

export async function saveReportJson(result: ParseResult, outputPath: string): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export async function archivePdf(fromPath: string, toPath: string): Promise<void> {
  if (await exists(toPath)) {
    throw new Error(`Archive file already exists: ${toPath}`);
  }
  await mkdir(path.dirname(toPath), { recursive: true });
  try {
    await rename(fromPath, toPath);
  } catch (err) {
    if (errorCode(err) !== 'EXDEV') throw err;
    await copyFile(fromPath, toPath, constants.COPYFILE_EXCL);
    await unlink(fromPath);
  }
}

export async function listReportJsonFiles(jsonDir: string): Promise<string[]> {
  const entries = await readdir(jsonDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith('.json') && e.name !== MANIFEST_FILENAME)
    .map((e) => e.name)
    .sort();
}

export async function buildManifest(jsonDir: string): Promise<ReportManifest> {
  const files = (await listReportJsonFiles(jsonDir)).reverse();
  return { files, latest: files[0] ?? null, count: files.length };
}

export async function writeManifest(jsonDir: string): Promise<ReportManifest> {
  const manifest = await buildManifest(jsonDir);
  await writeFile(
    path.join(jsonDir, MANIFEST_FILENAME),
    `${JSON.stringify(manifest, null, 2)}\n`,
    'utf-8'
  );
  return manifest;
}
