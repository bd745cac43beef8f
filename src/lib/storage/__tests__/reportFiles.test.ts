import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  archivePdf,
  buildManifest,
  dateFilename,
  reportPaths,
  saveReportJson,
  writeManifest,
} from '../reportFiles';
import type { ParseResult } from '../../../types/crimeReport';

const result: ParseResult = {
  report_date: '2026-02-02',
  extracted_date_text: 'Monday, February 2, 2026',
  download_timestamp: '2026-02-03T11:00:00.000Z',
  source_file: 'crime_report_temp.pdf',
  crime_statistics: [{ offense_type: 'Robbery', '2026-02-02': 4 }],
  summary: {
    total_offense_types: 1,
    violent_crimes: ['robbery'],
    property_crimes: [],
    violent_crime_count: 1,
    property_crime_count: 0,
  },
  parse_errors: [],
};

describe('dateFilename', () => {
  it('formats report dates', () => {
    expect(dateFilename('2026-02-08')).toBe('20260208');
  });

  it('uses the clock when the date is missing or malformed', () => {
    const now = new Date(2026, 1, 9, 6, 0);
    const warnings: string[] = [];
    expect(dateFilename(null, now, warnings)).toBe('20260209');
    expect(dateFilename('2026-02-30', now, warnings)).toBe('20260209');
    expect(dateFilename('02/08/2026', now, warnings)).toBe('20260209');
    expect(warnings).toEqual([
      "Invalid date format: 2026-02-30, using today's date",
      "Invalid date format: 02/08/2026, using today's date",
    ]);
  });
});

describe('report files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'report-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lays out data directories', () => {
    expect(reportPaths(dir)).toEqual({
      jsonDir: path.join(dir, 'json'),
      pdfDir: path.join(dir, 'pdf'),
      csvDir: path.join(dir, 'csv'),
    });
  });

  it('saves pretty-printed JSON', async () => {
    const file = path.join(dir, 'json', '20260202.json');
    await saveReportJson(result, file);
    const content = await readFile(file, 'utf-8');
    expect(content).toBe(`${JSON.stringify(result, null, 2)}\n`);
    expect(content.split('\n')[1]).toBe('  "report_date": "2026-02-02",');
  });

  it('moves PDFs into the archive without overwriting', async () => {
    const temp = path.join(dir, 'crime_report_temp.pdf');
    const archived = path.join(dir, 'pdf', '20260202.pdf');
    await writeFile(temp, '%PDF-1.4 first');
    await archivePdf(temp, archived);

    expect(await readFile(archived, 'utf-8')).toBe('%PDF-1.4 first');
    await expect(access(temp)).rejects.toThrow();

    await writeFile(temp, '%PDF-1.4 second');
    await expect(archivePdf(temp, archived)).rejects.toThrow(`Archive file already exists: ${archived}`);
    expect(await readFile(archived, 'utf-8')).toBe('%PDF-1.4 first');
  });

  it('lists report files newest first', async () => {
    for (const name of ['20260201.json', '20260203.json', '20260202.json', 'manifest.json', 'notes.txt']) {
      await writeFile(path.join(dir, name), '{}');
    }
    const expected = {
      files: ['20260203.json', '20260202.json', '20260201.json'],
      latest: '20260203.json',
      count: 3,
    };
    expect(await buildManifest(dir)).toEqual(expected);

    await writeManifest(dir);
    expect(JSON.parse(await readFile(path.join(dir, 'manifest.json'), 'utf-8'))).toEqual(expected);
  });

  it('writes an empty manifest for an empty directory', async () => {
    expect(await writeManifest(dir)).toEqual({ files: [], latest: null, count: 0 });
  });
});
