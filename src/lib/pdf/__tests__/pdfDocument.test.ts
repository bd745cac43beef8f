import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach } from 'vitest';

const pdfjs = vi.hoisted(() => ({ getDocument: vi.fn() }));

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => pdfjs);

import { pdfBytesSource, pdfFileSource } from '../pdfDocument';
import { parseReport } from '../../report/reportPipeline';

interface FakeItem {
  str: string;
  x: number;
  y: number;
}

function textContent(items: FakeItem[]) {
  return {
    items: [
      { type: 'beginMarkedContent' },
      ...items.map((i) => ({
        str: i.str,
        transform: [1, 0, 0, 1, i.x, i.y],
        width: i.str.length * 6,
        height: 12,
      })),
    ],
  };
}

const reportPage: FakeItem[] = [
  { str: 'Daily Crime Report', x: 200, y: 760 },
  { str: 'Monday, February 2, 2026', x: 200, y: 745 },
  { str: 'Offense', x: 50, y: 680 },
  { str: 'Monday 2/2', x: 200, y: 680 },
  { str: '7-Day Totals', x: 300, y: 680 },
  { str: 'Robbery', x: 50, y: 662 },
  { str: '4', x: 205, y: 662 },
  { str: '10', x: 305, y: 662 },
];

function fakePdf(pages: Array<FakeItem[] | Error>) {
  return {
    numPages: pages.length,
    getPage: vi.fn(async (n: number) => {
      const content = pages[n - 1];
      if (content instanceof Error) throw content;
      return { getTextContent: async () => textContent(content), cleanup: vi.fn() };
    }),
    destroy: vi.fn(async () => {}),
  };
}

function loadingTask(promise: Promise<unknown>) {
  return { promise, destroy: vi.fn(async () => {}) };
}

describe('pdfBytesSource', () => {
  beforeEach(() => {
    pdfjs.getDocument.mockReset();
  });

  it('turns PDF text into page text and raw tables', async () => {
    const pdf = fakePdf([reportPage]);
    pdfjs.getDocument.mockReturnValue(loadingTask(Promise.resolve(pdf)));

    const document = await pdfBytesSource(new Uint8Array([1, 2, 3]), 'report.pdf').open();

    expect(document.sourceFile).toBe('report.pdf');
    expect(document.pages).toEqual([
      {
        pageNumber: 1,
        text: 'Daily Crime Report\nMonday, February 2, 2026\nOffense Monday 2/2 7-Day Totals\nRobbery 4 10',
        tables: [
          [
            [null, null, null],
            ['Offense', 'Monday 2/2', '7-Day Totals'],
            ['Robbery', '4', '10'],
          ],
        ],
      },
    ]);
    await document.close();
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it('parses a PDF end to end and releases it', async () => {
    const pdf = fakePdf([reportPage]);
    pdfjs.getDocument.mockReturnValue(loadingTask(Promise.resolve(pdf)));

    const result = await parseReport(pdfBytesSource(new Uint8Array([1]), 'report.pdf'), {
      now: () => new Date('2026-02-03T11:00:00.000Z'),
    });

    expect(result.report_date).toBe('2026-02-02');
    expect(result.extracted_date_text).toBe('Monday, February 2, 2026');
    expect(result.crime_statistics).toEqual([
      { offense_type: 'Robbery', '2026-02-02': 4, seven_day_total: 10 },
    ]);
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it('reports unreadable pages as warnings', async () => {
    const pdf = fakePdf([reportPage, new Error('bad page')]);
    pdfjs.getDocument.mockReturnValue(loadingTask(Promise.resolve(pdf)));
    const onWarning = vi.fn();

    const document = await pdfBytesSource(new Uint8Array([1]), 'report.pdf', { onWarning }).open();

    expect(document.pages[1]).toEqual({ pageNumber: 2, text: '', tables: [] });
    expect(onWarning).toHaveBeenCalledWith('Could not extract text from page 2: bad page');
  });

  it('destroys the loading task when the PDF cannot be decoded', async () => {
    const task = loadingTask(Promise.reject(new Error('Invalid PDF structure.')));
    pdfjs.getDocument.mockReturnValue(task);

    await expect(pdfBytesSource(new Uint8Array([1]), 'bad.pdf').open()).rejects.toThrow(
      'PDF processing failed: Invalid PDF structure.'
    );
    expect(task.destroy).toHaveBeenCalledTimes(1);
  });

  it('explains password-protected files', async () => {
    pdfjs.getDocument.mockReturnValue(loadingTask(Promise.reject(new Error('No password given'))));

    await expect(pdfBytesSource(new Uint8Array([1]), 'locked.pdf').open()).rejects.toThrow(
      'This PDF appears to be password-protected. Please remove password protection and try again.'
    );
  });
});

describe('pdfFileSource', () => {
  it('reads the file and names the document after it', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'pdf-source-'));
    try {
      const file = path.join(dir, '20260202.pdf');
      await writeFile(file, Buffer.from('%PDF-1.4'));
      pdfjs.getDocument.mockReturnValue(loadingTask(Promise.resolve(fakePdf([reportPage]))));

      const document = await pdfFileSource(file).open();

      expect(document.sourceFile).toBe('20260202.pdf');
      expect(pdfjs.getDocument).toHaveBeenLastCalledWith(
        expect.objectContaining({ isEvalSupported: false })
      );
      await document.close();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
