import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { DocumentSource, ReportDocument } from '../../types/crimeReport';
import { extractPdfText, openPdf } from './extractPdfText';
import { reconstructTables } from './tableRecon';

export interface PdfSourceOptions {
  onWarning?: (message: string) => void;
}

export function pdfBytesSource(
  data: Uint8Array,
  sourceFile: string,
  options: PdfSourceOptions = {}
): DocumentSource {
  return {
    open: async (): Promise<ReportDocument> => {
      const pdf = await openPdf(data);
      try {
        const extracted = await extractPdfText(pdf);
        for (const warning of extracted.warnings) options.onWarning?.(warning);
        return {
          sourceFile,
          pages: extracted.pages.map((page) => ({
            pageNumber: page.pageNumber,
            text: page.text,
            tables: reconstructTables(page.items, page.pageNumber).map((t) => t.rows),
          })),
          close: () => pdf.destroy(),
        };
      } catch (err) {
        await pdf.destroy();
        throw err;
      }
    },
  };
}

export function pdfFileSource(filePath: string, options: PdfSourceOptions = {}): DocumentSource {
  return {
    open: async () => {
      const data = new Uint8Array(await readFile(filePath));
      return pdfBytesSource(data, path.basename(filePath), options).open();
    },
  };
}
