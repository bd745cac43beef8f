import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy, TextItem } from 'pdfjs-dist/types/src/display/api';
import type { PositionedTextItem } from '../../types/crimeReport';
import { clusterByY, linesToPageText } from './layout';

export interface PdfPageText {
  pageNumber: number;
  text: string;
  items: PositionedTextItem[];
}

export interface PdfTextResult {
  pageCount: number;
  pages: PdfPageText[];
  warnings: string[];
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function openPdf(data: Uint8Array): Promise<PDFDocumentProxy> {
  const loadingTask = getDocument({ data, isEvalSupported: false });
  try {
    return await loadingTask.promise;
  } catch (err) {
    await loadingTask.destroy();
    const msg = describeError(err);
    if (/password|encrypted/i.test(msg)) {
      throw new Error(
        'This PDF appears to be password-protected. Please remove password protection and try again.'
      );
    }
    throw new Error(`PDF processing failed: ${msg}`);
  }
}

function toPositionedItem(item: TextItem, page: number): PositionedTextItem {
  return {
    str: item.str,
    x: item.transform[4] ?? 0,
    y: item.transform[5] ?? 0,
    width: item.width,
    height: item.height,
    page,
  };
}

export async function extractPageItems(
  pdf: PDFDocumentProxy,
  pageNumber: number
): Promise<PositionedTextItem[]> {
  const page = await pdf.getPage(pageNumber);
  try {
    const content = await page.getTextContent();
    const items: PositionedTextItem[] = [];
    for (const item of content.items) {
      if (!('str' in item) || !item.str) continue;
      items.push(toPositionedItem(item, pageNumber));
    }
    return items;
  } finally {
    page.cleanup();
  }
}

export async function extractPdfText(pdf: PDFDocumentProxy): Promise<PdfTextResult> {
  const warnings: string[] = [];
  const pages: PdfPageText[] = [];

  for (let i = 1; i <= pdf.numPages; i++) {
    try {
      const items = await extractPageItems(pdf, i);
      pages.push({ pageNumber: i, text: linesToPageText(clusterByY(items, i)), items });
    } catch (err) {
      warnings.push(`Could not extract text from page ${i}: ${describeError(err)}`);
      pages.push({ pageNumber: i, text: '', items: [] });
    }
  }

  if (pages.every((p) => p.text.trim().length === 0)) {
    warnings.push('No text could be extracted. This PDF may be image-based (scanned).');
  }

  return { pageCount: pdf.numPages, pages, warnings };
}
