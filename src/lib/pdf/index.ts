export { extractPdfText, extractPageItems, openPdf } from './extractPdfText';
export type { PdfPageText, PdfTextResult } from './extractPdfText';
export {
  clusterByY,
  clusterByX,
  computeYTolerance,
  computeXGapTolerance,
  linesToTableRows,
  linesToPageText,
  assignCellsToColumns,
} from './layout';
export { reconstructTables, isHeaderRow } from './tableRecon';
export { pdfBytesSource, pdfFileSource } from './pdfDocument';
export type { PdfSourceOptions } from './pdfDocument';
