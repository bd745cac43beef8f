import type {
  DocumentSource,
  NormalizedRecord,
  ParseResult,
  PipelineOptions,
  PipelineProgress,
  PipelineStage,
  ReportDocument,
} from '../../types/crimeReport';
import { HEADER_TEXT_LENGTH, extractDateFromHeader, pickDateLine } from './headerDate';
import { buildTableRecords } from './tableRecords';
import { computeSummary } from './summary';

export const MISSING_DATE_ERROR = 'Could not extract report date';

function emit(options: PipelineOptions, progress: PipelineProgress) {
  options.onProgress?.(progress);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function parseReportDocument(
  document: ReportDocument,
  options: PipelineOptions = {}
): ParseResult {
  const now = options.now ?? (() => new Date());
  const errors: string[] = [];

  const recordError = (message: string, stage: PipelineStage) => {
    errors.push(message);
    options.onError?.(message, stage);
  };
  const flushWarnings = (warnings: string[]) => {
    for (const warning of warnings.splice(0)) options.onWarning?.(warning);
  };

  emit(options, {
    stage: 'START',
    message: `Document has ${document.pages.length} page(s)`,
    totalPages: document.pages.length,
  });

  const warnings: string[] = [];
  let reportDate: string | null = null;
  let extractedDateText: string | null = null;

  const firstPage = document.pages[0];
  if (firstPage) {
    const headerText = firstPage.text.slice(0, HEADER_TEXT_LENGTH);
    const match = extractDateFromHeader(headerText, warnings);
    flushWarnings(warnings);
    reportDate = match.date;
    extractedDateText = pickDateLine(headerText, match.matchedText);
  }

  if (reportDate) {
    emit(options, { stage: 'DATE_EXTRACTED', message: `Extracted report date: ${reportDate}` });
  } else {
    recordError(MISSING_DATE_ERROR, 'START');
    emit(options, { stage: 'DATE_EXTRACTED', message: 'Report date not found, using current year' });
  }

  const referenceYear = reportDate ? Number(reportDate.slice(0, 4)) : now().getFullYear();

  const records: NormalizedRecord[] = [];
  for (const page of document.pages) {
    page.tables.forEach((table, index) => {
      const tableNumber = index + 1;
      try {
        const tableRecords = buildTableRecords(table, referenceYear, warnings);
        records.push(...tableRecords);
      } catch (err) {
        recordError(
          `Error parsing table ${tableNumber} on page ${page.pageNumber}: ${describeError(err)}`,
          'DATE_EXTRACTED'
        );
      } finally {
        flushWarnings(warnings);
      }
    });
  }

  emit(options, {
    stage: 'TABLES_PROCESSED',
    message: `Extracted ${records.length} records`,
    totalPages: document.pages.length,
  });

  const summary = computeSummary(records);
  emit(options, {
    stage: 'SUMMARY_COMPUTED',
    message: `${summary.violent_crime_count} violent, ${summary.property_crime_count} property`,
  });

  const result: ParseResult = Object.freeze({
    report_date: reportDate,
    extracted_date_text: extractedDateText,
    download_timestamp: now().toISOString(),
    source_file: options.sourceFile ?? document.sourceFile,
    crime_statistics: records,
    summary,
    parse_errors: errors,
  });

  emit(options, { stage: 'DONE', message: `Parsed with ${errors.length} error(s)` });
  return result;
}

export async function parseReport(
  source: DocumentSource,
  options: PipelineOptions = {}
): Promise<ParseResult> {
  const document = await source.open();
  try {
    return parseReportDocument(document, options);
  } finally {
    await document.close();
  }
}
