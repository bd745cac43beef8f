import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Logger } from 'pino';
import type { AppConfig } from '../config';
import { downloadReport } from '../download/fetchReport';
import { pipelineCallbacks } from '../logger';
import { pdfBytesSource } from '../pdf/pdfDocument';
import { parseReport } from '../report/reportPipeline';
import {
  archivePdf,
  dateFilename,
  reportPaths,
  saveReportJson,
  writeManifest,
} from '../storage/reportFiles';
import type { ReportManifest } from '../storage/reportFiles';
import type { ParseResult } from '../../types/crimeReport';

export const TEMP_PDF_NAME = 'crime_report_temp.pdf';

export type ReportParser = (
  data: Uint8Array,
  sourceFile: string,
  logger: Logger
) => Promise<ParseResult>;

export interface DailyReportJobOptions {
  url?: string;
  dateOverride?: string;
  now?: () => Date;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  parse?: ReportParser;
}

export interface DailyReportJobResult {
  result: ParseResult;
  jsonPath: string;
  pdfPath: string | null;
  manifest: ReportManifest;
}

const parsePdfBytes: ReportParser = (data, sourceFile, logger) =>
  parseReport(
    pdfBytesSource(data, sourceFile, { onWarning: (m) => logger.warn(m) }),
    pipelineCallbacks(logger)
  );

/**
 * Download, parse, store JSON, archive the PDF and refresh the manifest.
 */
export async function runDailyReportJob(
  config: AppConfig,
  logger: Logger,
  options: DailyReportJobOptions = {}
): Promise<DailyReportJobResult> {
  const now = options.now ?? (() => new Date());
  const url = options.url ?? config.REPORT_URL;
  const parse = options.parse ?? parsePdfBytes;
  const paths = reportPaths(config.DATA_DIR);

  logger.info({ url }, 'Step 1: downloading report');
  const download = await downloadReport(url, {
    maxRetries: config.MAX_RETRIES,
    retryDelayMs: config.RETRY_DELAY_SECONDS * 1000,
    timeoutMs: config.REQUEST_TIMEOUT_SECONDS * 1000,
    userAgent: config.USER_AGENT,
    logger,
    fetchImpl: options.fetchImpl,
    sleep: options.sleep,
  });

  const tempDir = await mkdtemp(path.join(os.tmpdir(), 'crime-report-'));
  const tempPdf = path.join(tempDir, TEMP_PDF_NAME);
  try {
    await writeFile(tempPdf, download.data);

    logger.info('Step 2: parsing report');
    const result = await parse(download.data.slice(), TEMP_PDF_NAME, logger);

    const warnings: string[] = [];
    const reportDate = options.dateOverride ?? result.report_date;
    const baseName = dateFilename(reportDate, now(), warnings);
    for (const warning of warnings) logger.warn(warning);
    logger.info({ reportDate, baseName }, 'Report date resolved');

    const jsonPath = path.join(paths.jsonDir, `${baseName}.json`);
    logger.info({ jsonPath }, 'Step 3: saving JSON');
    await saveReportJson(result, jsonPath);

    let pdfPath: string | null = path.join(paths.pdfDir, `${baseName}.pdf`);
    logger.info({ pdfPath }, 'Step 4: archiving PDF');
    try {
      await archivePdf(tempPdf, pdfPath);
    } catch (err) {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Failed to archive PDF');
      pdfPath = null;
    }

    const manifest = await writeManifest(paths.jsonDir);

    logger.info(
      {
        reportDate: result.report_date ?? 'Unknown',
        records: result.crime_statistics.length,
        violentCrimes: result.summary.violent_crime_count,
        propertyCrimes: result.summary.property_crime_count,
        parseErrors: result.parse_errors.length,
        jsonPath,
        pdfPath,
        manifestCount: manifest.count,
      },
      'Daily report processed'
    );

    return { result, jsonPath, pdfPath, manifest };
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
}
