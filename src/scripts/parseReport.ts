import path from 'node:path';
import { parseArgs } from 'node:util';
import { getConfig } from '../lib/config';
import { createLogger, pipelineCallbacks } from '../lib/logger';
import { pdfFileSource } from '../lib/pdf';
import { jsonDocumentSource, parseReport } from '../lib/report';
import type { DocumentSource } from '../types/crimeReport';

async function main() {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: { debug: { type: 'boolean', default: false } },
  });

  const input = positionals[0];
  if (!input) {
    console.error('Usage: parseReport <file.pdf|file.json> [--debug]');
    process.exit(2);
  }

  const config = getConfig();
  // stdout carries the JSON result
  const logger = createLogger({
    level: values.debug ? 'debug' : 'silent',
    logFile: config.LOG_FILE,
    name: 'parse-report',
  });

  const source: DocumentSource =
    path.extname(input).toLowerCase() === '.json'
      ? jsonDocumentSource(input)
      : pdfFileSource(input, { onWarning: (m) => logger.warn(m) });

  const result = await parseReport(source, pipelineCallbacks(logger));
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

main().catch((err) => {
  console.error('Failed to parse report:', err instanceof Error ? err.message : err);
  process.exit(1);
});
