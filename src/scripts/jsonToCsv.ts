import { stat } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { getConfig } from '../lib/config';
import { convertAllJsonFiles, createCombinedCsv, jsonFileToCsv } from '../lib/export/csvExport';
import { createLogger } from '../lib/logger';
import { reportPaths } from '../lib/storage/reportFiles';

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function main(): Promise<number> {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      all: { type: 'boolean', default: false },
      combined: { type: 'boolean', default: false },
    },
  });

  const config = getConfig();
  const logger = createLogger({ level: config.LOG_LEVEL, name: 'json-to-csv' });
  const { jsonDir, csvDir } = reportPaths(config.DATA_DIR);

  const input = positionals[0];
  const inputPath = input ?? jsonDir;
  const inputIsDir = await isDirectory(inputPath);

  if (values.all || (inputIsDir && !input && !values.combined)) {
    const converted = await convertAllJsonFiles(inputPath, values.output ?? csvDir, logger);
    return converted > 0 ? 0 : 1;
  }

  if (values.combined) {
    const outputPath = values.output ?? path.join(csvDir, 'combined.csv');
    const ok = await createCombinedCsv(inputIsDir ? inputPath : jsonDir, outputPath, logger);
    return ok ? 0 : 1;
  }

  if (!inputIsDir) {
    const outputPath = values.output ?? path.join(csvDir, `${path.parse(inputPath).name}.csv`);
    try {
      return (await jsonFileToCsv(inputPath, outputPath, logger)) ? 0 : 1;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Conversion failed');
      return 1;
    }
  }

  logger.error({ inputPath }, 'Input path does not exist');
  return 1;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
