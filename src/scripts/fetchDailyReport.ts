import { parseArgs } from 'node:util';
import { getConfig } from '../lib/config';
import { runDailyReportJob } from '../lib/jobs/dailyReportJob';
import { createLogger } from '../lib/logger';

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      url: { type: 'string' },
      date: { type: 'string' },
      debug: { type: 'boolean', default: false },
    },
  });

  const config = getConfig();
  const logger = createLogger({
    level: values.debug ? 'debug' : config.LOG_LEVEL,
    logFile: config.LOG_FILE,
    name: 'fetch-daily-report',
  });

  logger.info('Starting daily crime report download and parse');
  try {
    await runDailyReportJob(config, logger, { url: values.url, dateOverride: values.date });
    logger.info('Process completed successfully');
    return 0;
  } catch (err) {
    logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Daily report failed');
    return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
