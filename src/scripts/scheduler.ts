import cron from 'node-cron';
import { dailyRunCron, getConfig } from '../lib/config';
import { runDailyReportJob } from '../lib/jobs/dailyReportJob';
import { createChildLogger, createLogger } from '../lib/logger';

const config = getConfig();
const logger = createLogger({ level: config.LOG_LEVEL, logFile: config.LOG_FILE, name: 'scheduler' });

const cronExpression = dailyRunCron(config);
if (!cron.validate(cronExpression)) {
  throw new Error(`Invalid cron expression: ${cronExpression}`);
}

let running = false;

async function runJob() {
  if (running) {
    logger.warn('Previous run still in progress, skipping');
    return;
  }
  running = true;
  const jobLogger = createChildLogger(logger, { runAt: new Date().toISOString() });
  try {
    await runDailyReportJob(config, jobLogger);
  } catch (err) {
    jobLogger.error({ err: err instanceof Error ? err.message : String(err) }, 'Scheduled run failed');
  } finally {
    running = false;
  }
}

const task = cron.schedule(
  cronExpression,
  () => {
    void runJob();
  },
  { timezone: config.TIMEZONE }
);

logger.info(
  { cronExpression, timezone: config.TIMEZONE, runTime: config.DAILY_RUN_TIME },
  'Scheduler started'
);

function shutdown(signal: string) {
  logger.info({ signal }, 'Scheduler stopping');
  task.stop();
  process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
