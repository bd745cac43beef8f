import pino from 'pino';
import type { Level, LevelWithSilent, Logger, StreamEntry } from 'pino';
import type { PipelineOptions } from '../types/crimeReport';

export interface LoggerOptions {
  level?: LevelWithSilent;
  logFile?: string | null;
  name?: string;
}

/**
 * Logs to stdout, and to `logFile` as well when one is given.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const streamLevel: Level = level === 'silent' ? 'fatal' : level;
  const streams: StreamEntry[] = [{ level: streamLevel, stream: process.stdout }];
  if (options.logFile) {
    streams.push({
      level: streamLevel,
      stream: pino.destination({ dest: options.logFile, mkdir: true, sync: true }),
    });
  }

  return pino(
    {
      level,
      base: { service: options.name ?? 'crime-report-parser' },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}

export function createChildLogger(
  parent: Logger,
  context: Record<string, unknown>
): Logger {
  return parent.child(context);
}

export function pipelineCallbacks(
  logger: Logger
): Pick<PipelineOptions, 'onProgress' | 'onWarning' | 'onError'> {
  return {
    onProgress: (progress) => logger.debug({ stage: progress.stage }, progress.message),
    onWarning: (message) => logger.warn(message),
    onError: (message, stage) => logger.error({ stage }, message),
  };
}
