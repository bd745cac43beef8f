import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { describe, it, expect } from 'vitest';
import { createChildLogger, createLogger, pipelineCallbacks } from '../logger';

function captureLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'debug' },
    { write: (msg: string) => lines.push(JSON.parse(msg)) }
  );
  return { logger, lines };
}

describe('pipelineCallbacks', () => {
  it('routes pipeline events to log levels', () => {
    const { logger, lines } = captureLogger();
    const callbacks = pipelineCallbacks(logger);

    callbacks.onProgress?.({ stage: 'START', message: 'Document has 1 page(s)' });
    callbacks.onWarning?.('Invalid date in column name: Monday 2/30');
    callbacks.onError?.('Could not extract report date', 'START');

    expect(lines.map((l) => [l.level, l.msg])).toEqual([
      [20, 'Document has 1 page(s)'],
      [40, 'Invalid date in column name: Monday 2/30'],
      [50, 'Could not extract report date'],
    ]);
    expect(lines[2].stage).toBe('START');
  });
});

describe('createChildLogger', () => {
  it('adds bindings to every line', () => {
    const { logger, lines } = captureLogger();
    createChildLogger(logger, { runAt: '2026-02-02T11:00:00.000Z' }).info('run');
    expect(lines[0].runAt).toBe('2026-02-02T11:00:00.000Z');
  });
});

describe('createLogger', () => {
  it('appends to the log file', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'logger-'));
    try {
      const logFile = path.join(dir, 'nested', 'crime_parser.log');
      const logger = createLogger({ level: 'warn', logFile, name: 'logger-test' });
      logger.info('not written');
      logger.warn('written');

      const [line, ...rest] = (await readFile(logFile, 'utf-8')).trim().split('\n');
      expect(rest).toEqual([]);
      expect(JSON.parse(line)).toMatchObject({
        level: 'warn',
        service: 'logger-test',
        msg: 'written',
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
