import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { getConfig } from '../lib/config';
import { createLogger } from '../lib/logger';
import { migrateReportKeys } from '../lib/report';
import type { JsonValue } from '../lib/report';

async function main() {
  const { positionals } = parseArgs({ allowPositionals: true, options: {} });
  const input = positionals[0];
  if (!input) {
    console.error('Usage: migrateJsonKeys <file.json>');
    process.exit(2);
  }

  const config = getConfig();
  const logger = createLogger({ level: config.LOG_LEVEL, name: 'migrate-json-keys' });

  const data: JsonValue = JSON.parse(await readFile(input, 'utf-8'));
  const warnings: string[] = [];
  const migrated = migrateReportKeys(data, warnings);
  for (const warning of warnings) logger.warn(warning);

  await writeFile(input, `${JSON.stringify(migrated, null, 2)}\n`, 'utf-8');
  logger.info({ input }, 'Updated keys');
}

main().catch((err) => {
  console.error('Failed to migrate keys:', err instanceof Error ? err.message : err);
  process.exit(1);
});
