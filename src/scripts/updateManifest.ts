import { getConfig } from '../lib/config';
import { createLogger } from '../lib/logger';
import { reportPaths, writeManifest } from '../lib/storage/reportFiles';

async function main() {
  const config = getConfig();
  const logger = createLogger({ level: config.LOG_LEVEL, name: 'update-manifest' });
  const { jsonDir } = reportPaths(config.DATA_DIR);

  const manifest = await writeManifest(jsonDir);
  if (manifest.count === 0) {
    logger.warn({ jsonDir }, 'No JSON files found');
    return;
  }
  logger.info({ count: manifest.count, latest: manifest.latest }, 'Updated manifest');
}

main().catch((err) => {
  console.error('Failed to update manifest:', err instanceof Error ? err.message : err);
  process.exit(1);
});
