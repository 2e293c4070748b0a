/**
 * Download the case pages listed in data/ids/*.jsonl
 * 
 * Usage:
 *   npm run download:docs
 *   npm run download:docs -- --concurrency 2
 */

import { loadConfigFromEnvironment } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { parseArgs, reportFatalError, runDownload } from './lib/pipelineTasks.js';

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const summary = await runDownload(config, parseArgs(process.argv.slice(2)));

  if (summary.failed > 0) {
    logger.warn({ ...summary }, `${summary.failed} documents failed to download`);
  }
}

main().catch((error) => {
  reportFatalError(error);
  process.exit(1);
});
