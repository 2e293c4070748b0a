/**
 * Download pending case pages, then parse everything on disk
 * 
 * Usage:
 *   npm run pipeline
 *   npm run pipeline -- --concurrency 2 --output ./out.jsonl
 */

import { loadConfigFromEnvironment } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { parseArgs, reportFatalError, runDownload, runParse } from './lib/pipelineTasks.js';

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const options = parseArgs(process.argv.slice(2));

  const downloads = await runDownload(config, options);
  const parsed = await runParse(config, options);

  logger.info({ downloads, parsed }, 'Pipeline completed');
}

main().catch((error) => {
  reportFatalError(error);
  process.exit(1);
});
