/**
 * Parse downloaded case pages into JSON Lines
 * 
 * Usage:
 *   npm run parse:docs
 *   npm run parse:docs -- --docs-dir ./data/docs/nrwe/olgs --output ./out.jsonl
 *   npm run parse:docs -- --progress-every 500
 */

import { loadConfigFromEnvironment } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { parseArgs, reportFatalError, runParse } from './lib/pipelineTasks.js';

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const summary = await runParse(config, parseArgs(process.argv.slice(2)));

  if (summary.failed > 0) {
    logger.warn({ ...summary }, `${summary.failed} documents could not be parsed`);
  }
}

main().catch((error) => {
  reportFatalError(error);
  process.exit(1);
});
