/**
 * Shared steps of the pipeline scripts
 */

import * as path from 'path';
import type { PipelineConfig } from '../../config/env.js';
import { DocumentDownloadService } from '../../services/download/DocumentDownloadService.js';
import type { DownloadSummary } from '../../services/download/types.js';
import { ParseDocsService, type ParseSummary } from '../../services/parsing/ParseDocsService.js';
import { toAppError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

export interface ScriptOptions {
  docsDir?: string;
  output?: string;
  concurrency?: number;
  progressEvery?: number;
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ScriptOptions {
  const options: ScriptOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--docs-dir' && i + 1 < args.length) {
      options.docsDir = args[++i];
    } else if (arg === '--output' && i + 1 < args.length) {
      options.output = args[++i];
    } else if (arg === '--concurrency' && i + 1 < args.length) {
      options.concurrency = parseInt(args[++i], 10);
    } else if (arg === '--progress-every' && i + 1 < args.length) {
      options.progressEvery = parseInt(args[++i], 10);
    }
  }

  return options;
}

export async function runDownload(config: PipelineConfig, options: ScriptOptions = {}): Promise<DownloadSummary> {
  const concurrency =
    options.concurrency !== undefined && Number.isInteger(options.concurrency) && options.concurrency > 0
      ? options.concurrency
      : config.download.concurrency;

  const service = new DocumentDownloadService({
    idsDir: config.idsDir,
    docsDir: config.docsDir,
    settings: { ...config.download, concurrency },
  });

  return service.downloadAll((idsFile, summary) => {
    logger.info({ idsFile: path.basename(idsFile), ...summary }, 'Processed ids file');
  });
}

export async function runParse(config: PipelineConfig, options: ScriptOptions = {}): Promise<ParseSummary> {
  const docsDir = options.docsDir ? path.resolve(options.docsDir) : path.join(config.docsDir, config.docsSubdir);
  const outputPath = options.output ? path.resolve(options.output) : config.parsedDocsPath;
  const progressEvery = options.progressEvery && options.progressEvery > 0 ? options.progressEvery : 100;

  const service = new ParseDocsService();
  return service.parseDirectory({
    docsDir,
    outputPath,
    relativeTo: options.docsDir ? docsDir : config.docsDir,
    onProgress: ({ processed, total, file }) => {
      if (processed % progressEvery === 0 || processed === total) {
        logger.info({ processed, total, file }, 'Parsing documents');
      }
    },
  });
}

/**
 * Log an error that ended a script run
 */
export function reportFatalError(error: unknown): void {
  const appError = toAppError(error, 'Script execution failed');
  logger.error(
    { code: appError.code, context: appError.context, error: appError.message, stack: appError.stack },
    'Script execution failed'
  );
}
