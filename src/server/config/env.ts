/**
 * Pipeline Configuration
 * 
 * Builds the explicit configuration object handed to the download and parse
 * services at startup. Paths and tuning values come from environment
 * variables (optionally loaded from `.env`) with project defaults.
 */

// Environment parsing is manual: invalid numeric values fall back to defaults
import * as dotenv from 'dotenv';
import * as path from 'path';
import { ConfigurationError } from '../types/errors.js';
import type { RetryConfig } from '../utils/retry.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

/**
 * Browser-like request headers; the court database blocks obvious bots
 */
export const DEFAULT_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/88.0.4324.150 Safari/537.36',
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.9',
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept-Encoding': 'gzip, deflate, br',
  Referer: 'https://www.google.com/',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
  DNT: '1',
};

export interface DownloadSettings {
  concurrency: number;
  timeoutMs: number;
  retry: RetryConfig;
  headers: Record<string, string>;
}

export interface PipelineConfig {
  /** Root data directory */
  dataDir: string;
  /** Scraped result links, one `ids_from_<start>_to_<end>.jsonl` per month */
  idsDir: string;
  /** Downloaded HTML documents, mirrored by URL path */
  docsDir: string;
  /** Sub-directory of `docsDir` walked by the parser */
  docsSubdir: string;
  /** JSON Lines output of the parser */
  parsedDocsPath: string;
  download: DownloadSettings;
}

/**
 * Build the pipeline configuration from an environment map
 * 
 * @param env - Environment variables (defaults to process.env)
 * @param cwd - Directory relative data paths are resolved against
 * @throws ConfigurationError when a value is present but unusable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): PipelineConfig {
  const dataDir = path.resolve(cwd, env.NRWE_DATA_DIR || 'data');

  const concurrency = parseNumericEnv(env.NRWE_DOWNLOAD_CONCURRENCY, 4);
  if (concurrency < 1) {
    throw new ConfigurationError(
      `NRWE_DOWNLOAD_CONCURRENCY must be at least 1, got ${concurrency}`,
      { variable: 'NRWE_DOWNLOAD_CONCURRENCY', value: env.NRWE_DOWNLOAD_CONCURRENCY }
    );
  }

  const timeoutMs = parseNumericEnv(env.NRWE_REQUEST_TIMEOUT_MS, 60000);
  if (timeoutMs < 1) {
    throw new ConfigurationError(
      `NRWE_REQUEST_TIMEOUT_MS must be positive, got ${timeoutMs}`,
      { variable: 'NRWE_REQUEST_TIMEOUT_MS', value: env.NRWE_REQUEST_TIMEOUT_MS }
    );
  }

  return {
    dataDir,
    idsDir: path.join(dataDir, 'ids'),
    docsDir: path.join(dataDir, 'docs'),
    docsSubdir: env.NRWE_DOCS_SUBDIR || path.join('nrwe', 'olgs'),
    parsedDocsPath: path.join(dataDir, 'parsed_docs.jsonl'),
    download: {
      concurrency,
      timeoutMs,
      retry: {
        maxRetries: 4, // 5 attempts in total
        initialDelay: parseNumericEnv(env.NRWE_RETRY_INITIAL_DELAY_MS, 60000),
        maxDelay: 600000,
        multiplier: 2,
        jitter: true,
      },
      headers: { ...DEFAULT_REQUEST_HEADERS },
    },
  };
}

/**
 * Load `.env` (if present) and build the configuration from process.env
 */
export function loadConfigFromEnvironment(): PipelineConfig {
  dotenv.config();
  return loadConfig(process.env, process.cwd());
}
