/**
 * Document Download Service
 * 
 * Downloads the case pages listed in the scraped ids files. Each page is
 * stored under the docs directory at its URL path; pages already on disk
 * are left alone. Requests run through a fixed-size concurrency limit and
 * are retried with exponential backoff on transient failures.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import type { AxiosInstance } from 'axios';
import { createHttpClient } from '../../config/httpClient.js';
import type { DownloadSettings } from '../../config/env.js';
import { DownloadError } from '../../types/errors.js';
import { logger as defaultLogger, type ParserLogger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { settleWithConcurrency } from '../../utils/concurrency.js';
import { ResultItemSchema, type DownloadStatus, type DownloadSummary } from './types.js';

export const IDS_FILE_PATTERN = '*ids_from_*_to_*.jsonl';

export interface DocumentDownloadServiceOptions {
  idsDir: string;
  docsDir: string;
  settings: DownloadSettings;
  httpClient?: AxiosInstance;
  logger?: ParserLogger;
}

export class DocumentDownloadService {
  private readonly idsDir: string;
  private readonly docsDir: string;
  private readonly settings: DownloadSettings;
  private readonly httpClient: AxiosInstance;
  private readonly logger: ParserLogger;

  constructor(options: DocumentDownloadServiceOptions) {
    this.idsDir = options.idsDir;
    this.docsDir = options.docsDir;
    this.settings = options.settings;
    this.logger = options.logger ?? defaultLogger;
    this.httpClient = options.httpClient ?? createHttpClient({
      timeout: options.settings.timeoutMs,
      headers: options.settings.headers,
    });
  }

  /**
   * Validate a scraped link. Only absolute http(s) URLs to an `.html` path
   * without query or fragment are accepted.
   */
  parseDocumentUrl(href: string): URL | null {
    if (!href) {
      return null;
    }

    let url: URL;
    try {
      url = new URL(href);
    } catch (error) {
      this.logger.error(
        { href, error: error instanceof Error ? error.message : String(error) },
        `Failed to parse URL: ${href}`
      );
      return null;
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      this.logger.error({ href }, `Invalid scheme: ${href}`);
      return null;
    }

    if (!url.pathname.endsWith('.html')) {
      this.logger.error({ href }, `URL is not a HTML document: ${href}`);
      return null;
    }

    if (url.search || url.hash) {
      this.logger.error({ href }, `URL contains query parameters or fragments: ${href}`);
      return null;
    }

    return url;
  }

  /**
   * Read every link of one ids file; malformed lines are logged and skipped
   */
  async readLinks(idsFile: string): Promise<URL[]> {
    const content = await fs.readFile(idsFile, 'utf-8');
    const urls: URL[] = [];

    for (const line of content.trim().split('\n')) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        this.logger.error({ idsFile, line }, 'Skipping malformed JSON line');
        continue;
      }

      const item = ResultItemSchema.safeParse(parsed);
      if (!item.success) {
        this.logger.error({ idsFile, issues: item.error.issues }, 'Skipping invalid result item');
        continue;
      }

      const url = this.parseDocumentUrl(item.data.href);
      if (url) {
        urls.push(url);
      }
    }

    return urls;
  }

  /**
   * Local path a URL is stored at
   */
  outputPathFor(url: URL): string {
    const relative = decodeURIComponent(url.pathname).replace(/^\/+/, '');
    const resolved = path.resolve(this.docsDir, relative);
    if (!resolved.startsWith(path.resolve(this.docsDir) + path.sep)) {
      throw new DownloadError(url.toString(), 'URL path escapes the documents directory');
    }
    return resolved;
  }

  /**
   * Download one document unless it is already on disk
   */
  async download(url: URL): Promise<DownloadStatus> {
    const outputFile = this.outputPathFor(url);

    if (await fileExists(outputFile)) {
      return 'skipped';
    }

    const response = await retryWithBackoff(
      () => this.httpClient.get<ArrayBuffer>(url.toString(), {
        responseType: 'arraybuffer',
        maxRedirects: 0,
      }),
      this.settings.retry,
      url.toString()
    );

    const contentType = String(response.headers['content-type'] ?? '').toLowerCase().trim();
    if (!contentType.startsWith('text/html')) {
      this.logger.error({ url: url.toString(), contentType }, `URL is not a html doc: ${url.toString()}`);
      return 'not_html';
    }

    await fs.mkdir(path.dirname(outputFile), { recursive: true });
    await fs.writeFile(outputFile, Buffer.from(response.data));
    return 'downloaded';
  }

  /**
   * Download the documents of every ids file
   */
  async downloadAll(onFileDone?: (idsFile: string, summary: DownloadSummary) => void): Promise<DownloadSummary> {
    const idsFiles = (await glob(IDS_FILE_PATTERN, { cwd: this.idsDir, absolute: true, nodir: true })).sort();
    const total: DownloadSummary = { downloaded: 0, skipped: 0, notHtml: 0, failed: 0 };

    this.logger.info(
      { idsDir: this.idsDir, files: idsFiles.length, concurrency: this.settings.concurrency },
      'Starting document download'
    );

    for (const idsFile of idsFiles) {
      const urls = await this.readLinks(idsFile);
      const results = await settleWithConcurrency(urls, this.settings.concurrency, url => this.download(url));
      const summary = tally(results);

      results.forEach((result, i) => {
        if (result.status === 'rejected') {
          const reason: unknown = result.reason;
          this.logger.error(
            { url: urls[i].toString(), error: reason instanceof Error ? reason.message : String(reason) },
            'Failed to download document'
          );
        }
      });

      total.downloaded += summary.downloaded;
      total.skipped += summary.skipped;
      total.notHtml += summary.notHtml;
      total.failed += summary.failed;
      onFileDone?.(idsFile, summary);
    }

    this.logger.info({ ...total }, 'Document download completed');
    return total;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function tally(results: PromiseSettledResult<DownloadStatus>[]): DownloadSummary {
  const summary: DownloadSummary = { downloaded: 0, skipped: 0, notHtml: 0, failed: 0 };
  for (const result of results) {
    if (result.status === 'rejected') {
      summary.failed++;
    } else if (result.value === 'downloaded') {
      summary.downloaded++;
    } else if (result.value === 'skipped') {
      summary.skipped++;
    } else {
      summary.notHtml++;
    }
  }
  return summary;
}
