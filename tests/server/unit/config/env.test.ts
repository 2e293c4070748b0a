import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { DEFAULT_REQUEST_HEADERS, loadConfig } from '../../../../src/server/config/env.js';
import { ConfigurationError, ErrorCode } from '../../../../src/server/types/errors.js';

const CWD = path.resolve('/srv/nrwe');

describe('loadConfig', () => {
  it('derives every path from the data directory', () => {
    const config = loadConfig({}, CWD);

    expect(config.dataDir).toBe(path.join(CWD, 'data'));
    expect(config.idsDir).toBe(path.join(CWD, 'data', 'ids'));
    expect(config.docsDir).toBe(path.join(CWD, 'data', 'docs'));
    expect(config.docsSubdir).toBe(path.join('nrwe', 'olgs'));
    expect(config.parsedDocsPath).toBe(path.join(CWD, 'data', 'parsed_docs.jsonl'));
  });

  it('uses the download defaults', () => {
    const { download } = loadConfig({}, CWD);

    expect(download.concurrency).toBe(4);
    expect(download.timeoutMs).toBe(60000);
    expect(download.retry).toEqual({
      maxRetries: 4,
      initialDelay: 60000,
      maxDelay: 600000,
      multiplier: 2,
      jitter: true,
    });
    expect(download.headers).toEqual(DEFAULT_REQUEST_HEADERS);
    expect(download.headers).not.toBe(DEFAULT_REQUEST_HEADERS);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        NRWE_DATA_DIR: '/var/lib/nrwe',
        NRWE_DOCS_SUBDIR: 'nrwe/lgs',
        NRWE_DOWNLOAD_CONCURRENCY: '8',
        NRWE_REQUEST_TIMEOUT_MS: '5000',
        NRWE_RETRY_INITIAL_DELAY_MS: '250',
      },
      CWD
    );

    expect(config.dataDir).toBe(path.resolve('/var/lib/nrwe'));
    expect(config.docsSubdir).toBe('nrwe/lgs');
    expect(config.download.concurrency).toBe(8);
    expect(config.download.timeoutMs).toBe(5000);
    expect(config.download.retry.initialDelay).toBe(250);
  });

  it('falls back to defaults for non-numeric values', () => {
    const config = loadConfig({ NRWE_DOWNLOAD_CONCURRENCY: 'many', NRWE_REQUEST_TIMEOUT_MS: '' }, CWD);

    expect(config.download.concurrency).toBe(4);
    expect(config.download.timeoutMs).toBe(60000);
  });

  it('rejects a concurrency below one', () => {
    expect(() => loadConfig({ NRWE_DOWNLOAD_CONCURRENCY: '0' }, CWD)).toThrow(ConfigurationError);
  });

  it('rejects a non-positive timeout', () => {
    try {
      loadConfig({ NRWE_REQUEST_TIMEOUT_MS: '-1' }, CWD);
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(ErrorCode.CONFIGURATION_ERROR);
        expect(error.context).toEqual({ variable: 'NRWE_REQUEST_TIMEOUT_MS', value: '-1' });
      }
    }
  });
});
