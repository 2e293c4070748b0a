/**
 * HTTP Client Configuration
 * 
 * Factory for configured axios instances with shared keep-alive agents and
 * a default timeout.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

export const DEFAULT_HTTP_TIMEOUT = 30000;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

/**
 * Create a configured axios instance with connection pooling and default settings
 * 
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  const client = axios.create({
    timeout: DEFAULT_HTTP_TIMEOUT,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = DEFAULT_HTTP_TIMEOUT;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        `HTTP request without explicit timeout, using ${DEFAULT_HTTP_TIMEOUT}ms`
      );
    }
    return requestConfig;
  });

  return client;
}
