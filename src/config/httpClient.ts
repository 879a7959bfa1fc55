/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling, a factory for
 * configured axios instances, and the `HttpFetcher` seam the source adapters
 * fetch through. Every request carries a timeout; responses and transport
 * failures are classified into the fetch error taxonomy.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';
import {
  NotFoundError,
  RateLimitedError,
  TransientFetchError,
  UpstreamRequestError,
  systemErrorCode,
} from '../types/errors.js';

// Default timeout for page and API fetches
export const HTTP_TIMEOUTS = {
  STANDARD: 30000,
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 16,
  maxFreeSockets: 4,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 16,
  maxFreeSockets: 4,
});

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // Enforce a timeout on every request, even when a caller passed 0
  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    return requestConfig;
  });

  return client;
}

/**
 * Close HTTP agents and free up connections
 */
export function closeHttpAgents(): void {
  httpAgent.destroy();
  httpsAgent.destroy();
  logger.debug('HTTP agents destroyed');
}

export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: string;
}

/**
 * Minimal HTTP capability the adapters depend on
 *
 * `get` resolves for every HTTP status; it rejects only when no response was
 * received (network failure, timeout).
 */
export interface HttpFetcher {
  get(url: string, headers?: Record<string, string>): Promise<HttpResponse>;
}

export interface AxiosHttpFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  /** Extra axios configuration (e.g. a custom adapter) */
  axiosConfig?: AxiosRequestConfig;
}

function normalizeHeaders(headers: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!headers || typeof headers !== 'object') {
    return result;
  }
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[name.toLowerCase()] = value;
    } else if (typeof value === 'number') {
      result[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.map(String).join(', ');
    }
  }
  return result;
}

/**
 * HttpFetcher backed by axios
 */
export class AxiosHttpFetcher implements HttpFetcher {
  private readonly client: AxiosInstance;
  private readonly userAgent?: string;

  constructor(options: AxiosHttpFetcherOptions = {}) {
    this.userAgent = options.userAgent;
    this.client = createHttpClient({
      timeout: options.timeoutMs ?? HTTP_TIMEOUTS.STANDARD,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...options.axiosConfig,
    });
  }

  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    const requestHeaders: Record<string, string> = { ...headers };
    if (this.userAgent && !requestHeaders['User-Agent']) {
      requestHeaders['User-Agent'] = this.userAgent;
    }

    try {
      const response = await this.client.get<unknown>(url, { headers: requestHeaders });
      const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw classifyTransportError(url, error);
    }
  }
}

/**
 * Map a failure without an HTTP response to TransientFetchError
 */
export function classifyTransportError(url: string, error: unknown): TransientFetchError {
  const code = systemErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  const timedOut =
    code === 'ECONNABORTED' || code === 'ETIMEDOUT' || /timeout/i.test(message);

  if (timedOut) {
    logger.warn({ url, code }, 'HTTP request timed out');
    return new TransientFetchError(`Request to ${url} timed out`, undefined, { url, code });
  }
  return new TransientFetchError(`Request to ${url} failed: ${message}`, undefined, { url, code });
}

/**
 * Seconds to wait before retrying, from Retry-After or X-RateLimit-Reset
 */
export function parseRetryAfter(headers: Record<string, string>, now: number = Date.now()): number | undefined {
  const retryAfter = headers['retry-after'];
  if (retryAfter) {
    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds) && seconds >= 0 && /^\d+$/.test(retryAfter.trim())) {
      return seconds;
    }
    const date = Date.parse(retryAfter);
    if (!isNaN(date)) {
      return Math.max(0, Math.ceil((date - now) / 1000));
    }
  }

  const reset = headers['x-ratelimit-reset'];
  if (reset) {
    const resetEpoch = parseInt(reset, 10);
    if (!isNaN(resetEpoch)) {
      return Math.max(0, resetEpoch - Math.floor(now / 1000));
    }
  }

  return undefined;
}

/**
 * Classify a non-2xx response
 *
 * @param resource - What was requested, used in NotFoundError messages (e.g. "GitHub release")
 * @param identifier - Identifier of the resource
 */
export function classifyHttpResponse(
  url: string,
  response: HttpResponse,
  resource: string,
  identifier: string
): Error | null {
  const { status, headers } = response;

  if (status >= 200 && status < 300) {
    return null;
  }

  if (status === 404) {
    return new NotFoundError(resource, identifier, { url });
  }

  const rateLimitExhausted = headers['x-ratelimit-remaining'] === '0';
  if (status === 429 || (status === 403 && (rateLimitExhausted || headers['retry-after'] !== undefined))) {
    const retryAfterSeconds = parseRetryAfter(headers);
    return new RateLimitedError(`Rate limited by ${new URL(url).host} (HTTP ${status})`, retryAfterSeconds, { url });
  }

  if (status >= 500 || status === 408) {
    return new TransientFetchError(`HTTP ${status} from ${url}`, status, { url });
  }

  return new UpstreamRequestError(`HTTP ${status} from ${url}`, status, { url });
}

/**
 * GET a resource and throw the classified error for anything but 2xx
 */
export async function fetchClassified(
  fetcher: HttpFetcher,
  url: string,
  resource: string,
  identifier: string,
  headers?: Record<string, string>
): Promise<HttpResponse> {
  const response = await fetcher.get(url, headers);
  const error = classifyHttpResponse(url, response, resource, identifier);
  if (error) {
    throw error;
  }
  return response;
}
