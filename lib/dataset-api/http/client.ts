import type { HttpMethod, JsonValue, TokenHeaderScheme } from '../types';
import {
  logApiRequest,
  logApiResponse,
  logApiError,
  generateCorrelationId,
} from '../logging';

/**
 * HTTP request options for the dataset API client
 */
export interface DatasetRequestOptions {
  method?: HttpMethod;
  body?: unknown;
  token?: string;
  timeoutMs?: number;
}

/**
 * Raw outcome of one HTTP exchange
 * Non-2xx statuses are returned, not thrown; callers decide what a status means
 */
export interface HttpExchange {
  url: string;
  method: HttpMethod;
  status: number;
  text: string;
}

export interface DatasetHttpClientOptions {
  tokenHeader?: TokenHeaderScheme;
  defaultTimeoutMs?: number;
}

/**
 * Build an absolute URL from an environment base and a path
 * Bare hosts are served over https
 */
export function buildUrl(baseUrl: string, path: string): string {
  const trimmed = baseUrl.trim().replace(/\/+$/, '');
  const origin = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return `${origin}${path}`;
}

/**
 * Parse a response body as JSON, or undefined when it is not JSON
 */
export function parseJson(text: string): JsonValue | undefined {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Dataset API HTTP Client
 *
 * One request at a time, each bounded by a timeout. Network failures and
 * timeouts are thrown; every HTTP status comes back as an exchange.
 */
export class DatasetHttpClient {
  private readonly tokenHeader: TokenHeaderScheme;
  private readonly defaultTimeoutMs: number;

  constructor(options: DatasetHttpClientOptions = {}) {
    this.tokenHeader = options.tokenHeader ?? { kind: 'bearer' };
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
  }

  /**
   * Headers carrying the token in the configured scheme
   */
  authHeaders(token: string): Record<string, string> {
    if (this.tokenHeader.kind === 'bearer') {
      return { Authorization: `Bearer ${token}` };
    }
    return { [this.tokenHeader.name]: token };
  }

  async request(url: string, options: DatasetRequestOptions = {}): Promise<HttpExchange> {
    const { method = 'GET', body, token, timeoutMs = this.defaultTimeoutMs } = options;
    const correlationId = generateCorrelationId();

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...(token ? this.authHeaders(token) : {}),
    };

    logApiRequest(method, url, correlationId);
    const startTime = Date.now();

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
      const text = await response.text();

      logApiResponse(method, url, response.status, correlationId, Date.now() - startTime);

      return { url, method, status: response.status, text };
    } catch (error) {
      logApiError(method, url, error, correlationId);
      throw error;
    }
  }
}
