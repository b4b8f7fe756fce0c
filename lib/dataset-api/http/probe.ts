import type { EndpointCandidate } from '../endpoints';
import { resolvePath } from '../endpoints';
import type { ProbeAttempt } from '../errors';
import { logger } from '../logging';
import { buildUrl, DatasetHttpClient, type HttpExchange } from './client';

const SNIPPET_LENGTH = 200;

/**
 * What a candidate's accepted response turned out to be
 * - accept: use this value and stop probing
 * - skip: the shape did not fit, try the next candidate
 * - abort: the response is definitive and unusable, stop probing
 */
export type ProbeExtraction<T> =
  | { kind: 'accept'; value: T }
  | { kind: 'skip'; reason: string }
  | { kind: 'abort'; reason: string };

export interface ProbeRequest<T> {
  baseUrl: string;
  candidates: readonly EndpointCandidate[];
  identifier?: string;
  body?: unknown;
  token?: string;
  timeoutMs?: number;
  extract: (exchange: HttpExchange) => ProbeExtraction<T>;
}

export type ProbeOutcome<T> =
  | { ok: true; value: T; exchange: HttpExchange; attempts: ProbeAttempt[] }
  | { ok: false; aborted: boolean; attempts: ProbeAttempt[] };

export function snippet(text: string): string {
  return text.slice(0, SNIPPET_LENGTH);
}

/**
 * Try each candidate in order until one yields a usable response
 *
 * This is endpoint-shape discovery, not retrying: each candidate is sent
 * exactly once and a rejected candidate is never repeated.
 */
export async function probe<T>(
  client: DatasetHttpClient,
  request: ProbeRequest<T>
): Promise<ProbeOutcome<T>> {
  const attempts: ProbeAttempt[] = [];

  for (const candidate of request.candidates) {
    const url = buildUrl(request.baseUrl, resolvePath(candidate.path, request.identifier));

    let exchange: HttpExchange;
    try {
      exchange = await client.request(url, {
        method: candidate.method,
        body: request.body,
        token: request.token,
        timeoutMs: request.timeoutMs,
      });
    } catch (error) {
      attempts.push({
        method: candidate.method,
        url,
        status: 'error',
        detail: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    if (!candidate.accept.includes(exchange.status)) {
      attempts.push({ method: candidate.method, url, status: exchange.status, detail: snippet(exchange.text) });
      continue;
    }

    const extraction = request.extract(exchange);
    if (extraction.kind === 'accept') {
      attempts.push({ method: candidate.method, url, status: exchange.status, detail: '' });
      return { ok: true, value: extraction.value, exchange, attempts };
    }

    attempts.push({ method: candidate.method, url, status: exchange.status, detail: extraction.reason });
    if (extraction.kind === 'abort') {
      return { ok: false, aborted: true, attempts };
    }

    logger.debug('Candidate endpoint response not usable', { url, reason: extraction.reason });
  }

  return { ok: false, aborted: false, attempts };
}
