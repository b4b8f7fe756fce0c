import { DEFAULT_ENDPOINTS, resolvePath, type EndpointCatalog } from '../endpoints';
import { DeleteError, FetchError, ListingError, UpsertError } from '../errors';
import { buildUrl, DatasetHttpClient, parseJson } from '../http/client';
import { probe, type ProbeExtraction } from '../http/probe';
import { logger } from '../logging';
import type { DatasetRecord, DeleteResult, JsonValue, UpsertResult } from '../types';

/**
 * Per-call options shared by the dataset resources
 */
export interface DatasetCallOptions {
  endpoints?: EndpointCatalog;
  timeoutMs?: number;
}

const IDENTIFIER_FIELDS = ['code', 'datasetCode', 'id', 'name'] as const;
const LIST_ENVELOPE_KEYS = ['items', 'values', 'datasets', 'data'] as const;

function isJsonObject(value: unknown): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwrap the list out of a listing response
 *
 * Accepts a bare array, `{items|values|datasets|data: [...]}` and a nested
 * `{value: ...}` envelope. Anything else is treated as a single entry so a
 * successful response is never dropped.
 */
export function normalizeListing(data: JsonValue): JsonValue[] {
  if (Array.isArray(data)) {
    return data;
  }

  if (isJsonObject(data)) {
    for (const key of LIST_ENVELOPE_KEYS) {
      const candidate = data[key];
      if (Array.isArray(candidate)) {
        return candidate;
      }
    }

    const envelope = data.value;
    if (envelope !== undefined && envelope !== null && typeof envelope === 'object') {
      return normalizeListing(envelope);
    }
  }

  return [data];
}

/**
 * Identifier of one listing entry: the first present identifier field (a null
 * value counts as present and becomes 'null'), otherwise a serialized form of
 * the entry itself
 */
export function deriveIdentifier(entry: JsonValue): string {
  if (typeof entry === 'string') {
    return entry;
  }

  if (isJsonObject(entry)) {
    for (const key of IDENTIFIER_FIELDS) {
      const value = entry[key];
      if (value === undefined) continue;
      return typeof value === 'string' ? value : JSON.stringify(value);
    }
  }

  return JSON.stringify(entry);
}

/**
 * List the dataset identifiers available on an environment, in listing order
 *
 * @throws {ListingError} When no candidate answers 200, or a 200 body is not JSON
 */
export async function listDatasetIdentifiers(
  client: DatasetHttpClient,
  token: string,
  baseUrl: string,
  options: DatasetCallOptions = {}
): Promise<string[]> {
  const endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;

  const outcome = await probe(client, {
    baseUrl,
    token,
    timeoutMs: options.timeoutMs,
    candidates: endpoints.list,
    extract: (exchange): ProbeExtraction<JsonValue[]> => {
      const data = parseJson(exchange.text);
      if (data === undefined) {
        return { kind: 'abort', reason: 'Dataset listing returned invalid JSON.' };
      }
      return { kind: 'accept', value: normalizeListing(data) };
    },
  });

  if (!outcome.ok) {
    throw new ListingError(
      outcome.aborted
        ? 'Dataset listing returned invalid JSON.'
        : 'Failed to fetch dataset codes from known endpoints.',
      outcome.attempts
    );
  }

  const identifiers = outcome.value.map(deriveIdentifier);
  logger.info('Listed datasets', { baseUrl, count: identifiers.length, endpoint: outcome.exchange.url });
  return identifiers;
}

/**
 * Pick the record fields out of a retrieval response, looking inside a `value`
 * envelope when there is one
 */
export function extractRecord(data: { [key: string]: JsonValue }, identifier: string): DatasetRecord {
  const source = isJsonObject(data.value) ? data.value : data;
  const record: DatasetRecord = {
    code: typeof source.code === 'string' && source.code.length > 0 ? source.code : identifier,
  };

  if (source.bodyMeta !== undefined) record.bodyMeta = source.bodyMeta;
  if (source.body !== undefined) record.body = source.body;
  if (source.inputs !== undefined) record.inputs = source.inputs;

  return record;
}

/**
 * Retrieve one dataset from an environment
 *
 * @throws {FetchError} Once every candidate endpoint has been tried
 */
export async function fetchDataset(
  client: DatasetHttpClient,
  token: string,
  baseUrl: string,
  identifier: string,
  options: DatasetCallOptions = {}
): Promise<DatasetRecord> {
  const endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;

  const outcome = await probe(client, {
    baseUrl,
    token,
    identifier,
    timeoutMs: options.timeoutMs,
    candidates: endpoints.fetch,
    extract: (exchange): ProbeExtraction<DatasetRecord> => {
      const data = parseJson(exchange.text);
      if (!isJsonObject(data)) {
        return { kind: 'skip', reason: 'response is not a JSON object' };
      }
      return { kind: 'accept', value: extractRecord(data, identifier) };
    },
  });

  if (!outcome.ok) {
    throw new FetchError(identifier, outcome.attempts);
  }

  logger.debug('Fetched dataset', { identifier, endpoint: outcome.exchange.url });
  return outcome.value;
}

/**
 * Create or update a dataset on an environment
 *
 * @throws {UpsertError} With one attempt record per rejected candidate
 */
export async function upsertDataset(
  client: DatasetHttpClient,
  token: string,
  baseUrl: string,
  identifier: string,
  record: DatasetRecord,
  options: DatasetCallOptions = {}
): Promise<UpsertResult> {
  const endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;

  const outcome = await probe(client, {
    baseUrl,
    token,
    identifier,
    body: record,
    timeoutMs: options.timeoutMs,
    candidates: endpoints.upsert,
    extract: (exchange): ProbeExtraction<JsonValue> => {
      const data = parseJson(exchange.text);
      return {
        kind: 'accept',
        value: data === undefined ? { statusText: exchange.text.trim() } : data,
      };
    },
  });

  if (!outcome.ok) {
    logger.warn('Upsert failed on every candidate', { identifier, attempts: outcome.attempts.length });
    throw new UpsertError(identifier, outcome.attempts);
  }

  logger.info('Upserted dataset', { identifier, endpoint: outcome.exchange.url, status: outcome.exchange.status });

  return {
    identifier,
    method: outcome.exchange.method,
    url: outcome.exchange.url,
    status: outcome.exchange.status,
    response: outcome.value,
  };
}

/**
 * Delete a dataset on an environment
 *
 * @throws {DeleteError} Unless the API answers 200 or 204
 */
export async function deleteDataset(
  client: DatasetHttpClient,
  token: string,
  baseUrl: string,
  identifier: string,
  options: DatasetCallOptions = {}
): Promise<DeleteResult> {
  const candidate = (options.endpoints ?? DEFAULT_ENDPOINTS).delete;
  const url = buildUrl(baseUrl, resolvePath(candidate.path, identifier));

  let status: number;
  let text: string;
  try {
    const exchange = await client.request(url, {
      method: candidate.method,
      token,
      timeoutMs: options.timeoutMs,
    });
    status = exchange.status;
    text = exchange.text;
  } catch (error) {
    throw new DeleteError(identifier, undefined, error instanceof Error ? error.message : String(error));
  }

  if (!candidate.accept.includes(status)) {
    throw new DeleteError(identifier, status, text);
  }

  logger.info('Deleted dataset', { identifier, url });
  return { status: 'deleted', code: identifier };
}
