import type { EnvironmentCredentials } from '../config';
import { DEFAULT_ENDPOINTS, type EndpointCandidate } from '../endpoints';
import { AuthenticationError } from '../errors';
import { DatasetHttpClient, parseJson } from '../http/client';
import { probe, type ProbeExtraction } from '../http/probe';
import { datasetLog } from '../logging';

const KNOWN_TOKEN_FIELDS = ['token', 'access_token', 'accessToken'] as const;
const MIN_HEURISTIC_TOKEN_LENGTH = 10;

export interface AuthenticateOptions {
  candidates?: readonly EndpointCandidate[];
  timeoutMs?: number;
}

/**
 * Depth-first search for the first string longer than the heuristic minimum
 */
function findLongString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.length > MIN_HEURISTIC_TOKEN_LENGTH ? value : undefined;
  }
  if (Array.isArray(value)) {
    for (const entry of value) {
      const found = findLongString(entry);
      if (found) return found;
    }
    return undefined;
  }
  if (typeof value === 'object' && value !== null) {
    for (const entry of Object.values(value)) {
      const found = findLongString(entry);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Pull a token out of an authentication response body
 *
 * The upstream response schema is not documented; these rules cover the shapes
 * deployments have been seen to return:
 * 1. a known field (`token`, `access_token`, `accessToken`)
 * 2. the first string value longer than 10 characters anywhere in the JSON
 * 3. a non-JSON body taken as the raw token text
 */
export function extractToken(responseText: string): string | undefined {
  const data = parseJson(responseText);

  if (data === undefined) {
    const raw = responseText.trim().replace(/^"+|"+$/g, '');
    return raw.length > 0 ? raw : undefined;
  }

  if (typeof data === 'string') {
    return data.trim().length > 0 ? data.trim() : undefined;
  }

  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    const fields = new Map<string, unknown>(Object.entries(data));
    for (const key of KNOWN_TOKEN_FIELDS) {
      const candidate = fields.get(key);
      if (typeof candidate === 'string' && candidate.length > 0) {
        return candidate;
      }
    }
    return findLongString(data);
  }

  return undefined;
}

/**
 * Exchange credentials for a bearer token
 *
 * @throws {AuthenticationError} Once every candidate endpoint has failed
 */
export async function authenticate(
  client: DatasetHttpClient,
  baseUrl: string,
  credentials: EnvironmentCredentials,
  options: AuthenticateOptions = {}
): Promise<string> {
  datasetLog('info', 'Authenticating', {
    baseUrl,
    username: credentials.username,
    clientName: credentials.clientName,
  });

  const outcome = await probe(client, {
    baseUrl,
    candidates: options.candidates ?? DEFAULT_ENDPOINTS.auth,
    timeoutMs: options.timeoutMs,
    body: {
      username: credentials.username,
      password: credentials.password,
      clientName: credentials.clientName,
    },
    extract: (exchange): ProbeExtraction<string> => {
      const token = extractToken(exchange.text);
      return token
        ? { kind: 'accept', value: token }
        : { kind: 'skip', reason: 'no token found in response' };
    },
  });

  if (outcome.ok) {
    datasetLog('info', 'Authenticated', { baseUrl, endpoint: outcome.exchange.url });
    return outcome.value;
  }

  const last = outcome.attempts[outcome.attempts.length - 1];
  const lastError = last ? `${last.status} ${last.detail}`.trim() : undefined;

  datasetLog('error', 'Authentication failed for all endpoints', { baseUrl, lastError });

  throw new AuthenticationError(
    'Authentication failed for all endpoints.',
    lastError,
    outcome.attempts
  );
}
