/**
 * Dataset API types
 * Shapes shared by the HTTP layer, the resources and the migration pipeline
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Which environment a call targets
 */
export type EnvironmentRole = 'source' | 'destination';

/**
 * One deployment of the remote API
 * `authToken` stays undefined until authentication succeeds
 */
export interface Environment {
  baseUrl: string;
  authToken?: string;
}

/**
 * How the token is attached to requests: `Authorization: Bearer <token>`,
 * or the raw token in a deployment-specific header such as `X-KSYS-TOKEN`
 */
export type TokenHeaderScheme = { kind: 'bearer' } | { kind: 'header'; name: string };

/**
 * Dataset as it travels on the wire and sits on disk
 * `body`/`bodyMeta` are either native JSON or base64 text of UTF-8 JSON
 */
export interface DatasetRecord {
  code: string;
  bodyMeta?: JsonValue;
  body?: JsonValue;
  inputs?: JsonValue;
}

export type PayloadEncoding = 'decoded' | 'encoded';

/**
 * Explicit representation of a `body`/`bodyMeta` field
 */
export type PayloadField =
  | { encoding: 'decoded'; value: JsonValue }
  | { encoding: 'encoded'; text: string };

/**
 * Dataset inside the pipeline, with the representation of each payload field tagged
 */
export interface DatasetPayload {
  code: string;
  bodyMeta?: PayloadField;
  body?: PayloadField;
  inputs?: JsonValue;
}

/**
 * Ordered (find, replace) pair; an empty `find` is never applied
 */
export interface SubstitutionRule {
  find: string;
  replace: string;
}

/**
 * Result of a successful upsert
 */
export interface UpsertResult {
  identifier: string;
  method: HttpMethod;
  url: string;
  status: number;
  response: JsonValue;
}

/**
 * Result of a successful delete
 */
export interface DeleteResult {
  status: 'deleted';
  code: string;
}
