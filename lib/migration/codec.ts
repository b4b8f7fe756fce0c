/**
 * Payload codec
 * Converts `body`/`bodyMeta` between native JSON and base64-of-JSON transport text
 */

import type {
  DatasetPayload,
  DatasetRecord,
  JsonValue,
  PayloadField,
} from '../dataset-api/types';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict base64 check: standard alphabet, padded to a multiple of four
 */
export function isBase64(text: string): boolean {
  return text.length % 4 === 0 && BASE64_PATTERN.test(text);
}

/**
 * Compact JSON, UTF-8, base64. Key order is kept as inserted.
 */
export function encode(value: JsonValue): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64');
}

/**
 * Inverse of `encode`. Never throws:
 * - text that is not base64 comes back unchanged
 * - decoded bytes that are not JSON come back as text, invalid UTF-8 replaced
 */
export function decode(text: string): JsonValue {
  if (!isBase64(text)) {
    return text;
  }

  const decoded = Buffer.from(text, 'base64').toString('utf8');
  try {
    return JSON.parse(decoded);
  } catch {
    return decoded;
  }
}

/**
 * Decode an encoded field; text that is not base64 stays encoded as it was
 */
export function decodeField(field: PayloadField): PayloadField {
  if (field.encoding === 'decoded') {
    return field;
  }
  const value = decode(field.text);
  if (value === field.text) {
    return field;
  }
  return { encoding: 'decoded', value };
}

/**
 * Encode a decoded structured value; encoded fields and plain strings are returned as is
 */
export function encodeField(field: PayloadField): PayloadField {
  if (field.encoding === 'encoded' || typeof field.value === 'string') {
    return field;
  }
  return { encoding: 'encoded', text: encode(field.value) };
}

function mapFields(
  payload: DatasetPayload,
  transform: (field: PayloadField) => PayloadField
): DatasetPayload {
  const result: DatasetPayload = { ...payload };
  if (payload.bodyMeta) result.bodyMeta = transform(payload.bodyMeta);
  if (payload.body) result.body = transform(payload.body);
  return result;
}

export function decodePayload(payload: DatasetPayload): DatasetPayload {
  return mapFields(payload, decodeField);
}

export function encodePayload(payload: DatasetPayload): DatasetPayload {
  return mapFields(payload, encodeField);
}

/**
 * Tag a field as it arrives from the API: text is transport-encoded, anything
 * else is already native JSON. This is the only place the runtime type decides
 * the representation; from here on the tag travels with the field.
 */
export function fieldFromWire(value: JsonValue): PayloadField {
  return typeof value === 'string'
    ? { encoding: 'encoded', text: value }
    : { encoding: 'decoded', value };
}

export function fieldToWire(field: PayloadField): JsonValue {
  return field.encoding === 'encoded' ? field.text : field.value;
}

export function payloadFromWire(record: DatasetRecord): DatasetPayload {
  const payload: DatasetPayload = { code: record.code };
  if (record.bodyMeta !== undefined) payload.bodyMeta = fieldFromWire(record.bodyMeta);
  if (record.body !== undefined) payload.body = fieldFromWire(record.body);
  if (record.inputs !== undefined) payload.inputs = record.inputs;
  return payload;
}

export function payloadToWire(payload: DatasetPayload): DatasetRecord {
  const record: DatasetRecord = { code: payload.code };
  if (payload.bodyMeta) record.bodyMeta = fieldToWire(payload.bodyMeta);
  if (payload.body) record.body = fieldToWire(payload.body);
  if (payload.inputs !== undefined) record.inputs = payload.inputs;
  return record;
}
