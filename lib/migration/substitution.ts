/**
 * Text substitution engine
 * Rewrites every string leaf of a JSON value with an ordered list of literal find/replace rules
 */

import type {
  DatasetPayload,
  JsonValue,
  PayloadField,
  SubstitutionRule,
} from '../dataset-api/types';

/**
 * Apply the rules to one string, each rule on the previous rule's output
 * Rules with an empty `find` are skipped
 */
export function substituteText(text: string, rules: readonly SubstitutionRule[]): string {
  let result = text;
  for (const rule of rules) {
    if (rule.find.length === 0) continue;
    result = result.split(rule.find).join(rule.replace);
  }
  return result;
}

/**
 * Rebuild `value` with every string leaf rewritten
 * Object keys, numbers, booleans and null are left alone
 */
export function applySubstitutions(value: JsonValue, rules: readonly SubstitutionRule[]): JsonValue {
  if (typeof value === 'string') {
    return substituteText(value, rules);
  }

  if (Array.isArray(value)) {
    return value.map(entry => applySubstitutions(entry, rules));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]): [string, JsonValue] => [key, applySubstitutions(entry, rules)])
    );
  }

  return value;
}

function substituteField(field: PayloadField, rules: readonly SubstitutionRule[]): PayloadField {
  return field.encoding === 'encoded'
    ? { encoding: 'encoded', text: substituteText(field.text, rules) }
    : { encoding: 'decoded', value: applySubstitutions(field.value, rules) };
}

/**
 * Apply the rules to every string leaf of a payload; representations are kept
 */
export function substitutePayload(
  payload: DatasetPayload,
  rules: readonly SubstitutionRule[]
): DatasetPayload {
  const result: DatasetPayload = { code: substituteText(payload.code, rules) };
  if (payload.bodyMeta) result.bodyMeta = substituteField(payload.bodyMeta, rules);
  if (payload.body) result.body = substituteField(payload.body, rules);
  if (payload.inputs !== undefined) result.inputs = applySubstitutions(payload.inputs, rules);
  return result;
}
