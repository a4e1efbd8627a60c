/**
 * Content fingerprints
 * SHA-256 over a canonical JSON rendering, so key order never changes a hash.
 */

import crypto from 'crypto';
import type { EntityFields, JsonValue } from './types.js';

export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key] ?? null)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Drop ignored fields and null values. A missing field and a null field
 * fingerprint the same.
 */
export function hashableFields(fields: EntityFields, ignoredFields: readonly string[] = []): EntityFields {
  const kept: EntityFields = {};
  for (const [name, value] of Object.entries(fields)) {
    if (value !== null && !ignoredFields.includes(name)) {
      kept[name] = value;
    }
  }
  return kept;
}

export function contentHash(fields: EntityFields, ignoredFields: readonly string[] = []): string {
  return crypto.createHash('sha256').update(canonicalJson(hashableFields(fields, ignoredFields))).digest('hex');
}

/**
 * State of a local record after an inbound change is applied: the change's
 * fields win, fields it does not carry are kept.
 */
export function mergeFields(local: EntityFields, incoming: EntityFields): EntityFields {
  return { ...local, ...incoming };
}
