// =============================================================================
// RAMPART — JSON snapshots
//
// Entities become plain JSON objects for audit before/after columns and for
// event hashing. Dates serialize as ISO strings; undefined fields drop out.
// =============================================================================

import type { JsonObject, JsonValue } from '../types/audit';

function toJson(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'object':
      if (Array.isArray(value)) return value.map((item) => toJson(item) ?? null);
      return snapshot(value);
    default:
      return undefined;
  }
}

export function snapshot(entity: object): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(entity)) {
    const json = toJson(value);
    if (json !== undefined) out[key] = json;
  }
  return out;
}

/** JSON text with object keys sorted at every depth */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  const keys = Object.keys(value).sort();
  return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(',')}}`;
}
