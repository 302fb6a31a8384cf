import type { JsonObject, JsonValue } from './types/openapi.js';

/**
 * JSON.stringify with object keys sorted at every level
 */
export function stableStringify(value: JsonValue, options?: { space?: number }): string {
  return JSON.stringify(sortKeys(value), null, options?.space);
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }

  if (value !== null && typeof value === 'object') {
    const out: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(value[key]);
    }
    return out;
  }

  return value;
}

/**
 * Parse JSON text into a JsonValue; undefined when the text is not JSON
 */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function isJsonValue(value: unknown): value is JsonValue {
  return value === null
    || typeof value === 'string'
    || typeof value === 'number'
    || typeof value === 'boolean'
    || typeof value === 'object';
}
