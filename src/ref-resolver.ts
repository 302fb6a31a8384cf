/**
 * `$ref` resolution and schema expansion
 *
 * A missing, cyclic or too deep reference resolves to an empty object and
 * never throws. Results are cached per resolver instance by the exact
 * reference string.
 */

import { MAX_REF_DEPTH, ORIGINAL_REF_KEY, REF_PREFIX } from './constants.js';
import { getObject, getString, isJsonObject, type JsonObject, type JsonValue, type Spec } from './types/openapi.js';

/**
 * Last segment of a reference: `#/components/schemas/Pet` -> `Pet`
 */
export function refName(ref: string): string {
  const segments = ref.split('/');
  return segments[segments.length - 1] ?? '';
}

export class SchemaResolver {
  private cache = new Map<string, JsonObject>();

  constructor(private readonly spec: Spec) {}

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  resolve(ref: string, depth = 0): JsonObject {
    // Nothing is cached for this short-circuit; only real lookups are.
    if (depth > MAX_REF_DEPTH) return {};

    const cached = this.cache.get(ref);
    if (cached) return cached;

    if (ref.startsWith(REF_PREFIX.PARAMETERS)) {
      const components = getObject(this.spec.raw, 'components');
      const parameters = components ? getObject(components, 'parameters') : undefined;
      const parameter = parameters ? getObject(parameters, refName(ref)) : undefined;
      return this.remember(ref, parameter ?? {});
    }

    if (ref.startsWith(REF_PREFIX.SCHEMAS)) {
      const schema = getObject(this.spec.schemas, refName(ref)) ?? {};
      const alias = getString(schema, '$ref');
      if (alias !== undefined) {
        return this.remember(ref, this.resolve(alias, depth + 1));
      }
      return this.remember(ref, schema);
    }

    if (ref.startsWith('#')) {
      let current: JsonValue = this.spec.raw;
      for (const segment of ref.split('/').slice(1)) {
        if (isJsonObject(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
          current = current[segment];
        } else {
          break;
        }
      }

      if (current !== this.spec.raw) {
        return this.remember(ref, isJsonObject(current) ? current : {});
      }
    }

    return this.remember(ref, {});
  }

  /**
   * Expand every `$ref` under `node`, returning new containers.
   *
   * A reference node becomes the resolved target overlaid with its sibling
   * keys (siblings win) plus an `x-original-ref` marker, and is then
   * processed again one level deeper. Unresolvable references are kept as-is.
   */
  processSchema(node: JsonObject, depth = 0): JsonObject {
    if (depth > MAX_REF_DEPTH) return node;

    const ref = getString(node, '$ref');
    if (ref !== undefined) {
      const resolved = this.resolve(ref);
      if (Object.keys(resolved).length > 0) {
        const { $ref: _ignored, ...siblings } = node;
        const merged: JsonObject = { ...resolved, ...siblings, [ORIGINAL_REF_KEY]: ref };
        return this.processSchema(merged, depth + 1);
      }
    }

    const processed: JsonObject = {};
    for (const [key, value] of Object.entries(node)) {
      processed[key] = this.processValue(value, depth + 1);
    }
    return processed;
  }

  /**
   * Follow a `$ref` on a parameter, request body or response object. The
   * node's own keys win over the referenced ones; a node whose reference
   * does not resolve is returned unchanged.
   */
  dereference(node: JsonValue | undefined): JsonObject | undefined {
    if (!isJsonObject(node)) return undefined;

    const ref = getString(node, '$ref');
    if (ref === undefined) return node;

    const resolved = this.resolve(ref);
    if (Object.keys(resolved).length === 0) return node;

    const { $ref: _ignored, ...siblings } = node;
    return { ...resolved, ...siblings };
  }

  private processValue(value: JsonValue, depth: number): JsonValue {
    if (isJsonObject(value)) return this.processSchema(value, depth);
    if (!Array.isArray(value)) return value;
    if (depth > MAX_REF_DEPTH) return value;
    return value.map(item => this.processValue(item, depth + 1));
  }

  private remember(ref: string, resolved: JsonObject): JsonObject {
    this.cache.set(ref, resolved);
    return resolved;
  }
}
