/**
 * Collects the named component schemas an operation depends on
 *
 * A schema name is added to the result before its body is walked, so each
 * name is visited once and cyclic schema graphs terminate.
 */

import { REF_PREFIX } from './constants.js';
import { refName, type SchemaResolver } from './ref-resolver.js';
import { getArray, getObject, getString, isJsonObject, type Endpoint, type JsonValue } from './types/openapi.js';

const COMBINATORS = ['allOf', 'anyOf', 'oneOf'] as const;
const HANDLED_KEYS = new Set<string>(['$ref', ...COMBINATORS, 'properties', 'items', 'additionalProperties']);

export class SchemaCollector {
  constructor(private readonly resolver: SchemaResolver) {}

  /**
   * Schema names reachable from parameters, request body and responses,
   * in discovery order
   */
  collect(endpoint: Endpoint): Set<string> {
    const collected = new Set<string>();
    const { operation } = endpoint;

    for (const parameter of getArray(operation, 'parameters') ?? []) {
      this.walk(parameter, collected);
    }

    if (operation.requestBody !== undefined) {
      this.walk(operation.requestBody, collected);
    }

    for (const response of Object.values(getObject(operation, 'responses') ?? {})) {
      this.walk(response, collected);
    }

    return collected;
  }

  private walk(node: JsonValue, collected: Set<string>): void {
    if (Array.isArray(node)) {
      for (const item of node) {
        this.walk(item, collected);
      }
      return;
    }

    if (!isJsonObject(node)) return;

    const ref = getString(node, '$ref');
    if (ref !== undefined && ref.startsWith(REF_PREFIX.SCHEMAS)) {
      const name = refName(ref);
      if (!collected.has(name)) {
        collected.add(name);
        const body = this.resolver.resolve(ref);
        if (Object.keys(body).length > 0) {
          this.walk(body, collected);
        }
      }
    }

    for (const combinator of COMBINATORS) {
      for (const branch of getArray(node, combinator) ?? []) {
        this.walk(branch, collected);
      }
    }

    for (const property of Object.values(getObject(node, 'properties') ?? {})) {
      this.walk(property, collected);
    }

    if (node.items !== undefined) {
      this.walk(node.items, collected);
    }

    const additional = getObject(node, 'additionalProperties');
    if (additional) {
      this.walk(additional, collected);
    }

    for (const [key, value] of Object.entries(node)) {
      if (HANDLED_KEYS.has(key)) continue;
      this.walk(value, collected);
    }
  }
}
