/**
 * Spec, Endpoint and EndpointFilter value objects
 */

import { DEFAULT_TAG } from './constants.js';
import {
  getArray,
  getObject,
  isJsonObject,
  type Endpoint,
  type JsonObject,
  type SecurityRequirement,
  type Spec,
} from './types/openapi.js';

export function createSpec(raw: JsonObject): Spec {
  const components = getObject(raw, 'components');
  return Object.freeze({
    raw,
    paths: getObject(raw, 'paths') ?? {},
    schemas: (components && getObject(components, 'schemas')) ?? {},
    info: getObject(raw, 'info') ?? {},
  });
}

/**
 * Tags declared on an operation, or the default tag when the key is absent.
 * An explicit empty list stays empty.
 */
export function operationTags(operation: JsonObject): string[] {
  const tags = operation.tags;
  if (!Array.isArray(tags)) return [DEFAULT_TAG];
  return tags.filter((tag): tag is string => typeof tag === 'string');
}

export function createEndpoint(path: string, method: string, operation: JsonObject): Endpoint {
  return Object.freeze({
    path,
    method: method.toUpperCase(),
    operation,
    tags: Object.freeze(operationTags(operation)),
  });
}

export function endpointLabel(endpoint: Endpoint): string {
  return `${endpoint.method} ${endpoint.path}`;
}

function stripTrailingSlash(path: string): string {
  return path.replace(/\/+$/, '');
}

/**
 * Set of (method, path) pairs; membership ignores method case and tolerates
 * a trailing slash on either the stored or the queried path.
 */
export class EndpointFilter {
  private readonly keys: ReadonlySet<string>;

  constructor(endpoints: Iterable<readonly [string, string]>) {
    const keys = new Set<string>();
    for (const [method, path] of endpoints) {
      keys.add(EndpointFilter.key(method.toUpperCase(), path));
    }
    this.keys = keys;
  }

  get size(): number {
    return this.keys.size;
  }

  matches(method: string, path: string): boolean {
    const normalizedMethod = method.toUpperCase();
    const normalizedPath = stripTrailingSlash(path);

    return this.keys.has(EndpointFilter.key(normalizedMethod, normalizedPath))
      || this.keys.has(EndpointFilter.key(normalizedMethod, `${normalizedPath}/`));
  }

  private static key(method: string, path: string): string {
    return `${method} ${path}`;
  }
}

/**
 * Operation-level security requirements as `{ scheme: scopes[] }` objects
 */
export function securityRequirements(operation: JsonObject): SecurityRequirement[] {
  const requirements: SecurityRequirement[] = [];

  for (const entry of getArray(operation, 'security') ?? []) {
    if (!isJsonObject(entry)) continue;

    const requirement: SecurityRequirement = {};
    for (const [scheme, scopes] of Object.entries(entry)) {
      requirement[scheme] = Array.isArray(scopes)
        ? scopes.filter((scope): scope is string => typeof scope === 'string')
        : [];
    }
    requirements.push(requirement);
  }

  return requirements;
}
