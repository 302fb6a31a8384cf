/**
 * Operation lookup by path and method
 */

import { isHttpMethod } from './constants.js';
import { MethodNotFoundError, PathNotFoundError } from './errors.js';
import { createEndpoint } from './spec-model.js';
import { isJsonObject, type Endpoint, type JsonObject, type Spec } from './types/openapi.js';

function toggleTrailingSlash(path: string): string {
  return path.endsWith('/') ? path.slice(0, -1) : `${path}/`;
}

export class EndpointFinder {
  /**
   * Find one operation. The exact path is tried first, then the same path
   * with the trailing slash added or removed; the returned endpoint keeps
   * the variant that matched.
   */
  find(spec: Spec, path: string, method: string): Endpoint {
    let matchedPath = path;
    let pathItem = this.pathItem(spec, path);

    if (!pathItem) {
      matchedPath = toggleTrailingSlash(path);
      pathItem = this.pathItem(spec, matchedPath);
    }

    if (!pathItem) {
      throw new PathNotFoundError(path);
    }

    const wanted = method.toLowerCase();
    for (const [key, operation] of Object.entries(pathItem)) {
      if (key.toLowerCase() === wanted && isHttpMethod(key) && isJsonObject(operation)) {
        return createEndpoint(matchedPath, key, operation);
      }
    }

    throw new MethodNotFoundError(method.toUpperCase(), matchedPath, this.availableMethods(pathItem));
  }

  /**
   * Every operation in declaration order, skipping non-method keys
   */
  listAll(spec: Spec): Endpoint[] {
    const endpoints: Endpoint[] = [];

    for (const [path, pathItem] of Object.entries(spec.paths)) {
      if (!isJsonObject(pathItem)) continue;

      for (const [method, operation] of Object.entries(pathItem)) {
        if (isHttpMethod(method) && isJsonObject(operation)) {
          endpoints.push(createEndpoint(path, method, operation));
        }
      }
    }

    return endpoints;
  }

  private pathItem(spec: Spec, path: string): JsonObject | undefined {
    const item = spec.paths[path];
    return isJsonObject(item) ? item : undefined;
  }

  private availableMethods(pathItem: JsonObject): string[] {
    return Object.keys(pathItem)
      .filter(key => isHttpMethod(key))
      .map(key => key.toUpperCase());
  }
}
