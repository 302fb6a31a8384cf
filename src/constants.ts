/**
 * Application constants
 */

/**
 * Methods recognized as operations inside a path item, upper-case.
 * Every other key (parameters, summary, x-* extensions) is skipped.
 */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const;

const HTTP_METHOD_SET: ReadonlySet<string> = new Set(HTTP_METHODS);

/** Case-insensitive: path items conventionally use lower-case keys */
export function isHttpMethod(value: string): boolean {
  return HTTP_METHOD_SET.has(value.toUpperCase());
}

/** Ceiling shared by the resolver and the schema processor */
export const MAX_REF_DEPTH = 10;

export const REF_PREFIX = {
  SCHEMAS: '#/components/schemas/',
  PARAMETERS: '#/components/parameters/',
} as const;

/** Synthetic key recording the `$ref` a processed node was expanded from */
export const ORIGINAL_REF_KEY = 'x-original-ref';

/** Tag assigned to operations that declare none */
export const DEFAULT_TAG = 'Untagged';

export const PRIMITIVE_TYPES = ['string', 'integer', 'number', 'boolean'] as const;

/**
 * Character windows searched after an endpoint heading
 */
export const VERIFY_WINDOW = {
  SECURITY: 3000,
  DEPRECATED: 500,
  RESPONSE_CODE: 3000,
  PARAMETERS: 3000,
  REQUEST_BODY: 5000,
} as const;

export const DESCRIPTION_SNIPPET_LENGTH = 50;

export const SECURITY_KEYWORDS = ['security', 'authorization', 'authentication'] as const;

export const DEPRECATION_MARKERS = ['deprecated', '⚠️'] as const;

/** Truncation applied to examples shown inside table cells */
export const EXAMPLE_CELL_MAX_LENGTH = 100;
