/**
 * Spec model types
 *
 * Documents are kept as raw JSON trees. The indexed views on `Spec` are
 * projections of `raw` and are never mutated independently.
 */

import type { OpenAPIV3 } from 'openapi-types';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export interface Spec {
  readonly raw: JsonObject;
  /** path -> method -> operation */
  readonly paths: JsonObject;
  /** components.schemas */
  readonly schemas: JsonObject;
  readonly info: JsonObject;
}

export interface Endpoint {
  readonly path: string;
  /** Always upper-case */
  readonly method: string;
  readonly operation: JsonObject;
  readonly tags: readonly string[];
}

export interface SchemaDefinition {
  name: string;
  definition: JsonObject;
}

export type SecurityRequirement = OpenAPIV3.SecurityRequirementObject;

export interface LabelledExample {
  label: string;
  value: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(node: JsonObject, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

export function getObject(node: JsonObject, key: string): JsonObject | undefined {
  const value = node[key];
  return isJsonObject(value) ? value : undefined;
}

export function getArray(node: JsonObject, key: string): JsonValue[] | undefined {
  const value = node[key];
  return Array.isArray(value) ? value : undefined;
}

export function hasKey(node: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(node, key);
}
