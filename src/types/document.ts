/**
 * Structured documentation model handed to a DocumentRenderer
 */

import type { JsonValue, LabelledExample, SecurityRequirement } from './openapi.js';

export interface PropertyRow {
  name: string;
  type: string;
  required: boolean;
  description: string;
  format: string;
  examples: LabelledExample[];
}

export interface ParameterRow extends PropertyRow {
  in: string;
}

export interface MediaDoc {
  contentType: string;
  /** Schema name when the media schema is a component reference */
  schemaRef?: string;
  schemaTitle?: string;
  /** Formatted type when the media schema is inline */
  schemaType?: string;
  properties: PropertyRow[];
  examples: LabelledExample[];
}

export interface RequestBodyDoc {
  description: string;
  required: boolean;
  content: MediaDoc[];
}

export interface ResponseDoc {
  code: string;
  description: string;
  content: MediaDoc[];
}

export interface EndpointDoc {
  path: string;
  method: string;
  summary: string;
  description: string;
  operationId?: string;
  deprecated: boolean;
  parameters: ParameterRow[];
  requestBody?: RequestBodyDoc;
  responses: ResponseDoc[];
  security: SecurityRequirement[];
}

export interface TagGroup {
  tag: string;
  endpoints: EndpointDoc[];
}

export interface SchemaDoc {
  name: string;
  title: string;
  type: string;
  description: string;
  requiredFields: string[];
  properties: PropertyRow[];
  example?: JsonValue;
}

export interface DocumentModel {
  title: string;
  version: string;
  description: string;
  groups: TagGroup[];
  schemas: SchemaDoc[];
}
