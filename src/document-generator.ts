/**
 * Builds the structured DocumentModel for a spec and renders it
 *
 * Endpoints are grouped by tag (an endpoint appears once per tag). The
 * schema section is limited to the schemas the selected endpoints use
 * unless `includeAllSchemas` is set.
 */

import { EndpointFinder } from './endpoint-finder.js';
import { extractExamples, formatDescription, formatType } from './formatters.js';
import { MarkdownRenderer, type DocumentRenderer } from './markdown-renderer.js';
import { refName, SchemaResolver } from './ref-resolver.js';
import { SchemaCollector } from './schema-collector.js';
import { securityRequirements, type EndpointFilter } from './spec-model.js';
import type {
  DocumentModel,
  EndpointDoc,
  MediaDoc,
  ParameterRow,
  PropertyRow,
  RequestBodyDoc,
  ResponseDoc,
  SchemaDoc,
  TagGroup,
} from './types/document.js';
import {
  getArray,
  getObject,
  getString,
  isJsonObject,
  type Endpoint,
  type JsonObject,
  type JsonValue,
  type Spec,
} from './types/openapi.js';

export interface GenerateOptions {
  filter?: EndpointFilter;
  includeAllSchemas?: boolean;
}

export class DocumentGenerator {
  private finder = new EndpointFinder();

  constructor(private readonly renderer: DocumentRenderer = new MarkdownRenderer()) {}

  generate(spec: Spec, options: GenerateOptions = {}): string {
    return this.renderer.render(this.buildModel(spec, options));
  }

  buildModel(spec: Spec, options: GenerateOptions = {}): DocumentModel {
    const resolver = new SchemaResolver(spec);
    const collector = new SchemaCollector(resolver);
    const groups = new Map<string, TagGroup>();
    const usedSchemas = new Set<string>();

    for (const endpoint of this.finder.listAll(spec)) {
      if (options.filter && !options.filter.matches(endpoint.method, endpoint.path)) continue;

      const doc = this.buildEndpoint(endpoint, resolver);
      for (const tag of endpoint.tags) {
        const group = groups.get(tag) ?? { tag, endpoints: [] };
        group.endpoints.push(doc);
        groups.set(tag, group);
      }

      if (!options.includeAllSchemas) {
        for (const name of collector.collect(endpoint)) {
          usedSchemas.add(name);
        }
      }
    }

    return {
      title: getString(spec.info, 'title') ?? '',
      version: getString(spec.info, 'version') ?? '',
      description: getString(spec.info, 'description') ?? '',
      groups: Array.from(groups.values()),
      schemas: this.buildSchemas(spec, resolver, options.includeAllSchemas ? undefined : usedSchemas),
    };
  }

  private buildEndpoint(endpoint: Endpoint, resolver: SchemaResolver): EndpointDoc {
    const { operation } = endpoint;
    const requestBody = resolver.dereference(operation.requestBody);
    const responses = getObject(operation, 'responses') ?? {};

    return {
      path: endpoint.path,
      method: endpoint.method,
      summary: getString(operation, 'summary') ?? '',
      description: getString(operation, 'description') ?? '',
      operationId: getString(operation, 'operationId'),
      deprecated: operation.deprecated === true,
      parameters: (getArray(operation, 'parameters') ?? [])
        .map(parameter => resolver.dereference(parameter))
        .filter(isJsonObject)
        .map(parameter => this.buildParameter(parameter, resolver)),
      requestBody: requestBody ? this.buildRequestBody(requestBody, resolver) : undefined,
      responses: Object.entries(responses)
        .map(([code, response]) => this.buildResponse(code, resolver.dereference(response), resolver))
        .filter((response): response is ResponseDoc => response !== undefined),
      security: securityRequirements(operation),
    };
  }

  private buildParameter(parameter: JsonObject, resolver: SchemaResolver): ParameterRow {
    const rawSchema = getObject(parameter, 'schema');
    const schema = rawSchema ? resolver.processSchema(rawSchema) : undefined;
    const resolved: JsonObject = schema ? { ...parameter, schema } : parameter;

    return {
      name: getString(resolved, 'name') ?? '',
      in: getString(resolved, 'in') ?? '',
      type: schema ? formatType(schema) : '',
      required: resolved.required === true,
      description: formatDescription(resolved),
      format: (schema && getString(schema, 'format')) ?? '',
      examples: extractExamples(resolved),
    };
  }

  private buildRequestBody(body: JsonObject, resolver: SchemaResolver): RequestBodyDoc {
    return {
      description: getString(body, 'description') ?? '',
      required: body.required === true,
      content: this.buildContent(body, resolver, true),
    };
  }

  private buildResponse(code: string, response: JsonObject | undefined, resolver: SchemaResolver): ResponseDoc | undefined {
    if (!response) return undefined;

    return {
      code,
      description: getString(response, 'description') ?? '',
      content: this.buildContent(response, resolver, false),
    };
  }

  private buildContent(node: JsonObject, resolver: SchemaResolver, withProperties: boolean): MediaDoc[] {
    const content: MediaDoc[] = [];

    for (const [contentType, media] of Object.entries(getObject(node, 'content') ?? {})) {
      if (!isJsonObject(media)) continue;

      const doc: MediaDoc = { contentType, properties: [], examples: extractExamples(media) };
      const rawSchema = getObject(media, 'schema');

      if (rawSchema && Object.keys(rawSchema).length > 0) {
        const schema = resolver.processSchema(rawSchema);
        const ref = getString(rawSchema, '$ref');

        if (ref !== undefined) {
          doc.schemaRef = refName(ref);
          doc.schemaTitle = getString(resolver.resolve(ref), 'title') ?? '';
        } else {
          doc.schemaType = formatType(schema);
        }

        if (withProperties && schema.type === 'object') {
          doc.properties = this.buildProperties(schema, resolver);
        }
      }

      content.push(doc);
    }

    return content;
  }

  private buildProperties(schema: JsonObject, resolver: SchemaResolver): PropertyRow[] {
    const properties = getObject(schema, 'properties');
    if (!properties) return [];

    const required = this.requiredFields(schema);
    const rows: PropertyRow[] = [];

    for (const [name, rawProperty] of Object.entries(properties)) {
      if (!isJsonObject(rawProperty)) continue;

      const property = resolver.processSchema(rawProperty);
      rows.push({
        name,
        type: formatType(property),
        required: required.includes(name),
        description: formatDescription(property),
        format: getString(property, 'format') ?? '',
        examples: extractExamples(property),
      });
    }

    return rows;
  }

  private buildSchemas(spec: Spec, resolver: SchemaResolver, used?: Set<string>): SchemaDoc[] {
    const schemas: SchemaDoc[] = [];

    for (const [name, definition] of Object.entries(spec.schemas)) {
      if (used && !used.has(name)) continue;
      if (!isJsonObject(definition)) continue;

      const processed = resolver.processSchema(definition);
      const example: JsonValue | undefined = processed.example;

      schemas.push({
        name,
        title: getString(processed, 'title') ?? '',
        type: getString(processed, 'type') ?? 'object',
        description: getString(processed, 'description') ?? '',
        requiredFields: this.requiredFields(processed),
        properties: this.buildProperties(processed, resolver),
        example,
      });
    }

    return schemas;
  }

  private requiredFields(schema: JsonObject): string[] {
    return (getArray(schema, 'required') ?? []).filter((field): field is string => typeof field === 'string');
  }
}
