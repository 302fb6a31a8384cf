import { describe, it, expect } from 'vitest';
import { EndpointFinder } from './endpoint-finder.js';
import { formatType } from './formatters.js';
import { SchemaResolver } from './ref-resolver.js';
import { SchemaCollector } from './schema-collector.js';
import { createEndpoint, createSpec } from './spec-model.js';
import { cyclicSpec, petStoreSpec } from './testing/fixtures.js';
import type { Spec } from './types/openapi.js';

function collect(spec: Spec, path: string, method: string): string[] {
  const endpoint = new EndpointFinder().find(spec, path, method);
  return Array.from(new SchemaCollector(new SchemaResolver(spec)).collect(endpoint));
}

describe('SchemaCollector', () => {
  it('collects schemas reachable from responses transitively', () => {
    expect(collect(petStoreSpec(), '/pets', 'get')).toEqual(['Pet', 'Owner']);
  });

  it('collects request body schemas first', () => {
    expect(collect(petStoreSpec(), '/pets', 'post')).toEqual(['NewPet', 'Pet', 'Owner']);
  });

  it('collects every response code', () => {
    expect(collect(petStoreSpec(), '/pets/{petId}', 'get')).toEqual(['Pet', 'Owner', 'Error']);
  });

  it('returns an empty set when nothing is referenced', () => {
    expect(collect(petStoreSpec(), '/pets/{petId}', 'delete')).toEqual([]);
  });

  it('terminates on cyclic schemas and yields each name once', () => {
    expect(collect(cyclicSpec(), '/x', 'get')).toEqual(['X', 'Y']);
  });

  it('follows combinators, items and additionalProperties', () => {
    const spec = createSpec({
      components: {
        schemas: {
          A: { type: 'string' },
          B: { type: 'string' },
          C: { type: 'string' },
          D: { type: 'string' },
          E: { type: 'string' },
        },
      },
    });
    const endpoint = createEndpoint('/mixed', 'post', {
      parameters: [
        { name: 'filter', in: 'query', schema: { oneOf: [{ $ref: '#/components/schemas/A' }, { type: 'null' }] } },
      ],
      requestBody: {
        content: {
          'application/json': {
            schema: {
              allOf: [{ $ref: '#/components/schemas/B' }],
              properties: { list: { type: 'array', items: { $ref: '#/components/schemas/C' } } },
              additionalProperties: { $ref: '#/components/schemas/D' },
            },
          },
        },
      },
      responses: {
        '200': { description: 'OK', headers: { 'X-Rate': { schema: { $ref: '#/components/schemas/E' } } } },
      },
    });

    const collected = new SchemaCollector(new SchemaResolver(spec)).collect(endpoint);

    expect(Array.from(collected)).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('keeps names of schemas that do not resolve', () => {
    const spec = createSpec({ components: { schemas: {} } });
    const endpoint = createEndpoint('/ghost', 'get', {
      responses: {
        '200': {
          description: 'OK',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Ghost' } } },
        },
      },
    });

    expect(Array.from(new SchemaCollector(new SchemaResolver(spec)).collect(endpoint))).toEqual(['Ghost']);
  });
});

describe('ping and items scenario', () => {
  const spec = createSpec({
    openapi: '3.0.0',
    info: { title: 'Items', version: '1.0' },
    paths: {
      '/ping': {
        get: { responses: { '200': { description: 'pong' } } },
      },
      '/items': {
        post: {
          requestBody: {
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Item' } } },
          },
          responses: { '201': { description: 'Created' } },
        },
      },
    },
    components: {
      schemas: {
        Item: {
          type: 'object',
          properties: { id: { type: 'string' }, name: { type: 'string' } },
        },
      },
    },
  });

  it('collects Item for POST /items', () => {
    expect(collect(spec, '/items', 'post')).toEqual(['Item']);
  });

  it('collects nothing for GET /ping', () => {
    expect(collect(spec, '/ping', 'get')).toEqual([]);
  });

  it('formats the raw id property as string', () => {
    expect(formatType({ type: 'string' })).toBe('string');
  });
});
