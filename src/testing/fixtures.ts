/**
 * Specification fixtures shared by the unit tests
 */

import { createSpec } from '../spec-model.js';
import type { JsonObject, Spec } from '../types/openapi.js';

export const petStoreDocument: JsonObject = {
  openapi: '3.0.3',
  info: {
    title: 'Pet Store',
    version: '1.2.0',
    description: 'Sample pet store API',
  },
  paths: {
    '/pets': {
      summary: 'Pet collection',
      get: {
        tags: ['pets'],
        summary: 'List pets',
        operationId: 'listPets',
        description: 'Returns every pet in the store, optionally limited to a page.',
        parameters: [
          {
            name: 'limit',
            in: 'query',
            required: false,
            description: 'Maximum number of items',
            schema: { type: 'integer', format: 'int32', example: 20 },
          },
          { $ref: '#/components/parameters/PageToken' },
        ],
        responses: {
          '200': {
            description: 'A list of pets',
            content: {
              'application/json': {
                schema: { type: 'array', items: { $ref: '#/components/schemas/Pet' } },
                examples: {
                  twoPets: {
                    summary: 'Two pets',
                    value: [
                      { id: 1, name: 'Rex' },
                      { id: 2, name: 'Tom' },
                    ],
                  },
                },
              },
            },
          },
          '500': { $ref: '#/components/responses/ServerError' },
        },
      },
      post: {
        tags: ['pets'],
        summary: 'Create pet',
        operationId: 'createPet',
        security: [{ petstore_auth: ['write:pets', 'read:pets'] }],
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/NewPet' },
              example: { name: 'Rex', tag: 'dog' },
            },
          },
        },
        responses: {
          '201': {
            description: 'Created',
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/Pet' } },
            },
          },
          '400': { description: 'Invalid input' },
          '4XX': { description: 'Client error' },
        },
      },
    },
    '/pets/{petId}': {
      get: {
        tags: ['pets'],
        summary: 'Get pet',
        operationId: 'getPet',
        parameters: [
          { name: 'petId', in: 'path', required: true, schema: { type: 'string' } },
        ],
        responses: {
          '200': {
            description: 'The pet',
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/Pet' } },
            },
          },
          '404': {
            description: 'Not found',
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/Error' } },
            },
          },
          default: { description: 'Unexpected error' },
        },
      },
      delete: {
        tags: ['pets', 'admin'],
        summary: 'Delete pet',
        operationId: 'deletePet',
        deprecated: true,
        responses: {
          '204': { description: 'Deleted' },
        },
      },
    },
    '/v2/health': {
      get: {
        summary: 'Health check',
        responses: {
          '200': { description: 'OK' },
        },
      },
    },
  },
  components: {
    schemas: {
      Pet: {
        type: 'object',
        title: 'Pet',
        required: ['id', 'name'],
        properties: {
          id: { type: 'integer', format: 'int64' },
          name: { type: 'string', example: 'Rex' },
          owner: { $ref: '#/components/schemas/Owner' },
        },
        example: { id: 1, name: 'Rex' },
      },
      NewPet: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string', description: 'Pet name' },
          tag: { type: 'string' },
        },
      },
      Owner: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          pets: { type: 'array', items: { $ref: '#/components/schemas/Pet' } },
        },
      },
      Error: {
        type: 'object',
        properties: {
          code: { type: 'integer' },
          message: { type: 'string' },
        },
      },
      Unused: { type: 'string' },
    },
    parameters: {
      PageToken: {
        name: 'pageToken',
        in: 'query',
        description: 'Opaque page token',
        schema: { type: 'string' },
        example: 'abc',
      },
    },
    responses: {
      ServerError: {
        description: 'Server error',
        content: {
          'application/json': { schema: { $ref: '#/components/schemas/Error' } },
        },
      },
    },
  },
};

/** Two schemas that reference each other */
export const cyclicDocument: JsonObject = {
  openapi: '3.0.3',
  info: { title: 'Cycle', version: '1' },
  paths: {
    '/x': {
      get: {
        responses: {
          '200': {
            description: 'OK',
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/X' } },
            },
          },
        },
      },
    },
  },
  components: {
    schemas: {
      X: { type: 'object', properties: { y: { $ref: '#/components/schemas/Y' } } },
      Y: { type: 'object', properties: { x: { $ref: '#/components/schemas/X' } } },
    },
  },
};

export function petStoreSpec(): Spec {
  return createSpec(petStoreDocument);
}

export function cyclicSpec(): Spec {
  return createSpec(cyclicDocument);
}
