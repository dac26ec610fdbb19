/**
 * OpenAPI 3.1 document generator.
 *
 * Walks the contract registry and produces an OpenAPI document
 * using @asteasolutions/zod-to-openapi.
 */

import {
  OpenAPIRegistry,
  OpenApiGeneratorV31,
  extendZodWithOpenApi,
  type ResponseConfig,
} from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import { DataEnvelope, ErrorEnvelope } from '../envelope.js';
import { contract } from '../routes/index.js';
import type { ContractRoute, HttpMethod } from '../define-route.js';

// Extend Zod with .openapi() method
extendZodWithOpenApi(z);

const OPENAPI_METHOD = {
  GET: 'get',
  POST: 'post',
  DELETE: 'delete',
} as const satisfies Record<HttpMethod, string>;

/**
 * Convert a contract route path like `/devices/:address` to OpenAPI `/devices/{address}`.
 */
function toOpenApiPath(path: string): string {
  return path.replace(/:([a-zA-Z0-9_]+)/g, '{$1}');
}

function listRoutes(): Array<{ operationId: string; route: ContractRoute }> {
  const result: Array<{ operationId: string; route: ContractRoute }> = [];
  for (const [groupName, routes] of Object.entries(contract)) {
    for (const [routeName, route] of Object.entries<ContractRoute>(routes)) {
      result.push({ operationId: `${groupName}.${routeName}`, route });
    }
  }
  return result;
}

/**
 * Generate an OpenAPI 3.1 document from the contract registry.
 */
export function generateOpenApiDocument() {
  const registry = new OpenAPIRegistry();

  for (const { operationId, route } of listRoutes()) {
    const responses: Record<string, ResponseConfig> = {};
    if (route.response === 'void') {
      responses['204'] = { description: 'No content' };
    } else {
      responses['200'] = {
        description: 'Successful response',
        content: {
          'application/json': {
            schema: DataEnvelope(route.response),
          },
        },
      };
      if (route.accepted) {
        responses['202'] = {
          description: route.accepted,
          content: { 'application/json': { schema: DataEnvelope(route.response) } },
        };
      }
    }
    responses['default'] = {
      description: 'Error envelope',
      content: {
        'application/json': {
          schema: ErrorEnvelope,
        },
      },
    };

    registry.registerPath({
      method: OPENAPI_METHOD[route.method],
      path: toOpenApiPath(route.path),
      operationId,
      summary: route.summary,
      request: {
        params: route.params instanceof z.ZodObject ? route.params : undefined,
        query: route.query instanceof z.ZodObject ? route.query : undefined,
        body: route.body
          ? { content: { 'application/json': { schema: route.body } }, required: true }
          : undefined,
      },
      responses,
    });
  }

  const generator = new OpenApiGeneratorV31(registry.definitions);
  return generator.generateDocument({
    openapi: '3.1.0',
    info: {
      title: 'Shadebridge Control API',
      version: '0.1.0',
      description: 'Auto-generated from @shadebridge/contract route definitions.',
    },
    servers: [
      { url: 'http://localhost:3080/api', description: 'Local bridge' },
    ],
  });
}
