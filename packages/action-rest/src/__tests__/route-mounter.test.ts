/**
 * @module @action-engine/rest/__tests__/route-mounter
 *
 * Tests for mountActionRoutes, driven through fastify.inject().
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { fastify, type FastifyInstance } from 'fastify';
import { parseEngineSettings } from '@action-engine/contracts';
import {
  ActionExecutor,
  PathResolver,
  createEngineLogger,
  type ExecuteRequest,
  type ExecutionResult,
  type FunctionLoader,
} from '@action-engine/runtime';
import { OpenAPIGenerator } from '../openapi.js';
import { mountActionRoutes } from '../route-mounter.js';

const settings = parseEngineSettings({
  title: 'Shop API',
  version: '1.0.0',
  functions: [
    {
      function_name: 'get_order',
      module_name: 'orders',
      class_name: 'OrderActions',
      path: '/orders/{id}',
      method: 'GET',
    },
    {
      function_name: 'order_note',
      module_name: 'orders',
      class_name: 'OrderActions',
      path: '/notes/{id}',
      method: 'GET',
    },
    {
      function_name: 'cancel_order',
      module_name: 'orders',
      class_name: 'OrderActions',
      path: '/cancel/{id}',
      method: 'POST',
    },
  ],
});

const handlers: Record<string, (parameters: Record<string, unknown>) => unknown> = {
  get_order: (parameters) => ({ id: parameters.id, expand: parameters.expand }),
  order_note: (parameters) => `note for ${String(parameters.id)}`,
  cancel_order: () => {
    throw new Error('order already shipped');
  },
};

function createExecutor(): ActionExecutor {
  const loader: FunctionLoader = {
    load: async (functionName) => {
      const handler = handlers[functionName];
      return handler ? { status: 'ok', value: handler } : { status: 'not-found', key: functionName };
    },
  };
  return new ActionExecutor({
    resolver: new PathResolver(settings.functions),
    loader,
    specGenerator: new OpenAPIGenerator(settings),
    logger: createEngineLogger({ level: 'silent' }),
  });
}

describe('mountActionRoutes', () => {
  let server: FastifyInstance;

  afterEach(async () => {
    await server.close();
  });

  async function createServer(prefix?: string): Promise<FastifyInstance> {
    server = fastify();
    mountActionRoutes(server, createExecutor(), { prefix });
    await server.ready();
    return server;
  }

  it('should dispatch the wildcard path with query parameters', async () => {
    const app = await createServer();

    const response = await app.inject({ method: 'GET', url: '/orders/7?expand=items' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.body).toBe('{"id":"7","expand":"items"}');
    expect(response.headers['x-execution-id']).toMatch(/^exec_/);
    expect(response.headers['x-execution-time-ms']).toMatch(/^\d+$/);
  });

  it('should send text results as plain text', async () => {
    const app = await createServer();

    const response = await app.inject({ method: 'GET', url: '/notes/3' });

    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(response.body).toBe('note for 3');
  });

  it('should serve the OpenAPI document as YAML', async () => {
    const app = await createServer('/actions');

    const response = await app.inject({ method: 'GET', url: '/actions/openapi.yaml' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/yaml; charset=utf-8');
    expect(response.body.split('\n')[0]).toBe('openapi: 3.1.0');
  });

  it('should map unknown paths to 404', async () => {
    const app = await createServer();

    const response = await app.inject({ method: 'GET', url: '/customers/1' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({
      error: 'No function matches path /customers/1',
      code: 'ROUTE_NOT_FOUND',
    });
  });

  it('should map handler failures to 500 with the handler message', async () => {
    const app = await createServer();

    const response = await app.inject({ method: 'POST', url: '/cancel/9', payload: { reason: 'late' } });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toMatchObject({ error: 'order already shipped', code: 'INVOCATION_FAILED' });
  });

  it('should merge a JSON body over the query string', async () => {
    const execute = vi.fn(
      async (request: ExecuteRequest): Promise<ExecutionResult> => ({
        ok: true,
        data: request.parameters,
        format: 'raw',
        executionId: 'exec_test',
        executionTimeMs: 1,
      })
    );
    server = fastify();
    mountActionRoutes(server, { execute }, { prefix: '/api/', timeoutMs: 500 });
    await server.ready();

    const response = await server.inject({
      method: 'POST',
      url: '/api/orders/1?source=web&note=query',
      payload: { note: 'body' },
    });

    expect(response.json()).toEqual({ source: 'web', note: 'body' });
    expect(execute).toHaveBeenCalledWith(
      expect.objectContaining({ path: 'orders/1', timeoutMs: 500 })
    );
  });
});
