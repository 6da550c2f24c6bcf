/**
 * @module @action-engine/rest/route-mounter
 *
 * Binds an action executor to a caller-supplied Fastify instance.
 *
 * One catch-all route per prefix. The wildcard segment is the dispatch path,
 * the request parameters are the query string merged with a JSON object body
 * (body keys win). A body that is not an object is passed as `body`.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import { HTTP_METHODS, httpStatusForError } from '@action-engine/contracts';
import type { ActionExecutor, ActionParameters, ResultFormat } from '@action-engine/runtime';

export interface MountActionRoutesOptions {
  /** Route prefix, e.g. `/actions` (default: none) */
  prefix?: string;
  /** Deadline per request in ms (default: none) */
  timeoutMs?: number;
}

interface ActionRoute {
  Params: { '*': string };
  Querystring: Record<string, unknown>;
  Body: unknown;
}

const CONTENT_TYPES: Readonly<Record<Exclude<ResultFormat, 'raw'>, string>> = {
  json: 'application/json; charset=utf-8',
  yaml: 'application/yaml; charset=utf-8',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requestParameters(query: Record<string, unknown> | undefined, body: unknown): ActionParameters {
  if (body === undefined || body === null) {
    return { ...query };
  }
  return isRecord(body) ? { ...query, ...body } : { ...query, body };
}

function sendResult(reply: FastifyReply, data: unknown, format: ResultFormat): FastifyReply {
  if (format !== 'raw') {
    return reply.type(CONTENT_TYPES[format]).send(data);
  }
  if (typeof data === 'string') {
    return reply.type('text/plain; charset=utf-8').send(data);
  }
  return reply.type(CONTENT_TYPES.json).send(JSON.stringify(data ?? null));
}

/**
 * Mount the catch-all action route.
 *
 * @example
 * ```typescript
 * const server = Fastify();
 * mountActionRoutes(server, engine.executor, { prefix: '/actions' });
 * // GET /actions/users/42 → dispatch({ path: 'users/42', parameters: {...query} })
 * ```
 */
export function mountActionRoutes(
  server: FastifyInstance,
  executor: Pick<ActionExecutor, 'execute'>,
  options: MountActionRoutesOptions = {}
): void {
  const prefix = (options.prefix ?? '').replace(/\/+$/, '');
  const url = `${prefix}/*`;

  server.route<ActionRoute>({
    method: [...HTTP_METHODS],
    url,
    handler: async (request, reply) => {
      const abortController = new AbortController();
      reply.raw.on('close', () => {
        if (!reply.raw.writableEnded) {
          abortController.abort();
        }
      });

      const result = await executor.execute({
        path: request.params['*'],
        parameters: requestParameters(request.query, request.body),
        signal: abortController.signal,
        timeoutMs: options.timeoutMs,
      });

      reply.header('X-Execution-Id', result.executionId);
      reply.header('X-Execution-Time-Ms', String(Math.round(result.executionTimeMs)));

      if (result.ok) {
        return sendResult(reply, result.data, result.format);
      }

      return reply.code(httpStatusForError(result.error.code)).send({
        error: result.error.message,
        code: result.error.code,
        executionId: result.executionId,
      });
    },
  });

  server.log.info({ url, methods: HTTP_METHODS }, 'Mounted action routes');
}
