/**
 * @module @action-engine/runtime/executor/action-executor
 *
 * Request dispatch: path normalization, route resolution, parameter merge,
 * handler invocation and result normalization.
 *
 * Two entry points:
 * - dispatch(): returns the normalized result, throws ActionError subclasses
 * - execute(): never throws, returns an ExecutionResult and records stats
 */

import {
  InvocationError,
  NotFoundError,
  RoutingError,
  normalizeError,
  type SerializedActionError,
  type SpecFormat,
  type SpecGenerator,
} from '@action-engine/contracts';
import type { Logger } from '../logging.js';
import type { ActionParameters, FunctionLoader } from '../loader/handler-loader.js';
import type { RouteResolver } from '../routing/path-resolver.js';
import { createExecutionId, isPlainObject, runWithDeadline } from '../utils.js';

export interface DispatchRequest {
  /** Request path; leading slashes are optional */
  path?: unknown;
  parameters?: ActionParameters;
  signal?: AbortSignal;
}

export interface ExecuteRequest extends DispatchRequest {
  /** Deadline for the whole dispatch, including module materialization */
  timeoutMs?: number;
}

/**
 * How a result should be presented by a transport:
 * `json` for normalized objects and arrays, `yaml`/`json` spec documents,
 * `raw` for values returned as-is.
 */
export type ResultFormat = 'json' | 'yaml' | 'raw';

export type ExecutionResult =
  | {
      ok: true;
      data: unknown;
      format: ResultFormat;
      executionId: string;
      executionTimeMs: number;
    }
  | {
      ok: false;
      error: SerializedActionError;
      executionId: string;
      executionTimeMs: number;
    };

export interface ExecutorStats {
  totalExecutions: number;
  successCount: number;
  errorCount: number;
  avgExecutionTimeMs: number;
  p95ExecutionTimeMs: number;
}

export interface ActionExecutorOptions {
  resolver: RouteResolver;
  loader: FunctionLoader;
  specGenerator: SpecGenerator;
  /** Merged underneath request parameters on every dispatch */
  defaultParameters?: Readonly<Record<string, unknown>>;
  logger: Logger;
}

const SPEC_DOCUMENTS: ReadonlyArray<[suffix: string, format: SpecFormat]> = [
  ['openapi.yaml', 'yaml'],
  ['openapi.json', 'json'],
];

const MAX_RECORDED_TIMES = 1000;

/**
 * Strip leading slashes and prefix exactly one.
 * @throws RoutingError when the path is missing or not a string
 */
export function normalizeRequestPath(path: unknown): string {
  if (typeof path !== 'string') {
    throw new RoutingError('Request path is required');
  }
  return `/${path.replace(/^\/+/, '')}`;
}

/**
 * Plain objects and arrays become compact JSON text; anything else passes through.
 */
export function normalizeResult(value: unknown): unknown {
  if (Array.isArray(value) || isPlainObject(value)) {
    return JSON.stringify(value);
  }
  return value;
}

export class ActionExecutor {
  private totalExecutions = 0;
  private successCount = 0;
  private errorCount = 0;
  private readonly executionTimes: number[] = [];

  constructor(private readonly options: ActionExecutorOptions) {}

  async dispatch(request: DispatchRequest): Promise<unknown> {
    const { data } = await this.run(request);
    return data;
  }

  async execute(request: ExecuteRequest): Promise<ExecutionResult> {
    const executionId = createExecutionId();
    const startedAt = performance.now();

    try {
      const { data, format } = await runWithDeadline(
        (signal) => this.run({ ...request, signal }),
        request.timeoutMs,
        request.signal
      );
      const executionTimeMs = performance.now() - startedAt;
      this.record(true, executionTimeMs);
      return { ok: true, data, format, executionId, executionTimeMs };
    } catch (error) {
      const executionTimeMs = performance.now() - startedAt;
      this.record(false, executionTimeMs);
      this.options.logger.debug({ err: error, executionId }, 'Execution failed');
      return { ok: false, error: normalizeError(error), executionId, executionTimeMs };
    }
  }

  stats(): ExecutorStats {
    const sorted = [...this.executionTimes].sort((a, b) => a - b);
    const total = sorted.reduce((sum, time) => sum + time, 0);
    const p95Index = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);

    return {
      totalExecutions: this.totalExecutions,
      successCount: this.successCount,
      errorCount: this.errorCount,
      avgExecutionTimeMs: sorted.length > 0 ? total / sorted.length : 0,
      p95ExecutionTimeMs: sorted[p95Index] ?? 0,
    };
  }

  private async run(request: DispatchRequest): Promise<{ data: unknown; format: ResultFormat }> {
    const { resolver, loader, specGenerator, logger } = this.options;
    const path = normalizeRequestPath(request.path);
    logger.info({ path }, 'Dispatching request');

    const document = SPEC_DOCUMENTS.find(([suffix]) => path.endsWith(suffix));
    if (document) {
      const [, format] = document;
      return { data: specGenerator.generate(format), format };
    }

    const route = resolver.resolve(path);
    if (route.status === 'not-found') {
      logger.warn({ path }, 'No function matches path');
      throw new RoutingError(`No function matches path ${path}`, path);
    }

    const { descriptor, pathParameters } = route.value;
    const { functionName } = descriptor;
    const parameters: ActionParameters = {
      ...this.options.defaultParameters,
      ...request.parameters,
      ...pathParameters,
    };

    const action = await loader.load(functionName, { signal: request.signal });
    if (action.status === 'not-found') {
      throw new NotFoundError(functionName);
    }

    let result: unknown;
    try {
      result = await action.value(parameters);
    } catch (error) {
      logger.error({ err: error, functionName, path }, 'Action function failed');
      throw new InvocationError(functionName, error);
    }

    let data: unknown;
    try {
      data = normalizeResult(result);
    } catch (error) {
      logger.error({ err: error, functionName, path }, 'Action result could not be serialized');
      throw new InvocationError(functionName, error);
    }
    return { data, format: data === result ? 'raw' : 'json' };
  }

  private record(ok: boolean, executionTimeMs: number): void {
    this.totalExecutions++;
    if (ok) {
      this.successCount++;
    } else {
      this.errorCount++;
    }
    this.executionTimes.push(executionTimeMs);
    if (this.executionTimes.length > MAX_RECORDED_TIMES) {
      this.executionTimes.shift();
    }
  }
}
