/**
 * @module @action-engine/runtime/loader/handler-loader
 *
 * Turns a function name into a callable bound to a freshly constructed
 * handler instance.
 */

import {
  LoadError,
  found,
  isActionError,
  type FunctionDescriptor,
  type Lookup,
} from '@action-engine/contracts';
import type { Logger } from '../logging.js';
import type { ModuleProvider } from '../materialize/module-materializer.js';
import type { FunctionRegistry } from '../registry/function-registry.js';
import { isPlainObject } from '../utils.js';
import type { HandlerResolver } from './handler-resolver.js';

/** Parameters handed to an action function. */
export type ActionParameters = Record<string, unknown>;

export type BoundFunction = (parameters: ActionParameters) => unknown;

export interface LoadOptions {
  signal?: AbortSignal;
}

export interface FunctionLoader {
  load(functionName: string, options?: LoadOptions): Promise<Lookup<BoundFunction>>;
}

export interface HandlerLoaderOptions {
  registry: FunctionRegistry;
  modules: ModuleProvider;
  resolver: HandlerResolver;
  /** Base configuration shared by every handler */
  configuration: Readonly<Record<string, unknown>>;
  logger: Logger;
}

/**
 * Shallow merge (function-level keys win) followed by a JSON round trip,
 * so handlers only ever see plain serializable data.
 *
 * @throws Error when the merged value cannot be serialized
 */
export function mergeConfiguration(
  base: Readonly<Record<string, unknown>>,
  overrides?: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const merged = { ...base, ...overrides };
  const roundTripped: unknown = JSON.parse(JSON.stringify(merged));
  if (!isPlainObject(roundTripped)) {
    throw new Error('Merged configuration is not an object');
  }
  return roundTripped;
}

export class HandlerLoader implements FunctionLoader {
  constructor(private readonly options: HandlerLoaderOptions) {}

  /**
   * Load `functionName`, materializing its module first.
   *
   * Returns `not-found` for names the registry does not know. Materializer
   * failures keep their own error type; everything else becomes LoadError.
   */
  async load(functionName: string, options: LoadOptions = {}): Promise<Lookup<BoundFunction>> {
    const { registry, modules, logger } = this.options;

    const lookup = registry.get(functionName);
    if (lookup.status === 'not-found') {
      logger.error({ functionName }, 'Function not found in registry');
      return lookup;
    }

    const descriptor = lookup.value;
    const modulePath = await modules.ensurePresent(descriptor.moduleName, { signal: options.signal });

    try {
      return found(await this.bind(descriptor, modulePath));
    } catch (error) {
      logger.error(
        {
          err: error,
          functionName,
          moduleName: descriptor.moduleName,
          className: descriptor.className,
          modulePath,
        },
        'Failed to load action function'
      );
      if (isActionError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new LoadError(
        `Failed to load ${functionName}: ${reason}`,
        functionName,
        { moduleName: descriptor.moduleName, className: descriptor.className },
        error
      );
    }
  }

  private async bind(descriptor: FunctionDescriptor, modulePath: string): Promise<BoundFunction> {
    const { resolver, configuration, logger } = this.options;
    const { functionName, moduleName, className } = descriptor;

    resolver.addModulePath(moduleName, modulePath);
    const HandlerClass = await resolver.resolveClass(moduleName, className);

    const merged = mergeConfiguration(configuration, descriptor.configuration);
    const handlerLogger = logger.child({ module: moduleName, handler: className, function: functionName });
    const instance = new HandlerClass(handlerLogger, merged);

    const member: unknown = Reflect.get(instance, functionName);
    if (typeof member !== 'function') {
      throw new LoadError(`${className} has no method ${functionName}`, functionName, {
        moduleName,
        className,
      });
    }

    return (parameters: ActionParameters): unknown => member.call(instance, parameters);
  }
}
