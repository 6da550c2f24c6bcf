/**
 * @module @action-engine/runtime/loader/handler-resolver
 *
 * Strategies for turning `(moduleName, className)` into a handler constructor.
 *
 * - ImportHandlerResolver: dynamic `import()` of the module entry inside the
 *   materialized module directory
 * - FactoryHandlerResolver: constructors registered up front by the embedder
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import type { Logger } from '../logging.js';

/**
 * Handler classes are constructed with a logger and their merged configuration.
 */
export type HandlerConstructor = new (logger: Logger, configuration: Record<string, unknown>) => object;

export interface HandlerResolver {
  /** Register a module directory on the search path. Idempotent. */
  addModulePath(moduleName: string, modulePath: string): void;
  /** Resolve the exported class; rejects when the module or class is missing. */
  resolveClass(moduleName: string, className: string): Promise<HandlerConstructor>;
}

function isConstructor(value: unknown): value is HandlerConstructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

const packageJsonSchema = z.object({ main: z.string().optional() }).passthrough();

const ENTRY_CANDIDATES = ['index.mjs', 'index.js'];

async function fileExists(target: string): Promise<boolean> {
  try {
    await readFile(target);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Locate the entry file of a module directory: `package.json` main, else
 * `index.mjs`, else `index.js`.
 */
export async function resolveModuleEntry(modulePath: string): Promise<string> {
  const manifestPath = path.join(modulePath, 'package.json');
  if (await fileExists(manifestPath)) {
    const manifest = packageJsonSchema.parse(JSON.parse(await readFile(manifestPath, 'utf8')));
    if (manifest.main) {
      return path.resolve(modulePath, manifest.main);
    }
  }

  for (const candidate of ENTRY_CANDIDATES) {
    const entry = path.join(modulePath, candidate);
    if (await fileExists(entry)) {
      return entry;
    }
  }

  throw new Error(`No entry point in ${modulePath} (expected package.json main, index.mjs or index.js)`);
}

export class ImportHandlerResolver implements HandlerResolver {
  private readonly searchPath: Array<{ moduleName: string; modulePath: string }> = [];
  private readonly namespaces = new Map<string, Promise<object>>();

  addModulePath(moduleName: string, modulePath: string): void {
    const known = this.searchPath.some(
      (entry) => entry.moduleName === moduleName && entry.modulePath === modulePath
    );
    if (!known) {
      this.searchPath.push({ moduleName, modulePath });
    }
  }

  /** Registered module directories, in registration order. */
  get modulePaths(): readonly string[] {
    return this.searchPath.map((entry) => entry.modulePath);
  }

  async resolveClass(moduleName: string, className: string): Promise<HandlerConstructor> {
    const entry = this.searchPath.find((candidate) => candidate.moduleName === moduleName);
    if (!entry) {
      throw new Error(`Module ${moduleName} is not on the module search path`);
    }

    const namespace = await this.importModule(entry.modulePath);
    const exported: unknown = Reflect.get(namespace, className);
    if (!isConstructor(exported)) {
      throw new Error(`Module ${moduleName} does not export class ${className}`);
    }
    return exported;
  }

  private importModule(modulePath: string): Promise<object> {
    const cached = this.namespaces.get(modulePath);
    if (cached) {
      return cached;
    }

    const loading = (async (): Promise<object> => {
      try {
        const entry = await resolveModuleEntry(modulePath);
        const namespace: unknown = await import(pathToFileURL(entry).href);
        if (typeof namespace !== 'object' || namespace === null) {
          throw new Error(`Module entry ${entry} did not produce a namespace`);
        }
        return namespace;
      } catch (error) {
        this.namespaces.delete(modulePath);
        throw error;
      }
    })();

    this.namespaces.set(modulePath, loading);
    return loading;
  }
}

export class FactoryHandlerResolver implements HandlerResolver {
  private readonly factories = new Map<string, HandlerConstructor>();
  private readonly searchPath: string[] = [];

  register(moduleName: string, className: string, handler: HandlerConstructor): this {
    this.factories.set(`${moduleName}:${className}`, handler);
    return this;
  }

  addModulePath(_moduleName: string, modulePath: string): void {
    if (!this.searchPath.includes(modulePath)) {
      this.searchPath.push(modulePath);
    }
  }

  get modulePaths(): readonly string[] {
    return this.searchPath;
  }

  async resolveClass(moduleName: string, className: string): Promise<HandlerConstructor> {
    const handler = this.factories.get(`${moduleName}:${className}`);
    if (!handler) {
      throw new Error(`No handler class ${className} registered for module ${moduleName}`);
    }
    return handler;
  }
}
