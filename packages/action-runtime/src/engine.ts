/**
 * @module @action-engine/runtime/engine
 *
 * Wires one engine from one EngineSettings object. Engines share no state,
 * so several can run side by side in a process.
 */

import type { EngineSettings, SpecGenerator } from '@action-engine/contracts';
import { ActionExecutor, type DispatchRequest } from './executor/action-executor.js';
import { HandlerLoader } from './loader/handler-loader.js';
import { ImportHandlerResolver, type HandlerResolver } from './loader/handler-resolver.js';
import { componentLogger, createEngineLogger, logLevelFromEnv, type Logger } from './logging.js';
import { AdmZipExtractor, type ArchiveExtractor } from './materialize/archive-extractor.js';
import { ModuleMaterializer } from './materialize/module-materializer.js';
import { S3ObjectStore, type ObjectStore } from './materialize/object-store.js';
import { FunctionRegistry } from './registry/function-registry.js';
import { PathResolver } from './routing/path-resolver.js';

export interface ActionEngineOptions {
  /** Serves `openapi.yaml` / `openapi.json` requests */
  specGenerator: SpecGenerator;
  /** Default: engine logger at the level named by `ACTION_ENGINE_LOG_LEVEL` */
  logger?: Logger;
  /** Environment read for the default logger's level (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Default: S3ObjectStore built from `settings.storage` */
  objectStore?: ObjectStore;
  /** Default: AdmZipExtractor */
  extractor?: ArchiveExtractor;
  /** Default: ImportHandlerResolver */
  handlerResolver?: HandlerResolver;
}

export interface ActionEngine {
  readonly settings: EngineSettings;
  readonly logger: Logger;
  readonly registry: FunctionRegistry;
  readonly resolver: PathResolver;
  readonly materializer: ModuleMaterializer;
  readonly loader: HandlerLoader;
  readonly executor: ActionExecutor;
  dispatch(request: DispatchRequest): Promise<unknown>;
}

export function createActionEngine(settings: EngineSettings, options: ActionEngineOptions): ActionEngine {
  const logger = options.logger ?? createEngineLogger({ level: logLevelFromEnv(options.env) });

  const registry = new FunctionRegistry(settings.functions);
  const resolver = new PathResolver(registry.list());

  const materializer = new ModuleMaterializer({
    bucket: settings.storage.bucket,
    archiveDir: settings.paths.archiveDir,
    extractDir: settings.paths.extractDir,
    objectStore: options.objectStore ?? S3ObjectStore.fromSettings(settings.storage),
    extractor: options.extractor ?? new AdmZipExtractor(),
    logger: componentLogger(logger, 'materializer'),
  });

  const loader = new HandlerLoader({
    registry,
    modules: materializer,
    resolver: options.handlerResolver ?? new ImportHandlerResolver(),
    configuration: settings.configuration,
    logger: componentLogger(logger, 'loader'),
  });

  const executor = new ActionExecutor({
    resolver,
    loader,
    specGenerator: options.specGenerator,
    defaultParameters: settings.defaultParameters,
    logger: componentLogger(logger, 'executor'),
  });

  return {
    settings,
    logger,
    registry,
    resolver,
    materializer,
    loader,
    executor,
    dispatch: (request) => executor.dispatch(request),
  };
}
