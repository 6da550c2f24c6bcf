/**
 * @module @action-engine/runtime
 *
 * Action engine runtime: registry, routing, module materialization,
 * handler loading and dispatch.
 */

// Engine
export { createActionEngine, type ActionEngine, type ActionEngineOptions } from './engine.js';

// Registry & routing
export { FunctionRegistry } from './registry/function-registry.js';
export {
  PathResolver,
  compilePathTemplate,
  type CompiledTemplate,
  type RouteMatch,
  type RouteResolver,
} from './routing/path-resolver.js';

// Materialization
export {
  ModuleMaterializer,
  READY_MARKER,
  type ModuleState,
  type ModuleProvider,
  type EnsurePresentOptions,
  type ModuleMaterializerOptions,
} from './materialize/module-materializer.js';
export { S3ObjectStore, s3ClientConfig, type ObjectStore } from './materialize/object-store.js';
export { AdmZipExtractor, type ArchiveExtractor } from './materialize/archive-extractor.js';

// Handler loading
export {
  HandlerLoader,
  mergeConfiguration,
  type ActionParameters,
  type BoundFunction,
  type FunctionLoader,
  type HandlerLoaderOptions,
  type LoadOptions,
} from './loader/handler-loader.js';
export {
  ImportHandlerResolver,
  FactoryHandlerResolver,
  resolveModuleEntry,
  type HandlerConstructor,
  type HandlerResolver,
} from './loader/handler-resolver.js';

// Execution
export {
  ActionExecutor,
  normalizeRequestPath,
  normalizeResult,
  type DispatchRequest,
  type ExecuteRequest,
  type ExecutionResult,
  type ExecutorStats,
  type ResultFormat,
  type ActionExecutorOptions,
} from './executor/action-executor.js';

// Configuration & logging
export {
  loadEngineSettings,
  readSettingsFile,
  settingsFromEnv,
  ENV_SETTING_KEYS,
  type LoadSettingsOptions,
} from './config/load-settings.js';
export {
  createEngineLogger,
  componentLogger,
  logLevelFromEnv,
  type EngineLoggerOptions,
  type Logger,
} from './logging.js';
export { createExecutionId, runWithDeadline } from './utils.js';
