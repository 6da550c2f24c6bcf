/**
 * @module @action-engine/contracts
 *
 * Shared data model, validation schemas and error taxonomy for the action engine.
 */

// Types
export type {
  HttpMethod,
  ParameterLocation,
  DataType,
  PropertySpec,
  ParameterSpec,
  ResponseSpec,
  FunctionDescriptor,
  StorageSettings,
  MaterializationPaths,
  EngineSettings,
  SpecFormat,
  SpecGenerator,
} from './types.js';

export { HTTP_METHODS } from './types.js';

// Tagged lookup result
export { type Lookup, found, notFound, isFound } from './lookup.js';

// Validation
export {
  DEFAULT_ARCHIVE_DIR,
  DEFAULT_EXTRACT_DIR,
  SYSTEM_SETTING_KEYS,
  moduleNameSchema,
  propertySpecSchema,
  parameterSpecSchema,
  responseSpecSchema,
  functionDescriptorSchema,
  functionRegistrySchema,
  engineSettingsSchema,
  formatIssues,
  parseFunctionRegistry,
  parseEngineSettings,
  deepFreeze,
} from './schema.js';

// Errors
export {
  type ActionErrorCode,
  type SerializedActionError,
  ActionError,
  RoutingError,
  NotFoundError,
  FetchError,
  ExtractError,
  LoadError,
  InvocationError,
  ConfigError,
  ValidationError,
  AbortError,
  TimeoutError,
  isActionError,
  isKnownErrorCode,
  normalizeError,
  httpStatusForError,
} from './errors.js';
