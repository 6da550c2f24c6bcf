/**
 * @module @action-engine/contracts/errors
 *
 * Error taxonomy for the action engine.
 *
 * Every failure carries a stable `code` so transports can map it to a status
 * without string matching on messages.
 */

export type ActionErrorCode =
  | 'ROUTE_NOT_FOUND'
  | 'FUNCTION_NOT_FOUND'
  | 'FETCH_FAILED'
  | 'EXTRACT_FAILED'
  | 'LOAD_FAILED'
  | 'INVOCATION_FAILED'
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'ABORTED'
  | 'TIMEOUT'
  | 'UNKNOWN_ERROR';

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<ActionErrorCode>([
  'ROUTE_NOT_FOUND',
  'FUNCTION_NOT_FOUND',
  'FETCH_FAILED',
  'EXTRACT_FAILED',
  'LOAD_FAILED',
  'INVOCATION_FAILED',
  'CONFIG_ERROR',
  'VALIDATION_ERROR',
  'ABORTED',
  'TIMEOUT',
  'UNKNOWN_ERROR',
]);

/**
 * Type guard for ActionErrorCode.
 */
export function isKnownErrorCode(code: unknown): code is ActionErrorCode {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

/**
 * JSON-serializable form of an error, safe to hand to a transport.
 */
export interface SerializedActionError {
  name: string;
  message: string;
  code: ActionErrorCode;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base action engine error.
 */
export class ActionError extends Error {
  readonly code: ActionErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ActionErrorCode = 'UNKNOWN_ERROR',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ActionError';
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedActionError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

export function isActionError(error: unknown): error is ActionError {
  return error instanceof ActionError;
}

/**
 * No registered path template matches the request path, or no path was given.
 */
export class RoutingError extends ActionError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message, 'ROUTE_NOT_FOUND', path === undefined ? undefined : { path });
    this.name = 'RoutingError';
    this.path = path;
  }
}

/**
 * Function name is not present in the registry.
 */
export class NotFoundError extends ActionError {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`${functionName} is not supported`, 'FUNCTION_NOT_FOUND', { functionName });
    this.name = 'NotFoundError';
    this.functionName = functionName;
  }
}

/**
 * Module archive could not be fetched from object storage.
 */
export class FetchError extends ActionError {
  readonly moduleName: string;

  constructor(message: string, moduleName: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'FETCH_FAILED', { moduleName, ...details }, { cause });
    this.name = 'FetchError';
    this.moduleName = moduleName;
  }
}

/**
 * Module archive is corrupt or does not contain the expected module directory.
 */
export class ExtractError extends ActionError {
  readonly moduleName: string;

  constructor(message: string, moduleName: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'EXTRACT_FAILED', { moduleName, ...details }, { cause });
    this.name = 'ExtractError';
    this.moduleName = moduleName;
  }
}

/**
 * Handler class could not be resolved, configured or constructed.
 */
export class LoadError extends ActionError {
  readonly functionName: string;

  constructor(message: string, functionName: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'LOAD_FAILED', { functionName, ...details }, { cause });
    this.name = 'LoadError';
    this.functionName = functionName;
  }
}

/**
 * The handler itself failed. The message is the handler's own message;
 * the original error is kept as `cause`.
 */
export class InvocationError extends ActionError {
  readonly functionName: string;

  constructor(functionName: string, cause: unknown) {
    super(
      cause instanceof Error ? cause.message : String(cause),
      'INVOCATION_FAILED',
      { functionName },
      { cause }
    );
    this.name = 'InvocationError';
    this.functionName = functionName;
  }
}

/**
 * Engine settings are missing or malformed.
 */
export class ConfigError extends ActionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Request input failed validation.
 */
export class ValidationError extends ActionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Operation was aborted via signal.
 */
export class AbortError extends ActionError {
  constructor(message = 'Operation aborted') {
    super(message, 'ABORTED');
    this.name = 'AbortError';
  }
}

/**
 * Operation exceeded its deadline.
 */
export class TimeoutError extends ActionError {
  readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number) {
    super(message, 'TIMEOUT', { timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Normalize any thrown value to SerializedActionError.
 */
export function normalizeError(error: unknown): SerializedActionError {
  if (isActionError(error)) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    const rawCode = 'code' in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code: isKnownErrorCode(rawCode) ? rawCode : 'UNKNOWN_ERROR',
      stack: error.stack,
    };
  }

  return {
    name: 'Error',
    message: String(error),
    code: 'UNKNOWN_ERROR',
  };
}

/**
 * Map error code to HTTP status code.
 */
export function httpStatusForError(code: ActionErrorCode | undefined): number {
  switch (code) {
    case 'ROUTE_NOT_FOUND':
    case 'FUNCTION_NOT_FOUND':
      return 404;
    case 'VALIDATION_ERROR':
      return 400;
    case 'FETCH_FAILED':
      return 502; // Bad Gateway (object storage)
    case 'TIMEOUT':
      return 504;
    case 'ABORTED':
      return 499; // Client Closed Request
    case 'EXTRACT_FAILED':
    case 'LOAD_FAILED':
    case 'INVOCATION_FAILED':
    case 'CONFIG_ERROR':
    default:
      return 500;
  }
}
