/**
 * @module @action-engine/runtime/logging
 *
 * pino-based engine logger. Components log through children bound to
 * `{ component }`; errors are always logged under `err` so the pino error
 * serializer keeps the stack.
 */

import { pino, stdSerializers, stdTimeFunctions } from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';
import { z } from 'zod';

export type { Logger } from 'pino';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export interface EngineLoggerOptions {
  /** Logger name (default: action-engine) */
  name?: string;
  /** Minimum level (default: info) */
  level?: LevelWithSilent;
  /** Custom destination, e.g. a file or an in-memory stream */
  destination?: DestinationStream;
}

/**
 * Create the root engine logger.
 */
export function createEngineLogger(options: EngineLoggerOptions = {}): Logger {
  const loggerOptions = {
    name: options.name ?? 'action-engine',
    level: options.level ?? 'info',
    timestamp: stdTimeFunctions.isoTime,
    serializers: { err: stdSerializers.err },
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

/**
 * Child logger for one engine component.
 */
export function componentLogger(
  parent: Logger,
  component: string,
  bindings: Record<string, unknown> = {}
): Logger {
  return parent.child({ component, ...bindings });
}

/**
 * Read the log level from `ACTION_ENGINE_LOG_LEVEL`, falling back to `info`
 * when the variable is unset or not a pino level.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const parsed = logLevelSchema.safeParse(env.ACTION_ENGINE_LOG_LEVEL?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}
