/**
 * @module @action-engine/runtime/utils
 *
 * Utility functions shared by the engine components.
 */

import { randomBytes } from 'node:crypto';
import { AbortError, TimeoutError } from '@action-engine/contracts';

/**
 * Create unique execution ID.
 * Format: exec_{pid}_{timestamp}_{random}
 *
 * @example "exec_12345_1703088000000_a1b2c3d4"
 */
export function createExecutionId(): string {
  const random = randomBytes(4).toString('hex');
  return `exec_${process.pid}_${Date.now()}_${random}`;
}

/**
 * Plain object check: `{}` literals and `Object.create(null)`, not class instances.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Throw AbortError when the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, message?: string): void {
  if (signal?.aborted) {
    throw new AbortError(message);
  }
}

/**
 * Run a task under an optional deadline.
 *
 * The task receives a signal that fires when the deadline passes or the
 * parent signal aborts. The timer and the parent listener are removed once
 * the task settles, so nothing outlives the call.
 */
export async function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs?: number,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort();

  if (parentSignal?.aborted) {
    throw new AbortError('Execution aborted before start');
  }
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    if (timeoutMs === undefined) {
      return await task(controller.signal);
    }

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(`Timeout after ${timeoutMs}ms`, timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
