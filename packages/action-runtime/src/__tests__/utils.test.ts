/**
 * @module @action-engine/runtime/__tests__/utils
 */

import { describe, it, expect } from 'vitest';
import { AbortError, TimeoutError } from '@action-engine/contracts';
import { createExecutionId, isPlainObject, runWithDeadline } from '../utils.js';

describe('createExecutionId', () => {
  it('should embed pid, timestamp and random suffix', () => {
    const id = createExecutionId();

    expect(id).toMatch(/^exec_\d+_\d+_[0-9a-f]{8}$/);
    expect(id.split('_')[1]).toBe(String(process.pid));
  });

  it('should not repeat', () => {
    expect(createExecutionId()).not.toBe(createExecutionId());
  });
});

describe('isPlainObject', () => {
  it('should accept literals and null-prototype objects only', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Map())).toBe(false);
    expect(isPlainObject('text')).toBe(false);
  });
});

describe('runWithDeadline', () => {
  it('should return the task result', async () => {
    await expect(runWithDeadline(async () => 'done', 100)).resolves.toBe('done');
  });

  it('should reject with TimeoutError and abort the task signal', async () => {
    let taskSignal: AbortSignal | undefined;

    await expect(
      runWithDeadline((signal) => {
        taskSignal = signal;
        return new Promise(() => undefined);
      }, 10)
    ).rejects.toThrow(new TimeoutError('Timeout after 10ms', 10));
    expect(taskSignal?.aborted).toBe(true);
  });

  it('should refuse to start with an aborted parent signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(runWithDeadline(async () => 'never', undefined, controller.signal)).rejects.toBeInstanceOf(
      AbortError
    );
  });

  it('should forward a parent abort to the task', async () => {
    const controller = new AbortController();

    const waitForAbort = (signal: AbortSignal) =>
      new Promise<string>((_, reject) => {
        signal.addEventListener('abort', () => reject(new AbortError('stopped')));
      });

    const pending = runWithDeadline(waitForAbort, undefined, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow(new AbortError('stopped'));
  });
});
