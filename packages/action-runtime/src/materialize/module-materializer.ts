/**
 * @module @action-engine/runtime/materialize/module-materializer
 *
 * Guarantees an action module is unpacked under the extract root before its
 * handler is loaded.
 *
 * A module directory counts as ready only when it holds the ready marker.
 * Archives are unpacked into a staging directory, the marker is written there,
 * and the staged module directory is renamed into place last, so a crash in
 * the middle never leaves a directory that looks ready.
 *
 * Concurrent calls for one module share a single in-flight materialization.
 * It runs under its own abort controller and is aborted only once every
 * caller waiting on it has aborted.
 */

import { access, mkdir, mkdtemp, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  AbortError,
  ExtractError,
  FetchError,
  isActionError,
  moduleNameSchema,
} from '@action-engine/contracts';
import type { Logger } from '../logging.js';
import { throwIfAborted } from '../utils.js';
import type { ArchiveExtractor } from './archive-extractor.js';
import type { ObjectStore } from './object-store.js';

export const READY_MARKER = '.materialized.json';

export type ModuleState = 'absent' | 'fetching' | 'extracting' | 'ready';

export interface EnsurePresentOptions {
  signal?: AbortSignal;
}

/**
 * Anything that can hand out a local directory for a module.
 */
export interface ModuleProvider {
  ensurePresent(moduleName: string, options?: EnsurePresentOptions): Promise<string>;
}

export interface ModuleMaterializerOptions {
  /** Bucket holding `<moduleName>.zip` archives */
  bucket?: string;
  /** Where downloaded archives are written */
  archiveDir: string;
  /** Root under which modules are unpacked */
  extractDir: string;
  objectStore: ObjectStore;
  extractor: ArchiveExtractor;
  logger: Logger;
}

interface Flight {
  task: Promise<string>;
  controller: AbortController;
  waiters: number;
}

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && 'code' in error && codes.includes(String(error.code));
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

export class ModuleMaterializer implements ModuleProvider {
  private readonly inflight = new Map<string, Flight>();
  private readonly phases = new Map<string, ModuleState>();

  constructor(private readonly options: ModuleMaterializerOptions) {}

  /**
   * Local directory of the module, materializing it on first use.
   *
   * @throws FetchError when the name is invalid or the archive cannot be downloaded
   * @throws ExtractError when the archive is malformed or lacks `<moduleName>/`
   * @throws AbortError when the signal fires before the module is in place
   */
  ensurePresent(moduleName: string, options: EnsurePresentOptions = {}): Promise<string> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new AbortError(`Materialization of ${moduleName} aborted`));
    }

    let flight = this.inflight.get(moduleName);
    if (flight && !flight.controller.signal.aborted) {
      this.options.logger.debug({ moduleName }, 'Joining in-flight materialization');
    } else {
      flight = this.start(moduleName);
    }
    return this.join(moduleName, flight, signal);
  }

  /**
   * Current state of a module, for diagnostics.
   */
  async state(moduleName: string): Promise<ModuleState> {
    const phase = this.phases.get(moduleName);
    if (phase) {
      return phase;
    }
    if (!moduleNameSchema.safeParse(moduleName).success) {
      return 'absent';
    }
    return (await this.isReady(this.modulePath(moduleName))) ? 'ready' : 'absent';
  }

  modulePath(moduleName: string): string {
    return path.join(this.options.extractDir, moduleName);
  }

  private start(moduleName: string): Flight {
    const controller = new AbortController();
    const flight: Flight = {
      task: this.ensureReady(moduleName, controller.signal).finally(() => {
        if (this.inflight.get(moduleName) === flight) {
          this.inflight.delete(moduleName);
          this.phases.delete(moduleName);
        }
      }),
      controller,
      waiters: 0,
    };
    this.inflight.set(moduleName, flight);
    return flight;
  }

  /**
   * Wait on a shared materialization. An abort rejects only this caller; the
   * shared task is aborted when its last waiter leaves.
   */
  private join(moduleName: string, flight: Flight, signal?: AbortSignal): Promise<string> {
    flight.waiters += 1;
    if (!signal) {
      return flight.task;
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        flight.waiters -= 1;
        if (flight.waiters === 0) {
          this.options.logger.debug({ moduleName }, 'Last waiter aborted, cancelling materialization');
          flight.controller.abort();
        }
        reject(new AbortError(`Materialization of ${moduleName} aborted`));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      flight.task.then(
        (moduleDir) => {
          signal.removeEventListener('abort', onAbort);
          resolve(moduleDir);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async ensureReady(moduleName: string, signal?: AbortSignal): Promise<string> {
    const parsed = moduleNameSchema.safeParse(moduleName);
    if (!parsed.success) {
      throw new FetchError(`Invalid module name: ${moduleName}`, moduleName);
    }

    const moduleDir = this.modulePath(moduleName);
    if (await this.isReady(moduleDir)) {
      this.options.logger.debug({ moduleName, moduleDir }, 'Module already present');
      return moduleDir;
    }

    try {
      await this.materialize(moduleName, moduleDir, signal);
    } catch (error) {
      this.options.logger.error({ err: error, moduleName }, 'Module materialization failed');
      throw error;
    }
    return moduleDir;
  }

  private async isReady(moduleDir: string): Promise<boolean> {
    try {
      await access(path.join(moduleDir, READY_MARKER));
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        return false;
      }
      throw error;
    }
  }

  private async materialize(moduleName: string, moduleDir: string, signal?: AbortSignal): Promise<void> {
    const { bucket, archiveDir, extractDir, logger } = this.options;
    this.phases.set(moduleName, 'fetching');
    throwIfAborted(signal, `Materialization of ${moduleName} aborted`);

    if (!bucket) {
      throw new FetchError(`No bucket configured to fetch module ${moduleName}`, moduleName);
    }

    const key = `${moduleName}.zip`;
    const archivePath = path.join(archiveDir, key);
    for (const dir of [archiveDir, extractDir]) {
      try {
        await mkdir(dir, { recursive: true });
      } catch (error) {
        throw new FetchError(`Failed to prepare ${dir}: ${reasonOf(error)}`, moduleName, { path: dir }, error);
      }
    }

    logger.info({ moduleName, bucket, key }, 'Fetching module archive');
    let archive: Uint8Array;
    try {
      archive = await this.options.objectStore.getObject(bucket, key, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortError(`Materialization of ${moduleName} aborted`);
      }
      throw new FetchError(
        `Failed to fetch s3://${bucket}/${key}: ${reasonOf(error)}`,
        moduleName,
        { bucket, key },
        error
      );
    }
    try {
      await writeFile(archivePath, archive);
    } catch (error) {
      throw new FetchError(
        `Failed to write archive ${archivePath}: ${reasonOf(error)}`,
        moduleName,
        { path: archivePath },
        error
      );
    }

    throwIfAborted(signal, `Materialization of ${moduleName} aborted`);
    this.phases.set(moduleName, 'extracting');

    let stagingDir: string;
    try {
      stagingDir = await mkdtemp(path.join(extractDir, `.staging-${moduleName}-`));
    } catch (error) {
      throw new ExtractError(
        `Failed to create staging directory in ${extractDir}: ${reasonOf(error)}`,
        moduleName,
        { path: extractDir },
        error
      );
    }
    try {
      try {
        await this.options.extractor.extractAll(archivePath, stagingDir);
      } catch (error) {
        throw new ExtractError(`Failed to extract ${archivePath}: ${reasonOf(error)}`, moduleName, { archivePath }, error);
      }

      const stagedModuleDir = path.join(stagingDir, moduleName);
      if (!(await isDirectory(stagedModuleDir))) {
        throw new ExtractError(
          `Archive ${key} has no top-level directory ${moduleName}`,
          moduleName,
          { archivePath }
        );
      }

      throwIfAborted(signal, `Materialization of ${moduleName} aborted`);
      await this.writeMarker(stagedModuleDir, { moduleName, bucket, key });

      if (await this.isReady(moduleDir)) {
        logger.debug({ moduleName, moduleDir }, 'Module materialized concurrently, keeping it');
        return;
      }
      if (await isDirectory(moduleDir)) {
        logger.warn({ moduleName, moduleDir }, 'Replacing module directory without ready marker');
        await rm(moduleDir, { recursive: true, force: true });
      }
      await rename(stagedModuleDir, moduleDir);
      logger.info({ moduleName, moduleDir }, 'Module materialized');
    } catch (error) {
      if (isActionError(error)) {
        throw error;
      }
      throw new ExtractError(`Failed to install module ${moduleName}: ${reasonOf(error)}`, moduleName, { archivePath }, error);
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
  }

  private async writeMarker(moduleDir: string, source: { moduleName: string; bucket: string; key: string }): Promise<void> {
    const markerPath = path.join(moduleDir, READY_MARKER);
    const tempPath = `${markerPath}.tmp`;
    const content = { ...source, materializedAt: new Date().toISOString() };
    await writeFile(tempPath, `${JSON.stringify(content, null, 2)}\n`, 'utf8');
    await rename(tempPath, markerPath);
  }
}
