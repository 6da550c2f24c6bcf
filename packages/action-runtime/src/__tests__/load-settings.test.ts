/**
 * @module @action-engine/runtime/__tests__/load-settings
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ConfigError } from '@action-engine/contracts';
import { loadEngineSettings, readSettingsFile, settingsFromEnv } from '../config/load-settings.js';
import { logLevelFromEnv } from '../logging.js';

const yamlSettings = [
  'title: Orders API',
  'version: 2.0.0',
  'servers:',
  '  - https://api.example.test',
  'base_path: /v2',
  'configuration:',
  '  table: orders',
  'funct_bucket_name: file-bucket',
  'tenant: test-tenant',
  'functions:',
  '  - function_name: list_orders',
  '    module_name: orders',
  '    class_name: OrderActions',
  '    path: /orders',
  '    method: get',
  '',
].join('\n');

describe('loadEngineSettings', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'settings-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should read a YAML settings file', async () => {
    const file = path.join(root, 'engine.yaml');
    await writeFile(file, yamlSettings, 'utf8');

    const settings = await loadEngineSettings({ file, env: {} });

    expect(settings.title).toBe('Orders API');
    expect(settings.basePath).toBe('/v2');
    expect(settings.storage.bucket).toBe('file-bucket');
    expect(settings.functions[0]?.method).toBe('GET');
    expect(settings.defaultParameters).toEqual({ tenant: 'test-tenant' });
  });

  it('should read a JSON settings file', async () => {
    const file = path.join(root, 'engine.json');
    await writeFile(file, JSON.stringify({ title: 'Json', version: '1', functions: [] }), 'utf8');

    const settings = await loadEngineSettings({ file, env: {} });

    expect(settings.title).toBe('Json');
    expect(settings.servers).toEqual([]);
  });

  it('should overlay environment variables and overrides', async () => {
    const file = path.join(root, 'engine.yml');
    await writeFile(file, yamlSettings, 'utf8');

    const settings = await loadEngineSettings({
      file,
      env: {
        ACTION_ENGINE_BUCKET: 'env-bucket',
        ACTION_ENGINE_EXTRACT_DIR: '/srv/functs',
        AWS_ACCESS_KEY_ID: 'test-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
      },
      overrides: { title: 'Overridden' },
    });

    expect(settings.title).toBe('Overridden');
    expect(settings.storage).toEqual({
      bucket: 'env-bucket',
      region: undefined,
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
    });
    expect(settings.paths.extractDir).toBe('/srv/functs');
  });

  it('should raise ConfigError for unreadable files', async () => {
    await expect(loadEngineSettings({ file: path.join(root, 'missing.json'), env: {} })).rejects.toBeInstanceOf(
      ConfigError
    );
  });

  it('should raise ConfigError when the file is not a mapping', async () => {
    const file = path.join(root, 'list.yaml');
    await writeFile(file, '- one\n- two\n', 'utf8');

    await expect(readSettingsFile(file)).rejects.toThrow(`Settings file ${file} must contain a mapping`);
  });

  it('should raise ConfigError for invalid settings', async () => {
    await expect(loadEngineSettings({ env: {}, overrides: { title: 'No version' } })).rejects.toThrow(
      'Invalid engine settings: version: Required'
    );
  });
});

describe('settingsFromEnv', () => {
  it('should map known variables and skip empty ones', () => {
    expect(
      settingsFromEnv({ ACTION_ENGINE_REGION: 'eu-west-1', ACTION_ENGINE_ARCHIVE_DIR: '', HOME: '/root' })
    ).toEqual({ region_name: 'eu-west-1' });
  });
});

describe('logLevelFromEnv', () => {
  it('should accept pino levels case-insensitively', () => {
    expect(logLevelFromEnv({ ACTION_ENGINE_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('should fall back to info', () => {
    expect(logLevelFromEnv({})).toBe('info');
    expect(logLevelFromEnv({ ACTION_ENGINE_LOG_LEVEL: 'loud' })).toBe('info');
  });
});
