/**
 * @module @action-engine/runtime/config/load-settings
 *
 * Settings file + environment overlay → frozen EngineSettings.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, parseEngineSettings, type EngineSettings } from '@action-engine/contracts';
import { isPlainObject } from '../utils.js';

/**
 * Environment variable → deployment setting key.
 */
export const ENV_SETTING_KEYS: Readonly<Record<string, string>> = {
  ACTION_ENGINE_BUCKET: 'funct_bucket_name',
  ACTION_ENGINE_ARCHIVE_DIR: 'funct_zip_path',
  ACTION_ENGINE_EXTRACT_DIR: 'funct_extract_path',
  ACTION_ENGINE_REGION: 'region_name',
  AWS_ACCESS_KEY_ID: 'aws_access_key_id',
  AWS_SECRET_ACCESS_KEY: 'aws_secret_access_key',
};

export interface LoadSettingsOptions {
  /** JSON or YAML settings file */
  file?: string;
  /** Environment to overlay (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Applied last */
  overrides?: Record<string, unknown>;
}

/**
 * Read a settings file. `.yaml`/`.yml` files are parsed as YAML, anything else as JSON.
 * @throws ConfigError when the file cannot be read or does not hold a mapping
 */
export async function readSettingsFile(file: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read settings file ${file}: ${reason}`, { file });
  }

  const extension = path.extname(file).toLowerCase();
  let parsed: unknown;
  try {
    parsed = extension === '.yaml' || extension === '.yml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse settings file ${file}: ${reason}`, { file });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Settings file ${file} must contain a mapping`, { file });
  }
  return parsed;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const settings: Record<string, string> = {};
  for (const [variable, key] of Object.entries(ENV_SETTING_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      settings[key] = value;
    }
  }
  return settings;
}

/**
 * Load engine settings: file, then environment, then overrides.
 * @throws ConfigError listing every invalid setting
 */
export async function loadEngineSettings(options: LoadSettingsOptions = {}): Promise<EngineSettings> {
  const fromFile = options.file ? await readSettingsFile(options.file) : {};
  const fromEnv = settingsFromEnv(options.env ?? process.env);

  return parseEngineSettings({ ...fromFile, ...fromEnv, ...options.overrides });
}
