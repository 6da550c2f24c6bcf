/**
 * @module @action-engine/contracts/__tests__/schema
 * Tests for registry and settings validation
 */

import { describe, it, expect } from 'vitest';
import {
  parseEngineSettings,
  parseFunctionRegistry,
  DEFAULT_ARCHIVE_DIR,
  DEFAULT_EXTRACT_DIR,
} from '../schema.js';
import { ConfigError } from '../errors.js';

const getUser = {
  function_name: 'get_user',
  module_name: 'users',
  class_name: 'UserActions',
  path: '/users/{id}',
  method: 'get',
  summary: 'Fetch one user',
  parameters: [{ name: 'id', in: 'path', type: 'string', required: true }],
  response: {
    type: 'dict',
    properties: [
      { name: 'id', type: 'string' },
      { name: 'tags', type: 'list', child_type: 'string' },
    ],
  },
  configuration: { table: 'users' },
};

describe('parseFunctionRegistry', () => {
  it('should convert deployment keys to descriptors', () => {
    const [descriptor] = parseFunctionRegistry([getUser]);

    expect(descriptor).toEqual({
      functionName: 'get_user',
      moduleName: 'users',
      className: 'UserActions',
      path: '/users/{id}',
      method: 'GET',
      summary: 'Fetch one user',
      parameters: [{ name: 'id', in: 'path', type: 'string', required: true }],
      response: {
        type: 'dict',
        properties: [
          { name: 'id', type: 'string' },
          { name: 'tags', type: 'list', childType: 'string' },
        ],
      },
      configuration: { table: 'users' },
    });
  });

  it('should default parameters, response and required flags', () => {
    const [descriptor] = parseFunctionRegistry([
      {
        function_name: 'ping',
        module_name: 'health',
        class_name: 'Health',
        path: '/ping',
        method: 'GET',
      },
    ]);

    expect(descriptor?.parameters).toEqual([]);
    expect(descriptor?.response).toEqual({ type: 'string' });
  });

  it('should keep nested body properties', () => {
    const [descriptor] = parseFunctionRegistry([
      {
        ...getUser,
        function_name: 'create_user',
        method: 'POST',
        path: '/users',
        parameters: [
          {
            name: 'profile',
            in: 'body',
            type: 'dict',
            properties: [{ name: 'address', type: 'dict', properties: [{ name: 'city', type: 'string' }] }],
          },
        ],
      },
    ]);

    expect(descriptor?.parameters[0]?.required).toBe(false);
    expect(descriptor?.parameters[0]?.properties?.[0]?.properties?.[0]?.name).toBe('city');
  });

  it('should reject duplicate function names', () => {
    expect(() => parseFunctionRegistry([getUser, getUser])).toThrow(
      'Invalid function registry: 1.function_name: Duplicate function name: get_user'
    );
  });

  it('should reject unsupported methods', () => {
    expect(() => parseFunctionRegistry([{ ...getUser, method: 'HEAD' }])).toThrow(ConfigError);
  });

  it('should reject module names that are not a single path segment', () => {
    expect(() => parseFunctionRegistry([{ ...getUser, module_name: '../etc' }])).toThrow(
      'Module name must be a single path segment'
    );
  });

  it('should reject function names that cannot be method names', () => {
    expect(() => parseFunctionRegistry([{ ...getUser, function_name: 'get-user' }])).toThrow(
      ConfigError
    );
  });
});

describe('parseEngineSettings', () => {
  const baseSettings = {
    title: 'Orders API',
    version: '1.0.0',
    servers: ['https://api.example.test'],
    base_path: '/beta',
    configuration: { region: 'eu' },
    functions: [getUser],
    funct_bucket_name: 'test-bucket',
  };

  it('should build settings with defaults for paths', () => {
    const settings = parseEngineSettings(baseSettings);

    expect(settings.title).toBe('Orders API');
    expect(settings.basePath).toBe('/beta');
    expect(settings.storage.bucket).toBe('test-bucket');
    expect(settings.paths).toEqual({
      archiveDir: DEFAULT_ARCHIVE_DIR,
      extractDir: DEFAULT_EXTRACT_DIR,
    });
    expect(settings.functions).toHaveLength(1);
  });

  it('should forward non-system keys as default parameters', () => {
    const settings = parseEngineSettings({
      ...baseSettings,
      endpoint_id: 'test-endpoint',
      aws_access_key_id: 'test-key',
    });

    expect(settings.defaultParameters).toEqual({ endpoint_id: 'test-endpoint' });
    expect(settings.storage.accessKeyId).toBe('test-key');
  });

  it('should freeze the settings object deeply', () => {
    const settings = parseEngineSettings(baseSettings);

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.configuration)).toBe(true);
    expect(Object.isFrozen(settings.functions[0])).toBe(true);
  });

  it('should list every invalid setting', () => {
    let caught: unknown;
    try {
      parseEngineSettings({ servers: 'nope' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.details?.issues : undefined).toEqual([
      'title: Required',
      'version: Required',
      'servers: Expected array, received string',
    ]);
  });
});
