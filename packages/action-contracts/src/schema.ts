/**
 * @module @action-engine/contracts/schema
 * Zod validation schemas for the function registry and engine settings
 *
 * Input uses the deployment setting keys (`function_name`, `funct_bucket_name`, ...);
 * output is the camelCase data model from ./types.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type {
  EngineSettings,
  FunctionDescriptor,
  ParameterSpec,
  PropertySpec,
  ResponseSpec,
} from './types.js';

export const DEFAULT_ARCHIVE_DIR = '/tmp/funct_zips';
export const DEFAULT_EXTRACT_DIR = '/tmp/functs';

/**
 * Setting keys consumed by the engine itself.
 * Every other top-level key is forwarded to action functions as a default parameter.
 */
export const SYSTEM_SETTING_KEYS: readonly string[] = [
  'region_name',
  'aws_access_key_id',
  'aws_secret_access_key',
  'title',
  'version',
  'servers',
  'base_path',
  'configuration',
  'functions',
  'funct_bucket_name',
  'funct_zip_path',
  'funct_extract_path',
];

/**
 * Module names become directory and archive names, so they must be a single path segment.
 */
export const moduleNameSchema = z
  .string()
  .min(1)
  .refine((value) => !/[/\\]/.test(value) && value !== '.' && value !== '..', {
    message: 'Module name must be a single path segment',
  });

export const propertySpecSchema: z.ZodType<PropertySpec, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      type: z.string().min(1),
      child_type: z.string().min(1).optional(),
      properties: z.array(propertySpecSchema).optional(),
    })
    .transform(
      (raw): PropertySpec => ({
        name: raw.name,
        type: raw.type,
        childType: raw.child_type,
        properties: raw.properties,
      })
    )
);

export const parameterSpecSchema: z.ZodType<ParameterSpec, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string().min(1),
    in: z.enum(['path', 'query', 'header', 'body']),
    type: z.string().min(1).default('string'),
    required: z.boolean().default(false),
    child_type: z.string().min(1).optional(),
    properties: z.array(propertySpecSchema).optional(),
  })
  .transform(
    (raw): ParameterSpec => ({
      name: raw.name,
      in: raw.in,
      type: raw.type,
      required: raw.required,
      childType: raw.child_type,
      properties: raw.properties,
    })
  );

export const responseSpecSchema: z.ZodType<ResponseSpec, z.ZodTypeDef, unknown> = z
  .object({
    type: z.string().min(1),
    child_type: z.string().min(1).optional(),
    properties: z.array(propertySpecSchema).optional(),
  })
  .transform(
    (raw): ResponseSpec => ({
      type: raw.type,
      childType: raw.child_type,
      properties: raw.properties,
    })
  );

/**
 * Single registry entry
 */
export const functionDescriptorSchema: z.ZodType<FunctionDescriptor, z.ZodTypeDef, unknown> = z
  .object({
    function_name: z
      .string()
      .regex(/^[A-Za-z_$][\w$]*$/, 'Function name must be a valid method identifier'),
    module_name: moduleNameSchema,
    class_name: z.string().min(1),
    path: z.string().startsWith('/', 'Path template must start with /'),
    method: z
      .string()
      .transform((value) => value.toUpperCase())
      .pipe(z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE'])),
    summary: z.string().optional(),
    parameters: z.array(parameterSpecSchema).default([]),
    response: responseSpecSchema.default({ type: 'string' }),
    configuration: z.record(z.string(), z.unknown()).optional(),
  })
  .transform(
    (raw): FunctionDescriptor => ({
      functionName: raw.function_name,
      moduleName: raw.module_name,
      className: raw.class_name,
      path: raw.path,
      method: raw.method,
      summary: raw.summary,
      parameters: raw.parameters,
      response: raw.response,
      configuration: raw.configuration,
    })
  );

/**
 * Registry: ordered descriptor list with unique function names
 */
export const functionRegistrySchema = z
  .array(functionDescriptorSchema)
  .superRefine((descriptors, ctx) => {
    const seen = new Set<string>();
    descriptors.forEach((descriptor, index) => {
      if (seen.has(descriptor.functionName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'function_name'],
          message: `Duplicate function name: ${descriptor.functionName}`,
        });
      }
      seen.add(descriptor.functionName);
    });
  });

/**
 * Engine settings as deployed
 */
export const engineSettingsSchema = z
  .object({
    title: z.string().min(1),
    version: z.string().min(1),
    servers: z.array(z.string().min(1)).default([]),
    base_path: z.string().default(''),
    configuration: z.record(z.string(), z.unknown()).default({}),
    functions: functionRegistrySchema.default([]),
    funct_bucket_name: z.string().min(1).optional(),
    funct_zip_path: z.string().min(1).default(DEFAULT_ARCHIVE_DIR),
    funct_extract_path: z.string().min(1).default(DEFAULT_EXTRACT_DIR),
    region_name: z.string().min(1).optional(),
    aws_access_key_id: z.string().min(1).optional(),
    aws_secret_access_key: z.string().min(1).optional(),
  })
  .passthrough();

/**
 * Format zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Parse a registry descriptor list.
 * @throws ConfigError on invalid input or duplicate function names
 */
export function parseFunctionRegistry(input: unknown): FunctionDescriptor[] {
  const result = functionRegistrySchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid function registry: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Parse deployment settings into a frozen EngineSettings object.
 * @throws ConfigError listing every invalid setting
 */
export function parseEngineSettings(input: unknown): EngineSettings {
  const result = engineSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid engine settings: ${issues.join('; ')}`, { issues });
  }

  const raw = result.data;
  const defaultParameters: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!SYSTEM_SETTING_KEYS.includes(key)) {
      defaultParameters[key] = value;
    }
  }

  return deepFreeze<EngineSettings>({
    title: raw.title,
    version: raw.version,
    servers: raw.servers,
    basePath: raw.base_path,
    configuration: raw.configuration,
    functions: raw.functions,
    storage: {
      bucket: raw.funct_bucket_name,
      region: raw.region_name,
      accessKeyId: raw.aws_access_key_id,
      secretAccessKey: raw.aws_secret_access_key,
    },
    paths: {
      archiveDir: raw.funct_zip_path,
      extractDir: raw.funct_extract_path,
    },
    defaultParameters,
  });
}

/**
 * Recursively freeze plain data.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
