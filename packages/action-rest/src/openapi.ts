/**
 * @module @action-engine/rest/openapi
 * OpenAPI 3.1 document generation from the function registry
 */

import { stringify as stringifyYaml } from 'yaml';
import type {
  EngineSettings,
  FunctionDescriptor,
  ParameterSpec,
  PropertySpec,
  ResponseSpec,
  SpecFormat,
  SpecGenerator,
} from '@action-engine/contracts';

export const OPENAPI_VERSION = '3.1.0';
export const DEFAULT_SUMMARY = 'No summary provided';

const BODY_METHODS: ReadonlySet<string> = new Set(['post', 'put', 'patch']);

/**
 * Registry data type → OpenAPI schema. Unknown types map to string.
 */
const TYPE_MAPPING: Readonly<Record<string, OpenAPISchema>> = {
  string: { type: 'string' },
  integer: { type: 'integer' },
  float: { type: 'number' },
  boolean: { type: 'boolean' },
  date: { type: 'string', format: 'date' },
  datetime: { type: 'string', format: 'date-time' },
  list: { type: 'array' },
  dict: { type: 'object' },
};

export interface OpenAPISchema {
  type: string;
  format?: string;
  items?: OpenAPISchema;
  properties?: Record<string, OpenAPISchema>;
}

export interface OpenAPIParameter {
  name: string;
  in: 'path' | 'query' | 'header';
  required: boolean;
  schema: OpenAPISchema;
}

export interface OpenAPIResponse {
  description: string;
  content?: Record<string, { schema: OpenAPISchema }>;
}

export interface OpenAPIOperation {
  summary: string;
  operationId: string;
  parameters: OpenAPIParameter[];
  requestBody?: {
    required: boolean;
    content: Record<string, { schema: OpenAPISchema }>;
  };
  responses: Record<string, OpenAPIResponse>;
}

export interface OpenAPISpec {
  openapi: string;
  info: {
    title: string;
    version: string;
  };
  servers?: Array<{ url: string }>;
  paths: Record<string, Record<string, OpenAPIOperation>>;
}

/**
 * The parts of the engine settings the document is derived from.
 */
export type OpenAPISource = Pick<EngineSettings, 'title' | 'version' | 'servers' | 'basePath' | 'functions'>;

export function mapType(type: string | undefined): OpenAPISchema {
  return { ...(TYPE_MAPPING[type ?? 'string'] ?? { type: 'string' }) };
}

function propertiesSchema(properties: readonly PropertySpec[]): Record<string, OpenAPISchema> {
  const result: Record<string, OpenAPISchema> = {};
  for (const property of properties) {
    result[property.name] = propertySchema(property);
  }
  return result;
}

/**
 * Schema for one property, following nested properties of objects and of
 * arrays of objects.
 */
export function propertySchema(property: PropertySpec): OpenAPISchema {
  const schema = mapType(property.type);

  if (schema.type === 'array' && property.childType) {
    return { type: 'array', items: itemSchema(property.childType, property.properties) };
  }
  if (schema.type === 'object' && property.properties) {
    return { type: 'object', properties: propertiesSchema(property.properties) };
  }
  return schema;
}

function itemSchema(childType: string | undefined, properties?: readonly PropertySpec[]): OpenAPISchema {
  const schema = mapType(childType);
  if (schema.type === 'object' && properties) {
    return { type: 'object', properties: propertiesSchema(properties) };
  }
  return schema;
}

function responseSchema(response: ResponseSpec): OpenAPIResponse {
  if (response.type === 'list') {
    return {
      description: 'Success',
      content: {
        'application/json': {
          schema: { type: 'array', items: itemSchema(response.childType, response.properties) },
        },
      },
    };
  }
  if (response.type === 'dict') {
    return {
      description: 'Success',
      content: {
        'application/json': {
          schema: { type: 'object', properties: propertiesSchema(response.properties ?? []) },
        },
      },
    };
  }
  return { description: 'Success' };
}

function generateOperation(descriptor: FunctionDescriptor, method: string): OpenAPIOperation {
  const parameters: OpenAPIParameter[] = [];
  const bodyParameters: ParameterSpec[] = [];

  for (const parameter of descriptor.parameters) {
    if (parameter.in === 'body' && BODY_METHODS.has(method)) {
      bodyParameters.push(parameter);
      continue;
    }
    parameters.push({
      name: parameter.name,
      // body parameters of GET/DELETE travel in the query string
      in: parameter.in === 'body' ? 'query' : parameter.in,
      required: parameter.required,
      schema: propertySchema(parameter),
    });
  }

  const operation: OpenAPIOperation = {
    summary: descriptor.summary ?? DEFAULT_SUMMARY,
    operationId: descriptor.functionName,
    parameters,
    responses: { '200': responseSchema(descriptor.response) },
  };

  if (bodyParameters.length > 0) {
    operation.requestBody = {
      required: true,
      content: {
        'application/json': {
          schema: { type: 'object', properties: propertiesSchema(bodyParameters) },
        },
      },
    };
  }

  return operation;
}

/**
 * Generate an OpenAPI 3.1 document for every registered function.
 *
 * @example
 * ```typescript
 * const spec = generateOpenAPI(settings);
 * spec.paths['/v1/users/{id}'].get.operationId; // 'get_user'
 * ```
 */
export function generateOpenAPI(source: OpenAPISource): OpenAPISpec {
  const spec: OpenAPISpec = {
    openapi: OPENAPI_VERSION,
    info: {
      title: source.title,
      version: source.version,
    },
    paths: {},
  };

  if (source.servers.length > 0) {
    spec.servers = source.servers.map((url) => ({ url }));
  }

  for (const descriptor of source.functions) {
    const path = `${source.basePath}${descriptor.path}`;
    const method = descriptor.method.toLowerCase();
    const pathItem = spec.paths[path] ?? {};
    pathItem[method] = generateOperation(descriptor, method);
    spec.paths[path] = pathItem;
  }

  return spec;
}

export function generateOpenAPIYaml(source: OpenAPISource): string {
  return stringifyYaml(generateOpenAPI(source));
}

export function generateOpenAPIJson(source: OpenAPISource): string {
  return JSON.stringify(generateOpenAPI(source), null, 2);
}

/**
 * SpecGenerator bound to one settings object; plugs into `createActionEngine`.
 */
export class OpenAPIGenerator implements SpecGenerator {
  constructor(private readonly source: OpenAPISource) {}

  generate(format: SpecFormat): string {
    return format === 'yaml' ? generateOpenAPIYaml(this.source) : generateOpenAPIJson(this.source);
  }
}
