/**
 * @module @action-engine/contracts/types
 * Function registry and engine settings data model
 */

/**
 * HTTP methods an action function can be declared under.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * Where a declared parameter travels in the request.
 */
export type ParameterLocation = 'path' | 'query' | 'header' | 'body';

/**
 * Data types understood by the registry.
 * Any other type name is accepted and documented as a string.
 */
export type DataType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'list'
  | 'dict';

/**
 * Nested property of an object or array value.
 */
export interface PropertySpec {
  name: string;
  type: string;
  /** Element type when `type` is `list` */
  childType?: string;
  /** Member properties when `type` (or `childType`) is `dict` */
  properties?: PropertySpec[];
}

/**
 * Declared input parameter of an action function.
 */
export interface ParameterSpec extends PropertySpec {
  in: ParameterLocation;
  required: boolean;
}

/**
 * Declared response shape of an action function.
 */
export interface ResponseSpec {
  /** `list`, `dict`, or a primitive data type */
  type: string;
  childType?: string;
  properties?: PropertySpec[];
}

/**
 * One registered action function.
 *
 * Immutable once the registry is built.
 */
export interface FunctionDescriptor {
  /** Unique key; also the handler method name */
  functionName: string;
  /** Remote module (archive) implementing the function */
  moduleName: string;
  /** Handler class exported by the module */
  className: string;
  /** Path template with `{name}` placeholders */
  path: string;
  method: HttpMethod;
  summary?: string;
  parameters: ParameterSpec[];
  response: ResponseSpec;
  /** Per-function configuration overrides */
  configuration?: Record<string, unknown>;
}

/**
 * Object storage location and credentials.
 */
export interface StorageSettings {
  bucket?: string;
  region?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * Local directories used for module materialization.
 */
export interface MaterializationPaths {
  /** Where downloaded archives are staged */
  archiveDir: string;
  /** Extraction root; one directory per module */
  extractDir: string;
}

/**
 * Engine settings, built once at startup and shared by reference.
 */
export interface EngineSettings {
  readonly title: string;
  readonly version: string;
  readonly servers: readonly string[];
  readonly basePath: string;
  /** Base handler configuration, overlaid by function-level overrides */
  readonly configuration: Readonly<Record<string, unknown>>;
  readonly functions: readonly FunctionDescriptor[];
  readonly storage: Readonly<StorageSettings>;
  readonly paths: Readonly<MaterializationPaths>;
  /** Non-system settings forwarded to every call underneath request parameters */
  readonly defaultParameters: Readonly<Record<string, unknown>>;
}

/**
 * Output format of the API description document.
 */
export type SpecFormat = 'yaml' | 'json';

/**
 * Produces the API description document for a registry.
 */
export interface SpecGenerator {
  generate(format: SpecFormat): string;
}
