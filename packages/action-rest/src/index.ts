/**
 * @module @action-engine/rest
 *
 * OpenAPI generation and Fastify binding for the action engine.
 */

export {
  OpenAPIGenerator,
  generateOpenAPI,
  generateOpenAPIYaml,
  generateOpenAPIJson,
  mapType,
  propertySchema,
  OPENAPI_VERSION,
  DEFAULT_SUMMARY,
  type OpenAPISpec,
  type OpenAPISchema,
  type OpenAPIOperation,
  type OpenAPIParameter,
  type OpenAPIResponse,
  type OpenAPISource,
} from './openapi.js';

export { mountActionRoutes, type MountActionRoutesOptions } from './route-mounter.js';
