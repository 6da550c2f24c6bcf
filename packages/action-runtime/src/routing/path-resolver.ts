/**
 * @module @action-engine/runtime/routing/path-resolver
 *
 * Maps request paths onto registered functions through `{name}` templates.
 * Routes are tried in declaration order and the first full match wins, so a
 * literal route declared after a placeholder route of the same shape is
 * shadowed by it.
 */

import {
  ConfigError,
  found,
  notFound,
  type FunctionDescriptor,
  type Lookup,
} from '@action-engine/contracts';

const PLACEHOLDER = /\{(\w+)\}/g;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export interface CompiledTemplate {
  template: string;
  pattern: RegExp;
  parameterNames: readonly string[];
}

export interface RouteMatch {
  descriptor: FunctionDescriptor;
  pathParameters: Record<string, string>;
}

export interface RouteResolver {
  resolve(path: string): Lookup<RouteMatch>;
}

function escapeLiteral(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * Compile a path template into an anchored pattern.
 *
 * @example
 * compilePathTemplate('/users/{id}').pattern.exec('/users/42') // captures '42'
 */
export function compilePathTemplate(template: string): CompiledTemplate {
  const parameterNames: string[] = [];
  let source = '';
  let lastIndex = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1] ?? '';
    const index = match.index ?? 0;

    if (parameterNames.includes(name)) {
      throw new ConfigError(`Duplicate placeholder {${name}} in path ${template}`, { template });
    }

    source += escapeLiteral(template.slice(lastIndex, index));
    source += '([^/]+)';
    parameterNames.push(name);
    lastIndex = index + match[0].length;
  }
  source += escapeLiteral(template.slice(lastIndex));

  return { template, pattern: new RegExp(`^${source}$`), parameterNames };
}

interface CompiledRoute extends CompiledTemplate {
  descriptor: FunctionDescriptor;
}

export class PathResolver implements RouteResolver {
  private readonly routes: readonly CompiledRoute[];

  constructor(descriptors: readonly FunctionDescriptor[]) {
    this.routes = descriptors.map((descriptor) => ({
      ...compilePathTemplate(descriptor.path),
      descriptor,
    }));
  }

  resolve(path: string): Lookup<RouteMatch> {
    for (const route of this.routes) {
      const match = route.pattern.exec(path);
      if (!match) {
        continue;
      }

      const pathParameters: Record<string, string> = {};
      route.parameterNames.forEach((name, position) => {
        pathParameters[name] = match[position + 1] ?? '';
      });

      return found({ descriptor: route.descriptor, pathParameters });
    }

    return notFound(path);
  }
}
