/**
 * @module @action-engine/runtime/registry/function-registry
 *
 * Immutable lookup of action functions by name.
 */

import {
  ConfigError,
  deepFreeze,
  found,
  notFound,
  parseFunctionRegistry,
  type FunctionDescriptor,
  type Lookup,
} from '@action-engine/contracts';

export class FunctionRegistry {
  private readonly descriptors: readonly FunctionDescriptor[];
  private readonly byName: ReadonlyMap<string, FunctionDescriptor>;

  constructor(descriptors: readonly FunctionDescriptor[]) {
    const byName = new Map<string, FunctionDescriptor>();
    for (const descriptor of descriptors) {
      if (byName.has(descriptor.functionName)) {
        throw new ConfigError(`Duplicate function name: ${descriptor.functionName}`, {
          functionName: descriptor.functionName,
        });
      }
      byName.set(descriptor.functionName, deepFreeze(descriptor));
    }

    this.descriptors = Object.freeze([...descriptors]);
    this.byName = byName;
  }

  /**
   * Build a registry from deployment input (snake_case descriptor list).
   * @throws ConfigError when the input is invalid
   */
  static fromInput(input: unknown): FunctionRegistry {
    return new FunctionRegistry(parseFunctionRegistry(input));
  }

  get(functionName: string): Lookup<FunctionDescriptor> {
    const descriptor = this.byName.get(functionName);
    return descriptor ? found(descriptor) : notFound(functionName);
  }

  /** Descriptors in declaration order. */
  list(): readonly FunctionDescriptor[] {
    return this.descriptors;
  }

  get size(): number {
    return this.descriptors.length;
  }
}
