/**
 * @module @action-engine/contracts/lookup
 *
 * Tagged result for lookups whose miss is an expected outcome
 * (unknown function name, unmatched path). Hard failures are thrown.
 */

export type Lookup<T> =
  | { status: 'ok'; value: T }
  | { status: 'not-found'; key: string };

export function found<T>(value: T): Lookup<T> {
  return { status: 'ok', value };
}

export function notFound<T = never>(key: string): Lookup<T> {
  return { status: 'not-found', key };
}

export function isFound<T>(lookup: Lookup<T>): lookup is { status: 'ok'; value: T } {
  return lookup.status === 'ok';
}
