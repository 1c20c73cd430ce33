/**
 * Resource Identity
 * `<module-path>.<resource-type>.<instance-name>[.<index-or-key>]`, with the
 * module path omitted for the root module. Data sources use `data.<type>` as
 * their type segment.
 */

import { ModulePath, modulePathSegments } from './module-path';

export type InstanceKey = string | number;

/** Key of the single instance kept for a resource whose cardinality is unknown */
export const UNKNOWN_COUNT_KEY = 'unknown-count';

/**
 * Address of a resource within its module: `type.name` or `data.type.name`
 */
export function resourceAddress(kind: 'resource' | 'data', type: string, name: string): string {
  return kind === 'data' ? `data.${type}.${name}` : `${type}.${name}`;
}

/**
 * Identity of a resource declaration regardless of repetition
 */
export function baseIdentity(modulePath: ModulePath, address: string): string {
  return [...modulePathSegments(modulePath), address].join('.');
}

export function instanceIdentity(base: string, key: InstanceKey | null): string {
  return key === null ? base : `${base}.${key}`;
}

export interface ParsedIdentity {
  readonly modulePath: ModulePath;
  readonly kind: 'resource' | 'data';
  readonly type: string;
  readonly name: string;
}

/**
 * Split a base identity back into module path, kind, type and name.
 * Returns null when there are too few segments.
 */
export function parseBaseIdentity(identity: string): ParsedIdentity | null {
  const segments = identity.split('.');
  if (segments.length < 2 || segments.some((segment) => segment === '')) {
    return null;
  }

  const data = segments.length >= 3 && segments[segments.length - 3] === 'data';
  const width = data ? 3 : 2;
  const modulePath = segments.slice(0, segments.length - width).join('.');

  return {
    modulePath,
    kind: data ? 'data' : 'resource',
    type: segments[segments.length - 2],
    name: segments[segments.length - 1],
  };
}

/**
 * Whether an identity matches a pattern, where a trailing `*` matches any suffix
 */
export function matchesIdentityPattern(identity: string, pattern: string): boolean {
  if (pattern.endsWith('*')) {
    return identity.startsWith(pattern.slice(0, -1));
  }
  return identity === pattern;
}
