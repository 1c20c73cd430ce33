/**
 * Resolved Values
 * @module resolver/value
 *
 * Every attribute, variable, local and output is one of five value kinds.
 * `reference` values are known only once infrastructure exists and record
 * which resources they point at; `unresolved` values record why the
 * configuration alone does not determine them.
 */

import type { InstanceKey, ModulePath } from '../types';

// ============================================================================
// Types
// ============================================================================

export type Scalar = string | number | boolean | null;

export interface ScalarValue {
  readonly kind: 'scalar';
  readonly value: Scalar;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

export interface MapValue {
  readonly kind: 'map';
  readonly entries: ReadonlyMap<string, Value>;
}

/**
 * A resource, data source or module that a value depends on
 */
export interface ReferenceTarget {
  readonly kind: 'resource' | 'data' | 'module';
  /** Module the target is declared in (for modules: the module itself) */
  readonly modulePath: ModulePath;
  /** `type.name`, `data.type.name`, or the module path for modules */
  readonly address: string;
  readonly index?: InstanceKey;
  readonly attribute?: string;
}

export interface ReferenceValue {
  readonly kind: 'reference';
  /** Interpolation form, e.g. `${aws_vpc.main.id}` or `web-${aws_eip.ip.id}` */
  readonly expression: string;
  /** Source text of a plain traversal (`aws_vpc.main.id`) that can be extended */
  readonly traversal: string | null;
  readonly targets: readonly ReferenceTarget[];
}

export interface UnresolvedValue {
  readonly kind: 'unresolved';
  readonly expression: string;
  /** Root causes, e.g. `var.region` */
  readonly causes: readonly string[];
  readonly targets: readonly ReferenceTarget[];
}

export type Value = ScalarValue | ListValue | MapValue | ReferenceValue | UnresolvedValue;

export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

// ============================================================================
// Constructors
// ============================================================================

export const NULL_VALUE: ScalarValue = Object.freeze({ kind: 'scalar', value: null });

export function scalar(value: Scalar): ScalarValue {
  return { kind: 'scalar', value };
}

export function list(items: readonly Value[]): ListValue {
  return { kind: 'list', items };
}

export function map(entries: ReadonlyMap<string, Value> | Iterable<[string, Value]>): MapValue {
  return { kind: 'map', entries: entries instanceof Map ? entries : new Map(entries) };
}

export function reference(
  expression: string,
  targets: readonly ReferenceTarget[],
  traversal: string | null = null
): ReferenceValue {
  return { kind: 'reference', expression, traversal, targets: dedupeTargets(targets) };
}

/**
 * Reference value for a plain traversal such as `aws_vpc.main.id`
 */
export function traversalReference(text: string, targets: readonly ReferenceTarget[]): ReferenceValue {
  return reference(`\${${text}}`, targets, text);
}

export function unresolved(
  expression: string,
  causes: readonly string[],
  targets: readonly ReferenceTarget[] = []
): UnresolvedValue {
  return {
    kind: 'unresolved',
    expression,
    causes: [...new Set(causes)],
    targets: dedupeTargets(targets),
  };
}

/**
 * Convert plain JSON data (overrides, annotation documents) into a value
 */
export function fromJSON(data: unknown): Value {
  if (data === null || data === undefined) {
    return NULL_VALUE;
  }
  if (typeof data === 'string' || typeof data === 'number' || typeof data === 'boolean') {
    return scalar(data);
  }
  if (Array.isArray(data)) {
    return list(data.map(fromJSON));
  }
  if (typeof data === 'object') {
    return map(Object.entries(data).map(([key, item]): [string, Value] => [key, fromJSON(item)]));
  }
  return scalar(String(data));
}

/**
 * Plain JSON form used by the listing output
 */
export function toJSON(value: Value): JSONValue {
  switch (value.kind) {
    case 'scalar':
      return value.value;
    case 'list':
      return value.items.map(toJSON);
    case 'map': {
      const out: { [key: string]: JSONValue } = {};
      for (const [key, item] of value.entries) {
        out[key] = toJSON(item);
      }
      return out;
    }
    case 'reference':
      return value.expression;
    case 'unresolved':
      return { $unresolved: [...value.causes] };
  }
}

// ============================================================================
// Targets
// ============================================================================

export function targetKey(target: ReferenceTarget): string {
  return [
    target.kind,
    target.modulePath,
    target.address,
    target.index === undefined ? '' : `${typeof target.index}:${target.index}`,
    target.attribute ?? '',
  ].join('\u0000');
}

function dedupeTargets(targets: readonly ReferenceTarget[]): ReferenceTarget[] {
  const seen = new Set<string>();
  const out: ReferenceTarget[] = [];
  for (const target of targets) {
    const key = targetKey(target);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(target);
    }
  }
  return out;
}

/**
 * All reference targets anywhere inside a value
 */
export function collectTargets(value: Value, out: ReferenceTarget[] = []): ReferenceTarget[] {
  switch (value.kind) {
    case 'scalar':
      break;
    case 'list':
      for (const item of value.items) collectTargets(item, out);
      break;
    case 'map':
      for (const item of value.entries.values()) collectTargets(item, out);
      break;
    case 'reference':
    case 'unresolved':
      out.push(...value.targets);
      break;
  }
  return out;
}

/**
 * All root causes of unresolved values anywhere inside a value
 */
export function collectCauses(value: Value, out: string[] = []): string[] {
  switch (value.kind) {
    case 'list':
      for (const item of value.items) collectCauses(item, out);
      break;
    case 'map':
      for (const item of value.entries.values()) collectCauses(item, out);
      break;
    case 'unresolved':
      out.push(...value.causes);
      break;
    default:
      break;
  }
  return out;
}

// ============================================================================
// Inspection
// ============================================================================

/**
 * Whether the value contains no reference or unresolved parts
 */
export function isKnown(value: Value): boolean {
  switch (value.kind) {
    case 'scalar':
      return true;
    case 'list':
      return value.items.every(isKnown);
    case 'map':
      return [...value.entries.values()].every(isKnown);
    default:
      return false;
  }
}

export function hasUnresolved(value: Value): boolean {
  switch (value.kind) {
    case 'list':
      return value.items.some(hasUnresolved);
    case 'map':
      return [...value.entries.values()].some(hasUnresolved);
    case 'unresolved':
      return true;
    default:
      return false;
  }
}

/**
 * Combine the unknown parts of several operands into the result of an
 * operation over them. Returns null when every operand is known.
 */
export function combineUnknown(
  expression: string,
  operands: readonly Value[]
): ReferenceValue | UnresolvedValue | null {
  if (operands.every(isKnown)) {
    return null;
  }

  const targets = operands.flatMap((operand) => collectTargets(operand));
  const causes = operands.flatMap((operand) => collectCauses(operand));

  if (operands.some(hasUnresolved)) {
    return unresolved(expression, causes, targets);
  }
  return reference(`\${${expression}}`, targets);
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (a.kind !== b.kind) {
    return false;
  }

  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' && a.value === b.value;
    case 'list':
      return (
        b.kind === 'list' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case 'map': {
      if (b.kind !== 'map' || a.entries.size !== b.entries.size) {
        return false;
      }
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (!other || !valuesEqual(item, other)) {
          return false;
        }
      }
      return true;
    }
    case 'reference':
      return (
        b.kind === 'reference' &&
        a.expression === b.expression &&
        sameTargets(a.targets, b.targets)
      );
    case 'unresolved':
      return (
        b.kind === 'unresolved' &&
        a.expression === b.expression &&
        a.causes.join('\u0000') === b.causes.join('\u0000') &&
        sameTargets(a.targets, b.targets)
      );
  }
}

function sameTargets(a: readonly ReferenceTarget[], b: readonly ReferenceTarget[]): boolean {
  return a.length === b.length && a.every((target, i) => targetKey(target) === targetKey(b[i]));
}

/**
 * String form of a known scalar, as used by templates and map keys
 */
export function scalarToString(value: Scalar): string | null {
  if (value === null) {
    return null;
  }
  return typeof value === 'string' ? value : String(value);
}
