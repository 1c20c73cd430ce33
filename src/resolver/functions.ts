/**
 * Built-in Functions
 * @module resolver/functions
 *
 * The subset of configuration functions evaluated statically. A function
 * returns null when its inputs are not known well enough; the evaluator then
 * turns the call into a reference or unresolved value.
 */

import {
  ListValue,
  MapValue,
  NULL_VALUE,
  Scalar,
  Value,
  isKnown,
  list,
  map,
  scalar,
  scalarToString,
  valuesEqual,
} from './value';

export type BuiltinFunction = (args: readonly Value[]) => Value | null;

// ============================================================================
// Conversions
// ============================================================================

export function asString(value: Value | undefined): string | null {
  if (!value || value.kind !== 'scalar' || value.value === null) {
    return null;
  }
  return scalarToString(value.value);
}

export function asNumber(value: Value | undefined): number | null {
  if (!value || value.kind !== 'scalar') {
    return null;
  }
  if (typeof value.value === 'number') {
    return value.value;
  }
  if (typeof value.value === 'string' && value.value.trim() !== '') {
    const parsed = Number(value.value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

export function asBool(value: Value | undefined): boolean | null {
  if (!value || value.kind !== 'scalar') {
    return null;
  }
  if (typeof value.value === 'boolean') {
    return value.value;
  }
  if (value.value === 'true') return true;
  if (value.value === 'false') return false;
  return null;
}

function asList(value: Value | undefined): ListValue | null {
  return value && value.kind === 'list' ? value : null;
}

function asMap(value: Value | undefined): MapValue | null {
  return value && value.kind === 'map' ? value : null;
}

function knownScalars(values: readonly Value[]): Scalar[] | null {
  const out: Scalar[] = [];
  for (const value of values) {
    if (value.kind !== 'scalar') {
      return null;
    }
    out.push(value.value);
  }
  return out;
}

function sortedEntries(value: MapValue): [string, Value][] {
  return [...value.entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function distinctValues(items: readonly Value[]): Value[] {
  const out: Value[] = [];
  for (const item of items) {
    if (!out.some((existing) => valuesEqual(existing, item))) {
      out.push(item);
    }
  }
  return out;
}

/** Numbers spread from either positional arguments or a single list */
function numberArgs(args: readonly Value[]): number[] | null {
  const values = args.length === 1 && args[0].kind === 'list' ? args[0].items : args;
  const out: number[] = [];
  for (const value of values) {
    const n = asNumber(value);
    if (n === null) {
      return null;
    }
    out.push(n);
  }
  return out.length > 0 ? out : null;
}

// ============================================================================
// Formatting
// ============================================================================

function formatVerb(verb: string, precision: string | undefined, value: Value): string | null {
  if (!isKnown(value)) {
    return null;
  }
  switch (verb) {
    case 's':
    case 'v':
      return value.kind === 'scalar' ? scalarToString(value.value) ?? 'null' : null;
    case 'q': {
      const text = asString(value);
      return text === null ? null : JSON.stringify(text);
    }
    case 'd': {
      const n = asNumber(value);
      return n === null ? null : String(Math.trunc(n));
    }
    case 'f': {
      const n = asNumber(value);
      return n === null ? null : n.toFixed(precision === undefined ? 6 : Number(precision));
    }
    case 't': {
      const b = asBool(value);
      return b === null ? null : String(b);
    }
    default:
      return null;
  }
}

/**
 * Compile a `replace` pattern. Named groups written `(?P<name>...)` and
 * leading `(?i)`, `(?m)` or `(?s)` flag groups are rewritten to their
 * JavaScript form; anything else JavaScript rejects yields null.
 */
function compilePattern(source: string): RegExp | null {
  let body = source.replace(/\(\?P</g, '(?<');
  let flags = 'g';
  const inline = /^\(\?([ims]+)\)/.exec(body);
  if (inline) {
    flags += [...new Set(inline[1])].join('');
    body = body.slice(inline[0].length);
  }
  try {
    return new RegExp(body, flags);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
}

function format(args: readonly Value[]): Value | null {
  const pattern = asString(args[0]);
  if (pattern === null) {
    return null;
  }

  let argIndex = 1;
  let failed = false;
  const text = pattern.replace(/%(?:\.(\d+))?([%sdvqft])/g, (_match, precision: string | undefined, verb: string) => {
    if (verb === '%') {
      return '%';
    }
    const arg = args[argIndex++];
    const rendered = arg ? formatVerb(verb, precision, arg) : null;
    if (rendered === null) {
      failed = true;
      return '';
    }
    return rendered;
  });

  return failed ? null : scalar(text);
}

// ============================================================================
// Function Table
// ============================================================================

export const BUILTIN_FUNCTIONS: ReadonlyMap<string, BuiltinFunction> = new Map<string, BuiltinFunction>([
  ['length', ([value]) => {
    if (!value) return null;
    if (value.kind === 'list') return scalar(value.items.length);
    if (value.kind === 'map') return scalar(value.entries.size);
    const text = asString(value);
    return text === null ? null : scalar([...text].length);
  }],

  ['concat', (args) => {
    const lists = args.map(asList);
    const items: Value[] = [];
    for (const item of lists) {
      if (!item) return null;
      items.push(...item.items);
    }
    return list(items);
  }],

  ['merge', (args) => {
    const entries = new Map<string, Value>();
    for (const arg of args) {
      if (arg.kind === 'scalar' && arg.value === null) continue;
      const source = asMap(arg);
      if (!source) return null;
      for (const [key, value] of source.entries) {
        entries.set(key, value);
      }
    }
    return map(entries);
  }],

  ['lookup', ([source, key, fallback]) => {
    const entries = asMap(source);
    const name = asString(key);
    if (!entries || name === null) return null;
    return entries.entries.get(name) ?? fallback ?? null;
  }],

  ['element', ([source, index]) => {
    const items = asList(source);
    const n = asNumber(index);
    if (!items || n === null || items.items.length === 0) return null;
    return items.items[Math.trunc(n) % items.items.length];
  }],

  ['keys', ([source]) => {
    const entries = asMap(source);
    if (!entries) return null;
    return list(sortedEntries(entries).map(([key]) => scalar(key)));
  }],

  ['values', ([source]) => {
    const entries = asMap(source);
    if (!entries) return null;
    return list(sortedEntries(entries).map(([, value]) => value));
  }],

  ['join', ([separator, source]) => {
    const sep = asString(separator);
    const items = asList(source);
    const parts = items ? knownScalars(items.items) : null;
    if (sep === null || !parts) return null;
    return scalar(parts.map((part) => scalarToString(part) ?? '').join(sep));
  }],

  ['split', ([separator, source]) => {
    const sep = asString(separator);
    const text = asString(source);
    if (sep === null || text === null) return null;
    return list(text.split(sep).map((part) => scalar(part)));
  }],

  ['format', format],

  ['lower', ([source]) => {
    const text = asString(source);
    return text === null ? null : scalar(text.toLowerCase());
  }],

  ['upper', ([source]) => {
    const text = asString(source);
    return text === null ? null : scalar(text.toUpperCase());
  }],

  ['trimspace', ([source]) => {
    const text = asString(source);
    return text === null ? null : scalar(text.trim());
  }],

  ['replace', ([source, search, replacement]) => {
    const text = asString(source);
    const pattern = asString(search);
    const substitute = asString(replacement);
    if (text === null || pattern === null || substitute === null) return null;
    if (pattern.length > 1 && pattern.startsWith('/') && pattern.endsWith('/')) {
      const regex = compilePattern(pattern.slice(1, -1));
      return regex === null ? null : scalar(text.replace(regex, substitute));
    }
    return scalar(text.split(pattern).join(substitute));
  }],

  ['coalesce', (args) => {
    for (const arg of args) {
      if (!isKnown(arg)) return null;
      if (arg.kind === 'scalar' && (arg.value === null || arg.value === '')) continue;
      return arg;
    }
    return null;
  }],

  ['contains', ([source, needle]) => {
    const items = asList(source);
    if (!items || !needle || !isKnown(needle) || !items.items.every(isKnown)) return null;
    return scalar(items.items.some((item) => valuesEqual(item, needle)));
  }],

  ['flatten', ([source]) => {
    const items = asList(source);
    if (!items) return null;
    const out: Value[] = [];
    const walk = (values: readonly Value[]): boolean => {
      for (const value of values) {
        if (value.kind === 'list') {
          if (!walk(value.items)) return false;
        } else if (value.kind === 'reference' || value.kind === 'unresolved') {
          return false;
        } else {
          out.push(value);
        }
      }
      return true;
    };
    return walk(items.items) ? list(out) : null;
  }],

  ['distinct', ([source]) => {
    const items = asList(source);
    if (!items || !items.items.every(isKnown)) return null;
    return list(distinctValues(items.items));
  }],

  ['compact', ([source]) => {
    const items = asList(source);
    const parts = items ? knownScalars(items.items) : null;
    if (!parts) return null;
    return list(parts.filter((part) => part !== null && part !== '').map((part) => scalar(part)));
  }],

  ['tolist', ([source]) => asList(source)],

  ['toset', ([source]) => {
    const items = asList(source);
    if (!items || !items.items.every(isKnown)) return null;
    const unique = distinctValues(items.items);
    const strings = knownScalars(unique);
    if (strings && strings.every((item) => typeof item === 'string')) {
      unique.sort((a, b) => {
        const left = asString(a) ?? '';
        const right = asString(b) ?? '';
        return left < right ? -1 : left > right ? 1 : 0;
      });
    }
    return list(unique);
  }],

  ['tomap', ([source]) => asMap(source)],

  ['tostring', ([source]) => {
    if (!source || source.kind !== 'scalar') return null;
    return source.value === null ? NULL_VALUE : scalar(scalarToString(source.value));
  }],

  ['tonumber', ([source]) => {
    if (source && source.kind === 'scalar' && source.value === null) return NULL_VALUE;
    const n = asNumber(source);
    return n === null ? null : scalar(n);
  }],

  ['tobool', ([source]) => {
    if (source && source.kind === 'scalar' && source.value === null) return NULL_VALUE;
    const b = asBool(source);
    return b === null ? null : scalar(b);
  }],

  ['min', (args) => {
    const numbers = numberArgs(args);
    return numbers ? scalar(Math.min(...numbers)) : null;
  }],

  ['max', (args) => {
    const numbers = numberArgs(args);
    return numbers ? scalar(Math.max(...numbers)) : null;
  }],

  ['range', (args) => {
    const numbers: number[] = [];
    for (const arg of args) {
      const n = asNumber(arg);
      if (n === null) return null;
      numbers.push(n);
    }
    if (numbers.length === 0 || numbers.length > 3) return null;

    const start = numbers.length === 1 ? 0 : numbers[0];
    const end = numbers.length === 1 ? numbers[0] : numbers[1];
    const step = numbers.length === 3 ? numbers[2] : end >= start ? 1 : -1;
    if (step === 0) return null;

    const out: Value[] = [];
    for (let i = start; step > 0 ? i < end : i > end; i += step) {
      out.push(scalar(i));
      if (out.length > 1024) return null;
    }
    return list(out);
  }],

  ['zipmap', ([keySource, valueSource]) => {
    const keyList = asList(keySource);
    const valueList = asList(valueSource);
    const names = keyList ? knownScalars(keyList.items) : null;
    if (!names || !valueList || names.length !== valueList.items.length) return null;
    const entries = new Map<string, Value>();
    names.forEach((name, i) => {
      entries.set(scalarToString(name) ?? 'null', valueList.items[i]);
    });
    return map(entries);
  }],
]);
