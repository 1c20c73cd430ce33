/**
 * Module Scopes
 * @module resolver/scope
 *
 * One frozen symbol table per module path. A child scope only sees the
 * arguments its parent's module call passes in, never the parent's names.
 */

import type { ModulePath } from '../types';
import type { EvaluationEnvironment, IterationContext } from './evaluator';
import { Value, valuesEqual } from './value';

// ============================================================================
// Types
// ============================================================================

/**
 * Names visible while evaluating expressions of one module
 */
export interface ScopeState {
  readonly modulePath: ModulePath;
  /** Module directory relative to the configuration root */
  readonly directory: string;
  readonly variables: ReadonlyMap<string, Value>;
  readonly locals: ReadonlyMap<string, Value>;
  /** Module call name to child module path */
  readonly moduleCalls: ReadonlyMap<string, ModulePath>;
}

export interface Scope extends ScopeState {
  readonly outputs: ReadonlyMap<string, Value>;
  /** False when a zero count or empty for_each on a module call disables the subtree */
  readonly enabled: boolean;
  /** True when the module's locals could not be resolved (cycle) */
  readonly failed: boolean;
}

export type ScopeTable = ReadonlyMap<ModulePath, Scope>;

export type ScopeLookup = (path: ModulePath) => Scope | undefined;

// ============================================================================
// Environment
// ============================================================================

export class ScopeEnvironment implements EvaluationEnvironment {
  readonly paths: { readonly module: string; readonly root: string; readonly cwd: string };

  constructor(
    private readonly state: ScopeState,
    private readonly lookup: ScopeLookup,
    readonly workspace: string,
    readonly iteration?: IterationContext
  ) {
    this.paths = { module: state.directory, root: '.', cwd: '.' };
  }

  get modulePath(): ModulePath {
    return this.state.modulePath;
  }

  variable(name: string): Value | undefined {
    return this.state.variables.get(name);
  }

  local(name: string): Value | undefined {
    return this.state.locals.get(name);
  }

  moduleCall(name: string): ModulePath | undefined {
    return this.state.moduleCalls.get(name);
  }

  moduleOutput(childPath: ModulePath, name: string): Value | undefined {
    const child = this.lookup(childPath);
    if (!child || !child.enabled) {
      return undefined;
    }
    return child.outputs.get(name);
  }

  withIteration(iteration: IterationContext): ScopeEnvironment {
    return new ScopeEnvironment(this.state, this.lookup, this.workspace, iteration);
  }
}

const EMPTY_STATE: ScopeState = {
  modulePath: '',
  directory: '.',
  variables: new Map(),
  locals: new Map(),
  moduleCalls: new Map(),
};

/**
 * Environment with no names in scope, for literal-only inputs such as
 * variable files and declared defaults
 */
export function constantEnvironment(workspace: string): ScopeEnvironment {
  return new ScopeEnvironment(EMPTY_STATE, () => undefined, workspace);
}

/**
 * Environment for a resolved module of a scope table
 */
export function environmentFor(table: ScopeTable, scope: Scope, workspace: string): ScopeEnvironment {
  return new ScopeEnvironment(scope, (path) => table.get(path), workspace);
}

// ============================================================================
// Comparison
// ============================================================================

function mapsEqual(a: ReadonlyMap<string, Value>, b: ReadonlyMap<string, Value>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [key, value] of a) {
    const other = b.get(key);
    if (!other || !valuesEqual(value, other)) {
      return false;
    }
  }
  return true;
}

export function scopesEqual(a: Scope, b: Scope): boolean {
  return (
    a.enabled === b.enabled &&
    a.failed === b.failed &&
    mapsEqual(a.variables, b.variables) &&
    mapsEqual(a.locals, b.locals) &&
    mapsEqual(a.outputs, b.outputs)
  );
}
