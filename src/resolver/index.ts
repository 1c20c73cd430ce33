/**
 * Scope Resolution and Expression Evaluation
 * @module resolver
 */

export {
  NULL_VALUE,
  scalar,
  list,
  map,
  reference,
  traversalReference,
  unresolved,
  fromJSON,
  toJSON,
  collectTargets,
  collectCauses,
  isKnown,
  hasUnresolved,
  combineUnknown,
  valuesEqual,
  targetKey,
  type Scalar,
  type ScalarValue,
  type ListValue,
  type MapValue,
  type ReferenceTarget,
  type ReferenceValue,
  type UnresolvedValue,
  type Value,
  type JSONValue,
} from './value';

export { BUILTIN_FUNCTIONS, asBool, asNumber, asString, type BuiltinFunction } from './functions';

export {
  Evaluator,
  type Bindings,
  type EvaluationEnvironment,
  type IterationContext,
} from './evaluator';

export {
  ScopeEnvironment,
  constantEnvironment,
  environmentFor,
  scopesEqual,
  type Scope,
  type ScopeLookup,
  type ScopeState,
  type ScopeTable,
} from './scope';

export {
  VariableResolver,
  resolveScopes,
  type ResolutionInputs,
  type ResolverOptions,
} from './variable-resolver';
