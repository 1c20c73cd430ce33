/**
 * Expression Evaluator
 * @module resolver/evaluator
 *
 * Evaluates HCL expressions against one module's scope. Variables, locals and
 * module outputs are substituted; references to resources, data sources and
 * modules become reference values; anything the configuration does not
 * determine becomes an unresolved value naming its causes.
 */

import type {
  HCLBinaryExpression,
  HCLBinaryOperator,
  HCLConditionalExpression,
  HCLExpression,
  HCLForExpression,
  HCLFunctionExpression,
  HCLReferenceExpression,
  HCLTemplateExpression,
} from '../parsers/terraform/types';
import type { InstanceKey, ModulePath } from '../types';
import { BUILTIN_FUNCTIONS, asBool, asNumber } from './functions';
import {
  NULL_VALUE,
  ReferenceTarget,
  Value,
  collectCauses,
  collectTargets,
  combineUnknown,
  hasUnresolved,
  isKnown,
  list,
  map,
  reference,
  scalar,
  scalarToString,
  traversalReference,
  unresolved,
  valuesEqual,
} from './value';

// ============================================================================
// Environment
// ============================================================================

/**
 * Per-instance values of `count.index`, `each.key` and `each.value`
 */
export interface IterationContext {
  readonly countIndex?: Value;
  readonly eachKey?: Value;
  readonly eachValue?: Value;
}

/**
 * What an expression can see while being evaluated in one module
 */
export interface EvaluationEnvironment {
  readonly modulePath: ModulePath;
  variable(name: string): Value | undefined;
  local(name: string): Value | undefined;
  /** Child module path of a module call declared in this module */
  moduleCall(name: string): ModulePath | undefined;
  moduleOutput(childPath: ModulePath, name: string): Value | undefined;
  readonly paths: { readonly module: string; readonly root: string; readonly cwd: string };
  readonly workspace: string;
  readonly iteration?: IterationContext;
}

export type Bindings = ReadonlyMap<string, Value>;

const NO_BINDINGS: Bindings = new Map();

type NumericOperator = Exclude<HCLBinaryOperator, '==' | '!=' | '&&' | '||'>;

const NUMERIC_OPERATORS: Record<NumericOperator, (a: number, b: number) => number | boolean> = {
  '+': (a, b) => a + b,
  '-': (a, b) => a - b,
  '*': (a, b) => a * b,
  '/': (a, b) => a / b,
  '%': (a, b) => a % b,
  '<': (a, b) => a < b,
  '>': (a, b) => a > b,
  '<=': (a, b) => a <= b,
  '>=': (a, b) => a >= b,
};

function formatIndex(key: InstanceKey): string {
  return typeof key === 'number' ? String(key) : JSON.stringify(key);
}

function moduleHandle(value: Value): ReferenceTarget | null {
  if (value.kind !== 'reference' || value.traversal === null || value.targets.length !== 1) {
    return null;
  }
  const [target] = value.targets;
  return target.kind === 'module' ? target : null;
}

function refine(
  targets: readonly ReferenceTarget[],
  update: (target: ReferenceTarget) => ReferenceTarget
): ReferenceTarget[] {
  return targets.map((target) => (target.kind === 'module' ? target : update(target)));
}

// ============================================================================
// Evaluator
// ============================================================================

export class Evaluator {
  constructor(private readonly env: EvaluationEnvironment) {}

  get modulePath(): ModulePath {
    return this.env.modulePath;
  }

  evaluate(expr: HCLExpression, bindings: Bindings = NO_BINDINGS): Value {
    switch (expr.type) {
      case 'literal':
        return scalar(expr.value);

      case 'reference':
        return this.evaluateReference(expr, bindings);

      case 'getattr':
        return this.getAttribute(this.evaluate(expr.object, bindings), expr.name, expr.raw);

      case 'index':
        return this.index(
          this.evaluate(expr.collection, bindings),
          this.evaluate(expr.key, bindings),
          expr.raw
        );

      case 'splat':
        return this.splat(this.evaluate(expr.source, bindings), expr.traversal, expr.raw);

      case 'function':
        return this.evaluateFunction(expr, bindings);

      case 'template':
        return this.evaluateTemplate(expr, bindings);

      case 'for':
        return this.evaluateFor(expr, bindings);

      case 'conditional':
        return this.evaluateConditional(expr, bindings);

      case 'binary':
        return this.evaluateBinary(expr, bindings);

      case 'unary': {
        const operand = this.evaluate(expr.operand, bindings);
        const unknown = combineUnknown(expr.raw, [operand]);
        if (unknown) return unknown;

        if (expr.operator === '!') {
          const b = asBool(operand);
          return b === null ? unresolved(expr.raw, [expr.raw]) : scalar(!b);
        }
        const n = asNumber(operand);
        return n === null ? unresolved(expr.raw, [expr.raw]) : scalar(-n);
      }

      case 'array':
        return list(expr.elements.map((element) => this.evaluate(element, bindings)));

      case 'object': {
        const entries = new Map<string, Value>();
        for (const entry of expr.entries) {
          const key = this.evaluate(entry.key, bindings);
          const name = key.kind === 'scalar' ? scalarToString(key.value) : null;
          if (name === null) {
            return combineUnknown(expr.raw, [key]) ?? unresolved(expr.raw, [entry.key.raw]);
          }
          entries.set(name, this.evaluate(entry.value, bindings));
        }
        return map(entries);
      }
    }
  }

  // ==========================================================================
  // References
  // ==========================================================================

  private evaluateReference(expr: HCLReferenceExpression, bindings: Bindings): Value {
    const [root, ...rest] = expr.parts;

    const bound = bindings.get(root);
    if (bound) {
      return this.traverse(bound, rest, root);
    }

    const iteration = this.env.iteration;

    switch (root) {
      case 'var':
      case 'local': {
        const [name, ...tail] = rest;
        if (name === undefined) {
          return unresolved(expr.raw, [expr.raw]);
        }
        const text = `${root}.${name}`;
        const value = root === 'var' ? this.env.variable(name) : this.env.local(name);
        return this.traverse(value ?? unresolved(text, [text]), tail, text);
      }

      case 'count': {
        if (rest[0] !== 'index') {
          return unresolved(expr.raw, [expr.raw]);
        }
        return this.traverse(
          iteration?.countIndex ?? unresolved('count.index', ['count.index']),
          rest.slice(1),
          'count.index'
        );
      }

      case 'each': {
        const [field, ...tail] = rest;
        if (field !== 'key' && field !== 'value') {
          return unresolved(expr.raw, [expr.raw]);
        }
        const text = `each.${field}`;
        const value = field === 'key' ? iteration?.eachKey : iteration?.eachValue;
        return this.traverse(value ?? unresolved(text, [text]), tail, text);
      }

      case 'path': {
        const field = rest[0];
        if (field === 'module' || field === 'root' || field === 'cwd') {
          return scalar(this.env.paths[field]);
        }
        return unresolved(expr.raw, [expr.raw]);
      }

      case 'terraform':
        return rest[0] === 'workspace' ? scalar(this.env.workspace) : unresolved(expr.raw, [expr.raw]);

      case 'self':
        return reference(`\${${expr.raw}}`, []);

      case 'module': {
        const [call, ...tail] = rest;
        if (call === undefined) {
          return unresolved(expr.raw, [expr.raw]);
        }
        const text = `module.${call}`;
        const childPath = this.env.moduleCall(call);
        if (childPath === undefined) {
          return unresolved(expr.raw, [text]);
        }
        const handle = traversalReference(text, [
          { kind: 'module', modulePath: childPath, address: childPath },
        ]);
        return this.traverse(handle, tail, text);
      }

      case 'data': {
        const [type, name, ...tail] = rest;
        if (type === undefined || name === undefined) {
          return unresolved(expr.raw, [expr.raw]);
        }
        const address = `data.${type}.${name}`;
        const handle = traversalReference(address, [
          { kind: 'data', modulePath: this.env.modulePath, address },
        ]);
        return this.traverse(handle, tail, address);
      }

      default: {
        const [name, ...tail] = rest;
        if (name === undefined) {
          return unresolved(expr.raw, [expr.raw]);
        }
        const address = `${root}.${name}`;
        const handle = traversalReference(address, [
          { kind: 'resource', modulePath: this.env.modulePath, address },
        ]);
        return this.traverse(handle, tail, address);
      }
    }
  }

  private traverse(value: Value, names: readonly string[], text: string): Value {
    let current = value;
    let currentText = text;
    for (const name of names) {
      currentText = `${currentText}.${name}`;
      current = this.getAttribute(current, name, currentText);
    }
    return current;
  }

  private getAttribute(value: Value, name: string, text: string): Value {
    switch (value.kind) {
      case 'map':
        return value.entries.get(name) ?? unresolved(text, [text]);

      case 'reference': {
        const module = moduleHandle(value);
        if (module) {
          return this.env.moduleOutput(module.modulePath, name) ?? unresolved(text, [text], value.targets);
        }
        if (value.traversal !== null) {
          return traversalReference(
            `${value.traversal}.${name}`,
            refine(value.targets, (target) =>
              target.attribute === undefined ? { ...target, attribute: name } : target
            )
          );
        }
        return reference(`\${${text}}`, value.targets);
      }

      case 'unresolved':
        return unresolved(text, value.causes, value.targets);

      case 'list':
      case 'scalar':
        return unresolved(text, [text]);
    }
  }

  private index(collection: Value, key: Value, text: string): Value {
    if (moduleHandle(collection)) {
      // Repeated modules are collapsed into one module path
      return collection;
    }

    if (key.kind !== 'scalar') {
      return combineUnknown(text, [collection, key]) ?? unresolved(text, [text]);
    }
    const k = key.value;

    switch (collection.kind) {
      case 'list': {
        const n = asNumber(key);
        if (n === null || !Number.isInteger(n)) return unresolved(text, [text]);
        return collection.items[n] ?? unresolved(text, [text]);
      }

      case 'map': {
        const name = k === null ? null : scalarToString(k);
        if (name === null) return unresolved(text, [text]);
        return collection.entries.get(name) ?? unresolved(text, [text]);
      }

      case 'reference': {
        if (collection.traversal !== null && (typeof k === 'string' || typeof k === 'number')) {
          return traversalReference(
            `${collection.traversal}[${formatIndex(k)}]`,
            refine(collection.targets, (target) =>
              target.index === undefined && target.attribute === undefined
                ? { ...target, index: k }
                : target
            )
          );
        }
        return reference(`\${${text}}`, collection.targets);
      }

      case 'unresolved':
        return unresolved(text, collection.causes, collection.targets);

      case 'scalar':
        return unresolved(text, [text]);
    }
  }

  private splat(source: Value, traversal: readonly string[], text: string): Value {
    switch (source.kind) {
      case 'list':
        return list(source.items.map((item) => this.traverse(item, traversal, text)));

      case 'reference': {
        if (moduleHandle(source)) {
          return source;
        }
        if (source.traversal !== null) {
          const [first] = traversal;
          const suffix = traversal.map((name) => `.${name}`).join('');
          return traversalReference(
            `${source.traversal}[*]${suffix}`,
            refine(source.targets, (target) =>
              target.attribute === undefined && first !== undefined
                ? { ...target, attribute: first }
                : target
            )
          );
        }
        return reference(`\${${text}}`, source.targets);
      }

      case 'unresolved':
        return unresolved(text, source.causes, source.targets);

      case 'scalar':
        if (source.value === null) return list([]);
        return list([this.traverse(source, traversal, text)]);

      case 'map':
        return list([this.traverse(source, traversal, text)]);
    }
  }

  // ==========================================================================
  // Operators
  // ==========================================================================

  private evaluateBinary(expr: HCLBinaryExpression, bindings: Bindings): Value {
    const left = this.evaluate(expr.left, bindings);

    if (expr.operator === '&&' && asBool(left) === false) return scalar(false);
    if (expr.operator === '||' && asBool(left) === true) return scalar(true);

    const right = this.evaluate(expr.right, bindings);
    const unknown = combineUnknown(expr.raw, [left, right]);
    if (unknown) {
      return unknown;
    }

    const invalid = (): Value => unresolved(expr.raw, [expr.raw]);
    const operator = expr.operator;

    switch (operator) {
      case '==':
        return scalar(valuesEqual(left, right));
      case '!=':
        return scalar(!valuesEqual(left, right));
      case '&&':
      case '||': {
        const a = asBool(left);
        const b = asBool(right);
        if (a === null || b === null) return invalid();
        return scalar(operator === '&&' ? a && b : a || b);
      }
    }

    const a = asNumber(left);
    const b = asNumber(right);
    if (a === null || b === null) {
      return invalid();
    }

    const outcome = NUMERIC_OPERATORS[operator](a, b);
    if (typeof outcome === 'boolean') {
      return scalar(outcome);
    }
    return Number.isFinite(outcome) ? scalar(outcome) : invalid();
  }

  private evaluateConditional(expr: HCLConditionalExpression, bindings: Bindings): Value {
    const condition = this.evaluate(expr.condition, bindings);
    const decided = asBool(condition);

    if (decided !== null) {
      return this.evaluate(decided ? expr.trueResult : expr.falseResult, bindings);
    }

    const whenTrue = this.evaluate(expr.trueResult, bindings);
    const whenFalse = this.evaluate(expr.falseResult, bindings);
    const targets = [condition, whenTrue, whenFalse].flatMap((value) => collectTargets(value));

    if (hasUnresolved(condition)) {
      return unresolved(expr.raw, collectCauses(condition), targets);
    }
    if (condition.kind === 'reference') {
      return reference(`\${${expr.raw}}`, targets);
    }
    return unresolved(expr.raw, [expr.condition.raw], targets);
  }

  // ==========================================================================
  // Functions
  // ==========================================================================

  private evaluateFunction(expr: HCLFunctionExpression, bindings: Bindings): Value {
    if (expr.name === 'try') {
      const attempts = expr.args.map((arg) => this.evaluate(arg, bindings));
      return attempts.find((value) => !hasUnresolved(value)) ?? attempts[0] ?? NULL_VALUE;
    }

    if (expr.name === 'can') {
      const [arg] = expr.args;
      const value = arg ? this.evaluate(arg, bindings) : NULL_VALUE;
      return hasUnresolved(value) ? unresolved(expr.raw, collectCauses(value), collectTargets(value)) : scalar(true);
    }

    let args = expr.args.map((arg) => this.evaluate(arg, bindings));

    if (expr.expandFinal) {
      const last = args[args.length - 1];
      if (!last || last.kind !== 'list') {
        return combineUnknown(expr.raw, args) ?? unresolved(expr.raw, [expr.raw]);
      }
      args = [...args.slice(0, -1), ...last.items];
    }

    const builtin = BUILTIN_FUNCTIONS.get(expr.name);
    const result = builtin ? builtin(args) : null;
    if (result) {
      return result;
    }

    return combineUnknown(expr.raw, args) ?? unresolved(expr.raw, [expr.raw]);
  }

  // ==========================================================================
  // Templates
  // ==========================================================================

  private evaluateTemplate(expr: HCLTemplateExpression, bindings: Bindings): Value {
    const [only] = expr.parts;
    if (expr.parts.length === 1 && typeof only !== 'string') {
      return this.evaluate(only, bindings);
    }

    const values: Value[] = [];
    const targets: ReferenceTarget[] = [];
    let text = '';
    let referenced = false;

    for (const part of expr.parts) {
      if (typeof part === 'string') {
        text += part;
        continue;
      }

      const value = this.evaluate(part, bindings);
      values.push(value);

      if (value.kind === 'scalar') {
        text += scalarToString(value.value) ?? '';
      } else if (value.kind === 'reference') {
        text += value.expression;
        targets.push(...value.targets);
        referenced = true;
      } else if (value.kind === 'unresolved' || !isKnown(value)) {
        continue;
      } else {
        return unresolved(expr.raw, [part.raw]);
      }
    }

    if (values.some(hasUnresolved) || values.some((v) => v.kind !== 'scalar' && v.kind !== 'reference')) {
      return unresolved(
        expr.raw,
        values.flatMap((value) => collectCauses(value)),
        values.flatMap((value) => collectTargets(value))
      );
    }
    if (referenced) {
      return reference(text, targets);
    }
    return scalar(text);
  }

  // ==========================================================================
  // For Expressions
  // ==========================================================================

  private evaluateFor(expr: HCLForExpression, bindings: Bindings): Value {
    const collection = this.evaluate(expr.collection, bindings);

    let elements: [Value, Value][];
    switch (collection.kind) {
      case 'list':
        elements = collection.items.map((item, i): [Value, Value] => [scalar(i), item]);
        break;
      case 'map':
        elements = [...collection.entries]
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
          .map(([key, item]): [Value, Value] => [scalar(key), item]);
        break;
      case 'scalar':
        if (collection.value === null) {
          elements = [];
          break;
        }
        return unresolved(expr.raw, [expr.collection.raw]);
      default:
        return this.unknownCollection(expr.raw, collection);
    }

    const listItems: Value[] = [];
    const mapEntries = new Map<string, Value>();
    const groups = new Map<string, Value[]>();

    for (const [key, item] of elements) {
      const inner = new Map(bindings);
      if (expr.keyVar) inner.set(expr.keyVar, key);
      inner.set(expr.valueVar, item);

      if (expr.condition) {
        const keep = this.evaluate(expr.condition, inner);
        const decided = asBool(keep);
        if (decided === null) {
          return combineUnknown(expr.raw, [keep]) ?? unresolved(expr.raw, [expr.condition.raw]);
        }
        if (!decided) continue;
      }

      const value = this.evaluate(expr.valueExpr, inner);

      if (!expr.isObject || !expr.keyExpr) {
        listItems.push(value);
        continue;
      }

      const keyValue = this.evaluate(expr.keyExpr, inner);
      const name = keyValue.kind === 'scalar' ? scalarToString(keyValue.value) : null;
      if (name === null) {
        return combineUnknown(expr.raw, [keyValue]) ?? unresolved(expr.raw, [expr.keyExpr.raw]);
      }

      if (expr.grouping) {
        const group = groups.get(name) ?? [];
        group.push(value);
        groups.set(name, group);
      } else {
        mapEntries.set(name, value);
      }
    }

    if (!expr.isObject) {
      return list(listItems);
    }
    if (expr.grouping) {
      return map([...groups].map(([name, items]): [string, Value] => [name, list(items)]));
    }
    return map(mapEntries);
  }

  private unknownCollection(raw: string, collection: Value): Value {
    return combineUnknown(raw, [collection]) ?? unresolved(raw, [raw]);
  }
}
