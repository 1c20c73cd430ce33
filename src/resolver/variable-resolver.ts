/**
 * Variable Resolver
 * @module resolver/variable-resolver
 *
 * Builds one frozen scope per module path. Passes run over every module,
 * parents before children, until no scope changes or the pass budget is
 * spent. Children's outputs are read from the previous pass, so values that
 * travel up through a module and back down into a sibling settle over
 * several passes.
 *
 * Variable precedence, highest first:
 * 1. explicit override (`overrides` for the root, `scopedOverrides` for any module)
 * 2. variable definition files (root module)
 * 3. `TF_VAR_<name>` environment values (root module)
 * 4. the parent module call's argument
 * 5. the declared default
 */

import { CyclicLocalsError, MalformedConfigError, ResolutionErrorCodes } from '../errors';
import type { DiagnosticsSink } from '../diagnostics';
import { tarjanSCC } from '../graph/algorithms';
import type { StructuredLogger } from '../logging';
import { createModuleLogger } from '../logging';
import type { Block, ParsedConfig, ParsedModule } from '../parsers/terraform/block-parser';
import { extractReferences, parseExpressionText } from '../parsers/terraform/expression-parser';
import type { HCLExpression, TerraformFile } from '../parsers/terraform/types';
import {
  ModulePath,
  ROOT_MODULE,
  compareModulePaths,
  joinModulePath,
  moduleCallName,
  parentModulePath,
} from '../types';
import { Evaluator } from './evaluator';
import { asBool, asNumber } from './functions';
import {
  Scope,
  ScopeEnvironment,
  ScopeLookup,
  ScopeState,
  ScopeTable,
  constantEnvironment,
  scopesEqual,
} from './scope';
import { Value, fromJSON, scalar, unresolved } from './value';

// ============================================================================
// Types
// ============================================================================

export interface ResolutionInputs {
  /** Root module variable overrides */
  readonly overrides?: Readonly<Record<string, unknown>>;
  /** Overrides keyed by module path, for any module */
  readonly scopedOverrides?: Readonly<Record<ModulePath, Readonly<Record<string, unknown>>>>;
  /** Parsed variable definition files, lowest precedence first */
  readonly variableFiles?: readonly TerraformFile[];
  /** Environment holding `TF_VAR_` values */
  readonly environment?: Readonly<Record<string, string | undefined>>;
}

export interface ResolverOptions {
  maxPasses: number;
  workspace: string;
  logger?: StructuredLogger;
}

type TypeConstraint = 'string' | 'number' | 'bool' | 'structural' | null;

interface LocalDefinition {
  readonly name: string;
  readonly expression: HCLExpression;
  readonly file: string;
  readonly line: number;
}

/**
 * Structural facts about one module, computed once before the passes
 */
interface ModulePlan {
  readonly path: ModulePath;
  readonly directory: string;
  readonly variables: readonly Block[];
  readonly declared: ReadonlySet<string>;
  /** Acyclic locals in evaluation order */
  readonly locals: readonly LocalDefinition[];
  /** Names of locals that take part in a reference cycle */
  readonly cyclic: readonly string[];
  readonly outputs: readonly Block[];
  readonly moduleCalls: ReadonlyMap<string, Block>;
  readonly callPaths: ReadonlyMap<string, ModulePath>;
}

const MODULE_META_ARGUMENTS = new Set(['source', 'version', 'count', 'for_each', 'providers', 'depends_on']);

const PRIMITIVE_TYPES = new Set(['string', 'number', 'bool']);

// ============================================================================
// Type Conversion
// ============================================================================

function primitiveConstraint(name: string): TypeConstraint {
  if (name === 'string' || name === 'number' || name === 'bool') {
    return name;
  }
  return null;
}

function typeConstraint(expr: HCLExpression | undefined): TypeConstraint {
  if (!expr) {
    return null;
  }
  if (expr.type === 'reference' && expr.parts.length === 1) {
    return primitiveConstraint(expr.parts[0]);
  }
  // Legacy quoted form: type = "string"
  if (expr.type === 'literal' && typeof expr.value === 'string' && PRIMITIVE_TYPES.has(expr.value)) {
    return primitiveConstraint(expr.value);
  }
  return 'structural';
}

function convertToType(value: Value, constraint: TypeConstraint): Value {
  if (value.kind !== 'scalar' || value.value === null) {
    return value;
  }
  switch (constraint) {
    case 'string':
      return typeof value.value === 'string' ? value : scalar(String(value.value));
    case 'number': {
      const n = asNumber(value);
      return n === null ? value : scalar(n);
    }
    case 'bool': {
      const b = asBool(value);
      return b === null ? value : scalar(b);
    }
    default:
      return value;
  }
}

// ============================================================================
// Locals Ordering
// ============================================================================

function planLocals(module: ParsedModule): {
  locals: LocalDefinition[];
  cyclic: LocalDefinition[];
} {
  const definitions = new Map<string, LocalDefinition>();
  for (const block of module.blocks) {
    if (block.kind !== 'locals') continue;
    for (const [name, expression] of Object.entries(block.attributes)) {
      if (!definitions.has(name)) {
        definitions.set(name, { name, expression, file: block.file, line: block.line });
      }
    }
  }

  const names = [...definitions.keys()];
  const edges = new Map<string, string[]>();
  for (const definition of definitions.values()) {
    const dependencies = extractReferences(definition.expression)
      .filter((ref) => ref.type === 'local' && definitions.has(ref.parts[0]))
      .map((ref) => ref.parts[0]);
    edges.set(definition.name, [...new Set(dependencies)]);
  }

  const locals: LocalDefinition[] = [];
  const cyclic: LocalDefinition[] = [];

  for (const component of tarjanSCC(names, edges)) {
    const members = component.nodes
      .map((name) => definitions.get(name))
      .filter((definition): definition is LocalDefinition => definition !== undefined);

    if (component.isCycle) {
      cyclic.push(...members);
    } else {
      locals.push(...members);
    }
  }

  cyclic.sort((a, b) => names.indexOf(a.name) - names.indexOf(b.name));
  return { locals, cyclic };
}

// ============================================================================
// Variable Resolver
// ============================================================================

export class VariableResolver {
  private readonly plans: ModulePlan[];
  private readonly plansByPath: Map<ModulePath, ModulePlan>;
  private readonly cycles: Map<ModulePath, LocalDefinition[]>;
  private readonly overrides: Map<ModulePath, Map<string, Value>>;
  private readonly fileValues: Map<string, Value>;
  private readonly constants: Evaluator;
  private readonly logger: StructuredLogger;

  constructor(
    parsed: ParsedConfig,
    private readonly inputs: ResolutionInputs,
    private readonly sink: DiagnosticsSink,
    private readonly options: ResolverOptions
  ) {
    this.logger = options.logger ?? createModuleLogger('resolver');
    this.constants = new Evaluator(constantEnvironment(options.workspace));
    this.cycles = new Map();
    this.plans = [...parsed.modules.values()]
      .sort((a, b) => compareModulePaths(a.path, b.path))
      .map((module) => this.plan(module));
    this.plansByPath = new Map(this.plans.map((plan) => [plan.path, plan]));
    this.overrides = this.collectOverrides();
    this.fileValues = this.collectFileValues();
  }

  resolve(): ScopeTable {
    this.reportCycles();

    let previous = new Map<ModulePath, Scope>();
    let converged = false;

    for (let pass = 1; pass <= this.options.maxPasses; pass++) {
      const current = new Map<ModulePath, Scope>();
      const lookup: ScopeLookup = (path) => current.get(path) ?? previous.get(path);

      for (const plan of this.plans) {
        current.set(plan.path, this.resolveModule(plan, current, lookup));
      }

      const changed = this.plans
        .filter((plan) => {
          const before = previous.get(plan.path);
          const after = current.get(plan.path);
          return !before || !after || !scopesEqual(before, after);
        })
        .map((plan) => plan.path);

      this.logger.resolutionPass(pass, changed);
      previous = current;

      if (changed.length === 0) {
        converged = true;
        break;
      }
    }

    if (!converged) {
      this.sink.report({
        code: ResolutionErrorCodes.FIXPOINT_NOT_REACHED,
        severity: 'warning',
        message: `Scope resolution did not settle within ${this.options.maxPasses} passes; keeping the last pass`,
        module: ROOT_MODULE,
        subject: 'resolution',
      });
    }

    for (const scope of previous.values()) {
      this.logger.scopeResolved(scope.modulePath, scope.variables.size, scope.locals.size);
    }

    return previous;
  }

  // ==========================================================================
  // Planning
  // ==========================================================================

  private plan(module: ParsedModule): ModulePlan {
    const variables = module.blocks.filter((block) => block.kind === 'variable');
    const outputs = module.blocks.filter((block) => block.kind === 'output');
    const moduleCalls = new Map<string, Block>();
    const callPaths = new Map<string, ModulePath>();

    for (const block of module.blocks) {
      if (block.kind === 'module' && !moduleCalls.has(block.name)) {
        moduleCalls.set(block.name, block);
        callPaths.set(block.name, joinModulePath(module.path, block.name));
      }
    }

    const { locals, cyclic } = planLocals(module);
    if (cyclic.length > 0) {
      this.cycles.set(module.path, cyclic);
    }

    return {
      path: module.path,
      directory: module.directory,
      variables,
      declared: new Set(variables.map((block) => block.name)),
      locals,
      cyclic: cyclic.map((definition) => definition.name),
      outputs,
      moduleCalls,
      callPaths,
    };
  }

  private reportCycles(): void {
    for (const [modulePath, definitions] of this.cycles) {
      const names = definitions.map((definition) => definition.name);
      const error = new CyclicLocalsError(modulePath, names);
      const [first] = definitions;
      this.sink.report({
        code: error.code,
        severity: 'error',
        message: error.message,
        module: modulePath,
        subject: names.join(','),
        location: first ? { file: first.file, line: first.line } : undefined,
      });
    }
  }

  private collectOverrides(): Map<ModulePath, Map<string, Value>> {
    const out = new Map<ModulePath, Map<string, Value>>();
    const scoped = this.inputs.scopedOverrides ?? {};

    for (const [path, values] of Object.entries(scoped)) {
      out.set(path, new Map(Object.entries(values).map(([name, raw]): [string, Value] => [name, fromJSON(raw)])));
    }

    const root = out.get(ROOT_MODULE) ?? new Map<string, Value>();
    for (const [name, raw] of Object.entries(this.inputs.overrides ?? {})) {
      root.set(name, fromJSON(raw));
    }
    out.set(ROOT_MODULE, root);
    return out;
  }

  private collectFileValues(): Map<string, Value> {
    const values = new Map<string, Value>();
    for (const file of this.inputs.variableFiles ?? []) {
      for (const [name, expression] of Object.entries(file.attributes)) {
        values.set(name, this.constants.evaluate(expression));
      }
    }
    return values;
  }

  // ==========================================================================
  // One Module
  // ==========================================================================

  private resolveModule(
    plan: ModulePlan,
    current: ReadonlyMap<ModulePath, Scope>,
    lookup: ScopeLookup
  ): Scope {
    const parentPath = parentModulePath(plan.path);
    const parent = parentPath === null ? undefined : current.get(parentPath);
    const parentPlan = parentPath === null ? undefined : this.plansByPath.get(parentPath);
    const call = parentPlan?.moduleCalls.get(moduleCallName(plan.path));

    let enabled = parent ? parent.enabled : true;
    let args = new Map<string, Value>();

    if (parent && call) {
      const callEvaluator = new Evaluator(new ScopeEnvironment(parent, lookup, this.options.workspace));
      enabled = enabled && this.callEnabled(call, callEvaluator);
      args = this.callArguments(call, callEvaluator, plan);
    }

    const variables = this.resolveVariables(plan, args);
    const locals = new Map<string, Value>();
    for (const name of plan.cyclic) {
      locals.set(name, unresolved(`local.${name}`, [`local.${name}`]));
    }

    const state: ScopeState = {
      modulePath: plan.path,
      directory: plan.directory,
      variables,
      locals,
      moduleCalls: plan.callPaths,
    };
    const evaluator = new Evaluator(new ScopeEnvironment(state, lookup, this.options.workspace));

    for (const local of plan.locals) {
      locals.set(local.name, evaluator.evaluate(local.expression));
    }

    const outputs = new Map<string, Value>();
    for (const block of plan.outputs) {
      const expression = block.attributes.value;
      if (expression) {
        outputs.set(block.name, evaluator.evaluate(expression));
      }
    }

    return Object.freeze({
      ...state,
      outputs,
      enabled,
      failed: plan.cyclic.length > 0,
    });
  }

  private resolveVariables(plan: ModulePlan, args: ReadonlyMap<string, Value>): Map<string, Value> {
    const overrides = this.overrides.get(plan.path);
    const isRoot = plan.path === ROOT_MODULE;
    const variables = new Map<string, Value>();

    for (const block of plan.variables) {
      const name = block.name;
      const constraint = typeConstraint(block.attributes.type);
      const fromRootInputs = isRoot
        ? this.fileValues.get(name) ?? this.environmentValue(name, constraint)
        : undefined;

      const value =
        overrides?.get(name) ??
        fromRootInputs ??
        args.get(name) ??
        this.defaultValue(block) ??
        unresolved(`var.${name}`, [`var.${name}`]);

      variables.set(name, convertToType(value, constraint));
    }

    return variables;
  }

  private environmentValue(name: string, constraint: TypeConstraint): Value | undefined {
    const key = `TF_VAR_${name}`;
    const raw = this.inputs.environment?.[key];
    if (raw === undefined) {
      return undefined;
    }
    if (constraint !== 'structural') {
      return scalar(raw);
    }

    try {
      return this.constants.evaluate(parseExpressionText(raw, { file: key, line: 1, column: 1 }));
    } catch (error) {
      if (error instanceof MalformedConfigError) {
        return scalar(raw);
      }
      throw error;
    }
  }

  private defaultValue(block: Block): Value | undefined {
    const expression = block.attributes.default;
    return expression ? this.constants.evaluate(expression) : undefined;
  }

  // ==========================================================================
  // Module Calls
  // ==========================================================================

  /**
   * A zero count or an empty for_each disables the called module. Anything
   * unresolved keeps it.
   */
  private callEnabled(call: Block, evaluator: Evaluator): boolean {
    const count = call.attributes.count;
    if (count) {
      const n = asNumber(evaluator.evaluate(count));
      if (n !== null && n <= 0) {
        return false;
      }
    }

    const forEach = call.attributes.for_each;
    if (forEach) {
      const collection = evaluator.evaluate(forEach);
      if (collection.kind === 'list' && collection.items.length === 0) return false;
      if (collection.kind === 'map' && collection.entries.size === 0) return false;
    }

    return true;
  }

  private callArguments(call: Block, evaluator: Evaluator, child: ModulePlan): Map<string, Value> {
    const args = new Map<string, Value>();

    for (const [name, expression] of Object.entries(call.attributes)) {
      if (MODULE_META_ARGUMENTS.has(name)) continue;

      if (!child.declared.has(name)) {
        this.sink.report({
          code: ResolutionErrorCodes.UNDECLARED_MODULE_INPUT,
          severity: 'warning',
          message: `Module call '${call.name}' passes '${name}', which the module does not declare`,
          module: child.path,
          subject: name,
          location: { file: call.file, line: call.line },
        });
        continue;
      }

      args.set(name, evaluator.evaluate(expression));
    }

    return args;
  }
}

/**
 * Resolve the scope of every module in the parsed configuration
 */
export function resolveScopes(
  parsed: ParsedConfig,
  inputs: ResolutionInputs,
  sink: DiagnosticsSink,
  options: ResolverOptions
): ScopeTable {
  return new VariableResolver(parsed, inputs, sink, options).resolve();
}
