/**
 * Metadata Extractor & Substitutor
 * @module metadata/metadata-extractor
 *
 * Flattens every resource and data block of a live module into a metadata
 * record whose attributes have variables, locals and module outputs
 * substituted from the owning scope.
 */

import type { StructuredLogger } from '../logging';
import { createModuleLogger } from '../logging';
import type { Block, ParsedConfig } from '../parsers/terraform/block-parser';
import type { HCLExpression, TerraformBlock } from '../parsers/terraform/types';
import type { Bindings, IterationContext } from '../resolver/evaluator';
import { Evaluator } from '../resolver/evaluator';
import type { Scope, ScopeEnvironment, ScopeTable } from '../resolver/scope';
import { environmentFor } from '../resolver/scope';
import {
  Value,
  list,
  map,
  reference,
  scalar,
  unresolved,
} from '../resolver/value';
import { ModulePath, compareModulePaths, resourceAddress } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface SourceReference {
  readonly file: string;
  readonly line: number;
}

/**
 * How many instances a resource has
 */
export type ConditionDescriptor =
  | { readonly kind: 'static' }
  | {
      readonly kind: 'count' | 'for_each';
      readonly expression: string;
      readonly value: Value;
    };

export interface ResourceMetadata {
  /** `type.name` or `data.type.name` */
  readonly address: string;
  readonly kind: 'resource' | 'data';
  readonly type: string;
  readonly name: string;
  readonly modulePath: ModulePath;
  /** Declaration order */
  readonly attributes: ReadonlyMap<string, Value>;
  readonly condition: ConditionDescriptor;
  /** Null for resources added by an annotation overlay */
  readonly source: SourceReference | null;
}

/**
 * A resource ready for expansion
 */
export interface ExtractedResource {
  readonly metadata: ResourceMetadata;
  /** Attribute values set after extraction; they win over evaluated ones */
  readonly overrides: ReadonlyMap<string, Value>;
  /** Attributes of one instance, with `count.index` and `each.*` bound */
  evaluate(iteration: IterationContext): ReadonlyMap<string, Value>;
  withOverrides(values: ReadonlyMap<string, Value>): ExtractedResource;
}

export interface ExtractorOptions {
  workspace: string;
  logger?: StructuredLogger;
}

/** Meta-arguments that never become attributes */
const META_ARGUMENTS = new Set(['count', 'for_each']);

/** Nested blocks that configure the resource's lifecycle rather than the resource */
const META_BLOCKS = new Set(['lifecycle']);

function mergeOverrides(base: ReadonlyMap<string, Value>, values: ReadonlyMap<string, Value>): Map<string, Value> {
  const merged = new Map(base);
  for (const [name, value] of values) {
    merged.set(name, value);
  }
  return merged;
}

// ============================================================================
// Attribute Evaluation
// ============================================================================

/**
 * Evaluates a block body into an attribute map
 */
export class BodyEvaluator {
  constructor(private readonly evaluator: Evaluator) {}

  evaluateBody(
    attributes: Readonly<Record<string, HCLExpression>>,
    nestedBlocks: readonly TerraformBlock[],
    bindings?: Bindings,
    skip: ReadonlySet<string> = META_ARGUMENTS
  ): Map<string, Value> {
    const out = new Map<string, Value>();

    for (const [name, expression] of Object.entries(attributes)) {
      if (skip.has(name)) continue;
      out.set(name, name === 'provider' ? providerValue(expression) : this.evaluator.evaluate(expression, bindings));
    }

    const nested = new Map<string, Value[]>();
    const append = (key: string, value: Value): void => {
      const items = nested.get(key) ?? [];
      items.push(value);
      nested.set(key, items);
    };

    for (const block of nestedBlocks) {
      if (META_BLOCKS.has(block.type)) continue;

      if (block.type === 'dynamic') {
        const [label] = block.labels;
        if (label === undefined) continue;
        for (const body of this.expandDynamic(block, label, bindings)) {
          append(label, body);
        }
        continue;
      }

      const body = map(this.evaluateBody(block.attributes, block.nestedBlocks, bindings, new Set()));
      append(block.type, block.labels.length > 0 ? map(new Map<string, Value>([[block.labels.join('.'), body]])) : body);
    }

    for (const [key, items] of nested) {
      if (!out.has(key)) {
        out.set(key, list(items));
      }
    }

    return out;
  }

  /**
   * `dynamic "x" { for_each = ...; content { ... } }` becomes one `x` body per
   * element, with the iterator bound to `{ key, value }`
   */
  private expandDynamic(block: TerraformBlock, label: string, bindings?: Bindings): Value[] {
    const content = block.nestedBlocks.find((nested) => nested.type === 'content');
    const forEach = block.attributes.for_each;
    if (!content || !forEach) {
      return [];
    }

    const iteratorName = this.iteratorName(block, label);
    const collection = this.evaluator.evaluate(forEach, bindings);
    const outer = bindings ?? new Map<string, Value>();

    const bodyFor = (iterator: Value): Value => {
      const inner = new Map(outer);
      inner.set(iteratorName, iterator);
      return map(this.evaluateBody(content.attributes, content.nestedBlocks, inner, new Set()));
    };

    switch (collection.kind) {
      case 'list':
        return collection.items.map((item, i) => bodyFor(map(new Map<string, Value>([['key', scalar(i)], ['value', item]]))));
      case 'map':
        return [...collection.entries]
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
          .map(([key, item]) => bodyFor(map(new Map<string, Value>([['key', scalar(key)], ['value', item]]))));
      case 'scalar':
        return collection.value === null ? [] : [bodyFor(unresolved(iteratorName, [forEach.raw]))];
      case 'reference':
        return [bodyFor(reference(`\${${iteratorName}}`, collection.targets))];
      case 'unresolved':
        return [bodyFor(unresolved(iteratorName, collection.causes, collection.targets))];
    }
  }

  private iteratorName(block: TerraformBlock, label: string): string {
    const iterator = block.attributes.iterator;
    if (iterator && iterator.type === 'reference' && iterator.parts.length === 1) {
      return iterator.parts[0];
    }
    return label;
  }
}

/**
 * `provider = aws.west` names a provider configuration, not a resource
 */
function providerValue(expression: HCLExpression): Value {
  if (expression.type === 'literal' && typeof expression.value === 'string') {
    return scalar(expression.value);
  }
  return scalar(expression.raw);
}

// ============================================================================
// Resources
// ============================================================================

class BlockResource implements ExtractedResource {
  constructor(
    readonly metadata: ResourceMetadata,
    private readonly block: Block,
    private readonly environment: ScopeEnvironment,
    readonly overrides: ReadonlyMap<string, Value> = new Map()
  ) {}

  evaluate(iteration: IterationContext): ReadonlyMap<string, Value> {
    const evaluator = new Evaluator(this.environment.withIteration(iteration));
    const attributes = new BodyEvaluator(evaluator).evaluateBody(this.block.attributes, this.block.nestedBlocks);
    return mergeOverrides(attributes, this.overrides);
  }

  withOverrides(values: ReadonlyMap<string, Value>): ExtractedResource {
    const overrides = mergeOverrides(this.overrides, values);
    return new BlockResource(
      { ...this.metadata, attributes: mergeOverrides(this.metadata.attributes, values) },
      this.block,
      this.environment,
      overrides
    );
  }
}

/**
 * A resource whose attributes are fixed values
 */
export class StaticResource implements ExtractedResource {
  readonly overrides: ReadonlyMap<string, Value> = new Map();

  constructor(readonly metadata: ResourceMetadata) {}

  evaluate(): ReadonlyMap<string, Value> {
    return this.metadata.attributes;
  }

  withOverrides(values: ReadonlyMap<string, Value>): ExtractedResource {
    return new StaticResource({
      ...this.metadata,
      attributes: mergeOverrides(this.metadata.attributes, values),
    });
  }
}

// ============================================================================
// Extraction
// ============================================================================

function describeCondition(block: Block, evaluator: Evaluator): ConditionDescriptor {
  const kind = block.attributes.count ? 'count' : block.attributes.for_each ? 'for_each' : null;
  const expression = kind === null ? undefined : block.attributes[kind];
  if (kind === null || !expression) {
    return { kind: 'static' };
  }

  return { kind, expression: expression.raw, value: evaluator.evaluate(expression) };
}

export class MetadataExtractor {
  private readonly logger: StructuredLogger;

  constructor(private readonly options: ExtractorOptions) {
    this.logger = options.logger ?? createModuleLogger('metadata-extractor');
  }

  extract(parsed: ParsedConfig, scopes: ScopeTable): ExtractedResource[] {
    const resources: ExtractedResource[] = [];
    const modules = [...parsed.modules.values()].sort((a, b) => compareModulePaths(a.path, b.path));

    for (const module of modules) {
      const scope = scopes.get(module.path);
      if (!scope || !scope.enabled) continue;

      if (scope.failed) {
        this.logger.debug(
          { event: 'module_excluded', modulePath: module.path },
          'Excluding resources of a module with cyclic locals'
        );
        continue;
      }

      for (const block of module.blocks) {
        if ((block.kind === 'resource' || block.kind === 'data') && block.type !== null) {
          resources.push(this.extractBlock(block, block.kind, block.type, scope, scopes));
        }
      }
    }

    return resources;
  }

  private extractBlock(
    block: Block,
    kind: 'resource' | 'data',
    type: string,
    scope: Scope,
    scopes: ScopeTable
  ): ExtractedResource {
    const environment = environmentFor(scopes, scope, this.options.workspace);
    const evaluator = new Evaluator(environment);

    const metadata: ResourceMetadata = {
      address: resourceAddress(kind, type, block.name),
      kind,
      type,
      name: block.name,
      modulePath: block.modulePath,
      attributes: new BodyEvaluator(evaluator).evaluateBody(block.attributes, block.nestedBlocks),
      condition: describeCondition(block, evaluator),
      source: { file: block.file, line: block.line },
    };

    return new BlockResource(metadata, block, environment);
  }
}

/**
 * Extract every resource and data source of every live module
 */
export function extractMetadata(
  parsed: ParsedConfig,
  scopes: ScopeTable,
  options: ExtractorOptions
): ExtractedResource[] {
  return new MetadataExtractor(options).extract(parsed, scopes);
}
