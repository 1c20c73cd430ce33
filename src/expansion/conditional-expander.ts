/**
 * Conditional Expander
 * @module expansion/conditional-expander
 *
 * Turns each extracted resource into its concrete instances according to
 * its `count` or `for_each`. A gate whose value cannot be decided keeps the
 * resource as a single `unknown-count` instance, and so does one asking for
 * more instances than `maxInstances`.
 */

import type { DiagnosticsSink } from '../diagnostics';
import { ResolutionErrorCodes } from '../errors';
import type { StructuredLogger } from '../logging';
import { createModuleLogger } from '../logging';
import type { ConditionDescriptor, ExtractedResource, ResourceMetadata } from '../metadata';
import type { IterationContext } from '../resolver/evaluator';
import { asNumber } from '../resolver/functions';
import { Value, collectCauses, scalar, scalarToString } from '../resolver/value';
import {
  InstanceKey,
  UNKNOWN_COUNT_KEY,
  baseIdentity,
  displayModulePath,
  instanceIdentity,
} from '../types';

// ============================================================================
// Types
// ============================================================================

/**
 * One concrete occurrence of a resource
 */
export interface ResourceInstance {
  /** `<base>[.<index-or-key>]` */
  readonly identity: string;
  /** Identity of the declaration, shared by all of its instances */
  readonly base: string;
  /** Null for resources without count or for_each */
  readonly key: InstanceKey | null;
  /** Attributes evaluated for this instance */
  readonly metadata: ResourceMetadata;
}

export interface ExpanderOptions {
  /** Largest instance count expanded for one resource */
  maxInstances: number;
}

const DEFAULT_OPTIONS: ExpanderOptions = {
  maxInstances: 10_000,
};

type Cardinality =
  | { readonly kind: 'single' }
  | { readonly kind: 'count'; readonly count: number }
  | { readonly kind: 'each'; readonly entries: ReadonlyArray<readonly [string, Value]> }
  | { readonly kind: 'oversized'; readonly size: number }
  | { readonly kind: 'unknown' };

const UNKNOWN: Cardinality = { kind: 'unknown' };

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isIterationCause(cause: string): boolean {
  return cause === 'count.index' || cause.startsWith('each.');
}

// ============================================================================
// Cardinality
// ============================================================================

function countOf(value: Value): Cardinality {
  const n = asNumber(value);
  if (n === null || !Number.isFinite(n)) {
    return UNKNOWN;
  }
  return { kind: 'count', count: Math.max(0, Math.trunc(n)) };
}

/**
 * Maps iterate their entries; lists and sets iterate their distinct string
 * elements, each being both key and value
 */
function eachOf(value: Value): Cardinality {
  switch (value.kind) {
    case 'map':
      return {
        kind: 'each',
        entries: [...value.entries].sort(([a], [b]) => compareKeys(a, b)),
      };

    case 'list': {
      const keys = new Set<string>();
      for (const item of value.items) {
        const key = item.kind === 'scalar' && item.value !== null ? scalarToString(item.value) : null;
        if (key === null) {
          return UNKNOWN;
        }
        keys.add(key);
      }
      return {
        kind: 'each',
        entries: [...keys].sort(compareKeys).map((key): [string, Value] => [key, scalar(key)]),
      };
    }

    default:
      return UNKNOWN;
  }
}

/**
 * An undecided conditional gate evaluates to an unresolved value, so it
 * lands on `unknown` like any other unresolved count or for_each
 */
function cardinalityOf(condition: ConditionDescriptor, maxInstances: number): Cardinality {
  if (condition.kind === 'static') {
    return { kind: 'single' };
  }

  const decided = condition.kind === 'count' ? countOf(condition.value) : eachOf(condition.value);
  const size =
    decided.kind === 'count' ? decided.count : decided.kind === 'each' ? decided.entries.length : 0;
  if (!Number.isSafeInteger(size) || size > maxInstances) {
    return { kind: 'oversized', size };
  }
  return decided;
}

// ============================================================================
// Expander
// ============================================================================

export class ConditionalExpander {
  private readonly options: ExpanderOptions;
  private readonly logger: StructuredLogger;
  private readonly reported = new Set<string>();

  constructor(
    private readonly sink: DiagnosticsSink,
    options: Partial<ExpanderOptions> = {},
    logger?: StructuredLogger
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = logger ?? createModuleLogger('conditional-expander');
  }

  expand(resources: readonly ExtractedResource[]): ResourceInstance[] {
    const instances: ResourceInstance[] = [];

    for (const resource of resources) {
      instances.push(...this.expandResource(resource));
    }

    this.logger.instancesExpanded(resources.length, instances.length);
    return instances;
  }

  private expandResource(resource: ExtractedResource): ResourceInstance[] {
    const { metadata } = resource;
    const base = baseIdentity(metadata.modulePath, metadata.address);
    const cardinality = cardinalityOf(metadata.condition, this.options.maxInstances);

    if (metadata.condition.kind !== 'static') {
      this.reportCauses(metadata, collectCauses(metadata.condition.value), `the ${metadata.condition.kind} of ${base}`);
    }

    const instance = (key: InstanceKey | null, iteration: IterationContext): ResourceInstance => {
      const attributes = resource.evaluate(iteration);
      const identity = instanceIdentity(base, key);
      const causes = [...attributes.values()].flatMap((value) => collectCauses(value));
      this.reportCauses(
        metadata,
        key === UNKNOWN_COUNT_KEY ? causes.filter((cause) => !isIterationCause(cause)) : causes,
        identity
      );
      return { identity, base, key, metadata: { ...metadata, attributes } };
    };

    switch (cardinality.kind) {
      case 'single':
        return [instance(null, {})];

      case 'count':
        return Array.from({ length: cardinality.count }, (_, i) => instance(i, { countIndex: scalar(i) }));

      case 'each':
        return cardinality.entries.map(([key, value]) =>
          instance(key, { eachKey: scalar(key), eachValue: value })
        );

      case 'unknown':
        // Unresolved causes were already reported against the condition
        if (metadata.condition.kind !== 'static' && collectCauses(metadata.condition.value).length === 0) {
          this.sink.report({
            code: ResolutionErrorCodes.UNKNOWN_COUNT,
            severity: 'info',
            message: `Instance count of ${base} is not known before apply`,
            module: metadata.modulePath,
            subject: base,
            location: metadata.source ?? undefined,
          });
        }
        return [instance(UNKNOWN_COUNT_KEY, {})];

      case 'oversized':
        this.sink.report({
          code: ResolutionErrorCodes.UNKNOWN_COUNT,
          severity: 'warning',
          message: `Instance count ${cardinality.size} of ${base} exceeds the limit of ${this.options.maxInstances}`,
          module: metadata.modulePath,
          subject: base,
          location: metadata.source ?? undefined,
        });
        return [instance(UNKNOWN_COUNT_KEY, {})];
    }
  }

  /**
   * One warning per module and cause
   */
  private reportCauses(metadata: ResourceMetadata, causes: readonly string[], consumer: string): void {
    for (const cause of causes) {
      const key = `${metadata.modulePath}\u0000${cause}`;
      if (this.reported.has(key)) continue;
      this.reported.add(key);

      this.sink.report({
        code: ResolutionErrorCodes.UNRESOLVED_REFERENCE,
        severity: 'warning',
        message: `Unresolved reference ${cause} used by ${consumer} in module ${displayModulePath(metadata.modulePath)}`,
        module: metadata.modulePath,
        subject: cause,
        location: metadata.source ?? undefined,
      });
    }
  }
}

/**
 * Expand extracted resources into concrete instances
 */
export function expandResources(
  resources: readonly ExtractedResource[],
  sink: DiagnosticsSink,
  options: Partial<ExpanderOptions> = {},
  logger?: StructuredLogger
): ResourceInstance[] {
  return new ConditionalExpander(sink, options, logger).expand(resources);
}
