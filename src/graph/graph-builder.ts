/**
 * Graph Builder
 * @module graph/graph-builder
 *
 * Derives the dependency graph from reference targets found anywhere in
 * instance attributes. A target without an index fans out to every instance
 * of the target; a module target covers every instance in the module's
 * subtree.
 */

import type { ResourceInstance } from '../expansion';
import type { StructuredLogger } from '../logging';
import { createModuleLogger } from '../logging';
import type { EdgeOverlay } from '../metadata';
import { ReferenceTarget, collectTargets } from '../resolver/value';
import {
  UNKNOWN_COUNT_KEY,
  baseIdentity,
  instanceIdentity,
  isWithinModule,
  matchesIdentityPattern,
} from '../types';
import { findCycles } from './algorithms';

// ============================================================================
// Types
// ============================================================================

/**
 * Instance identity to the identities it depends on, sorted
 */
export type Graph = ReadonlyMap<string, readonly string[]>;

export interface ValidationIssue {
  code: 'DANGLING_TARGET' | 'SELF_LOOP' | 'CYCLE_DETECTED';
  message: string;
  nodeId?: string;
  nodes?: string[];
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface GraphBuilderOptions {
  overlay?: EdgeOverlay;
  logger?: StructuredLogger;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ============================================================================
// Builder
// ============================================================================

export class GraphBuilder {
  private readonly logger: StructuredLogger;
  private readonly byBase = new Map<string, ResourceInstance[]>();

  constructor(
    private readonly instances: readonly ResourceInstance[],
    private readonly options: GraphBuilderOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('graph-builder');
    for (const instance of instances) {
      const group = this.byBase.get(instance.base) ?? [];
      group.push(instance);
      this.byBase.set(instance.base, group);
    }
  }

  build(): Graph {
    const startTime = Date.now();
    const edges = new Map<string, Set<string>>();

    for (const instance of this.instances) {
      const dependencies = new Set<string>();
      for (const value of instance.metadata.attributes.values()) {
        for (const target of collectTargets(value)) {
          for (const id of this.resolveTarget(target)) {
            dependencies.add(id);
          }
        }
      }
      edges.set(instance.identity, dependencies);
    }

    if (this.options.overlay) {
      this.applyOverlay(edges, this.options.overlay);
    }

    const graph = new Map<string, string[]>();
    let edgeCount = 0;
    for (const [id, dependencies] of edges) {
      dependencies.delete(id);
      const sorted = [...dependencies].sort(compareIds);
      edgeCount += sorted.length;
      graph.set(id, sorted);
    }

    this.logger.graphBuilt(graph.size, edgeCount, Date.now() - startTime);
    return graph;
  }

  /**
   * Instance identities a reference target stands for
   */
  private resolveTarget(target: ReferenceTarget): string[] {
    if (target.kind === 'module') {
      return this.instances
        .filter((instance) => isWithinModule(instance.metadata.modulePath, target.modulePath))
        .map((instance) => instance.identity);
    }

    const candidates = this.byBase.get(baseIdentity(target.modulePath, target.address)) ?? [];
    if (target.index === undefined) {
      return candidates.map((instance) => instance.identity);
    }

    const wanted = instanceIdentity(baseIdentity(target.modulePath, target.address), target.index);
    const exact = candidates.find((instance) => instance.identity === wanted);
    if (exact) {
      return [exact.identity];
    }

    // Unrepeated or uncounted targets have a single instance for any index
    const [only] = candidates;
    if (candidates.length === 1 && (only.key === null || only.key === UNKNOWN_COUNT_KEY)) {
      return [only.identity];
    }
    return [];
  }

  private matching(pattern: string): string[] {
    return this.instances
      .filter(
        (instance) =>
          matchesIdentityPattern(instance.identity, pattern) || matchesIdentityPattern(instance.base, pattern)
      )
      .map((instance) => instance.identity);
  }

  private applyOverlay(edges: Map<string, Set<string>>, overlay: EdgeOverlay): void {
    for (const [from, targets] of Object.entries(overlay.connect)) {
      const sources = this.matching(from);
      const resolved = targets.flatMap((target) => this.matching(target));
      if (sources.length === 0 || resolved.length < targets.length) {
        this.logger.debug({ event: 'overlay_unmatched', from, targets }, 'Overlay connection matches no instance');
      }
      for (const source of sources) {
        const dependencies = edges.get(source);
        for (const id of resolved) dependencies?.add(id);
      }
    }

    for (const [from, targets] of Object.entries(overlay.disconnect)) {
      const removed = new Set(targets.flatMap((target) => this.matching(target)));
      for (const source of this.matching(from)) {
        const dependencies = edges.get(source);
        for (const id of removed) dependencies?.delete(id);
      }
    }
  }
}

/**
 * Build the dependency graph of a set of instances
 */
export function buildGraph(
  instances: readonly ResourceInstance[],
  overlay?: EdgeOverlay,
  logger?: StructuredLogger
): Graph {
  return new GraphBuilder(instances, { overlay, logger }).build();
}

// ============================================================================
// Validation
// ============================================================================

export class GraphValidator {
  validate(graph: Graph): ValidationResult {
    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];

    for (const [id, dependencies] of graph) {
      for (const target of dependencies) {
        if (!graph.has(target)) {
          errors.push({
            code: 'DANGLING_TARGET',
            message: `${id} depends on unknown instance ${target}`,
            nodeId: id,
          });
        }
        if (target === id) {
          errors.push({ code: 'SELF_LOOP', message: `${id} depends on itself`, nodeId: id });
        }
      }
    }

    for (const cycle of this.findCycles(graph)) {
      warnings.push({
        code: 'CYCLE_DETECTED',
        message: `Dependency cycle between ${cycle.join(', ')}`,
        nodes: cycle,
      });
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  findCycles(graph: Graph): string[][] {
    return findCycles(graph.keys(), graph).map((cycle) => [...cycle].sort(compareIds));
  }

  /**
   * Instances nothing depends on and that depend on nothing
   */
  findOrphanNodes(graph: Graph): string[] {
    const connected = new Set<string>();
    for (const [id, dependencies] of graph) {
      if (dependencies.length > 0) connected.add(id);
      for (const target of dependencies) connected.add(target);
    }
    return [...graph.keys()].filter((id) => !connected.has(id));
  }
}
