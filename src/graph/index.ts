/**
 * Dependency Graph
 * @module graph
 */

export {
  findCycles,
  tarjanSCC,
  type Adjacency,
  type StronglyConnectedComponent,
} from './algorithms';

export {
  GraphBuilder,
  GraphValidator,
  buildGraph,
  type Graph,
  type GraphBuilderOptions,
  type ValidationIssue,
  type ValidationResult,
} from './graph-builder';
