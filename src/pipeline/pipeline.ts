/**
 * Pipeline
 * @module pipeline/pipeline
 *
 * Runs the stages in order: load sources, parse blocks, resolve scopes,
 * extract metadata, apply annotations, expand instances, build the graph.
 * Fatal errors propagate to the caller; everything else is collected as
 * diagnostics returned with the graph.
 */

import type { PipelineConfig } from '../config';
import { loadConfig } from '../config';
import type { Diagnostic } from '../diagnostics';
import { CollectingDiagnosticsSink, LoggingDiagnosticsSink } from '../diagnostics';
import { wrapError } from '../errors';
import type { ResourceInstance } from '../expansion';
import { expandResources } from '../expansion';
import type { Graph } from '../graph';
import { buildGraph } from '../graph';
import type { StructuredLogger } from '../logging';
import { createLogger, withLogging } from '../logging';
import type { AnnotationOverlay } from '../metadata';
import { applyAnnotations, extractMetadata, loadAnnotations } from '../metadata';
import { BlockParser } from '../parsers/terraform/block-parser';
import { resolveScopes } from '../resolver';
import type { CommandRunner, ConfigFile, ConfigTree } from '../sources';
import { loadSources } from '../sources';
import type { ModulePath } from '../types';

// ============================================================================
// Types
// ============================================================================

type Overrides = Readonly<Record<string, unknown>>;

/**
 * Inputs of a compilation besides the configuration tree
 */
export interface CompileInputs {
  /** Root module variable overrides, highest precedence */
  overrides?: Overrides;
  /** Variable overrides for any module, keyed by module path */
  scopedOverrides?: Readonly<Record<ModulePath, Overrides>>;
  /** Variable definition files, lowest precedence first */
  variableFiles?: readonly ConfigFile[];
  /** Source of `TF_VAR_` values; none when omitted */
  environment?: Readonly<Record<string, string | undefined>>;
  annotations?: AnnotationOverlay;
}

export interface PipelineRequest {
  /** Local directories or remote repository addresses, later ones win */
  locators: readonly string[];
  /** Extra variable definition files, lowest precedence first */
  variableFiles?: readonly string[];
  overrides?: Overrides;
  scopedOverrides?: Readonly<Record<ModulePath, Overrides>>;
  /** Defaults to `process.env` */
  environment?: Readonly<Record<string, string | undefined>>;
  annotations?: AnnotationOverlay;
  /** YAML overlay read when `annotations` is not given */
  annotationFile?: string;
}

export interface PipelineOptions {
  config?: PipelineConfig;
  logger?: StructuredLogger;
  /** Replaces the git executable */
  runner?: CommandRunner;
}

export interface PipelineResult {
  readonly graph: Graph;
  readonly instances: readonly ResourceInstance[];
  readonly diagnostics: readonly Diagnostic[];
}

// ============================================================================
// Pipeline
// ============================================================================

function pipelineLogger(config: PipelineConfig): StructuredLogger {
  return createLogger('infragraph', { module: 'pipeline' }, config.logging);
}

/**
 * Interpret a loaded configuration tree. Failures that are not pipeline
 * errors surface as `INTERNAL_ERROR`.
 */
export function compileConfiguration(
  tree: ConfigTree,
  inputs: CompileInputs = {},
  options: PipelineOptions = {}
): PipelineResult {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? pipelineLogger(config);

  try {
    return compile(tree, inputs, config, logger);
  } catch (error) {
    throw wrapError(error);
  }
}

function compile(
  tree: ConfigTree,
  inputs: CompileInputs,
  config: PipelineConfig,
  logger: StructuredLogger
): PipelineResult {
  const startTime = Date.now();

  const collected = new CollectingDiagnosticsSink();
  const sink = new LoggingDiagnosticsSink(collected, logger);

  const parser = new BlockParser({ maxFileSize: config.sources.maxFileSize }, logger.child({ stage: 'parse' }));
  const parsed = parser.parseTree(tree, sink);
  const variableFiles = (inputs.variableFiles ?? []).map((file) => parser.parseVariableFile(file));

  const scopes = resolveScopes(
    parsed,
    {
      overrides: inputs.overrides,
      scopedOverrides: inputs.scopedOverrides,
      variableFiles,
      environment: inputs.environment,
    },
    sink,
    {
      maxPasses: config.resolution.maxPasses,
      workspace: config.evaluation.workspace,
      logger: logger.child({ stage: 'resolve' }),
    }
  );

  const extracted = extractMetadata(parsed, scopes, {
    workspace: config.evaluation.workspace,
    logger: logger.child({ stage: 'extract' }),
  });
  const annotated = inputs.annotations ? applyAnnotations(extracted, inputs.annotations) : extracted;

  const instances = expandResources(
    annotated,
    sink,
    { maxInstances: config.resolution.maxInstances },
    logger.child({ stage: 'expand' })
  );
  const graph = buildGraph(instances, inputs.annotations, logger.child({ stage: 'graph' }));

  const diagnostics = collected.list();
  logger.pipelineCompleted(Date.now() - startTime, instances.length, diagnostics.length);

  return { graph, instances, diagnostics };
}

/**
 * Load sources and interpret them
 */
export async function runPipeline(
  request: PipelineRequest,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? pipelineLogger(config);

  const annotations =
    request.annotations ??
    (request.annotationFile !== undefined ? await loadAnnotations(request.annotationFile) : undefined);

  const loaded = await withLogging(logger, 'load_sources', () =>
    loadSources(request.locators, request.variableFiles ?? [], {
      sources: config.sources,
      runner: options.runner,
      logger: logger.child({ stage: 'sources' }),
    })
  );

  return compileConfiguration(
    loaded.tree,
    {
      overrides: request.overrides,
      scopedOverrides: request.scopedOverrides,
      variableFiles: loaded.variableFiles,
      environment: request.environment ?? process.env,
      annotations,
    },
    { ...options, config, logger }
  );
}
