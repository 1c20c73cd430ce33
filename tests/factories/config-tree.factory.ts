/**
 * Configuration Tree Factories
 * @module tests/factories/config-tree
 *
 * Builds in-memory configuration trees and runs pipeline stages on them.
 */

import { loadConfig } from '@/config';
import type { PipelineConfig, PipelineConfigInput } from '@/config';
import { CollectingDiagnosticsSink } from '@/diagnostics';
import { createLogger } from '@/logging';
import type { StructuredLogger } from '@/logging';
import { parseConfigTree } from '@/parsers/terraform/block-parser';
import type { ParsedConfig } from '@/parsers/terraform/block-parser';
import { extractMetadata } from '@/metadata';
import type { ExtractedResource } from '@/metadata';
import { compileConfiguration } from '@/pipeline';
import type { CompileInputs, PipelineResult } from '@/pipeline';
import { resolveScopes } from '@/resolver';
import type { ResolutionInputs, ScopeTable } from '@/resolver';
import { ConfigTreeBuilder } from '@/sources';
import type { ConfigFile, ConfigTree } from '@/sources';
import { ROOT_MODULE, compareModulePaths, modulePathSegments } from '@/types';

/** File name to content, per module path */
export type ModuleFiles = Record<string, Record<string, string>>;

export function silentLogger(): StructuredLogger {
  return createLogger('test', undefined, { level: 'silent', pretty: false });
}

export function testConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  return loadConfig({ ...overrides, logging: { level: 'silent', pretty: false } }, {});
}

/**
 * Module `a.b` lives in `modules/a/b`; the root module in `.`
 */
export function createConfigTree(modules: ModuleFiles): ConfigTree {
  const builder = new ConfigTreeBuilder();
  const paths = Object.keys(modules).sort(compareModulePaths);

  for (const path of paths) {
    const directory = path === ROOT_MODULE ? '.' : `modules/${modulePathSegments(path).join('/')}`;
    builder.addModule(path, directory, 'test');
    for (const [name, content] of Object.entries(modules[path])) {
      builder.addFile(path, name, content);
    }
  }

  return builder.build();
}

export function createVariableFile(name: string, content: string): ConfigFile {
  return { name, path: name, content };
}

export function parseModules(modules: ModuleFiles): {
  parsed: ParsedConfig;
  sink: CollectingDiagnosticsSink;
} {
  const sink = new CollectingDiagnosticsSink();
  const parsed = parseConfigTree(createConfigTree(modules), sink, {}, silentLogger());
  return { parsed, sink };
}

export function resolveModules(
  modules: ModuleFiles,
  inputs: ResolutionInputs = {},
  maxPasses = 10
): { parsed: ParsedConfig; scopes: ScopeTable; sink: CollectingDiagnosticsSink } {
  const { parsed, sink } = parseModules(modules);
  const scopes = resolveScopes(parsed, inputs, sink, {
    maxPasses,
    workspace: 'default',
    logger: silentLogger(),
  });
  return { parsed, scopes, sink };
}

export function extractModules(
  modules: ModuleFiles,
  inputs: ResolutionInputs = {}
): { resources: ExtractedResource[]; sink: CollectingDiagnosticsSink } {
  const { parsed, scopes, sink } = resolveModules(modules, inputs);
  const resources = extractMetadata(parsed, scopes, { workspace: 'default', logger: silentLogger() });
  return { resources, sink };
}

export function compileModules(
  modules: ModuleFiles,
  inputs: CompileInputs = {},
  config: PipelineConfigInput = {}
): PipelineResult {
  return compileConfiguration(createConfigTree(modules), inputs, {
    config: testConfig(config),
    logger: silentLogger(),
  });
}

/**
 * Graph edges as `from -> to` strings, sorted
 */
export function edgeList(result: PipelineResult): string[] {
  const edges: string[] = [];
  for (const [from, targets] of result.graph) {
    for (const to of targets) {
      edges.push(`${from} -> ${to}`);
    }
  }
  return edges.sort();
}

export function identities(result: PipelineResult): string[] {
  return result.instances.map((instance) => instance.identity);
}
