/**
 * Block Parser
 * Turns every file of a configuration tree into typed blocks that carry
 * their module path and source position.
 */

import { MalformedConfigError, ParserErrorCodes } from '../../errors';
import type { DiagnosticsSink } from '../../diagnostics';
import type { StructuredLogger } from '../../logging';
import { createModuleLogger } from '../../logging';
import type { ConfigFile, ConfigTree } from '../../sources/config-tree';
import type { ModulePath } from '../../types';
import { HCLParser } from './hcl-parser';
import { JSONConfigParser } from './json-config-parser';
import type { HCLExpression, ParserOptions, TerraformBlock, TerraformFile } from './types';

// ============================================================================
// Types
// ============================================================================

export type BlockKind =
  | 'resource'
  | 'data'
  | 'module'
  | 'variable'
  | 'locals'
  | 'output'
  | 'provider'
  | 'terraform'
  | 'opaque';

export interface Block {
  readonly kind: BlockKind;
  /** Keyword as written, e.g. `resource` or an unknown `moved` */
  readonly keyword: string;
  /** Resource or data source type */
  readonly type: string | null;
  /** Resource, variable, output, module call or provider name */
  readonly name: string;
  readonly labels: readonly string[];
  readonly modulePath: ModulePath;
  readonly attributes: Readonly<Record<string, HCLExpression>>;
  readonly nestedBlocks: readonly TerraformBlock[];
  readonly file: string;
  readonly line: number;
}

export interface ParsedModule {
  readonly path: ModulePath;
  readonly directory: string;
  readonly blocks: readonly Block[];
}

export interface ParsedConfig {
  readonly modules: ReadonlyMap<ModulePath, ParsedModule>;
}

/** Keywords understood by the configuration language that carry nothing this pipeline models */
const IGNORED_KEYWORDS = new Set(['moved', 'import', 'removed', 'check']);

const REQUIRED_LABELS: Partial<Record<BlockKind, number>> = {
  resource: 2,
  data: 2,
  module: 1,
  variable: 1,
  output: 1,
  provider: 1,
  locals: 0,
  terraform: 0,
};

const KNOWN_KINDS: ReadonlyMap<string, BlockKind> = new Map<string, BlockKind>([
  ['resource', 'resource'],
  ['data', 'data'],
  ['module', 'module'],
  ['variable', 'variable'],
  ['locals', 'locals'],
  ['output', 'output'],
  ['provider', 'provider'],
  ['terraform', 'terraform'],
]);

function blockKind(keyword: string): BlockKind {
  return KNOWN_KINDS.get(keyword) ?? 'opaque';
}

export function isJSONConfigFile(name: string): boolean {
  return name.endsWith('.json');
}

// ============================================================================
// Block Parser
// ============================================================================

export class BlockParser {
  private readonly hcl: HCLParser;
  private readonly json: JSONConfigParser;
  private readonly logger: StructuredLogger;

  constructor(options: Partial<ParserOptions> = {}, logger?: StructuredLogger) {
    this.hcl = new HCLParser(options);
    this.json = new JSONConfigParser(options);
    this.logger = logger ?? createModuleLogger('block-parser');
  }

  /**
   * Parse the raw syntax of one file
   */
  parseSyntax(file: ConfigFile): TerraformFile {
    const start = Date.now();
    try {
      const parsed = isJSONConfigFile(file.name)
        ? this.json.parse(file.content, file.path)
        : this.hcl.parse(file.content, file.path);
      this.logger.parserCompleted(file.path, Date.now() - start, parsed.blocks.length);
      return parsed;
    } catch (error) {
      if (error instanceof Error) {
        this.logger.parserFailed(file.path, error);
      }
      throw error;
    }
  }

  /**
   * Parse a variable definitions file (`.tfvars` or `.tfvars.json`)
   */
  parseVariableFile(file: ConfigFile): TerraformFile {
    const parsed = isJSONConfigFile(file.name)
      ? this.json.parse(file.content, file.path, 'variables')
      : this.hcl.parse(file.content, file.path);
    this.logger.debug(
      { event: 'variable_file_parsed', filePath: file.path, count: Object.keys(parsed.attributes).length },
      `Parsed variable file ${file.path}`
    );
    return parsed;
  }

  /**
   * Parse one file into blocks belonging to `modulePath`
   */
  parseFile(file: ConfigFile, modulePath: ModulePath, sink: DiagnosticsSink): Block[] {
    const parsed = this.parseSyntax(file);
    return parsed.blocks.map((block) => this.toBlock(block, modulePath, sink));
  }

  parseTree(tree: ConfigTree, sink: DiagnosticsSink): ParsedConfig {
    const modules = new Map<ModulePath, ParsedModule>();

    for (const entry of tree.modules.values()) {
      const blocks = entry.files.flatMap((file) => this.parseFile(file, entry.path, sink));
      modules.set(entry.path, Object.freeze({
        path: entry.path,
        directory: entry.directory,
        blocks: Object.freeze(blocks),
      }));
    }

    return { modules };
  }

  private toBlock(block: TerraformBlock, modulePath: ModulePath, sink: DiagnosticsSink): Block {
    const kind = blockKind(block.type);
    const required = REQUIRED_LABELS[kind];

    if (required !== undefined && block.labels.length !== required) {
      throw new MalformedConfigError(
        block.location.file,
        { line: block.location.lineStart, column: block.location.columnStart },
        `${block.type} block requires ${required} label(s), found ${block.labels.length}`
      );
    }

    if (kind === 'opaque' && !IGNORED_KEYWORDS.has(block.type)) {
      sink.report({
        code: ParserErrorCodes.UNKNOWN_BLOCK_KIND,
        severity: 'warning',
        message: `Unknown block kind '${block.type}' kept as opaque block`,
        module: modulePath,
        subject: block.type,
        location: { file: block.location.file, line: block.location.lineStart },
      });
    }

    const typed = kind === 'resource' || kind === 'data';

    return Object.freeze({
      kind,
      keyword: block.type,
      type: typed ? block.labels[0] : null,
      name: typed ? block.labels[1] : block.labels[0] ?? '',
      labels: block.labels,
      modulePath,
      attributes: block.attributes,
      nestedBlocks: block.nestedBlocks,
      file: block.location.file,
      line: block.location.lineStart,
    });
  }
}

/**
 * Parse every file of every module in the tree
 */
export function parseConfigTree(
  tree: ConfigTree,
  sink: DiagnosticsSink,
  options: Partial<ParserOptions> = {},
  logger?: StructuredLogger
): ParsedConfig {
  return new BlockParser(options, logger).parseTree(tree, sink);
}
