/**
 * Terraform JSON Configuration Parser
 * Maps `.tf.json` and `.tfvars.json` documents onto the same block model as
 * the native syntax parser.
 */

import { MalformedConfigError, SourceErrorCodes, SourceUnavailableError } from '../../errors';
import { parseExpressionText, parseTemplate } from './expression-parser';
import {
  DEFAULT_PARSER_OPTIONS,
  HCLExpression,
  HCLObjectEntry,
  ParserOptions,
  SourceLocation,
  TerraformBlock,
  TerraformFile,
} from './types';

export type JSONDocumentKind = 'configuration' | 'variables';

type JSONRecord = { [key: string]: unknown };

function isRecord(value: unknown): value is JSONRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Number of labels each top-level block keyword takes in JSON syntax */
const LABEL_DEPTH: Record<string, number> = {
  resource: 2,
  data: 2,
  module: 1,
  variable: 1,
  output: 1,
  provider: 1,
  locals: 0,
  terraform: 0,
};

/** Keys that denote nested blocks rather than object-valued attributes */
const NESTED_BLOCK_KEYS = new Set(['lifecycle', 'provisioner', 'connection', 'dynamic']);

const COMMENT_KEY = '//';

// ============================================================================
// JSON Parser
// ============================================================================

export class JSONConfigParser {
  private readonly options: ParserOptions;

  constructor(options: Partial<ParserOptions> = {}) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
  }

  parse(content: string, filePath: string, kind: JSONDocumentKind = 'configuration'): TerraformFile {
    const size = Buffer.byteLength(content, 'utf-8');
    if (size > this.options.maxFileSize) {
      throw new SourceUnavailableError(
        filePath,
        `file size ${size} exceeds maximum ${this.options.maxFileSize}`,
        SourceErrorCodes.FILE_TOO_LARGE
      );
    }

    const document = this.decode(content, filePath);

    if (kind === 'variables') {
      const attributes: Record<string, HCLExpression> = {};
      for (const [name, value] of Object.entries(document)) {
        attributes[name] = literalExpression(value);
      }
      return { path: filePath, blocks: [], attributes, size };
    }

    const location = wholeFileLocation(filePath, content);
    const blocks: TerraformBlock[] = [];

    for (const [keyword, value] of Object.entries(document)) {
      if (keyword === COMMENT_KEY) {
        continue;
      }
      const depth = LABEL_DEPTH[keyword] ?? 0;
      this.collectBlocks(keyword, value, depth, [], location, blocks);
    }

    return { path: filePath, blocks, attributes: {}, size };
  }

  private decode(content: string, filePath: string): JSONRecord {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new MalformedConfigError(filePath, jsonErrorPosition(content, message), message);
    }

    if (!isRecord(document)) {
      throw new MalformedConfigError(filePath, { line: 1, column: 1 }, 'top-level value must be an object');
    }
    return document;
  }

  /**
   * Walk `depth` levels of label objects, then build one block per body.
   * Any level may be an array of objects, which repeats it.
   */
  private collectBlocks(
    keyword: string,
    value: unknown,
    depth: number,
    labels: string[],
    location: SourceLocation,
    out: TerraformBlock[]
  ): void {
    if (Array.isArray(value)) {
      for (const item of value) {
        this.collectBlocks(keyword, item, depth, labels, location, out);
      }
      return;
    }

    if (!isRecord(value)) {
      throw new MalformedConfigError(
        location.file,
        { line: 1, column: 1 },
        `'${[keyword, ...labels].join('.')}' must be an object`
      );
    }

    if (depth > 0) {
      for (const [label, inner] of Object.entries(value)) {
        if (label === COMMENT_KEY) continue;
        this.collectBlocks(keyword, inner, depth - 1, [...labels, label], location, out);
      }
      return;
    }

    out.push(this.buildBlock(keyword, labels, value, location));
  }

  private buildBlock(
    keyword: string,
    labels: string[],
    body: JSONRecord,
    location: SourceLocation
  ): TerraformBlock {
    const attributes: Record<string, HCLExpression> = {};
    const nestedBlocks: TerraformBlock[] = [];

    for (const [key, value] of Object.entries(body)) {
      if (key === COMMENT_KEY) {
        continue;
      }

      const nested = NESTED_BLOCK_KEYS.has(key) || (keyword === 'dynamic' && key === 'content');
      if (keyword !== 'locals' && nested && typeof value === 'object' && value !== null) {
        const depth = key === 'dynamic' || key === 'provisioner' ? 1 : 0;
        this.collectBlocks(key, value, depth, [], location, nestedBlocks);
        continue;
      }

      attributes[key] = this.attributeExpression(keyword, key, value, location.file);
    }

    return { type: keyword, labels, attributes, nestedBlocks, location };
  }

  private attributeExpression(keyword: string, key: string, value: unknown, file: string): HCLExpression {
    const origin = { file, line: 1, column: 1 };

    // Type constraints and dependency lists are bare expressions in JSON syntax
    if (keyword === 'variable' && key === 'type' && typeof value === 'string') {
      return parseExpressionText(value, origin);
    }
    if (key === 'depends_on' && Array.isArray(value)) {
      return {
        type: 'array',
        elements: value.map((item) =>
          typeof item === 'string' ? parseExpressionText(item, origin) : literalExpression(item)
        ),
        raw: JSON.stringify(value),
      };
    }

    return templateExpression(value, file);
  }
}

// ============================================================================
// Value Conversion
// ============================================================================

/**
 * Convert a JSON value whose strings may contain interpolations
 */
function templateExpression(value: unknown, file: string): HCLExpression {
  if (typeof value === 'string') {
    return parseTemplate(value, { file, line: 1, column: 1 }, false, JSON.stringify(value));
  }
  if (Array.isArray(value)) {
    return {
      type: 'array',
      elements: value.map((item) => templateExpression(item, file)),
      raw: JSON.stringify(value),
    };
  }
  if (isRecord(value)) {
    return {
      type: 'object',
      entries: Object.entries(value)
        .filter(([key]) => key !== COMMENT_KEY)
        .map(([key, item]): HCLObjectEntry => ({
          key: { type: 'literal', value: key, raw: JSON.stringify(key) },
          value: templateExpression(item, file),
        })),
      raw: JSON.stringify(value),
    };
  }
  return literalExpression(value);
}

/**
 * Convert a JSON value taken verbatim
 */
function literalExpression(value: unknown): HCLExpression {
  if (Array.isArray(value)) {
    return { type: 'array', elements: value.map(literalExpression), raw: JSON.stringify(value) };
  }
  if (isRecord(value)) {
    return {
      type: 'object',
      entries: Object.entries(value).map(([key, item]): HCLObjectEntry => ({
        key: { type: 'literal', value: key, raw: JSON.stringify(key) },
        value: literalExpression(item),
      })),
      raw: JSON.stringify(value),
    };
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return { type: 'literal', value, raw: JSON.stringify(value) };
  }
  return { type: 'literal', value: null, raw: 'null' };
}

function wholeFileLocation(file: string, content: string): SourceLocation {
  const lines = content.split('\n');
  return {
    file,
    lineStart: 1,
    lineEnd: lines.length,
    columnStart: 1,
    columnEnd: lines[lines.length - 1].length + 1,
  };
}

function jsonErrorPosition(content: string, message: string): { line: number; column: number } {
  const match = /position (\d+)/.exec(message);
  if (!match) {
    return { line: 1, column: 1 };
  }
  const before = content.slice(0, Number(match[1]));
  const lines = before.split('\n');
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}
