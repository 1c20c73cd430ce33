/**
 * Terraform HCL2 Parser
 * Parses native-syntax configuration and variable definition files into
 * blocks and attributes.
 */

import { MalformedConfigError, SourceErrorCodes, SourceUnavailableError } from '../../errors';
import { HCLLexer, Token } from './hcl-lexer';
import { ExpressionParser, TokenCursor, parseTemplate } from './expression-parser';
import {
  DEFAULT_PARSER_OPTIONS,
  HCLExpression,
  ParserOptions,
  TerraformBlock,
  TerraformFile,
} from './types';

interface ParsedBody {
  attributes: Record<string, HCLExpression>;
  blocks: TerraformBlock[];
}

// ============================================================================
// HCL Parser
// ============================================================================

export class HCLParser {
  private readonly options: ParserOptions;

  constructor(options: Partial<ParserOptions> = {}) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
  }

  /**
   * Parse HCL content string
   */
  parse(content: string, filePath: string = '<input>'): TerraformFile {
    const size = Buffer.byteLength(content, 'utf-8');
    this.checkSize(size, filePath);

    const tokens = new HCLLexer(content, { file: filePath, line: 1, column: 1 }).tokenize();
    const session = new BodyParser(tokens, content, filePath);
    const body = session.parseBody('EOF');

    return {
      path: filePath,
      blocks: body.blocks,
      attributes: body.attributes,
      size,
    };
  }

  private checkSize(size: number, filePath: string): void {
    if (size > this.options.maxFileSize) {
      throw new SourceUnavailableError(
        filePath,
        `file size ${size} exceeds maximum ${this.options.maxFileSize}`,
        SourceErrorCodes.FILE_TOO_LARGE
      );
    }
  }
}

// ============================================================================
// Body Parsing
// ============================================================================

class BodyParser {
  private readonly cursor: TokenCursor;
  private readonly expressions: ExpressionParser;

  constructor(
    tokens: Token[],
    source: string,
    private readonly filePath: string
  ) {
    this.cursor = new TokenCursor(tokens);
    this.expressions = new ExpressionParser(this.cursor, source, filePath);
  }

  parseBody(terminator: 'EOF' | 'RBRACE'): ParsedBody {
    const attributes: Record<string, HCLExpression> = {};
    const blocks: TerraformBlock[] = [];

    for (;;) {
      this.cursor.skipNewlines();
      const token = this.cursor.peek();

      if (token.type === terminator) {
        return { attributes, blocks };
      }
      if (token.type !== 'IDENTIFIER') {
        throw this.expressions.unexpected(token, 'attribute or block');
      }

      if (this.cursor.peek(1).type === 'EQUALS') {
        this.cursor.next();
        this.cursor.next();
        if (Object.prototype.hasOwnProperty.call(attributes, token.value)) {
          throw new MalformedConfigError(
            this.filePath,
            { line: token.line, column: token.column },
            `duplicate attribute '${token.value}'`
          );
        }
        attributes[token.value] = this.expressions.parseExpression();
        this.expectItemEnd();
      } else {
        blocks.push(this.parseBlock());
      }
    }
  }

  private parseBlock(): TerraformBlock {
    const keyword = this.cursor.next();
    const labels: string[] = [];

    for (;;) {
      const token = this.cursor.peek();
      if (token.type === 'STRING') {
        this.cursor.next();
        labels.push(this.labelText(token));
      } else if (token.type === 'IDENTIFIER') {
        this.cursor.next();
        labels.push(token.value);
      } else {
        break;
      }
    }

    this.expressions.expect('LBRACE');
    const body = this.parseBody('RBRACE');
    const close = this.expressions.expect('RBRACE');
    this.expectItemEnd();

    return {
      type: keyword.value,
      labels,
      attributes: body.attributes,
      nestedBlocks: body.blocks,
      location: {
        file: this.filePath,
        lineStart: keyword.line,
        lineEnd: close.line,
        columnStart: keyword.column,
        columnEnd: close.column + 1,
      },
    };
  }

  private labelText(token: Token): string {
    const label = parseTemplate(token.value, {
      file: this.filePath,
      line: token.line,
      column: token.column + 1,
    }, true);

    if (label.type !== 'literal' || typeof label.value !== 'string') {
      throw new MalformedConfigError(
        this.filePath,
        { line: token.line, column: token.column },
        'block labels cannot contain interpolations'
      );
    }
    return label.value;
  }

  private expectItemEnd(): void {
    const token = this.cursor.peek();
    if (token.type === 'NEWLINE') {
      this.cursor.next();
      return;
    }
    if (token.type !== 'EOF' && token.type !== 'RBRACE') {
      throw this.expressions.unexpected(token, 'newline');
    }
  }
}
