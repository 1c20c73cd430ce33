/**
 * HCL Lexer
 * Tokenizes HCL native syntax. Quoted strings are kept as single tokens with
 * their interpolation sequences intact; template parsing happens later.
 */

import { MalformedConfigError } from '../../errors';

// ============================================================================
// Tokens
// ============================================================================

export type TokenType =
  | 'IDENTIFIER'
  | 'NUMBER'
  | 'STRING'
  | 'HEREDOC'
  | 'LBRACE'
  | 'RBRACE'
  | 'LBRACKET'
  | 'RBRACKET'
  | 'LPAREN'
  | 'RPAREN'
  | 'EQUALS'
  | 'COMMA'
  | 'DOT'
  | 'COLON'
  | 'QUESTION'
  | 'ARROW'
  | 'ELLIPSIS'
  | 'OPERATOR'
  | 'NEWLINE'
  | 'EOF';

export interface Token {
  type: TokenType;
  /** Identifier name, operator text, number text, or raw string body */
  value: string;
  line: number;
  column: number;
  /** Offsets into the lexed input */
  start: number;
  end: number;
}

export interface LexerOrigin {
  file: string;
  line: number;
  column: number;
}

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  '{': 'LBRACE',
  '}': 'RBRACE',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '(': 'LPAREN',
  ')': 'RPAREN',
  ',': 'COMMA',
  ':': 'COLON',
  '?': 'QUESTION',
};

const TWO_CHAR_OPERATORS = new Set(['==', '!=', '<=', '>=', '&&', '||']);
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '%', '<', '>', '!']);

// ============================================================================
// Lexer
// ============================================================================

export class HCLLexer {
  private pos = 0;
  private line: number;
  private column: number;
  private previous: TokenType | null = null;

  constructor(
    private readonly input: string,
    private readonly origin: LexerOrigin
  ) {
    this.line = origin.line;
    this.column = origin.column;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      const token = this.nextToken();
      tokens.push(token);
      this.previous = token.type;
      if (token.type === 'EOF') {
        return tokens;
      }
    }
  }

  private nextToken(): Token {
    this.skipWhitespaceAndComments();

    const start = this.pos;
    const line = this.line;
    const column = this.column;
    const make = (type: TokenType, value: string): Token => ({
      type,
      value,
      line,
      column,
      start,
      end: this.pos,
    });

    if (this.pos >= this.input.length) {
      return make('EOF', '');
    }

    const char = this.input[this.pos];
    const next = this.input[this.pos + 1] ?? '';

    if (char === '\n') {
      this.advance();
      return make('NEWLINE', '\n');
    }

    if (char === '<' && next === '<' && /[-A-Za-z_]/.test(this.input[this.pos + 2] ?? '')) {
      const body = this.readHeredoc();
      return make('HEREDOC', body);
    }

    if (char === '"') {
      this.advance();
      const bodyStart = this.pos;
      this.scanQuoted(line, column);
      return make('STRING', this.input.slice(bodyStart, this.pos - 1));
    }

    if (/[0-9]/.test(char)) {
      this.readNumber();
      return make('NUMBER', this.input.slice(start, this.pos));
    }

    if (/[A-Za-z_]/.test(char)) {
      while (this.pos < this.input.length && /[A-Za-z0-9_-]/.test(this.input[this.pos])) {
        this.advance();
      }
      return make('IDENTIFIER', this.input.slice(start, this.pos));
    }

    if (char === '.' && next === '.' && this.input[this.pos + 2] === '.') {
      this.advance(3);
      return make('ELLIPSIS', '...');
    }

    if (char === '.') {
      this.advance();
      return make('DOT', '.');
    }

    if (char === '=' && next === '>') {
      this.advance(2);
      return make('ARROW', '=>');
    }

    const pair = char + next;
    if (TWO_CHAR_OPERATORS.has(pair)) {
      this.advance(2);
      return make('OPERATOR', pair);
    }

    if (char === '=') {
      this.advance();
      return make('EQUALS', '=');
    }

    if (ONE_CHAR_OPERATORS.has(char)) {
      this.advance();
      return make('OPERATOR', char);
    }

    const single = SINGLE_CHAR_TOKENS[char];
    if (single) {
      this.advance();
      return make(single, char);
    }

    throw this.error(`unexpected character '${char}'`, line, column);
  }

  // ==========================================================================
  // Scanning helpers
  // ==========================================================================

  private advance(count = 1): void {
    for (let i = 0; i < count && this.pos < this.input.length; i++) {
      if (this.input[this.pos] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      const next = this.input[this.pos + 1];

      if (char === ' ' || char === '\t' || char === '\r') {
        this.advance();
      } else if (char === '#' || (char === '/' && next === '/')) {
        while (this.pos < this.input.length && this.input[this.pos] !== '\n') {
          this.advance();
        }
      } else if (char === '/' && next === '*') {
        const line = this.line;
        const column = this.column;
        this.advance(2);
        while (
          this.pos < this.input.length &&
          !(this.input[this.pos] === '*' && this.input[this.pos + 1] === '/')
        ) {
          this.advance();
        }
        if (this.pos >= this.input.length) {
          throw this.error('unterminated block comment', line, column);
        }
        this.advance(2);
      } else {
        return;
      }
    }
  }

  /**
   * Scan a quoted string body up to and including its closing quote.
   * Interpolations may contain nested quoted strings and braces.
   */
  private scanQuoted(line: number, column: number): void {
    for (;;) {
      if (this.pos >= this.input.length || this.input[this.pos] === '\n') {
        throw this.error('unterminated string', line, column);
      }

      const char = this.input[this.pos];
      const next = this.input[this.pos + 1];

      if (char === '\\') {
        this.advance(2);
      } else if (char === '"') {
        this.advance();
        return;
      } else if ((char === '$' || char === '%') && next === char && this.input[this.pos + 2] === '{') {
        this.advance(3);
      } else if ((char === '$' || char === '%') && next === '{') {
        this.advance(2);
        this.scanInterpolation(line, column);
      } else {
        this.advance();
      }
    }
  }

  private scanInterpolation(line: number, column: number): void {
    let depth = 1;
    while (depth > 0) {
      if (this.pos >= this.input.length) {
        throw this.error('unterminated template interpolation', line, column);
      }
      const char = this.input[this.pos];
      if (char === '"') {
        this.advance();
        this.scanQuoted(this.line, this.column);
        continue;
      }
      if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
      }
      this.advance();
    }
  }

  private readNumber(): void {
    while (/[0-9]/.test(this.input[this.pos] ?? '')) {
      this.advance();
    }

    // After a dot the number is a legacy index step (`foo.0.bar`)
    if (this.previous === 'DOT') {
      return;
    }

    if (this.input[this.pos] === '.' && /[0-9]/.test(this.input[this.pos + 1] ?? '')) {
      this.advance();
      while (/[0-9]/.test(this.input[this.pos] ?? '')) {
        this.advance();
      }
    }

    if (/[eE]/.test(this.input[this.pos] ?? '')) {
      const sign = /[+-]/.test(this.input[this.pos + 1] ?? '') ? 1 : 0;
      if (/[0-9]/.test(this.input[this.pos + 1 + sign] ?? '')) {
        this.advance(1 + sign);
        while (/[0-9]/.test(this.input[this.pos] ?? '')) {
          this.advance();
        }
      }
    }
  }

  private readHeredoc(): string {
    const line = this.line;
    const column = this.column;
    this.advance(2);

    let indented = false;
    if (this.input[this.pos] === '-') {
      indented = true;
      this.advance();
    }

    const markerStart = this.pos;
    while (/[A-Za-z0-9_]/.test(this.input[this.pos] ?? '')) {
      this.advance();
    }
    const marker = this.input.slice(markerStart, this.pos);
    if (!marker) {
      throw this.error('heredoc without a marker', line, column);
    }

    while (this.input[this.pos] === ' ' || this.input[this.pos] === '\t' || this.input[this.pos] === '\r') {
      this.advance();
    }
    if (this.input[this.pos] !== '\n') {
      throw this.error('heredoc marker must be followed by a newline', line, column);
    }
    this.advance();

    const lines: string[] = [];
    for (;;) {
      if (this.pos >= this.input.length) {
        throw this.error(`unterminated heredoc '${marker}'`, line, column);
      }
      let end = this.input.indexOf('\n', this.pos);
      if (end === -1) {
        end = this.input.length;
      }
      const text = this.input.slice(this.pos, end).replace(/\r$/, '');
      if (text.trim() === marker) {
        // Leave the terminating newline for the token stream
        this.advance(end - this.pos);
        break;
      }
      lines.push(text);
      this.advance(end - this.pos + 1);
    }

    const body = indented ? stripCommonIndent(lines) : lines;
    return body.length > 0 ? body.join('\n') + '\n' : '';
  }

  private error(reason: string, line: number, column: number): MalformedConfigError {
    return new MalformedConfigError(this.origin.file, { line, column }, reason);
  }
}

function stripCommonIndent(lines: string[]): string[] {
  let indent = Number.POSITIVE_INFINITY;
  for (const line of lines) {
    if (line.trim() === '') {
      continue;
    }
    const match = /^[ \t]*/.exec(line);
    indent = Math.min(indent, match ? match[0].length : 0);
  }
  if (!Number.isFinite(indent)) {
    return lines;
  }
  return lines.map((line) => line.slice(Math.min(indent, line.length)));
}

/**
 * Tokenize HCL source text
 */
export function tokenize(input: string, origin: LexerOrigin): Token[] {
  return new HCLLexer(input, origin).tokenize();
}
