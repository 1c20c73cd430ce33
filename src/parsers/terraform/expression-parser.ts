/**
 * HCL Expression Parser
 * Recursive-descent parser for HCL2 expressions: operators, conditionals,
 * references, function calls, templates, for-expressions and splats.
 */

import { MalformedConfigError } from '../../errors';
import { HCLLexer, LexerOrigin, Token, TokenType } from './hcl-lexer';
import type {
  HCLBinaryOperator,
  HCLExpression,
  HCLForExpression,
  HCLObjectEntry,
  HCLSplatExpression,
  HCLTemplateExpression,
} from './types';

// ============================================================================
// Token Cursor
// ============================================================================

type NewlineMode = 'group' | 'line';

/**
 * Shared position over a token stream. Inside parentheses, brackets and
 * for-expressions newlines are insignificant; elsewhere they end an item.
 */
export class TokenCursor {
  private pos = 0;
  private readonly modes: NewlineMode[] = ['line'];
  private lastEnd = 0;

  constructor(private readonly tokens: Token[]) {}

  peek(offset = 0): Token {
    return this.tokens[this.indexAt(offset)];
  }

  next(): Token {
    const index = this.indexAt(0);
    const token = this.tokens[index];
    this.pos = Math.min(index + 1, this.tokens.length - 1);
    if (token.type !== 'EOF') {
      this.lastEnd = token.end;
    }
    return token;
  }

  /** Offset just past the last consumed token */
  get consumedEnd(): number {
    return this.lastEnd;
  }

  pushMode(mode: NewlineMode): void {
    this.modes.push(mode);
  }

  popMode(): void {
    if (this.modes.length > 1) {
      this.modes.pop();
    }
  }

  skipNewlines(): void {
    while (this.tokens[this.pos].type === 'NEWLINE') {
      this.pos++;
    }
  }

  private indexAt(offset: number): number {
    const skip = this.modes[this.modes.length - 1] === 'group';
    const last = this.tokens.length - 1;
    let index = this.pos;
    let remaining = offset;

    for (;;) {
      while (skip && index < last && this.tokens[index].type === 'NEWLINE') {
        index++;
      }
      if (remaining === 0 || index >= last) {
        return index;
      }
      index++;
      remaining--;
    }
  }
}

// ============================================================================
// Operator Table
// ============================================================================

const BINARY_PRECEDENCE: Record<HCLBinaryOperator, number> = {
  '||': 0,
  '&&': 1,
  '==': 2,
  '!=': 2,
  '<': 3,
  '>': 3,
  '<=': 3,
  '>=': 3,
  '+': 4,
  '-': 4,
  '*': 5,
  '/': 5,
  '%': 5,
};

function isBinaryOperator(value: string): value is HCLBinaryOperator {
  return Object.prototype.hasOwnProperty.call(BINARY_PRECEDENCE, value);
}

// ============================================================================
// Expression Parser
// ============================================================================

export class ExpressionParser {
  constructor(
    private readonly cursor: TokenCursor,
    private readonly source: string,
    private readonly file: string
  ) {}

  parseExpression(): HCLExpression {
    const start = this.cursor.peek();
    const condition = this.parseBinary(0);

    if (this.cursor.peek().type !== 'QUESTION') {
      return condition;
    }

    this.cursor.next();
    const trueResult = this.parseExpression();
    this.expect('COLON');
    const falseResult = this.parseExpression();

    return {
      type: 'conditional',
      condition,
      trueResult,
      falseResult,
      raw: this.rawFrom(start),
    };
  }

  private parseBinary(minPrecedence: number): HCLExpression {
    const start = this.cursor.peek();
    let left = this.parseUnary();

    for (;;) {
      const token = this.cursor.peek();
      if (token.type !== 'OPERATOR' || !isBinaryOperator(token.value)) {
        return left;
      }
      const operator = token.value;
      const precedence = BINARY_PRECEDENCE[operator];
      if (precedence < minPrecedence) {
        return left;
      }

      this.cursor.next();
      const right = this.parseBinary(precedence + 1);
      left = { type: 'binary', operator, left, right, raw: this.rawFrom(start) };
    }
  }

  private parseUnary(): HCLExpression {
    const token = this.cursor.peek();
    if (token.type === 'OPERATOR' && (token.value === '!' || token.value === '-')) {
      this.cursor.next();
      const operand = this.parseUnary();
      const raw = this.rawFrom(token);

      if (token.value === '-' && operand.type === 'literal' && typeof operand.value === 'number') {
        return { type: 'literal', value: -operand.value, raw };
      }
      return { type: 'unary', operator: token.value, operand, raw };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): HCLExpression {
    const start = this.cursor.peek();
    let expr = this.parsePrimary();

    for (;;) {
      const token = this.cursor.peek();

      if (token.type === 'DOT') {
        this.cursor.next();
        const step = this.cursor.next();

        if (step.type === 'IDENTIFIER') {
          expr =
            expr.type === 'reference'
              ? { type: 'reference', parts: [...expr.parts, step.value], raw: this.rawFrom(start) }
              : { type: 'getattr', object: expr, name: step.value, raw: this.rawFrom(start) };
        } else if (step.type === 'NUMBER') {
          expr = {
            type: 'index',
            collection: expr,
            key: { type: 'literal', value: Number(step.value), raw: step.value },
            raw: this.rawFrom(start),
          };
        } else if (step.type === 'OPERATOR' && step.value === '*') {
          expr = this.parseSplatTraversal(expr, start);
        } else {
          throw this.unexpected(step, 'attribute name after "."');
        }
        continue;
      }

      if (token.type === 'LBRACKET') {
        this.cursor.next();
        this.cursor.pushMode('group');

        const inner = this.cursor.peek();
        if (inner.type === 'OPERATOR' && inner.value === '*') {
          this.cursor.next();
          this.expect('RBRACKET');
          this.cursor.popMode();
          expr = this.parseSplatTraversal(expr, start);
          continue;
        }

        const key = this.parseExpression();
        this.expect('RBRACKET');
        this.cursor.popMode();
        expr = { type: 'index', collection: expr, key, raw: this.rawFrom(start) };
        continue;
      }

      return expr;
    }
  }

  private parseSplatTraversal(source: HCLExpression, start: Token): HCLSplatExpression {
    const traversal: string[] = [];
    while (this.cursor.peek().type === 'DOT' && this.cursor.peek(1).type === 'IDENTIFIER') {
      this.cursor.next();
      traversal.push(this.cursor.next().value);
    }
    return { type: 'splat', source, traversal, raw: this.rawFrom(start) };
  }

  private parsePrimary(): HCLExpression {
    const token = this.cursor.next();

    switch (token.type) {
      case 'NUMBER':
        return { type: 'literal', value: Number(token.value), raw: token.value };

      case 'STRING':
        return parseTemplate(token.value, {
          file: this.file,
          line: token.line,
          column: token.column + 1,
        }, true, this.rawFrom(token));

      case 'HEREDOC':
        return parseTemplate(token.value, {
          file: this.file,
          line: token.line + 1,
          column: 1,
        }, false, this.rawFrom(token));

      case 'IDENTIFIER':
        return this.parseIdentifier(token);

      case 'LPAREN': {
        this.cursor.pushMode('group');
        const inner = this.parseExpression();
        this.expect('RPAREN');
        this.cursor.popMode();
        return inner;
      }

      case 'LBRACKET':
        return this.parseTuple(token);

      case 'LBRACE':
        return this.parseObject(token);

      default:
        throw this.unexpected(token, 'expression');
    }
  }

  private parseIdentifier(token: Token): HCLExpression {
    switch (token.value) {
      case 'true':
        return { type: 'literal', value: true, raw: token.value };
      case 'false':
        return { type: 'literal', value: false, raw: token.value };
      case 'null':
        return { type: 'literal', value: null, raw: token.value };
    }

    // Function call: the parenthesis must follow the name directly
    const following = this.cursor.peek();
    if (following.type === 'LPAREN' && following.start === token.end) {
      return this.parseFunctionCall(token);
    }

    return { type: 'reference', parts: [token.value], raw: token.value };
  }

  private parseFunctionCall(name: Token): HCLExpression {
    this.cursor.next();
    this.cursor.pushMode('group');

    const args: HCLExpression[] = [];
    let expandFinal = false;

    while (this.cursor.peek().type !== 'RPAREN') {
      args.push(this.parseExpression());
      if (this.cursor.peek().type === 'ELLIPSIS') {
        this.cursor.next();
        expandFinal = true;
      }
      if (this.cursor.peek().type === 'COMMA') {
        this.cursor.next();
      } else {
        break;
      }
    }

    this.expect('RPAREN');
    this.cursor.popMode();

    return { type: 'function', name: name.value, args, expandFinal, raw: this.rawFrom(name) };
  }

  private parseTuple(open: Token): HCLExpression {
    this.cursor.pushMode('group');

    if (this.isKeyword(this.cursor.peek(), 'for')) {
      const forExpr = this.parseFor(open, false);
      this.expect('RBRACKET');
      this.cursor.popMode();
      return { ...forExpr, raw: this.rawFrom(open) };
    }

    const elements: HCLExpression[] = [];
    while (this.cursor.peek().type !== 'RBRACKET') {
      elements.push(this.parseExpression());
      if (this.cursor.peek().type === 'COMMA') {
        this.cursor.next();
      } else {
        break;
      }
    }

    this.expect('RBRACKET');
    this.cursor.popMode();
    return { type: 'array', elements, raw: this.rawFrom(open) };
  }

  private parseObject(open: Token): HCLExpression {
    this.cursor.skipNewlines();

    if (this.isKeyword(this.cursor.peek(), 'for')) {
      this.cursor.pushMode('group');
      const forExpr = this.parseFor(open, true);
      this.expect('RBRACE');
      this.cursor.popMode();
      return { ...forExpr, raw: this.rawFrom(open) };
    }

    this.cursor.pushMode('line');
    const entries: HCLObjectEntry[] = [];

    for (;;) {
      this.cursor.skipNewlines();
      if (this.cursor.peek().type === 'RBRACE') {
        break;
      }

      const key = this.parseObjectKey();
      const separator = this.cursor.next();
      if (separator.type !== 'EQUALS' && separator.type !== 'COLON') {
        throw this.unexpected(separator, '"=" or ":"');
      }
      const value = this.parseExpression();
      entries.push({ key, value });

      const after = this.cursor.peek();
      if (after.type === 'COMMA' || after.type === 'NEWLINE') {
        this.cursor.next();
      } else if (after.type !== 'RBRACE') {
        throw this.unexpected(after, '",", newline or "}"');
      }
    }

    this.expect('RBRACE');
    this.cursor.popMode();
    return { type: 'object', entries, raw: this.rawFrom(open) };
  }

  private parseObjectKey(): HCLExpression {
    const token = this.cursor.peek();
    const following = this.cursor.peek(1);

    // A bare identifier key is a literal name, not a reference
    if (
      token.type === 'IDENTIFIER' &&
      (following.type === 'EQUALS' || following.type === 'COLON')
    ) {
      this.cursor.next();
      return { type: 'literal', value: token.value, raw: token.value };
    }

    return this.parseExpression();
  }

  private parseFor(open: Token, isObject: boolean): HCLForExpression {
    this.cursor.next(); // for

    const first = this.expect('IDENTIFIER').value;
    let keyVar: string | null = null;
    let valueVar = first;

    if (this.cursor.peek().type === 'COMMA') {
      this.cursor.next();
      keyVar = first;
      valueVar = this.expect('IDENTIFIER').value;
    }

    const inKeyword = this.cursor.next();
    if (!this.isKeyword(inKeyword, 'in')) {
      throw this.unexpected(inKeyword, '"in"');
    }

    const collection = this.parseExpression();
    this.expect('COLON');

    let keyExpr: HCLExpression | null = null;
    let valueExpr = this.parseExpression();

    if (isObject) {
      this.expect('ARROW');
      keyExpr = valueExpr;
      valueExpr = this.parseExpression();
    }

    let grouping = false;
    if (this.cursor.peek().type === 'ELLIPSIS') {
      this.cursor.next();
      grouping = true;
    }

    let condition: HCLExpression | null = null;
    if (this.isKeyword(this.cursor.peek(), 'if')) {
      this.cursor.next();
      condition = this.parseExpression();
    }

    return {
      type: 'for',
      keyVar,
      valueVar,
      collection,
      valueExpr,
      keyExpr,
      condition,
      isObject,
      grouping,
      raw: this.rawFrom(open),
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  expect(type: TokenType): Token {
    const token = this.cursor.next();
    if (token.type !== type) {
      throw this.unexpected(token, type);
    }
    return token;
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.type === 'IDENTIFIER' && token.value === keyword;
  }

  private rawFrom(start: Token): string {
    return this.source.slice(start.start, Math.max(start.end, this.cursor.consumedEnd));
  }

  unexpected(token: Token, expected: string): MalformedConfigError {
    const found = token.type === 'EOF' ? 'end of input' : `'${token.value.replace(/\n/g, '\\n')}'`;
    return new MalformedConfigError(
      this.file,
      { line: token.line, column: token.column },
      `expected ${expected}, found ${found}`
    );
  }
}

// ============================================================================
// Templates
// ============================================================================

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  '\\': '\\',
};

/**
 * Find the index of the brace closing an interpolation opened just before
 * `from`, skipping nested braces and quoted strings.
 */
function findInterpolationEnd(content: string, from: number): number {
  let depth = 1;
  let inString = false;

  for (let i = from; i < content.length; i++) {
    const char = content[i];
    if (inString) {
      if (char === '\\') {
        i++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function positionAfter(text: string, origin: LexerOrigin): LexerOrigin {
  const lines = text.split('\n');
  if (lines.length === 1) {
    return { ...origin, column: origin.column + text.length };
  }
  return {
    file: origin.file,
    line: origin.line + lines.length - 1,
    column: lines[lines.length - 1].length + 1,
  };
}

/**
 * Parse the body of a quoted string or heredoc into a literal or template.
 * Template directives (`%{ ... }`) are kept as literal text.
 */
export function parseTemplate(
  content: string,
  origin: LexerOrigin,
  processEscapes: boolean,
  raw: string = content
): HCLExpression {
  const parts: HCLTemplateExpression['parts'] = [];
  let literal = '';
  let i = 0;

  while (i < content.length) {
    const char = content[i];
    const next = content[i + 1];

    if (processEscapes && char === '\\') {
      if (next === 'u' || next === 'U') {
        const width = next === 'u' ? 4 : 8;
        const hex = content.slice(i + 2, i + 2 + width);
        if (/^[0-9a-fA-F]+$/.test(hex) && hex.length === width) {
          literal += String.fromCodePoint(Number.parseInt(hex, 16));
          i += 2 + width;
          continue;
        }
      }
      const escaped = next === undefined ? undefined : ESCAPES[next];
      literal += escaped ?? (next ?? '');
      i += 2;
      continue;
    }

    if ((char === '$' || char === '%') && next === char && content[i + 2] === '{') {
      literal += `${char}{`;
      i += 3;
      continue;
    }

    if (char === '$' && next === '{') {
      const end = findInterpolationEnd(content, i + 2);
      const at = positionAfter(content.slice(0, i + 2), origin);
      if (end === -1) {
        throw new MalformedConfigError(origin.file, at, 'unterminated template interpolation');
      }

      let inner = content.slice(i + 2, end);
      inner = inner.replace(/^~/, '').replace(/~$/, '');

      if (literal) {
        parts.push(literal);
        literal = '';
      }
      parts.push(parseExpressionText(inner, at));
      i = end + 1;
      continue;
    }

    literal += char;
    i++;
  }

  if (literal) {
    parts.push(literal);
  }

  if (parts.length === 0) {
    return { type: 'literal', value: '', raw };
  }
  if (parts.length === 1 && typeof parts[0] === 'string') {
    return { type: 'literal', value: parts[0], raw };
  }
  return { type: 'template', parts, raw };
}

/**
 * Parse a standalone expression, e.g. the inside of an interpolation
 */
export function parseExpressionText(text: string, origin: LexerOrigin): HCLExpression {
  const tokens = new HCLLexer(text, origin).tokenize();
  const cursor = new TokenCursor(tokens);
  cursor.pushMode('group');

  const parser = new ExpressionParser(cursor, text, origin.file);
  const expr = parser.parseExpression();

  const trailing = cursor.peek();
  if (trailing.type !== 'EOF') {
    throw parser.unexpected(trailing, 'end of expression');
  }
  return expr;
}

// ============================================================================
// Extract References from Expression
// ============================================================================

export interface ExtractedReference {
  type: 'resource' | 'data' | 'module' | 'var' | 'local' | 'each' | 'count' | 'self' | 'path' | 'terraform';
  parts: string[];
  raw: string;
}

/**
 * Extract all references from an HCL expression. Names bound by an enclosing
 * for-expression are not references.
 */
export function extractReferences(expr: HCLExpression): ExtractedReference[] {
  const refs: ExtractedReference[] = [];
  walkExpression(expr, refs, new Set());
  return refs;
}

function walkExpression(expr: HCLExpression, refs: ExtractedReference[], bound: Set<string>): void {
  switch (expr.type) {
    case 'literal':
      break;

    case 'reference':
      if (!bound.has(expr.parts[0])) {
        refs.push(classifyReference(expr.parts, expr.raw));
      }
      break;

    case 'getattr':
      walkExpression(expr.object, refs, bound);
      break;

    case 'function':
      for (const arg of expr.args) {
        walkExpression(arg, refs, bound);
      }
      break;

    case 'template':
      for (const part of expr.parts) {
        if (typeof part !== 'string') {
          walkExpression(part, refs, bound);
        }
      }
      break;

    case 'for': {
      walkExpression(expr.collection, refs, bound);
      const inner = new Set(bound);
      inner.add(expr.valueVar);
      if (expr.keyVar) inner.add(expr.keyVar);
      walkExpression(expr.valueExpr, refs, inner);
      if (expr.keyExpr) walkExpression(expr.keyExpr, refs, inner);
      if (expr.condition) walkExpression(expr.condition, refs, inner);
      break;
    }

    case 'conditional':
      walkExpression(expr.condition, refs, bound);
      walkExpression(expr.trueResult, refs, bound);
      walkExpression(expr.falseResult, refs, bound);
      break;

    case 'binary':
      walkExpression(expr.left, refs, bound);
      walkExpression(expr.right, refs, bound);
      break;

    case 'unary':
      walkExpression(expr.operand, refs, bound);
      break;

    case 'index':
      walkExpression(expr.collection, refs, bound);
      walkExpression(expr.key, refs, bound);
      break;

    case 'splat':
      walkExpression(expr.source, refs, bound);
      break;

    case 'object':
      for (const entry of expr.entries) {
        walkExpression(entry.key, refs, bound);
        walkExpression(entry.value, refs, bound);
      }
      break;

    case 'array':
      for (const element of expr.elements) {
        walkExpression(element, refs, bound);
      }
      break;
  }
}

function classifyReference(parts: string[], raw: string): ExtractedReference {
  const [first, ...rest] = parts;

  if (first === 'local' || first === 'var' || first === 'module' || first === 'data' ||
      first === 'each' || first === 'count' || first === 'self' || first === 'path' ||
      first === 'terraform') {
    return { type: first, parts: rest, raw };
  }

  return { type: 'resource', parts, raw };
}
