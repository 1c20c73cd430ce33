/**
 * Terraform Parser Types
 * Core type definitions for HCL native syntax and JSON configuration parsing
 */

// ============================================================================
// Source Location Types
// ============================================================================

export interface SourceLocation {
  file: string;
  lineStart: number;
  lineEnd: number;
  columnStart: number;
  columnEnd: number;
}

// ============================================================================
// HCL Expression Types
// ============================================================================

export type HCLExpression =
  | HCLLiteralExpression
  | HCLReferenceExpression
  | HCLGetAttrExpression
  | HCLFunctionExpression
  | HCLTemplateExpression
  | HCLForExpression
  | HCLConditionalExpression
  | HCLBinaryExpression
  | HCLUnaryExpression
  | HCLIndexExpression
  | HCLSplatExpression
  | HCLObjectExpression
  | HCLArrayExpression;

export interface HCLLiteralExpression {
  type: 'literal';
  value: string | number | boolean | null;
  raw: string;
}

export interface HCLReferenceExpression {
  type: 'reference';
  parts: string[];  // e.g., ['var', 'name'] or ['aws_instance', 'web', 'id']
  raw: string;
}

/** Attribute access on something that is not a plain dotted reference */
export interface HCLGetAttrExpression {
  type: 'getattr';
  object: HCLExpression;
  name: string;
  raw: string;
}

export interface HCLFunctionExpression {
  type: 'function';
  name: string;
  args: HCLExpression[];
  expandFinal: boolean;
  raw: string;
}

export interface HCLTemplateExpression {
  type: 'template';
  parts: (string | HCLExpression)[];
  raw: string;
}

export interface HCLForExpression {
  type: 'for';
  keyVar: string | null;
  valueVar: string;
  collection: HCLExpression;
  valueExpr: HCLExpression;
  keyExpr: HCLExpression | null;
  condition: HCLExpression | null;
  isObject: boolean;
  grouping: boolean;
  raw: string;
}

export interface HCLConditionalExpression {
  type: 'conditional';
  condition: HCLExpression;
  trueResult: HCLExpression;
  falseResult: HCLExpression;
  raw: string;
}

export type HCLBinaryOperator =
  | '+' | '-' | '*' | '/' | '%'
  | '==' | '!=' | '<' | '>' | '<=' | '>='
  | '&&' | '||';

export interface HCLBinaryExpression {
  type: 'binary';
  operator: HCLBinaryOperator;
  left: HCLExpression;
  right: HCLExpression;
  raw: string;
}

export interface HCLUnaryExpression {
  type: 'unary';
  operator: '!' | '-';
  operand: HCLExpression;
  raw: string;
}

export interface HCLIndexExpression {
  type: 'index';
  collection: HCLExpression;
  key: HCLExpression;
  raw: string;
}

export interface HCLSplatExpression {
  type: 'splat';
  source: HCLExpression;
  /** Attribute names applied to each element after the splat */
  traversal: string[];
  raw: string;
}

export interface HCLObjectEntry {
  key: HCLExpression;
  value: HCLExpression;
}

export interface HCLObjectExpression {
  type: 'object';
  entries: HCLObjectEntry[];
  raw: string;
}

export interface HCLArrayExpression {
  type: 'array';
  elements: HCLExpression[];
  raw: string;
}

// ============================================================================
// Terraform Block Types
// ============================================================================

export interface TerraformBlock {
  type: string;      // block keyword, e.g. "resource" or "ingress"
  labels: string[];  // e.g., ["aws_instance", "web"] for resource blocks
  attributes: Record<string, HCLExpression>;
  nestedBlocks: TerraformBlock[];
  location: SourceLocation;
}

// ============================================================================
// Parse Result Types
// ============================================================================

export interface TerraformFile {
  path: string;
  blocks: TerraformBlock[];
  /** Top-level attributes (variable definition files) */
  attributes: Record<string, HCLExpression>;
  size: number;
}

// ============================================================================
// Parser Options
// ============================================================================

export interface ParserOptions {
  /** Maximum content size in bytes (default: 10MB) */
  maxFileSize: number;
}

export const DEFAULT_PARSER_OPTIONS: ParserOptions = {
  maxFileSize: 10 * 1024 * 1024, // 10MB
};
