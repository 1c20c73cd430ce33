/**
 * HCL Parser Tests
 * @module tests/parsers/terraform/hcl-parser
 *
 * Unit tests for native-syntax blocks, attributes and expressions.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { HCLParser } from '@/parsers/terraform/hcl-parser';
import { MalformedConfigError, SourceUnavailableError } from '@/errors';
import type { HCLExpression } from '@/parsers/terraform/types';

function lines(...content: string[]): string {
  return content.join('\n') + '\n';
}

describe('HCLParser', () => {
  let parser: HCLParser;

  beforeEach(() => {
    parser = new HCLParser();
  });

  function attribute(source: string): HCLExpression {
    return parser.parse(`value = ${source}\n`, 'main.tf').attributes['value'];
  }

  describe('blocks', () => {
    it('should parse a labelled block with attributes and nested blocks', () => {
      const result = parser.parse(
        lines(
          'resource "aws_instance" "web" {',
          '  ami           = "ami-123"',
          '  instance_type = var.size',
          '',
          '  ebs_block_device {',
          '    device_name = "/dev/sdb"',
          '  }',
          '}'
        ),
        'main.tf'
      );

      expect(result.blocks).toHaveLength(1);
      const [block] = result.blocks;
      expect(block.type).toBe('resource');
      expect(block.labels).toEqual(['aws_instance', 'web']);
      expect(block.attributes['ami']).toEqual({ type: 'literal', value: 'ami-123', raw: '"ami-123"' });
      expect(block.attributes['instance_type']).toEqual({
        type: 'reference',
        parts: ['var', 'size'],
        raw: 'var.size',
      });
      expect(block.nestedBlocks).toHaveLength(1);
      expect(block.nestedBlocks[0].type).toBe('ebs_block_device');
      expect(block.nestedBlocks[0].labels).toEqual([]);
      expect(block.nestedBlocks[0].attributes['device_name']).toMatchObject({ value: '/dev/sdb' });
    });

    it('should record the block location', () => {
      const result = parser.parse(lines('', 'locals {', '  a = 1', '}'), 'locals.tf');

      expect(result.blocks[0].location).toEqual({
        file: 'locals.tf',
        lineStart: 2,
        lineEnd: 4,
        columnStart: 1,
        columnEnd: 2,
      });
    });

    it('should accept identifier labels', () => {
      const result = parser.parse(lines('provider aws {', '}'), 'main.tf');

      expect(result.blocks[0].labels).toEqual(['aws']);
    });

    it('should keep top-level attributes of variable files', () => {
      const result = parser.parse(lines('region = "us-east-1"', 'replicas = 3'), 'prod.tfvars');

      expect(result.blocks).toEqual([]);
      expect(Object.keys(result.attributes)).toEqual(['region', 'replicas']);
      expect(result.attributes['replicas']).toEqual({ type: 'literal', value: 3, raw: '3' });
    });

    it('should ignore every comment style', () => {
      const result = parser.parse(
        lines(
          '# hash comment',
          '// slash comment',
          '/* block',
          '   comment */',
          'locals {',
          '  a = 1 # trailing',
          '}'
        ),
        'main.tf'
      );

      expect(result.blocks).toHaveLength(1);
      expect(result.blocks[0].location.lineStart).toBe(5);
      expect(Object.keys(result.blocks[0].attributes)).toEqual(['a']);
    });

    it('should report the content size in bytes', () => {
      const content = lines('a = "é"');

      expect(parser.parse(content, 'main.tf').size).toBe(Buffer.byteLength(content, 'utf-8'));
    });
  });

  describe('expressions', () => {
    it('should parse an interpolated string as a template', () => {
      expect(attribute('"web-${var.env}"')).toEqual({
        type: 'template',
        parts: ['web-', { type: 'reference', parts: ['var', 'env'], raw: 'var.env' }],
        raw: '"web-${var.env}"',
      });
    });

    it('should keep escaped interpolation markers literal', () => {
      expect(attribute('"a$${b}"')).toMatchObject({ type: 'literal', value: 'a${b}' });
    });

    it('should process escape sequences in quoted strings', () => {
      expect(attribute('"line\\none \\"q\\""')).toMatchObject({ type: 'literal', value: 'line\none "q"' });
    });

    it('should strip the common indent of an indented heredoc', () => {
      const result = parser.parse(
        lines('user_data = <<-EOT', '    #!/bin/bash', '    echo hi', '  EOT'),
        'main.tf'
      );

      expect(result.attributes['user_data']).toMatchObject({
        type: 'literal',
        value: '#!/bin/bash\necho hi\n',
      });
    });

    it('should parse numbers and negative numbers as literals', () => {
      expect(attribute('1.5')).toMatchObject({ type: 'literal', value: 1.5 });
      expect(attribute('-3')).toEqual({ type: 'literal', value: -3, raw: '-3' });
    });

    it('should parse boolean and null keywords', () => {
      expect(attribute('true')).toMatchObject({ type: 'literal', value: true });
      expect(attribute('null')).toMatchObject({ type: 'literal', value: null });
    });

    it('should respect operator precedence', () => {
      const expr = attribute('1 + 2 * 3');

      expect(expr).toMatchObject({
        type: 'binary',
        operator: '+',
        left: { type: 'literal', value: 1 },
        right: { type: 'binary', operator: '*' },
      });
    });

    it('should parse a conditional expression', () => {
      expect(attribute('var.enabled ? 1 : 0')).toMatchObject({
        type: 'conditional',
        condition: { type: 'reference', parts: ['var', 'enabled'] },
        trueResult: { type: 'literal', value: 1 },
        falseResult: { type: 'literal', value: 0 },
        raw: 'var.enabled ? 1 : 0',
      });
    });

    it('should parse a full splat with a trailing attribute', () => {
      expect(attribute('aws_instance.web[*].id')).toMatchObject({
        type: 'splat',
        source: { type: 'reference', parts: ['aws_instance', 'web'] },
        traversal: ['id'],
      });
    });

    it('should parse an index followed by an attribute access', () => {
      expect(attribute('aws_instance.web[0].id')).toMatchObject({
        type: 'getattr',
        name: 'id',
        object: {
          type: 'index',
          collection: { type: 'reference', parts: ['aws_instance', 'web'] },
          key: { type: 'literal', value: 0 },
        },
      });
    });

    it('should parse a legacy numeric index step', () => {
      expect(attribute('aws_instance.web.0.id')).toMatchObject({
        type: 'getattr',
        name: 'id',
        object: { type: 'index', key: { type: 'literal', value: 0 } },
      });
    });

    it('should parse a function call with an expanded final argument', () => {
      expect(attribute('concat(var.a, var.b...)')).toMatchObject({
        type: 'function',
        name: 'concat',
        args: [
          { type: 'reference', parts: ['var', 'a'] },
          { type: 'reference', parts: ['var', 'b'] },
        ],
        expandFinal: true,
      });
    });

    it('should parse tuple and object for-expressions', () => {
      expect(attribute('[for s in var.list : upper(s) if s != ""]')).toMatchObject({
        type: 'for',
        keyVar: null,
        valueVar: 's',
        isObject: false,
        collection: { type: 'reference', parts: ['var', 'list'] },
        valueExpr: { type: 'function', name: 'upper' },
        condition: { type: 'binary', operator: '!=' },
      });
      expect(attribute('{for k, v in var.map : k => v}')).toMatchObject({
        type: 'for',
        keyVar: 'k',
        valueVar: 'v',
        isObject: true,
        keyExpr: { type: 'reference', parts: ['k'] },
        valueExpr: { type: 'reference', parts: ['v'] },
      });
    });

    it('should treat bare object keys as literal names', () => {
      const result = parser.parse(lines('tags = {', '  Name = "web"', '  "env" = var.env', '}'), 'main.tf');
      const tags = result.attributes['tags'];

      expect(tags.type).toBe('object');
      if (tags.type === 'object') {
        expect(tags.entries.map((entry) => entry.key)).toMatchObject([
          { type: 'literal', value: 'Name' },
          { type: 'literal', value: 'env' },
        ]);
      }
    });

    it('should allow newlines inside brackets', () => {
      const result = parser.parse(lines('zones = [', '  "a",', '  "b",', ']'), 'main.tf');

      expect(result.attributes['zones']).toMatchObject({
        type: 'array',
        elements: [{ value: 'a' }, { value: 'b' }],
      });
    });
  });

  describe('errors', () => {
    it('should reject a duplicate attribute with its position', () => {
      const content = lines('locals {', '  x = 1', '  x = 2', '}');

      expect(() => parser.parse(content, 'main.tf')).toThrow(
        "Malformed configuration in main.tf:3:3: duplicate attribute 'x'"
      );
    });

    it('should reject a missing expression at end of input', () => {
      try {
        parser.parse('x =', 'main.tf');
        expect.fail('expected parse to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedConfigError);
        if (error instanceof MalformedConfigError) {
          expect(error.file).toBe('main.tf');
          expect(error.position).toEqual({ line: 1, column: 4 });
          expect(error.message).toBe(
            'Malformed configuration in main.tf:1:4: expected expression, found end of input'
          );
        }
      }
    });

    it('should reject an unterminated string', () => {
      expect(() => parser.parse(lines('a = "open'), 'main.tf')).toThrow(
        'Malformed configuration in main.tf:1:5: unterminated string'
      );
    });

    it('should reject an unterminated block comment', () => {
      expect(() => parser.parse(lines('/* never closed', 'a = 1'), 'main.tf')).toThrow(
        'Malformed configuration in main.tf:1:1: unterminated block comment'
      );
    });

    it('should reject interpolation in block labels', () => {
      expect(() => parser.parse(lines('resource "aws_${var.x}" "b" {', '}'), 'main.tf')).toThrow(
        'Malformed configuration in main.tf:1:10: block labels cannot contain interpolations'
      );
    });

    it('should reject an unterminated heredoc', () => {
      expect(() => parser.parse(lines('a = <<EOT', 'text'), 'main.tf')).toThrow(
        "Malformed configuration in main.tf:1:5: unterminated heredoc 'EOT'"
      );
    });

    it('should reject content above the size limit', () => {
      const small = new HCLParser({ maxFileSize: 4 });

      expect(() => small.parse('a = 12345\n', 'big.tf')).toThrow(SourceUnavailableError);
    });
  });
});
