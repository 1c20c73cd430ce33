/**
 * JSON Configuration Parser Tests
 * @module tests/parsers/terraform/json-config-parser
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { JSONConfigParser } from '@/parsers/terraform/json-config-parser';
import { MalformedConfigError } from '@/errors';

describe('JSONConfigParser', () => {
  let parser: JSONConfigParser;

  beforeEach(() => {
    parser = new JSONConfigParser();
  });

  it('should map nested label objects onto labelled blocks', () => {
    const content = JSON.stringify({
      resource: {
        aws_instance: {
          web: { ami: 'ami-123', count: 2 },
          db: { ami: 'ami-456' },
        },
      },
    });

    const result = parser.parse(content, 'main.tf.json');

    expect(result.blocks.map((block) => block.labels)).toEqual([
      ['aws_instance', 'web'],
      ['aws_instance', 'db'],
    ]);
    expect(result.blocks[0].type).toBe('resource');
    expect(result.blocks[0].attributes['count']).toEqual({ type: 'literal', value: 2, raw: '2' });
    expect(result.blocks[0].location).toMatchObject({ file: 'main.tf.json', lineStart: 1 });
  });

  it('should parse interpolations inside string values', () => {
    const content = JSON.stringify({ output: { name: { value: 'web-${var.env}' } } });

    const [block] = parser.parse(content, 'outputs.tf.json').blocks;

    expect(block.attributes['value']).toMatchObject({
      type: 'template',
      parts: ['web-', { type: 'reference', parts: ['var', 'env'] }],
    });
  });

  it('should read variable types and dependency lists as bare expressions', () => {
    const content = JSON.stringify({
      variable: { zones: { type: 'list(string)' } },
      resource: { aws_subnet: { a: { depends_on: ['aws_vpc.main'] } } },
    });

    const [variable, resource] = parser.parse(content, 'main.tf.json').blocks;

    expect(variable.attributes['type']).toMatchObject({
      type: 'function',
      name: 'list',
      args: [{ type: 'reference', parts: ['string'] }],
    });
    expect(resource.attributes['depends_on']).toMatchObject({
      type: 'array',
      elements: [{ type: 'reference', parts: ['aws_vpc', 'main'] }],
    });
  });

  it('should turn lifecycle and dynamic keys into nested blocks', () => {
    const content = JSON.stringify({
      resource: {
        aws_security_group: {
          sg: {
            lifecycle: { create_before_destroy: true },
            dynamic: {
              ingress: { for_each: '${var.ports}', content: { from_port: '${ingress.value}' } },
            },
          },
        },
      },
    });

    const [block] = parser.parse(content, 'main.tf.json').blocks;

    expect(block.attributes).toEqual({});
    expect(block.nestedBlocks.map((nested) => [nested.type, nested.labels])).toEqual([
      ['lifecycle', []],
      ['dynamic', ['ingress']],
    ]);
    const dynamic = block.nestedBlocks[1];
    expect(Object.keys(dynamic.attributes)).toEqual(['for_each']);
    expect(dynamic.nestedBlocks.map((nested) => nested.type)).toEqual(['content']);
  });

  it('should keep object-valued locals as attributes', () => {
    const content = JSON.stringify({ locals: { lifecycle: { stage: 'prod' } } });

    const [block] = parser.parse(content, 'locals.tf.json').blocks;

    expect(block.nestedBlocks).toEqual([]);
    expect(block.attributes['lifecycle']).toMatchObject({ type: 'object' });
  });

  it('should skip comment keys', () => {
    const content = JSON.stringify({
      '//': 'generated',
      locals: { '//': 'note', a: 1 },
    });

    const result = parser.parse(content, 'main.tf.json');

    expect(result.blocks).toHaveLength(1);
    expect(Object.keys(result.blocks[0].attributes)).toEqual(['a']);
  });

  it('should read variable files verbatim without interpolation', () => {
    const content = JSON.stringify({ name: '${not.a.reference}', zones: ['a', 'b'] });

    const result = parser.parse(content, 'prod.tfvars.json', 'variables');

    expect(result.blocks).toEqual([]);
    expect(result.attributes['name']).toEqual({
      type: 'literal',
      value: '${not.a.reference}',
      raw: '"${not.a.reference}"',
    });
    expect(result.attributes['zones']).toMatchObject({
      type: 'array',
      elements: [{ value: 'a' }, { value: 'b' }],
    });
  });

  it('should reject invalid JSON', () => {
    expect(() => parser.parse('{"locals": ', 'broken.tf.json')).toThrow(MalformedConfigError);
  });

  it('should reject a top-level value that is not an object', () => {
    expect(() => parser.parse('[1, 2]', 'list.tf.json')).toThrow(
      'Malformed configuration in list.tf.json:1:1: top-level value must be an object'
    );
  });

  it('should reject a label level that is not an object', () => {
    expect(() => parser.parse(JSON.stringify({ resource: { aws_vpc: 'main' } }), 'main.tf.json')).toThrow(
      "Malformed configuration in main.tf.json:1:1: 'resource.aws_vpc' must be an object"
    );
  });
});
