/**
 * Listing Output Tests
 * @module tests/pipeline/serializer
 */

import { describe, it, expect } from 'vitest';
import { resultToJSON, serializeResult } from '@/pipeline';
import { compileModules } from '../factories';

const main = [
  'variable "zone" {}',
  'resource "aws_vpc" "main" {',
  '  cidr_block = "10.0.0.0/16"',
  '}',
  'resource "aws_subnet" "a" {',
  '  count  = 1',
  '  vpc_id = aws_vpc.main.id',
  '  zone   = var.zone',
  '}',
].join('\n');

describe('resultToJSON', () => {
  it('should list graph, resources and diagnostics sorted by identity', () => {
    const json = resultToJSON(compileModules({ '': { 'main.tf': main } }));

    expect(Object.keys(json)).toEqual(['graph', 'resources', 'diagnostics']);
    expect(json).toEqual({
      graph: {
        'aws_subnet.a.0': ['aws_vpc.main'],
        'aws_vpc.main': [],
      },
      resources: {
        'aws_subnet.a.0': {
          kind: 'resource',
          type: 'aws_subnet',
          name: 'a',
          module: '',
          key: 0,
          attributes: { vpc_id: '${aws_vpc.main.id}', zone: { $unresolved: ['var.zone'] } },
          source: 'main.tf:5',
        },
        'aws_vpc.main': {
          kind: 'resource',
          type: 'aws_vpc',
          name: 'main',
          module: '',
          key: null,
          attributes: { cidr_block: '10.0.0.0/16' },
          source: 'main.tf:2',
        },
      },
      diagnostics: [
        {
          code: 'UNRESOLVED_REFERENCE',
          severity: 'warning',
          module: '',
          subject: 'var.zone',
          message: 'Unresolved reference var.zone used by aws_subnet.a.0 in module <root>',
          location: 'main.tf:5',
        },
      ],
    });
  });

  it('should write null sources for added resources', () => {
    const { resources } = resultToJSON(
      compileModules(
        { '': { 'main.tf': '' } },
        { annotations: { update: {}, add: { 'external.thing': {} }, remove: [], connect: {}, disconnect: {} } }
      )
    );

    expect(resources).toEqual({
      'external.thing': {
        kind: 'resource',
        type: 'external',
        name: 'thing',
        module: '',
        key: null,
        attributes: {},
        source: null,
      },
    });
  });
});

describe('serializeResult', () => {
  it('should indent with two spaces and end with a newline', () => {
    const text = serializeResult(compileModules({ '': { 'main.tf': 'resource "aws_vpc" "main" {\n}\n' } }));

    expect(text).toBe(
      [
        '{',
        '  "graph": {',
        '    "aws_vpc.main": []',
        '  },',
        '  "resources": {',
        '    "aws_vpc.main": {',
        '      "kind": "resource",',
        '      "type": "aws_vpc",',
        '      "name": "main",',
        '      "module": "",',
        '      "key": null,',
        '      "attributes": {},',
        '      "source": "main.tf:1"',
        '    }',
        '  },',
        '  "diagnostics": []',
        '}',
        '',
      ].join('\n')
    );
  });
});
