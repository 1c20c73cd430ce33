/**
 * Metadata Extractor Tests
 * @module tests/metadata/metadata-extractor
 *
 * Attribute substitution, nested and dynamic blocks, and which modules
 * contribute resources.
 */

import { describe, it, expect } from 'vitest';
import type { ExtractedResource } from '@/metadata';
import { scalar, toJSON } from '@/resolver';
import type { JSONValue, Value } from '@/resolver';
import { extractModules } from '../factories';

function attributesOf(values: ReadonlyMap<string, Value>): Record<string, JSONValue> {
  const out: Record<string, JSONValue> = {};
  for (const [name, value] of values) {
    out[name] = toJSON(value);
  }
  return out;
}

function only(resources: ExtractedResource[]): ExtractedResource {
  expect(resources).toHaveLength(1);
  return resources[0];
}

describe('MetadataExtractor', () => {
  describe('attributes', () => {
    const modules = {
      '': {
        'main.tf': [
          'variable "env" {',
          '  default = "prod"',
          '}',
          'locals {',
          '  name = "web-${var.env}"',
          '}',
          'resource "aws_instance" "web" {',
          '  count     = 2',
          '  ami       = "ami-123"',
          '  tags = {',
          '    Name = local.name',
          '  }',
          '  subnet_id = aws_subnet.a.id',
          '  provider  = aws.west',
          '  label     = "web-${count.index}"',
          '  lifecycle {',
          '    create_before_destroy = true',
          '  }',
          '  ebs_block_device {',
          '    device_name = "/dev/sdb"',
          '  }',
          '  ebs_block_device {',
          '    device_name = "/dev/sdc"',
          '  }',
          '}',
        ].join('\n'),
      },
    };

    it('should describe the block', () => {
      const { metadata } = only(extractModules(modules).resources);

      expect(metadata.address).toBe('aws_instance.web');
      expect(metadata.kind).toBe('resource');
      expect(metadata.type).toBe('aws_instance');
      expect(metadata.name).toBe('web');
      expect(metadata.modulePath).toBe('');
      expect(metadata.source).toEqual({ file: 'main.tf', line: 7 });
    });

    it('should substitute variables and locals and keep references', () => {
      const { metadata } = only(extractModules(modules).resources);

      expect(attributesOf(metadata.attributes)).toEqual({
        ami: 'ami-123',
        tags: { Name: 'web-prod' },
        subnet_id: '${aws_subnet.a.id}',
        provider: 'aws.west',
        label: { $unresolved: ['count.index'] },
        ebs_block_device: [{ device_name: '/dev/sdb' }, { device_name: '/dev/sdc' }],
      });
    });

    it('should keep meta-arguments and lifecycle out of the attributes', () => {
      const { metadata } = only(extractModules(modules).resources);

      expect(metadata.attributes.has('count')).toBe(false);
      expect(metadata.attributes.has('lifecycle')).toBe(false);
      expect(metadata.condition).toEqual({ kind: 'count', expression: '2', value: scalar(2) });
    });

    it('should evaluate one instance with its index bound', () => {
      const resource = only(extractModules(modules).resources);

      expect(resource.evaluate({ countIndex: scalar(1) }).get('label')).toEqual(scalar('web-1'));
    });

    it('should let overrides win in metadata and instances', () => {
      const resource = only(extractModules(modules).resources).withOverrides(
        new Map([['ami', scalar('ami-override')]])
      );

      expect(resource.metadata.attributes.get('ami')).toEqual(scalar('ami-override'));
      expect(resource.evaluate({ countIndex: scalar(0) }).get('ami')).toEqual(scalar('ami-override'));
      expect(resource.evaluate({ countIndex: scalar(0) }).get('label')).toEqual(scalar('web-0'));
    });
  });

  describe('nested blocks', () => {
    it('should key labelled blocks by their labels', () => {
      const { resources } = extractModules({
        '': {
          'main.tf': [
            'resource "null_resource" "setup" {',
            '  provisioner "local-exec" {',
            '    command = "echo"',
            '  }',
            '}',
          ].join('\n'),
        },
      });

      expect(attributesOf(only(resources).metadata.attributes)).toEqual({
        provisioner: [{ 'local-exec': { command: 'echo' } }],
      });
    });

    const dynamicModule = (variable: string) => ({
      '': {
        'main.tf': [
          variable,
          'resource "aws_security_group" "sg" {',
          '  dynamic "ingress" {',
          '    for_each = var.ports',
          '    content {',
          '      from_port = ingress.value',
          '      key       = ingress.key',
          '    }',
          '  }',
          '}',
        ].join('\n'),
      },
    });

    it('should expand dynamic blocks over a known collection', () => {
      const { resources } = extractModules(dynamicModule('variable "ports" {\n  default = [80, 443]\n}'));

      expect(attributesOf(only(resources).metadata.attributes)).toEqual({
        ingress: [
          { from_port: 80, key: 0 },
          { from_port: 443, key: 1 },
        ],
      });
    });

    it('should order dynamic blocks over a map by key', () => {
      const { resources } = extractModules(
        dynamicModule('variable "ports" {\n  default = {\n    https = 443\n    http = 80\n  }\n}')
      );

      expect(attributesOf(only(resources).metadata.attributes)).toEqual({
        ingress: [
          { from_port: 80, key: 'http' },
          { from_port: 443, key: 'https' },
        ],
      });
    });

    it('should keep one body when the collection is unknown', () => {
      const { resources } = extractModules(dynamicModule('variable "ports" {}'));

      expect(attributesOf(only(resources).metadata.attributes)).toEqual({
        ingress: [{ from_port: { $unresolved: ['var.ports'] }, key: { $unresolved: ['var.ports'] } }],
      });
    });
  });

  describe('modules', () => {
    it('should extract data sources and child module resources in module order', () => {
      const { resources } = extractModules({
        '': {
          'main.tf': [
            'module "net" {',
            '  source = "./net"',
            '}',
            'data "aws_ami" "ubuntu" {',
            '  most_recent = true',
            '}',
          ].join('\n'),
        },
        net: {
          'main.tf': [
            'variable "cidr" {',
            '  default = "10.0.0.0/16"',
            '}',
            'resource "aws_vpc" "main" {',
            '  cidr_block = var.cidr',
            '}',
          ].join('\n'),
        },
      });

      expect(resources.map((r) => [r.metadata.modulePath, r.metadata.address, r.metadata.kind])).toEqual([
        ['', 'data.aws_ami.ubuntu', 'data'],
        ['net', 'aws_vpc.main', 'resource'],
      ]);
      expect(resources[1].metadata.source).toEqual({ file: 'modules/net/main.tf', line: 4 });
      expect(resources[1].metadata.attributes.get('cidr_block')).toEqual(scalar('10.0.0.0/16'));
    });

    it('should skip modules disabled by their call', () => {
      const { resources } = extractModules({
        '': { 'main.tf': 'module "opt" {\n  source = "./opt"\n  count  = 0\n}\n' },
        opt: { 'main.tf': 'resource "aws_s3_bucket" "logs" {\n}\n' },
      });

      expect(resources).toEqual([]);
    });

    it('should skip modules with cyclic locals and keep their siblings', () => {
      const { resources } = extractModules({
        '': {
          'main.tf': 'module "bad" {\n  source = "./bad"\n}\nmodule "good" {\n  source = "./good"\n}\n',
        },
        bad: {
          'main.tf': 'locals {\n  a = local.b\n  b = local.a\n}\nresource "aws_s3_bucket" "bad" {\n}\n',
        },
        good: { 'main.tf': 'resource "aws_s3_bucket" "good" {\n}\n' },
      });

      expect(resources.map((r) => `${r.metadata.modulePath}:${r.metadata.address}`)).toEqual([
        'good:aws_s3_bucket.good',
      ]);
    });
  });

  describe('conditions', () => {
    it('should mark blocks without count or for_each as static', () => {
      const { resources } = extractModules({ '': { 'main.tf': 'resource "aws_s3_bucket" "b" {\n}\n' } });

      expect(only(resources).metadata.condition).toEqual({ kind: 'static' });
    });

    it('should leave an undecided conditional count unresolved', () => {
      const { resources } = extractModules({
        '': {
          'main.tf': [
            'variable "enabled" {}',
            'resource "aws_s3_bucket" "b" {',
            '  count = var.enabled ? 1 : 0',
            '}',
          ].join('\n'),
        },
      });

      const { condition } = only(resources).metadata;
      if (condition.kind === 'static') {
        throw new Error('expected a count condition');
      }
      expect(condition.kind).toBe('count');
      expect(condition.expression).toBe('var.enabled ? 1 : 0');
      expect(toJSON(condition.value)).toEqual({ $unresolved: ['var.enabled'] });
    });

    it('should evaluate a conditional count once it is decided', () => {
      const { resources } = extractModules(
        {
          '': {
            'main.tf': [
              'variable "enabled" {}',
              'resource "aws_s3_bucket" "b" {',
              '  count = var.enabled ? 1 : 0',
              '}',
            ].join('\n'),
          },
        },
        { overrides: { enabled: true } }
      );

      expect(only(resources).metadata.condition).toEqual({
        kind: 'count',
        expression: 'var.enabled ? 1 : 0',
        value: scalar(1),
      });
    });

    it('should describe for_each conditions', () => {
      const { resources } = extractModules({
        '': { 'main.tf': 'resource "aws_s3_bucket" "b" {\n  for_each = toset(["a"])\n}\n' },
      });

      const { condition } = only(resources).metadata;
      expect(condition.kind).toBe('for_each');
    });
  });
});
