/**
 * Graph Builder Tests
 * @module tests/graph/graph-builder
 *
 * Edges derived from references between instances, and overlay edits.
 */

import { describe, it, expect } from 'vitest';
import { CollectingDiagnosticsSink } from '@/diagnostics';
import { expandResources } from '@/expansion';
import { GraphValidator, buildGraph } from '@/graph';
import type { Graph } from '@/graph';
import { parseAnnotations } from '@/metadata';
import type { AnnotationInput } from '@/metadata';
import { extractModules, silentLogger } from '../factories';
import type { ModuleFiles } from '../factories';

function graphOf(modules: ModuleFiles, overlay?: AnnotationInput): Graph {
  const { resources } = extractModules(modules);
  const instances = expandResources(resources, new CollectingDiagnosticsSink(), {}, silentLogger());
  return buildGraph(instances, overlay ? parseAnnotations(overlay) : undefined, silentLogger());
}

function edges(graph: Graph): string[] {
  const out: string[] = [];
  for (const [from, targets] of graph) {
    for (const to of targets) {
      out.push(`${from} -> ${to}`);
    }
  }
  return out.sort();
}

function root(...lines: string[]): ModuleFiles {
  return { '': { 'main.tf': lines.join('\n') } };
}

describe('GraphBuilder', () => {
  describe('references', () => {
    it('should fan out to every instance of an unindexed target', () => {
      const graph = graphOf(
        root(
          'resource "aws_subnet" "a" {',
          '  count = 2',
          '}',
          'resource "aws_lb" "lb" {',
          '  subnets = aws_subnet.a[*].id',
          '}'
        )
      );

      expect(edges(graph)).toEqual(['aws_lb.lb -> aws_subnet.a.0', 'aws_lb.lb -> aws_subnet.a.1']);
      expect([...graph.keys()]).toEqual(['aws_subnet.a.0', 'aws_subnet.a.1', 'aws_lb.lb']);
    });

    it('should connect an indexed reference to that instance only', () => {
      const graph = graphOf(
        root(
          'resource "aws_subnet" "a" {',
          '  count = 2',
          '}',
          'resource "aws_instance" "web" {',
          '  subnet_id = aws_subnet.a[1].id',
          '}'
        )
      );

      expect(edges(graph)).toEqual(['aws_instance.web -> aws_subnet.a.1']);
    });

    it('should pair instances through count.index', () => {
      const graph = graphOf(
        root(
          'resource "aws_instance" "web" {',
          '  count = 2',
          '}',
          'resource "aws_eip" "ip" {',
          '  count    = 2',
          '  instance = aws_instance.web[count.index].id',
          '}'
        )
      );

      expect(edges(graph)).toEqual(['aws_eip.ip.0 -> aws_instance.web.0', 'aws_eip.ip.1 -> aws_instance.web.1']);
    });

    it('should pair instances through each.key', () => {
      const graph = graphOf(
        root(
          'resource "aws_s3_bucket" "b" {',
          '  for_each = toset(["logs", "assets"])',
          '}',
          'resource "aws_s3_bucket_policy" "p" {',
          '  for_each = toset(["logs", "assets"])',
          '  bucket   = aws_s3_bucket.b[each.key].id',
          '}'
        )
      );

      expect(edges(graph)).toEqual([
        'aws_s3_bucket_policy.p.assets -> aws_s3_bucket.b.assets',
        'aws_s3_bucket_policy.p.logs -> aws_s3_bucket.b.logs',
      ]);
    });

    it('should resolve an index on a single-instance target to that instance', () => {
      const graph = graphOf(
        root(
          'resource "aws_vpc" "main" {',
          '}',
          'resource "aws_subnet" "a" {',
          '  vpc_id = aws_vpc.main[0].id',
          '}'
        )
      );

      expect(edges(graph)).toEqual(['aws_subnet.a -> aws_vpc.main']);
    });

    it('should connect data sources', () => {
      const graph = graphOf(
        root(
          'data "aws_ami" "ubuntu" {',
          '}',
          'resource "aws_instance" "web" {',
          '  ami = data.aws_ami.ubuntu.id',
          '}'
        )
      );

      expect(edges(graph)).toEqual(['aws_instance.web -> data.aws_ami.ubuntu']);
    });

    it('should drop self references and references to missing instances', () => {
      const graph = graphOf(
        root(
          'resource "aws_instance" "none" {',
          '  count = 0',
          '}',
          'resource "aws_instance" "web" {',
          '  name  = aws_instance.web.id',
          '  other = aws_instance.none[0].id',
          '  gone  = aws_instance.undeclared.id',
          '}'
        )
      );

      expect(graph).toEqual(new Map([['aws_instance.web', []]]));
    });
  });

  describe('modules', () => {
    const modules: ModuleFiles = {
      '': {
        'main.tf': [
          'module "net" {',
          '  source = "./net"',
          '}',
          'resource "aws_instance" "app" {',
          '  vpc_id = module.net.vpc_id',
          '}',
          'resource "aws_instance" "all" {',
          '  anything = module.net.missing',
          '}',
        ].join('\n'),
      },
      net: {
        'main.tf': [
          'module "dns" {',
          '  source = "./dns"',
          '}',
          'resource "aws_vpc" "main" {',
          '}',
          'output "vpc_id" {',
          '  value = aws_vpc.main.id',
          '}',
        ].join('\n'),
      },
      'net.dns': { 'main.tf': 'resource "aws_route53_zone" "z" {\n}\n' },
    };

    it('should follow module outputs to the resources behind them', () => {
      expect(edges(graphOf(modules)).filter((edge) => edge.startsWith('aws_instance.app'))).toEqual([
        'aws_instance.app -> net.aws_vpc.main',
      ]);
    });

    it('should fan out to the whole module subtree when the output is not known', () => {
      expect(edges(graphOf(modules)).filter((edge) => edge.startsWith('aws_instance.all'))).toEqual([
        'aws_instance.all -> net.aws_vpc.main',
        'aws_instance.all -> net.dns.aws_route53_zone.z',
      ]);
    });
  });

  describe('overlay', () => {
    const modules = root(
      'resource "aws_lambda_function" "worker" {',
      '  role = aws_iam_role.r.arn',
      '}',
      'resource "aws_iam_role" "r" {',
      '}',
      'resource "aws_s3_bucket" "logs" {',
      '}',
      'resource "aws_s3_bucket" "assets" {',
      '}'
    );

    it('should add edges to every matching instance', () => {
      const graph = graphOf(modules, { connect: { 'aws_lambda_function.worker': ['aws_s3_bucket.*'] } });

      expect(edges(graph)).toEqual([
        'aws_lambda_function.worker -> aws_iam_role.r',
        'aws_lambda_function.worker -> aws_s3_bucket.assets',
        'aws_lambda_function.worker -> aws_s3_bucket.logs',
      ]);
    });

    it('should remove derived edges', () => {
      const graph = graphOf(modules, { disconnect: { 'aws_lambda_function.*': ['aws_iam_role.r'] } });

      expect(edges(graph)).toEqual([]);
    });

    it('should ignore connections that match nothing', () => {
      const graph = graphOf(modules, { connect: { 'aws_sqs_queue.q': ['aws_s3_bucket.logs'] } });

      expect(edges(graph)).toEqual(['aws_lambda_function.worker -> aws_iam_role.r']);
    });
  });
});

describe('GraphValidator', () => {
  const validator = new GraphValidator();

  it('should report dangling targets, self loops and cycles', () => {
    const graph: Graph = new Map([
      ['a', ['b']],
      ['b', ['a']],
      ['c', ['c', 'missing']],
    ]);

    const result = validator.validate(graph);

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { code: 'SELF_LOOP', message: 'c depends on itself', nodeId: 'c' },
      { code: 'DANGLING_TARGET', message: 'c depends on unknown instance missing', nodeId: 'c' },
    ]);
    expect(result.warnings).toEqual([
      { code: 'CYCLE_DETECTED', message: 'Dependency cycle between a, b', nodes: ['a', 'b'] },
      { code: 'CYCLE_DETECTED', message: 'Dependency cycle between c', nodes: ['c'] },
    ]);
  });

  it('should accept an acyclic graph', () => {
    const graph: Graph = new Map([
      ['a', ['b']],
      ['b', []],
    ]);

    expect(validator.validate(graph)).toEqual({ isValid: true, errors: [], warnings: [] });
  });

  it('should find instances without any edges', () => {
    const graph: Graph = new Map([
      ['a', ['b']],
      ['b', []],
      ['c', []],
    ]);

    expect(validator.findOrphanNodes(graph)).toEqual(['c']);
  });
});
