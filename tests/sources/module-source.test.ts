/**
 * Module Source Tests
 * @module tests/sources/module-source
 *
 * Classification of module sources and source locators.
 */

import { describe, it, expect } from 'vitest';
import {
  describeSource,
  exactVersion,
  parseLocator,
  parseModuleSource,
  registryGitSource,
} from '@/sources/module-source';

describe('parseModuleSource', () => {
  describe('local paths', () => {
    it('should parse relative paths', () => {
      expect(parseModuleSource('./modules/vpc')).toEqual({ type: 'local', path: './modules/vpc' });
      expect(parseModuleSource('../shared/vpc')).toEqual({ type: 'local', path: '../shared/vpc' });
    });
  });

  describe('git sources', () => {
    it('should parse a forced git source with subdirectory and ref', () => {
      expect(parseModuleSource('git::https://example.com/org/repo.git//modules/vpc?ref=v1.2.0')).toEqual({
        type: 'git',
        url: 'https://example.com/org/repo.git',
        ref: 'v1.2.0',
        subdir: 'modules/vpc',
      });
    });

    it('should expand GitHub shorthand', () => {
      expect(parseModuleSource('github.com/acme/network')).toEqual({
        type: 'git',
        url: 'https://github.com/acme/network.git',
        ref: null,
        subdir: null,
      });
      expect(parseModuleSource('github.com/acme/network.git?ref=main')).toMatchObject({
        url: 'https://github.com/acme/network.git',
        ref: 'main',
      });
    });

    it('should recognise scp-style and https repository addresses', () => {
      expect(parseModuleSource('git@github.com:acme/network.git')).toMatchObject({
        type: 'git',
        url: 'git@github.com:acme/network.git',
      });
      expect(parseModuleSource('https://example.com/org/repo.git')).toMatchObject({
        type: 'git',
        url: 'https://example.com/org/repo.git',
      });
    });
  });

  describe('registry sources', () => {
    it('should parse public registry addresses', () => {
      expect(parseModuleSource('terraform-aws-modules/vpc/aws')).toEqual({
        type: 'registry',
        hostname: 'registry.terraform.io',
        namespace: 'terraform-aws-modules',
        name: 'vpc',
        provider: 'aws',
        subdir: null,
      });
    });

    it('should parse private registry hostnames and subdirectories', () => {
      expect(parseModuleSource('app.terraform.io/acme/vpc/aws')).toMatchObject({
        type: 'registry',
        hostname: 'app.terraform.io',
        namespace: 'acme',
      });
      expect(parseModuleSource('hashicorp/consul/aws//modules/consul-cluster')).toMatchObject({
        type: 'registry',
        name: 'consul',
        subdir: 'modules/consul-cluster',
      });
    });
  });

  describe('unsupported sources', () => {
    it('should not claim getters it cannot fetch', () => {
      expect(parseModuleSource('s3::https://bucket.example.com/vpc.zip')).toEqual({
        type: 'unsupported',
        raw: 's3::https://bucket.example.com/vpc.zip',
      });
      expect(parseModuleSource('https://example.com/vpc.zip')).toEqual({
        type: 'unsupported',
        raw: 'https://example.com/vpc.zip',
      });
    });
  });
});

describe('parseLocator', () => {
  it('should treat plain paths as local directories', () => {
    expect(parseLocator('./infra')).toEqual({ type: 'local', path: './infra' });
    expect(parseLocator('/srv/infra')).toEqual({ type: 'local', path: '/srv/infra' });
    expect(parseLocator('infra')).toEqual({ type: 'local', path: 'infra' });
  });

  it('should treat repository addresses as git sources', () => {
    expect(parseLocator('github.com/acme/infra?ref=main')).toEqual({
      type: 'git',
      url: 'https://github.com/acme/infra.git',
      ref: 'main',
      subdir: null,
    });
  });
});

describe('exactVersion', () => {
  it('should accept pinned versions only', () => {
    expect(exactVersion('1.2.0')).toBe('1.2.0');
    expect(exactVersion('= 1.2.0')).toBe('1.2.0');
    expect(exactVersion('v3.0.0-beta.1')).toBe('3.0.0-beta.1');
    expect(exactVersion('~> 1.2')).toBeNull();
    expect(exactVersion(null)).toBeNull();
  });
});

describe('registryGitSource', () => {
  it('should map registry modules to their conventional repository', () => {
    const source = parseModuleSource('terraform-aws-modules/vpc/aws');
    if (source.type !== 'registry') {
      throw new Error('expected a registry source');
    }

    expect(registryGitSource(source, '5.1.0')).toEqual({
      type: 'git',
      url: 'https://github.com/terraform-aws-modules/terraform-aws-vpc.git',
      ref: 'v5.1.0',
      subdir: null,
    });
    expect(registryGitSource(source, '>= 5.0').ref).toBeNull();
  });
});

describe('describeSource', () => {
  it('should render sources back to text', () => {
    expect(describeSource(parseModuleSource('git::https://example.com/r.git//sub?ref=v1'))).toBe(
      'https://example.com/r.git//sub?ref=v1'
    );
    expect(describeSource(parseModuleSource('acme/vpc/aws'))).toBe('registry.terraform.io/acme/vpc/aws');
  });
});
