/**
 * Configuration Loader Tests
 * @module tests/config/loader
 */

import { describe, it, expect } from 'vitest';
import { defaultConfig, loadConfig, loadEnvironmentConfig } from '@/config';
import { ConfigurationError } from '@/errors';

function configurationError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
  it('should apply defaults when nothing is set', () => {
    const config = loadConfig({}, {});

    expect(config.sources).toEqual({
      fetchTimeoutMs: 120000,
      gitBinary: 'git',
      cloneDepth: 1,
      fileExtensions: ['.tf', '.tf.json'],
      maxFileSize: 10 * 1024 * 1024,
    });
    expect(config.resolution).toEqual({ maxPasses: 10, maxInstances: 10000 });
    expect(config.evaluation).toEqual({ workspace: 'default' });
    expect(config.logging).toEqual({ level: 'info', pretty: false });
  });

  it('should read settings from the environment', () => {
    const config = loadConfig(
      {},
      {
        INFRAGRAPH_FETCH_TIMEOUT_MS: '5000',
        INFRAGRAPH_GIT_BINARY: '/usr/local/bin/git',
        INFRAGRAPH_CLONE_DEPTH: '3',
        INFRAGRAPH_STAGING_DIR: '/tmp/staging',
        INFRAGRAPH_MAX_PASSES: '4',
        INFRAGRAPH_MAX_INSTANCES: '500',
        INFRAGRAPH_WORKSPACE: 'staging',
        LOG_LEVEL: 'debug',
        LOG_PRETTY: 'true',
      }
    );

    expect(config.sources.fetchTimeoutMs).toBe(5000);
    expect(config.sources.gitBinary).toBe('/usr/local/bin/git');
    expect(config.sources.cloneDepth).toBe(3);
    expect(config.sources.stagingDir).toBe('/tmp/staging');
    expect(config.resolution.maxPasses).toBe(4);
    expect(config.resolution.maxInstances).toBe(500);
    expect(config.evaluation.workspace).toBe('staging');
    expect(config.logging).toEqual({ level: 'debug', pretty: true });
  });

  it('should let explicit overrides win over the environment', () => {
    const config = loadConfig(
      { resolution: { maxPasses: 20 }, evaluation: { workspace: 'prod' } },
      { INFRAGRAPH_MAX_PASSES: '4', INFRAGRAPH_WORKSPACE: 'staging' }
    );

    expect(config.resolution.maxPasses).toBe(20);
    expect(config.evaluation.workspace).toBe('prod');
  });

  it('should ignore blank and non-numeric environment numbers', () => {
    const config = loadConfig({}, { INFRAGRAPH_MAX_PASSES: ' ', INFRAGRAPH_CLONE_DEPTH: 'deep' });

    expect(config.resolution.maxPasses).toBe(10);
    expect(config.sources.cloneDepth).toBe(1);
  });

  it('should reject values out of range with the offending path', () => {
    const error = configurationError(() => loadConfig({}, { INFRAGRAPH_FETCH_TIMEOUT_MS: '10' }));

    expect(error.message).toBe('Invalid pipeline configuration');
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith('sources.fetchTimeoutMs: ')).toBe(true);
  });

  it('should reject unknown log levels', () => {
    const error = configurationError(() => loadConfig({}, { LOG_LEVEL: 'loud' }));

    expect(error.issues[0].startsWith('logging.level: ')).toBe(true);
  });

  it('should reject a pass budget above the limit', () => {
    const error = configurationError(() => loadConfig({ resolution: { maxPasses: 101 } }, {}));

    expect(error.issues[0].startsWith('resolution.maxPasses: ')).toBe(true);
  });
});

describe('loadEnvironmentConfig', () => {
  it('should leave out variables that are not set', () => {
    expect(loadEnvironmentConfig({ LOG_PRETTY: 'false' })).toEqual({
      sources: {},
      resolution: {},
      evaluation: {},
      logging: { pretty: false },
    });
  });
});

describe('defaultConfig', () => {
  it('should not read the environment', () => {
    expect(defaultConfig()).toEqual(loadConfig({}, {}));
  });
});
