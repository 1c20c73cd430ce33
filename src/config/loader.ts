/**
 * Configuration Loader
 * @module config/loader
 *
 * Merges environment-derived configuration with explicit overrides and
 * validates the result. Explicit overrides win over the environment.
 */

import { ConfigurationError } from '../errors';
import {
  PipelineConfig,
  PipelineConfigInput,
  PipelineConfigSchema,
} from './schema';

// ============================================================================
// Environment Source
// ============================================================================

function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parseBoolOrUndefined(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value === 'true';
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Raw, unvalidated configuration sections read from the environment
 */
export type EnvironmentConfig = {
  [Section in keyof PipelineConfigInput]-?: Record<string, unknown>;
};

/**
 * Read configuration values from environment variables
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    sources: withoutUndefined({
      fetchTimeoutMs: parseIntOrUndefined(env.INFRAGRAPH_FETCH_TIMEOUT_MS),
      gitBinary: env.INFRAGRAPH_GIT_BINARY,
      cloneDepth: parseIntOrUndefined(env.INFRAGRAPH_CLONE_DEPTH),
      stagingDir: env.INFRAGRAPH_STAGING_DIR,
    }),
    resolution: withoutUndefined({
      maxPasses: parseIntOrUndefined(env.INFRAGRAPH_MAX_PASSES),
      maxInstances: parseIntOrUndefined(env.INFRAGRAPH_MAX_INSTANCES),
    }),
    evaluation: withoutUndefined({
      workspace: env.INFRAGRAPH_WORKSPACE,
    }),
    logging: withoutUndefined({
      level: env.LOG_LEVEL,
      pretty: parseBoolOrUndefined(env.LOG_PRETTY),
    }),
  };
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Load and validate the pipeline configuration
 */
export function loadConfig(
  overrides: PipelineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const fromEnv = loadEnvironmentConfig(env);

  const merged = {
    sources: { ...fromEnv.sources, ...overrides.sources },
    resolution: { ...fromEnv.resolution, ...overrides.resolution },
    evaluation: { ...fromEnv.evaluation, ...overrides.evaluation },
    logging: { ...fromEnv.logging, ...overrides.logging },
  };

  const result = PipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid pipeline configuration', issues);
  }

  return result.data;
}

/**
 * Default configuration, ignoring the environment
 */
export function defaultConfig(): PipelineConfig {
  return PipelineConfigSchema.parse({});
}
