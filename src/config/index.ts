/**
 * Configuration Module
 * @module config
 *
 * @example
 * ```typescript
 * import { loadConfig } from './config';
 *
 * const config = loadConfig({ resolution: { maxPasses: 5 } });
 * ```
 */

export {
  PipelineConfigSchema,
  SourceConfigSchema,
  ResolutionConfigSchema,
  EvaluationConfigSchema,
  LoggingConfigSchema,
  LogLevel,
  type PipelineConfig,
  type PipelineConfigInput,
  type SourceConfig,
  type ResolutionConfig,
  type EvaluationConfig,
  type LoggingConfig,
} from './schema';

export { loadConfig, loadEnvironmentConfig, defaultConfig } from './loader';
