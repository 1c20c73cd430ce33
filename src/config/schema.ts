/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating pipeline configuration.
 * Provides type-safe configuration with compile-time type inference.
 */

import { z } from 'zod';

// ============================================================================
// Source Configuration
// ============================================================================

/**
 * Source loading configuration schema
 */
export const SourceConfigSchema = z.object({
  /** Timeout for a single remote fetch in milliseconds */
  fetchTimeoutMs: z.coerce.number().int().min(1000).default(120000),
  /** Git executable used for remote sources */
  gitBinary: z.string().min(1).default('git'),
  /** Clone depth for remote sources */
  cloneDepth: z.coerce.number().int().min(1).default(1),
  /** Staging directory for remote sources (defaults to the OS temp dir) */
  stagingDir: z.string().optional(),
  /** Configuration file extensions loaded from module directories */
  fileExtensions: z.array(z.string().startsWith('.')).min(1).default(['.tf', '.tf.json']),
  /** Maximum size of a single configuration file in bytes */
  maxFileSize: z.coerce.number().int().min(1).default(10 * 1024 * 1024),
});

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

// ============================================================================
// Resolution Configuration
// ============================================================================

/**
 * Scope resolution configuration schema
 */
export const ResolutionConfigSchema = z.object({
  /** Upper bound on fixpoint passes over all module scopes */
  maxPasses: z.coerce.number().int().min(1).max(100).default(10),
  /** Largest count or for_each expanded for one resource */
  maxInstances: z.coerce.number().int().min(1).max(1_000_000).default(10_000),
});

export type ResolutionConfig = z.infer<typeof ResolutionConfigSchema>;

/**
 * Expression evaluation configuration schema
 */
export const EvaluationConfigSchema = z.object({
  /** Value of terraform.workspace */
  workspace: z.string().min(1).default('default'),
});

export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: LogLevel.default('info'),
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Pipeline Configuration
// ============================================================================

/**
 * Complete pipeline configuration schema
 */
export const PipelineConfigSchema = z.object({
  sources: SourceConfigSchema.default({}),
  resolution: ResolutionConfigSchema.default({}),
  evaluation: EvaluationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Input shape accepted before defaults are applied
 */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
