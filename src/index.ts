/**
 * infragraph
 *
 * Interprets Terraform configuration trees without executing them and
 * builds the dependency graph of the resource instances they declare.
 *
 * @example
 * ```typescript
 * import { runPipeline, serializeResult } from 'infragraph';
 *
 * const result = await runPipeline({
 *   locators: ['./infrastructure'],
 *   variableFiles: ['./prod.tfvars'],
 *   overrides: { environment: 'prod' },
 * });
 * process.stdout.write(serializeResult(result));
 * ```
 */

export * from './config';
export * from './diagnostics';
export * from './errors';
export * from './expansion';
export * from './graph';
export * from './logging';
export * from './metadata';
export * from './pipeline';
export * from './resolver';
export * from './sources';
export * from './types';

export {
  BlockParser,
  parseConfigTree,
  type Block,
  type BlockKind,
  type ParsedConfig,
  type ParsedModule,
} from './parsers/terraform/block-parser';
export { HCLParser } from './parsers/terraform/hcl-parser';
export { JSONConfigParser } from './parsers/terraform/json-config-parser';
