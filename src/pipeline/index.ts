export {
  compileConfiguration,
  runPipeline,
  type CompileInputs,
  type PipelineOptions,
  type PipelineRequest,
  type PipelineResult,
} from './pipeline';

export { resultToJSON, serializeResult } from './serializer';
