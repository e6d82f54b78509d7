export { parseArgs, ArgsError, HELP_TEXT, type CliOptions, type ParsedArgs } from './args.js';
export { prepareWorkspace, outputFileName } from './workspace.js';
export {
  runPipeline,
  PipelineError,
  type PipelineDeps,
  type PipelineConfig,
  type PipelineResult,
  type PipelineStage,
} from './pipeline.js';
export { createPipelineDeps } from './deps.js';
