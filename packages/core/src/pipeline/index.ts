/**
 * Correlation pipeline
 */

export * from './types.js';
export {
  CorrelationPipeline,
  createCorrelationPipelineFromEnv,
  type AssembledPipeline,
  type CorrelationPipelineDependencies,
  type PipelineEnvironment,
} from './correlation-pipeline.js';
