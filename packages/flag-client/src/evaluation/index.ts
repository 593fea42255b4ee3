export { createEvaluationPipeline } from './pipeline.js';
export type { EvaluationPipeline, EvaluationPipelineOptions, EvaluationRequest } from './types.js';
