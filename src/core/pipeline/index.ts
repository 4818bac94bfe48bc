export type { Interceptor, PipelineState, ExecuteOptions, Cleanup, PhaseRelation } from './types.js';

export { PipelinePhase } from './phase.js';
export { Pipeline } from './pipeline.js';
export { PipelineContext } from './context.js';
