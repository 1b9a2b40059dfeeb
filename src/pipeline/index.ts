export { gradeSubmissions } from './run.js';
export type { GradeSubmissionsOptions } from './run.js';
export { checkInference, isModelAvailable } from './precheck.js';
export type { InferenceCheck } from './precheck.js';
export type { PipelineEvent, PipelineEventHandler, RunSummary } from './types.js';
