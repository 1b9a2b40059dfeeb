export type { GradeOutcome, GradeStatus, ParseResult } from './types.js';
export {
  PARSE_FALLBACK_SCORE,
  PARSE_FALLBACK_FEEDBACK,
  INFERENCE_FAILURE_SCORE,
  INFERENCE_FAILURE_FEEDBACK,
  MIN_SCORE,
  MAX_SCORE,
} from './types.js';
export { FileGrader } from './grader.js';
export type { FileGraderOptions } from './grader.js';
export { buildGraderPrompt, fillTemplate, DEFAULT_CONTENT_BUDGET } from './prompt-builder.js';
export type { GraderPromptInput } from './prompt-builder.js';
export { parseGradingResponse, clampScore } from './response-parser.js';
