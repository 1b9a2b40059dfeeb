import type { InferenceBackend, InferenceRequest } from '../inference/types.js';
import { buildGraderPrompt, type GraderPromptInput } from './prompt-builder.js';
import { parseGradingResponse } from './response-parser.js';
import {
  INFERENCE_FAILURE_SCORE,
  INFERENCE_FAILURE_FEEDBACK,
  type GradeOutcome,
} from './types.js';

export interface FileGraderOptions {
  maxContentChars: number;
  request: Omit<InferenceRequest, 'prompt'>;
}

export class FileGrader {
  constructor(
    private backend: InferenceBackend,
    private options: FileGraderOptions
  ) {}

  async grade(input: GraderPromptInput): Promise<GradeOutcome> {
    const prompt = buildGraderPrompt(input, this.options.maxContentChars);
    const result = await this.backend.generate({ ...this.options.request, prompt });

    if (!result.ok) {
      return {
        status: 'inference-failed',
        score: INFERENCE_FAILURE_SCORE,
        feedback: INFERENCE_FAILURE_FEEDBACK,
        error: result.error,
      };
    }

    const parsed = parseGradingResponse(result.text);
    if (!parsed.ok || parsed.defaulted.includes('score')) {
      return {
        status: 'parse-fallback',
        score: parsed.score,
        feedback: parsed.feedback,
        reason: parsed.ok ? 'no score in response' : parsed.reason,
        raw: result.text,
      };
    }
    return { status: 'graded', score: parsed.score, feedback: parsed.feedback, raw: result.text };
  }
}
