export const PARSE_FALLBACK_SCORE = 5.0;
export const PARSE_FALLBACK_FEEDBACK = 'No feedback parsed';
export const INFERENCE_FAILURE_SCORE = 0.0;
export const INFERENCE_FAILURE_FEEDBACK = 'Analysis failed';

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

export type ParseResult =
  | {
      ok: true;
      score: number;
      feedback: string;
      /** Fields that were absent or unusable and got their default. */
      defaulted: Array<'score' | 'feedback'>;
    }
  | {
      ok: false;
      score: typeof PARSE_FALLBACK_SCORE;
      feedback: typeof PARSE_FALLBACK_FEEDBACK;
      reason: string;
    };

export type GradeOutcome =
  | {
      status: 'graded';
      score: number;
      feedback: string;
      raw: string;
    }
  | {
      status: 'parse-fallback';
      score: number;
      feedback: string;
      reason: string;
      raw: string;
    }
  | {
      status: 'inference-failed';
      score: typeof INFERENCE_FAILURE_SCORE;
      feedback: typeof INFERENCE_FAILURE_FEEDBACK;
      error: Error;
    };

export type GradeStatus = GradeOutcome['status'];
