import {
  PARSE_FALLBACK_SCORE,
  PARSE_FALLBACK_FEEDBACK,
  MIN_SCORE,
  MAX_SCORE,
  type ParseResult,
} from './types.js';

const SCORE_PATTERN = /Score\|\s*([-+]?[0-9.]+)\s*\|?/;
const FEEDBACK_PATTERN = /Feedback\|(.*?)(?:\||\n?$)/;

export function clampScore(score: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, score));
}

/**
 * Pull `Score|<n>|` and `Feedback|<text>|` out of a model reply. Never throws:
 * anything unexpected becomes the neutral fallback.
 */
export function parseGradingResponse(raw: unknown): ParseResult {
  try {
    if (typeof raw !== 'string') {
      throw new TypeError(`expected text, got ${raw === null ? 'null' : typeof raw}`);
    }

    const defaulted: Array<'score' | 'feedback'> = [];

    const scoreMatch = SCORE_PATTERN.exec(raw);
    let score = scoreMatch ? Number(scoreMatch[1]) : Number.NaN;
    if (!Number.isFinite(score)) {
      score = PARSE_FALLBACK_SCORE;
      defaulted.push('score');
    }

    const feedbackMatch = FEEDBACK_PATTERN.exec(raw);
    let feedback = PARSE_FALLBACK_FEEDBACK;
    if (feedbackMatch) {
      feedback = feedbackMatch[1].trim();
    } else {
      defaulted.push('feedback');
    }

    return { ok: true, score: clampScore(score), feedback, defaulted };
  } catch (e) {
    return {
      ok: false,
      score: PARSE_FALLBACK_SCORE,
      feedback: PARSE_FALLBACK_FEEDBACK,
      reason: e instanceof Error ? e.message : String(e),
    };
  }
}
