import { describe, it, expect } from 'vitest';
import { formatEvent, formatSummary } from './reporter.js';

const stripAnsi = (text: string) => text.replace(/\x1b\[[0-9;]*m/g, '');
const plain = (lines: string[]) => lines.map(stripAnsi);

describe('formatEvent', () => {
  it('announces a submission', () => {
    expect(plain(formatEvent({ type: 'submission-start', submissionId: 'abc123', archivePath: 'x.zip' }, 40))).toEqual([
      '',
      '📁 Processing submission: abc123',
    ]);
  });

  it('shows score and feedback of a graded file', () => {
    const lines = formatEvent({
      type: 'file-graded',
      submissionId: 'abc123',
      relativePath: 'main.py',
      outcome: { status: 'graded', score: 7.5, feedback: 'Clean code', raw: '' },
      total: 7.5,
    }, 40);

    expect(plain(lines)).toEqual(['    Score: 7.5/10', '    Feedback: Clean code']);
  });

  it('adds the error for a failed analysis', () => {
    const lines = formatEvent({
      type: 'file-graded',
      submissionId: 'abc123',
      relativePath: 'main.py',
      outcome: { status: 'inference-failed', score: 0, feedback: 'Analysis failed', error: new Error('timeout') },
      total: 0,
    }, 40);

    expect(plain(lines)).toEqual([
      '    Score: 0.0/10',
      '    Feedback: Analysis failed',
      '    ✗ Error analyzing main.py: timeout',
    ]);
  });

  it('frames raw responses between markers', () => {
    const lines = formatEvent({ type: 'raw-response', submissionId: 'a', relativePath: 'main.py', raw: 'Score|1|' }, 40);
    expect(plain(lines)).toEqual(['', 'RAW LLM RESPONSE (main.py):', 'Score|1|', '----END RAW RESPONSE----', '']);
  });

  it('prints the total with the configured denominator', () => {
    const lines = formatEvent({ type: 'submission-done', submissionId: 'abc123', files: 2, total: 13.5 }, 30);
    expect(plain(lines)).toEqual(['  Total: 13.5/30 (2 file(s))']);
  });
});

describe('formatSummary', () => {
  it('lists the run counters', () => {
    const text = stripAnsi(formatSummary({
      submissions: 3,
      failedSubmissions: 1,
      files: 4,
      graded: 2,
      parseFallbacks: 1,
      inferenceFailures: 1,
      unreadableFiles: 0,
      duration: 1500,
    }));

    expect(text).toContain('Grading Summary');
    expect(text).toContain(`${'Skipped archives'.padEnd(20)}1`);
    expect(text).toContain(`${'Files analyzed'.padEnd(20)}4`);
    expect(text).toContain(`${'Duration'.padEnd(20)}1.5s`);
  });
});
