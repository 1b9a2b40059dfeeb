import type { PipelineEvent, RunSummary } from '../pipeline/types.js';
import { formatScore, formatTotal } from '../report/csv-writer.js';
import { style, icons, colorScore, keyValue, summaryBox, formatDuration } from './theme.js';

/**
 * Console lines for one pipeline event. Pure, so the grade command only has
 * to print what comes back.
 */
export function formatEvent(event: PipelineEvent, totalDenominator: number): string[] {
  switch (event.type) {
    case 'run-start':
      return [`${icons.magnify} Found ${style.number(String(event.archives.length))} submission archive(s)`];

    case 'submission-start':
      return ['', `${icons.folder} Processing submission: ${style.bold(event.submissionId)}`];

    case 'entries-skipped':
      return event.entries.map(entry =>
        style.warning(`  ${icons.warning} Skipped archive entry outside the submission: ${entry}`)
      );

    case 'file-start':
      return [`  ${icons.file} Analyzing: ${style.path(event.relativePath)}`];

    case 'raw-response':
      return [
        '',
        style.muted(`RAW LLM RESPONSE (${event.relativePath}):`),
        event.raw,
        style.muted('----END RAW RESPONSE----'),
        '',
      ];

    case 'file-graded': {
      const { outcome } = event;
      const lines = [
        keyValue('Score', colorScore(outcome.score, formatScore(outcome.score)), 2),
        keyValue('Feedback', outcome.feedback, 2),
      ];
      if (outcome.status === 'inference-failed') {
        lines.push(style.error(`    ${icons.error} Error analyzing ${event.relativePath}: ${outcome.error.message}`));
      } else if (outcome.status === 'parse-fallback') {
        lines.push(style.warning(`    ${icons.warning} Could not parse response: ${outcome.reason}`));
      }
      return lines;
    }

    case 'file-error':
      return [style.error(`  ${icons.error} Error processing ${event.relativePath}: ${event.error.message}`)];

    case 'submission-done':
      return [
        keyValue(
          'Total',
          style.bold(formatTotal(event.total, totalDenominator)) + style.muted(` (${event.files} file(s))`),
          1
        ),
      ];

    case 'submission-failed':
      return [style.error(`  ${icons.error} Skipped ${event.submissionId}: ${event.error.message}`)];

    case 'cleanup-error':
      return [style.warning(`  ${icons.warning} Could not remove ${event.dir}: ${event.error.message}`)];
  }
}

export function formatSummary(summary: RunSummary): string {
  return summaryBox('Grading Summary', [
    ['Submissions', String(summary.submissions)],
    ['Skipped archives', String(summary.failedSubmissions)],
    ['Files analyzed', String(summary.files)],
    ['Scored by model', String(summary.graded)],
    ['Parse fallbacks', String(summary.parseFallbacks)],
    ['Failed analyses', String(summary.inferenceFailures)],
    ['Unreadable files', String(summary.unreadableFiles)],
    ['Duration', formatDuration(summary.duration)],
  ]);
}
