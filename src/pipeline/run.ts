import type { GraderConfig } from '../config/types.js';
import { FileGrader } from '../graders/grader.js';
import type { GradeOutcome } from '../graders/types.js';
import type { InferenceBackend } from '../inference/types.js';
import { toError } from '../inference/types.js';
import { ReportWriter } from '../report/csv-writer.js';
import {
  ArchiveExtractionError,
  listArchives,
  listEligibleFiles,
  readSubmissionFile,
  resolveSubmissionId,
  withSubmission,
} from '../submissions/unpacker.js';
import type { Submission } from '../submissions/types.js';
import type { PipelineEventHandler, RunSummary } from './types.js';

export interface GradeSubmissionsOptions {
  config: GraderConfig;
  backend: InferenceBackend;
  /** Rubric text, loaded once for the whole run. */
  requirements: string;
  onEvent?: PipelineEventHandler;
}

/**
 * Grade every archive in the submissions directory, one file at a time, and
 * write the report as it goes. An archive that cannot be extracted is skipped
 * as a whole; a file that cannot be read or graded never stops the run.
 */
export async function gradeSubmissions(options: GradeSubmissionsOptions): Promise<RunSummary> {
  const { config, backend, requirements, onEvent = () => {} } = options;
  const startTime = Date.now();
  const summary: RunSummary = {
    submissions: 0,
    failedSubmissions: 0,
    files: 0,
    graded: 0,
    parseFallbacks: 0,
    inferenceFailures: 0,
    unreadableFiles: 0,
    duration: 0,
  };

  const grader = new FileGrader(backend, {
    maxContentChars: config.prompt.maxContentChars,
    request: {
      model: config.inference.model,
      temperature: config.inference.temperature,
      format: config.inference.format,
      maxTokens: config.inference.maxTokens,
    },
  });

  const archives = await listArchives(config.submissionsDir, config.archive.extension);
  onEvent({ type: 'run-start', archives });

  const report = await ReportWriter.open(config.outputPath, {
    totalDenominator: config.report.totalDenominator,
  });

  const gradeSubmission = async (submission: Submission): Promise<void> => {
    if (submission.skippedEntries.length > 0) {
      onEvent({ type: 'entries-skipped', submissionId: submission.id, entries: submission.skippedEntries });
    }

    const files = await listEligibleFiles(submission.workDir, config.archive.fileExtensions);
    report.beginSubmission(submission.id);
    let recorded = 0;

    for (const file of files) {
      const base = { submissionId: submission.id, relativePath: file.relativePath };
      onEvent({ type: 'file-start', ...base });

      let content: string;
      try {
        content = await readSubmissionFile(file.absolutePath);
      } catch (error) {
        summary.unreadableFiles++;
        onEvent({ type: 'file-error', ...base, error: toError(error) });
        continue;
      }

      const outcome = await grader.grade({ requirements, relativePath: file.relativePath, content });
      if (config.debug && outcome.status !== 'inference-failed') {
        onEvent({ type: 'raw-response', ...base, raw: outcome.raw });
      }

      tally(summary, outcome);
      const row = await report.record(file.relativePath, outcome);
      recorded++;
      onEvent({ type: 'file-graded', ...base, outcome, total: row.total });
    }

    onEvent({ type: 'submission-done', submissionId: submission.id, files: recorded, total: report.total });
  };

  try {
    for (const archivePath of archives) {
      const submissionId = resolveSubmissionId(archivePath, config.archive.idSeparator);
      summary.submissions++;
      onEvent({ type: 'submission-start', submissionId, archivePath });

      try {
        await withSubmission(
          archivePath,
          {
            workRoot: config.workDir,
            idSeparator: config.archive.idSeparator,
            onCleanupError: (dir, error) => onEvent({ type: 'cleanup-error', dir, error: toError(error) }),
          },
          gradeSubmission
        );
      } catch (error) {
        if (!(error instanceof ArchiveExtractionError)) {
          throw error;
        }
        summary.failedSubmissions++;
        onEvent({ type: 'submission-failed', submissionId, archivePath, error });
      }
    }
  } finally {
    await report.close();
  }

  summary.duration = Date.now() - startTime;
  return summary;
}

function tally(summary: RunSummary, outcome: GradeOutcome): void {
  summary.files++;
  switch (outcome.status) {
    case 'graded':
      summary.graded++;
      break;
    case 'parse-fallback':
      summary.parseFallbacks++;
      break;
    case 'inference-failed':
      summary.inferenceFailures++;
      break;
  }
}
