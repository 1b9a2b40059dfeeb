import type { GradeOutcome } from '../graders/types.js';

export type PipelineEvent =
  | { type: 'run-start'; archives: string[] }
  | { type: 'submission-start'; submissionId: string; archivePath: string }
  | { type: 'entries-skipped'; submissionId: string; entries: string[] }
  | { type: 'file-start'; submissionId: string; relativePath: string }
  | { type: 'raw-response'; submissionId: string; relativePath: string; raw: string }
  | { type: 'file-graded'; submissionId: string; relativePath: string; outcome: GradeOutcome; total: number }
  | { type: 'file-error'; submissionId: string; relativePath: string; error: Error }
  | { type: 'submission-done'; submissionId: string; files: number; total: number }
  | { type: 'submission-failed'; submissionId: string; archivePath: string; error: Error }
  | { type: 'cleanup-error'; dir: string; error: Error };

export type PipelineEventHandler = (event: PipelineEvent) => void;

export interface RunSummary {
  submissions: number;
  failedSubmissions: number;
  files: number;
  graded: number;
  parseFallbacks: number;
  inferenceFailures: number;
  unreadableFiles: number;
  duration: number;
}
