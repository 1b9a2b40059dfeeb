export type { Submission, SubmissionFile, UnpackOptions } from './types.js';
export {
  listArchives,
  resolveSubmissionId,
  extractArchive,
  listEligibleFiles,
  readSubmissionFile,
  removeWorkDir,
  withSubmission,
  ArchiveExtractionError,
} from './unpacker.js';
