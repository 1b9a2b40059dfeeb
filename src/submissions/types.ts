export interface Submission {
  /** Identifier parsed from the archive name (the ASURITE column). */
  id: string;
  archivePath: string;
  /** Fresh extraction directory, removed once the submission is done. */
  workDir: string;
  /** Archive entries that were not written, e.g. paths escaping workDir. */
  skippedEntries: string[];
}

export interface SubmissionFile {
  /** Path relative to the submission root, always with `/` separators. */
  relativePath: string;
  absolutePath: string;
}

export interface UnpackOptions {
  /** Directory that holds the per-submission working directories. */
  workRoot: string;
  idSeparator: string;
  onCleanupError?: (dir: string, error: unknown) => void;
}
