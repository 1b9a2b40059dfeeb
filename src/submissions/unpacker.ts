import { glob } from 'glob';
import JSZip from 'jszip';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Submission, SubmissionFile, UnpackOptions } from './types.js';

export class ArchiveExtractionError extends Error {
  constructor(readonly archivePath: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Could not extract ${archivePath}${reason}`, options);
    this.name = 'ArchiveExtractionError';
  }
}

export async function listArchives(submissionsDir: string, extension = '.zip'): Promise<string[]> {
  try {
    const stats = await fs.stat(submissionsDir);
    if (!stats.isDirectory()) {
      return [];
    }
  } catch {
    return [];
  }

  const matches = await glob(`*${extension}`, {
    cwd: submissionsDir,
    nodir: true,
  });

  return matches.sort().map(name => path.join(submissionsDir, name));
}

/**
 * `abc123-final.zip` resolves to `abc123`; a name without the separator, or
 * one starting with it, keeps the whole stem.
 */
export function resolveSubmissionId(archivePath: string, separator = '-'): string {
  const stem = path.basename(archivePath, path.extname(archivePath));
  const index = stem.indexOf(separator);
  return index > 0 ? stem.slice(0, index) : stem;
}

/**
 * Writes every entry of the archive below `destination`. Returns the names of
 * entries that were skipped because they would land outside of it.
 */
export async function extractArchive(archivePath: string, destination: string): Promise<string[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(await fs.readFile(archivePath));
  } catch (cause) {
    throw new ArchiveExtractionError(archivePath, { cause });
  }

  const root = path.resolve(destination);
  const skipped: string[] = [];
  const entries: JSZip.JSZipObject[] = [];
  zip.forEach((_relativePath, entry) => {
    entries.push(entry);
  });

  for (const entry of entries) {
    const target = path.resolve(root, entry.name);
    if (target !== root && !target.startsWith(root + path.sep)) {
      skipped.push(entry.name);
      continue;
    }

    try {
      if (entry.dir) {
        await fs.mkdir(target, { recursive: true });
        continue;
      }
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, await entry.async('nodebuffer'));
    } catch (cause) {
      throw new ArchiveExtractionError(archivePath, { cause });
    }
  }

  return skipped;
}

export async function listEligibleFiles(root: string, extensions: string[]): Promise<SubmissionFile[]> {
  const matches = await glob('**/*', {
    cwd: root,
    nodir: true,
    dot: true,
    posix: true,
  });

  return matches
    .filter(relativePath => extensions.includes(path.posix.extname(relativePath)))
    .sort()
    .map(relativePath => ({
      relativePath,
      absolutePath: path.join(root, relativePath),
    }));
}

const ENCODED_REPLACEMENT_CHAR = Buffer.from('\uFFFD', 'utf8');

/**
 * Read a submitted file as UTF-8, dropping byte sequences that do not decode.
 * U+FFFD characters actually present in the file are kept.
 */
export async function readSubmissionFile(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  const parts: string[] = [];
  let start = 0;
  let at = buffer.indexOf(ENCODED_REPLACEMENT_CHAR);
  while (at !== -1) {
    parts.push(decodeDroppingInvalid(buffer.subarray(start, at)));
    start = at + ENCODED_REPLACEMENT_CHAR.length;
    at = buffer.indexOf(ENCODED_REPLACEMENT_CHAR, start);
  }
  parts.push(decodeDroppingInvalid(buffer.subarray(start)));
  return parts.join('\uFFFD');
}

// Between real U+FFFD characters every replacement comes from a bad sequence.
function decodeDroppingInvalid(bytes: Buffer): string {
  return bytes.toString('utf8').replace(/\uFFFD/g, '');
}

export async function removeWorkDir(
  dir: string,
  onError?: (dir: string, error: unknown) => void
): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch (error) {
    onError?.(dir, error);
  }
}

/**
 * Unpack one archive into a fresh directory, hand it to `fn`, then remove the
 * directory whatever `fn` or the extraction did.
 */
export async function withSubmission<T>(
  archivePath: string,
  options: UnpackOptions,
  fn: (submission: Submission) => Promise<T>
): Promise<T> {
  const id = resolveSubmissionId(archivePath, options.idSeparator);
  await fs.mkdir(options.workRoot, { recursive: true });
  const workDir = await fs.mkdtemp(path.join(options.workRoot, `${safeDirName(id)}-`));

  try {
    const skippedEntries = await extractArchive(archivePath, workDir);
    return await fn({ id, archivePath, workDir, skippedEntries });
  } finally {
    await removeWorkDir(workDir, options.onCleanupError);
  }
}

function safeDirName(id: string): string {
  return id.replace(/[^A-Za-z0-9._-]/g, '_') || 'submission';
}
