import { open, type FileHandle } from 'fs/promises';
import { stringify } from 'csv-stringify/sync';

export const REPORT_HEADER = ['ASURITE', 'File', 'Score', 'Feedback', 'Total'] as const;

export const DEFAULT_TOTAL_DENOMINATOR = 40;

export interface ReportWriterOptions {
  /** Fixed "/N" shown after the running total; not derived from the file count. */
  totalDenominator?: number;
}

export interface ReportRow {
  submissionId: string;
  relativePath: string;
  score: number;
  feedback: string;
  total: number;
}

/**
 * One decimal place, exact halves rounded to even (9.25 -> "9.2").
 * `toFixed` alone rounds those up.
 */
function toOneDecimal(value: number): string {
  // A double sits exactly halfway between tenths only when 4x is odd.
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return (even / 10).toFixed(1);
  }
  return value.toFixed(1);
}

export function formatScore(score: number): string {
  return `${toOneDecimal(score)}/10`;
}

export function formatTotal(total: number, denominator: number): string {
  return `${toOneDecimal(total)}/${denominator}`;
}

/**
 * Writes the grade report one row at a time. Each row goes straight to the
 * file descriptor, so a crash loses at most the row being written.
 */
export class ReportWriter {
  private submissionId: string | null = null;
  private runningTotal = 0;
  private rowCount = 0;

  private constructor(
    private handle: FileHandle,
    readonly filePath: string,
    private denominator: number
  ) {}

  static async open(filePath: string, options: ReportWriterOptions = {}): Promise<ReportWriter> {
    const handle = await open(filePath, 'w');
    const writer = new ReportWriter(handle, filePath, options.totalDenominator ?? DEFAULT_TOTAL_DENOMINATOR);
    await writer.writeLine([...REPORT_HEADER]);
    return writer;
  }

  get rows(): number {
    return this.rowCount;
  }

  get total(): number {
    return this.runningTotal;
  }

  beginSubmission(submissionId: string): void {
    this.submissionId = submissionId;
    this.runningTotal = 0;
  }

  async record(relativePath: string, grade: { score: number; feedback: string }): Promise<ReportRow> {
    if (this.submissionId === null) {
      throw new Error('beginSubmission must be called before recording a grade');
    }

    this.runningTotal += grade.score;
    const row: ReportRow = {
      submissionId: this.submissionId,
      relativePath,
      score: grade.score,
      feedback: grade.feedback,
      total: this.runningTotal,
    };

    await this.writeLine([
      row.submissionId,
      row.relativePath,
      formatScore(row.score),
      row.feedback,
      formatTotal(row.total, this.denominator),
    ]);
    this.rowCount++;
    return row;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }

  private async writeLine(fields: string[]): Promise<void> {
    await this.handle.write(stringify([fields]));
  }
}
