import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parse } from 'csv-parse/sync';
import { ReportWriter, formatScore, formatTotal } from './csv-writer.js';

describe('ReportWriter', () => {
  let dir: string;
  let reportPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'grader-report-'));
    reportPath = join(dir, 'grades.csv');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('truncates an existing report and writes the header', async () => {
    writeFileSync(reportPath, 'stale,row\n');
    const writer = await ReportWriter.open(reportPath);
    await writer.close();

    expect(readFileSync(reportPath, 'utf-8')).toBe('ASURITE,File,Score,Feedback,Total\n');
  });

  it('keeps a running total per submission', async () => {
    const writer = await ReportWriter.open(reportPath);
    writer.beginSubmission('abc123');
    await writer.record('main.py', { score: 7.5, feedback: 'Good structure' });
    await writer.record('config.yaml', { score: 6, feedback: 'Missing keys' });
    writer.beginSubmission('xyz789');
    await writer.record('main.py', { score: 0, feedback: 'Analysis failed' });
    await writer.close();

    expect(readFileSync(reportPath, 'utf-8')).toBe([
      'ASURITE,File,Score,Feedback,Total',
      'abc123,main.py,7.5/10,Good structure,7.5/40',
      'abc123,config.yaml,6.0/10,Missing keys,13.5/40',
      'xyz789,main.py,0.0/10,Analysis failed,0.0/40',
      '',
    ].join('\n'));
    expect(writer.rows).toBe(3);
  });

  it('has every row on disk before the writer is closed', async () => {
    const writer = await ReportWriter.open(reportPath);
    writer.beginSubmission('abc123');
    await writer.record('main.py', { score: 5, feedback: 'ok' });

    expect(readFileSync(reportPath, 'utf-8')).toBe(
      'ASURITE,File,Score,Feedback,Total\nabc123,main.py,5.0/10,ok,5.0/40\n'
    );
    await writer.close();
  });

  it('quotes feedback containing commas, quotes and newlines', async () => {
    const writer = await ReportWriter.open(reportPath);
    writer.beginSubmission('abc123');
    await writer.record('src/app.py', { score: 4, feedback: 'Uses "eval", unsafe\nsecond line' });
    await writer.close();

    const records: string[][] = parse(readFileSync(reportPath, 'utf-8'));
    expect(records[1]).toEqual(['abc123', 'src/app.py', '4.0/10', 'Uses "eval", unsafe\nsecond line', '4.0/40']);
  });

  it('uses the configured denominator', async () => {
    const writer = await ReportWriter.open(reportPath, { totalDenominator: 30 });
    writer.beginSubmission('abc123');
    const row = await writer.record('main.py', { score: 9.25, feedback: 'fine' });
    await writer.close();

    expect(row.total).toBe(9.25);
    expect(readFileSync(reportPath, 'utf-8').split('\n')[1]).toBe('abc123,main.py,9.2/10,fine,9.2/30');
  });

  it('refuses a grade outside of a submission', async () => {
    const writer = await ReportWriter.open(reportPath);
    await expect(writer.record('main.py', { score: 1, feedback: 'x' })).rejects.toThrow(
      'beginSubmission must be called before recording a grade'
    );
    await writer.close();
  });
});

describe('formatting', () => {
  it('formats scores and totals with one decimal', () => {
    expect(formatScore(10)).toBe('10.0/10');
    expect(formatScore(3.14)).toBe('3.1/10');
    expect(formatTotal(27.5, 40)).toBe('27.5/40');
  });

  it('rounds exact halves to the even tenth', () => {
    expect(formatScore(9.25)).toBe('9.2/10');
    expect(formatScore(9.75)).toBe('9.8/10');
    expect(formatScore(0.05)).toBe('0.1/10');
    expect(formatTotal(12.25, 40)).toBe('12.2/40');
    expect(formatTotal(12.35, 40)).toBe('12.3/40');
  });
});
