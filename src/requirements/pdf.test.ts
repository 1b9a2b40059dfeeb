import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { readPdfPages } from './pdf.js';
import { loadRequirements } from './loader.js';

// One Helvetica text line per page, with a correct xref table.
function buildPdf(pageTexts: string[]): Buffer {
  const fontId = 3 + pageTexts.length * 2;
  const kids = pageTexts.map((_, i) => `${3 + i * 2} 0 R`).join(' ');
  const objects: string[] = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${kids}] /Count ${pageTexts.length} >>`,
  ];
  for (const [i, text] of pageTexts.entries()) {
    const stream = `BT /F1 12 Tf 72 720 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
        `/Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${4 + i * 2} 0 R >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`
    );
  }
  objects.push('<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>');

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });
  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}

describe('readPdfPages', () => {
  let dir: string;
  let rubricPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'grader-pdf-'));
    rubricPath = join(dir, 'rubric.pdf');
    writeFileSync(rubricPath, buildPdf(['Page one rubric', 'Page two rubric']));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns the text of each page in order', async () => {
    expect(await readPdfPages(rubricPath)).toEqual(['Page one rubric', 'Page two rubric']);
  });

  it('backs loadRequirements when no page reader is given', async () => {
    expect(await loadRequirements(rubricPath)).toBe('Page one rubric\nPage two rubric');
    expect(await loadRequirements(rubricPath, { maxChars: 20 })).toBe('Page one rubric\nPage');
  });
});
