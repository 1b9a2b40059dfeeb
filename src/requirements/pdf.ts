import { readFile } from 'fs/promises';
import { createRequire } from 'module';
import { dirname, join, sep } from 'path';
import { pathToFileURL } from 'url';

// cMaps and standard font data ship inside the pdfjs-dist package.
function pdfjsAssetUrl(subdir: string): string {
  const packageDir = dirname(createRequire(import.meta.url).resolve('pdfjs-dist/package.json'));
  return pathToFileURL(join(packageDir, subdir) + sep).toString();
}

/**
 * Extract the plain text of every page of a PDF, in page order.
 */
export async function readPdfPages(pdfPath: string): Promise<string[]> {
  // The legacy build is the one that runs under Node; loaded on first use.
  const { getDocument, VerbosityLevel } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const data = new Uint8Array(await readFile(pdfPath));
  const loadingTask = getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: false,
    cMapUrl: pdfjsAssetUrl('cmaps'),
    cMapPacked: true,
    standardFontDataUrl: pdfjsAssetUrl('standard_fonts'),
    verbosity: VerbosityLevel.ERRORS,
  });

  const doc = await loadingTask.promise;
  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if ('str' in item) {
          text += item.str;
          if (item.hasEOL) {
            text += '\n';
          }
        }
      }
      pages.push(text);
      page.cleanup();
    }
    return pages;
  } finally {
    await loadingTask.destroy();
  }
}
