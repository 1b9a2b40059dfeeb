import { access, constants } from 'fs/promises';
import { readPdfPages } from './pdf.js';

export const DEFAULT_REQUIREMENTS_BUDGET = 2500;

export type PageSource = (documentPath: string) => Promise<string[]>;

export interface LoadRequirementsOptions {
  maxChars?: number;
  readPages?: PageSource;
}

export class RequirementsNotFoundError extends Error {
  constructor(readonly documentPath: string, options?: { cause?: unknown }) {
    super(`Requirement PDF not found at ${documentPath}`, options);
    this.name = 'RequirementsNotFoundError';
  }
}

export async function loadRequirements(
  documentPath: string,
  options: LoadRequirementsOptions = {}
): Promise<string> {
  const { maxChars = DEFAULT_REQUIREMENTS_BUDGET, readPages = readPdfPages } = options;

  try {
    await access(documentPath, constants.R_OK);
  } catch (cause) {
    throw new RequirementsNotFoundError(documentPath, { cause });
  }

  const pages = await readPages(documentPath);
  return joinPagesWithinBudget(pages, maxChars);
}

/**
 * Join pages with newlines, keeping whole pages while they fit. The page that
 * would cross the budget is cut to the remaining room and ends the text, so
 * the result (separators included) is never longer than `maxChars`.
 */
export function joinPagesWithinBudget(pages: string[], maxChars: number): string {
  const kept: string[] = [];
  let used = 0;

  for (const page of pages) {
    const separator = kept.length > 0 ? 1 : 0;
    const room = maxChars - used - separator;
    if (room <= 0) {
      break;
    }
    if (page.length <= room) {
      kept.push(page);
      used += separator + page.length;
    } else {
      kept.push(page.slice(0, room));
      break;
    }
  }

  return kept.join('\n');
}
