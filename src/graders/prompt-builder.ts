import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = join(__dirname, '../../prompts');

export const DEFAULT_CONTENT_BUDGET = 2500;

const promptCache = new Map<string, string>();

function loadPrompt(name: string): string {
  const cached = promptCache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const content = readFileSync(join(PROMPTS_DIR, `${name}.md`), 'utf-8').trimEnd();
  promptCache.set(name, content);
  return content;
}

export interface GraderPromptInput {
  requirements: string;
  relativePath: string;
  content: string;
}

/**
 * Only the first `maxContentChars` characters of the file reach the model.
 * Values are inserted verbatim; a `|` inside them is not escaped.
 */
export function buildGraderPrompt(
  input: GraderPromptInput,
  maxContentChars: number = DEFAULT_CONTENT_BUDGET
): string {
  return fillTemplate(loadPrompt('grader-user'), {
    REQUIREMENTS: input.requirements,
    FILE_PATH: input.relativePath,
    CONTENT: input.content.slice(0, maxContentChars),
  });
}

// Single pass, so placeholder-like text inside a value stays as written.
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder: string, key: string) =>
    Object.hasOwn(values, key) ? values[key] : placeholder
  );
}
