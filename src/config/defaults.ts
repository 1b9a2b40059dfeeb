import { tmpdir } from 'os';
import type { GraderConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'grader.config.yaml';

export const DEFAULT_OLLAMA_HOST = 'http://127.0.0.1:11434';

export function defaultConfig(): GraderConfig {
  return {
    submissionsDir: 'submissions',
    rubricPath: 'rubric.pdf',
    outputPath: 'grades.csv',
    workDir: tmpdir(),
    debug: false,
    archive: {
      extension: '.zip',
      idSeparator: '-',
      fileExtensions: ['.py', '.yaml', '.yml'],
    },
    requirements: {
      maxChars: 2500,
    },
    prompt: {
      maxContentChars: 2500,
    },
    inference: {
      provider: 'ollama',
      host: DEFAULT_OLLAMA_HOST,
      model: 'codellama:7b',
      temperature: 0.2,
      timeoutMs: 45_000,
      format: 'json',
      maxTokens: 256,
    },
    report: {
      totalDenominator: 40,
    },
  };
}
