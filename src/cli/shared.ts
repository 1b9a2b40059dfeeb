import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../config/loader.js';
import type { GraderConfig, GraderConfigOverrides, InferenceProvider } from '../config/types.js';
import type { InferenceCheck } from '../pipeline/precheck.js';
import { style, formatError } from './theme.js';

export interface ConfigCliOptions {
  config?: string;
  rubric?: string;
  output?: string;
  model?: string;
  provider?: InferenceProvider;
  host?: string;
  workDir?: string;
  total?: number;
  debug?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseProvider(value: string): InferenceProvider {
  if (value === 'ollama' || value === 'anthropic') {
    return value;
  }
  throw new InvalidArgumentError('Must be "ollama" or "anthropic".');
}

export function resolveConfig(options: ConfigCliOptions, submissionsDir?: string): GraderConfig {
  const overrides: GraderConfigOverrides = {
    submissionsDir,
    rubricPath: options.rubric,
    outputPath: options.output,
    workDir: options.workDir,
    debug: options.debug,
    inference: {
      provider: options.provider,
      model: options.model,
      host: options.host,
    },
    report: {
      totalDenominator: options.total,
    },
  };
  return loadConfig({ configPath: options.config, overrides });
}

/**
 * Operator guidance for a failed startup check; `null` when ready.
 */
export function describeInferenceCheck(check: InferenceCheck, config: GraderConfig): string | null {
  const { provider, model, host } = config.inference;

  if (check.status === 'ready') {
    return null;
  }

  if (check.status === 'missing-model') {
    const installed = check.available.length > 0 ? check.available.join(', ') : 'none';
    const suggestions = provider === 'ollama'
      ? [
          `Install with: ${style.command(`ollama pull ${model}`)}`,
          `Running Ollama in Docker: ${style.command(`docker exec ollama ollama pull ${model}`)}`,
          `Installed models: ${installed}`,
        ]
      : [
          'Check the model id against the models enabled for your API key',
          `Available models: ${installed}`,
        ];
    return formatError(`Model '${model}' not found.`, suggestions);
  }

  const suggestions = provider === 'ollama'
    ? [
        `Make sure Ollama is listening on ${style.path(host)} (or set OLLAMA_HOST)`,
        `Start it in Docker: ${style.command('docker run -d -p 11434:11434 --name ollama ollama/ollama')}`,
        `Pull the model: ${style.command(`docker exec ollama ollama pull ${model}`)}`,
        `Verify it is working: ${style.command('docker exec ollama ollama list')}`,
        'Run this command again',
      ]
    : [
        'Ensure ANTHROPIC_API_KEY is set',
        'Check your network connection',
      ];
  return formatError(`Could not connect to ${provider}: ${check.error.message}`, suggestions);
}
