import { readFileSync, existsSync } from 'fs';
import yaml from 'js-yaml';
import { defaultConfig, DEFAULT_CONFIG_FILE } from './defaults.js';
import type { GraderConfig, GraderConfigOverrides, InferenceProvider } from './types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const PROVIDERS: readonly InferenceProvider[] = ['ollama', 'anthropic'];

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: GraderConfigOverrides;
}

export function loadConfig(options: LoadConfigOptions = {}): GraderConfig {
  const { configPath, env = process.env, overrides = {} } = options;

  let fileOverrides: GraderConfigOverrides = {};
  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileOverrides = readConfigFile(configPath);
  } else if (existsSync(DEFAULT_CONFIG_FILE)) {
    fileOverrides = readConfigFile(DEFAULT_CONFIG_FILE);
  }

  const envOverrides: GraderConfigOverrides = env.OLLAMA_HOST
    ? { inference: { host: env.OLLAMA_HOST } }
    : {};

  return [fileOverrides, envOverrides, overrides].reduce<GraderConfig>(
    (config, layer) => mergeConfig(config, layer),
    defaultConfig()
  );
}

export function readConfigFile(filePath: string): GraderConfigOverrides {
  const content = readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (raw === undefined || raw === null) {
    return {};
  }
  return parseConfig(raw);
}

export function parseConfig(raw: unknown): GraderConfigOverrides {
  const root = expectRecord(raw, 'config');
  const archive = optionalRecord(root, 'archive', 'archive');
  const requirements = optionalRecord(root, 'requirements', 'requirements');
  const prompt = optionalRecord(root, 'prompt', 'prompt');
  const inference = optionalRecord(root, 'inference', 'inference');
  const report = optionalRecord(root, 'report', 'report');

  return {
    submissionsDir: readString(root, 'submissionsDir', 'submissionsDir'),
    rubricPath: readString(root, 'rubricPath', 'rubricPath'),
    outputPath: readString(root, 'outputPath', 'outputPath'),
    workDir: readString(root, 'workDir', 'workDir'),
    debug: readBoolean(root, 'debug', 'debug'),
    archive: archive && {
      extension: readString(archive, 'extension', 'archive.extension'),
      idSeparator: readString(archive, 'idSeparator', 'archive.idSeparator'),
      fileExtensions: readStringList(archive, 'fileExtensions', 'archive.fileExtensions'),
    },
    requirements: requirements && {
      maxChars: readPositiveInt(requirements, 'maxChars', 'requirements.maxChars'),
    },
    prompt: prompt && {
      maxContentChars: readPositiveInt(prompt, 'maxContentChars', 'prompt.maxContentChars'),
    },
    inference: inference && {
      provider: readProvider(inference, 'inference.provider'),
      host: readString(inference, 'host', 'inference.host'),
      model: readString(inference, 'model', 'inference.model'),
      temperature: readNumber(inference, 'temperature', 'inference.temperature'),
      timeoutMs: readNonNegativeInt(inference, 'timeoutMs', 'inference.timeoutMs'),
      format: readNullableString(inference, 'format', 'inference.format'),
      maxTokens: readPositiveInt(inference, 'maxTokens', 'inference.maxTokens'),
    },
    report: report && {
      totalDenominator: readPositiveInt(report, 'totalDenominator', 'report.totalDenominator'),
    },
  };
}

export function mergeConfig(base: GraderConfig, overrides: GraderConfigOverrides): GraderConfig {
  const { archive, requirements, prompt, inference, report } = overrides;
  return {
    submissionsDir: overrides.submissionsDir ?? base.submissionsDir,
    rubricPath: overrides.rubricPath ?? base.rubricPath,
    outputPath: overrides.outputPath ?? base.outputPath,
    workDir: overrides.workDir ?? base.workDir,
    debug: overrides.debug ?? base.debug,
    archive: {
      extension: archive?.extension ?? base.archive.extension,
      idSeparator: archive?.idSeparator ?? base.archive.idSeparator,
      fileExtensions: archive?.fileExtensions ?? base.archive.fileExtensions,
    },
    requirements: {
      maxChars: requirements?.maxChars ?? base.requirements.maxChars,
    },
    prompt: {
      maxContentChars: prompt?.maxContentChars ?? base.prompt.maxContentChars,
    },
    inference: {
      provider: inference?.provider ?? base.inference.provider,
      host: inference?.host ?? base.inference.host,
      model: inference?.model ?? base.inference.model,
      temperature: inference?.temperature ?? base.inference.temperature,
      timeoutMs: inference?.timeoutMs ?? base.inference.timeoutMs,
      // null is a real value here: it turns the format hint off
      format: inference?.format !== undefined ? inference.format : base.inference.format,
      maxTokens: inference?.maxTokens ?? base.inference.maxTokens,
    },
    report: {
      totalDenominator: report?.totalDenominator ?? base.report.totalDenominator,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(`${path} must be a mapping`);
  }
  return value;
}

function optionalRecord(obj: Record<string, unknown>, key: string, path: string): Record<string, unknown> | undefined {
  const value = obj[key];
  return value === undefined || value === null ? undefined : expectRecord(value, path);
}

function readString(obj: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${path} must be a non-empty string`);
  }
  return value;
}

function readNullableString(obj: Record<string, unknown>, key: string, path: string): string | null | undefined {
  if (key in obj && obj[key] === null) {
    return null;
  }
  return readString(obj, key, path);
}

function readStringList(obj: Record<string, unknown>, key: string, path: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${path} must be a non-empty list of strings`);
  }
  return value.map((item, i) => {
    if (typeof item !== 'string' || item.length === 0) {
      throw new ConfigError(`${path}[${i}] must be a non-empty string`);
    }
    return item;
  });
}

function readBoolean(obj: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path} must be true or false`);
  }
  return value;
}

function readNumber(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${path} must be a number`);
  }
  return value;
}

function readNonNegativeInt(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = readNumber(obj, key, path);
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ConfigError(`${path} must be a non-negative integer`);
  }
  return value;
}

function readPositiveInt(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = readNumber(obj, key, path);
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new ConfigError(`${path} must be a positive integer`);
  }
  return value;
}

function readProvider(obj: Record<string, unknown>, path: string): InferenceProvider | undefined {
  const value = readString(obj, 'provider', path);
  if (value === undefined) return undefined;
  const provider = PROVIDERS.find(p => p === value);
  if (!provider) {
    throw new ConfigError(`${path} must be one of: ${PROVIDERS.join(', ')}`);
  }
  return provider;
}
