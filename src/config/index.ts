export type {
  GraderConfig,
  GraderConfigOverrides,
  ArchiveConfig,
  RequirementsConfig,
  PromptConfig,
  InferenceConfig,
  InferenceProvider,
  ReportConfig,
} from './types.js';

export { defaultConfig, DEFAULT_CONFIG_FILE, DEFAULT_OLLAMA_HOST } from './defaults.js';
export { loadConfig, readConfigFile, parseConfig, mergeConfig, ConfigError } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
