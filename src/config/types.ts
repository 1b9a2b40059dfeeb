export type InferenceProvider = 'ollama' | 'anthropic';

export interface GraderConfig {
  submissionsDir: string;
  rubricPath: string;
  outputPath: string;
  workDir: string;
  debug: boolean;
  archive: ArchiveConfig;
  requirements: RequirementsConfig;
  prompt: PromptConfig;
  inference: InferenceConfig;
  report: ReportConfig;
}

export interface ArchiveConfig {
  extension: string;
  idSeparator: string;
  fileExtensions: string[];
}

export interface RequirementsConfig {
  maxChars: number;
}

export interface PromptConfig {
  maxContentChars: number;
}

export interface InferenceConfig {
  provider: InferenceProvider;
  host: string;
  model: string;
  temperature: number;
  /** 0 disables the request deadline. */
  timeoutMs: number;
  /** Response-format hint; `null` sends none. */
  format: string | null;
  maxTokens: number;
}

export interface ReportConfig {
  totalDenominator: number;
}

export interface GraderConfigOverrides {
  submissionsDir?: string;
  rubricPath?: string;
  outputPath?: string;
  workDir?: string;
  debug?: boolean;
  archive?: Partial<ArchiveConfig>;
  requirements?: Partial<RequirementsConfig>;
  prompt?: Partial<PromptConfig>;
  inference?: Partial<InferenceConfig>;
  report?: Partial<ReportConfig>;
}
