import type { InferenceConfig } from '../config/types.js';
import { AnthropicBackend } from './anthropic.js';
import { OllamaBackend } from './ollama.js';
import type { InferenceBackend } from './types.js';

export type { InferenceBackend, InferenceRequest, InferenceResult } from './types.js';
export { toError } from './types.js';
export { OllamaBackend, createTimedFetch } from './ollama.js';
export type { OllamaClient, OllamaBackendOptions } from './ollama.js';
export { AnthropicBackend } from './anthropic.js';
export type { AnthropicClient, AnthropicBackendOptions } from './anthropic.js';

export function createBackend(config: InferenceConfig): InferenceBackend {
  switch (config.provider) {
    case 'ollama':
      return new OllamaBackend({ host: config.host, timeoutMs: config.timeoutMs });
    case 'anthropic':
      return new AnthropicBackend({ timeoutMs: config.timeoutMs });
  }
}

