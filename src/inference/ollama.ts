import { Ollama } from 'ollama';
import { DEFAULT_OLLAMA_HOST } from '../config/defaults.js';
import { toError, type InferenceBackend, type InferenceRequest, type InferenceResult } from './types.js';

/** The slice of the `ollama` client this backend talks to. */
export interface OllamaClient {
  generate(request: {
    model: string;
    prompt: string;
    stream: false;
    format?: string;
    options?: { temperature?: number; num_predict?: number };
  }): Promise<{ response: string }>;
  list(): Promise<{ models: Array<{ name: string; model: string }> }>;
}

export interface OllamaBackendOptions {
  host?: string;
  /** 0 leaves requests without a deadline. */
  timeoutMs?: number;
  client?: OllamaClient;
}

/**
 * Ollama accepts no request timeout of its own, so the deadline is an abort
 * signal on each HTTP request.
 */
export function createTimedFetch(timeoutMs: number): typeof fetch {
  return (input, init) => {
    const deadline = AbortSignal.timeout(timeoutMs);
    const signal = init?.signal ? AbortSignal.any([init.signal, deadline]) : deadline;
    return fetch(input, { ...init, signal });
  };
}

export class OllamaBackend implements InferenceBackend {
  readonly provider = 'ollama';
  private client: OllamaClient;

  constructor(options: OllamaBackendOptions = {}) {
    const { host = DEFAULT_OLLAMA_HOST, timeoutMs = 0 } = options;
    this.client = options.client ?? new Ollama({
      host,
      fetch: timeoutMs > 0 ? createTimedFetch(timeoutMs) : fetch,
    });
  }

  async generate(request: InferenceRequest): Promise<InferenceResult> {
    try {
      const response = await this.client.generate({
        model: request.model,
        prompt: request.prompt,
        stream: false,
        ...(request.format ? { format: request.format } : {}),
        options: {
          temperature: request.temperature,
          num_predict: request.maxTokens,
        },
      });
      return { ok: true, text: response.response };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  async listModels(): Promise<string[]> {
    const { models } = await this.client.list();
    return [...new Set(models.flatMap(m => [m.model, m.name]))];
  }
}
