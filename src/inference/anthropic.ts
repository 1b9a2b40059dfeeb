import Anthropic from '@anthropic-ai/sdk';
import { toError, type InferenceBackend, type InferenceRequest, type InferenceResult } from './types.js';

/** The slice of the Anthropic SDK client this backend talks to. */
export interface AnthropicClient {
  messages: {
    create(body: {
      model: string;
      max_tokens: number;
      temperature?: number;
      messages: Array<{ role: 'user'; content: string }>;
    }): PromiseLike<{ content: Array<{ type: string; text?: string }> }>;
  };
  models: {
    list(): AsyncIterable<{ id: string }>;
  };
}

export interface AnthropicBackendOptions {
  /** 0 falls back to the SDK default. */
  timeoutMs?: number;
  client?: AnthropicClient;
}

export class AnthropicBackend implements InferenceBackend {
  readonly provider = 'anthropic';
  private client: AnthropicClient;

  constructor(options: AnthropicBackendOptions = {}) {
    const { timeoutMs = 0 } = options;
    this.client = options.client ?? new Anthropic({
      maxRetries: 0,
      ...(timeoutMs > 0 ? { timeout: timeoutMs } : {}),
    });
  }

  async generate(request: InferenceRequest): Promise<InferenceResult> {
    try {
      const response = await this.client.messages.create({
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [{ role: 'user', content: request.prompt }],
      });

      const text = response.content
        .map(block => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
        .join('');
      return { ok: true, text };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  async listModels(): Promise<string[]> {
    const ids: string[] = [];
    for await (const model of this.client.models.list()) {
      ids.push(model.id);
    }
    return ids;
  }
}
