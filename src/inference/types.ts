import type { InferenceProvider } from '../config/types.js';

export interface InferenceRequest {
  prompt: string;
  model: string;
  temperature: number;
  /** Response-format hint; backends without one ignore it. */
  format: string | null;
  maxTokens: number;
}

export type InferenceResult =
  | { ok: true; text: string }
  | { ok: false; error: Error };

export interface InferenceBackend {
  readonly provider: InferenceProvider;
  /** Resolves a failed result instead of rejecting. */
  generate(request: InferenceRequest): Promise<InferenceResult>;
  /** Rejects when the backend cannot be reached. */
  listModels(): Promise<string[]>;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
