import type { InferenceBackend } from '../inference/types.js';
import { toError } from '../inference/types.js';

export type InferenceCheck =
  | { status: 'ready'; model: string }
  | { status: 'missing-model'; model: string; available: string[] }
  | { status: 'unreachable'; error: Error };

/**
 * `codellama` matches an installed `codellama:latest`; a tagged name must
 * match exactly.
 */
export function isModelAvailable(model: string, available: string[]): boolean {
  if (available.includes(model)) {
    return true;
  }
  return !model.includes(':') && available.includes(`${model}:latest`);
}

export async function checkInference(backend: InferenceBackend, model: string): Promise<InferenceCheck> {
  let available: string[];
  try {
    available = await backend.listModels();
  } catch (error) {
    return { status: 'unreachable', error: toError(error) };
  }

  return isModelAvailable(model, available)
    ? { status: 'ready', model }
    : { status: 'missing-model', model, available };
}
