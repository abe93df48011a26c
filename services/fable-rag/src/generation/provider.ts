import type { ProviderKind } from '../config';

export interface GenerateOptions {
  timeoutMs: number;
  /** Aborted when the caller no longer wants the answer. */
  signal?: AbortSignal;
}

/**
 * A text-generation backend. Implementations fail with ProviderTimeout,
 * ProviderUnavailable, ProviderOutputError or GenerationCancelled.
 */
export interface GenerationProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  generate(prompt: string, model: string, options: GenerateOptions): Promise<string>;
}
