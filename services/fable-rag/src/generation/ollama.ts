// src/generation/ollama.ts
import { z } from 'zod';
import { GenerationCancelled, ProviderOutputError, ProviderTimeout, ProviderUnavailable, errorMessage } from '../errors';
import type { FetchLike } from '../embeddings/provider';
import { safeErrorBody } from '../embeddings/provider';
import type { Logger } from '../logger';
import type { GenerateOptions, GenerationProvider } from './provider';

const generateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

// reasoning models prefix their answer with a think block
const THINK_BLOCK = /^\s*<think>[\s\S]*?<\/think>\s*/;

export interface OllamaGenerationOptions {
  name: string;
  host: string;
  logger: Logger;
  fetch?: FetchLike;
}

/** Non-streaming completions from an Ollama daemon (`POST /api/generate`). */
export class OllamaGenerationProvider implements GenerationProvider {
  readonly kind = 'ollama';
  readonly name: string;
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: OllamaGenerationOptions) {
    this.name = options.name;
    this.endpoint = `${options.host.replace(/\/+$/, '')}/api/generate`;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.logger = options.logger;
  }

  async generate(prompt: string, model: string, { timeoutMs, signal }: GenerateOptions): Promise<string> {
    if (signal?.aborted) throw new GenerationCancelled();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const started = Date.now();
    try {
      let res: Response;
      try {
        res = await this.fetchImpl(this.endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ model, prompt, stream: false }),
          signal: controller.signal,
        });
      } catch (err) {
        throw this.requestFailure(err, timedOut, timeoutMs, signal);
      }
      if (!res.ok) {
        const detail = await safeErrorBody(res);
        throw new ProviderUnavailable(this.name, `HTTP ${res.status} ${res.statusText}${detail}`);
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        if (err instanceof SyntaxError) {
          throw new ProviderOutputError(this.name, `response body is not JSON: ${err.message}`);
        }
        throw this.requestFailure(err, timedOut, timeoutMs, signal);
      }

      const parsed = generateResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderOutputError(this.name, 'response body has no `response` field');
      }
      const answer = parsed.data.response.replace(THINK_BLOCK, '').trim();
      if (!answer) {
        throw new ProviderOutputError(this.name, 'empty response');
      }
      this.logger.debug({ provider: this.name, model, ms: Date.now() - started, chars: answer.length }, 'Generation complete');
      return answer;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private requestFailure(err: unknown, timedOut: boolean, timeoutMs: number, signal?: AbortSignal) {
    if (timedOut) return new ProviderTimeout(this.name, timeoutMs);
    if (signal?.aborted) return new GenerationCancelled();
    return new ProviderUnavailable(this.name, `request to ${this.endpoint} failed: ${errorMessage(err)}`, { cause: err });
  }
}
