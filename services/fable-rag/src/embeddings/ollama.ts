// src/embeddings/ollama.ts
import { z } from 'zod';
import { EmbeddingRequestError, safeErrorBody, type EmbeddingProvider, type FetchLike } from './provider';

const embedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

export interface OllamaEmbeddingOptions {
  host: string;
  model: string;
  fetch?: FetchLike;
}

/**
 * Embeddings from a local Ollama daemon (`POST /api/embed`).
 * The daemon keeps the model resident, so repeated calls do not reload it.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;
  dim = 0;
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OllamaEmbeddingOptions) {
    this.model = options.model;
    this.endpoint = `${options.host.replace(/\/+$/, '')}/api/embed`;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: texts }),
      });
    } catch (err) {
      throw new EmbeddingRequestError(`Ollama embed request to ${this.endpoint} failed: ${String(err)}`, { cause: err });
    }

    if (!res.ok) {
      const detail = await safeErrorBody(res);
      throw new EmbeddingRequestError(`Ollama embed error: ${res.status} ${res.statusText}${detail}`);
    }

    const parsed = embedResponseSchema.safeParse(await res.json());
    if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
      throw new EmbeddingRequestError('Ollama embed response malformed or incomplete');
    }

    const vectors = parsed.data.embeddings.map((row) => Float32Array.from(row));

    if (!this.dim && vectors[0]) {
      this.dim = vectors[0].length;
    }
    return vectors;
  }
}
