// src/embeddings/openai.ts
import { z } from 'zod';
import { EmbeddingRequestError, safeErrorBody, type EmbeddingProvider, type FetchLike } from './provider';

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  endpoint?: string;
  fetch?: FetchLike;
}

export class OpenAIProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  dim: number;
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAIProviderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.dim = MODEL_DIMENSIONS[this.model] ?? 0;
    this.endpoint = options.endpoint ?? 'https://api.openai.com/v1/embeddings';
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    if (!Array.isArray(texts)) throw new TypeError('texts must be an array of strings');
    if (texts.length === 0) return [];
    if (!this.apiKey) {
      throw new EmbeddingRequestError('OPENAI_API_KEY is not configured');
    }

    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          input: texts,
        }),
      });
    } catch (err) {
      throw new EmbeddingRequestError(`OpenAI embeddings request failed: ${String(err)}`, { cause: err });
    }

    if (!res.ok) {
      const detail = await safeErrorBody(res);
      throw new EmbeddingRequestError(`OpenAI embeddings error: ${res.status} ${res.statusText}${detail}`);
    }

    const payload = embeddingResponseSchema.safeParse(await res.json());
    if (!payload.success || payload.data.data.length !== texts.length) {
      throw new EmbeddingRequestError('OpenAI embeddings response malformed or incomplete');
    }

    const vectors = payload.data.data
      .sort((a, b) => a.index - b.index)
      .map((entry) => Float32Array.from(entry.embedding));

    if (!this.dim && vectors[0]) {
      this.dim = vectors[0].length;
    }

    return vectors;
  }
}
