import { EncodingError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { Vector } from '../types';
import type { EmbeddingProvider } from './provider';

const PROBE_TEXT = 'dimension probe';

export interface EncoderOptions {
  /** Inputs estimated above this many tokens are rejected, not truncated. */
  maxTokens: number;
  logger: Logger;
}

/** Rough token estimate (about four characters per token for Latin text). */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Text → vector, on top of an embedding backend.
 *
 * The first call loads the model (one probe request that also reveals the
 * vector dimension). Concurrent first callers share the same in-flight load;
 * a failed load is forgotten so the next call can try again.
 */
export class EmbeddingEncoder {
  private loaded: number | null = null;
  private loading: Promise<number> | null = null;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EncoderOptions,
  ) {}

  get model(): string {
    return this.provider.model;
  }

  get maxTokens(): number {
    return this.options.maxTokens;
  }

  async load(): Promise<number> {
    if (this.loaded !== null) return this.loaded;
    if (!this.loading) {
      this.loading = this.doLoad()
        .then((dim) => {
          this.loaded = dim;
          return dim;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  dimension(): Promise<number> {
    return this.load();
  }

  async encode(text: string): Promise<Vector> {
    const [vector] = await this.encodeMany([text]);
    return vector;
  }

  async encodeMany(texts: string[]): Promise<Vector[]> {
    texts.forEach((text) => this.validate(text));
    if (texts.length === 0) return [];

    const dim = await this.load();
    const vectors = await this.embed(texts);
    for (const vector of vectors) {
      if (vector.length !== dim) {
        throw new EncodingError(`${this.describe()} returned a ${vector.length}-dimensional vector, expected ${dim}`);
      }
    }
    return vectors;
  }

  private validate(text: string) {
    if (typeof text !== 'string' || text.trim() === '') {
      throw new EncodingError('Cannot encode empty text');
    }
    const tokens = estimateTokens(text);
    if (tokens > this.options.maxTokens) {
      throw new EncodingError(`Text of ~${tokens} tokens exceeds the ${this.options.maxTokens}-token limit of ${this.describe()}`);
    }
  }

  private async doLoad(): Promise<number> {
    const started = Date.now();
    const [probe] = await this.embed([PROBE_TEXT]);
    const dim = probe?.length ?? 0;
    if (!dim) {
      throw new EncodingError(`${this.describe()} returned an empty probe vector`, { unreachable: true });
    }
    if (this.provider.dim && this.provider.dim !== dim) {
      throw new EncodingError(`${this.describe()} reports ${this.provider.dim} dimensions but produced ${dim}`, { unreachable: true });
    }
    this.options.logger.info({ model: this.provider.model, backend: this.provider.name, dim, ms: Date.now() - started }, 'Embedding model loaded');
    return dim;
  }

  private async embed(texts: string[]): Promise<Vector[]> {
    let vectors: Vector[];
    try {
      vectors = await this.provider.embed(texts);
    } catch (err) {
      throw new EncodingError(`Embedding backend ${this.describe()} failed: ${errorMessage(err)}`, { cause: err, unreachable: true });
    }
    if (vectors.length !== texts.length) {
      throw new EncodingError(`expected ${texts.length} embeddings, received ${vectors.length}`, { unreachable: true });
    }
    return vectors;
  }

  private describe() {
    return `${this.provider.name}:${this.provider.model}`;
  }
}
