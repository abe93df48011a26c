// src/embeddings/provider.ts
export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  /** Known vector dimension, or 0 until the first response reveals it. */
  dim: number;
  embed(texts: string[]): Promise<Float32Array[]>; // always return Float32
}

/** The embedding backend could not serve the request (network, HTTP status, malformed body). */
export class EmbeddingRequestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingRequestError';
  }
}

export type FetchLike = typeof fetch;

export async function safeErrorBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
