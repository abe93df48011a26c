// src/embeddings/index.ts
import type { Config } from '../config';
import type { EmbeddingProvider, FetchLike } from './provider';
import { OllamaEmbeddingProvider } from './ollama';
import { OpenAIProvider } from './openai';

export { EmbeddingEncoder, estimateTokens } from './encoder';
export type { EmbeddingProvider } from './provider';

export function createEmbeddingProvider(embeddings: Config['embeddings'], fetchImpl?: FetchLike): EmbeddingProvider {
  switch (embeddings.provider) {
    case 'ollama':
      return new OllamaEmbeddingProvider({ host: embeddings.ollama.host, model: embeddings.model, fetch: fetchImpl });
    case 'openai':
      return new OpenAIProvider({ apiKey: embeddings.openai.apiKey, model: embeddings.model, fetch: fetchImpl });
  }
}
