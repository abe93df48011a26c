import type { VectorIndex } from '../contracts/vectorIndex';
import type { EmbeddingEncoder } from '../embeddings/encoder';
import { GenerationCancelled, ValidationError } from '../errors';
import type { ProviderRegistry } from '../generation/registry';
import type { Logger } from '../logger';
import type { GenerationRequest, GenerationResponse, SearchResult } from '../types';
import { assembleContext, buildPrompt } from './context';

export interface PipelineDeps {
  encoder: Pick<EmbeddingEncoder, 'encode'>;
  index: Pick<VectorIndex, 'search'>;
  registry: Pick<ProviderRegistry, 'resolve'>;
  /** Upper bound on the characters of fable context put into a prompt. */
  contextCharBudget: number;
  logger: Logger;
}

/** Query → retrieved fables → prompt → provider answer. Holds no per-request state. */
export class RetrievalPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async search(query: string, limit: number, scoreThreshold?: number): Promise<SearchResult[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`);
    }
    const vector = await this.deps.encoder.encode(query);
    return this.deps.index.search(vector, limit, scoreThreshold);
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse> {
    // unknown provider or model fails before any retrieval work
    const resolved = this.deps.registry.resolve(request.provider, request.model);

    const results = await this.search(request.query, request.limit);
    const context = assembleContext(results, this.deps.contextCharBudget);
    const prompt = buildPrompt(context.text, request.query);

    if (signal?.aborted) throw new GenerationCancelled();

    const started = Date.now();
    const answer = await resolved.provider.generate(prompt, resolved.model, { timeoutMs: resolved.timeoutMs, signal });
    this.deps.logger.info(
      {
        provider: resolved.name,
        model: resolved.model,
        retrieved: results.length,
        sources: context.sources,
        promptChars: prompt.length,
        ms: Date.now() - started,
      },
      'Generated answer',
    );

    return {
      answer,
      sources: context.sources,
      provider_used: resolved.name,
      model_used: resolved.model,
    };
  }
}
