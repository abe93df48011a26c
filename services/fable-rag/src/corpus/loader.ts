// src/corpus/loader.ts
import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { DistanceMetric } from '../config';
import type { VectorIndex } from '../contracts/vectorIndex';
import { estimateTokens, type EmbeddingEncoder } from '../embeddings/encoder';
import { ValidationError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { fableEmbeddingText, type Fable, type Vector } from '../types';

const ENCODE_BATCH = 32;

const rawStorySchema = z.object({
  number: z.union([z.string(), z.number()]),
  title: z.string().default(''),
  story: z.array(z.string()).default([]),
  moral: z.string().default(''),
  characters: z.array(z.string()).optional(),
});

export const rawCorpusSchema = z.object({
  stories: z.array(rawStorySchema),
});

export type RawCorpus = z.infer<typeof rawCorpusSchema>;

export interface CorpusStatistics {
  total_fables: number;
  total_words: number;
  average_words_per_fable: number;
}

export async function readCorpus(path: string): Promise<RawCorpus> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new ValidationError(`Cannot read corpus file ${path}: ${errorMessage(err)}`);
  }
  const parsed = rawCorpusSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Corpus file ${path} is malformed: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/** Raw stories into fable records. Story paragraphs are joined with single spaces. */
export function processFables(raw: RawCorpus): Fable[] {
  const seen = new Set<number>();
  return raw.stories.map((story, position) => {
    const id = Number(story.number);
    if (!Number.isInteger(id) || String(story.number).trim() === '') {
      throw new ValidationError(`Story #${position + 1} has a non-integer number '${story.number}'`);
    }
    if (seen.has(id)) {
      throw new ValidationError(`Duplicate fable number ${id}`);
    }
    seen.add(id);

    const content = story.story.join(' ');
    return {
      id,
      title: story.title,
      content,
      moral: story.moral,
      language: 'en',
      word_count: countWords(content),
    };
  });
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function corpusStatistics(fables: Fable[]): CorpusStatistics {
  const totalWords = fables.reduce((sum, fable) => sum + fable.word_count, 0);
  const average = fables.length ? totalWords / fables.length : 0;
  return {
    total_fables: fables.length,
    total_words: totalWords,
    average_words_per_fable: Math.round(average * 100) / 100,
  };
}

export interface InitializeIndexDeps {
  encoder: Pick<EmbeddingEncoder, 'encodeMany' | 'dimension' | 'maxTokens'>;
  index: Pick<VectorIndex, 'dropCollection' | 'ensureCollection' | 'upsertMany'>;
  metric: DistanceMetric;
  logger: Logger;
}

/** Embedding text for a fable, cut to what the encoder accepts. */
export function embeddingInput(fable: Fable, maxTokens: number, logger: Logger): string {
  const text = fableEmbeddingText(fable);
  const tokens = estimateTokens(text);
  if (tokens <= maxTokens) return text;
  logger.warn({ id: fable.id, tokens, maxTokens }, 'Fable exceeds the embedding token limit; truncating');
  // four characters per estimated token
  return text.slice(0, maxTokens * 4);
}

/**
 * Rebuilds the collection from scratch: encode, drop, create, insert.
 * Every fable is encoded before the old collection is dropped, so an
 * encoding failure leaves the existing collection in place.
 */
export async function initializeIndex(fables: Fable[], deps: InitializeIndexDeps): Promise<CorpusStatistics> {
  const { encoder, index, metric, logger } = deps;

  const texts = fables.map((fable) => embeddingInput(fable, encoder.maxTokens, logger));
  const vectors: Vector[] = [];
  for (let start = 0; start < texts.length; start += ENCODE_BATCH) {
    vectors.push(...(await encoder.encodeMany(texts.slice(start, start + ENCODE_BATCH))));
    logger.info({ encoded: Math.min(start + ENCODE_BATCH, texts.length), total: texts.length }, 'Encoding fables');
  }
  const dimension = await encoder.dimension();

  const dropped = await index.dropCollection();
  logger.info({ dropped }, dropped ? 'Dropped existing collection' : 'No existing collection to drop');

  await index.ensureCollection(dimension, metric);
  await index.upsertMany(fables.map((fable, i) => ({ fable, vector: vectors[i] })));

  const stats = corpusStatistics(fables);
  logger.info({ ...stats, dimension, metric }, 'Index initialized');
  return stats;
}
