import type Redis from 'ioredis';
import type { Config } from './config';
import type { CollectionInfo } from './contracts/vectorIndex';
import { ConnectionError, SchemaMismatchError } from './errors';
import { createEmbeddingProvider, EmbeddingEncoder } from './embeddings';
import type { FetchLike } from './embeddings/provider';
import { ProviderRegistry } from './generation/registry';
import type { Logger } from './logger';
import { RetrievalPipeline } from './pipeline/pipeline';
import { ProcessRunner } from './process/runner';
import { createRedis, type RedisCommander } from './redis/client';
import { RedisVectorIndex } from './storage/redisVectorIndex';

export interface ContainerOverrides {
  redis?: RedisCommander;
  fetch?: FetchLike;
}

/** Builds every long-lived component once. Nothing here is a module-level singleton. */
export function createContainer(config: Config, logger: Logger, overrides: ContainerOverrides = {}) {
  let redis: RedisCommander;
  let ownedRedis: Redis | null = null;
  if (overrides.redis) {
    redis = overrides.redis;
  } else {
    ownedRedis = createRedis(config.index.redisUrl, logger.child({ component: 'redis' }));
    redis = ownedRedis;
  }

  const encoder = new EmbeddingEncoder(createEmbeddingProvider(config.embeddings, overrides.fetch), {
    maxTokens: config.embeddings.maxTokens,
    logger: logger.child({ component: 'encoder' }),
  });

  const index = new RedisVectorIndex(redis, {
    collection: config.index.collection,
    retryBackoffMs: config.index.retryBackoffMs,
    logger: logger.child({ component: 'index' }),
  });

  const runner = new ProcessRunner({
    ...config.process,
    logger: logger.child({ component: 'process' }),
  });

  const registry = new ProviderRegistry(config.generation, {
    runner,
    logger: logger.child({ component: 'generation' }),
    fetch: overrides.fetch,
  });

  const pipeline = new RetrievalPipeline({
    encoder,
    index,
    registry,
    contextCharBudget: config.contextCharBudget,
    logger: logger.child({ component: 'pipeline' }),
  });

  return {
    config,
    logger,
    encoder,
    index,
    runner,
    registry,
    pipeline,
    async close() {
      if (ownedRedis) await ownedRedis.quit();
    },
  };
}

export type Container = ReturnType<typeof createContainer>;

/**
 * Startup check that the stored collection matches the encoder. A dimension
 * mismatch is fatal; an unreachable backend or a missing collection is only
 * logged, since the service can still report health and recover later.
 */
export async function verifyIndexSchema(container: Pick<Container, 'encoder' | 'index' | 'logger'>): Promise<void> {
  const { encoder, index, logger } = container;

  let dimension: number;
  try {
    dimension = await encoder.load();
  } catch (err) {
    logger.warn({ err }, 'Embedding backend unavailable at startup; the model loads on first use');
    return;
  }

  let info: CollectionInfo | null;
  try {
    info = await index.describeCollection();
  } catch (err) {
    if (!(err instanceof ConnectionError)) throw err;
    logger.warn({ err }, 'Index store unreachable at startup');
    return;
  }

  if (!info) {
    logger.warn({ collection: index.collection }, 'Collection does not exist; run `npm run init-index`');
    return;
  }
  if (info.dimension !== dimension) {
    throw new SchemaMismatchError(
      `Collection '${index.collection}' stores ${info.dimension}-dimensional vectors but ${encoder.model} produces ${dimension}`,
    );
  }
  logger.info({ collection: index.collection, dimension, fables: info.count }, 'Index verified');
}
