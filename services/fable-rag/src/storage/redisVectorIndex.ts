import type { DistanceMetric } from '../config';
import type { IndexEntry, VectorIndex } from '../contracts/vectorIndex';
import {
  CollectionMissingError,
  ConnectionError,
  FableRagError,
  SchemaMismatchError,
  ValidationError,
  errorMessage,
} from '../errors';
import type { Logger } from '../logger';
import type { RedisArg, RedisCommander } from '../redis/client';
import { isConnectionFailure, isMissingIndex } from '../redis/client';
import {
  DISTANCE_ALIAS,
  FABLE_FIELDS,
  VECTOR_FIELD,
  buildCreateArgs,
  collectionKeys,
  listIndexes,
  readCollectionInfo,
  toSafeString,
  toSimilarity,
  type CollectionInfo,
  type CollectionSchema,
} from '../redis/schema';
import type { Fable, FableId, SearchResult, Vector } from '../types';

const UPSERT_BATCH = 64;
// extra KNN candidates fetched so equal distances at the cut-off are all seen
const TIE_MARGIN = 4;

export interface RedisVectorIndexOptions {
  collection: string;
  /** Wait before the single retry of a failed connection. */
  retryBackoffMs: number;
  logger: Logger;
}

/**
 * `VectorIndex` on a RediSearch FLAT vector index over hashes.
 * Each fable is one hash under `{collection}:{id}` holding its fields and the
 * FLOAT32 vector.
 */
export class RedisVectorIndex implements VectorIndex {
  readonly collection: string;
  private readonly keys: ReturnType<typeof collectionKeys>;
  private readonly logger: Logger;
  private readonly retryBackoffMs: number;
  private schema: CollectionSchema | null = null;

  constructor(
    private readonly redis: RedisCommander,
    options: RedisVectorIndexOptions,
  ) {
    this.collection = options.collection;
    this.keys = collectionKeys(options.collection);
    this.logger = options.logger;
    this.retryBackoffMs = options.retryBackoffMs;
  }

  async ensureCollection(dimension: number, metric: DistanceMetric): Promise<void> {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError(`dimension must be a positive integer, got ${dimension}`);
    }
    const wanted: CollectionSchema = { dimension, metric };

    const existing = await this.describeCollection();
    if (existing) {
      this.verify(existing, wanted);
      return;
    }

    try {
      await this.withRetry('create collection', () => this.redis.call('FT.CREATE', ...buildCreateArgs(this.collection, wanted)));
    } catch (err) {
      if (!/index already exists/i.test(errorMessage(err))) throw err;
      // created concurrently by someone else: it must still match
      const raced = await this.describeCollection();
      if (!raced) throw err;
      this.verify(raced, wanted);
      return;
    }
    await this.withRetry('record schema', () =>
      this.redis.call('HSET', this.keys.schema, 'dim', String(dimension), 'metric', metric),
    );
    this.schema = wanted;
    this.logger.info({ collection: this.collection, dimension, metric }, 'Created collection');
  }

  async describeCollection(): Promise<CollectionInfo | null> {
    const info = await this.withRetry('describe collection', async () => {
      const names = await listIndexes(this.redis);
      if (!names.includes(this.keys.index)) return null;
      return readCollectionInfo(this.redis, this.collection);
    });
    this.schema = info ? { dimension: info.dimension, metric: info.metric } : null;
    return info;
  }

  async upsert(fable: Fable, vector: Vector): Promise<void> {
    await this.upsertMany([{ fable, vector }]);
  }

  async upsertMany(entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const schema = await this.requireSchema();
    for (const entry of entries) {
      this.checkDimension(schema, entry.vector);
    }

    for (let start = 0; start < entries.length; start += UPSERT_BATCH) {
      const batch = entries.slice(start, start + UPSERT_BATCH);
      await this.withRetry('upsert', () => Promise.all(batch.map(({ fable, vector }) => this.writeFable(fable, vector))));
    }
  }

  async search(vector: Vector, limit: number, scoreThreshold?: number): Promise<SearchResult[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`);
    }
    if (scoreThreshold !== undefined && !Number.isFinite(scoreThreshold)) {
      throw new ValidationError('score_threshold must be a finite number');
    }
    const schema = await this.requireSchema();
    this.checkDimension(schema, vector);

    const blob = Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);

    // the store breaks distance ties in its own order; fetch past the cut-off
    // until the tie group there is complete, then order ties by id locally
    let k = limit + TIE_MARGIN;
    let hits = await this.knn(blob, k);
    while (hits.length === k && hits[k - 1].distance === hits[limit - 1].distance) {
      k *= 2;
      hits = await this.knn(blob, k);
    }

    return hits
      .map(({ fable, distance }) => ({ fable, score: toSimilarity(schema.metric, distance) }))
      .filter((hit) => scoreThreshold === undefined || hit.score >= scoreThreshold)
      .sort((a, b) => b.score - a.score || a.fable.id - b.fable.id)
      .slice(0, limit);
  }

  private async knn(blob: Buffer, k: number) {
    const reply = await this.withRetry('search', () =>
      this.redis.call(
        'FT.SEARCH',
        this.keys.index,
        `*=>[KNN ${k} @${VECTOR_FIELD} $blob_vec AS ${DISTANCE_ALIAS}]`,
        'PARAMS',
        '2',
        'blob_vec',
        blob,
        'SORTBY',
        DISTANCE_ALIAS,
        'ASC',
        'RETURN',
        String(FABLE_FIELDS.length + 1),
        ...FABLE_FIELDS,
        DISTANCE_ALIAS,
        'LIMIT',
        '0',
        String(k),
        'DIALECT',
        '2',
      ),
    );
    return this.normalizeFtResults(reply);
  }

  async getById(id: FableId): Promise<Fable | null> {
    if (!Number.isInteger(id)) {
      throw new ValidationError(`fable id must be an integer, got ${id}`);
    }
    const reply = await this.withRetry('get', () => this.redis.call('HMGET', this.fableKey(id), ...FABLE_FIELDS));
    if (!Array.isArray(reply)) return null;
    const fields: Record<string, string> = {};
    FABLE_FIELDS.forEach((field, idx) => {
      if (reply[idx] != null) fields[field] = toSafeString(reply[idx]);
    });
    return this.toFable(fields);
  }

  async dropCollection(): Promise<boolean> {
    this.schema = null;
    return this.withRetry('drop collection', async () => {
      await this.redis.call('DEL', this.keys.schema);
      try {
        // DD also deletes the indexed hashes
        await this.redis.call('FT.DROPINDEX', this.keys.index, 'DD');
        return true;
      } catch (err) {
        if (isMissingIndex(err)) return false;
        throw err;
      }
    });
  }

  private async writeFable(fable: Fable, vector: Vector) {
    const blob = Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
    const args: RedisArg[] = [
      this.fableKey(fable.id),
      'id',
      String(fable.id),
      'title',
      fable.title,
      'content',
      fable.content,
      'moral',
      fable.moral,
      'language',
      fable.language,
      'word_count',
      String(fable.word_count),
      VECTOR_FIELD,
      blob,
    ];
    await this.redis.call('HSET', ...args);
  }

  private async requireSchema(): Promise<CollectionSchema> {
    if (this.schema) return this.schema;
    const info = await this.describeCollection();
    if (!info) throw new CollectionMissingError(this.collection);
    return { dimension: info.dimension, metric: info.metric };
  }

  private verify(existing: CollectionSchema, wanted: CollectionSchema) {
    if (existing.dimension !== wanted.dimension || existing.metric !== wanted.metric) {
      throw new SchemaMismatchError(
        `Collection '${this.collection}' has dimension ${existing.dimension}/${existing.metric}, ` +
          `expected ${wanted.dimension}/${wanted.metric}`,
      );
    }
  }

  private checkDimension(schema: CollectionSchema, vector: Vector) {
    if (vector.length !== schema.dimension) {
      throw new SchemaMismatchError(
        `Vector has ${vector.length} dimensions but collection '${this.collection}' stores ${schema.dimension}`,
      );
    }
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const mapped = this.mapError(err);
      if (!(mapped instanceof ConnectionError)) throw mapped;
      this.logger.warn({ operation, err: mapped.message, backoffMs: this.retryBackoffMs }, 'Index store unreachable, retrying once');
    }
    await new Promise((resolve) => setTimeout(resolve, this.retryBackoffMs));
    try {
      return await fn();
    } catch (err) {
      throw this.mapError(err);
    }
  }

  private mapError(err: unknown): unknown {
    if (err instanceof FableRagError) return err;
    if (isConnectionFailure(err)) {
      return new ConnectionError(`Vector index store unreachable: ${errorMessage(err)}`, { cause: err });
    }
    if (isMissingIndex(err)) {
      this.schema = null;
      return new CollectionMissingError(this.collection, { cause: err });
    }
    return err;
  }

  private normalizeFtResults(ftRes: unknown): Array<{ fable: Fable; distance: number }> {
    if (!Array.isArray(ftRes) || ftRes.length < 2) return [];

    const results: Array<{ fable: Fable; distance: number }> = [];
    for (let i = 1; i < ftRes.length; i += 2) {
      const fields = ftRes[i + 1];
      if (!Array.isArray(fields)) continue;

      const doc: Record<string, string> = {};
      for (let j = 0; j + 1 < fields.length; j += 2) {
        doc[toSafeString(fields[j])] = toSafeString(fields[j + 1]);
      }

      const fable = this.toFable(doc);
      const distance = Number(doc[DISTANCE_ALIAS]);
      if (!fable || !Number.isFinite(distance)) {
        this.logger.warn({ key: toSafeString(ftRes[i]) }, 'Skipping malformed search hit');
        continue;
      }
      results.push({ fable, distance });
    }
    return results;
  }

  private toFable(doc: Record<string, string>): Fable | null {
    const id = Number(doc.id);
    const wordCount = Number(doc.word_count);
    if (!doc.id || !Number.isInteger(id) || doc.title === undefined) return null;
    return {
      id,
      title: doc.title,
      content: doc.content ?? '',
      moral: doc.moral ?? '',
      language: doc.language ?? '',
      word_count: Number.isFinite(wordCount) ? wordCount : 0,
    };
  }

  private fableKey(id: FableId) {
    return `${this.keys.prefix}${id}`;
  }
}
