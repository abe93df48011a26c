import type { DistanceMetric } from '../config';
import { DISTANCE_METRICS } from '../config';
import type { RedisArg, RedisCommander } from './client';
import { isMissingIndex } from './client';

export const VECTOR_FIELD = 'vec';
export const DISTANCE_ALIAS = 'vector_distance';
export const FABLE_FIELDS = ['id', 'title', 'content', 'moral', 'language', 'word_count'] as const;

export interface CollectionSchema {
  dimension: number;
  metric: DistanceMetric;
}

export interface CollectionInfo extends CollectionSchema {
  count: number;
}

export function collectionKeys(collection: string) {
  return {
    index: `idx:${collection}`,
    prefix: `${collection}:`,
    // kept outside the indexed prefix so it never shows up as a document
    schema: `schema:${collection}`,
  };
}

export function buildCreateArgs(collection: string, schema: CollectionSchema): RedisArg[] {
  const keys = collectionKeys(collection);
  return [
    keys.index,
    'ON',
    'HASH',
    'PREFIX',
    '1',
    keys.prefix,
    'SCHEMA',
    'id',
    'NUMERIC',
    'SORTABLE',
    'title',
    'TEXT',
    'language',
    'TAG',
    VECTOR_FIELD,
    'VECTOR',
    'FLAT',
    '6',
    'TYPE',
    'FLOAT32',
    'DIM',
    String(schema.dimension),
    'DISTANCE_METRIC',
    schema.metric,
  ];
}

export async function listIndexes(redis: RedisCommander): Promise<string[]> {
  const existing = await redis.call('FT._LIST');
  return Array.isArray(existing) ? existing.map((idx) => toSafeString(idx)) : [];
}

/**
 * Reads dimension, metric and document count of an existing collection.
 * Vector parameters come from FT.INFO where the server reports them, otherwise
 * from the schema hash written at creation. Returns null when the index is absent.
 */
export async function readCollectionInfo(redis: RedisCommander, collection: string): Promise<CollectionInfo | null> {
  const keys = collectionKeys(collection);
  let info: unknown;
  try {
    info = await redis.call('FT.INFO', keys.index);
  } catch (err) {
    if (isMissingIndex(err)) return null;
    throw err;
  }

  const top = pairsToRecord(info);
  const count = Number(toSafeString(top.num_docs ?? '0'));
  let vectorAttr: Record<string, unknown> | undefined;
  if (Array.isArray(top.attributes)) {
    vectorAttr = top.attributes
      .map((attr) => pairsToRecord(attr))
      .find((attr) => toSafeString(attr.attribute ?? attr.identifier) === VECTOR_FIELD);
  }

  let dimension = Number(toSafeString(vectorAttr?.dim ?? ''));
  let metric = parseMetric(vectorAttr?.distance_metric);
  if (!dimension || !metric) {
    const stored = await redis.call('HMGET', keys.schema, 'dim', 'metric');
    const [dim, storedMetric] = Array.isArray(stored) ? stored : [];
    dimension = dimension || Number(toSafeString(dim ?? ''));
    metric = metric ?? parseMetric(storedMetric);
  }
  if (!dimension || !metric) {
    throw new Error(`Index ${keys.index} exists but its vector schema could not be read`);
  }

  return { dimension, metric, count: Number.isFinite(count) ? count : 0 };
}

/** Converts a RediSearch distance into a similarity where higher is closer. */
export function toSimilarity(metric: DistanceMetric, distance: number): number {
  switch (metric) {
    case 'COSINE':
    case 'IP':
      return 1 - distance;
    case 'L2':
      return 1 / (1 + distance);
  }
}

/** Flat `[k1, v1, k2, v2, ...]` reply into a record with lower-cased keys. */
export function pairsToRecord(reply: unknown): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  if (!Array.isArray(reply)) return record;
  for (let i = 0; i + 1 < reply.length; i += 2) {
    record[toSafeString(reply[i]).toLowerCase()] = reply[i + 1];
  }
  return record;
}

export function toSafeString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return String(value ?? '');
}

function parseMetric(value: unknown): DistanceMetric | undefined {
  const upper = toSafeString(value).toUpperCase();
  return DISTANCE_METRICS.find((metric) => metric === upper);
}
