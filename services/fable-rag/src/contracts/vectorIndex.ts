import type { DistanceMetric } from '../config';
import type { CollectionInfo } from '../redis/schema';
import type { Fable, FableId, SearchResult, Vector } from '../types';

export type { CollectionInfo };

export interface IndexEntry {
  fable: Fable;
  vector: Vector;
}

/**
 * Nearest-neighbour store over fables. The backing store is the single source
 * of truth: implementations do not cache results.
 *
 * Connection failures are retried once after a short backoff and then surface
 * as ConnectionError; a collection that does not exist surfaces as
 * CollectionMissingError.
 */
export interface VectorIndex {
  readonly collection: string;

  /** Creates the collection if absent; fails with SchemaMismatchError if it exists with another shape. */
  ensureCollection(dimension: number, metric: DistanceMetric): Promise<void>;

  /** Null when the collection does not exist. */
  describeCollection(): Promise<CollectionInfo | null>;

  upsert(fable: Fable, vector: Vector): Promise<void>;
  upsertMany(entries: IndexEntry[]): Promise<void>;

  /**
   * Up to `limit` results with `score >= scoreThreshold`, best first, ties by ascending id.
   * An empty collection yields an empty array.
   */
  search(vector: Vector, limit: number, scoreThreshold?: number): Promise<SearchResult[]>;

  getById(id: FableId): Promise<Fable | null>;

  /** Removes the collection and its records. False when there was nothing to drop. */
  dropCollection(): Promise<boolean>;
}
