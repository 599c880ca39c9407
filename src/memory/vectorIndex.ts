import { DimensionMismatchError, InvalidVectorError } from "../errors.js";
import { compareText } from "../text/normalise.js";

/** Version tag written into persisted indexes. */
export const VECTOR_INDEX_FORMAT_VERSION = 1;

export interface VectorRecord {
  id: string;
  vector: readonly number[];
}

export interface VectorHit {
  id: string;
  /** Cosine similarity in [-1, 1]. */
  similarity: number;
}

export interface VectorIndexBuildOptions {
  /**
   * Expected dimension. When omitted it is taken from the first vector; an
   * empty index without an explicit dimension accepts any query and returns
   * no hits.
   */
  dimension?: number;
  /** Label used in error messages (`documents`, `faqs`). */
  collection?: string;
}

export interface SerializedVectorIndex {
  version: number;
  collection: string;
  dimension: number | null;
  items: Array<{ id: string; vector: number[] }>;
}

interface StoredVector {
  id: string;
  values: Float64Array;
  norm: number;
}

function computeNorm(values: ArrayLike<number>): number {
  let sum = 0;
  for (let index = 0; index < values.length; index += 1) {
    sum += values[index] * values[index];
  }
  return Math.sqrt(sum);
}

function clampSimilarity(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(-1, Math.min(1, value));
}

/**
 * Immutable exact nearest-neighbour index under cosine similarity.
 *
 * `build` validates every vector up front, so a built index never holds
 * malformed data. Rebuilding means building a new instance; the engine swaps
 * whole snapshots, never the contents of one.
 */
export class VectorIndex {
  readonly collection: string;
  readonly dimension: number | null;
  private readonly vectors: readonly StoredVector[];
  private readonly byId: ReadonlyMap<string, StoredVector>;

  private constructor(collection: string, dimension: number | null, vectors: StoredVector[]) {
    this.collection = collection;
    this.dimension = dimension;
    this.vectors = Object.freeze(vectors);
    this.byId = new Map(vectors.map((vector) => [vector.id, vector]));
  }

  /**
   * Builds an index from `id → vector` records. A later record with an id
   * already seen replaces the earlier one.
   */
  static build(
    items: Iterable<VectorRecord> | Readonly<Record<string, readonly number[]>>,
    options: VectorIndexBuildOptions = {},
  ): VectorIndex {
    const collection = options.collection ?? "vectors";
    const records: VectorRecord[] = isRecordIterable(items)
      ? [...items]
      : Object.entries(items).map(([id, vector]) => ({ id, vector }));

    let dimension = options.dimension ?? null;
    const unique = new Map<string, StoredVector>();
    for (const record of records) {
      if (dimension === null) {
        dimension = record.vector.length;
      }
      if (record.vector.length !== dimension) {
        throw new DimensionMismatchError(dimension, record.vector.length, `${collection} vector ${record.id}`);
      }
      if (!record.vector.every((component) => Number.isFinite(component))) {
        throw new InvalidVectorError(record.id);
      }
      const values = Float64Array.from(record.vector);
      unique.set(record.id, { id: record.id, values, norm: computeNorm(values) });
    }

    const vectors = [...unique.values()].sort((a, b) => compareText(a.id, b.id));
    return new VectorIndex(collection, dimension, vectors);
  }

  static empty(collection: string, dimension: number | null = null): VectorIndex {
    return new VectorIndex(collection, dimension, []);
  }

  static fromJSON(serialized: SerializedVectorIndex): VectorIndex {
    const options: VectorIndexBuildOptions = { collection: serialized.collection };
    if (serialized.dimension !== null) {
      options.dimension = serialized.dimension;
    }
    return VectorIndex.build(serialized.items, options);
  }

  get size(): number {
    return this.vectors.length;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Returns a copy of the stored vector. */
  get(id: string): number[] | undefined {
    const stored = this.byId.get(id);
    return stored ? Array.from(stored.values) : undefined;
  }

  /**
   * Returns up to `k` hits sorted by similarity descending, ties broken by
   * ascending id. A zero query vector has no direction and yields no hits.
   *
   * @throws DimensionMismatchError when the query does not match the index.
   */
  query(vector: readonly number[], k: number): VectorHit[] {
    if (this.dimension !== null && vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length, `${this.collection} query`);
    }
    if (!vector.every((component) => Number.isFinite(component))) {
      throw new InvalidVectorError("query");
    }
    const limit = Math.floor(k);
    if (limit <= 0 || this.vectors.length === 0) {
      return [];
    }
    const queryNorm = computeNorm(vector);
    if (queryNorm === 0) {
      return [];
    }

    const hits: VectorHit[] = this.vectors.map((stored) => {
      if (stored.norm === 0) {
        return { id: stored.id, similarity: 0 };
      }
      let dot = 0;
      for (let index = 0; index < stored.values.length; index += 1) {
        dot += stored.values[index] * vector[index];
      }
      return { id: stored.id, similarity: clampSimilarity(dot / (stored.norm * queryNorm)) };
    });
    hits.sort((a, b) => b.similarity - a.similarity || compareText(a.id, b.id));
    return hits.slice(0, limit);
  }

  toJSON(): SerializedVectorIndex {
    return {
      version: VECTOR_INDEX_FORMAT_VERSION,
      collection: this.collection,
      dimension: this.dimension,
      items: this.vectors.map((stored) => ({ id: stored.id, vector: Array.from(stored.values) })),
    };
  }
}

function isRecordIterable(
  items: Iterable<VectorRecord> | Readonly<Record<string, readonly number[]>>,
): items is Iterable<VectorRecord> {
  return Symbol.iterator in items;
}
