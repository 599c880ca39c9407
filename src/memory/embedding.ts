import pLimit from "p-limit";

import { DimensionMismatchError, ERROR_CODES, HybridQaError } from "../errors.js";
import { tokenise } from "../text/normalise.js";

/** External embedding collaborator: text → fixed-dimension vector. */
export interface Embedder {
  readonly dimension: number;
  embed(texts: readonly string[]): Promise<number[][]>;
}

/** Weight of a bigram feature relative to a unigram. */
const BIGRAM_WEIGHT = 0.5;

/** 32-bit FNV-1a over UTF-16 code units. */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Deterministic feature-hashing embedder. Unigrams and bigrams of the
 * tokenised text are hashed into `dimension` buckets and the result is
 * L2-normalised; text without tokens maps to the zero vector.
 */
export class HashingEmbedder implements Embedder {
  readonly dimension: number;

  constructor(dimension = 256) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new HybridQaError(ERROR_CODES.CONFIG_INVALID, `embedding dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = tokenise(text);
    for (let index = 0; index < tokens.length; index += 1) {
      vector[fnv1a(tokens[index]) % this.dimension] += 1;
      if (index + 1 < tokens.length) {
        vector[fnv1a(`${tokens[index]} ${tokens[index + 1]}`) % this.dimension] += BIGRAM_WEIGHT;
      }
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }
}

export interface BatchEmbedOptions {
  batchSize: number;
  concurrency: number;
  /** Label used in error messages. */
  collection: string;
}

/**
 * Embeds texts in batches with bounded concurrency and checks every returned
 * vector against the embedder's declared dimension. Output order matches
 * input order.
 */
export async function embedInBatches(
  embedder: Embedder,
  texts: readonly string[],
  options: BatchEmbedOptions,
): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }
  const batchSize = Math.max(1, Math.floor(options.batchSize));
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency)));

  const batches: string[][] = [];
  for (let start = 0; start < texts.length; start += batchSize) {
    batches.push(texts.slice(start, start + batchSize));
  }

  const results = await Promise.all(
    batches.map((batch, batchIndex) =>
      limit(async () => {
        const vectors = await embedder.embed(batch);
        if (vectors.length !== batch.length) {
          throw new HybridQaError(
            ERROR_CODES.CONFIG_INVALID,
            `embedder returned ${vectors.length} vectors for ${batch.length} ${options.collection} texts`,
          );
        }
        vectors.forEach((vector, offset) => {
          if (vector.length !== embedder.dimension) {
            throw new DimensionMismatchError(
              embedder.dimension,
              vector.length,
              `${options.collection} embedding ${batchIndex * batchSize + offset}`,
            );
          }
        });
        return vectors;
      }),
    ),
  );
  return results.flat();
}
