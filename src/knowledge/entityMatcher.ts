import { DEFAULT_ENGINE_CONFIG, type MatcherConfig } from "../config/engine.js";
import { canonicalAlias, compareText, STOP_WORDS, tokenise } from "../text/normalise.js";
import { aliasSimilarity, similarityUpperBound } from "../text/similarity.js";
import type { GraphSnapshot } from "./graphSnapshot.js";

/** Query span resolved to a graph entity. */
export interface EntityMatch {
  entityId: string;
  /** Matched query span, canonicalised. */
  span: string;
  /** Alias key the span resolved through. */
  alias: string;
  /** Token offsets of the span, end exclusive. */
  start: number;
  end: number;
  /** 1 for exact alias hits, the similarity for fuzzy ones. */
  confidence: number;
  exact: boolean;
}

interface AliasCandidate {
  alias: string;
  entityId: string;
}

function compareCandidates(a: EntityMatch, b: EntityMatch): number {
  if (a.exact !== b.exact) {
    return a.exact ? -1 : 1;
  }
  return (
    b.end - b.start - (a.end - a.start) ||
    b.confidence - a.confidence ||
    a.start - b.start ||
    compareText(a.entityId, b.entityId)
  );
}

/**
 * Maps free-text queries to entity ids through the alias index of one graph
 * snapshot. Spans of up to `maxNgram` tokens are looked up exactly first;
 * spans without an exact hit fall back to fuzzy matching against aliases of
 * comparable length.
 */
export class EntityMatcher {
  private readonly graph: GraphSnapshot;
  private readonly config: MatcherConfig;
  /** Canonical aliases bucketed by length for the fuzzy pass. */
  private readonly aliasesByLength = new Map<number, AliasCandidate[]>();

  constructor(graph: GraphSnapshot, config: MatcherConfig = DEFAULT_ENGINE_CONFIG.matcher) {
    this.graph = graph;
    this.config = config;
    for (const [alias, entityId] of graph.aliasEntries()) {
      // Type-qualified aliases are not reachable from tokenised spans.
      if (canonicalAlias(alias) !== alias) {
        continue;
      }
      const bucket = this.aliasesByLength.get(alias.length) ?? [];
      bucket.push({ alias, entityId });
      this.aliasesByLength.set(alias.length, bucket);
    }
    for (const bucket of this.aliasesByLength.values()) {
      bucket.sort((a, b) => compareText(a.alias, b.alias));
    }
  }

  /**
   * Returns up to `maxEntities` non-overlapping matches, best first. An empty
   * list means no entity was recognised.
   */
  match(query: string): EntityMatch[] {
    const tokens = tokenise(query);
    if (tokens.length === 0 || this.graph.aliasCount === 0) {
      return [];
    }

    const candidates: EntityMatch[] = [];
    for (let size = 1; size <= Math.min(this.config.maxNgram, tokens.length); size += 1) {
      for (let start = 0; start + size <= tokens.length; start += 1) {
        const spanTokens = tokens.slice(start, start + size);
        if (spanTokens.every((token) => STOP_WORDS.has(token))) {
          continue;
        }
        const span = spanTokens.join(" ");
        const end = start + size;
        const exactId = this.graph.resolveAlias(span);
        if (exactId) {
          candidates.push({ entityId: exactId, span, alias: span, start, end, confidence: 1, exact: true });
          continue;
        }
        if (STOP_WORDS.has(spanTokens[0]) || STOP_WORDS.has(spanTokens[spanTokens.length - 1])) {
          continue;
        }
        const fuzzy = this.bestFuzzyAlias(span);
        if (fuzzy) {
          candidates.push({
            entityId: fuzzy.entityId,
            span,
            alias: fuzzy.alias,
            start,
            end,
            confidence: fuzzy.similarity,
            exact: false,
          });
        }
      }
    }

    candidates.sort(compareCandidates);
    const taken = new Array<boolean>(tokens.length).fill(false);
    const seenEntities = new Set<string>();
    const selected: EntityMatch[] = [];
    for (const candidate of candidates) {
      if (selected.length >= this.config.maxEntities) {
        break;
      }
      if (seenEntities.has(candidate.entityId)) {
        continue;
      }
      let overlaps = false;
      for (let index = candidate.start; index < candidate.end; index += 1) {
        if (taken[index]) {
          overlaps = true;
          break;
        }
      }
      if (overlaps) {
        continue;
      }
      for (let index = candidate.start; index < candidate.end; index += 1) {
        taken[index] = true;
      }
      seenEntities.add(candidate.entityId);
      selected.push(candidate);
    }
    return selected;
  }

  private bestFuzzyAlias(span: string): (AliasCandidate & { similarity: number }) | null {
    const threshold = this.config.fuzzyThreshold;
    if (span.length < this.config.fuzzyMinLength) {
      return null;
    }
    const minLength = Math.max(this.config.fuzzyMinLength, Math.ceil(span.length * threshold));
    const maxLength = threshold > 0 ? Math.floor(span.length / threshold) : Number.POSITIVE_INFINITY;

    let best: (AliasCandidate & { similarity: number }) | null = null;
    for (const [length, bucket] of this.aliasesByLength) {
      if (length < minLength || length > maxLength) {
        continue;
      }
      if (similarityUpperBound(span.length, length) < threshold) {
        continue;
      }
      for (const candidate of bucket) {
        const similarity = aliasSimilarity(span, candidate.alias);
        if (similarity < threshold) {
          continue;
        }
        if (
          !best ||
          similarity > best.similarity ||
          (similarity === best.similarity && compareText(candidate.alias, best.alias) < 0)
        ) {
          best = { ...candidate, similarity };
        }
      }
    }
    return best;
  }
}
