import { DEFAULT_ENGINE_CONFIG, type FaqConfig } from "../config/engine.js";
import type { VectorIndex } from "../memory/vectorIndex.js";
import type { FaqHit } from "./evidence.js";

/** Curated question/answer pair. Question-only entries carry a null answer. */
export interface FaqEntry {
  id: string;
  question: string;
  answer: string | null;
}

export interface FaqMatch {
  /** Best answered hit at or above the direct-answer threshold, if any. */
  direct: FaqHit | null;
  /** Hits at or above the inclusion threshold, best first. */
  hits: FaqHit[];
}

/**
 * Nearest-neighbour lookup over the FAQ question embeddings. Hits under the
 * inclusion threshold are discarded; hits at or above the direct-answer
 * threshold are flagged `direct` when they carry an answer.
 */
export class FaqMatcher {
  private readonly index: VectorIndex;
  private readonly entries: ReadonlyMap<string, FaqEntry>;
  private readonly config: FaqConfig;

  constructor(index: VectorIndex, entries: ReadonlyMap<string, FaqEntry>, config: FaqConfig = DEFAULT_ENGINE_CONFIG.faq) {
    this.index = index;
    this.entries = entries;
    this.config = config;
  }

  /** @throws DimensionMismatchError when the query vector does not fit the index. */
  match(queryVector: readonly number[]): FaqMatch {
    const hits: FaqHit[] = [];
    for (const { id, similarity } of this.index.query(queryVector, this.config.maxHits)) {
      if (similarity < this.config.inclusionThreshold) {
        break;
      }
      const entry = this.entries.get(id);
      if (!entry) {
        continue;
      }
      hits.push({
        kind: "faq_hit",
        id: `faq_hit:${entry.id}`,
        provenanceId: entry.id,
        provenance: [{ sourceId: entry.id, type: "faq", confidence: Math.max(0, similarity) }],
        rawScore: similarity,
        score: 0,
        faqId: entry.id,
        question: entry.question,
        answer: entry.answer,
        direct: entry.answer !== null && similarity >= this.config.directAnswerThreshold,
      });
    }
    return { direct: hits.find((hit) => hit.direct) ?? null, hits };
  }
}
