import type { GraphSnapshot } from "../knowledge/graphSnapshot.js";
import type { NormalizationSummary } from "../knowledge/types.js";
import type { StructuredLogger } from "../logger.js";
import type { DocumentChunk } from "../memory/chunker.js";
import type { VectorIndex } from "../memory/vectorIndex.js";
import type { FaqEntry } from "./faqMatcher.js";

/**
 * Everything one offline pass produces. A missing vector index (null) marks
 * that collection unavailable; queries then skip the branch instead of failing.
 */
export interface KnowledgeSnapshotParts {
  graph: GraphSnapshot;
  documentIndex: VectorIndex | null;
  chunks: ReadonlyMap<string, DocumentChunk>;
  faqIndex: VectorIndex | null;
  faqs: ReadonlyMap<string, FaqEntry>;
  summary?: NormalizationSummary | null;
}

/** Immutable view served to queries. */
export interface KnowledgeSnapshot extends Readonly<KnowledgeSnapshotParts> {
  readonly generation: number;
  readonly publishedAt: string;
}

export interface SnapshotStatus {
  generation: number;
  publishedAt: string | null;
  entities: number;
  edges: number;
  aliases: number;
  chunks: number;
  faqs: number;
  documentIndex: "ready" | "unavailable";
  faqIndex: "ready" | "unavailable";
}

export interface SnapshotRegistryOptions {
  logger?: StructuredLogger;
  now?: () => Date;
}

/**
 * Holds the snapshot currently served. `publish` swaps in a new frozen
 * snapshot in one assignment; queries read `current()` once at start and keep
 * that reference, so they never observe a half-replaced knowledge base.
 */
export class SnapshotRegistry {
  private snapshot: KnowledgeSnapshot | null = null;
  private generationCounter = 0;
  private readonly logger: StructuredLogger | undefined;
  private readonly now: () => Date;

  constructor(options: SnapshotRegistryOptions = {}) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  get generation(): number {
    return this.generationCounter;
  }

  current(): KnowledgeSnapshot | null {
    return this.snapshot;
  }

  publish(parts: KnowledgeSnapshotParts): KnowledgeSnapshot {
    const generation = this.generationCounter + 1;
    const snapshot: KnowledgeSnapshot = Object.freeze({
      graph: parts.graph,
      documentIndex: parts.documentIndex,
      chunks: new Map(parts.chunks),
      faqIndex: parts.faqIndex,
      faqs: new Map(parts.faqs),
      summary: parts.summary ?? null,
      generation,
      publishedAt: this.now().toISOString(),
    });
    this.generationCounter = generation;
    this.snapshot = snapshot;
    this.logger?.info("snapshot_published", {
      generation,
      entities: parts.graph.entityCount,
      edges: parts.graph.edgeCount,
      chunks: snapshot.chunks.size,
      faqs: snapshot.faqs.size,
    });
    return snapshot;
  }

  status(): SnapshotStatus {
    const snapshot = this.snapshot;
    return {
      generation: this.generationCounter,
      publishedAt: snapshot?.publishedAt ?? null,
      entities: snapshot?.graph.entityCount ?? 0,
      edges: snapshot?.graph.edgeCount ?? 0,
      aliases: snapshot?.graph.aliasCount ?? 0,
      chunks: snapshot?.chunks.size ?? 0,
      faqs: snapshot?.faqs.size ?? 0,
      documentIndex: snapshot?.documentIndex ? "ready" : "unavailable",
      faqIndex: snapshot?.faqIndex ? "ready" : "unavailable",
    };
  }
}
