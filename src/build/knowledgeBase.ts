import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config/engine.js";
import { deriveCooccurrenceTriples } from "../knowledge/cooccurrence.js";
import { normalizeGraph } from "../knowledge/normalizer.js";
import type { NormalizationSummary } from "../knowledge/types.js";
import type { StructuredLogger } from "../logger.js";
import { chunkDocument, type DocumentChunk } from "../memory/chunker.js";
import { embedInBatches, type Embedder } from "../memory/embedding.js";
import { VectorIndex } from "../memory/vectorIndex.js";
import type { FaqEntry } from "../qa/faqMatcher.js";
import type { KnowledgeSnapshotParts } from "../qa/snapshot.js";
import { sanitizeText } from "../text/normalise.js";
import type { IngestIssue, KnowledgeBaseInput } from "./ingest.js";

export interface BuildDependencies {
  embedder: Embedder;
  config?: EngineConfig;
  logger?: StructuredLogger;
}

export interface BuildReport {
  graph: NormalizationSummary;
  cooccurrence: { documents: number; triples: number };
  documents: { documents: number; chunksIndexed: number; chunksSkipped: number };
  faqs: { indexed: number; questionOnly: number; duplicates: number };
  /** Records rejected while parsing the bundle. */
  issues: IngestIssue[];
  dimension: number;
  elapsedMs: number;
}

export interface BuildResult {
  parts: KnowledgeSnapshotParts;
  report: BuildReport;
}

export interface BuildExtras {
  issues?: IngestIssue[];
  duplicateFaqs?: number;
}

/**
 * Runs the offline phase end to end: co-occurrence derivation, graph
 * normalisation, chunking, batched embedding and both vector index builds.
 * The returned parts are ready for `SnapshotRegistry.publish` or
 * `saveSnapshot`.
 */
export async function buildKnowledgeBase(
  input: KnowledgeBaseInput,
  dependencies: BuildDependencies,
  extras: BuildExtras = {},
): Promise<BuildResult> {
  const startedAt = Date.now();
  const config = dependencies.config ?? DEFAULT_ENGINE_CONFIG;
  const { embedder, logger } = dependencies;

  const cooccurrence = deriveCooccurrenceTriples(input.documentEntities, {
    confidence: config.normalizer.cooccurrenceConfidence,
  });
  const normalizeOptions: Parameters<typeof normalizeGraph>[1] = { config: config.normalizer };
  if (logger) {
    normalizeOptions.logger = logger;
  }
  const { graph, summary } = normalizeGraph(
    {
      mentions: [...input.mentions, ...cooccurrence.mentions],
      triples: [...input.triples, ...cooccurrence.triples],
    },
    normalizeOptions,
  );

  const chunks = new Map<string, DocumentChunk>();
  let chunksSkipped = 0;
  const addChunk = (chunk: DocumentChunk) => {
    if (!chunk.text || chunks.has(chunk.id)) {
      chunksSkipped += 1;
      return;
    }
    chunks.set(chunk.id, chunk);
  };
  for (const document of input.documents) {
    const produced = chunkDocument(document, {
      maxTokens: config.build.chunkMaxTokens,
      overlapSentences: config.build.chunkOverlapSentences,
    });
    if (produced.length === 0) {
      chunksSkipped += 1;
    }
    produced.forEach(addChunk);
  }
  input.chunks.forEach((chunk, ordinal) =>
    addChunk({ id: chunk.id, documentId: chunk.documentId, ordinal, text: sanitizeText(chunk.text) }),
  );

  const batchOptions = { batchSize: config.build.embedBatchSize, concurrency: config.build.embedConcurrency };
  const chunkList = [...chunks.values()];
  const chunkVectors = await embedInBatches(
    embedder,
    chunkList.map((chunk) => chunk.text),
    { ...batchOptions, collection: "documents" },
  );
  const documentIndex = VectorIndex.build(
    chunkList.map((chunk, index) => ({ id: chunk.id, vector: chunkVectors[index] })),
    { dimension: embedder.dimension, collection: "documents" },
  );

  const faqs = new Map<string, FaqEntry>(input.faqs.map((faq) => [faq.id, faq]));
  const faqList = [...faqs.values()];
  const faqVectors = await embedInBatches(
    embedder,
    faqList.map((faq) => faq.question),
    { ...batchOptions, collection: "faqs" },
  );
  const faqIndex = VectorIndex.build(
    faqList.map((faq, index) => ({ id: faq.id, vector: faqVectors[index] })),
    { dimension: embedder.dimension, collection: "faqs" },
  );

  const report: BuildReport = {
    graph: summary,
    cooccurrence: { documents: input.documentEntities.length, triples: cooccurrence.triples.length },
    documents: { documents: input.documents.length, chunksIndexed: documentIndex.size, chunksSkipped },
    faqs: {
      indexed: faqIndex.size,
      questionOnly: faqList.filter((faq) => faq.answer === null).length,
      duplicates: extras.duplicateFaqs ?? 0,
    },
    issues: extras.issues ?? [],
    dimension: embedder.dimension,
    elapsedMs: Date.now() - startedAt,
  };

  logger?.info("knowledge_base_built", {
    entities: summary.entities,
    edges: summary.edges,
    chunks: report.documents.chunksIndexed,
    faqs: report.faqs.indexed,
    question_only_faqs: report.faqs.questionOnly,
    issues: report.issues.length,
    elapsed_ms: report.elapsedMs,
  });

  return {
    parts: { graph, documentIndex, chunks, faqIndex, faqs, summary },
    report,
  };
}
