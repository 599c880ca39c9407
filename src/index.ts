export * from "./errors.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export * from "./config/engine.js";
export { getQueryContext, runWithQueryContext, type QueryContext } from "./infra/queryContext.js";

export { sanitizeText, canonicalAlias, tokenise, compareText } from "./text/normalise.js";
export type { Provenance, ProvenanceType } from "./types/provenance.js";

export * from "./knowledge/types.js";
export { GraphSnapshot, type SerializedGraph } from "./knowledge/graphSnapshot.js";
export { normalizeGraph, type NormalizeGraphInput, type NormalizeGraphOptions, type NormalizationResult } from "./knowledge/normalizer.js";
export { deriveCooccurrenceTriples, type DocumentEntities, type CooccurrenceResult } from "./knowledge/cooccurrence.js";
export { EntityMatcher, type EntityMatch } from "./knowledge/entityMatcher.js";
export { traverseGraph, scorePath, type FactPath, type PathStep, type TraversalSeed } from "./knowledge/traversal.js";

export { VectorIndex, type VectorHit, type VectorRecord, type SerializedVectorIndex } from "./memory/vectorIndex.js";
export { HashingEmbedder, embedInBatches, type Embedder } from "./memory/embedding.js";
export { chunkDocument, type ChunkableDocument, type DocumentChunk } from "./memory/chunker.js";

export type { Evidence, GraphFact, DocumentSnippet, FaqHit, FactStatement } from "./qa/evidence.js";
export { FaqMatcher, type FaqEntry, type FaqMatch } from "./qa/faqMatcher.js";
export { fuseEvidence, scaleScores, type FusionInput, type FusionOutcome } from "./qa/fusion.js";
export {
  buildSynthesisContext,
  renderSynthesisPrompt,
  type AnswerSynthesizer,
  type ConversationTurn,
  type SynthesisContext,
} from "./qa/context.js";
export { SnapshotRegistry, type KnowledgeSnapshot, type KnowledgeSnapshotParts, type SnapshotStatus } from "./qa/snapshot.js";
export * from "./qa/engine.js";

export { parseKnowledgeBundle, type KnowledgeBaseInput, type IngestIssue, type ParsedBundle } from "./build/ingest.js";
export { buildKnowledgeBase, type BuildReport, type BuildResult } from "./build/knowledgeBase.js";
export { saveSnapshot, loadSnapshot, type SnapshotManifest, type LoadedSnapshot } from "./storage/snapshotStore.js";
export { createQaServer, type QaServerDependencies } from "./server.js";
