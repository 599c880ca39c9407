import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config/engine.js";
import { DimensionMismatchError, ERROR_CODES, HybridQaError, IndexUnavailableError } from "../errors.js";
import { runWithQueryContext } from "../infra/queryContext.js";
import { EntityMatcher, type EntityMatch } from "../knowledge/entityMatcher.js";
import type { GraphSnapshot } from "../knowledge/graphSnapshot.js";
import { traverseGraph } from "../knowledge/traversal.js";
import type { StructuredLogger } from "../logger.js";
import type { Embedder } from "../memory/embedding.js";
import { sanitizeText } from "../text/normalise.js";
import { buildSynthesisContext, renderSynthesisPrompt, type AnswerSynthesizer, type ConversationTurn, type SynthesisContext } from "./context.js";
import { describeEvidence, graphFactsFromPaths, type DocumentSnippet, type Evidence, type FaqHit, type GraphFact } from "./evidence.js";
import { FaqMatcher } from "./faqMatcher.js";
import { fuseEvidence, type FusionOutcome } from "./fusion.js";
import type { KnowledgeSnapshot, SnapshotRegistry } from "./snapshot.js";

export type SourceStatus = "ok" | "empty" | "timeout" | "unavailable" | "failed";

export interface SourceDiagnostics {
  status: SourceStatus;
  items: number;
  elapsedMs: number;
  error?: string;
}

export interface QueryDiagnostics {
  graph: SourceDiagnostics;
  documents: SourceDiagnostics;
  faqs: SourceDiagnostics;
}

interface OutcomeBase {
  queryId: string;
  question: string;
  generation: number | null;
  matchedEntities: EntityMatch[];
  diagnostics: QueryDiagnostics;
  elapsedMs: number;
}

export interface DirectAnswerOutcome extends OutcomeBase {
  kind: "direct_answer";
  /** Stored FAQ answer, verbatim. */
  answer: string;
  faq: FaqHit;
}

export interface EvidenceOutcome extends OutcomeBase {
  kind: "evidence";
  evidence: Evidence[];
  context: SynthesisContext;
  prompt: string;
  /** Prose from the synthesiser; null when none is configured or it failed. */
  answer: string | null;
}

export interface NoEvidenceOutcome extends OutcomeBase {
  kind: "no_evidence";
  message: string;
}

export type QueryOutcome = DirectAnswerOutcome | EvidenceOutcome | NoEvidenceOutcome;

export const NO_EVIDENCE_MESSAGE = "No evidence found for this question in the knowledge base.";

export interface AnswerOptions {
  history?: readonly ConversationTurn[];
  timeoutMs?: number;
  queryId?: string;
}

export interface HybridQueryEngineOptions {
  registry: SnapshotRegistry;
  embedder: Embedder;
  config?: EngineConfig;
  logger?: StructuredLogger;
  synthesizer?: AnswerSynthesizer;
}

const TIMED_OUT = Symbol("timed-out");

type BranchResult<T> = { status: "ok"; value: T } | { status: "failed"; error: unknown } | { status: "timeout" };

class BranchUnavailable extends Error {
  readonly reason: IndexUnavailableError;

  constructor(reason: IndexUnavailableError) {
    super(reason.message);
    this.name = "BranchUnavailable";
    this.reason = reason;
  }
}

interface Deadline {
  promise: Promise<typeof TIMED_OUT>;
  clear(): void;
}

function createDeadline(timeoutMs: number): Deadline {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    timer.unref?.();
  });
  return {
    promise,
    clear: () => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Online query pipeline. Each call captures the current snapshot once, embeds
 * the question once, and runs the graph, document and FAQ branches
 * concurrently under a shared deadline. Branches that time out, fail or have
 * no index contribute nothing; only a dimension mismatch between the embedder
 * and an index is surfaced as an error.
 */
export class HybridQueryEngine {
  private readonly registry: SnapshotRegistry;
  private readonly embedder: Embedder;
  private readonly config: EngineConfig;
  private readonly logger: StructuredLogger | undefined;
  private readonly synthesizer: AnswerSynthesizer | undefined;
  private readonly matchers = new WeakMap<GraphSnapshot, EntityMatcher>();

  constructor(options: HybridQueryEngineOptions) {
    this.registry = options.registry;
    this.embedder = options.embedder;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.logger = options.logger;
    this.synthesizer = options.synthesizer;
  }

  async answer(rawQuestion: string, options: AnswerOptions = {}): Promise<QueryOutcome> {
    const question = sanitizeText(rawQuestion);
    if (!question) {
      throw new HybridQaError(ERROR_CODES.QUERY_INVALID_INPUT, "question must not be empty");
    }
    const snapshot = this.registry.current();
    const init: { queryId?: string; snapshotGeneration: number | null } = {
      snapshotGeneration: snapshot?.generation ?? null,
    };
    if (options.queryId !== undefined) {
      init.queryId = options.queryId;
    }
    return runWithQueryContext(init, (context) => this.run(question, snapshot, context.queryId, options));
  }

  private matcherFor(graph: GraphSnapshot): EntityMatcher {
    let matcher = this.matchers.get(graph);
    if (!matcher) {
      matcher = new EntityMatcher(graph, this.config.matcher);
      this.matchers.set(graph, matcher);
    }
    return matcher;
  }

  private async run(
    question: string,
    snapshot: KnowledgeSnapshot | null,
    queryId: string,
    options: AnswerOptions,
  ): Promise<QueryOutcome> {
    const startedAt = Date.now();
    const timeoutMs = options.timeoutMs ?? this.config.query.timeoutMs;
    const deadline = createDeadline(timeoutMs);

    let matchedEntities: EntityMatch[] = [];
    let embedding: Promise<number[]> | null = null;
    const queryVector = (): Promise<number[]> => {
      if (!embedding) {
        embedding = this.embedder.embed([question]).then((vectors) => {
          const [vector] = vectors;
          if (!vector) {
            throw new HybridQaError(ERROR_CODES.CONFIG_INVALID, "embedder returned no vector for the question");
          }
          return vector;
        });
      }
      return embedding;
    };

    const graphBranch = async (): Promise<GraphFact[]> => {
      if (!snapshot) {
        throw new BranchUnavailable(new IndexUnavailableError("graph"));
      }
      // Lets the embedding request go out before the synchronous graph work.
      await yieldToEventLoop();
      matchedEntities = this.matcherFor(snapshot.graph).match(question);
      const seeds = matchedEntities.map((match) => ({ entityId: match.entityId, weight: match.confidence }));
      const paths = traverseGraph(snapshot.graph, seeds, this.config.traversal);
      return graphFactsFromPaths(snapshot.graph, paths);
    };

    const documentBranch = async (): Promise<DocumentSnippet[]> => {
      const index = snapshot?.documentIndex;
      if (!snapshot || !index) {
        throw new BranchUnavailable(new IndexUnavailableError("documents"));
      }
      const hits = index.query(await queryVector(), this.config.vector.topK);
      const snippets: DocumentSnippet[] = [];
      for (const hit of hits) {
        const chunk = snapshot.chunks.get(hit.id);
        if (!chunk) {
          continue;
        }
        snippets.push({
          kind: "document_snippet",
          id: `document_snippet:${chunk.id}`,
          provenanceId: chunk.id,
          provenance: [
            { sourceId: chunk.id, type: "chunk", confidence: Math.max(0, hit.similarity) },
            { sourceId: chunk.documentId, type: "document" },
          ],
          rawScore: hit.similarity,
          score: 0,
          chunkId: chunk.id,
          documentId: chunk.documentId,
          text: chunk.text,
        });
      }
      return snippets;
    };

    const faqBranch = async (): Promise<FaqHit[]> => {
      const index = snapshot?.faqIndex;
      if (!snapshot || !index) {
        throw new BranchUnavailable(new IndexUnavailableError("faqs"));
      }
      const matcher = new FaqMatcher(index, snapshot.faqs, this.config.faq);
      return matcher.match(await queryVector()).hits;
    };

    const settle = async <T>(branch: () => Promise<T>): Promise<BranchResult<T> & { elapsedMs: number }> => {
      const branchStart = Date.now();
      const outcome = await Promise.race([
        branch().then(
          (value): BranchResult<T> => ({ status: "ok", value }),
          (error: unknown): BranchResult<T> => ({ status: "failed", error }),
        ),
        deadline.promise.then((): BranchResult<T> => ({ status: "timeout" })),
      ]);
      return { ...outcome, elapsedMs: Date.now() - branchStart };
    };

    const documents = settle(documentBranch);
    const faqs = settle(faqBranch);
    const results = await Promise.all([settle(graphBranch), documents, faqs]).finally(
      () => deadline.clear(),
    );
    const [graphResult, documentResult, faqResult] = results;

    for (const result of results) {
      if (result.status === "failed" && result.error instanceof DimensionMismatchError) {
        this.logger?.error("qa_dimension_mismatch", {
          expected: result.error.expected,
          received: result.error.received,
        });
        throw result.error;
      }
    }

    const diagnostics: QueryDiagnostics = {
      graph: this.diagnose("graph", graphResult),
      documents: this.diagnose("documents", documentResult),
      faqs: this.diagnose("faqs", faqResult),
    };
    const graphFacts = graphResult.status === "ok" ? graphResult.value : [];
    const snippets = documentResult.status === "ok" ? documentResult.value : [];
    const faqHits = faqResult.status === "ok" ? faqResult.value : [];

    const fused = fuseEvidence({ graphFacts, snippets, faqHits }, this.config.fusion);
    const base: OutcomeBase = {
      queryId,
      question,
      generation: snapshot?.generation ?? null,
      matchedEntities,
      diagnostics,
      elapsedMs: 0,
    };

    const outcome = await this.toOutcome(fused, base, options.history ?? []);
    outcome.elapsedMs = Date.now() - startedAt;

    this.logger?.info("qa_query", {
      outcome: outcome.kind,
      matched_entities: matchedEntities.length,
      graph: diagnostics.graph.status,
      documents: diagnostics.documents.status,
      faqs: diagnostics.faqs.status,
      evidence: outcome.kind === "evidence" ? outcome.evidence.length : 0,
      elapsed_ms: outcome.elapsedMs,
    });
    return outcome;
  }

  private async toOutcome(
    fused: FusionOutcome,
    base: OutcomeBase,
    history: readonly ConversationTurn[],
  ): Promise<QueryOutcome> {
    switch (fused.kind) {
      case "direct_answer":
        return { ...base, kind: "direct_answer", answer: fused.answer, faq: fused.faq };
      case "no_evidence":
        return { ...base, kind: "no_evidence", message: NO_EVIDENCE_MESSAGE };
      case "evidence": {
        this.logger?.debug("qa_evidence_ranked", {
          items: fused.evidence.map((item) => ({ id: item.id, score: item.score, text: describeEvidence(item) })),
        });
        const context = buildSynthesisContext(base.question, fused.evidence, history, this.config.query);
        return {
          ...base,
          kind: "evidence",
          evidence: fused.evidence,
          context,
          prompt: renderSynthesisPrompt(context),
          answer: await this.synthesize(context),
        };
      }
    }
  }

  private diagnose<T extends readonly unknown[]>(
    source: keyof QueryDiagnostics,
    result: BranchResult<T> & { elapsedMs: number },
  ): SourceDiagnostics {
    switch (result.status) {
      case "ok":
        return { status: result.value.length > 0 ? "ok" : "empty", items: result.value.length, elapsedMs: result.elapsedMs };
      case "timeout":
        this.logger?.warn("qa_source_degraded", { source, status: "timeout" });
        return { status: "timeout", items: 0, elapsedMs: result.elapsedMs };
      case "failed": {
        const { error } = result;
        if (error instanceof BranchUnavailable) {
          this.logger?.warn("qa_source_degraded", { source, status: "unavailable", error: error.reason.message });
          return { status: "unavailable", items: 0, elapsedMs: result.elapsedMs, error: error.reason.message };
        }
        const message = errorMessage(error);
        this.logger?.warn("qa_source_degraded", { source, status: "failed", error: message });
        return { status: "failed", items: 0, elapsedMs: result.elapsedMs, error: message };
      }
    }
  }

  private async synthesize(context: SynthesisContext): Promise<string | null> {
    if (!this.synthesizer) {
      return null;
    }
    try {
      return await this.synthesizer.synthesize(context);
    } catch (error) {
      this.logger?.warn("qa_synthesis_failed", { error: errorMessage(error) });
      return null;
    }
  }
}
