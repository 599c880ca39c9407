import type { EvidenceKind } from "../config/engine.js";
import type { GraphSnapshot } from "../knowledge/graphSnapshot.js";
import type { FactPath } from "../knowledge/traversal.js";
import { edgeKey } from "../knowledge/types.js";
import { fingerprint } from "../text/normalise.js";
import { documentProvenance, type Provenance } from "../types/provenance.js";

export type { EvidenceKind };

interface EvidenceBase {
  /** `<kind>:<provenanceId>`, unique within one result. */
  id: string;
  /** Identifier used for the final deterministic tie-break. */
  provenanceId: string;
  provenance: Provenance[];
  /** Source-specific score before scaling (path score, cosine similarity). */
  rawScore: number;
  /** Fusion score in [0, 1]; zero until the evidence went through fusion. */
  score: number;
}

/** One resolved edge of a fact path, with display names. */
export interface FactStatement {
  subject: { id: string; name: string };
  predicate: string;
  object: { id: string; name: string };
  confidence: number;
}

export interface GraphFact extends EvidenceBase {
  kind: "graph_fact";
  seed: string;
  hops: number;
  facts: FactStatement[];
}

export interface DocumentSnippet extends EvidenceBase {
  kind: "document_snippet";
  chunkId: string;
  documentId: string;
  text: string;
}

export interface FaqHit extends EvidenceBase {
  kind: "faq_hit";
  faqId: string;
  question: string;
  /** Null for question-only entries. */
  answer: string | null;
  /** Set by the FAQ matcher when the hit may short-circuit fusion. */
  direct: boolean;
}

export type Evidence = GraphFact | DocumentSnippet | FaqHit;

type EvidenceOf<K extends EvidenceKind> = Extract<Evidence, { kind: K }>;

/**
 * Per-kind behaviour consulted by fusion. A new evidence source plugs in by
 * adding its variant to {@link Evidence} and one adapter here.
 */
export interface EvidenceAdapter<E extends Evidence> {
  /** Items sharing a key describe the same underlying fact or passage. */
  dedupeKey(item: E): string;
  /** One-line rendering used in logs and the synthesis prompt. */
  describe(item: E): string;
}

export const EVIDENCE_ADAPTERS: { [K in EvidenceKind]: EvidenceAdapter<EvidenceOf<K>> } = {
  graph_fact: {
    dedupeKey: (item) => item.provenanceId,
    describe: (item) => item.facts.map(formatFact).join("; "),
  },
  document_snippet: {
    dedupeKey: (item) => `${item.documentId}|${fingerprint(item.text)}`,
    describe: (item) => `[${item.documentId}] ${item.text}`,
  },
  faq_hit: {
    dedupeKey: (item) => item.faqId,
    describe: (item) => (item.answer === null ? `Q: ${item.question}` : `Q: ${item.question} A: ${item.answer}`),
  },
};

export function dedupeKeyOf(item: Evidence): string {
  switch (item.kind) {
    case "graph_fact":
      return `graph_fact:${EVIDENCE_ADAPTERS.graph_fact.dedupeKey(item)}`;
    case "document_snippet":
      return `document_snippet:${EVIDENCE_ADAPTERS.document_snippet.dedupeKey(item)}`;
    case "faq_hit":
      return `faq_hit:${EVIDENCE_ADAPTERS.faq_hit.dedupeKey(item)}`;
  }
}

export function describeEvidence(item: Evidence): string {
  switch (item.kind) {
    case "graph_fact":
      return EVIDENCE_ADAPTERS.graph_fact.describe(item);
    case "document_snippet":
      return EVIDENCE_ADAPTERS.document_snippet.describe(item);
    case "faq_hit":
      return EVIDENCE_ADAPTERS.faq_hit.describe(item);
  }
}

/** `A --predicate--> B` */
export function formatFact(fact: FactStatement): string {
  return `${fact.subject.name} --${fact.predicate}--> ${fact.object.name}`;
}

/** Turns traversal paths into graph-fact evidence with resolved entity names. */
export function graphFactsFromPaths(graph: GraphSnapshot, paths: readonly FactPath[]): GraphFact[] {
  const nameOf = (id: string) => ({ id, name: graph.getEntity(id)?.name ?? id });
  return paths.map((path): GraphFact => {
    const sources = new Set<string>();
    const facts = path.steps.map(({ edge }) => {
      edge.sources.forEach((source) => sources.add(source));
      return {
        subject: nameOf(edge.subject),
        predicate: edge.predicate,
        object: nameOf(edge.object),
        confidence: edge.confidence,
      };
    });
    return {
      kind: "graph_fact",
      id: `graph_fact:${path.key}`,
      provenanceId: path.key,
      provenance: [
        ...path.steps.map(({ edge }) => ({ sourceId: edgeKey(edge), type: "kg" as const })),
        ...documentProvenance(sources),
      ],
      rawScore: path.score,
      score: 0,
      seed: path.seed,
      hops: path.steps.length,
      facts,
    };
  });
}
