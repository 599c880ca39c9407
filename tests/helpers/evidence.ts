import type { DocumentSnippet, FaqHit, GraphFact } from "../../src/qa/evidence.js";

export function graphFact(key: string, rawScore: number): GraphFact {
  const [subject = "s", predicate = "p", object = "o"] = key.split("|");
  return {
    kind: "graph_fact",
    id: `graph_fact:${key}`,
    provenanceId: key,
    provenance: [{ sourceId: key, type: "kg" }],
    rawScore,
    score: 0,
    seed: subject,
    hops: 1,
    facts: [
      {
        subject: { id: subject, name: subject.toUpperCase() },
        predicate,
        object: { id: object, name: object.toUpperCase() },
        confidence: rawScore,
      },
    ],
  };
}

export function snippet(chunkId: string, documentId: string, text: string, rawScore: number): DocumentSnippet {
  return {
    kind: "document_snippet",
    id: `document_snippet:${chunkId}`,
    provenanceId: chunkId,
    provenance: [{ sourceId: chunkId, type: "chunk", confidence: rawScore }],
    rawScore,
    score: 0,
    chunkId,
    documentId,
    text,
  };
}

export function faqHit(faqId: string, rawScore: number, answer: string | null, direct = false): FaqHit {
  return {
    kind: "faq_hit",
    id: `faq_hit:${faqId}`,
    provenanceId: faqId,
    provenance: [{ sourceId: faqId, type: "faq", confidence: rawScore }],
    rawScore,
    score: 0,
    faqId,
    question: `Question ${faqId}?`,
    answer,
    direct,
  };
}
