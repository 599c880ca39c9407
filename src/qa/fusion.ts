import { DEFAULT_ENGINE_CONFIG, EVIDENCE_KINDS, type EvidenceKind, type FusionConfig, type ScoreScaling } from "../config/engine.js";
import { compareText } from "../text/normalise.js";
import { dedupeKeyOf, type DocumentSnippet, type Evidence, type FaqHit, type GraphFact } from "./evidence.js";

export interface FusionInput {
  graphFacts: readonly GraphFact[];
  snippets: readonly DocumentSnippet[];
  faqHits: readonly FaqHit[];
}

export type FusionOutcome =
  | { kind: "direct_answer"; answer: string; faq: FaqHit }
  | { kind: "evidence"; evidence: Evidence[] }
  | { kind: "no_evidence" };

function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Maps raw scores of one source into [0, 1] with a monotonic scaler. `minmax`
 * is relative to the batch; a batch whose scores are all equal falls back to
 * `clamp`.
 */
export function scaleScores(
  raw: readonly number[],
  scaling: ScoreScaling,
  config: Pick<FusionConfig, "logisticMidpoint" | "logisticSteepness">,
): number[] {
  switch (scaling) {
    case "clamp":
      return raw.map(clamp01);
    case "logistic":
      return raw.map((value) => clamp01(1 / (1 + Math.exp(-config.logisticSteepness * (value - config.logisticMidpoint)))));
    case "minmax": {
      if (raw.length === 0) {
        return [];
      }
      const min = Math.min(...raw);
      const max = Math.max(...raw);
      if (max === min) {
        return raw.map(clamp01);
      }
      return raw.map((value) => clamp01((value - min) / (max - min)));
    }
  }
}

/** Picks the short-circuit candidate: highest similarity, then smallest FAQ id. */
function directCandidate(hits: readonly FaqHit[]): (FaqHit & { answer: string }) | null {
  let best: (FaqHit & { answer: string }) | null = null;
  for (const hit of hits) {
    if (!hit.direct || hit.answer === null) {
      continue;
    }
    if (!best || hit.rawScore > best.rawScore || (hit.rawScore === best.rawScore && compareText(hit.faqId, best.faqId) < 0)) {
      best = { ...hit, answer: hit.answer };
    }
  }
  return best;
}

function normalisedWeights(weights: FusionConfig["weights"]): Record<EvidenceKind, number> {
  const total = weights.graph_fact + weights.document_snippet + weights.faq_hit;
  if (!(total > 0)) {
    return { graph_fact: 0, document_snippet: 0, faq_hit: 0 };
  }
  return {
    graph_fact: weights.graph_fact / total,
    document_snippet: weights.document_snippet / total,
    faq_hit: weights.faq_hit / total,
  };
}

/**
 * Merges the three evidence sources into one ranked list.
 *
 * A FAQ hit flagged `direct` short-circuits everything else. Otherwise each
 * item scores `scale(raw) × weight(kind)`. Items are dropped on their raw
 * score only (not finite or not positive), so the bottom of a `minmax` batch
 * or a source weighted 0 still contributes, ranked last. Duplicates keep their
 * best representative, and the list is ordered by score, then source priority,
 * then provenance id before truncation. Empty input yields `no_evidence`.
 */
export function fuseEvidence(input: FusionInput, config: FusionConfig = DEFAULT_ENGINE_CONFIG.fusion): FusionOutcome {
  const direct = directCandidate(input.faqHits);
  if (direct) {
    return { kind: "direct_answer", answer: direct.answer, faq: direct };
  }

  const weights = normalisedWeights(config.weights);
  const priority = new Map<EvidenceKind, number>(config.priority.map((kind, index) => [kind, index]));
  const rank = (kind: EvidenceKind) => priority.get(kind) ?? EVIDENCE_KINDS.length;

  const scored: Evidence[] = [];
  const push = <E extends Evidence>(items: readonly E[], kind: EvidenceKind) => {
    const kept = items.filter((item) => Number.isFinite(item.rawScore) && item.rawScore > 0);
    const scaled = scaleScores(
      kept.map((item) => item.rawScore),
      config.scaling[kind],
      config,
    );
    kept.forEach((item, index) => {
      scored.push({ ...item, score: scaled[index] * weights[kind] });
    });
  };
  push(input.graphFacts, "graph_fact");
  push(input.snippets, "document_snippet");
  push(input.faqHits, "faq_hit");

  const compare = (a: Evidence, b: Evidence): number =>
    b.score - a.score || rank(a.kind) - rank(b.kind) || compareText(a.provenanceId, b.provenanceId);

  const best = new Map<string, Evidence>();
  for (const item of scored) {
    const key = dedupeKeyOf(item);
    const existing = best.get(key);
    if (!existing || compare(item, existing) < 0) {
      best.set(key, item);
    }
  }

  const evidence = [...best.values()].sort(compare).slice(0, config.maxEvidence);
  if (evidence.length === 0) {
    return { kind: "no_evidence" };
  }
  return { kind: "evidence", evidence };
}
