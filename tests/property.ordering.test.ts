import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { normalizeGraph } from "../src/knowledge/normalizer.js";
import type { RawMention, RawTriple } from "../src/knowledge/types.js";
import { DEFAULT_ENGINE_CONFIG } from "../src/config/engine.js";
import { fuseEvidence, type FusionInput } from "../src/qa/fusion.js";
import { faqHit, graphFact, snippet } from "./helpers/evidence.js";
import { SATELLITE_MENTIONS, SATELLITE_TRIPLES } from "./helpers/knowledge.js";

const MENTIONS: RawMention[] = [
  ...SATELLITE_MENTIONS,
  { text: "insat-3d", type: "satellite", source: "doc-4" },
  { text: "Spectrometer", type: "instrument", source: "doc-2" },
  { text: "Spectrometers", type: "instrument", source: "doc-5" },
  { text: "imager", source: "doc-6" },
];

const percent = (min: number) => fc.integer({ min, max: 100 }).map((value) => value / 100);

const TRIPLES: RawTriple[] = [
  ...SATELLITE_TRIPLES,
  { subject: "INSAT-3D", predicate: "carries", object: "Spectrometer", confidence: 0.6, source: "doc-2" },
  { subject: "insat-3d", predicate: "carries", object: "Spectrometers", confidence: 0.75, source: "doc-5" },
];

describe("ordering properties", () => {
  it("normalises to the same graph for any permutation of the input", () => {
    const baseline = normalizeGraph({ mentions: MENTIONS, triples: TRIPLES }).graph.toJSON();
    fc.assert(
      fc.property(
        fc.shuffledSubarray(MENTIONS, { minLength: MENTIONS.length }),
        fc.shuffledSubarray(TRIPLES, { minLength: TRIPLES.length }),
        (mentions, triples) => {
          expect(normalizeGraph({ mentions, triples }).graph.toJSON()).to.deep.equal(baseline);
        },
      ),
      { numRuns: 50 },
    );
  });

  it("never demotes an evidence item whose raw score increases", () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0.01, max: 1, noNaN: true }), { minLength: 1, maxLength: 8 }),
        fc.nat(),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (scores, pick, bump) => {
          const target = pick % scores.length;
          const rankOf = (raw: number[]) => {
            const outcome = fuseEvidence({
              graphFacts: raw.map((score, index) => graphFact(`k${index}|p|o`, score)),
              snippets: [],
              faqHits: [],
            });
            return outcome.kind === "evidence"
              ? outcome.evidence.findIndex((item) => item.provenanceId === `k${target}|p|o`)
              : -1;
          };

          const raised = scores.map((score, index) => (index === target ? Math.min(1, score + bump) : score));
          expect(rankOf(raised)).to.be.at.most(rankOf(scores));
        },
      ),
      { numRuns: 100 },
    );
  });

  it("never demotes a graph fact when the graph weight rises", () => {
    fc.assert(
      fc.property(
        fc.array(percent(1), { minLength: 1, maxLength: 6 }),
        fc.array(percent(1), { maxLength: 6 }),
        fc.array(percent(1), { maxLength: 3 }),
        fc.record({ graph_fact: percent(0), document_snippet: percent(0), faq_hit: percent(0) }),
        fc.integer({ min: 1, max: 100 }),
        fc.nat(),
        (graphScores, snippetScores, faqScores, weights, bump, pick) => {
          const target = `g${pick % graphScores.length}|p|o`;
          const input: FusionInput = {
            graphFacts: graphScores.map((score, index) => graphFact(`g${index}|p|o`, score)),
            snippets: snippetScores.map((score, index) => snippet(`doc-${index}#0`, `doc-${index}`, `Passage ${index}.`, score)),
            faqHits: faqScores.map((score, index) => faqHit(`faq-${index}`, score, `Answer ${index}.`)),
          };
          const placement = (graphWeight: number) => {
            const outcome = fuseEvidence(input, {
              ...DEFAULT_ENGINE_CONFIG.fusion,
              weights: { ...weights, graph_fact: graphWeight },
              maxEvidence: 100,
            });
            const evidence = outcome.kind === "evidence" ? outcome.evidence : [];
            const rank = evidence.findIndex((item) => item.provenanceId === target);
            return { rank, score: rank >= 0 ? evidence[rank].score : Number.NaN };
          };

          const before = placement(weights.graph_fact);
          const after = placement(weights.graph_fact + bump / 100);
          expect(before.rank).to.be.at.least(0);
          expect(after.rank).to.be.at.most(before.rank);
          expect(after.score).to.be.at.least(before.score);
        },
      ),
      { numRuns: 100 },
    );
  });
});
