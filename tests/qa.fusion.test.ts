import { describe, it } from "mocha";
import { expect } from "chai";

import { DEFAULT_ENGINE_CONFIG, type FusionConfig } from "../src/config/engine.js";
import { fuseEvidence, scaleScores } from "../src/qa/fusion.js";
import { faqHit, graphFact, snippet } from "./helpers/evidence.js";

const empty = { graphFacts: [], snippets: [], faqHits: [] };

function withConfig(overrides: Partial<FusionConfig>): FusionConfig {
  return { ...DEFAULT_ENGINE_CONFIG.fusion, ...overrides };
}

describe("evidence fusion", () => {
  it("short-circuits on a direct FAQ hit", () => {
    const outcome = fuseEvidence({
      ...empty,
      graphFacts: [graphFact("a|p|b", 0.99)],
      faqHits: [faqHit("faq-1", 0.95, "Yes, it is.", true)],
    });
    expect(outcome.kind).to.equal("direct_answer");
    if (outcome.kind === "direct_answer") {
      expect(outcome.answer).to.equal("Yes, it is.");
      expect(outcome.faq.faqId).to.equal("faq-1");
    }
  });

  it("picks the most similar direct hit, then the smallest id", () => {
    const outcome = fuseEvidence({
      ...empty,
      faqHits: [faqHit("faq-b", 0.95, "B", true), faqHit("faq-a", 0.95, "A", true), faqHit("faq-c", 0.93, "C", true)],
    });
    expect(outcome).to.include({ kind: "direct_answer", answer: "A" });
  });

  it("keeps a lone weak snippet as evidence", () => {
    const outcome = fuseEvidence({ ...empty, snippets: [snippet("doc#0", "doc", "Some passage.", 0.4)] });
    expect(outcome.kind).to.equal("evidence");
    if (outcome.kind === "evidence") {
      expect(outcome.evidence).to.have.length(1);
      expect(outcome.evidence[0].score).to.be.closeTo(0.4 * 0.35, 1e-12);
    }
  });

  it("reports no evidence when every source is empty", () => {
    expect(fuseEvidence(empty)).to.deep.equal({ kind: "no_evidence" });
  });

  it("drops items whose raw score is not positive", () => {
    expect(fuseEvidence({ ...empty, snippets: [snippet("doc#0", "doc", "Opposite.", -0.2)] })).to.deep.equal({
      kind: "no_evidence",
    });
  });

  it("ranks by weighted score and never demotes an item whose raw score rises", () => {
    const before = fuseEvidence({
      ...empty,
      graphFacts: [graphFact("a|p|b", 0.5), graphFact("c|q|d", 0.8)],
      snippets: [snippet("doc#0", "doc", "Passage.", 0.9)],
    });
    const after = fuseEvidence({
      ...empty,
      graphFacts: [graphFact("a|p|b", 0.95), graphFact("c|q|d", 0.8)],
      snippets: [snippet("doc#0", "doc", "Passage.", 0.9)],
    });
    const order = (outcome: ReturnType<typeof fuseEvidence>) =>
      outcome.kind === "evidence" ? outcome.evidence.map((item) => item.provenanceId) : [];

    expect(order(before)).to.deep.equal(["c|q|d", "doc#0", "a|p|b"]);
    expect(order(after)).to.deep.equal(["a|p|b", "c|q|d", "doc#0"]);
  });

  it("breaks score ties by source priority", () => {
    const outcome = fuseEvidence(
      {
        graphFacts: [graphFact("a|p|b", 0.6)],
        snippets: [snippet("doc#0", "doc", "Passage.", 0.6)],
        faqHits: [faqHit("faq-1", 0.6, "Answer.")],
      },
      withConfig({ weights: { graph_fact: 1, document_snippet: 1, faq_hit: 1 } }),
    );
    expect(outcome.kind === "evidence" ? outcome.evidence.map((item) => item.kind) : []).to.deep.equal([
      "graph_fact",
      "faq_hit",
      "document_snippet",
    ]);
  });

  it("collapses snippets repeating the same passage of a document", () => {
    const outcome = fuseEvidence({
      ...empty,
      snippets: [snippet("doc#0", "doc", "Same passage.", 0.5), snippet("doc#3", "doc", "same  passage", 0.7)],
    });
    expect(outcome.kind === "evidence" ? outcome.evidence.map((item) => item.provenanceId) : []).to.deep.equal([
      "doc#3",
    ]);
  });

  it("keeps the bottom of a min-max batch as evidence", () => {
    const outcome = fuseEvidence(
      {
        ...empty,
        snippets: [snippet("doc-a#0", "doc-a", "First passage.", 0.8), snippet("doc-b#0", "doc-b", "Second passage.", 0.7)],
      },
      withConfig({ scaling: { graph_fact: "clamp", document_snippet: "minmax", faq_hit: "clamp" } }),
    );
    expect(outcome.kind).to.equal("evidence");
    if (outcome.kind === "evidence") {
      expect(outcome.evidence.map((item) => item.provenanceId)).to.deep.equal(["doc-a#0", "doc-b#0"]);
      expect(outcome.evidence[0].score).to.be.closeTo(0.35, 1e-12);
      expect(outcome.evidence[1].score).to.equal(0);
    }
  });

  it("scales every source through the logistic curve", () => {
    const outcome = fuseEvidence(
      {
        graphFacts: [graphFact("a|p|b", 0.5)],
        snippets: [snippet("doc#0", "doc", "Passage.", 0.5)],
        faqHits: [faqHit("faq-1", 0.5, "Answer.")],
      },
      withConfig({ scaling: { graph_fact: "logistic", document_snippet: "logistic", faq_hit: "logistic" } }),
    );
    expect(outcome.kind).to.equal("evidence");
    if (outcome.kind === "evidence") {
      expect(outcome.evidence.map((item) => item.kind)).to.deep.equal(["graph_fact", "document_snippet", "faq_hit"]);
      expect(outcome.evidence[0].score).to.be.closeTo(0.5 * 0.45, 1e-12);
      expect(outcome.evidence[1].score).to.be.closeTo(0.5 * 0.35, 1e-12);
      expect(outcome.evidence[2].score).to.be.closeTo(0.5 * 0.2, 1e-12);
    }
  });

  it("keeps the items of a source weighted zero, ranked last", () => {
    const outcome = fuseEvidence(
      { ...empty, graphFacts: [graphFact("a|p|b", 0.9)], snippets: [snippet("doc#0", "doc", "Passage.", 0.4)] },
      withConfig({ weights: { graph_fact: 0, document_snippet: 1, faq_hit: 0 } }),
    );
    expect(outcome.kind).to.equal("evidence");
    if (outcome.kind === "evidence") {
      expect(outcome.evidence.map((item) => [item.provenanceId, item.score])).to.deep.equal([
        ["doc#0", 0.4],
        ["a|p|b", 0],
      ]);
    }
  });

  it("truncates to the evidence budget", () => {
    const outcome = fuseEvidence(
      { ...empty, graphFacts: [graphFact("a|p|b", 0.9), graphFact("b|p|c", 0.8), graphFact("c|p|d", 0.7)] },
      withConfig({ maxEvidence: 2 }),
    );
    expect(outcome.kind === "evidence" ? outcome.evidence.length : 0).to.equal(2);
  });
});

describe("score scaling", () => {
  const params = DEFAULT_ENGINE_CONFIG.fusion;

  it("clamps into the unit interval", () => {
    expect(scaleScores([-0.5, 0.3, 1.7], "clamp", params)).to.deep.equal([0, 0.3, 1]);
  });

  it("rescales a batch with min-max and falls back to clamping for flat batches", () => {
    expect(scaleScores([1, 3, 5], "minmax", params)).to.deep.equal([0, 0.5, 1]);
    expect(scaleScores([0.4, 0.4], "minmax", params)).to.deep.equal([0.4, 0.4]);
  });

  it("centres the logistic curve on the configured midpoint", () => {
    const [atMidpoint, high] = scaleScores([0.5, 0.9], "logistic", params);
    expect(atMidpoint).to.equal(0.5);
    expect(high).to.be.greaterThan(0.9);
  });
});
