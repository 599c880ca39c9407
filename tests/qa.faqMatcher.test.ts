import { describe, it } from "mocha";
import { expect } from "chai";

import { DEFAULT_ENGINE_CONFIG } from "../src/config/engine.js";
import { DimensionMismatchError } from "../src/errors.js";
import { VectorIndex } from "../src/memory/vectorIndex.js";
import { FaqMatcher, type FaqEntry } from "../src/qa/faqMatcher.js";

describe("FAQ matcher", () => {
  const entries = new Map<string, FaqEntry>([
    ["faq-1", { id: "faq-1", question: "What is INSAT-3D?", answer: "A meteorological satellite." }],
    ["faq-2", { id: "faq-2", question: "Who builds satellites?", answer: null }],
    ["faq-3", { id: "faq-3", question: "Where is the launch pad?", answer: "Sriharikota." }],
  ]);
  const index = VectorIndex.build({ "faq-1": [1, 0], "faq-2": [3, 4], "faq-3": [0, 1] }, { collection: "faqs" });

  it("flags an answered hit above the direct-answer threshold", () => {
    const match = new FaqMatcher(index, entries).match([1, 0]);
    expect(match.direct?.faqId).to.equal("faq-1");
    expect(match.hits.map((hit) => [hit.faqId, hit.rawScore, hit.direct])).to.deep.equal([
      ["faq-1", 1, true],
      ["faq-2", 0.6, false],
    ]);
  });

  it("treats both thresholds as inclusive", () => {
    const config = { ...DEFAULT_ENGINE_CONFIG.faq, directAnswerThreshold: 0.6, inclusionThreshold: 0.6, maxHits: 3 };
    const answered = new Map(entries).set("faq-2", { id: "faq-2", question: "Who builds satellites?", answer: "Several agencies." });
    const match = new FaqMatcher(index, answered, config).match([1, 0]);
    expect(match.hits.map((hit) => [hit.faqId, hit.direct])).to.deep.equal([
      ["faq-1", true],
      ["faq-2", true],
    ]);
  });

  it("never lets a question-only entry answer directly", () => {
    const match = new FaqMatcher(index, entries).match([3, 4]);
    expect(match.direct).to.equal(null);
    expect(match.hits[0]).to.include({ faqId: "faq-2", answer: null, direct: false });
  });

  it("drops hits under the inclusion threshold", () => {
    const match = new FaqMatcher(index, entries).match([-1, -1]);
    expect(match).to.deep.equal({ direct: null, hits: [] });
  });

  it("propagates dimension mismatches", () => {
    expect(() => new FaqMatcher(index, entries).match([1, 0, 0])).to.throw(DimensionMismatchError);
  });
});
