import { describe, it } from "mocha";
import { expect } from "chai";

import { deriveCooccurrenceTriples } from "../src/knowledge/cooccurrence.js";

describe("co-occurrence triples", () => {
  it("links distinct entities of one document, oriented by alias key", () => {
    const { mentions, triples } = deriveCooccurrenceTriples(
      [{ documentId: "doc-1", entities: { satellite: ["INSAT-3D"], orbit: ["Geostationary", "geostationary"] } }],
      { confidence: 0.3 },
    );

    expect(mentions).to.have.length(3);
    expect(triples).to.deep.equal([
      {
        subject: "Geostationary",
        subjectType: "orbit",
        predicate: "related_to",
        object: "INSAT-3D",
        objectType: "satellite",
        confidence: 0.3,
        source: "doc-1",
      },
    ]);
  });

  it("emits one triple per unordered pair", () => {
    const { triples } = deriveCooccurrenceTriples(
      [{ documentId: "doc-2", entities: { person: ["Ada", "Grace", "Alan"] } }],
      { confidence: 0.3, predicate: "co_occurs_with" },
    );
    expect(triples.map((triple) => `${triple.subject}>${triple.object}`)).to.deep.equal([
      "Ada>Alan",
      "Ada>Grace",
      "Alan>Grace",
    ]);
    expect(new Set(triples.map((triple) => triple.predicate))).to.deep.equal(new Set(["co_occurs_with"]));
  });

  it("never pairs an alias with itself across labels and skips empty values", () => {
    const { mentions, triples } = deriveCooccurrenceTriples(
      [{ documentId: "doc-3", entities: { planet: ["Mercury"], element: ["Mercury", "  "] } }],
      { confidence: 0.3 },
    );
    expect(mentions).to.have.length(2);
    expect(triples).to.deep.equal([]);
  });
});
