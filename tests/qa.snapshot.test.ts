import { describe, it } from "mocha";
import { expect } from "chai";

import { normalizeGraph } from "../src/knowledge/normalizer.js";
import { VectorIndex } from "../src/memory/vectorIndex.js";
import { SnapshotRegistry } from "../src/qa/snapshot.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { SATELLITE_MENTIONS, SATELLITE_TRIPLES } from "./helpers/knowledge.js";

describe("snapshot registry", () => {
  const { graph, summary } = normalizeGraph({ mentions: SATELLITE_MENTIONS, triples: SATELLITE_TRIPLES });

  it("reports an empty status before anything is published", () => {
    expect(new SnapshotRegistry().status()).to.deep.equal({
      generation: 0,
      publishedAt: null,
      entities: 0,
      edges: 0,
      aliases: 0,
      chunks: 0,
      faqs: 0,
      documentIndex: "unavailable",
      faqIndex: "unavailable",
    });
  });

  it("swaps in frozen snapshots and bumps the generation", () => {
    const logger = new RecordingLogger();
    const registry = new SnapshotRegistry({ logger, now: () => new Date("2026-01-01T00:00:00.000Z") });
    const chunks = new Map([["doc#0", { id: "doc#0", documentId: "doc", ordinal: 0, text: "Passage." }]]);

    const first = registry.publish({
      graph,
      documentIndex: VectorIndex.build({ "doc#0": [1, 0] }, { collection: "documents" }),
      chunks,
      faqIndex: null,
      faqs: new Map(),
      summary,
    });
    chunks.set("doc#1", { id: "doc#1", documentId: "doc", ordinal: 1, text: "Later." });

    expect(first.generation).to.equal(1);
    expect(Object.isFrozen(first)).to.equal(true);
    expect(first.chunks.size).to.equal(1);
    expect(registry.status()).to.deep.equal({
      generation: 1,
      publishedAt: "2026-01-01T00:00:00.000Z",
      entities: 4,
      edges: 3,
      aliases: 4,
      chunks: 1,
      faqs: 0,
      documentIndex: "ready",
      faqIndex: "unavailable",
    });

    const second = registry.publish({ graph, documentIndex: null, chunks: new Map(), faqIndex: null, faqs: new Map() });
    expect(second.generation).to.equal(2);
    expect(registry.current()).to.equal(second);
    expect(first.documentIndex).to.not.equal(null);
    expect(logger.messages()).to.deep.equal(["snapshot_published", "snapshot_published"]);
  });
});
