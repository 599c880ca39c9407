import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { SnapshotFormatError } from "../src/errors.js";
import { normalizeGraph } from "../src/knowledge/normalizer.js";
import { VectorIndex } from "../src/memory/vectorIndex.js";
import type { KnowledgeSnapshotParts } from "../src/qa/snapshot.js";
import { SNAPSHOT_FILES, loadSnapshot, saveSnapshot } from "../src/storage/snapshotStore.js";
import { SATELLITE_MENTIONS, SATELLITE_TRIPLES } from "./helpers/knowledge.js";

function sampleParts(): KnowledgeSnapshotParts {
  const { graph, summary } = normalizeGraph({ mentions: SATELLITE_MENTIONS, triples: SATELLITE_TRIPLES });
  return {
    graph,
    summary,
    documentIndex: VectorIndex.build(
      { "doc-1#0": [1, 0, 0], "doc-2#0": [0, 1, 0] },
      { dimension: 3, collection: "documents" },
    ),
    chunks: new Map([
      ["doc-2#0", { id: "doc-2#0", documentId: "doc-2", ordinal: 0, text: "The Imager scans the disc." }],
      ["doc-1#0", { id: "doc-1#0", documentId: "doc-1", ordinal: 0, text: "INSAT-3D is geostationary." }],
    ]),
    faqIndex: VectorIndex.build({ "faq-1": [0, 0, 1] }, { dimension: 3, collection: "faqs" }),
    faqs: new Map([["faq-1", { id: "faq-1", question: "What is INSAT-3D?", answer: null }]]),
  };
}

async function loadError(directory: string): Promise<unknown> {
  try {
    await loadSnapshot(directory);
  } catch (error) {
    return error;
  }
  throw new Error("expected loadSnapshot to fail");
}

describe("snapshot store", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "hybrid-qa-snapshot-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("round-trips every part of a snapshot", async () => {
    const parts = sampleParts();
    const manifest = await saveSnapshot(directory, parts, () => new Date("2026-02-03T04:05:06.000Z"));

    expect(manifest).to.deep.include({
      version: 1,
      savedAt: "2026-02-03T04:05:06.000Z",
      dimension: 3,
      counts: { entities: 4, edges: 3, aliases: 4, chunks: 2, faqs: 1 },
    });
    expect((await readdir(directory)).sort()).to.deep.equal([
      "documents.json",
      "faqs.json",
      "graph.json",
      "manifest.json",
    ]);

    const loaded = await loadSnapshot(directory);
    expect(loaded.manifest).to.deep.equal(manifest);
    expect(loaded.parts.graph.toJSON()).to.deep.equal(parts.graph.toJSON());
    expect([...loaded.parts.chunks.keys()]).to.deep.equal(["doc-1#0", "doc-2#0"]);
    expect(loaded.parts.chunks.get("doc-2#0")).to.deep.equal(parts.chunks.get("doc-2#0"));
    expect(loaded.parts.faqs.get("faq-1")).to.deep.equal({ id: "faq-1", question: "What is INSAT-3D?", answer: null });
    expect(loaded.parts.documentIndex?.query([0, 1, 0], 1)).to.deep.equal([{ id: "doc-2#0", similarity: 1 }]);
    expect(loaded.parts.summary).to.deep.equal(parts.summary);
  });

  it("leaves a collection unavailable when it was saved without an index", async () => {
    await saveSnapshot(directory, { ...sampleParts(), faqIndex: null });
    const loaded = await loadSnapshot(directory);
    expect(loaded.parts.faqIndex).to.equal(null);
    expect(loaded.parts.faqs.size).to.equal(0);
    expect(loaded.parts.documentIndex?.size).to.equal(2);
  });

  it("rejects a snapshot whose graph file is missing", async () => {
    await saveSnapshot(directory, sampleParts());
    await unlink(join(directory, SNAPSHOT_FILES.graph));
    const error = await loadError(directory);
    expect(error).to.be.instanceOf(SnapshotFormatError);
    expect(error).to.have.property("message", "snapshot file graph.json is invalid: file is missing");
  });

  it("rejects corrupt and schema-violating files", async () => {
    await saveSnapshot(directory, sampleParts());
    await writeFile(join(directory, SNAPSHOT_FILES.graph), "{not json", "utf8");
    expect(await loadError(directory)).to.have.property("message", "snapshot file graph.json is invalid: not valid JSON");

    await saveSnapshot(directory, sampleParts());
    await writeFile(join(directory, SNAPSHOT_FILES.faqs), JSON.stringify({ index: {}, entries: [] }), "utf8");
    const error = await loadError(directory);
    expect(error).to.be.instanceOf(SnapshotFormatError);
    expect(error).to.have.property("file", "faqs.json");
  });
});
