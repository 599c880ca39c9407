import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { ERROR_CODES } from "../src/errors.js";
import { normalizeGraph } from "../src/knowledge/normalizer.js";
import { VectorIndex } from "../src/memory/vectorIndex.js";
import { HybridQueryEngine } from "../src/qa/engine.js";
import { SnapshotRegistry } from "../src/qa/snapshot.js";
import { createQaServer } from "../src/server.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { FixedEmbedder, SATELLITE_MENTIONS, SATELLITE_TRIPLES } from "./helpers/knowledge.js";

const FAQ_QUESTION = "Is INSAT-3D geostationary?";

/**
 * Exercises the MCP surface through an in-memory transport pair so the tool
 * registration, input schemas and error envelopes are covered end to end.
 */
describe("qa MCP tools", () => {
  let server: McpServer;
  let client: Client;
  let logger: RecordingLogger;

  beforeEach(async () => {
    logger = new RecordingLogger();
    const registry = new SnapshotRegistry({ now: () => new Date("2026-03-01T00:00:00.000Z") });
    const { graph, summary } = normalizeGraph({ mentions: SATELLITE_MENTIONS, triples: SATELLITE_TRIPLES });
    registry.publish({
      graph,
      summary,
      documentIndex: null,
      chunks: new Map(),
      faqIndex: VectorIndex.build({ "faq-1": [0, 1] }, { collection: "faqs" }),
      faqs: new Map([["faq-1", { id: "faq-1", question: FAQ_QUESTION, answer: "Yes." }]]),
    });
    const engine = new HybridQueryEngine({
      registry,
      embedder: new FixedEmbedder(2, { [FAQ_QUESTION]: [0, 1] }),
      logger,
    });

    server = createQaServer({ engine, registry, logger });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "qa-tools-test", version: "1.0.0-test" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("lists both tools", async () => {
    const listed = await client.listTools({});
    expect(listed.tools.map((tool) => tool.name).sort()).to.deep.equal(["qa_ask", "qa_snapshot_status"]);
  });

  it("reports the served snapshot", async () => {
    const response = await client.callTool({ name: "qa_snapshot_status", arguments: {} });
    expect(response.structuredContent).to.deep.equal({
      ok: true,
      tool: "qa_snapshot_status",
      result: {
        generation: 1,
        publishedAt: "2026-03-01T00:00:00.000Z",
        entities: 4,
        edges: 3,
        aliases: 4,
        chunks: 0,
        faqs: 1,
        documentIndex: "unavailable",
        faqIndex: "ready",
      },
    });
  });

  it("answers through qa_ask", async () => {
    const response = await client.callTool({ name: "qa_ask", arguments: { question: FAQ_QUESTION } });
    expect(response.isError).to.not.equal(true);
    expect(response.structuredContent).to.have.nested.property("result.kind", "direct_answer");
    expect(response.structuredContent).to.have.nested.property("result.answer", "Yes.");
    expect(response.structuredContent).to.have.nested.property("result.diagnostics.documents.status", "unavailable");
  });

  it("returns a failure envelope for a blank question", async () => {
    const response = await client.callTool({ name: "qa_ask", arguments: { question: "   " } });
    expect(response.isError).to.equal(true);
    expect(response.content).to.deep.equal([
      {
        type: "text",
        text: JSON.stringify(
          { ok: false, code: ERROR_CODES.QUERY_INVALID_INPUT, message: "question must not be empty", tool: "qa_ask" },
          null,
          2,
        ),
      },
    ]);
    expect(logger.find("qa_ask_failed")?.payload).to.deep.equal({
      code: ERROR_CODES.QUERY_INVALID_INPUT,
      message: "question must not be empty",
    });
  });
});
