import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { toToolFailure } from "./errors.js";
import type { StructuredLogger } from "./logger.js";
import type { HybridQueryEngine } from "./qa/engine.js";
import type { SnapshotRegistry } from "./qa/snapshot.js";

export const SERVER_NAME = "hybrid-qa";
export const SERVER_VERSION = "0.1.0";

const QaAskInputSchema = z
  .object({
    question: z.string().min(1).max(4_000),
    history: z
      .array(z.object({ question: z.string(), answer: z.string() }).strict())
      .max(50)
      .optional(),
    timeout_ms: z.number().int().positive().max(120_000).optional(),
  })
  .strict();
const QaAskInputShape = QaAskInputSchema.shape;

const QaSnapshotStatusInputSchema = z.object({}).strict();
const QaSnapshotStatusInputShape = QaSnapshotStatusInputSchema.shape;

export interface QaServerDependencies {
  engine: HybridQueryEngine;
  registry: SnapshotRegistry;
  logger: StructuredLogger;
}

const j = (o: unknown) => JSON.stringify(o, null, 2);

function success(tool: string, result: unknown): CallToolResult {
  const payload = { ok: true, tool, result };
  return { content: [{ type: "text", text: j(payload) }], structuredContent: payload };
}

function failure(logger: StructuredLogger, tool: string, error: unknown): CallToolResult {
  const normalised = toToolFailure(error);
  logger.error(`${tool}_failed`, { code: normalised.code, message: normalised.message });
  const payload = { ...normalised, tool };
  return { isError: true, content: [{ type: "text", text: j(payload) }] };
}

/**
 * Creates an MCP server exposing the query engine. The transport is left to
 * the caller: the CLI connects stdio, tests connect an in-memory pair.
 */
export function createQaServer(dependencies: QaServerDependencies): McpServer {
  const { engine, registry, logger } = dependencies;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "qa_ask",
    {
      title: "Ask",
      description:
        "Answers a question from the knowledge graph, the document index and the FAQ index, returning the fused evidence.",
      inputSchema: QaAskInputShape,
    },
    async (input: unknown) => {
      try {
        const parsed = QaAskInputSchema.parse(input ?? {});
        const options: Parameters<HybridQueryEngine["answer"]>[1] = {};
        if (parsed.history) {
          options.history = parsed.history;
        }
        if (parsed.timeout_ms !== undefined) {
          options.timeoutMs = parsed.timeout_ms;
        }
        const outcome = await engine.answer(parsed.question, options);
        return success("qa_ask", outcome);
      } catch (error) {
        return failure(logger, "qa_ask", error);
      }
    },
  );

  server.registerTool(
    "qa_snapshot_status",
    {
      title: "Snapshot status",
      description: "Reports the generation and sizes of the knowledge snapshot currently served.",
      inputSchema: QaSnapshotStatusInputShape,
    },
    async () => success("qa_snapshot_status", registry.status()),
  );

  return server;
}
