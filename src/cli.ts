#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { parseKnowledgeBundle } from "./build/ingest.js";
import { buildKnowledgeBase } from "./build/knowledgeBase.js";
import { loadEngineConfig } from "./config/engine.js";
import { readOptionalString } from "./config/env.js";
import { ERROR_CODES, HybridQaError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { HashingEmbedder } from "./memory/embedding.js";
import { HybridQueryEngine, type QueryOutcome } from "./qa/engine.js";
import { SnapshotRegistry } from "./qa/snapshot.js";
import { createQaServer } from "./server.js";
import { loadSnapshot, saveSnapshot } from "./storage/snapshotStore.js";

/** Embedding dimension used when neither the flag nor the snapshot names one. */
const DEFAULT_DIMENSION = 256;

type CliCommand =
  | { readonly command: "build"; readonly input: string; readonly out: string; readonly dimension?: number }
  | {
      readonly command: "ask";
      readonly snapshot: string;
      readonly question: string;
      readonly format: "text" | "json";
      readonly dimension?: number;
      readonly timeoutMs?: number;
    }
  | { readonly command: "serve"; readonly snapshot: string; readonly dimension?: number }
  | { readonly command: "help" };

type Print = (line: string) => void;

function parsePositiveInt(flag: string, value: string | undefined): number {
  if (!value || !/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new Error(`${flag} expects a positive integer`);
  }
  return Number.parseInt(value, 10);
}

function parseArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (!command || command === "help" || command === "--help" || command === "-h") {
    return { command: "help" };
  }
  if (command !== "build" && command !== "ask" && command !== "serve") {
    throw new Error(`Unknown command '${command}'`);
  }

  let input: string | undefined;
  let out: string | undefined;
  let snapshot: string | undefined;
  let dimension: number | undefined;
  let timeoutMs: number | undefined;
  let format: "text" | "json" = "text";
  const words: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--input":
        input = rest[++i];
        if (!input) {
          throw new Error("--input expects a path");
        }
        break;
      case "--out":
        out = rest[++i];
        if (!out) {
          throw new Error("--out expects a directory");
        }
        break;
      case "--snapshot":
        snapshot = rest[++i];
        if (!snapshot) {
          throw new Error("--snapshot expects a directory");
        }
        break;
      case "--dimension":
        dimension = parsePositiveInt("--dimension", rest[++i]);
        break;
      case "--timeout-ms":
        timeoutMs = parsePositiveInt("--timeout-ms", rest[++i]);
        break;
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new Error("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      default:
        if (token.startsWith("--")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        words.push(token);
    }
  }

  const withDimension = dimension === undefined ? {} : { dimension };
  switch (command) {
    case "build":
      if (!input || !out) {
        throw new Error("build requires --input <bundle.json> and --out <dir>");
      }
      if (words.length > 0) {
        throw new Error(`Unexpected argument '${words[0]}'`);
      }
      return { command, input, out, ...withDimension };
    case "ask": {
      const question = words.join(" ").trim();
      if (!snapshot || !question) {
        throw new Error("ask requires --snapshot <dir> and a question");
      }
      return { command, snapshot, question, format, ...withDimension, ...(timeoutMs === undefined ? {} : { timeoutMs }) };
    }
    case "serve":
      if (!snapshot) {
        throw new Error("serve requires --snapshot <dir>");
      }
      return { command, snapshot, ...withDimension };
  }
}

/** Logs go to `QA_LOG_FILE` only; stdout carries command output or the MCP stream. */
function createCliLogger(): StructuredLogger {
  return new StructuredLogger({ logFile: readOptionalString("QA_LOG_FILE") ?? null, stdout: false });
}

function formatOutcome(outcome: QueryOutcome): string {
  switch (outcome.kind) {
    case "direct_answer":
      return `${outcome.answer}\n\n(FAQ ${outcome.faq.faqId}, similarity ${outcome.faq.rawScore.toFixed(3)})`;
    case "no_evidence":
      return outcome.message;
    case "evidence":
      return outcome.answer ?? outcome.prompt;
  }
}

async function runBuild(options: Extract<CliCommand, { command: "build" }>, print: Print): Promise<void> {
  const logger = createCliLogger();
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(options.input, "utf8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new HybridQaError(ERROR_CODES.INPUT_MALFORMED, `${options.input} is not valid JSON`, { cause: error });
    }
    throw error;
  }
  const parsed = parseKnowledgeBundle(raw);
  const config = loadEngineConfig();
  const { parts, report } = await buildKnowledgeBase(
    parsed.input,
    { embedder: new HashingEmbedder(options.dimension ?? DEFAULT_DIMENSION), config, logger },
    { issues: parsed.issues, duplicateFaqs: parsed.duplicateFaqs },
  );
  await saveSnapshot(options.out, parts);
  await logger.flush();
  print(
    JSON.stringify(
      {
        out: options.out,
        entities: report.graph.entities,
        edges: report.graph.edges,
        conflicts: report.graph.conflicts.length,
        malformed: report.graph.malformed.length,
        chunks: report.documents.chunksIndexed,
        faqs: report.faqs.indexed,
        questionOnlyFaqs: report.faqs.questionOnly,
        issues: report.issues,
      },
      null,
      2,
    ),
  );
}

async function openEngine(
  snapshotDir: string,
  dimension: number | undefined,
  logger: StructuredLogger,
): Promise<{ engine: HybridQueryEngine; registry: SnapshotRegistry }> {
  const { parts, manifest } = await loadSnapshot(snapshotDir);
  const registry = new SnapshotRegistry({ logger });
  registry.publish(parts);
  const embedder = new HashingEmbedder(dimension ?? manifest.dimension ?? DEFAULT_DIMENSION);
  const engine = new HybridQueryEngine({ registry, embedder, config: loadEngineConfig(), logger });
  return { engine, registry };
}

async function runAsk(options: Extract<CliCommand, { command: "ask" }>, print: Print): Promise<void> {
  const logger = createCliLogger();
  const { engine } = await openEngine(options.snapshot, options.dimension, logger);
  const outcome = await engine.answer(
    options.question,
    options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs },
  );
  await logger.flush();
  print(options.format === "json" ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome));
}

async function runServe(options: Extract<CliCommand, { command: "serve" }>): Promise<void> {
  const logger = createCliLogger();
  const { engine, registry } = await openEngine(options.snapshot, options.dimension, logger);
  const server = createQaServer({ engine, registry, logger });
  await server.connect(new StdioServerTransport());
  logger.info("stdio_listening", { snapshot: options.snapshot, generation: registry.generation });

  process.on("SIGINT", () => {
    logger.warn("shutdown_signal", { signal: "SIGINT" });
    server
      .close()
      .catch((error: unknown) => {
        logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
      })
      .finally(() => {
        void logger.flush().then(() => process.exit(0));
      });
  });
}

function printUsage(print: Print): void {
  print("Usage:");
  print("  hybrid-qa build --input <bundle.json> --out <dir> [--dimension 256]");
  print("  hybrid-qa ask --snapshot <dir> [--format text|json] [--timeout-ms n] [--dimension n] <question...>");
  print("  hybrid-qa serve --snapshot <dir> [--dimension n]");
}

/** Runs one CLI invocation and resolves to the process exit code. */
export async function runCli(argv: readonly string[], print: Print = console.log, printError: Print = console.error): Promise<number> {
  let options: CliCommand;
  try {
    options = parseArgs(argv);
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error));
    printUsage(printError);
    return 2;
  }

  try {
    switch (options.command) {
      case "help":
        printUsage(print);
        break;
      case "build":
        await runBuild(options, print);
        break;
      case "ask":
        await runAsk(options, print);
        break;
      case "serve":
        await runServe(options);
        break;
    }
    return 0;
  } catch (error) {
    if (error instanceof HybridQaError) {
      printError(`${error.code}: ${error.message}${error.hint ? ` (${error.hint})` : ""}`);
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  // npm links the bin through a symlink.
  return fileURLToPath(import.meta.url) === realpathSync(executedFromCli);
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

export const __testing = {
  parseArgs,
  formatOutcome,
};
