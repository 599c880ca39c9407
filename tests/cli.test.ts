import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { __testing, runCli } from "../src/cli.js";
import { ERROR_CODES } from "../src/errors.js";
import { contentId } from "../src/text/normalise.js";
import { SATELLITE_MENTIONS, SATELLITE_TRIPLES } from "./helpers/knowledge.js";

const { parseArgs } = __testing;

describe("cli argument parsing", () => {
  it("collects the question words of ask", () => {
    expect(parseArgs(["ask", "--snapshot", "snap", "What", "is", "it?"])).to.deep.equal({
      command: "ask",
      snapshot: "snap",
      question: "What is it?",
      format: "text",
    });
  });

  it("reads the optional flags", () => {
    expect(parseArgs(["build", "--input", "bundle.json", "--out", "out", "--dimension", "64"])).to.deep.equal({
      command: "build",
      input: "bundle.json",
      out: "out",
      dimension: 64,
    });
    expect(parseArgs(["ask", "--snapshot", "s", "--format", "json", "--timeout-ms", "500", "q"])).to.deep.include({
      format: "json",
      timeoutMs: 500,
    });
  });

  it("falls back to help without a command", () => {
    expect(parseArgs([])).to.deep.equal({ command: "help" });
  });

  it("rejects incomplete or unknown arguments", () => {
    expect(() => parseArgs(["build", "--input", "x"])).to.throw("build requires --input <bundle.json> and --out <dir>");
    expect(() => parseArgs(["ask", "--dimension", "0"])).to.throw("--dimension expects a positive integer");
    expect(() => parseArgs(["serve", "--port", "1"])).to.throw("Unknown argument '--port'");
    expect(() => parseArgs(["ask", "--snapshot", "s"])).to.throw("ask requires --snapshot <dir> and a question");
  });
});

describe("cli commands", () => {
  let directory: string;
  let output: string[];
  let errors: string[];
  const print = (line: string) => output.push(line);
  const printError = (line: string) => errors.push(line);

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "hybrid-qa-cli-"));
    output = [];
    errors = [];
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("builds a snapshot and answers from it", async () => {
    const bundlePath = path.join(directory, "bundle.json");
    const snapshotDir = path.join(directory, "snapshot");
    await writeFile(
      bundlePath,
      JSON.stringify({
        mentions: SATELLITE_MENTIONS,
        triples: SATELLITE_TRIPLES,
        documents: [{ documentId: "doc-1", text: "INSAT-3D observes the weather from geostationary orbit." }],
        faqs: [{ question: "What is INSAT-3D?", answer: "A weather satellite." }],
      }),
      "utf8",
    );

    expect(await runCli(["build", "--input", bundlePath, "--out", snapshotDir, "--dimension", "64"], print, printError)).to.equal(0);
    expect(JSON.parse(output[0])).to.deep.equal({
      out: snapshotDir,
      entities: 4,
      edges: 3,
      conflicts: 0,
      malformed: 0,
      chunks: 1,
      faqs: 1,
      questionOnlyFaqs: 0,
      issues: [],
    });

    expect(await runCli(["ask", "--snapshot", snapshotDir, "What", "is", "INSAT-3D?"], print, printError)).to.equal(0);
    expect(output[1]).to.equal(
      `A weather satellite.\n\n(FAQ ${contentId("faq", "what is insat-3d")}, similarity 1.000)`,
    );

    expect(
      await runCli(["ask", "--snapshot", snapshotDir, "--format", "json", "What is INSAT-3D?"], print, printError),
    ).to.equal(0);
    expect(JSON.parse(output[2])).to.include({ kind: "direct_answer", answer: "A weather satellite." });
    expect(errors).to.deep.equal([]);
  });

  it("exits with 1 and the error code when the snapshot is missing", async () => {
    const missing = path.join(directory, "nowhere");
    expect(await runCli(["ask", "--snapshot", missing, "anything"], print, printError)).to.equal(1);
    expect(errors).to.deep.equal([
      `${ERROR_CODES.SNAPSHOT_FORMAT}: snapshot file manifest.json is invalid: file is missing`,
    ]);
  });

  it("exits with 1 when the bundle is not JSON", async () => {
    const bundlePath = path.join(directory, "broken.json");
    await writeFile(bundlePath, "{", "utf8");
    expect(await runCli(["build", "--input", bundlePath, "--out", directory], print, printError)).to.equal(1);
    expect(errors).to.deep.equal([`${ERROR_CODES.INPUT_MALFORMED}: ${bundlePath} is not valid JSON`]);
  });

  it("exits with 2 and prints usage on bad arguments", async () => {
    expect(await runCli(["frobnicate"], print, printError)).to.equal(2);
    expect(errors[0]).to.equal("Unknown command 'frobnicate'");
    expect(errors[1]).to.equal("Usage:");
    expect(output).to.deep.equal([]);
  });
});
