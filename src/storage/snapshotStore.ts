import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import { SnapshotFormatError } from "../errors.js";
import { GRAPH_FORMAT_VERSION, GraphSnapshot } from "../knowledge/graphSnapshot.js";
import type { NormalizationSummary } from "../knowledge/types.js";
import type { DocumentChunk } from "../memory/chunker.js";
import { VECTOR_INDEX_FORMAT_VERSION, VectorIndex } from "../memory/vectorIndex.js";
import type { FaqEntry } from "../qa/faqMatcher.js";
import type { KnowledgeSnapshotParts } from "../qa/snapshot.js";
import { compareText } from "../text/normalise.js";

export const SNAPSHOT_FILES = {
  graph: "graph.json",
  documents: "documents.json",
  faqs: "faqs.json",
  manifest: "manifest.json",
} as const;

export const SNAPSHOT_FORMAT_VERSION = 1;

export interface SnapshotManifest {
  version: number;
  savedAt: string;
  dimension: number | null;
  counts: { entities: number; edges: number; aliases: number; chunks: number; faqs: number };
  summary: NormalizationSummary | null;
}

export interface LoadedSnapshot {
  parts: KnowledgeSnapshotParts;
  manifest: SnapshotManifest;
}

const EntitySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  type: z.string().min(1),
  aliases: z.array(z.string()),
  sources: z.array(z.string()),
  mentions: z.number().int().nonnegative(),
});

const EdgeSchema = z.object({
  subject: z.string().min(1),
  predicate: z.string().min(1),
  object: z.string().min(1),
  confidence: z.number().min(0).max(1),
  sources: z.array(z.string()),
});

const GraphFileSchema = z.object({
  version: z.literal(GRAPH_FORMAT_VERSION),
  entities: z.array(EntitySchema),
  edges: z.array(EdgeSchema),
  aliases: z.record(z.string()),
});

const VectorIndexSchema = z.object({
  version: z.literal(VECTOR_INDEX_FORMAT_VERSION),
  collection: z.string(),
  dimension: z.number().int().positive().nullable(),
  items: z.array(z.object({ id: z.string().min(1), vector: z.array(z.number()) })),
});

const DocumentsFileSchema = z.object({
  index: VectorIndexSchema,
  chunks: z.array(
    z.object({
      id: z.string().min(1),
      documentId: z.string().min(1),
      ordinal: z.number().int().nonnegative(),
      text: z.string(),
    }),
  ),
});

const FaqsFileSchema = z.object({
  index: VectorIndexSchema,
  entries: z.array(z.object({ id: z.string().min(1), question: z.string().min(1), answer: z.string().nullable() })),
});

const SummarySchema = z.object({
  mentionsSeen: z.number(),
  triplesSeen: z.number(),
  entities: z.number(),
  edges: z.number(),
  fuzzyMerges: z.number(),
  duplicateEdges: z.number(),
  defaultTyped: z.number(),
  malformed: z.array(z.object({ kind: z.enum(["mention", "triple"]), index: z.number(), reason: z.string() })),
  conflicts: z.array(
    z.object({
      alias: z.string(),
      match: z.enum(["exact", "fuzzy"]),
      entityIds: z.array(z.string()),
      types: z.array(z.string()),
      resolvedTo: z.string().nullable(),
    }),
  ),
  droppedEdges: z.array(
    z.object({
      index: z.number(),
      reason: z.enum(["unresolved_entity", "self_loop"]),
      subject: z.string(),
      predicate: z.string(),
      object: z.string(),
    }),
  ),
});

const ManifestSchema = z.object({
  version: z.literal(SNAPSHOT_FORMAT_VERSION),
  savedAt: z.string(),
  dimension: z.number().int().positive().nullable(),
  counts: z.object({
    entities: z.number().int().nonnegative(),
    edges: z.number().int().nonnegative(),
    aliases: z.number().int().nonnegative(),
    chunks: z.number().int().nonnegative(),
    faqs: z.number().int().nonnegative(),
  }),
  summary: SummarySchema.nullable(),
});

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

async function writeJsonAtomic(filePath: string, payload: unknown): Promise<void> {
  // Unique staging name so concurrent saves never rename each other's file.
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  await writeFile(tmpPath, JSON.stringify(payload), "utf8");
  await rename(tmpPath, filePath);
}

/** Reads and validates one file; resolves to null when it does not exist and `optional` is set. */
async function readJson<S extends z.ZodTypeAny>(
  directory: string,
  file: string,
  schema: S,
  optional: boolean,
): Promise<z.infer<S> | null> {
  let raw: string;
  try {
    raw = await readFile(join(directory, file), "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      if (optional) {
        return null;
      }
      throw new SnapshotFormatError(file, "file is missing", error);
    }
    throw new SnapshotFormatError(file, error instanceof Error ? error.message : String(error), error);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotFormatError(file, "not valid JSON", error);
  }
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SnapshotFormatError(file, reason, parsed.error);
  }
  return parsed.data;
}

function restoreIndex(file: string, serialized: z.infer<typeof VectorIndexSchema>): VectorIndex {
  try {
    return VectorIndex.fromJSON(serialized);
  } catch (error) {
    throw new SnapshotFormatError(file, error instanceof Error ? error.message : String(error), error);
  }
}

function sortedById<T extends { id: string }>(values: Iterable<T>): T[] {
  return [...values].sort((a, b) => compareText(a.id, b.id));
}

/**
 * Persists a snapshot as four JSON files. Each file is staged and renamed, and
 * the manifest goes last so a reader never sees a manifest describing files
 * that are not in place yet. Collections without an index are not written.
 */
export async function saveSnapshot(
  directory: string,
  parts: KnowledgeSnapshotParts,
  now: () => Date = () => new Date(),
): Promise<SnapshotManifest> {
  await mkdir(directory, { recursive: true });
  await writeJsonAtomic(join(directory, SNAPSHOT_FILES.graph), parts.graph.toJSON());
  if (parts.documentIndex) {
    await writeJsonAtomic(join(directory, SNAPSHOT_FILES.documents), {
      index: parts.documentIndex.toJSON(),
      chunks: sortedById(parts.chunks.values()),
    });
  }
  if (parts.faqIndex) {
    await writeJsonAtomic(join(directory, SNAPSHOT_FILES.faqs), {
      index: parts.faqIndex.toJSON(),
      entries: sortedById(parts.faqs.values()),
    });
  }
  const manifest: SnapshotManifest = {
    version: SNAPSHOT_FORMAT_VERSION,
    savedAt: now().toISOString(),
    dimension: parts.documentIndex?.dimension ?? parts.faqIndex?.dimension ?? null,
    counts: {
      entities: parts.graph.entityCount,
      edges: parts.graph.edgeCount,
      aliases: parts.graph.aliasCount,
      chunks: parts.chunks.size,
      faqs: parts.faqs.size,
    },
    summary: parts.summary ?? null,
  };
  await writeJsonAtomic(join(directory, SNAPSHOT_FILES.manifest), manifest);
  return manifest;
}

/**
 * Loads a snapshot written by {@link saveSnapshot}. The graph and manifest are
 * required; a missing `documents.json` or `faqs.json` leaves that index
 * unavailable. Any unreadable or invalid file raises `SnapshotFormatError`.
 */
export async function loadSnapshot(directory: string): Promise<LoadedSnapshot> {
  const manifest = await readJson(directory, SNAPSHOT_FILES.manifest, ManifestSchema, false);
  const graphFile = await readJson(directory, SNAPSHOT_FILES.graph, GraphFileSchema, false);
  const documentsFile = await readJson(directory, SNAPSHOT_FILES.documents, DocumentsFileSchema, true);
  const faqsFile = await readJson(directory, SNAPSHOT_FILES.faqs, FaqsFileSchema, true);
  if (!manifest || !graphFile) {
    throw new SnapshotFormatError(SNAPSHOT_FILES.manifest, "snapshot is incomplete");
  }

  const graph = GraphSnapshot.fromJSON(graphFile);
  const chunks = new Map<string, DocumentChunk>((documentsFile?.chunks ?? []).map((chunk) => [chunk.id, chunk]));
  const faqs = new Map<string, FaqEntry>((faqsFile?.entries ?? []).map((entry) => [entry.id, entry]));

  return {
    parts: {
      graph,
      documentIndex: documentsFile ? restoreIndex(SNAPSHOT_FILES.documents, documentsFile.index) : null,
      chunks,
      faqIndex: faqsFile ? restoreIndex(SNAPSHOT_FILES.faqs, faqsFile.index) : null,
      faqs,
      summary: manifest.summary,
    },
    manifest,
  };
}
