import { z } from "zod";

import { ERROR_CODES, HybridQaError } from "../errors.js";
import type { DocumentEntities } from "../knowledge/cooccurrence.js";
import type { RawMention, RawTriple } from "../knowledge/types.js";
import { chunkId, type ChunkableDocument } from "../memory/chunker.js";
import type { FaqEntry } from "../qa/faqMatcher.js";
import { canonicalAlias, contentId, sanitizeText } from "../text/normalise.js";

/** Upstream record rejected before it reached the pipeline. */
export interface IngestIssue {
  section: "mentions" | "triples" | "documentEntities" | "documents" | "chunks" | "faqs";
  index: number;
  reason: string;
}

/** Pre-chunked passage supplied by the text-extraction collaborator. */
export interface ChunkInput {
  id: string;
  documentId: string;
  text: string;
}

/** Validated input of one offline build. */
export interface KnowledgeBaseInput {
  mentions: RawMention[];
  triples: RawTriple[];
  documentEntities: DocumentEntities[];
  documents: ChunkableDocument[];
  chunks: ChunkInput[];
  faqs: FaqEntry[];
}

export interface ParsedBundle {
  input: KnowledgeBaseInput;
  issues: IngestIssue[];
  /** FAQ records dropped because their question repeated an earlier one. */
  duplicateFaqs: number;
}

const optionalString = z.string().nullish();

const MentionSchema = z.object({
  text: z.string(),
  type: optionalString,
  source: optionalString,
});

/** Missing endpoints are left to the normaliser, which reports them as malformed. */
const TripleSchema = z.object({
  subject: optionalString,
  predicate: optionalString,
  object: optionalString,
  subjectType: optionalString,
  objectType: optionalString,
  confidence: z.number().nullish(),
  source: optionalString,
});

const DocumentEntitiesSchema = z
  .object({
    documentId: z.string().optional(),
    filename: z.string().optional(),
    entities: z.record(z.array(z.string())),
  })
  .refine((value) => Boolean(value.documentId ?? value.filename), { message: "documentId is required" });

const DocumentSchema = z
  .object({
    documentId: z.string().optional(),
    id: z.string().optional(),
    filename: z.string().optional(),
    text: z.string(),
  })
  .refine((value) => Boolean(value.documentId ?? value.id ?? value.filename), { message: "documentId is required" });

const ChunkSchema = z.object({
  id: z.string().optional(),
  documentId: z.string().min(1),
  text: z.string(),
});

const QUESTION_KEYS = ["question", "q", "Question", "Q"] as const;
const ANSWER_KEYS = ["answer", "a", "Answer", "A"] as const;

const FaqRecordSchema = z.record(z.unknown());

const BundleSchema = z
  .object({
    mentions: z.array(z.unknown()).default([]),
    triples: z.array(z.unknown()).default([]),
    documentEntities: z.array(z.unknown()).default([]),
    documents: z.array(z.unknown()).default([]),
    chunks: z.array(z.unknown()).default([]),
    faqs: z.union([z.array(z.unknown()), z.record(z.unknown())]).default([]),
  })
  .passthrough();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function firstString(record: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return "";
}

function parseSection<T, S extends z.ZodTypeAny>(
  section: IngestIssue["section"],
  records: readonly unknown[],
  schema: S,
  convert: (value: z.infer<S>) => T,
  issues: IngestIssue[],
): T[] {
  const result: T[] = [];
  records.forEach((record, index) => {
    const parsed = schema.safeParse(record);
    if (!parsed.success) {
      issues.push({ section, index, reason: describeIssues(parsed.error) });
      return;
    }
    result.push(convert(parsed.data));
  });
  return result;
}

/**
 * Reads FAQ records in any of the accepted shapes: `{question, answer}` with
 * the `q`/`Question`/`Q` and `a`/`Answer`/`A` spellings, or a plain
 * `{ "<question>": "<answer>" }` dictionary, either as the whole section or as
 * one element of the list. Blank answers produce question-only entries.
 */
function parseFaqs(raw: unknown[] | Record<string, unknown>, issues: IngestIssue[]): { faqs: FaqEntry[]; duplicates: number } {
  const pairs: Array<{ index: number; id: string | null; question: string; answer: string }> = [];
  const fromDictionary = (dictionary: Record<string, unknown>, index: number) => {
    for (const [question, answer] of Object.entries(dictionary)) {
      pairs.push({ index, id: null, question, answer: typeof answer === "string" ? answer : "" });
    }
  };

  if (Array.isArray(raw)) {
    raw.forEach((record, index) => {
      const parsed = FaqRecordSchema.safeParse(record);
      if (!parsed.success) {
        issues.push({ section: "faqs", index, reason: describeIssues(parsed.error) });
        return;
      }
      const fields = parsed.data;
      const hasKnownKey = [...QUESTION_KEYS, ...ANSWER_KEYS].some((key) => key in fields);
      if (!hasKnownKey && Object.values(fields).every((value) => typeof value === "string")) {
        fromDictionary(fields, index);
        return;
      }
      const id = typeof fields.id === "string" && fields.id.trim() ? fields.id.trim() : null;
      pairs.push({ index, id, question: firstString(fields, QUESTION_KEYS), answer: firstString(fields, ANSWER_KEYS) });
    });
  } else {
    fromDictionary(raw, 0);
  }

  const faqs: FaqEntry[] = [];
  const seen = new Map<string, FaqEntry>();
  let duplicates = 0;
  for (const pair of pairs) {
    const question = sanitizeText(pair.question);
    const key = canonicalAlias(question);
    if (!key) {
      issues.push({ section: "faqs", index: pair.index, reason: "question is empty" });
      continue;
    }
    const answer = sanitizeText(pair.answer);
    const existing = seen.get(key);
    if (existing) {
      duplicates += 1;
      if (existing.answer === null && answer) {
        existing.answer = answer;
      }
      continue;
    }
    const entry: FaqEntry = { id: pair.id ?? contentId("faq", key), question, answer: answer || null };
    seen.set(key, entry);
    faqs.push(entry);
  }
  return { faqs, duplicates };
}

/**
 * Validates a raw knowledge bundle record by record. Records with the wrong
 * shape are skipped and reported; only a bundle that is not an object at all
 * is rejected.
 */
export function parseKnowledgeBundle(raw: unknown): ParsedBundle {
  const bundle = BundleSchema.safeParse(raw);
  if (!bundle.success) {
    throw new HybridQaError(ERROR_CODES.INPUT_MALFORMED, `knowledge bundle is invalid: ${describeIssues(bundle.error)}`, {
      hint: "expected an object with mentions, triples, documentEntities, documents, chunks and faqs",
    });
  }
  const sections = bundle.data;
  const issues: IngestIssue[] = [];

  const mentions = parseSection("mentions", sections.mentions, MentionSchema, (value): RawMention => value, issues);
  const triples = parseSection(
    "triples",
    sections.triples,
    TripleSchema,
    (value): RawTriple => ({ ...value, subject: value.subject ?? "", object: value.object ?? "" }),
    issues,
  );
  const documentEntities = parseSection(
    "documentEntities",
    sections.documentEntities,
    DocumentEntitiesSchema,
    (value): DocumentEntities => ({ documentId: value.documentId ?? value.filename ?? "", entities: value.entities }),
    issues,
  );
  const documents = parseSection(
    "documents",
    sections.documents,
    DocumentSchema,
    (value): ChunkableDocument => ({ documentId: value.documentId ?? value.id ?? value.filename ?? "", text: value.text }),
    issues,
  );
  const chunks: ChunkInput[] = [];
  const ordinals = new Map<string, number>();
  sections.chunks.forEach((record, index) => {
    const parsed = ChunkSchema.safeParse(record);
    if (!parsed.success) {
      issues.push({ section: "chunks", index, reason: describeIssues(parsed.error) });
      return;
    }
    const ordinal = ordinals.get(parsed.data.documentId) ?? 0;
    ordinals.set(parsed.data.documentId, ordinal + 1);
    chunks.push({
      id: parsed.data.id ?? chunkId(parsed.data.documentId, ordinal),
      documentId: parsed.data.documentId,
      text: parsed.data.text,
    });
  });
  const { faqs, duplicates } = parseFaqs(sections.faqs, issues);

  return {
    input: { mentions, triples, documentEntities, documents, chunks, faqs },
    issues,
    duplicateFaqs: duplicates,
  };
}
