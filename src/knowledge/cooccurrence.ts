import { canonicalAlias, compareText, sanitizeText } from "../text/normalise.js";
import { DEFAULT_PREDICATE, type RawMention, type RawTriple } from "./types.js";

/** Per-document entity lists as produced by the extraction collaborator. */
export interface DocumentEntities {
  documentId: string;
  /** Entity label (type) → surface forms found in the document. */
  entities: Record<string, readonly string[]>;
}

export interface CooccurrenceOptions {
  confidence: number;
  predicate?: string;
}

export interface CooccurrenceResult {
  mentions: RawMention[];
  triples: RawTriple[];
}

interface LabelledValue {
  text: string;
  key: string;
  type: string;
}

/**
 * Turns per-document entity lists into raw mentions plus one `related_to`
 * triple for every pair of distinct entities appearing in the same document.
 * Pairs are oriented by alias key so the same document always yields the
 * same triples.
 */
export function deriveCooccurrenceTriples(
  documents: readonly DocumentEntities[],
  options: CooccurrenceOptions,
): CooccurrenceResult {
  const predicate = options.predicate ?? DEFAULT_PREDICATE;
  const mentions: RawMention[] = [];
  const triples: RawTriple[] = [];

  for (const document of documents) {
    const source = sanitizeText(document.documentId);
    const values = new Map<string, LabelledValue>();
    for (const [label, surfaces] of Object.entries(document.entities)) {
      const type = sanitizeText(label);
      for (const surface of surfaces) {
        const text = sanitizeText(surface);
        const key = canonicalAlias(text);
        if (!key) {
          continue;
        }
        mentions.push({ text, type: type || null, source: source || null });
        const identity = `${type.toLowerCase()}\u001f${key}`;
        if (!values.has(identity)) {
          values.set(identity, { text, key, type });
        }
      }
    }

    const ordered = [...values.values()].sort((a, b) => compareText(a.key, b.key) || compareText(a.type, b.type));
    for (let i = 0; i < ordered.length; i += 1) {
      for (let j = i + 1; j < ordered.length; j += 1) {
        const a = ordered[i];
        const b = ordered[j];
        if (a.key === b.key) {
          continue;
        }
        triples.push({
          subject: a.text,
          subjectType: a.type || null,
          predicate,
          object: b.text,
          objectType: b.type || null,
          confidence: options.confidence,
          source: source || null,
        });
      }
    }
  }

  return { mentions, triples };
}
