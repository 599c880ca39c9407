import { sanitizeText } from "../text/normalise.js";

/** Fallback slice length when a single sentence exceeds the token budget. */
const MAX_SLICE_CHARS = 480;

export interface ChunkableDocument {
  documentId: string;
  text: string;
}

export interface DocumentChunk {
  /** `<documentId>#<ordinal>` */
  id: string;
  documentId: string;
  ordinal: number;
  text: string;
}

export interface ChunkOptions {
  maxTokens: number;
  /** Trailing sentences of a chunk repeated at the start of the next one. */
  overlapSentences: number;
}

/** Whitespace-delimited token estimate. */
export function estimateTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/u).length;
}

export function chunkId(documentId: string, ordinal: number): string {
  return `${documentId}#${ordinal}`;
}

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/u)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function splitByWords(sentence: string, maxTokens: number): string[] {
  const words = sentence.split(/\s+/u).filter(Boolean);
  const pieces: string[] = [];
  for (let start = 0; start < words.length; start += maxTokens) {
    const piece = words.slice(start, start + maxTokens).join(" ");
    for (let offset = 0; offset < piece.length; offset += MAX_SLICE_CHARS) {
      pieces.push(piece.slice(offset, offset + MAX_SLICE_CHARS));
    }
  }
  return pieces;
}

/**
 * Splits a document on sentence boundaries into chunks of at most
 * `maxTokens` tokens. Sentences longer than the budget are cut on word
 * boundaries. Empty documents yield no chunks.
 */
export function chunkDocument(document: ChunkableDocument, options: ChunkOptions): DocumentChunk[] {
  const text = sanitizeText(document.text);
  if (!text) {
    return [];
  }
  const maxTokens = Math.max(1, Math.floor(options.maxTokens));
  const overlap = Math.max(0, Math.floor(options.overlapSentences));

  const units: string[] = [];
  for (const sentence of splitSentences(text)) {
    if (estimateTokens(sentence) > maxTokens) {
      units.push(...splitByWords(sentence, maxTokens));
    } else {
      units.push(sentence);
    }
  }

  const texts: string[] = [];
  let current: string[] = [];
  let tokens = 0;
  let fresh = 0;
  const flush = () => {
    if (fresh === 0) {
      return;
    }
    texts.push(current.join(" "));
    current = overlap > 0 ? current.slice(-overlap) : [];
    tokens = current.reduce((total, unit) => total + estimateTokens(unit), 0);
    fresh = 0;
  };

  for (const unit of units) {
    const unitTokens = estimateTokens(unit);
    if (fresh > 0 && tokens + unitTokens > maxTokens) {
      flush();
    }
    // Carried-over sentences give way when they would push a chunk past the budget.
    while (current.length > 0 && fresh === 0 && tokens + unitTokens > maxTokens) {
      const dropped = current.shift();
      tokens -= dropped ? estimateTokens(dropped) : 0;
    }
    current.push(unit);
    tokens += unitTokens;
    fresh += 1;
  }
  flush();

  return texts.map((chunkText, ordinal) => ({
    id: chunkId(document.documentId, ordinal),
    documentId: document.documentId,
    ordinal,
    text: chunkText,
  }));
}
