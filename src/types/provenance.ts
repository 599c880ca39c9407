/**
 * Provenance categories attached to evidence items. They mirror the three
 * retrieval modalities plus the upstream document references carried by graph
 * entities and edges.
 */
export const PROVENANCE_TYPES = ["document", "chunk", "faq", "kg"] as const;

export type ProvenanceType = (typeof PROVENANCE_TYPES)[number];

/**
 * Structured pointer to the artefact backing a piece of evidence. Consumers
 * render these as citations next to the synthesised answer.
 */
export type Provenance = {
  /** Stable identifier (document id, chunk id, FAQ id or edge key). */
  sourceId: string;
  type: ProvenanceType;
  /** Optional confidence score in the range [0,1]. */
  confidence?: number;
};

function isProvenanceType(value: string): value is ProvenanceType {
  return PROVENANCE_TYPES.some((type) => type === value);
}

function clampConfidence(value: number | undefined): number | undefined {
  if (typeof value !== "number" || Number.isNaN(value)) {
    return undefined;
  }
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Deduplicates and normalises provenance entries while preserving insertion
 * order. Identifiers are trimmed, confidences clamped and malformed items
 * dropped.
 */
export function normaliseProvenanceList(
  raw: ReadonlyArray<Provenance | null | undefined> | undefined,
): Provenance[] {
  if (!raw || raw.length === 0) {
    return [];
  }

  const seen = new Set<string>();
  const result: Provenance[] = [];

  for (const entry of raw) {
    if (!entry) {
      continue;
    }
    const sourceId = typeof entry.sourceId === "string" ? entry.sourceId.trim() : "";
    const type = typeof entry.type === "string" ? entry.type.trim().toLowerCase() : "";
    if (!sourceId || !isProvenanceType(type)) {
      continue;
    }
    const key = `${type}:${sourceId}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    const normalised: Provenance = { sourceId, type };
    const confidence = clampConfidence(entry.confidence);
    if (confidence !== undefined) {
      normalised.confidence = confidence;
    }
    result.push(normalised);
  }

  return result;
}

/** Builds `document` provenance entries from a list of source references. */
export function documentProvenance(sources: Iterable<string>): Provenance[] {
  return normaliseProvenanceList(Array.from(sources, (sourceId) => ({ sourceId, type: "document" as const })));
}
