/**
 * Shapes exchanged between the extraction collaborator, the graph normaliser
 * and the serving pipeline.
 */

/** Predicate assigned to triples that arrive without one. */
export const DEFAULT_PREDICATE = "related_to";

/** Entity mention emitted by the extraction collaborator. */
export interface RawMention {
  text: string;
  type?: string | null;
  source?: string | null;
}

/** Candidate relation emitted by the extraction collaborator. */
export interface RawTriple {
  subject: string;
  predicate?: string | null;
  object: string;
  subjectType?: string | null;
  objectType?: string | null;
  confidence?: number | null;
  source?: string | null;
}

/** Canonical node of the normalised graph. */
export interface Entity {
  /** Content-derived identifier (`ent_<hash>`). */
  id: string;
  /** Most frequent surface form among the merged mentions. */
  name: string;
  type: string;
  /** Alias keys resolving to this entity, sorted. */
  aliases: string[];
  /** Source-document references, sorted. */
  sources: string[];
  /** Number of mentions merged into the entity. */
  mentions: number;
}

/** Directed, typed, confidence-weighted edge between two entities. */
export interface RelationEdge {
  subject: string;
  predicate: string;
  object: string;
  confidence: number;
  sources: string[];
}

/** Stable key identifying an edge by its endpoints and predicate. */
export function edgeKey(edge: Pick<RelationEdge, "subject" | "predicate" | "object">): string {
  return `${edge.subject}|${edge.predicate}|${edge.object}`;
}

/** Upstream record skipped because it could not be interpreted. */
export interface MalformedRecord {
  kind: "mention" | "triple";
  index: number;
  reason: string;
}

/**
 * Mentions sharing an alias (exactly or fuzzily) whose types disagree. Both
 * entities are kept; `resolvedTo` names the entity the bare alias points at.
 */
export interface ResolutionConflict {
  alias: string;
  match: "exact" | "fuzzy";
  entityIds: string[];
  types: string[];
  resolvedTo: string | null;
}

/** Triple dropped after parsing succeeded. */
export interface DroppedEdge {
  index: number;
  reason: "unresolved_entity" | "self_loop";
  subject: string;
  predicate: string;
  object: string;
}

/** Summary report emitted by every normalisation run. */
export interface NormalizationSummary {
  mentionsSeen: number;
  triplesSeen: number;
  entities: number;
  edges: number;
  /** Distinct alias keys folded into another key of the same type by fuzzy matching. */
  fuzzyMerges: number;
  /** Duplicate (subject, predicate, object) edges merged into an existing one. */
  duplicateEdges: number;
  /** Untyped mentions that received the default type. */
  defaultTyped: number;
  malformed: MalformedRecord[];
  conflicts: ResolutionConflict[];
  droppedEdges: DroppedEdge[];
}
