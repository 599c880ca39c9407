import { DEFAULT_ENGINE_CONFIG, type NormalizerConfig } from "../config/engine.js";
import type { StructuredLogger } from "../logger.js";
import { canonicalAlias, compareText, contentId, sanitizeText } from "../text/normalise.js";
import { aliasSimilarity, similarityUpperBound } from "../text/similarity.js";
import { GraphSnapshot } from "./graphSnapshot.js";
import {
  DEFAULT_PREDICATE,
  edgeKey,
  type DroppedEdge,
  type Entity,
  type MalformedRecord,
  type NormalizationSummary,
  type RawMention,
  type RawTriple,
  type RelationEdge,
  type ResolutionConflict,
} from "./types.js";

/** Raw extraction output handed to {@link normalizeGraph}. */
export interface NormalizeGraphInput {
  mentions?: readonly RawMention[];
  triples?: readonly RawTriple[];
}

export interface NormalizeGraphOptions {
  config?: NormalizerConfig;
  logger?: StructuredLogger;
  /**
   * When false, triple endpoints only resolve against entities declared as
   * mentions; unknown endpoints drop the edge. Defaults to true.
   */
  createEntitiesFromTriples?: boolean;
}

export interface NormalizationResult {
  graph: GraphSnapshot;
  summary: NormalizationSummary;
}

interface ParsedMention {
  surface: string;
  key: string;
  type: string | null;
  source: string | null;
}

interface ParsedTriple {
  index: number;
  subject: ParsedMention;
  object: ParsedMention;
  predicate: string;
  confidence: number;
  source: string | null;
}

/** Mentions sharing one alias key and one type. */
interface AliasGroup {
  id: string;
  key: string;
  type: string;
  surfaces: Map<string, number>;
  sources: Set<string>;
  mentions: number;
}

function optionalText(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const sanitised = sanitizeText(value);
  return sanitised.length > 0 ? sanitised : null;
}

function normaliseType(value: unknown): string | null {
  return optionalText(value)?.toLowerCase() ?? null;
}

function parseMention(text: unknown, type: unknown, source: unknown): ParsedMention | null {
  const surface = optionalText(text);
  if (!surface) {
    return null;
  }
  const key = canonicalAlias(surface);
  if (!key) {
    return null;
  }
  return { surface, key, type: normaliseType(type), source: optionalText(source) };
}

function groupId(type: string, key: string): string {
  return `${type}\u001f${key}`;
}

function increment<K>(counts: Map<K, number>, key: K, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

/** Highest count wins; ties go to the code-point-smallest key. */
function majority(counts: Map<string, number>): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [candidate, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && compareText(candidate, best) < 0)) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

/** Union-find over alias groups; the representative is the smallest group id. */
class GroupUnion {
  private readonly parent = new Map<string, string>();

  find(id: string): string {
    let root = id;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    let cursor = id;
    while (cursor !== root) {
      const parent = this.parent.get(cursor) ?? root;
      this.parent.set(cursor, root);
      cursor = parent;
    }
    return root;
  }

  /** Returns true when the two groups were in different sets. */
  union(a: string, b: string): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return false;
    }
    if (compareText(rootA, rootB) < 0) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootA, rootB);
    }
    return true;
  }
}

function fuzzyCandidates(a: AliasGroup, b: AliasGroup, config: NormalizerConfig): boolean {
  if (a.key.length < config.fuzzyMinAliasLength || b.key.length < config.fuzzyMinAliasLength) {
    return false;
  }
  if (similarityUpperBound(a.key.length, b.key.length) < config.fuzzyMergeThreshold) {
    return false;
  }
  return aliasSimilarity(a.key, b.key) >= config.fuzzyMergeThreshold;
}

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Canonicalises raw extraction output into an indexed, deduplicated graph.
 *
 * Mentions merge when their alias keys match exactly, or fuzzily above the
 * configured threshold, and their types agree. Identifiers derive from the
 * canonical name and type, so reordering the input yields the same graph.
 * Bad records are skipped and reported in the summary; the run never aborts.
 */
export function normalizeGraph(input: NormalizeGraphInput, options: NormalizeGraphOptions = {}): NormalizationResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG.normalizer;
  const createFromTriples = options.createEntitiesFromTriples ?? true;
  const rawMentions = input.mentions ?? [];
  const rawTriples = input.triples ?? [];

  const malformed: MalformedRecord[] = [];
  const mentions: ParsedMention[] = [];
  const triples: ParsedTriple[] = [];

  rawMentions.forEach((raw, index) => {
    const parsed = parseMention(raw.text, raw.type, raw.source);
    if (!parsed) {
      malformed.push({ kind: "mention", index, reason: "mention text is empty" });
      return;
    }
    mentions.push(parsed);
  });

  rawTriples.forEach((raw, index) => {
    const source = optionalText(raw.source);
    const subject = parseMention(raw.subject, raw.subjectType, source);
    if (!subject) {
      malformed.push({ kind: "triple", index, reason: "missing subject" });
      return;
    }
    const object = parseMention(raw.object, raw.objectType, source);
    if (!object) {
      malformed.push({ kind: "triple", index, reason: "missing object" });
      return;
    }
    let confidence = config.defaultConfidence;
    if (raw.confidence !== undefined && raw.confidence !== null) {
      if (typeof raw.confidence !== "number" || !Number.isFinite(raw.confidence)) {
        malformed.push({ kind: "triple", index, reason: "confidence is not a finite number" });
        return;
      }
      confidence = clampConfidence(raw.confidence);
    }
    const predicate = optionalText(raw.predicate) ?? DEFAULT_PREDICATE;
    triples.push({ index, subject, object, predicate, confidence, source });
    if (createFromTriples) {
      mentions.push(subject, object);
    }
  });

  // Untyped mentions inherit the majority type observed for their alias key.
  const typeVotes = new Map<string, Map<string, number>>();
  for (const mention of mentions) {
    if (mention.type) {
      const votes = typeVotes.get(mention.key) ?? new Map<string, number>();
      increment(votes, mention.type);
      typeVotes.set(mention.key, votes);
    }
  }
  const resolveType = (mention: ParsedMention): string => {
    if (mention.type) {
      return mention.type;
    }
    const votes = typeVotes.get(mention.key);
    return (votes && majority(votes)) ?? config.defaultEntityType;
  };

  let defaultTyped = 0;
  const groups = new Map<string, AliasGroup>();
  for (const mention of mentions) {
    const type = resolveType(mention);
    if (!mention.type && !typeVotes.has(mention.key)) {
      defaultTyped += 1;
    }
    const id = groupId(type, mention.key);
    let group = groups.get(id);
    if (!group) {
      group = { id, key: mention.key, type, surfaces: new Map(), sources: new Set(), mentions: 0 };
      groups.set(id, group);
    }
    increment(group.surfaces, mention.surface);
    if (mention.source) {
      group.sources.add(mention.source);
    }
    group.mentions += 1;
  }

  const orderedGroups = [...groups.values()].sort((a, b) => compareText(a.id, b.id));
  const union = new GroupUnion();
  let fuzzyMerges = 0;
  const fuzzyTypeClashes: Array<[AliasGroup, AliasGroup]> = [];
  for (let i = 0; i < orderedGroups.length; i += 1) {
    for (let j = i + 1; j < orderedGroups.length; j += 1) {
      const a = orderedGroups[i];
      const b = orderedGroups[j];
      if (a.key === b.key || !fuzzyCandidates(a, b, config)) {
        continue;
      }
      if (a.type !== b.type) {
        fuzzyTypeClashes.push([a, b]);
        continue;
      }
      if (union.union(a.id, b.id)) {
        fuzzyMerges += 1;
      }
    }
  }

  const clusters = new Map<string, AliasGroup[]>();
  for (const group of orderedGroups) {
    const root = union.find(group.id);
    const members = clusters.get(root) ?? [];
    members.push(group);
    clusters.set(root, members);
  }

  const entityByGroup = new Map<string, Entity>();
  const entities: Entity[] = [];
  for (const members of clusters.values()) {
    const surfaces = new Map<string, number>();
    const sources = new Set<string>();
    let mentionCount = 0;
    for (const member of members) {
      for (const [surface, count] of member.surfaces) {
        increment(surfaces, surface, count);
      }
      member.sources.forEach((source) => sources.add(source));
      mentionCount += member.mentions;
    }
    const name = majority(surfaces) ?? members[0].key;
    const type = members[0].type;
    const entity: Entity = {
      id: contentId("ent", type, canonicalAlias(name)),
      name,
      type,
      aliases: members.map((member) => member.key).sort(compareText),
      sources: [...sources].sort(compareText),
      mentions: mentionCount,
    };
    entities.push(entity);
    for (const member of members) {
      entityByGroup.set(member.id, entity);
    }
  }

  const conflicts = resolveAliasCollisions(entities);
  const reportedPairs = new Set<string>();
  for (const [a, b] of fuzzyTypeClashes) {
    const entityA = entityByGroup.get(a.id);
    const entityB = entityByGroup.get(b.id);
    if (!entityA || !entityB) {
      continue;
    }
    const pair = [entityA.id, entityB.id].sort(compareText);
    const pairKey = pair.join("|");
    if (reportedPairs.has(pairKey)) {
      continue;
    }
    reportedPairs.add(pairKey);
    conflicts.push({
      alias: compareText(a.key, b.key) <= 0 ? a.key : b.key,
      match: "fuzzy",
      entityIds: pair,
      types: [entityA.type, entityB.type].sort(compareText),
      resolvedTo: null,
    });
  }
  conflicts.sort((a, b) => compareText(a.alias, b.alias) || compareText(a.match, b.match));

  const reflexive = new Set(config.reflexivePredicates.map((predicate) => predicate.toLowerCase()));
  const droppedEdges: DroppedEdge[] = [];
  const edges = new Map<string, { edge: RelationEdge; sources: Set<string> }>();
  let duplicateEdges = 0;

  const resolveEndpoint = (mention: ParsedMention): Entity | undefined =>
    entityByGroup.get(groupId(resolveType(mention), mention.key));

  for (const triple of triples) {
    const subject = resolveEndpoint(triple.subject);
    const object = resolveEndpoint(triple.object);
    const described = {
      index: triple.index,
      subject: triple.subject.surface,
      predicate: triple.predicate,
      object: triple.object.surface,
    };
    if (!subject || !object) {
      droppedEdges.push({ ...described, reason: "unresolved_entity" });
      continue;
    }
    if (subject.id === object.id && !reflexive.has(triple.predicate.toLowerCase())) {
      droppedEdges.push({ ...described, reason: "self_loop" });
      continue;
    }
    const candidate: RelationEdge = {
      subject: subject.id,
      predicate: triple.predicate,
      object: object.id,
      confidence: triple.confidence,
      sources: [],
    };
    const key = edgeKey(candidate);
    const existing = edges.get(key);
    if (existing) {
      duplicateEdges += 1;
      existing.edge.confidence = Math.max(existing.edge.confidence, candidate.confidence);
      if (triple.source) {
        existing.sources.add(triple.source);
      }
      continue;
    }
    edges.set(key, { edge: candidate, sources: new Set(triple.source ? [triple.source] : []) });
  }

  const edgeList = [...edges.values()].map(({ edge, sources }) => ({
    ...edge,
    sources: [...sources].sort(compareText),
  }));
  const graph = GraphSnapshot.fromParts(entities, edgeList);

  const summary: NormalizationSummary = {
    mentionsSeen: rawMentions.length,
    triplesSeen: rawTriples.length,
    entities: graph.entityCount,
    edges: graph.edgeCount,
    fuzzyMerges,
    duplicateEdges,
    defaultTyped,
    malformed,
    conflicts,
    droppedEdges,
  };

  const logger = options.logger;
  if (logger) {
    if (malformed.length > 0) {
      logger.warn("graph_records_malformed", { count: malformed.length, first: malformed.slice(0, 5) });
    }
    if (droppedEdges.length > 0) {
      logger.warn("graph_edges_dropped", {
        count: droppedEdges.length,
        unresolved: droppedEdges.filter((edge) => edge.reason === "unresolved_entity").length,
        self_loops: droppedEdges.filter((edge) => edge.reason === "self_loop").length,
      });
    }
    if (conflicts.length > 0) {
      logger.warn("graph_resolution_conflicts", {
        count: conflicts.length,
        aliases: conflicts.slice(0, 10).map((conflict) => conflict.alias),
      });
    }
    logger.info("graph_normalized", {
      entities: summary.entities,
      edges: summary.edges,
      fuzzy_merges: fuzzyMerges,
      duplicate_edges: duplicateEdges,
      malformed: malformed.length,
      dropped_edges: droppedEdges.length,
      conflicts: conflicts.length,
    });
  }

  return { graph, summary };
}

/**
 * Keeps every alias pointing at exactly one entity. When entities of different
 * types share an alias key, the one with most mentions keeps the bare alias
 * (ties: smaller id) and the others receive `"<alias> (<type>)"` instead.
 * Mutates the aliases of the losing entities and returns one conflict per key.
 */
function resolveAliasCollisions(entities: Entity[]): ResolutionConflict[] {
  const owners = new Map<string, Entity[]>();
  for (const entity of entities) {
    for (const alias of entity.aliases) {
      const list = owners.get(alias) ?? [];
      list.push(entity);
      owners.set(alias, list);
    }
  }

  const conflicts: ResolutionConflict[] = [];
  for (const [alias, claimants] of owners) {
    if (claimants.length < 2) {
      continue;
    }
    const ranked = [...claimants].sort((a, b) => b.mentions - a.mentions || compareText(a.id, b.id));
    const [winner, ...losers] = ranked;
    for (const loser of losers) {
      loser.aliases = loser.aliases
        .map((existing) => (existing === alias ? `${alias} (${loser.type})` : existing))
        .sort(compareText);
    }
    conflicts.push({
      alias,
      match: "exact",
      entityIds: claimants.map((entity) => entity.id).sort(compareText),
      types: claimants.map((entity) => entity.type).sort(compareText),
      resolvedTo: winner.id,
    });
  }
  return conflicts;
}
