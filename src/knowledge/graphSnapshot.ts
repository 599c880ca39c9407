import { canonicalAlias, compareText } from "../text/normalise.js";
import { edgeKey, type Entity, type RelationEdge } from "./types.js";

/** Version tag written into persisted graphs. */
export const GRAPH_FORMAT_VERSION = 1;

/** JSON form of a {@link GraphSnapshot}. */
export interface SerializedGraph {
  version: number;
  entities: Entity[];
  edges: RelationEdge[];
  /** Alias key → entity id, written for downstream consumers. */
  aliases: Record<string, string>;
}

function cloneEntity(entity: Entity): Entity {
  return { ...entity, aliases: [...entity.aliases], sources: [...entity.sources] };
}

function cloneEdge(edge: RelationEdge): RelationEdge {
  return { ...edge, sources: [...edge.sources] };
}

function pushIndexed<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.push(value);
  } else {
    index.set(key, [value]);
  }
}

const byConfidenceThenKey = (a: RelationEdge, b: RelationEdge): number =>
  b.confidence - a.confidence || compareText(edgeKey(a), edgeKey(b));

/**
 * Immutable, fully indexed knowledge graph. Built once per normalisation run
 * and shared by reference with every query served from the same snapshot.
 * Adjacency lists are ordered by confidence descending then edge key so
 * traversal order is deterministic.
 */
export class GraphSnapshot {
  private readonly entityIndex = new Map<string, Entity>();
  private readonly edgeIndex = new Map<string, RelationEdge>();
  private readonly aliasIndex = new Map<string, string>();
  private readonly typeIndex = new Map<string, string[]>();
  private readonly outgoingIndex = new Map<string, RelationEdge[]>();
  private readonly incomingIndex = new Map<string, RelationEdge[]>();
  /** `(subject, predicate)` → ordered object ids. */
  private readonly forwardIndex = new Map<string, string[]>();

  private constructor(entities: readonly Entity[], edges: readonly RelationEdge[]) {
    const sortedEntities = entities.map(cloneEntity).sort((a, b) => compareText(a.id, b.id));
    for (const entity of sortedEntities) {
      Object.freeze(entity.aliases);
      Object.freeze(entity.sources);
      this.entityIndex.set(entity.id, Object.freeze(entity));
      pushIndexed(this.typeIndex, entity.type, entity.id);
      for (const alias of entity.aliases) {
        this.aliasIndex.set(alias, entity.id);
      }
    }

    const sortedEdges = edges.map(cloneEdge).sort(byConfidenceThenKey);
    for (const edge of sortedEdges) {
      Object.freeze(edge.sources);
      const frozen = Object.freeze(edge);
      this.edgeIndex.set(edgeKey(frozen), frozen);
      pushIndexed(this.outgoingIndex, frozen.subject, frozen);
      pushIndexed(this.incomingIndex, frozen.object, frozen);
    }
    for (const edge of [...sortedEdges].sort((a, b) => compareText(a.object, b.object))) {
      pushIndexed(this.forwardIndex, `${edge.subject}|${edge.predicate}`, edge.object);
    }
  }

  /** Builds a snapshot from already-normalised entities and edges. */
  static fromParts(entities: readonly Entity[], edges: readonly RelationEdge[]): GraphSnapshot {
    return new GraphSnapshot(entities, edges);
  }

  static empty(): GraphSnapshot {
    return new GraphSnapshot([], []);
  }

  /** Rebuilds a snapshot from its persisted form; indexes are recomputed. */
  static fromJSON(serialized: SerializedGraph): GraphSnapshot {
    return new GraphSnapshot(serialized.entities, serialized.edges);
  }

  get entityCount(): number {
    return this.entityIndex.size;
  }

  get edgeCount(): number {
    return this.edgeIndex.size;
  }

  getEntity(id: string): Entity | undefined {
    return this.entityIndex.get(id);
  }

  /** Every entity ordered by id. */
  entities(): Entity[] {
    return [...this.entityIndex.values()];
  }

  /** Every edge ordered by confidence descending then key. */
  edges(): RelationEdge[] {
    return [...this.edgeIndex.values()];
  }

  getEdge(key: string): RelationEdge | undefined {
    return this.edgeIndex.get(key);
  }

  /**
   * Resolves an alias to its entity id. The argument may be a raw surface form;
   * it is canonicalised before the lookup unless it is already a known key.
   */
  resolveAlias(alias: string): string | undefined {
    return this.aliasIndex.get(alias) ?? this.aliasIndex.get(canonicalAlias(alias));
  }

  /** Alias key → entity id pairs. */
  aliasEntries(): IterableIterator<[string, string]> {
    return this.aliasIndex.entries();
  }

  get aliasCount(): number {
    return this.aliasIndex.size;
  }

  entitiesOfType(type: string): readonly string[] {
    return this.typeIndex.get(type) ?? [];
  }

  outgoing(entityId: string): readonly RelationEdge[] {
    return this.outgoingIndex.get(entityId) ?? [];
  }

  incoming(entityId: string): readonly RelationEdge[] {
    return this.incomingIndex.get(entityId) ?? [];
  }

  /** Object ids reachable from `subject` through `predicate`, ordered by id. */
  objects(subject: string, predicate: string): readonly string[] {
    return this.forwardIndex.get(`${subject}|${predicate}`) ?? [];
  }

  toJSON(): SerializedGraph {
    const aliases: Record<string, string> = {};
    for (const [alias, id] of [...this.aliasIndex.entries()].sort(([a], [b]) => compareText(a, b))) {
      aliases[alias] = id;
    }
    return {
      version: GRAPH_FORMAT_VERSION,
      entities: this.entities().map(cloneEntity),
      edges: [...this.edgeIndex.values()]
        .map(cloneEdge)
        .sort((a, b) => compareText(edgeKey(a), edgeKey(b))),
      aliases,
    };
  }
}
