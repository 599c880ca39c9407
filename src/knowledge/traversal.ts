import { DEFAULT_ENGINE_CONFIG, type TraversalConfig } from "../config/engine.js";
import { compareText } from "../text/normalise.js";
import type { GraphSnapshot } from "./graphSnapshot.js";
import { edgeKey, type RelationEdge } from "./types.js";

/** Edge followed during traversal, with the direction it was walked in. */
export interface PathStep {
  edge: RelationEdge;
  direction: "forward" | "reverse";
}

/** Sequence of edges reachable from one seed, scored as a whole. */
export interface FactPath {
  seed: string;
  steps: PathStep[];
  /** Entity reached by the last step. */
  terminal: string;
  score: number;
  /** Sorted edge keys; identical fact sets share a key across seeds. */
  key: string;
}

/**
 * Seed entity id, optionally weighted by how confidently it was matched. The
 * weight multiplies every path score grown from the seed.
 */
export type TraversalSeed = string | { entityId: string; weight: number };

interface Frontier {
  node: string;
  steps: PathStep[];
}

interface Neighbour {
  step: PathStep;
  node: string;
  key: string;
}

/** Aggregates the edge confidences of a path and applies the per-hop decay. */
export function scorePath(steps: readonly PathStep[], config: Pick<TraversalConfig, "hopDecay" | "scoring">): number {
  if (steps.length === 0) {
    return 0;
  }
  const confidences = steps.map((step) => step.edge.confidence);
  const aggregate =
    config.scoring === "minimum"
      ? Math.min(...confidences)
      : confidences.reduce((product, confidence) => product * confidence, 1);
  return aggregate * config.hopDecay ** (steps.length - 1);
}

function pathKey(steps: readonly PathStep[]): string {
  return steps
    .map((step) => edgeKey(step.edge))
    .sort(compareText)
    .join(" ");
}

function neighbours(graph: GraphSnapshot, node: string): Neighbour[] {
  const result: Neighbour[] = [];
  for (const edge of graph.outgoing(node)) {
    result.push({ step: { edge, direction: "forward" }, node: edge.object, key: edgeKey(edge) });
  }
  for (const edge of graph.incoming(node)) {
    result.push({ step: { edge, direction: "reverse" }, node: edge.subject, key: edgeKey(edge) });
  }
  return result.sort(
    (a, b) =>
      b.step.edge.confidence - a.step.edge.confidence ||
      compareText(a.key, b.key) ||
      compareText(a.step.direction, b.step.direction),
  );
}

/**
 * Breadth-first expansion from every seed over forward and reverse edges.
 *
 * Each node is visited at most once per seed, and only the `fanOut` most
 * confident unvisited neighbours of a node are expanded. Every discovered
 * edge yields a path ending at the newly reached node, so paths never exceed
 * `maxDepth` edges. Paths covering the same edges are deduplicated across
 * seeds, keeping the best score, and the result is capped at `maxPaths`.
 */
export function traverseGraph(
  graph: GraphSnapshot,
  seeds: readonly TraversalSeed[],
  config: TraversalConfig = DEFAULT_ENGINE_CONFIG.traversal,
): FactPath[] {
  const best = new Map<string, FactPath>();
  const processed = new Set<string>();

  for (const seed of seeds) {
    const seedId = typeof seed === "string" ? seed : seed.entityId;
    const weight = typeof seed === "string" ? 1 : seed.weight;
    if (processed.has(seedId) || !graph.getEntity(seedId)) {
      continue;
    }
    processed.add(seedId);

    const visited = new Set<string>([seedId]);
    let frontier: Frontier[] = [{ node: seedId, steps: [] }];
    for (let depth = 0; depth < config.maxDepth && frontier.length > 0; depth += 1) {
      const next: Frontier[] = [];
      for (const current of frontier) {
        let expanded = 0;
        for (const neighbour of neighbours(graph, current.node)) {
          if (expanded >= config.fanOut) {
            break;
          }
          if (visited.has(neighbour.node)) {
            continue;
          }
          visited.add(neighbour.node);
          expanded += 1;

          const steps = [...current.steps, neighbour.step];
          const path: FactPath = {
            seed: seedId,
            steps,
            terminal: neighbour.node,
            score: scorePath(steps, config) * weight,
            key: pathKey(steps),
          };
          const existing = best.get(path.key);
          if (!existing || path.score > existing.score) {
            best.set(path.key, path);
          }
          next.push({ node: neighbour.node, steps });
        }
      }
      frontier = next;
    }
  }

  return [...best.values()]
    .sort((a, b) => b.score - a.score || a.steps.length - b.steps.length || compareText(a.key, b.key))
    .slice(0, config.maxPaths);
}
