import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import { readEnum, readInt, readNumber } from "./env.js";

/** Evidence families understood by the fusion stage. */
export const EVIDENCE_KINDS = ["graph_fact", "document_snippet", "faq_hit"] as const;
export type EvidenceKind = (typeof EVIDENCE_KINDS)[number];

/** Aggregation applied to edge confidences along a traversal path. */
export const PATH_SCORING_MODES = ["product", "minimum"] as const;
export type PathScoring = (typeof PATH_SCORING_MODES)[number];

/** Monotonic scalers mapping raw source scores into [0, 1]. */
export const SCORE_SCALINGS = ["clamp", "logistic", "minmax"] as const;
export type ScoreScaling = (typeof SCORE_SCALINGS)[number];

const unitInterval = z.number().min(0).max(1);
const positiveInt = z.number().int().min(1);

const NormalizerConfigSchema = z
  .object({
    fuzzyMergeThreshold: unitInterval,
    fuzzyMinAliasLength: positiveInt,
    defaultEntityType: z.string().trim().min(1),
    defaultConfidence: unitInterval,
    reflexivePredicates: z.array(z.string().trim().min(1)),
    cooccurrenceConfidence: unitInterval,
  })
  .strict();

const MatcherConfigSchema = z
  .object({
    maxNgram: z.number().int().min(1).max(8),
    fuzzyThreshold: unitInterval,
    fuzzyMinLength: positiveInt,
    maxEntities: positiveInt,
  })
  .strict();

const TraversalConfigSchema = z
  .object({
    maxDepth: z.number().int().min(0).max(6),
    fanOut: positiveInt,
    hopDecay: z.number().gt(0).max(1),
    scoring: z.enum(PATH_SCORING_MODES),
    maxPaths: positiveInt,
  })
  .strict();

const FaqConfigSchema = z
  .object({
    directAnswerThreshold: unitInterval,
    inclusionThreshold: unitInterval,
    maxHits: positiveInt,
  })
  .strict()
  .refine((value) => value.inclusionThreshold <= value.directAnswerThreshold, {
    message: "inclusionThreshold must not exceed directAnswerThreshold",
    path: ["inclusionThreshold"],
  });

const VectorConfigSchema = z
  .object({
    topK: positiveInt,
  })
  .strict();

const perKind = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ graph_fact: schema, document_snippet: schema, faq_hit: schema }).strict();

const FusionConfigSchema = z
  .object({
    weights: perKind(z.number().min(0)),
    scaling: perKind(z.enum(SCORE_SCALINGS)),
    priority: z.array(z.enum(EVIDENCE_KINDS)).length(EVIDENCE_KINDS.length),
    maxEvidence: positiveInt,
    logisticMidpoint: z.number(),
    logisticSteepness: z.number().gt(0),
  })
  .strict()
  .refine((value) => value.weights.graph_fact + value.weights.document_snippet + value.weights.faq_hit > 0, {
    message: "at least one source weight must be positive",
    path: ["weights"],
  })
  .refine((value) => new Set(value.priority).size === EVIDENCE_KINDS.length, {
    message: "priority must list every evidence kind exactly once",
    path: ["priority"],
  });

const QueryConfigSchema = z
  .object({
    timeoutMs: positiveInt,
    maxHistoryTurns: z.number().int().min(0),
    maxSnippetChars: positiveInt,
    maxFacts: positiveInt,
  })
  .strict();

const BuildConfigSchema = z
  .object({
    embedConcurrency: positiveInt,
    embedBatchSize: positiveInt,
    chunkMaxTokens: positiveInt,
    chunkOverlapSentences: z.number().int().min(0),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    normalizer: NormalizerConfigSchema,
    matcher: MatcherConfigSchema,
    traversal: TraversalConfigSchema,
    faq: FaqConfigSchema,
    vector: VectorConfigSchema,
    fusion: FusionConfigSchema,
    query: QueryConfigSchema,
    build: BuildConfigSchema,
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type NormalizerConfig = EngineConfig["normalizer"];
export type MatcherConfig = EngineConfig["matcher"];
export type TraversalConfig = EngineConfig["traversal"];
export type FaqConfig = EngineConfig["faq"];
export type VectorConfig = EngineConfig["vector"];
export type FusionConfig = EngineConfig["fusion"];
export type QueryConfig = EngineConfig["query"];
export type BuildConfig = EngineConfig["build"];

/** Block-level partial overrides accepted by {@link loadEngineConfig}. */
export type EngineConfigOverrides = { [Block in keyof EngineConfig]?: Partial<EngineConfig[Block]> };

/** Built-in defaults, before environment variables are applied. */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  normalizer: {
    fuzzyMergeThreshold: 0.9,
    fuzzyMinAliasLength: 5,
    defaultEntityType: "concept",
    defaultConfidence: 0.5,
    reflexivePredicates: [],
    cooccurrenceConfidence: 0.3,
  },
  matcher: {
    maxNgram: 4,
    fuzzyThreshold: 0.85,
    fuzzyMinLength: 4,
    maxEntities: 5,
  },
  traversal: {
    maxDepth: 2,
    fanOut: 5,
    hopDecay: 0.85,
    scoring: "product",
    maxPaths: 20,
  },
  faq: {
    directAnswerThreshold: 0.92,
    inclusionThreshold: 0.6,
    maxHits: 2,
  },
  vector: {
    topK: 6,
  },
  fusion: {
    weights: { graph_fact: 0.45, document_snippet: 0.35, faq_hit: 0.2 },
    scaling: { graph_fact: "clamp", document_snippet: "clamp", faq_hit: "clamp" },
    priority: ["graph_fact", "faq_hit", "document_snippet"],
    maxEvidence: 10,
    logisticMidpoint: 0.5,
    logisticSteepness: 10,
  },
  query: {
    timeoutMs: 5_000,
    maxHistoryTurns: 5,
    maxSnippetChars: 1_200,
    maxFacts: 8,
  },
  build: {
    embedConcurrency: 4,
    embedBatchSize: 16,
    chunkMaxTokens: 220,
    chunkOverlapSentences: 1,
  },
};

/** Applies the `QA_*` environment variables on top of the defaults. */
function readEnvironment(): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;
  return {
    normalizer: {
      ...base.normalizer,
      reflexivePredicates: [...base.normalizer.reflexivePredicates],
      fuzzyMergeThreshold: readNumber("QA_FUZZY_MERGE_THRESHOLD", base.normalizer.fuzzyMergeThreshold),
    },
    matcher: {
      ...base.matcher,
      fuzzyThreshold: readNumber("QA_MATCH_FUZZY_THRESHOLD", base.matcher.fuzzyThreshold),
      maxNgram: readInt("QA_MATCH_MAX_NGRAM", base.matcher.maxNgram),
      maxEntities: readInt("QA_MATCH_MAX_ENTITIES", base.matcher.maxEntities),
    },
    traversal: {
      ...base.traversal,
      maxDepth: readInt("QA_TRAVERSAL_MAX_DEPTH", base.traversal.maxDepth),
      fanOut: readInt("QA_TRAVERSAL_FANOUT", base.traversal.fanOut),
      hopDecay: readNumber("QA_TRAVERSAL_HOP_DECAY", base.traversal.hopDecay),
      scoring: readEnum("QA_TRAVERSAL_SCORING", PATH_SCORING_MODES, base.traversal.scoring),
    },
    faq: {
      ...base.faq,
      directAnswerThreshold: readNumber("QA_FAQ_DIRECT_THRESHOLD", base.faq.directAnswerThreshold),
      inclusionThreshold: readNumber("QA_FAQ_INCLUSION_THRESHOLD", base.faq.inclusionThreshold),
    },
    vector: {
      topK: readInt("QA_VECTOR_TOP_K", base.vector.topK),
    },
    fusion: {
      ...base.fusion,
      weights: {
        graph_fact: readNumber("QA_FUSION_WEIGHT_GRAPH", base.fusion.weights.graph_fact),
        document_snippet: readNumber("QA_FUSION_WEIGHT_VECTOR", base.fusion.weights.document_snippet),
        faq_hit: readNumber("QA_FUSION_WEIGHT_FAQ", base.fusion.weights.faq_hit),
      },
      scaling: { ...base.fusion.scaling },
      priority: [...base.fusion.priority],
      maxEvidence: readInt("QA_FUSION_MAX_EVIDENCE", base.fusion.maxEvidence),
    },
    query: {
      ...base.query,
      timeoutMs: readInt("QA_QUERY_TIMEOUT_MS", base.query.timeoutMs),
    },
    build: {
      ...base.build,
      embedConcurrency: readInt("QA_EMBED_CONCURRENCY", base.build.embedConcurrency),
      embedBatchSize: readInt("QA_EMBED_BATCH_SIZE", base.build.embedBatchSize),
    },
  };
}

/**
 * Resolves the engine configuration: defaults, then environment, then the
 * explicit overrides. The merged value is validated and fusion weights are
 * renormalised so they sum to 1.
 */
export function loadEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const fromEnv = readEnvironment();
  const merged = {
    normalizer: { ...fromEnv.normalizer, ...overrides.normalizer },
    matcher: { ...fromEnv.matcher, ...overrides.matcher },
    traversal: { ...fromEnv.traversal, ...overrides.traversal },
    faq: { ...fromEnv.faq, ...overrides.faq },
    vector: { ...fromEnv.vector, ...overrides.vector },
    fusion: { ...fromEnv.fusion, ...overrides.fusion },
    query: { ...fromEnv.query, ...overrides.query },
    build: { ...fromEnv.build, ...overrides.build },
  };

  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }

  const config = parsed.data;
  const { graph_fact, document_snippet, faq_hit } = config.fusion.weights;
  const total = graph_fact + document_snippet + faq_hit;
  config.fusion.weights = {
    graph_fact: graph_fact / total,
    document_snippet: document_snippet / total,
    faq_hit: faq_hit / total,
  };
  return config;
}
