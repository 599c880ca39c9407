/**
 * Stable error codes shared by the offline build, the serving pipeline and
 * the MCP surface. Keys are `<FAMILY>_<REASON>`; values are the literals
 * clients branch on.
 */
export const ERROR_CODES = {
  INPUT_MALFORMED: "E-QA-INPUT-MALFORMED",
  INDEX_UNAVAILABLE: "E-QA-INDEX-UNAVAILABLE",
  INDEX_DIMENSION: "E-QA-DIMENSION",
  INDEX_INVALID_VECTOR: "E-QA-INVALID-VECTOR",
  QUERY_INVALID_INPUT: "E-QA-INVALID-INPUT",
  CONFIG_INVALID: "E-QA-CONFIG",
  SNAPSHOT_FORMAT: "E-QA-SNAPSHOT",
} as const;

/** Union type representing every stable error code. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 160;

/**
 * Collapses whitespace and enforces the maximum length for an error message.
 * Empty input falls back to a generic message.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Base class of every hard failure raised by the engine. Recoverable
 * conditions (malformed records, missing sources, timeouts) are reported as
 * values and never reach this hierarchy.
 */
export class HybridQaError extends Error {
  public readonly code: ErrorCode;
  public readonly hint?: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: { hint?: string; details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(normaliseErrorMessage(message), options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "HybridQaError";
    this.code = code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

/**
 * Raised when a vector does not match the dimension of the index it is built
 * into or queried against. This is a configuration error: the embedding
 * collaborator and the persisted index disagree.
 */
export class DimensionMismatchError extends HybridQaError {
  public readonly expected: number;
  public readonly received: number;

  constructor(expected: number, received: number, context: string) {
    super(ERROR_CODES.INDEX_DIMENSION, `${context}: expected dimension ${expected}, received ${received}`, {
      hint: "rebuild the vector index with the embedder used for queries",
      details: { expected, received, context },
    });
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.received = received;
  }
}

/** Raised when a vector contains non-finite components. */
export class InvalidVectorError extends HybridQaError {
  constructor(id: string) {
    super(ERROR_CODES.INDEX_INVALID_VECTOR, `vector ${id} contains non-finite components`, { details: { id } });
    this.name = "InvalidVectorError";
  }
}

/** Raised when a collection is queried before any index was built for it. */
export class IndexUnavailableError extends HybridQaError {
  public readonly collection: string;

  constructor(collection: string) {
    super(ERROR_CODES.INDEX_UNAVAILABLE, `vector index "${collection}" is not built`, {
      hint: "run the offline build before serving queries",
      details: { collection },
    });
    this.name = "IndexUnavailableError";
    this.collection = collection;
  }
}

/** Raised when the merged configuration violates the schema. */
export class ConfigurationError extends HybridQaError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(ERROR_CODES.CONFIG_INVALID, `invalid engine configuration: ${issues.join("; ")}`, { details: { issues } });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** Raised when a persisted snapshot file cannot be parsed or validated. */
export class SnapshotFormatError extends HybridQaError {
  public readonly file: string;

  constructor(file: string, reason: string, cause?: unknown) {
    super(ERROR_CODES.SNAPSHOT_FORMAT, `snapshot file ${file} is invalid: ${reason}`, {
      details: { file },
      cause,
    });
    this.name = "SnapshotFormatError";
    this.file = file;
  }
}

/**
 * Canonical failure payload returned by the MCP tools. Successful payloads
 * never carry the `ok: false` marker.
 */
export interface ToolFailure<Code extends string = string> {
  ok: false;
  code: Code;
  message: string;
  hint?: string;
}

/** Builds a {@link ToolFailure} from an arbitrary thrown value. */
export function toToolFailure(error: unknown): ToolFailure {
  if (error instanceof HybridQaError) {
    const failure: ToolFailure = { ok: false, code: error.code, message: error.message };
    if (error.hint) {
      failure.hint = error.hint;
    }
    return failure;
  }
  const message = error instanceof Error ? error.message : String(error);
  return { ok: false, code: ERROR_CODES.QUERY_INVALID_INPUT, message: normaliseErrorMessage(message) };
}
