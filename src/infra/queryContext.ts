import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

/**
 * Correlation data attached to every log entry emitted while a query is being
 * served. The engine opens the context once per `answer()` call so nested
 * helpers (matcher, traversal, fusion) never have to thread identifiers.
 */
export interface QueryContext {
  readonly queryId: string;
  readonly snapshotGeneration: number | null;
  readonly startedAt: number;
}

const storage = new AsyncLocalStorage<QueryContext>();

/** Executes {@link callback} with a fresh query context. */
export function runWithQueryContext<T>(
  init: { queryId?: string; snapshotGeneration: number | null },
  callback: (context: QueryContext) => T,
): T {
  const context: QueryContext = {
    queryId: init.queryId ?? randomUUID(),
    snapshotGeneration: init.snapshotGeneration,
    startedAt: Date.now(),
  };
  return storage.run(context, () => callback(context));
}

/** Retrieves the query context associated with the current async execution. */
export function getQueryContext(): QueryContext | undefined {
  return storage.getStore();
}
