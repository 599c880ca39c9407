import { StructuredLogger, type LogEntry } from "../../src/logger.js";

/**
 * Logger capturing entries in memory through the production `onEntry` hook, so
 * the query context enrichment and redaction still apply to what tests see.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: LogEntry[];

  constructor() {
    const entries: LogEntry[] = [];
    super({ logFile: null, stdout: false, redactionEnabled: false, onEntry: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  find(message: string): LogEntry | undefined {
    return this.entries.find((entry) => entry.message === message);
  }
}
