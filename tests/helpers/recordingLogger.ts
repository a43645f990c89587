import { StructuredLogger, type LogEntry, type LogLevel } from "../../src/logger.js";

/**
 * Logger that keeps every structured entry in memory instead of writing to
 * stdout. Child loggers created through {@link StructuredLogger.child} share
 * the same buffer, so entries emitted by per-language loggers are captured
 * with their bindings.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: LogEntry[];

  constructor(level: LogLevel = "debug") {
    const entries: LogEntry[] = [];
    super({ logFile: null, level, echo: false, onEntry: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  /** Messages in emission order, optionally restricted to one level. */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
  }

  /** Entries whose message equals {@link message}. */
  find(message: string): LogEntry[] {
    return this.entries.filter((entry) => entry.message === message);
  }
}
