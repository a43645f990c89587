import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { hasErrnoCode } from "./nodePrimitives.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * Default maximum size (in bytes) of the primary log file before a rotation is
 * triggered.
 */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  /**
   * Fields merged into every object payload emitted by this logger. Explicit
   * payload keys take precedence.
   */
  readonly bindings?: Readonly<Record<string, unknown>>;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Writes entries to stdout. Defaults to `true`. */
  readonly echo?: boolean;
}

/**
 * Shared sink so that child loggers append to the same file through a single
 * ordered queue.
 */
export interface FileSink {
  readonly path: string;
  readonly maxFileSizeBytes: number;
  readonly maxFileCount: number;
  queue: Promise<void>;
  directoryReady: boolean;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly sink: FileSink | null;
  private readonly minLevel: LogLevel;
  private readonly bindings: Readonly<Record<string, unknown>>;
  private readonly echo: boolean;
  /** Optional listener invoked with the structured entry. */
  private readonly entryListener?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}, sink?: FileSink | null) {
    this.minLevel = options.level ?? "debug";
    this.bindings = options.bindings ?? {};
    this.entryListener = options.onEntry;
    this.echo = options.echo ?? true;
    if (sink !== undefined) {
      this.sink = sink;
    } else if (options.logFile) {
      this.sink = {
        path: options.logFile,
        maxFileSizeBytes: options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE,
        maxFileCount: Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT),
        queue: Promise.resolve(),
        directoryReady: false,
      };
    } else {
      this.sink = null;
    }
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Returns a logger sharing this instance's destination whose entries carry
   * the provided fields (for instance `{ language: "fr" }`).
   */
  child(fields: Readonly<Record<string, unknown>>): StructuredLogger {
    return new StructuredLogger(
      {
        level: this.minLevel,
        bindings: { ...this.bindings, ...fields },
        onEntry: this.entryListener,
        echo: this.echo,
      },
      this.sink,
    );
  }

  /** Whether entries at {@link level} pass the configured threshold. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    if (this.sink) {
      await this.sink.queue;
    }
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const merged = this.bindPayload(payload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(merged !== undefined ? { payload: serialiseErrors(merged) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.echo) {
      process.stdout.write(line);
    }
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const sink = this.sink;
    if (!sink) {
      return;
    }
    sink.queue = sink.queue
      .then(async () => {
        try {
          await ensureLogDestination(sink);
          await rotateIfNeeded(sink, Buffer.byteLength(line, "utf8"));
          await appendFile(sink.path, line, "utf8");
        } catch (err) {
          reportSinkFailure("log_file_write_failed", err);
          // Allow future attempts to retry directory creation after a failure.
          sink.directoryReady = false;
        }
      })
      .catch((err: unknown) => {
        reportSinkFailure("log_queue_failed", err);
        sink.queue = Promise.resolve();
      });
  }

  private bindPayload(payload: unknown): unknown {
    const hasBindings = Object.keys(this.bindings).length > 0;
    if (!hasBindings) {
      return payload;
    }
    if (payload === undefined) {
      return { ...this.bindings };
    }
    if (isPlainRecord(payload)) {
      return { ...this.bindings, ...payload };
    }
    return { ...this.bindings, value: payload };
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Errors do not survive `JSON.stringify`; their name, message and code are
 * copied into plain objects one level deep.
 */
function serialiseErrors(value: unknown): unknown {
  if (value instanceof Error) {
    return describeError(value);
  }
  if (!isPlainRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = entry instanceof Error ? describeError(entry) : entry;
  }
  return result;
}

function describeError(error: Error): Record<string, unknown> {
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    ...(code !== undefined ? { code } : {}),
  };
}

function reportSinkFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: error instanceof Error ? { message: error.message } : { error: String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

async function ensureLogDestination(sink: FileSink): Promise<void> {
  if (sink.directoryReady) {
    return;
  }
  await mkdir(dirname(sink.path), { recursive: true });
  sink.directoryReady = true;
}

/**
 * Rotates the active log file when appending the provided payload would
 * exceed the configured size limit. Rotation keeps at most `maxFileCount`
 * files including the active one.
 */
async function rotateIfNeeded(sink: FileSink, pendingBytes: number): Promise<void> {
  let currentSize = 0;
  try {
    const stats = await stat(sink.path);
    currentSize = stats.size;
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) {
      return;
    }
    throw error;
  }

  if (currentSize + pendingBytes <= sink.maxFileSizeBytes) {
    return;
  }

  try {
    await performRotation(sink);
  } catch (error) {
    reportSinkFailure("log_file_rotation_failed", error);
  }
}

async function performRotation(sink: FileSink): Promise<void> {
  const keep = sink.maxFileCount;
  if (keep === 1) {
    await rm(sink.path, { force: true });
    return;
  }

  await rm(`${sink.path}.${keep - 1}`, { force: true });

  for (let index = keep - 2; index >= 0; index -= 1) {
    const source = index === 0 ? sink.path : `${sink.path}.${index}`;
    try {
      await rename(source, `${sink.path}.${index + 1}`);
    } catch (error) {
      if (!hasErrnoCode(error, "ENOENT")) {
        throw error;
      }
    }
  }
}
