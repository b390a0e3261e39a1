import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Keys whose values are redacted from structured payloads. */
const SENSITIVE_KEYS = new Set(["authorization", "token", "access_token", "api_key", "apikey", "password", "secret"]);

/**
 * Default maximum size (in bytes) of the mirrored log file before it rotates.
 */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of log files retained during rotation (active one included). */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  child_id?: string | null;
  payload?: unknown;
}

/** Minimal sink the logger writes JSON lines to. */
export interface LogSink {
  write(line: string): unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the mirrored log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /**
   * Destination of the JSON lines. Defaults to stderr because stdout carries
   * the host protocol when the hub runs over stdio.
   */
  readonly sink?: LogSink;
  /** Redacts {@link SENSITIVE_KEYS} from payloads. Enabled by default. */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting JSON lines. File writes are queued sequentially
 * so the mirrored log keeps the emission order.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly sink: LogSink;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.sink = options.sink ?? process.stderr;
    this.redactionEnabled = options.redactionEnabled ?? true;
    this.entryListener = options.onEntry;
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
   * Returns a logger sharing this one's destinations whose entries carry the
   * provided child identity.
   */
  forChild(childId: string): StructuredLogger {
    return new ChildScopedLogger(this, childId);
  }

  /** Waits for every pending file write. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const childId = extractChildId(safePayload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(childId !== null ? { child_id: childId } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    if (this.entryListener) {
      try {
        this.entryListener(structuredClone(entry));
      } catch (error) {
        this.writeFailure("log_listener_failed", error);
      }
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        this.writeFailure("log_file_write_failed", error);
        // Allow the next write to retry the directory creation.
        this.logDirectoryReady = false;
      }
    });
  }

  /** Reports a logging failure straight to the sink, bypassing listeners and the file. */
  private writeFailure(message: string, error: unknown): void {
    const failure: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: { message: error instanceof Error ? error.message : String(error) },
    };
    this.sink.write(`${JSON.stringify(failure)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the mirrored file when appending the pending bytes would exceed
   * the configured size. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redact(value: unknown): unknown {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack ?? null };
    }
    if (!this.redactionEnabled) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry);
      }
      return result;
    }
    return value;
  }
}

/** Logger stamping a fixed child identity while delegating to its parent. */
class ChildScopedLogger extends StructuredLogger {
  constructor(
    private readonly parent: StructuredLogger,
    private readonly scopedChildId: string,
  ) {
    super({ sink: { write: () => undefined } });
  }

  override info(message: string, payload?: unknown): void {
    this.parent.info(message, this.stamp(payload));
  }

  override warn(message: string, payload?: unknown): void {
    this.parent.warn(message, this.stamp(payload));
  }

  override error(message: string, payload?: unknown): void {
    this.parent.error(message, this.stamp(payload));
  }

  override debug(message: string, payload?: unknown): void {
    this.parent.debug(message, this.stamp(payload));
  }

  override forChild(childId: string): StructuredLogger {
    return this.parent.forChild(childId);
  }

  override async flush(): Promise<void> {
    await this.parent.flush();
  }

  private stamp(payload: unknown): Record<string, unknown> {
    if (payload && typeof payload === "object" && !Array.isArray(payload) && !(payload instanceof Error)) {
      return { child_id: this.scopedChildId, ...payload };
    }
    return payload === undefined
      ? { child_id: this.scopedChildId }
      : { child_id: this.scopedChildId, detail: payload };
  }
}

/** Hoists the `child_id` correlation field of a payload onto the entry. */
function extractChildId(payload: unknown): string | null {
  if (payload && typeof payload === "object" && "child_id" in payload && typeof payload.child_id === "string") {
    return payload.child_id;
  }
  return null;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}
