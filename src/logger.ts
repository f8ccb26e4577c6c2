import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getRequestContext, type RequestCorrelation } from "./infra/requestContext.js";

/** Placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
  "cookie",
  "set-cookie",
]);

/** Default maximum size (in bytes) of the log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

/** Default number of log files retained during rotation, active one included. */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  request_id?: string | number | null;
  method?: string;
  transport?: string;
  user_id?: string;
  session_id?: string | null;
}

/** Minimal writable surface used for the primary sink. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /**
   * Primary sink receiving one JSON line per entry. Defaults to stdout; the
   * line-delimited transport switches it to stderr since stdout carries the
   * protocol.
   */
  readonly stream?: LogSink | null;
  /** Redacts {@link SENSITIVE_KEYS} from structured payloads. */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly minimumRank: number;
  private readonly stream: LogSink | null;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Avoids a `mkdir` per entry once the log directory exists. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.minimumRank = LEVEL_RANK[options.level ?? "info"];
    this.stream = options.stream === undefined ? process.stdout : options.stream;
    this.redactionEnabled = options.redactionEnabled ?? false;
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

  /** Waits for pending file writes. Tests use it to assert mirrored files. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.minimumRank) {
      return;
    }
    const correlation = getRequestContext();
    const safePayload = payload !== undefined ? this.redactStructuredValue(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.collectCorrelationFields(correlation),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream?.write(line);
    if (this.entryListener) {
      this.entryListener(entry);
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
      } catch (err) {
        process.stderr.write(
          `${JSON.stringify({
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: { message: err instanceof Error ? err.message : String(err) },
          })}\n`,
        );
        this.logDirectoryReady = false;
      }
    });
  }

  private collectCorrelationFields(correlation: RequestCorrelation | undefined): Partial<LogEntry> {
    if (!correlation) {
      return {};
    }
    return {
      ...(correlation.requestId !== undefined ? { request_id: correlation.requestId } : {}),
      ...(correlation.method !== undefined ? { method: correlation.method } : {}),
      ...(correlation.transport !== undefined ? { transport: correlation.transport } : {}),
      ...(correlation.userId !== undefined ? { user_id: correlation.userId } : {}),
      ...(correlation.sessionId !== undefined ? { session_id: correlation.sessionId } : {}),
    };
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active log file when appending `pendingBytes` would exceed the
   * size limit, keeping at most {@link maxFileCount} files.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
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
    for (let index = this.maxFileCount - 2; index >= 0; index -= 1) {
      const source = index === 0 ? logFile : `${logFile}.${index}`;
      try {
        await rename(source, `${logFile}.${index + 1}`);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== "ENOENT") {
          throw error;
        }
      }
    }
  }

  private redactStructuredValue(value: unknown): unknown {
    return this.redactionEnabled ? deepRedact(value) : value;
  }
}

function deepRedact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => deepRedact(item));
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : deepRedact(entry);
    }
    return result;
  }
  return value;
}
