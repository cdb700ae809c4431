import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted literals enabling redaction through `NETWORK_LOG_REDACT`. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set(["authorization", "x-api-key", "api_key", "token", "access_token", "password", "secret"]);

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly minLevel?: LogLevel;
  /** Static component name stamped on every entry. */
  readonly component?: string;
  /**
   * Explicit toggle for structured payload redaction. When omitted, the logger
   * honours the `NETWORK_LOG_REDACT` environment variable.
   */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Destination of the JSON lines; defaults to stdout. */
  readonly sink?: (line: string) => void;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly minLevel: LogLevel;
  private readonly component?: string;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly sink: (line: string) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory containing {@link logFile} has been created. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.minLevel = options.minLevel ?? "info";
    this.component = options.component;
    this.entryListener = options.onEntry;
    this.sink = options.sink ?? ((line) => process.stdout.write(line));
    const envToggle = (process.env.NETWORK_LOG_REDACT ?? "").trim().toLowerCase();
    this.redactionEnabled = options.redactionEnabled ?? REDACTION_ENABLE_TOKENS.has(envToggle);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
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

  /** Returns a logger sharing this one's sink and file but stamping another component. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({
      logFile: this.logFile ?? null,
      minLevel: this.minLevel,
      component,
      redactionEnabled: this.redactionEnabled,
      onEntry: this.entryListener,
      sink: this.sink,
    });
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const safePayload = payload !== undefined && this.redactionEnabled ? this.deepRedact(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        if (!this.logDirectoryReady) {
          await mkdir(dirname(logFile), { recursive: true });
          this.logDirectoryReady = true;
        }
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
        // Allow future attempts to retry directory creation after a failure.
        this.logDirectoryReady = false;
      }
    });
  }

  private deepRedact(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }
}

/** Logger discarding everything; handy default for library callers. */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ sink: () => undefined, minLevel: "error" });
}
