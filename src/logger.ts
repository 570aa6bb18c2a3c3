import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { hasErrnoCode } from "./nodePrimitives.js";
import { getSessionContext, type SessionContext } from "./infra/sessionContext.js";

/** Placeholder inserted when a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are redacted when `BRIDGE_LOG_REDACT=on`. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "cookie",
  "set-cookie",
]);

/**
 * Parses `BRIDGE_LOG_REDACT`. The variable accepts comma-separated directives
 * such as `"on,ghp_"`: toggles switch redaction on or off while any other
 * entry is a substring scrubbed from string payload values. Providing
 * substrings without a toggle enables redaction implicitly.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: string[];
} {
  const directives = (raw ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Size (bytes) of the mirrored log file that triggers a rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

/** Number of log files kept during rotation, the active one included. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  session_id?: string;
  server_name?: string | null;
  transport?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /**
   * Explicit toggle for payload redaction. Defaults to the directive parsed
   * from `BRIDGE_LOG_REDACT`.
   */
  readonly redactionEnabled?: boolean;
}

/**
 * Structured logger emitting JSON lines on stdout and optionally mirroring
 * them to a file. File writes are queued so their order matches emission.
 * Entries emitted while a session is active carry its correlation fields.
 */
export class StructuredLogger {
  private readonly logFile: string | undefined;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactTokens: string[];
  private readonly redactionEnabled: boolean;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.BRIDGE_LOG_REDACT);
    this.redactTokens = directives.tokens;
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
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

  /** Waits until every queued file write has been flushed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.correlationFields(getSessionContext()),
      ...(payload !== undefined ? { payload: this.redact(payload) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (error) {
          this.reportFileFailure("log_file_write_failed", error);
          // Let the next entry retry the directory creation.
          this.logDirectoryReady = false;
        }
      })
      .catch(() => {
        this.writeQueue = Promise.resolve();
      });
  }

  private correlationFields(context: SessionContext | undefined): Partial<LogEntry> {
    if (!context) {
      return {};
    }
    return {
      session_id: context.sessionId,
      transport: context.transport,
      ...(context.serverName !== undefined ? { server_name: context.serverName } : {}),
    };
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      this.reportFileFailure("log_file_rotation_failed", error);
    }
  }

  /** Shifts `log.N` to `log.N+1`, dropping the oldest file beyond {@link maxFileCount}. */
  private async performRotation(logFile: string): Promise<void> {
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
        if (!hasErrnoCode(error, "ENOENT")) {
          throw error;
        }
      }
    }
  }

  private reportFileFailure(message: string, error: unknown): void {
    const failure: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: { message: error instanceof Error ? error.message : String(error) },
    };
    process.stderr.write(`${JSON.stringify(failure)}\n`);
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (typeof value === "string") {
      let sanitised = value;
      for (const token of this.redactTokens) {
        sanitised = sanitised.split(token).join(REDACTION_TOKEN);
      }
      return sanitised;
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
