import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getSessionContext, type SessionLogContext } from "./infra/sessionContext.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  session_id?: string | null;
  request_id?: string | null;
  transport?: string | null;
}

const REDACTION_TOKEN = "[REDACTED]";

/** Payload keys whose values never reach the log when redaction is on. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "cookie",
  "set-cookie",
]);

const ENABLE_DIRECTIVES = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const DISABLE_DIRECTIVES = new Set(["off", "false", "no", "0", "disable", "disabled"]);

export interface RedactionDirectives {
  enabled: boolean;
  tokens: string[];
}

/**
 * Reads `RELAY_LOG_REDACT`, a comma-separated list mixing on/off switches and
 * substrings to scrub, e.g. `"on,placeholder-key"`. Listing substrings without
 * a switch turns redaction on.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  let enabled: boolean | undefined;
  const tokens = new Set<string>();
  for (const directive of (raw ?? "").split(",")) {
    const trimmed = directive.trim();
    if (!trimmed) {
      continue;
    }
    const lowered = trimmed.toLowerCase();
    if (DISABLE_DIRECTIVES.has(lowered)) {
      enabled = false;
    } else if (ENABLE_DIRECTIVES.has(lowered)) {
      enabled = true;
    } else {
      tokens.add(trimmed);
    }
  }
  return { enabled: enabled ?? tokens.size > 0, tokens: [...tokens] };
}

/** Reads `RELAY_LOG_LEVEL`; unknown values fall back to `debug`. */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const lowered = raw?.trim().toLowerCase();
  return lowered === "info" || lowered === "warn" || lowered === "error" ? lowered : "debug";
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Size in bytes past which the mirrored file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Files kept on disk, the active one included. */
  readonly maxFileCount?: number;
  /** Substrings or patterns scrubbed from every string of a payload. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the switch read from `RELAY_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Entries below this level are discarded. Defaults to `RELAY_LOG_LEVEL`. */
  readonly minLevel?: LogLevel;
  readonly onEntry?: (entry: LogEntry) => void;
}

/** Last-resort channel for failures of the log pipeline itself. */
function reportSinkFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Append-only file mirror rotating `relay.log` into `relay.log.1`,
 * `relay.log.2`, ... Writes are chained so lines keep their emission order.
 */
class RotatingFileSink {
  private queue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly path: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {}

  write(line: string): void {
    this.queue = this.queue.then(async () => {
      try {
        await this.append(line);
      } catch (error) {
        reportSinkFailure("log_file_write_failed", error);
        // The directory may have been removed; recreate it on the next line.
        this.directoryReady = false;
      }
    });
  }

  flush(): Promise<void> {
    return this.queue;
  }

  private async append(line: string): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.directoryReady = true;
    }
    const size = await this.currentSize();
    if (size > 0 && size + Buffer.byteLength(line, "utf8") > this.maxBytes) {
      try {
        await this.rotate();
      } catch (error) {
        reportSinkFailure("log_file_rotation_failed", error);
      }
    }
    await appendFile(this.path, line, "utf8");
  }

  private async currentSize(): Promise<number> {
    try {
      return (await stat(this.path)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return 0;
      }
      throw error;
    }
  }

  private async rotate(): Promise<void> {
    if (this.maxFiles === 1) {
      await rm(this.path, { force: true });
      return;
    }
    await rm(`${this.path}.${this.maxFiles - 1}`, { force: true });
    for (let index = this.maxFiles - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${this.path}.${index}`, `${this.path}.${index + 1}`);
    }
    await renameIfPresent(this.path, `${this.path}.1`);
  }
}

/**
 * JSON-lines logger writing to stdout, optionally mirrored to a rotating file.
 * Entries emitted inside {@link runWithSessionContext} carry the session,
 * request and transport of that context.
 */
export class StructuredLogger {
  private readonly sink: RotatingFileSink | null;
  private readonly secrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly minRank: number;
  private readonly onEntry?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(process.env.RELAY_LOG_REDACT);
    this.secrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.minRank = LEVEL_RANK[options.minLevel ?? parseLogLevel(process.env.RELAY_LOG_LEVEL)];
    this.onEntry = options.onEntry;
    this.sink = options.logFile
      ? new RotatingFileSink(
          options.logFile,
          options.maxFileSizeBytes ?? 5 * 1024 * 1024,
          Math.max(1, options.maxFileCount ?? 5),
        )
      : null;
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

  /** Resolves once every mirrored line reached the file. */
  async flush(): Promise<void> {
    await this.sink?.flush();
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...correlationFields(getSessionContext()),
      ...(payload !== undefined ? { payload: this.redactionEnabled ? this.redact(payload) : payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);
    this.onEntry?.(structuredClone(entry));
    this.sink?.write(line);
  }

  private redact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
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

  private scrub(value: string): string {
    let result = value;
    for (const secret of this.secrets) {
      if (typeof secret === "string") {
        result = secret ? result.split(secret).join(REDACTION_TOKEN) : result;
      } else {
        result = result.replace(secret, REDACTION_TOKEN);
      }
    }
    return result;
  }
}

function correlationFields(context: SessionLogContext | undefined): Pick<LogEntry, "session_id" | "request_id" | "transport"> {
  const fields: Pick<LogEntry, "session_id" | "request_id" | "transport"> = {};
  if (context?.sessionId !== undefined) {
    fields.session_id = context.sessionId;
  }
  if (context?.requestId !== undefined) {
    fields.request_id = context.requestId;
  }
  if (context?.transport !== undefined) {
    fields.transport = context.transport;
  }
  return fields;
}
