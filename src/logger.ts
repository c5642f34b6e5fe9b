import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { readOptionalString } from "./config/env.js";
import type { LOG_LEVELS } from "./config/settings.js";

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const REDACTED = "[REDACTED]";

/** Payload keys always masked once structured redaction is on. */
const SECRET_KEYS = new Set(["api_key", "apikey", "api-key", "x-api-key", "authorization", "password", "secret", "token"]);

const TOGGLES_ON = new Set(["1", "true", "on", "yes", "enable", "enabled"]);
const TOGGLES_OFF = new Set(["0", "false", "off", "no", "disable", "disabled"]);

export interface RedactionDirectives {
  enabled: boolean;
  tokens: string[];
}

/**
 * Reads a `TREEFLOW_LOG_REDACT` value. Each comma separated item is either a
 * toggle (`on`, `off`, ...) or a literal to scrub. Literals without a toggle
 * switch redaction on; the last toggle wins.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  const tokens: string[] = [];
  let toggle: boolean | undefined;
  for (const item of (raw ?? "").split(",")) {
    const directive = item.trim();
    if (!directive) {
      continue;
    }
    const lowered = directive.toLowerCase();
    if (TOGGLES_ON.has(lowered)) {
      toggle = true;
    } else if (TOGGLES_OFF.has(lowered)) {
      toggle = false;
    } else if (!tokens.includes(directive)) {
      tokens.push(directive);
    }
  }
  return { enabled: toggle ?? tokens.length > 0, tokens };
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Mirror file for every entry; `null` or absent keeps the logger off disk. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly minLevel?: LogLevel;
  /** Defaults to `true`. */
  readonly stdout?: boolean;
  /** Size at which the mirror file is rotated. Defaults to 5 MiB. */
  readonly maxFileSizeBytes?: number;
  /** Files kept on disk, the active one included. Defaults to 5. */
  readonly maxFileCount?: number;
  /** Literals or patterns replaced in messages and in string payload values. */
  readonly redactSecrets?: ReadonlyArray<string | RegExp>;
  /** Masks {@link SECRET_KEYS} in payloads. Overrides `TREEFLOW_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Receives a copy of each emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

class Redactor {
  constructor(
    private readonly maskKeys: boolean,
    private readonly patterns: ReadonlyArray<string | RegExp>,
  ) {}

  get idle(): boolean {
    return !this.maskKeys && this.patterns.length === 0;
  }

  text(value: string): string {
    return this.patterns.reduce<string>((current, pattern) => {
      if (typeof pattern === "string") {
        return pattern ? current.split(pattern).join(REDACTED) : current;
      }
      return current.replace(pattern, REDACTED);
    }, value);
  }

  value(value: unknown): unknown {
    if (typeof value === "string") {
      return this.text(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.value(item));
    }
    if (value !== null && typeof value === "object") {
      const masked: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        masked[key] = this.maskKeys && SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : this.value(nested);
      }
      return masked;
    }
    return value;
  }
}

/**
 * Append-only mirror of the log stream. Writes are chained so lines land in
 * emission order; `path`, `path.1` ... `path.{maxFiles-1}` are kept on rotation.
 */
class RotatingLogFile {
  private chain: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly path: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {}

  append(line: string): void {
    this.chain = this.chain.then(() => this.write(line)).catch((error: unknown) => {
      this.directoryReady = false;
      process.stderr.write(
        `${JSON.stringify({ timestamp: new Date().toISOString(), level: "error", message: "log_file_write_failed", payload: { error: String(error) } })}\n`,
      );
    });
  }

  drain(): Promise<void> {
    return this.chain;
  }

  private async write(line: string): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.directoryReady = true;
    }
    const size = await currentSize(this.path);
    if (size !== null && size + Buffer.byteLength(line, "utf8") > this.maxBytes) {
      await this.rotate();
    }
    await appendFile(this.path, line, "utf8");
  }

  private async rotate(): Promise<void> {
    if (this.maxFiles === 1) {
      await rm(this.path, { force: true });
      return;
    }
    await rm(`${this.path}.${this.maxFiles - 1}`, { force: true });
    for (let generation = this.maxFiles - 2; generation >= 1; generation -= 1) {
      await moveIfPresent(`${this.path}.${generation}`, `${this.path}.${generation + 1}`);
    }
    await moveIfPresent(this.path, `${this.path}.1`);
  }
}

/**
 * JSON-lines logger used by tree contexts. Entries go to stdout, to an
 * optional rotating file and to an optional listener.
 */
export class StructuredLogger {
  private readonly minLevel: LogLevel;
  private readonly stdout: boolean;
  private readonly redactor: Redactor;
  private readonly file: RotatingLogFile | null;
  private readonly listener: ((entry: LogEntry) => void) | undefined;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(readOptionalString("TREEFLOW_LOG_REDACT"));
    this.minLevel = options.minLevel ?? "debug";
    this.stdout = options.stdout ?? true;
    this.redactor = new Redactor(options.redactionEnabled ?? directives.enabled, [
      ...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])]),
    ]);
    this.file = options.logFile
      ? new RotatingLogFile(
          options.logFile,
          options.maxFileSizeBytes ?? 5 * 1024 * 1024,
          Math.max(1, options.maxFileCount ?? 5),
        )
      : null;
    this.listener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.emit("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.emit("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.emit("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.emit("error", message, payload);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  /** Resolves once every queued file write has been attempted. */
  async flush(): Promise<void> {
    await this.file?.drain();
  }

  private emit(level: LogLevel, message: string, payload: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message: this.redactor.text(message) };
    if (payload !== undefined) {
      entry.payload = this.redactor.idle ? payload : this.redactor.value(payload);
    }
    const line = `${JSON.stringify(entry)}\n`;
    if (this.stdout) {
      process.stdout.write(line);
    }
    this.listener?.(structuredClone(entry));
    this.file?.append(line);
  }
}

async function currentSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

async function moveIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
