import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  echo?: {
    minLevel?: LogLevel;
    writer?: EchoWriter;
  };
  clock?: () => number;
}

function isEchoSuppressed(): boolean {
  const raw = process.env.BRICKDEV_DISABLE_LOG_ECHO;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

// stdout belongs to the program running on the brick, so everything we
// say ourselves goes to stderr
const defaultEchoWriter: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  const { level, scope, message, meta } = entry;
  const prefix =
    level === "error"
      ? "error:"
      : level === "warn"
        ? "warning:"
        : level === "info"
          ? "--"
          : "..";
  const scopeText = scope ? `[${scope}] ` : "";
  if (meta) {
    console.error(`${prefix} ${scopeText}${message}`, serializeMeta(meta));
  } else {
    console.error(`${prefix} ${scopeText}${message}`);
  }
};

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

function atOrAbove(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export class StructuredLogger implements Logger {
  private readonly sink: Sink;
  private readonly echoMinLevel?: LogLevel;
  private readonly echoWriter: EchoWriter;
  private readonly clock: () => number;
  private readonly scope?: string;

  constructor({ scope, sink, echo, clock }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.echoMinLevel = echo?.minLevel;
    this.echoWriter = echo?.writer ?? defaultEchoWriter;
    this.clock = clock ?? Date.now;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      echo: this.echoMinLevel
        ? { minLevel: this.echoMinLevel, writer: this.echoWriter }
        : undefined,
      clock: this.clock,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink(entry);
    if (this.echoMinLevel && atOrAbove(level, this.echoMinLevel)) {
      this.echoWriter(entry);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    // with no echo configured every entry still reaches the sink
    return this.echoMinLevel ? atOrAbove(level, this.echoMinLevel) : true;
  }
}

export class NullLogger implements Logger {
  child(_scope: string): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(_level: LogLevel): boolean {
    return false;
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ echo: { minLevel } });
  }
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function errorMeta(err: unknown): Record<string, unknown> {
  return { error: err instanceof Error ? err.message : String(err) };
}
