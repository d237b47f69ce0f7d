// src/utils/logger.ts
//
// Glint Logger (structured, lightweight)
// --------------------------------------
// Central logging utility used by:
// - server.ts (LSP server)
// - cli.ts / run.ts (runner)
// - compile.ts (stage timings) and instance.ts (faults, reloads)
//
// Usage:
//   const log = createLogger({ name: "glint", level: "info" });
//   log.info("Hello", { x: 1 });
//   const t = log.time("parse"); ... t.end();
//
// Levels:
//   silent < error < warn < info < debug < trace

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  /** Defaults to the console. */
  sink?: LogSink;
  timestamp?: boolean;
  /** Append the JSON payload after the message. */
  includePayload?: boolean;
};

export type Timer = {
  /** Logs the elapsed time at debug and returns it in milliseconds. */
  end: (payload?: unknown) => number;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const CONSOLE_SINK: LogSink = {
  error: (msg) => console.error(msg),
  warn: (msg) => console.warn(msg),
  info: (msg) => console.log(msg),
  debug: (msg) => console.debug(msg),
};

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  private readonly onceKeys = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "glint";
    this.level = options.level ?? "info";
    this.timestamp = options.timestamp ?? true;
    this.includePayload = options.includePayload ?? true;
    this.sink = options.sink ?? CONSOLE_SINK;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /** Same sink and settings, name suffixed with `:name`. */
  public child(name: string): Logger {
    return new Logger({
      name: `${this.name}:${name}`,
      level: this.level,
      sink: this.sink,
      timestamp: this.timestamp,
      includePayload: this.includePayload,
    });
  }

  public error(msg: string, payload?: unknown): void {
    this.emit("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.emit("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.emit("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.emit("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.emit("trace", msg, payload);
  }

  public logOnce(level: Exclude<LogLevel, "silent">, key: string, msg: string, payload?: unknown): void {
    if (this.onceKeys.has(key)) return;
    this.onceKeys.add(key);
    this.emit(level, msg, payload);
  }

  public time(label: string): Timer {
    const start = performance.now();
    this.trace(`start ${label}`);

    return {
      end: (payload?: unknown) => {
        const ms = performance.now() - start;
        this.debug(`${label} took ${ms.toFixed(2)}ms`, payload);
        return ms;
      },
    };
  }

  private emit(level: Exclude<LogLevel, "silent">, msg: string, payload?: unknown): void {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[this.level]) return;

    const line = this.formatLine(level, msg, payload);

    if (level === "error") this.sink.error(line);
    else if (level === "warn") this.sink.warn(line);
    else if (level === "info") this.sink.info(line);
    else this.sink.debug(line);
  }

  private formatLine(level: string, msg: string, payload?: unknown): string {
    const ts = this.timestamp ? `${isoTime()} ` : "";
    const head = `${ts}[${this.name}] ${level.toUpperCase()}: ${msg}`;

    if (payload === undefined || !this.includePayload) return head;
    return `${head} ${safeStringify(payload)}`;
  }
}

/* =========================================================
   Factory
   ========================================================= */

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** A logger that drops everything; the default for library entry points. */
export const SILENT_LOGGER: Logger = new Logger({ level: "silent" });

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/* =========================================================
   Utilities
   ========================================================= */

export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function isoTime(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}
