// src/utils/logger.ts
//
// Kaleidoscope Logger
// -------------------
// Leveled line logger. The language service reports stage timings through it,
// the codegen driver one line per declaration, the config loader rejected
// values, and the parser (at trace) every declaration it finishes.
//
// Line shape:  [<timestamp> ][<name>] <LEVEL>: <message>[ <payload as JSON>]
//
// Levels:
//   silent < error < warn < info < debug < trace

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

/** Where finished lines go. Trace lines share the debug channel. */
export type LogSink = {
  error: (line: string) => void;
  warn: (line: string) => void;
  info: (line: string) => void;
  debug: (line: string) => void;
};

export type LoggerOptions = {
  name?: string; // default: "kaleidoscope"
  level?: LogLevel; // default: "info"
  sink?: LogSink; // default: console
  timestamp?: boolean; // default: true
  includePayload?: boolean; // default: true
};

export type Timer = {
  /** Logs the elapsed time at debug level and returns it in ms. */
  end: (payload?: unknown) => number;
};

type ActiveLevel = Exclude<LogLevel, "silent">;

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const consoleSink: LogSink = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  private readonly seenKeys = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "kaleidoscope";
    this.level = options.level ?? "info";
    this.sink = options.sink ?? consoleSink;
    this.timestamp = options.timestamp ?? true;
    this.includePayload = options.includePayload ?? true;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public isEnabled(level: ActiveLevel): boolean {
    return RANK[level] <= RANK[this.level];
  }

  public error(msg: string, payload?: unknown): void {
    this.write("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.write("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.write("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.write("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.write("trace", msg, payload);
  }

  /** Writes `msg` the first time `key` is seen; later calls with the key are dropped. */
  public logOnce(level: ActiveLevel, key: string, msg: string, payload?: unknown): void {
    if (this.seenKeys.has(key)) return;
    this.seenKeys.add(key);
    this.write(level, msg, payload);
  }

  public time(label: string): Timer {
    const startedAt = performance.now();
    this.trace(`start ${label}`);

    return {
      end: (payload?: unknown) => {
        const ms = performance.now() - startedAt;
        this.debug(`end ${label} (${ms.toFixed(2)}ms)`, payload);
        return ms;
      },
    };
  }

  private write(level: ActiveLevel, msg: string, payload?: unknown): void {
    if (!this.isEnabled(level)) return;

    const parts: string[] = [];
    if (this.timestamp) parts.push(isoSeconds());
    parts.push(`[${this.name}]`, `${level.toUpperCase()}:`, msg);
    if (payload !== undefined && this.includePayload) parts.push(safeStringify(payload));

    const line = parts.join(" ");
    switch (level) {
      case "error":
        return this.sink.error(line);
      case "warn":
        return this.sink.warn(line);
      case "info":
        return this.sink.info(line);
      case "debug":
      case "trace":
        return this.sink.debug(line);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** Logger that drops everything; the default for library entry points. */
export const silentLogger: Logger = new Logger({ level: "silent" });

/** Single-line JSON; cyclic or otherwise unserializable values become a marker. */
export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "[unserializable]";
  }
}

// 2026-01-31T12:00:00Z
function isoSeconds(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}
