import kleur from "kleur";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  color?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_TAG: Record<LogLevel, (text: string) => string> = {
  debug: (text) => kleur.gray(text),
  info: (text) => kleur.cyan(text),
  warn: (text) => kleur.yellow(text),
  error: (text) => kleur.red(text),
};

export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly color: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_RANK[options.level ?? "info"];
    this.sink = options.sink ?? process.stderr;
    this.color = options.color ?? false;
  }

  debug(message: string, context?: LogContext): void {
    this.emit("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit("error", message, context);
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < this.threshold) {
      return;
    }
    const tag = `[${level}]`;
    const prefix = this.color ? LEVEL_TAG[level](tag) : tag;
    this.sink.write(`${prefix} ${message}${formatContext(context)}\n`);
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function formatContext(context?: LogContext): string {
  if (!context) {
    return "";
  }
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}
