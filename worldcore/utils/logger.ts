// worldcore/utils/logger.ts

import { Colors, colorize, ColorCode } from "./colors";
import { LogLevel, logEnabled } from "../config/logconfig";

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function levelColor(level: LogLevel): ColorCode {
  switch (level) {
    case "debug":
      return Colors.BrightCyan;
    case "info":
      return Colors.FgGreen;
    case "warn":
      return Colors.FgYellow;
    case "error":
    default:
      return Colors.FgRed;
  }
}

function normalizeArgs(args: unknown[]): { message?: string; rest: unknown[] } {
  if (args.length === 0) {
    return { rest: [] };
  }

  const [first, ...rest] = args;

  if (typeof first === "string") {
    return { message: first, rest };
  }

  return { message: undefined, rest: args };
}

function formatError(err: Error): Record<string, unknown> {
  return {
    error: err.message,
    name: err.name,
    stack: err.stack,
  };
}

// Errors nested one level deep in a metadata object ({ err }) are expanded too;
// console.log would otherwise print them as "{}" once serialized by the file tap.
function maybeFormatError(value: unknown): unknown {
  if (value instanceof Error) {
    return formatError(value);
  }
  if (value && typeof value === "object" && !Array.isArray(value)) {
    const entries = Object.entries(value);
    if (entries.some(([, v]) => v instanceof Error)) {
      return Object.fromEntries(
        entries.map(([k, v]) => [k, v instanceof Error ? formatError(v) : v]),
      );
    }
  }
  return value;
}

export type LogSink = (line: string, ...meta: unknown[]) => void;

const consoleSink: LogSink = (line, ...meta) => {
  console.log(line, ...meta);
};

export class Logger {
  private static sink: LogSink = consoleSink;

  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  /** Redirect every logger's output; returns the previous sink. */
  static setSink(sink: LogSink | null): LogSink {
    const previous = Logger.sink;
    Logger.sink = sink ?? consoleSink;
    return previous;
  }

  private write(level: LogLevel, color: ColorCode, args: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const ts = timestamp();
    const { message, rest } = normalizeArgs(args);

    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    const head = message !== undefined ? `${ts} ${tag} ${message}` : `${ts} ${tag}`;

    Logger.sink(head, ...rest.map(maybeFormatError));
  }

  debug(...args: unknown[]): void {
    this.write("debug", levelColor("debug"), args);
  }

  info(...args: unknown[]): void {
    this.write("info", levelColor("info"), args);
  }

  warn(...args: unknown[]): void {
    this.write("warn", levelColor("warn"), args);
  }

  error(...args: unknown[]): void {
    this.write("error", levelColor("error"), args);
  }

  // Convenience alias – logs at info level but with bright green tag
  success(...args: unknown[]): void {
    this.write("info", Colors.BrightGreen, args);
  }
}
