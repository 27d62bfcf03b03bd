// worldcore/utils/logger.ts

import { Colors, colorize, type ColorCode } from "./colors";
import { logEnabled, type LogLevel } from "../config/logconfig";

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

function maybeFormatError(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack,
    };
  }
  return value;
}

export type LogSink = (line: string, ...rest: unknown[]) => void;

const defaultSink: LogSink = (line, ...rest) => console.log(line, ...rest);

let sink: LogSink = defaultSink;

/** Redirect log output (tests capture lines this way). Pass nothing to restore console. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? defaultSink;
}

export class Logger {
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, args: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    const [first, ...rest] = args;

    // If first arg is string, show it inline; otherwise just tag + data.
    if (typeof first === "string") {
      sink(`${timestamp()} ${tag} ${first}`, ...rest.map(maybeFormatError));
    } else {
      sink(`${timestamp()} ${tag}`, ...args.map(maybeFormatError));
    }
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
}
