import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import { LOG_LEVELS, type LogData, type LogLevel, type Logger } from "../ports/logger";
import { ConfigurationError } from "../application/errors";

export type LogSink = Pick<Console, "log" | "warn" | "error">;

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (value === undefined || value.trim() === "") return fallback;
  const level = LOG_LEVELS.find((l) => l === value.trim().toLowerCase());
  if (!level) {
    throw new ConfigurationError(
      `Invalid log level "${value}" (expected one of: ${LOG_LEVELS.join(", ")})`
    );
  }
  return level;
}

/**
 * Line-oriented logger: `<iso> <LEVEL> [context] message {data}`.
 * warn/error go to stderr, everything else to stdout.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = "info",
    private readonly context?: string,
    private readonly sink: LogSink = console,
    private readonly clock: Clock = systemClock
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private format(level: LogLevel, message: string, data?: LogData): string {
    const parts = [this.clock.now().toISOString(), level.toUpperCase().padEnd(5)];
    if (this.context) parts.push(`[${this.context}]`);
    parts.push(message);
    if (data && Object.keys(data).length > 0) parts.push(JSON.stringify(data));
    return parts.join(" ");
  }

  private write(level: LogLevel, message: string, data?: LogData) {
    if (!this.shouldLog(level)) return;
    const line = this.format(level, message, data);

    switch (level) {
      case "error":
        this.sink.error(line);
        break;
      case "warn":
        this.sink.warn(line);
        break;
      default:
        this.sink.log(line);
    }
  }

  debug(message: string, data?: LogData): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.write("error", message, data);
  }
}

export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
