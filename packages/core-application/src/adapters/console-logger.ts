import type { LogContext, Logger, LogLevel } from "../ports/logger";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  scope?: string;
  /** Defaults to the global console. */
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
};

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope: string | undefined;
  private readonly sink: Pick<Console, "debug" | "info" | "warn" | "error">;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.scope = options.scope;
    this.sink = options.sink ?? console;
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const prefix = this.scope ? `[${this.scope}] ` : "";
    const line = `${new Date().toISOString()} ${level.toUpperCase()} ${prefix}${message}`;
    if (context && Object.keys(context).length > 0) this.sink[level](line, context);
    else this.sink[level](line);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      sink: this.sink,
    });
  }
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
