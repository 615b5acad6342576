import { ValidationError } from "./errors";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

/**
 * Leveled diagnostic sink shared by every component
 */
export interface Logger {
  trace(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  isLevelEnabled(level: LogLevel): boolean;
  child(component: string): Logger;
}

const LEVEL_ICONS: Record<LogLevel, string> = {
  trace: "🔬",
  debug: "🔍",
  info: "ℹ️ ",
  warn: "⚠️ ",
  error: "❌",
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === "") return "info";
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ValidationError(
      `invalid log level "${value}" (use one of: ${LOG_LEVELS.join(", ")})`
    );
  }
  return level;
}

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") {
    return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

/**
 * Console-backed logger. Everything goes to stderr so stdout stays reserved
 * for user-facing output and JSON mode.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private component?: string;

  constructor(level: LogLevel = "info", component?: string) {
    this.level = level;
    this.component = component;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  child(component: string): Logger {
    const name = this.component ? `${this.component}.${component}` : component;
    return new ConsoleLogger(this.level, name);
  }

  trace(message: string, fields?: LogFields): void {
    this.write("trace", message, fields);
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) return;
    try {
      const prefix = this.component ? `[${this.component}] ` : "";
      const extra = formatFields(fields);
      console.error(
        `${LEVEL_ICONS[level]} ${prefix}${message}${extra ? ` ${extra}` : ""}`
      );
    } catch {
      // stderr closed
    }
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  isLevelEnabled: () => false,
  child: () => silentLogger,
};

export default ConsoleLogger;
