/**
 * Structured console logger.
 *
 * JSON lines when NODE_ENV=production, a single readable line otherwise.
 * LOG_LEVEL selects the minimum level (default info).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogMetadata {
  readonly [key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(
    private readonly service: string,
    private readonly level: LogLevel = getLogLevel(),
    private readonly pretty: boolean = process.env.NODE_ENV !== "production",
  ) {}

  debug(message: string, metadata?: LogMetadata): void {
    if (this.shouldLog("debug")) console.debug(this.format("debug", message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (this.shouldLog("info")) console.info(this.format("info", message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (this.shouldLog("warn")) console.warn(this.format("warn", message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (this.shouldLog("error")) console.error(this.format("error", message, metadata));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : "";
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return level;
  }
  return "info";
}

export const logger = new Logger("region-district-sync");

export function createLogger(module: string): Logger {
  return new Logger(`region-district-sync:${module}`);
}
