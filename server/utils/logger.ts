import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogMeta {
  correlationId?: string;
  target?: string;
  capability?: string;
  url?: string;
  attempt?: number;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export interface LoggerSettings {
  level: LogLevel;
  /** When set, every entry is also appended as a JSON line under this directory. */
  logDir?: string;
  /** File name prefix for the dated log file. */
  fileName: string;
  /**
   * "stderr" routes every level to stderr. The provider process needs this:
   * its stdout is the protocol channel.
   */
  stream: "stdout" | "stderr";
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function parseLevel(raw: string | undefined): LogLevel {
  return raw && isLogLevel(raw) ? raw : "info";
}

const settings: LoggerSettings = {
  level: parseLevel(process.env.LOG_LEVEL),
  logDir: process.env.LOG_DIR || undefined,
  fileName: "gateway",
  stream: "stdout",
};

export function configureLogger(overrides: Partial<LoggerSettings>): void {
  Object.assign(settings, overrides);
}

export function getLoggerSettings(): Readonly<LoggerSettings> {
  return { ...settings };
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function appendToFile(level: LogLevel, timestamp: string, message: string, meta?: LogMeta): void {
  if (!settings.logDir) return;

  const dateStr = timestamp.split("T")[0];
  const logFile = path.join(settings.logDir, `${settings.fileName}-${dateStr}.log`);

  try {
    fs.mkdirSync(settings.logDir, { recursive: true });
    fs.appendFileSync(logFile, JSON.stringify({ timestamp, level, message, ...meta }) + "\n");
  } catch (err) {
    console.error("[Logger] Failed to write to log file:", err);
  }
}

export function writeLog(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[settings.level]) return;

  const timestamp = new Date().toISOString();
  appendToFile(level, timestamp, message, meta);

  const { correlationId, ...rest } = meta ?? {};
  const correlationPrefix = correlationId ? `[${correlationId}] ` : "";
  const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  const line = `${timestamp} [${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;

  if (settings.stream === "stderr" || level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  writeLog("info", message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  writeLog("error", message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  writeLog("warn", message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  writeLog("debug", message, meta);
}

/**
 * Per-request logger: carries one correlation id and stage timings across
 * everything logged for a single HTTP query.
 */
export class RequestLogger {
  readonly correlationId: string;
  private readonly startTime: number;
  private readonly route?: string;
  private stages: Map<string, number> = new Map();

  constructor(route?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.route = route;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      ...(this.route !== undefined && { route: this.route }),
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err !== undefined) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }
}
