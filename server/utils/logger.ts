import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogMeta = {
  correlationId?: string;
  sessionId?: string;
  companyId?: number;
  route?: string;
  skill?: string;
  attempt?: number;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
};

type LoggerConfig = {
  level: LogLevel;
  logDir: string | undefined;
};

// Environment defaults; server entry points reapply these from validated settings.
const config: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL),
  logDir: process.env.LOG_DIR || undefined,
};

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

export function configureLogger(options: Partial<LoggerConfig>): void {
  if (options.level) config.level = options.level;
  if ("logDir" in options) config.logDir = options.logDir;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function writeToFile(entry: Record<string, unknown>): void {
  if (!config.logDir) return;
  const dateStr = new Date().toISOString().split("T")[0];
  const logFile = path.join(config.logDir, `query-${dateStr}.log`);
  try {
    if (!fs.existsSync(config.logDir)) {
      fs.mkdirSync(config.logDir, { recursive: true });
    }
    fs.appendFileSync(logFile, JSON.stringify(entry) + "\n");
  } catch (err) {
    console.error("[Logger] Failed to write to log file:", err);
  }
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) return;

  writeToFile({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  });

  const { correlationId, ...rest } = meta ?? {};
  const correlationPrefix = correlationId ? `[${correlationId}] ` : "";
  const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

/**
 * Logger bound to one question. Every line carries the same correlation id
 * and the elapsed time since the question arrived.
 */
export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private baseMeta: LogMeta;
  private stages: Map<string, number> = new Map();

  constructor(baseMeta: LogMeta = {}) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.baseMeta = baseMeta;
  }

  private getMeta(extra?: LogMeta): LogMeta {
    return {
      correlationId: this.correlationId,
      ...this.baseMeta,
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
    this.stages.delete(name);
    return Date.now() - start;
  }

  info(message: string, extra?: LogMeta): void {
    log("info", message, this.getMeta(extra));
  }

  warn(message: string, extra?: LogMeta): void {
    log("warn", message, this.getMeta(extra));
  }

  debug(message: string, extra?: LogMeta): void {
    log("debug", message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: LogMeta): void {
    const errorMeta: LogMeta = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err !== undefined) {
      errorMeta.error = String(err);
    }
    log("error", message, this.getMeta({ ...errorMeta, ...extra }));
  }
}
