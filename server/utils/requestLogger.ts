import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let currentLogLevel: LogLevel = 'info';
let logDir: string | null = null;

export interface LogMeta {
  requestId?: string;
  userId?: string;
  intent?: string;
  confidence?: number;
  stage?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

/**
 * Sets the threshold and, when a directory is given, mirrors every entry as a
 * JSON line into <dir>/assistant-YYYY-MM-DD.log.
 */
export function configureLogging(options: { level?: LogLevel; dir?: string }): void {
  if (options.level) currentLogLevel = options.level;
  if (options.dir) {
    logDir = path.resolve(options.dir);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
  }
}

export function generateRequestId(): string {
  return uuidv4();
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel]) return;

  if (logDir) {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...meta,
    };
    const dateStr = new Date().toISOString().split('T')[0];
    const logFile = path.join(logDir, `assistant-${dateStr}.log`);
    try {
      fs.appendFileSync(logFile, JSON.stringify(logEntry) + '\n');
    } catch (err) {
      console.error('[RequestLogger] Failed to write to log file:', err);
    }
  }

  const requestPrefix = meta?.requestId ? `[${meta.requestId.substring(0, 8)}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${level.toUpperCase()}] ${requestPrefix}${message}${metaStr}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  log('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  log('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  log('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  log('debug', message, meta);
}

/**
 * Per-request logger. Every entry carries the request id, the user and the
 * elapsed time since the request was picked up.
 */
export class RequestLogger {
  private requestId: string;
  private userId?: string;
  private startTime: number;
  private stages: Map<string, number> = new Map();
  private stageDurations: Record<string, number> = {};

  constructor(requestId: string, userId?: string) {
    this.requestId = requestId;
    this.userId = userId;
    this.startTime = Date.now();
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      requestId: this.requestId,
      userId: this.userId,
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
    this.stageDurations[name] = duration;
    return duration;
  }

  getStageDurations(): Record<string, number> {
    return { ...this.stageDurations };
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  getDuration(): number {
    return Date.now() - this.startTime;
  }
}
