import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  /** Directory for JSON Lines files (default: TUTOR_LOG_DIR or .tutor/logs) */
  logDir?: string;

  /** Write entries to the daily log file (default: off under NODE_ENV=test) */
  file?: boolean;

  /** Echo entries to stderr (default: off under NODE_ENV=test) */
  console?: boolean;

  /** Minimum level; when omitted LOG_LEVEL is read on every call */
  level?: LogLevel;
}

/**
 * Map a LOG_LEVEL value to a level, defaulting to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * JSON Lines logger for the tutor service
 */
export class Logger {
  private readonly logDir: string;
  private readonly fileEnabled: boolean;
  private readonly consoleEnabled: boolean;
  private readonly fixedLevel?: LogLevel;
  private dirReady = false;

  constructor(options: LoggerOptions = {}) {
    const testEnv = process.env.NODE_ENV === 'test';
    this.logDir = options.logDir ?? process.env.TUTOR_LOG_DIR ?? join('.tutor', 'logs');
    this.fileEnabled = options.file ?? !testEnv;
    this.consoleEnabled = options.console ?? !testEnv;
    this.fixedLevel = options.level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Logs an error message with the serialized error
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (!this.isEnabled(LogLevel.ERROR)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel.ERROR,
      message,
      context
    };

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: 'Error', message: String(error) };
    }

    this.writeLog(entry);
  }

  /**
   * Logs a completed query
   */
  logQuery(query: string, details: Record<string, unknown>, startTime: number): void {
    this.info('Query answered', {
      query_length: query.length,
      ...details,
      duration_ms: Date.now() - startTime
    });
  }

  /**
   * Daily file for the given instant (UTC date)
   */
  getLogFile(at: Date = new Date()): string {
    const day = at.toISOString().split('T')[0];
    return join(this.logDir, `tutor-${day}.jsonl`);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    this.writeLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      context
    });
  }

  private isEnabled(level: LogLevel): boolean {
    const threshold = this.fixedLevel ?? parseLogLevel(process.env.LOG_LEVEL);
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold);
  }

  private writeLog(entry: LogEntry): void {
    if (this.fileEnabled) {
      try {
        if (!this.dirReady && !existsSync(this.logDir)) {
          mkdirSync(this.logDir, { recursive: true });
        }
        this.dirReady = true;
        appendFileSync(this.getLogFile(new Date(entry.timestamp)), JSON.stringify(entry) + '\n');
      } catch (error) {
        console.error('Failed to write log:', error);
      }
    }

    if (this.consoleEnabled) {
      this.writeToConsole(entry);
    }
  }

  /**
   * Console echo goes to stderr; stdout is reserved for command output
   */
  private writeToConsole(entry: LogEntry): void {
    const message = `[${entry.timestamp}] [${entry.level}] ${entry.message}`;

    switch (entry.level) {
      case LogLevel.WARN:
        console.warn(message, entry.context ?? '');
        break;
      case LogLevel.ERROR:
        console.error(message, entry.error ?? entry.context ?? '');
        break;
      default:
        console.error(message, entry.context ?? '');
    }
  }
}

/**
 * Shared logger for components constructed without one
 */
export const logger = new Logger();
