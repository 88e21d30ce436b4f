/**
 * Structured logging utility for the shopext CLI
 * Includes automatic sensitive data redaction for security
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Sensitive data patterns that should be redacted from logs
 */
const SENSITIVE_PATTERNS = [
  /\b(api[_-]?key|apikey)\s*[:=]\s*['"]?[\w-]+['"]?/gi,
  /\b(secret|password|token|credential)\s*[:=]\s*['"]?[\w-]+['"]?/gi,
  /\b(SWIA[\w]+)/g,
  /Bearer\s+[\w.-]+/gi,
  /Basic\s+[\w=]+/gi,
  /mysql:\/\/[^@\s]+:[^@\s]+@/gi,
];

const SENSITIVE_FIELD_NAMES = [
  'password',
  'token',
  'apikey',
  'api_key',
  'secret',
  'client_secret',
  'authorization',
];

function redactString(input: string): string {
  let result = input;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

/**
 * Recursively sanitize an object for logging
 */
function sanitizeForLogging(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(sanitizeForLogging);
  }

  if (typeof obj === 'object') {
    return sanitizeRecord(obj);
  }

  return obj;
}

function sanitizeRecord(obj: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELD_NAMES.some((sf) => key.toLowerCase().includes(sf))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeForLogging(value);
    }
  }
  return sanitized;
}

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

function levelFromEnv(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel;
  private logFile?: string;
  private fileLoggingDisabledNotified = false;

  private constructor() {
    this.logLevel = levelFromEnv(process.env['SHOPEXT_LOG_LEVEL']);

    if (this.logLevel === LogLevel.DEBUG || process.env['SHOPEXT_LOG_FILE']) {
      this.logFile =
        process.env['SHOPEXT_LOG_FILE'] ||
        path.join(process.env['HOME'] || '.', '.shopext', 'logs', 'cli.log');
      this.ensureLogDirectory();
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private ensureLogDirectory(): void {
    if (!this.logFile) return;
    const logDir = path.dirname(this.logFile);
    try {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
    } catch {
      this.disableFileLogging(
        '[Logger] File logging disabled (failed to create log directory). Falling back to console only.'
      );
    }
  }

  private disableFileLogging(notice: string): void {
    this.logFile = undefined;
    if (!this.fileLoggingDisabledNotified) {
      this.fileLoggingDisabledNotified = true;
      // console directly, the logger itself is what failed
      console.warn(notice);
    }
  }

  private writeLog(entry: LogEntry): void {
    const sanitizedEntry: LogEntry = {
      ...entry,
      message: redactString(entry.message),
      context: entry.context ? sanitizeRecord(entry.context) : undefined,
    };

    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, JSON.stringify(sanitizedEntry) + '\n');
      } catch {
        this.disableFileLogging(
          '[Logger] File logging disabled (write failed). Falling back to console only.'
        );
      }
    }

    if (entry.level > this.logLevel) {
      return;
    }

    const levelNames = ['ERROR', 'WARN', 'INFO', 'DEBUG'];
    const levelName = levelNames[entry.level] || 'UNKNOWN';
    const consoleMessage = `[${entry.timestamp}] ${levelName}: ${sanitizedEntry.message}`;

    // stderr keeps stdout free for command output
    if (entry.level === LogLevel.ERROR) {
      console.error(consoleMessage);
      if (entry.error) {
        console.error(entry.error.stack);
      }
    } else {
      console.warn(consoleMessage);
    }
  }

  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    const isError = errorOrContext instanceof Error;
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.ERROR,
      message,
      context: isError ? context : errorOrContext,
      error: isError ? errorOrContext : undefined,
    });
  }

  warn(
    message: string,
    errorOrContext?: Error | Record<string, unknown>
  ): void {
    const isError = errorOrContext instanceof Error;
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.WARN,
      message,
      context: isError ? undefined : errorOrContext,
      error: isError ? errorOrContext : undefined,
    });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.INFO,
      message,
      context,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.DEBUG,
      message,
      context,
    });
  }
}

export const logger = Logger.getInstance();
