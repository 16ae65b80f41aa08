import { appendFile, stat, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Log levels in order of severity. `silent` is a threshold only; nothing is
 * ever written at that level.
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Levels an entry can be written at
 */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogContext {
  runId?: string;
  component?: string;
  [key: string]: unknown;
}

/**
 * One line of the log file
 */
export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  path: string;
  maxSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'toolloop.log',
  maxSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Shared by a logger and its children so a broken log file is reported once
 */
interface WriteFailureState {
  reported: boolean;
}

/**
 * Logger - Structured JSON lines logger with level filtering and size-based rotation.
 *
 * The level methods never reject: a failed write is reported once on stderr
 * and the entry is dropped. `write` itself still rejects.
 */
export class Logger {
  private config: LoggerConfig;
  private defaultContext: LogContext;
  private writeFailure: WriteFailureState = { reported: false };

  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
  }

  /**
   * A logger that writes nothing
   */
  static silent(): Logger {
    return new Logger({ level: 'silent' });
  }

  get level(): LogLevel {
    return this.config.level;
  }

  set level(level: LogLevel) {
    this.config.level = level;
  }

  get path(): string {
    return this.config.path;
  }

  shouldLog(level: EntryLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a logger sharing this one's config with extra default context
   */
  child(context: LogContext): Logger {
    const child = new Logger(this.config, { ...this.defaultContext, ...context });
    child.writeFailure = this.writeFailure;
    return child;
  }

  formatEntry(level: EntryLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedContext = { ...this.defaultContext, ...context };
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    if (error?.stack) {
      entry.stack = error.stack;
    }

    return entry;
  }

  async write(entry: LogEntry): Promise<void> {
    const dir = dirname(this.config.path);
    if (dir && dir !== '.') {
      await mkdir(dir, { recursive: true });
    }

    await this.rotateIfNeeded();
    await appendFile(this.config.path, JSON.stringify(entry) + '\n', { encoding: 'utf-8' });
  }

  private async record(entry: LogEntry): Promise<void> {
    try {
      await this.write(entry);
    } catch (error) {
      if (this.writeFailure.reported) return;
      this.writeFailure.reported = true;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`Failed to write log file ${this.config.path}: ${reason}`);
    }
  }

  async debug(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('debug')) return;
    await this.record(this.formatEntry('debug', message, context));
  }

  async info(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('info')) return;
    await this.record(this.formatEntry('info', message, context));
  }

  async warn(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('warn')) return;
    await this.record(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error. Stack traces are kept for Error instances; anything else
   * is stringified into `context.errorDetails`.
   */
  async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
    if (!this.shouldLog('error')) return;

    const entry = this.formatEntry('error', message, context, error instanceof Error ? error : undefined);
    if (error !== undefined && !(error instanceof Error)) {
      entry.context = { ...entry.context, errorDetails: String(error) };
    }

    await this.record(entry);
  }

  async rotateIfNeeded(): Promise<void> {
    try {
      const stats = await stat(this.config.path);
      if (stats.size >= this.config.maxSize) {
        await this.rotate();
      }
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  /**
   * Shifts `log.N` to `log.N+1`, dropping the oldest beyond `maxFiles`,
   * then moves the current file to `log.1`.
   */
  async rotate(): Promise<void> {
    const path = this.config.path;

    await unlink(`${path}.${this.config.maxFiles}`).catch((error: unknown) => {
      if (!isMissing(error)) throw error;
    });

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await rename(`${path}.${i}`, `${path}.${i + 1}`).catch((error: unknown) => {
        if (!isMissing(error)) throw error;
      });
    }

    await rename(path, `${path}.1`).catch((error: unknown) => {
      if (!isMissing(error)) throw error;
    });
  }

  /**
   * Current and rotated log files that exist, newest first
   */
  async listLogFiles(): Promise<string[]> {
    const candidates = [this.config.path];
    for (let i = 1; i <= this.config.maxFiles; i++) {
      candidates.push(`${this.config.path}.${i}`);
    }

    const files: string[] = [];
    for (const candidate of candidates) {
      try {
        await stat(candidate);
        files.push(candidate);
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }
    return files;
  }
}
