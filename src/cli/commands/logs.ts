/**
 * Logs command - View and follow the log file
 */

import { Command, InvalidArgumentError } from 'commander';
import { createReadStream, watch, type FSWatcher } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { LOG_LEVELS, type EntryLevel, type LogEntry, type LogLevel } from '../../logging/logger.js';
import { loadCliContext, logFilePath } from '../utils/context.js';

interface LogsOptions {
  follow?: boolean;
  level?: LogLevel;
  lines?: number;
}

const ENTRY_LEVELS: readonly EntryLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_COLORS: Record<EntryLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

const RESET = '\x1b[0m';
const GRAY = '\x1b[90m';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function parseLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Valid levels: ${Object.keys(LOG_LEVELS).join(', ')}.`);
  }
  return value;
}

function parseLineCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function isEntryLevel(value: unknown): value is EntryLevel {
  return typeof value === 'string' && ENTRY_LEVELS.some((level) => level === value);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Creates the logs command
 */
export function logsCommand(): Command {
  const cmd = new Command('logs');

  cmd
    .description('View log files')
    .option('-f, --follow', 'Follow log output (like tail -f)')
    .option('-l, --level <level>', 'Filter by minimum log level (debug, info, warn, error)', parseLevel)
    .option('-n, --lines <count>', 'Number of lines to show', parseLineCount)
    .action(async (options: LogsOptions) => {
      await runLogs(options);
    });

  return cmd;
}

async function runLogs(options: LogsOptions): Promise<void> {
  const { config } = await loadCliContext();
  const logPath = logFilePath(config);

  try {
    await stat(logPath);
  } catch (error) {
    if (isMissing(error)) {
      console.log('No log file found.');
      return;
    }
    throw error;
  }

  if (options.follow) {
    await tailLogs(logPath, options.level);
  } else {
    await showLogs(logPath, options.level, options.lines ?? 50);
  }
}

async function showLogs(logPath: string, minLevel: LogLevel | undefined, lineCount: number): Promise<void> {
  const content = await readFile(logPath, 'utf-8');
  const lines = content.trim().split('\n');

  for (const line of lines.slice(-lineCount)) {
    const entry = parseLine(line);
    if (entry && shouldShow(entry, minLevel)) {
      console.log(formatEntry(entry));
    }
  }
}

async function tailLogs(logPath: string, minLevel: LogLevel | undefined): Promise<void> {
  await showLogs(logPath, minLevel, 20);

  console.log('\n--- Following log file (Ctrl+C to stop) ---\n');

  let position = (await stat(logPath)).size;
  let reading = Promise.resolve();

  const readNew = async (): Promise<void> => {
    let size: number;
    try {
      size = (await stat(logPath)).size;
    } catch (error) {
      // Rotated away; the next write recreates it
      if (isMissing(error)) {
        position = 0;
        return;
      }
      throw error;
    }

    if (size < position) {
      position = 0;
    }
    if (size === position) {
      return;
    }

    const rl = createInterface({ input: createReadStream(logPath, { start: position, end: size - 1 }) });
    for await (const line of rl) {
      const entry = parseLine(line);
      if (entry && shouldShow(entry, minLevel)) {
        console.log(formatEntry(entry));
      }
    }
    position = size;
  };

  await new Promise<void>((resolve, reject) => {
    const watcher: FSWatcher = watch(logPath, () => {
      reading = reading.then(readNew).catch((error: unknown) => {
        watcher.close();
        reject(error);
      });
    });

    process.once('SIGINT', () => {
      watcher.close();
      resolve();
    });
  });
}

/**
 * Parses one log line, skipping anything that is not a log entry
 */
export function parseLine(line: string): LogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== 'object') return null;

  const timestamp: unknown = Reflect.get(parsed, 'timestamp');
  const level: unknown = Reflect.get(parsed, 'level');
  const message: unknown = Reflect.get(parsed, 'message');
  if (typeof timestamp !== 'string' || !isEntryLevel(level) || typeof message !== 'string') {
    return null;
  }

  const entry: LogEntry = { timestamp, level, message };
  const context: unknown = Reflect.get(parsed, 'context');
  if (context !== null && typeof context === 'object' && !Array.isArray(context)) {
    entry.context = Object.fromEntries(Object.entries(context));
  }
  const stack: unknown = Reflect.get(parsed, 'stack');
  if (typeof stack === 'string') {
    entry.stack = stack;
  }
  return entry;
}

export function shouldShow(entry: LogEntry, minLevel?: LogLevel): boolean {
  if (!minLevel) return true;
  return LOG_LEVELS[entry.level] >= LOG_LEVELS[minLevel];
}

/**
 * Formats an entry for the terminal: colored time and level, message,
 * context as key=value pairs, then the stack if any
 */
export function formatEntry(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level];
  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const level = entry.level.toUpperCase().padEnd(5);

  let output = `${color}[${time}] ${level}${RESET} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    output += ` ${GRAY}${contextStr}${RESET}`;
  }

  if (entry.stack) {
    output += `\n${GRAY}${entry.stack}${RESET}`;
  }

  return output;
}
