import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

const DEFAULT_LEVEL: LogLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

const envLevel = process.env.LOG_LEVEL;

let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : DEFAULT_LEVEL;

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function formatLogLine(level: LogLevel, prefix: string, args: unknown[], now = new Date()): string {
  return `${now.toISOString()} [${level.toUpperCase()}] ${prefix}: ${format(...args)}`;
}

/**
 * Destination for formatted log lines. A sink with its own `level` ignores
 * the process-wide threshold set through {@link setLogLevel}.
 *
 * A sink that throws does not fail the caller: the first failure of each
 * sink is reported on stderr and later entries keep going to the other sinks.
 */
export interface LogSink {
  level?: LogLevel;
  write(level: LogLevel, line: string): void;
}

export const consoleSink: LogSink = {
  write(level, line) {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  },
};

/** Appends one line per entry, creating the parent directory on first write. */
export function createFileSink(filePath: string, level: LogLevel = 'info'): LogSink {
  let ready = false;
  return {
    level,
    write(_level, line) {
      if (!ready) {
        mkdirSync(dirname(filePath), { recursive: true });
        ready = true;
      }
      appendFileSync(filePath, `${line}\n`, 'utf-8');
    },
  };
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface LoggerOptions {
  sinks?: LogSink[];
}

const failedSinks = new WeakSet<LogSink>();

function reportSinkFailure(sink: LogSink, err: unknown) {
  if (failedSinks.has(sink)) return;
  failedSinks.add(sink);
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`logger: sink write failed: ${message}\n`);
}

export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const sinks = options.sinks ?? [consoleSink];

  const emit = (level: LogLevel, args: unknown[]) => {
    let line: string | undefined;
    for (const sink of sinks) {
      const threshold = sink.level ?? currentLevel;
      if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) continue;
      line ??= formatLogLine(level, prefix, args);
      try {
        sink.write(level, line);
      } catch (err) {
        reportSinkFailure(sink, err);
      }
    }
  };

  return {
    debug: (...args: unknown[]) => emit('debug', args),
    info: (...args: unknown[]) => emit('info', args),
    warn: (...args: unknown[]) => emit('warn', args),
    error: (...args: unknown[]) => emit('error', args),
  };
}
