import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  consoleSink,
  createFileSink,
  createLogger,
  formatLogLine,
  getLogLevel,
  isLogLevel,
  setLogLevel,
  type LogSink,
} from './logger.js';

function memorySink(level?: LogSink['level']): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return { level, lines, write: (_level, line) => lines.push(line) };
}

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('should format lines as timestamp, level, source and message', () => {
    const line = formatLogLine('warn', 'analyzer', ['Stage %s of %d', 'two', 6], new Date('2026-03-04T05:06:07.000Z'));
    expect(line).toBe('2026-03-04T05:06:07.000Z [WARN] analyzer: Stage two of 6');
  });

  it('should honour the global threshold for sinks without their own level', () => {
    const sink = memorySink();
    const log = createLogger('svc', { sinks: [sink] });

    setLogLevel('warn');
    log.info('hidden');
    log.error('shown');

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toMatch(/ \[ERROR\] svc: shown$/);
  });

  it('should let a sink keep its own threshold', () => {
    const sink = memorySink('info');
    const log = createLogger('svc', { sinks: [sink] });

    setLogLevel('error');
    log.debug('dropped');
    log.info('kept');

    expect(sink.lines.map((l) => l.slice(l.indexOf(' ') + 1))).toEqual(['[INFO] svc: kept']);
  });

  it('should keep writing to other sinks when one throws', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const broken: LogSink = {
      write: () => {
        throw new Error('ENOSPC: app.log');
      },
    };
    const sink = memorySink();
    const log = createLogger('svc', { sinks: [broken, sink] });

    setLogLevel('debug');
    log.warn('first');
    log.error('second');

    expect(sink.lines).toHaveLength(2);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith('logger: sink write failed: ENOSPC: app.log\n');
  });

  it('should route console output by level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});

    consoleSink.write('error', 'e');
    consoleSink.write('warn', 'w');
    consoleSink.write('debug', 'd');

    expect(error).toHaveBeenCalledWith('e');
    expect(warn).toHaveBeenCalledWith('w');
    expect(info).toHaveBeenCalledWith('d');
  });

  it('should append to a log file, creating its directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'seti-log-'));
    try {
      const file = join(dir, 'nested', 'app.log');
      const log = createLogger('analyzer', { sinks: [createFileSink(file)] });

      log.info('first');
      log.debug('skipped');
      log.warn('second');

      const lines = (await readFile(file, 'utf-8')).trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] analyzer: first$/);
      expect(lines[1]).toMatch(/\[WARN\] analyzer: second$/);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should recognise log level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
  });
});
