import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, LogLevel, parseLogLevel, type LogEntry } from '../../../src/cli/utils/logger.js';

function readEntries(logger: Logger, at?: Date): LogEntry[] {
  const file = logger.getLogFile(at);
  if (!existsSync(file)) return [];
  return readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

describe('Logger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), 'tutor-logs-'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
    rmSync(logDir, { recursive: true, force: true });
  });

  it('writes JSON Lines entries to a daily file', () => {
    const logger = new Logger({ logDir: join(logDir, 'nested'), file: true, console: false, level: LogLevel.DEBUG });

    logger.info('Query answered', { model: 'model-a@v1beta' });

    expect(logger.getLogFile()).toMatch(/tutor-\d{4}-\d{2}-\d{2}\.jsonl$/);
    const [entry] = readEntries(logger);
    expect(entry?.level).toBe('INFO');
    expect(entry?.message).toBe('Query answered');
    expect(entry?.context).toEqual({ model: 'model-a@v1beta' });
  });

  it('rolls over to a new file when the day changes', () => {
    vi.useFakeTimers();
    const logger = new Logger({ logDir, file: true, console: false, level: LogLevel.DEBUG });

    vi.setSystemTime(new Date('2026-03-01T23:59:59.000Z'));
    logger.info('before midnight');
    vi.setSystemTime(new Date('2026-03-02T00:00:01.000Z'));
    logger.info('after midnight');

    const firstDay = new Date('2026-03-01T12:00:00.000Z');
    const secondDay = new Date('2026-03-02T12:00:00.000Z');
    expect(logger.getLogFile(firstDay)).toBe(join(logDir, 'tutor-2026-03-01.jsonl'));
    expect(readEntries(logger, firstDay).map((e) => e.message)).toEqual(['before midnight']);
    expect(readEntries(logger, secondDay).map((e) => e.message)).toEqual(['after midnight']);
  });

  it('serializes errors', () => {
    const logger = new Logger({ logDir, file: true, console: false, level: LogLevel.DEBUG });

    logger.error('Query failed unexpectedly', new Error('boom'));

    const [entry] = readEntries(logger);
    expect(entry?.error?.name).toBe('Error');
    expect(entry?.error?.message).toBe('boom');
    expect(typeof entry?.error?.stack).toBe('string');
  });

  it('drops entries below the fixed level', () => {
    const logger = new Logger({ logDir, file: true, console: false, level: LogLevel.WARN });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(readEntries(logger).map((e) => e.message)).toEqual(['shown']);
  });

  it('reads LOG_LEVEL when no level is fixed', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    const logger = new Logger({ logDir, file: true, console: false });

    logger.warn('hidden');
    logger.error('shown');

    expect(readEntries(logger).map((e) => e.message)).toEqual(['shown']);
  });

  it('writes nothing when file output is off', () => {
    const logger = new Logger({ logDir, file: false, console: false });

    logger.error('nowhere');

    expect(existsSync(logger.getLogFile())).toBe(false);
  });
});

describe('parseLogLevel', () => {
  it('maps names case-insensitively and defaults to INFO', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
    expect(parseLogLevel(' error ')).toBe(LogLevel.ERROR);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});
