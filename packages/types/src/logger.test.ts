import { describe, it, expect, vi } from 'vitest';
import { Logger, createLogger, LogLevel, parseLogLevel, bigintReplacer } from './logger';
import type { LogEntry, LogOutput } from './logger';

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Create a logger whose output is captured into an array for inspection. */
function captureLogger(
  level: LogLevel = LogLevel.DEBUG,
  component?: string,
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  const logger = new Logger({ level, component, output });
  return { logger, entries };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe('Logger — levels', () => {
  it('defaults to INFO', () => {
    expect(new Logger().getLevel()).toBe(LogLevel.INFO);
  });

  it('drops entries below the threshold', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    expect(entries.map((e) => e.level)).toEqual(['WARN', 'ERROR']);
  });

  it('SILENT suppresses everything', () => {
    const { logger, entries } = captureLogger(LogLevel.SILENT);
    logger.error('boom');
    expect(entries).toHaveLength(0);
  });

  it('setLevel changes the threshold at runtime', () => {
    const { logger, entries } = captureLogger(LogLevel.ERROR);
    logger.info('hidden');
    logger.setLevel(LogLevel.INFO);
    logger.info('shown');
    expect(entries).toHaveLength(1);
    expect(entries[0]?.message).toBe('shown');
  });

  it('setLevel leaves children created earlier at their own level', () => {
    const { logger, entries } = captureLogger(LogLevel.INFO, 'koinon');
    const child = logger.child('governance');
    logger.setLevel(LogLevel.SILENT);
    child.info('vote cast');
    logger.info('hidden');
    expect(child.getLevel()).toBe(LogLevel.INFO);
    expect(entries.map((e) => e.message)).toEqual(['vote cast']);
  });
});

describe('Logger — fields and components', () => {
  it('merges contextual fields into the entry', () => {
    const { logger, entries } = captureLogger();
    logger.info('asset registered', { assetId: 1 });
    expect(entries[0]?.assetId).toBe(1);
    expect(entries[0]?.message).toBe('asset registered');
    expect(typeof entries[0]?.timestamp).toBe('string');
  });

  it('child loggers extend the component path', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG, 'koinon');
    const child = logger.child('revenue');
    child.info('distributed');
    expect(child.getComponent()).toBe('koinon.revenue');
    expect(entries[0]?.component).toBe('koinon.revenue');
  });

  it('child of an anonymous logger uses the bare component', () => {
    const { logger } = captureLogger();
    expect(logger.child('licensing').getComponent()).toBe('licensing');
  });
});

describe('default output', () => {
  it('writes JSON with bigints rendered as strings', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger().info('paid', { amount: 500n });
    expect(spy).toHaveBeenCalledOnce();
    const parsed = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(parsed.amount).toBe('500');
    spy.mockRestore();
  });

  it('bigintReplacer leaves other values untouched', () => {
    expect(bigintReplacer('k', 5)).toBe(5);
    expect(bigintReplacer('k', 5n)).toBe('5');
  });
});

describe('parseLogLevel', () => {
  it('parses names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' Warn ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown or missing names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
