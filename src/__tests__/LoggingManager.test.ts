/**
 * Tests for the logging infrastructure
 */

import { Writable } from 'node:stream';
import { SDKLogger } from '../Foundation/Logging/Logger/SDKLogger';
import { LogLevel, parseLogLevel } from '../Foundation/Logging/Models/LogLevel';
import {
  ConsoleLogDestination,
  type LogDestination,
  type LogEntry,
  LoggingManager,
  formatLogEntry,
} from '../Foundation/Logging/Services/LoggingManager';

describe('Logging', () => {
  const manager = LoggingManager.shared;
  let entries: LogEntry[];
  let unsubscribe: () => void;

  beforeAll(() => {
    manager.removeDestination('console');
  });

  beforeEach(() => {
    entries = [];
    unsubscribe = manager.onLog((entry) => entries.push(entry));
    manager.setLogLevel(LogLevel.Info);
  });

  afterEach(() => {
    unsubscribe();
    jest.restoreAllMocks();
  });

  it('should deliver entries at or above the level', () => {
    const logger = new SDKLogger('Test');

    logger.debug('hidden');
    logger.info('shown', { count: 1 });
    logger.error('also shown');

    expect(entries.map((entry) => [entry.level, entry.category, entry.message])).toEqual([
      [LogLevel.Info, 'Test', 'shown'],
      [LogLevel.Error, 'Test', 'also shown'],
    ]);
    expect(entries[0]?.metadata).toEqual({ count: 1 });
  });

  it('should honour a lowered level', () => {
    manager.setLogLevel(LogLevel.Debug);

    new SDKLogger('Test').debug('visible');

    expect(entries.map((entry) => entry.message)).toEqual(['visible']);
  });

  it('should stop delivering after unsubscribe', () => {
    unsubscribe();

    new SDKLogger('Test').info('dropped');

    expect(entries).toEqual([]);
  });

  it('should keep logging when a destination throws', () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const failing: LogDestination = {
      identifier: 'failing',
      name: 'Failing',
      isAvailable: true,
      write: () => {
        throw new Error('disk full');
      },
      flush: () => undefined,
    };
    manager.addDestination(failing);

    try {
      new SDKLogger('Test').warning('still delivered');
    } finally {
      manager.removeDestination('failing');
    }

    expect(entries.map((entry) => entry.message)).toEqual(['still delivered']);
    expect(stderr).toHaveBeenCalledWith("[LoggingManager] destination 'failing' failed: disk full\n");
  });

  it('should format entries with timestamp, level and category', () => {
    expect(
      formatLogEntry({
        level: LogLevel.Warning,
        category: 'Test',
        message: 'hello',
        timestamp: new Date('2024-01-02T03:04:05.000Z'),
      })
    ).toBe('[2024-01-02T03:04:05.000Z] [WARN] [Test] hello');
  });

  it('should write console entries to the given stream', () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString('utf8'));
        callback();
      },
    });

    new ConsoleLogDestination(stream).write({
      level: LogLevel.Error,
      category: 'Test',
      message: 'broken',
      timestamp: new Date('2024-01-02T03:04:05.000Z'),
    });

    expect(chunks.join('')).toContain('[2024-01-02T03:04:05.000Z] [ERROR] [Test] broken');
  });

  it('should expose only the level methods on category loggers', () => {
    expect(Object.getOwnPropertyNames(SDKLogger.prototype).sort()).toEqual([
      'constructor',
      'debug',
      'error',
      'info',
      'warning',
    ]);
    expect(Object.getOwnPropertyNames(LoggingManager.prototype)).not.toContain('getDestinations');
  });

  it('should parse level names', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.Warning);
    expect(parseLogLevel(' info ')).toBe(LogLevel.Info);
    expect(parseLogLevel('verbose')).toBeNull();
  });
});
