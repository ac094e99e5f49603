/**
 * LoggingService Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  LoggingService,
  createLogger,
  getLogger,
  parseLogLevel,
  setLogger,
  type LogEntry,
} from '../../../../src/shared/services/logging.service.js';

describe('LoggingService', () => {
  let service: LoggingService;
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    service = new LoggingService('info', 3);
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('should drop entries below the minimum level', () => {
    service.debug('hidden');
    service.info('shown');

    expect(service.getRecentLogs().map((entry) => entry.message)).toEqual(['shown']);
  });

  it('should keep a bounded ring of entries', () => {
    service.info('one');
    service.info('two');
    service.info('three');
    service.info('four');

    expect(service.getRecentLogs().map((entry) => entry.message)).toEqual(['two', 'three', 'four']);
  });

  it('should filter recent logs by level', () => {
    service.info('info');
    service.warning('warning');
    service.error('error', new Error('cause'));

    expect(service.getRecentLogs(10, 'warning').map((entry) => entry.level)).toEqual(['warning', 'error']);
  });

  it('should write to stderr without a sink', () => {
    service.warning('Window query failed', { processId: 7 });

    expect(consoleError).toHaveBeenCalledTimes(1);
    const output = String(consoleError.mock.calls[0]?.[0]);
    expect(output).toContain('WARNING  Window query failed');
    expect(output).toContain('Context: {"processId":7}');
  });

  it('should forward entries to a sink instead of stderr', async () => {
    const received: LogEntry[] = [];
    service.setSink({
      write: (entry) => {
        received.push(entry);
        return Promise.resolve();
      },
    });

    service.log('notice', 'Reshow complete', { cycle: 2 }, undefined, 'Coordinator');
    await Promise.resolve();

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ level: 'notice', message: 'Reshow complete', component: 'Coordinator' });
    expect(consoleError).not.toHaveBeenCalled();
  });

  it('should fall back to stderr when the sink fails', async () => {
    service.setSink({ write: () => Promise.reject(new Error('sink closed')) });

    service.info('still logged');
    await vi.waitFor(() => expect(consoleError).toHaveBeenCalledTimes(2));
  });

  it('should clear entries', () => {
    service.info('gone');
    service.clearLogs();
    expect(service.getRecentLogs()).toEqual([]);
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
  });

  it('should fall back for unknown values', () => {
    expect(parseLogLevel('verbose', 'warning')).toBe('warning');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});

describe('createLogger', () => {
  const original = getLogger();

  afterEach(() => {
    setLogger(original);
  });

  it('should tag entries with the component and follow logger replacement', () => {
    const replacement = new LoggingService('debug');
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('FrameSampler');

    setLogger(replacement);
    logger.debug('Initial window frame');

    expect(replacement.getRecentLogs()).toHaveLength(1);
    expect(replacement.getRecentLogs()[0]).toMatchObject({
      level: 'debug',
      component: 'FrameSampler',
      message: 'Initial window frame',
    });
    consoleError.mockRestore();
  });
});
