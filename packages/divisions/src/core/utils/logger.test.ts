import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, createLogger, parseLogLevel } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new Logger({ level: 'warn', service: 'test', pretty: true });

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should write JSON lines when not pretty', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new Logger({ level: 'info', service: 'test', pretty: false });

    logger.info('Dataset loaded', { wards: 11 });

    const line = info.mock.calls[0]?.[0];
    expect(typeof line).toBe('string');
    const parsed: unknown = JSON.parse(String(line));
    expect(parsed).toMatchObject({ level: 'info', service: 'test', message: 'Dataset loaded', wards: 11 });
  });

  it('should include the service name in pretty output', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger({ level: 'info', service: 'test', pretty: true });

    logger.error('failed');

    expect(String(error.mock.calls[0]?.[0])).toMatch(/^\[.+\] ERROR test: failed$/);
  });
});

describe('createLogger()', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should name the service after the module', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger({ module: 'registry' }, 'warn').warn('slow load');

    expect(String(warn.mock.calls[0]?.[0])).toContain('vn-divisions:registry');
  });
});

describe('parseLogLevel()', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('trace')).toBe('info');
  });
});
