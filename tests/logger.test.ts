import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatLine, logger, setLogLevel } from '../src/utils/logger';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('formatLine', () => {
  it('prefixes the timestamp and symbol', () => {
    expect(formatLine('ℹ', 'started', undefined, NOW)).toBe('2026-03-01T12:00:00.000Z ℹ started');
  });

  it('appends context pairs and quotes values with spaces', () => {
    expect(formatLine('⚠', 'failed', { id: 'a1', stage: 'publish', reason: 'chat not found', retry: undefined }, NOW)).toBe(
      '2026-03-01T12:00:00.000Z ⚠ failed id=a1 stage=publish reason="chat not found"'
    );
  });
});

describe('logger', () => {
  afterEach(() => {
    setLogLevel(null);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('drops lines below LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.stubEnv('DEBUG', '');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('prints debug lines when DEBUG=true', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    vi.stubEnv('DEBUG', 'true');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.debug('details', { n: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/ \[DEBUG\] details n=2$/);
  });

  it('trims LOG_LEVEL read from the environment', () => {
    vi.stubEnv('LOG_LEVEL', ' warn ');
    vi.stubEnv('DEBUG', '');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.info('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('prefers the configured level over the environment', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('DEBUG', '');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    setLogLevel('error');
    logger.info('hidden');
    logger.error('shown');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});
