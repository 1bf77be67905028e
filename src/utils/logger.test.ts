import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, enabled } from './logger';

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('defaults to info when LOG_LEVEL is unset or unknown', () => {
    vi.stubEnv('LOG_LEVEL', '');
    expect(enabled('debug')).toBe(false);
    expect(enabled('info')).toBe(true);

    vi.stubEnv('LOG_LEVEL', 'verbose');
    expect(enabled('debug')).toBe(false);
    expect(enabled('info')).toBe(true);
  });

  it('hides levels below the configured threshold', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('Shelters');

    logger.info('hidden');
    logger.warn('shown', { query: 'shelter' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('[Shelters]');
    expect(warn.mock.calls[0][0]).toContain('shown {"query":"shelter"}');
  });

  it('prints debug lines only at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createLogger('Scoring');

    vi.stubEnv('LOG_LEVEL', 'info');
    logger.debug('quiet');
    vi.stubEnv('LOG_LEVEL', 'DEBUG');
    logger.debug('loud');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toContain('loud');
  });

  it('silences everything, errors included, when silent', () => {
    vi.stubEnv('LOG_LEVEL', 'silent');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('Api').error('boom');

    expect(error).not.toHaveBeenCalled();
  });
});
