import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '../src/lib/logger.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('redacts sensitive keys and prefixed values', () => {
    expect(
      logger.redact({
        TWINE_PASSWORD: 'test-secret',
        upload: { apiKey: 'test-secret', repository: 'testpypi' },
        header: 'Bearer test-secret-value',
      })
    ).toEqual({
      TWINE_PASSWORD: '[REDACTED]',
      upload: { apiKey: '[REDACTED]', repository: 'testpypi' },
      header: 'Bear...alue',
    });
  });

  it('suppresses info but not errors when silent', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.configure({ silent: true });

    logger.info('hidden');
    logger.fail('shown');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('only prints debug output when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    logger.debug('hidden');
    expect(log).not.toHaveBeenCalled();

    logger.configure({ verbose: true });
    logger.debug('shown');
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('emits JSON lines in json mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.configure({ json: true });

    logger.step(2, 4, 'Verifying version');

    const line: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: 'info', message: 'Verifying version', data: { step: 2, total: 4 } });
  });
});
