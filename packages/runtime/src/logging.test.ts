// Tests for registry loggers

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCapturingLogger, createConsoleLogger } from './logging.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes scoped lines at or above info by default', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createConsoleLogger();

    logger.info('Schema version registered', { version: 2 });
    logger.debug('Schema version reused');

    expect(info).toHaveBeenCalledWith('[INFO] schema-registry: Schema version registered', { version: 2 });
    expect(debug).not.toHaveBeenCalled();
  });

  it('honours the configured level and scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ level: 'error', scope: 'registry-test' });

    logger.warn('Schema metadata conflict');
    logger.error('SerDes instantiation failed');

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] registry-test: SerDes instantiation failed', '');
  });
});

describe('createCapturingLogger', () => {
  it('records entries in order', () => {
    const logger = createCapturingLogger();

    logger.warn('first');
    logger.info('second', { id: 1 });

    expect(logger.entries).toEqual([
      { level: 'warn', message: 'first', data: undefined },
      { level: 'info', message: 'second', data: { id: 1 } },
    ]);
  });
});
