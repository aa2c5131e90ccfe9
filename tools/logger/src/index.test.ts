import { describe, expect, test, vi } from 'vitest';

import { Logger, createLogger } from './index';

function createSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('Logger', () => {
  test('exposes the methods it was constructed with', () => {
    const sink = createSink();
    const logger = new Logger(sink);

    logger.info('[Test] hello', 1);

    expect(sink.info).toHaveBeenCalledWith('[Test] hello', 1);
  });
});

describe('createLogger', () => {
  test('drops messages below the info level by default', () => {
    const sink = createSink();
    const logger = createLogger({ sink });

    logger.debug('hidden');
    logger.info('shown');
    logger.error('failure');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('shown');
    expect(sink.error).toHaveBeenCalledWith('failure');
  });

  test('emits debug messages when the level is debug', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'debug', sink });

    logger.debug('[Scanner] page 1');

    expect(sink.debug).toHaveBeenCalledWith('[Scanner] page 1');
  });

  test('only emits errors when the level is error', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'error', sink });

    logger.warn('warned');
    logger.error('failed');

    expect(sink.warn).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  test('emits nothing when silent', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'silent', sink });

    logger.error('failed');

    expect(sink.error).not.toHaveBeenCalled();
  });

  test('returns a Logger instance', () => {
    expect(createLogger({ sink: createSink() })).toBeInstanceOf(Logger);
  });
});
