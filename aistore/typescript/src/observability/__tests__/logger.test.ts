/**
 * Logger Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConsoleLogger, NoOpLogger, configureLogging, getLogger } from '../index.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format messages with timestamp, prefix and level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.info('bucket created', { bucket: 'images' });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[AIS\] \[INFO\] bucket created \{"bucket":"images"\}$/
    );
  });

  it('should filter below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ minLevel: 'warn', prefix: '[test]' });

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn.mock.calls[0]?.[0]).toMatch(/ \[test\] \[WARN\] shown$/);
  });
});

describe('configureLogging', () => {
  afterEach(() => {
    configureLogging({});
  });

  it('should default to the no-op logger', () => {
    expect(getLogger()).toBeInstanceOf(NoOpLogger);
  });

  it('should install a console logger in debug mode', () => {
    configureLogging({ debug: true });

    expect(getLogger()).toBeInstanceOf(ConsoleLogger);
  });

  it('should install a given logger', () => {
    const logger = new NoOpLogger();
    configureLogging({ logger });

    expect(getLogger()).toBe(logger);
  });
});
