/**
 * Unit Tests for Logger and ComponentLogger
 */

import { ComponentLogger } from '../../../src/logging/component-logger';
import { Logger } from '../../../src/logging/logger';
import type { LogBackend, LogMessage } from '../../../src/logging/types';
import { MemoryLogBackend } from '../../helpers/memory-log-backend';

describe('Logger', () => {
  let backend: MemoryLogBackend;
  let logger: Logger;

  beforeEach(() => {
    backend = new MemoryLogBackend();
    logger = new Logger([backend], { level: 'info', console: false });
  });

  it('should drop messages below the level', async () => {
    await logger.debug('hidden');
    await logger.info('shown');
    logger.setLogLevel('debug');
    await logger.debug('now shown');

    expect(backend.texts()).toEqual(['shown', 'now shown']);
    expect(logger.getLogLevel()).toBe('debug');
  });

  it('should attach component, stack directory and error details', async () => {
    // Arrange
    logger.setStackDir('/srv/brewstack');
    const error = new Error('disk full');

    // Act
    await logger.error('Save failed', error, { component: 'StateStore', path: 'state.json' });

    // Assert
    expect(backend.messages).toEqual([
      {
        timestamp: expect.any(Number),
        level: 'error',
        message: 'Save failed',
        component: 'StateStore',
        stackDir: '/srv/brewstack',
        context: {
          component: 'StateStore',
          path: 'state.json',
          error: { name: 'Error', message: 'disk full', stack: error.stack },
        },
      },
    ]);
  });

  it('should wait for background writes on flush', async () => {
    const written: string[] = [];
    const slowBackend: LogBackend = {
      log: (message: LogMessage) =>
        new Promise<void>((resolve) => {
          setTimeout(() => {
            written.push(message.message);
            resolve();
          }, 5);
        }),
    };
    const slow = new Logger([slowBackend], { console: false });

    slow.infoSync('first');
    slow.warnSync('second');
    expect(written).toEqual([]);
    await slow.flush();

    expect(written).toEqual(['first', 'second']);
  });

  it('should keep logging when a backend fails', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing: LogBackend = { log: () => Promise.reject(new Error('backend down')) };
    const mixed = new Logger([failing, backend], { console: false });

    await mixed.info('still here');

    expect(backend.texts()).toEqual(['still here']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });

  it('should close every backend after flushing', async () => {
    const close = jest.fn().mockResolvedValue(undefined);
    const closing = new Logger([{ log: () => Promise.resolve(), close }], { console: false });

    await closing.close();

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should print to the console unless disabled', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const printing = new Logger([], { level: 'info' });

    await printing.info('Migration applied', { component: 'ConvergenceEngine', stepId: 3 });

    expect(logSpy).toHaveBeenCalledWith(expect.stringMatching(/\[INFO\] \[ConvergenceEngine\] Migration applied \{"stepId":3\}$/));
    logSpy.mockRestore();
  });
});

describe('ComponentLogger', () => {
  it('should tag every message with its component', async () => {
    // Arrange
    const backend = new MemoryLogBackend();
    const logger = new ComponentLogger(new Logger([backend], { level: 'debug', console: false }), 'MigrationRegistry');

    // Act
    await logger.info('Loaded', { steps: 5 });
    logger.debugSync('Checking');
    logger.errorSync('Broken', new Error('boom'));

    // Assert
    expect(backend.messages.map((message) => [message.level, message.component])).toEqual([
      ['info', 'MigrationRegistry'],
      ['debug', 'MigrationRegistry'],
      ['error', 'MigrationRegistry'],
    ]);
    expect(backend.messages[0].context).toEqual({ component: 'MigrationRegistry', steps: 5 });
  });

  it('should do nothing without a logger', async () => {
    const logger = new ComponentLogger(undefined, 'Quiet');

    await expect(logger.warn('ignored')).resolves.toBeUndefined();
    expect(() => logger.infoSync('ignored')).not.toThrow();
  });
});
