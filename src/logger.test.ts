/**
 * Logger tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { ConsoleLogger, JsonLogger, LogLevel, createLogger, parseLogLevel } from './logger.js';

describe('ConsoleLogger', () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    delete process.env.LOG_LEVEL;
  });

  it('logs info messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.info('spec loaded', { paths: 3 });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[.*\] INFO: spec loaded {"paths":3}$/)
    );
  });

  it('filters out debug messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.debug('debug message');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('logs debug messages at DEBUG level', () => {
    const logger = new ConsoleLogger(LogLevel.DEBUG);
    logger.debug('debug message');

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/\[.*\] DEBUG: debug message$/)
    );
  });

  it('logs error with message and stack', () => {
    const logger = new ConsoleLogger(LogLevel.ERROR);
    logger.error('command failed', new Error('boom'));

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/ERROR: command failed.*"error":"boom".*"stack"/)
    );
  });

  it('respects LOG_LEVEL env var', () => {
    process.env.LOG_LEVEL = 'WARN';
    const logger = new ConsoleLogger();

    logger.info('info message');
    expect(consoleErrorSpy).not.toHaveBeenCalled();

    logger.warn('warn message');
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/WARN: warn message/)
    );
  });

  it('silences all logs at SILENT level', () => {
    const logger = new ConsoleLogger(LogLevel.SILENT);

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });
});

describe('JsonLogger', () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    delete process.env.LOG_LEVEL;
  });

  it('outputs valid JSON', () => {
    const logger = new JsonLogger(LogLevel.INFO);
    logger.info('documentation generated', { length: 120 });

    expect(consoleErrorSpy).toHaveBeenCalledOnce();
    const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));

    expect(parsed).toMatchObject({
      level: 'info',
      message: 'documentation generated',
      length: 120,
    });
    expect(parsed.timestamp).toMatch(/\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
  });

  it('includes error details in JSON', () => {
    const logger = new JsonLogger(LogLevel.ERROR);
    logger.error('command failed', new Error('boom'), { command: 'verify' });

    const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));

    expect(parsed).toMatchObject({
      level: 'error',
      message: 'command failed',
      error: 'boom',
      command: 'verify',
    });
    expect(parsed.stack).toBeDefined();
  });

  it('filters by log level', () => {
    const logger = new JsonLogger(LogLevel.WARN);

    logger.debug('debug');
    logger.info('info');
    expect(consoleErrorSpy).not.toHaveBeenCalled();

    logger.warn('warn');
    expect(consoleErrorSpy).toHaveBeenCalledOnce();
  });
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' Warn ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('ERROR')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('defaults to INFO', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});

describe('createLogger', () => {
  it('picks the implementation from the format name', () => {
    expect(createLogger('json', LogLevel.SILENT)).toBeInstanceOf(JsonLogger);
    expect(createLogger('console', LogLevel.SILENT)).toBeInstanceOf(ConsoleLogger);
    expect(createLogger(undefined, LogLevel.SILENT)).toBeInstanceOf(ConsoleLogger);
  });
});
