/**
 * Tests for Logger utility
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { makeTempDir, removeDir } from '../../../__tests__/fixtures.js';

type LoggerModule = typeof import('../logger.js');

function setEnv(env: Record<string, string | undefined>): void {
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

async function freshLogger(env: Record<string, string | undefined>): Promise<LoggerModule> {
  vi.resetModules();
  setEnv(env);
  return import('../logger.js');
}

describe('Logger', () => {
  const savedLevel = process.env['SHOPEXT_LOG_LEVEL'];
  const savedFile = process.env['SHOPEXT_LOG_FILE'];
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    setEnv({ SHOPEXT_LOG_LEVEL: savedLevel, SHOPEXT_LOG_FILE: savedFile });
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('should have ordered levels and return a singleton', async () => {
    const { Logger, LogLevel } = await freshLogger({});

    expect(LogLevel.ERROR).toBe(0);
    expect(LogLevel.DEBUG).toBe(3);
    expect(Logger.getInstance()).toBe(Logger.getInstance());
  });

  it('should write info to stderr and filter debug by default', async () => {
    const { Logger, LogLevel } = await freshLogger({
      SHOPEXT_LOG_LEVEL: undefined,
      SHOPEXT_LOG_FILE: undefined,
    });
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = Logger.getInstance();

    logger.info('Collected asset sources', { sources: 2 });
    logger.debug('Skipping directory');

    expect(logger.getLevel()).toBe(LogLevel.INFO);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toMatch(/\] INFO: Collected asset sources$/);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should print the stack of logged errors', async () => {
    const { Logger } = await freshLogger({ SHOPEXT_LOG_FILE: undefined });
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('disk full');

    Logger.getInstance().error('Command failed', failure);

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[0][0]).toMatch(/ERROR: Command failed$/);
    expect(errorSpy.mock.calls[1][0]).toBe(failure.stack);
  });

  it('should respect SHOPEXT_LOG_LEVEL and setLevel', async () => {
    const { Logger, LogLevel } = await freshLogger({
      SHOPEXT_LOG_LEVEL: 'ERROR',
      SHOPEXT_LOG_FILE: undefined,
    });
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = Logger.getInstance();

    logger.warn('hidden');
    expect(warnSpy).not.toHaveBeenCalled();

    logger.setLevel(LogLevel.WARN);
    logger.warn('shown');
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should write redacted JSON lines to the log file', async () => {
    const logFile = path.join(dir, 'logs', 'cli.log');
    const { Logger } = await freshLogger({
      SHOPEXT_LOG_LEVEL: 'ERROR',
      SHOPEXT_LOG_FILE: logFile,
    });

    Logger.getInstance().info('Connecting with token=abc123', {
      password: 'test-secret',
      extension: 'TestPlugin',
    });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 2,
      message: 'Connecting with [REDACTED]',
      context: { password: '[REDACTED]', extension: 'TestPlugin' },
    });
  });
});
