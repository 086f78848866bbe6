/**
 * BleLogger Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BleLogger, describeError, errorMessage, isLogLevel } from './BleLogger';

describe('BleLogger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('drops messages below the configured level', () => {
    const logger = new BleLogger({ level: 'warn' });

    logger.info('connected');
    logger.warn('slow connect', { ms: 900 }, 'SUPERVISOR');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toMatch(/^\[\S+\] \[WARN\] \[SUPERVISOR\] slow connect \| \{"ms":900\}$/);
  });

  test('silent disables every level', () => {
    const logger = new BleLogger({ level: 'silent' });
    expect(logger.isEnabled('error')).toBe(false);
    expect(logger.isEnabled('silent')).toBe(false);
  });

  test('configure changes the level at runtime', () => {
    const logger = new BleLogger({ level: 'error' });
    logger.configure({ level: 'trace' });

    expect(logger.getLevel()).toBe('trace');
    expect(logger.isEnabled('trace')).toBe(true);
  });

  test('appends lines to a file in the log directory', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scale-logs-'));
    const logger = new BleLogger({ level: 'info', logDir: dir });

    logger.info('hello scale', undefined, 'TEST');
    const file = logger.getLogPath();
    await logger.close();

    expect(path.dirname(file)).toBe(dir);
    expect(fs.readFileSync(file, 'utf8')).toContain('[INFO] [TEST] hello scale\n');
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('error helpers', () => {
  test('describe Error instances and plain values', () => {
    expect(errorMessage(new Error('radio busy'))).toBe('radio busy');
    expect(errorMessage('timeout')).toBe('timeout');
    expect(describeError(42)).toEqual({ error: '42' });
    expect(describeError(new Error('x'))).toMatchObject({ error: 'x' });
  });

  test('isLogLevel accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
