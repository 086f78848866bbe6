/**
 * Transport factory and platform selection tests
 */

import { ConnectionStrategyType } from './interfaces/IConnectionStrategy';
import { createStrategy, createTransport, resolvePlatformConfig } from './BleServiceFactory';
import { MockTransport } from './MockTransport';
import { ParallelStrategy } from './strategies/ParallelStrategy';
import { SequentialStrategy } from './strategies/SequentialStrategy';
import { detectPlatform, getConfigForTransport, getPlatformConfig } from './PlatformConfig';

describe('detectPlatform', () => {
  test.each([
    ['win32', 'windows'],
    ['darwin', 'macos'],
    ['linux', 'linux'],
    ['freebsd', 'unknown'],
  ] as const)('%s → %s', (platform, expected) => {
    expect(detectPlatform(platform)).toBe(expected);
  });
});

describe('platform configuration', () => {
  test('Windows and macOS use noble with parallel connections', () => {
    expect(getPlatformConfig('windows')).toMatchObject({ transportType: 'noble', strategyType: ConnectionStrategyType.PARALLEL });
    expect(getPlatformConfig('macos')).toMatchObject({ transportType: 'noble', platform: 'macos' });
  });

  test('node-ble connects sequentially', () => {
    expect(getConfigForTransport('node-ble')).toMatchObject({
      transportType: 'node-ble',
      strategyType: ConnectionStrategyType.SEQUENTIAL,
    });
  });

  test('an explicit selection overrides detection', () => {
    expect(resolvePlatformConfig('mock').transportType).toBe('mock');
    expect(resolvePlatformConfig('noble').transportType).toBe('noble');
  });
});

describe('createStrategy', () => {
  test('builds the strategy named by the type', () => {
    const config = getConfigForTransport('mock').strategy;
    expect(createStrategy(ConnectionStrategyType.PARALLEL, config)).toBeInstanceOf(ParallelStrategy);
    expect(createStrategy(ConnectionStrategyType.SEQUENTIAL, config)).toBeInstanceOf(SequentialStrategy);
  });
});

describe('createTransport', () => {
  test('returns an uninitialized mock transport', async () => {
    const transport = await createTransport('mock');

    expect(transport).toBeInstanceOf(MockTransport);
    expect(transport.isInitialized).toBe(false);
  });
});
