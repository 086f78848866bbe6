/**
 * Environment configuration tests
 */

import { ConfigValidationError, loadConfig, parseDeviceList } from './config';

describe('loadConfig', () => {
  test('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      devices: [],
      timing: {
        scanIntervalMs: 0,
        offIntervalMs: 30_000,
        listenWindowMs: 10_000,
        resolveTimeoutMs: 10_000,
        pollIntervalMs: 1_000,
        teardownTimeoutMs: 5_000,
      },
      discoveryDurationMs: 5_000,
      devicePattern: 'sencorfood',
      autoDiscover: true,
      transport: 'auto',
      logLevel: 'info',
      logDir: undefined,
    });
  });

  test('converts interval seconds to milliseconds', () => {
    const config = loadConfig({
      SCALE_SCAN_INTERVAL: '60',
      SCALE_OFF_INTERVAL: '0',
      SCALE_LISTEN_WINDOW: '15',
      SCALE_RESOLVE_TIMEOUT: '20',
      SCALE_DISCOVERY_DURATION: '8',
    });

    expect(config.timing).toMatchObject({
      scanIntervalMs: 60_000,
      offIntervalMs: 0,
      listenWindowMs: 15_000,
      resolveTimeoutMs: 20_000,
    });
    expect(config.discoveryDurationMs).toBe(8_000);
  });

  test('configured devices turn automatic discovery off unless asked for', () => {
    expect(loadConfig({ SCALE_DEVICES: 'AA:BB:CC:DD:EE:01' }).autoDiscover).toBe(false);
    expect(loadConfig({ SCALE_DEVICES: 'AA:BB:CC:DD:EE:01', SCALE_AUTO_DISCOVER: 'yes' }).autoDiscover).toBe(true);
    expect(loadConfig({ SCALE_AUTO_DISCOVER: 'off' }).autoDiscover).toBe(false);
  });

  test('reads transport, log level, pattern and log directory', () => {
    const config = loadConfig({
      SCALE_TRANSPORT: 'Node-BLE',
      SCALE_LOG_LEVEL: 'DEBUG',
      SCALE_DEVICE_PATTERN: ' Kitchen ',
      SCALE_LOG_DIR: '/var/log/scales',
    });

    expect(config.transport).toBe('node-ble');
    expect(config.logLevel).toBe('debug');
    expect(config.devicePattern).toBe('Kitchen');
    expect(config.logDir).toBe('/var/log/scales');
  });

  test('reports every invalid variable at once', () => {
    let caught: unknown;
    try {
      loadConfig({
        SCALE_SCAN_INTERVAL: '-5',
        SCALE_OFF_INTERVAL: 'soon',
        SCALE_LISTEN_WINDOW: '0',
        SCALE_TRANSPORT: 'usb',
        SCALE_LOG_LEVEL: 'loud',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.issues).toEqual([
      'SCALE_SCAN_INTERVAL must be an integer >= 0 (got "-5")',
      'SCALE_OFF_INTERVAL must be an integer >= 0 (got "soon")',
      'SCALE_LISTEN_WINDOW must be an integer >= 1 (got "0")',
      'SCALE_TRANSPORT must be one of auto, noble, node-ble, mock (got "usb")',
      'SCALE_LOG_LEVEL must be trace, debug, info, warn, error or silent (got "loud")',
    ]);
    expect(caught.message.split('\n')[0]).toBe('Invalid configuration:');
  });

  test('rejects fractional seconds', () => {
    expect(() => loadConfig({ SCALE_OFF_INTERVAL: '1.5' })).toThrow(ConfigValidationError);
  });
});

describe('parseDeviceList', () => {
  test('parses address=name pairs and bare addresses', () => {
    expect(parseDeviceList('aa:bb:cc:dd:ee:01=Kitchen, 11:22:33:44:55:66 ,')).toEqual([
      { address: 'AA:BB:CC:DD:EE:01', name: 'Kitchen' },
      { address: '11:22:33:44:55:66', name: '11:22:33:44:55:66' },
    ]);
  });

  test('a repeated address keeps its last name', () => {
    expect(parseDeviceList('AA:BB:CC:DD:EE:01=Kitchen,aa:bb:cc:dd:ee:01=Pantry')).toEqual([
      { address: 'AA:BB:CC:DD:EE:01', name: 'Pantry' },
    ]);
  });

  test('records entries without an address', () => {
    const issues: string[] = [];
    expect(parseDeviceList(' =Kitchen', issues)).toEqual([]);
    expect(issues).toEqual(['SCALE_DEVICES entry "=Kitchen" has an empty address']);
  });

  test('an unset list is empty', () => {
    expect(parseDeviceList(undefined)).toEqual([]);
  });
});
