/**
 * Scale Manager Tests
 */

import { MockTransport } from '../ble-bridge/MockTransport';
import { waitFor } from '../test-utils/waitFor';
import { ScaleManager } from './ScaleManager';
import { ScaleDevice, SupervisorState, SupervisorTiming, WeightEvent } from './types';

const KITCHEN = 'AA:BB:CC:DD:EE:01';
const PANTRY = 'AA:BB:CC:DD:EE:02';

const FAST_TIMING: Partial<SupervisorTiming> = {
  scanIntervalMs: 0,
  offIntervalMs: 30,
  resolveTimeoutMs: 100,
  pollIntervalMs: 20,
  teardownTimeoutMs: 100,
};

describe('ScaleManager', () => {
  let transport: MockTransport;
  let manager: ScaleManager;

  beforeEach(async () => {
    transport = new MockTransport();
    await transport.initialize();
  });

  afterEach(async () => {
    await manager.stop();
    await transport.cleanup();
  });

  describe('registry', () => {
    test('normalizes addresses and defaults the name to the address', () => {
      manager = new ScaleManager({
        transport,
        devices: [
          { address: 'aa:bb:cc:dd:ee:01', name: 'Kitchen' },
          { address: PANTRY, name: '' },
        ],
      });

      expect(manager.getDevices()).toEqual({ [KITCHEN]: 'Kitchen', [PANTRY]: PANTRY });
    });

    test('addDevice on a known address only renames it', () => {
      manager = new ScaleManager({ transport, devices: [{ address: KITCHEN, name: 'Kitchen' }] });
      const added = jest.fn();
      manager.on('deviceAdded', added);

      manager.addDevice(KITCHEN.toLowerCase(), 'Counter');

      expect(manager.getDevices()).toEqual({ [KITCHEN]: 'Counter' });
      expect(added).not.toHaveBeenCalled();
    });

    test('addDevice announces new scales', () => {
      manager = new ScaleManager({ transport });
      const added = jest.fn();
      manager.on('deviceAdded', added);

      manager.addDevice(PANTRY, 'Pantry');

      expect(added).toHaveBeenCalledWith({ address: PANTRY, name: 'Pantry' });
    });

    test('getWeight is null before any reading', () => {
      manager = new ScaleManager({ transport, devices: [{ address: KITCHEN, name: 'Kitchen' }] });
      expect(manager.getWeight(KITCHEN)).toBeNull();
      expect(manager.getWeight('11:22:33:44:55:66')).toBeNull();
    });
  });

  describe('lifecycle', () => {
    test('supervises every registered scale until stopped', async () => {
      transport.addScale(KITCHEN);
      transport.addScale(PANTRY);
      manager = new ScaleManager({
        transport,
        timing: FAST_TIMING,
        devices: [
          { address: KITCHEN, name: 'Kitchen' },
          { address: PANTRY, name: 'Pantry' },
        ],
      });

      manager.start();
      expect(manager.isRunning).toBe(true);
      await waitFor(() => transport.isSubscribed(KITCHEN) && transport.isSubscribed(PANTRY), 'both subscriptions');

      await manager.stop();

      expect(manager.isRunning).toBe(false);
      expect(manager.getDeviceStates().map(device => device.state)).toEqual([
        SupervisorState.TERMINATED,
        SupervisorState.TERMINATED,
      ]);
      expect(transport.isConnected(KITCHEN)).toBe(false);
      expect(transport.isConnected(PANTRY)).toBe(false);
    });

    test('stop without start is a no-op', async () => {
      manager = new ScaleManager({ transport });
      await expect(manager.stop()).resolves.toBeUndefined();
    });

    test('a failing scale does not hold back the others', async () => {
      transport.addScale(KITCHEN, { failConnect: true });
      transport.addScale(PANTRY);
      manager = new ScaleManager({
        transport,
        timing: FAST_TIMING,
        devices: [
          { address: KITCHEN, name: 'Kitchen' },
          { address: PANTRY, name: 'Pantry' },
        ],
      });

      manager.start();
      await waitFor(() => transport.isSubscribed(PANTRY), 'pantry subscription');
      await waitFor(() => transport.getStats(KITCHEN).connects >= 2, 'kitchen retry');

      transport.notifyWeight(PANTRY, 730);
      expect(manager.getWeight(PANTRY)).toBe(730);
      expect(manager.getWeight(KITCHEN)).toBeNull();

      const kitchen = manager.getDeviceStates().find(device => device.address === KITCHEN);
      expect(kitchen?.connectionAttempts).toBeGreaterThanOrEqual(2);
      expect(kitchen?.lastError).toBe('connect failed: Connection to AA:BB:CC:DD:EE:01 failed: Mock connection refused');
      expect(kitchen?.lastSeen).not.toBeNull();
    });

    test('an unresolvable scale does not hold back the others', async () => {
      transport.addScale(KITCHEN, { advertising: false });
      transport.addScale(PANTRY);
      manager = new ScaleManager({
        transport,
        timing: FAST_TIMING,
        devices: [
          { address: KITCHEN, name: 'Kitchen' },
          { address: PANTRY, name: 'Pantry' },
        ],
      });

      manager.start();
      await waitFor(() => transport.isSubscribed(PANTRY), 'pantry subscription');
      await waitFor(() => transport.getStats(KITCHEN).resolves >= 2, 'kitchen resolve retry');

      transport.notifyWeight(PANTRY, 410);
      expect(manager.getWeight(PANTRY)).toBe(410);
      expect(manager.getWeight(KITCHEN)).toBeNull();

      const kitchen = manager.getDeviceStates().find(device => device.address === KITCHEN);
      expect(kitchen?.lastError).toBe('not advertising within 100ms');
      expect(kitchen?.connectionAttempts).toBe(0);
      expect(transport.getStats(KITCHEN).connects).toBe(0);
    });

    test('a throwing event listener does not stop supervision', async () => {
      transport.addScale(KITCHEN);
      manager = new ScaleManager({ transport, timing: FAST_TIMING, devices: [{ address: KITCHEN, name: 'Kitchen' }] });
      manager.on('stateChanged', () => {
        throw new Error('listener failed');
      });
      manager.on('weight', () => {
        throw new Error('listener failed');
      });

      manager.start();
      await waitFor(() => transport.isSubscribed(KITCHEN), 'first subscription');

      transport.notifyWeight(KITCHEN, 200);
      expect(manager.getWeight(KITCHEN)).toBe(200);
      expect(manager.getDeviceStates()[0]?.lastWeight).toBe(200);

      transport.dropLink(KITCHEN);
      await waitFor(() => transport.getStats(KITCHEN).connects === 2, 'reconnect');
      await waitFor(() => transport.isSubscribed(KITCHEN), 'second subscription');
    });

    test('addDevice while running supervises the scale immediately', async () => {
      transport.addScale(PANTRY);
      manager = new ScaleManager({ transport, timing: FAST_TIMING });

      manager.start();
      manager.addDevice(PANTRY, 'Pantry');

      await waitFor(() => transport.isSubscribed(PANTRY), 'pantry subscription');
    });

    test('can be restarted after stop', async () => {
      transport.addScale(KITCHEN);
      manager = new ScaleManager({ transport, timing: FAST_TIMING, devices: [{ address: KITCHEN, name: 'Kitchen' }] });

      manager.start();
      await waitFor(() => transport.isSubscribed(KITCHEN), 'first subscription');
      await manager.stop();

      manager.start();
      await waitFor(() => transport.isSubscribed(KITCHEN), 'second subscription');
      expect(transport.getStats(KITCHEN).connects).toBe(2);
    });
  });

  describe('observers', () => {
    test('callbacks and events receive readings until unregistered', async () => {
      transport.addScale(KITCHEN);
      manager = new ScaleManager({ transport, timing: FAST_TIMING, devices: [{ address: KITCHEN, name: 'Kitchen' }] });
      const callback = jest.fn();
      const events: WeightEvent[] = [];
      manager.registerCallback(KITCHEN, callback);
      manager.on('weight', (event: WeightEvent) => events.push(event));

      manager.start();
      await waitFor(() => transport.isSubscribed(KITCHEN), 'subscription');

      transport.notifyWeight(KITCHEN, 150);
      manager.unregisterCallback(KITCHEN, callback);
      transport.notifyWeight(KITCHEN, 175);

      expect(callback.mock.calls).toEqual([[KITCHEN, 150, { rawHigh: 0, rawLow: 150, signFlag: 0 }]]);
      expect(events.map(event => event.weight)).toEqual([150, 175]);
      expect(manager.getWeight(KITCHEN)).toBe(175);
      expect(manager.getDeviceStates()[0]?.lastWeight).toBe(175);
    });
  });

  describe('discovery', () => {
    test('registers advertising scales whose name matches the pattern', async () => {
      transport.addScale(KITCHEN, { name: 'SencorFood SKS 7075' });
      transport.addScale(PANTRY, { name: 'Other Scale' });
      transport.addScale('aa:bb:cc:dd:ee:03', { name: 'SENCORFOOD' });
      transport.addScale('AA:BB:CC:DD:EE:04', { name: 'sencorfood', advertising: false });
      manager = new ScaleManager({ transport });

      const found: ScaleDevice[] = await manager.discoverDevices(10);

      expect(found).toEqual([
        { address: KITCHEN, name: 'SencorFood SKS 7075' },
        { address: 'AA:BB:CC:DD:EE:03', name: 'SENCORFOOD' },
      ]);
      expect(manager.getDevices()).toEqual({
        [KITCHEN]: 'SencorFood SKS 7075',
        'AA:BB:CC:DD:EE:03': 'SENCORFOOD',
      });
    });

    test('keeps the configured name of a scale it finds again', async () => {
      transport.addScale(KITCHEN, { name: 'SencorFood SKS 7075' });
      manager = new ScaleManager({ transport, devices: [{ address: KITCHEN, name: 'Kitchen' }] });

      await manager.discoverDevices(10);

      expect(manager.getDevices()).toEqual({ [KITCHEN]: 'Kitchen' });
    });

    test('uses a custom device pattern', async () => {
      transport.addScale(PANTRY, { name: 'Pantry Scale' });
      manager = new ScaleManager({ transport, devicePattern: 'PANTRY' });

      expect(await manager.discoverDevices(10)).toEqual([{ address: PANTRY, name: 'Pantry Scale' }]);
    });
  });
});
