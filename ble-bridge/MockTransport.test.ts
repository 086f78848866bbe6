/**
 * Mock Transport Tests
 */

import { TransportNotInitializedError } from './interfaces/ITransport';
import { MockTransport, buildWeightPayload } from './MockTransport';

const SCALE = 'AA:BB:CC:DD:EE:01';

describe('buildWeightPayload', () => {
  test('encodes magnitude big-endian and the sign flag in byte 7', () => {
    expect(Array.from(buildWeightPayload(300))).toEqual([0x10, 0x0b, 0x01, 0x2c, 0, 0, 0, 0]);
    expect(Array.from(buildWeightPayload(-300))).toEqual([0x10, 0x0b, 0x01, 0x2c, 0, 0, 0, 1]);
  });
});

describe('MockTransport', () => {
  let transport: MockTransport;

  beforeEach(() => {
    transport = new MockTransport();
  });

  afterEach(async () => {
    await transport.cleanup();
  });

  test('rejects radio operations before initialize', async () => {
    transport.addScale(SCALE);
    await expect(transport.resolve(SCALE, 10)).rejects.toBeInstanceOf(TransportNotInitializedError);
  });

  test('resolves advertising scales regardless of address case', async () => {
    await transport.initialize();
    transport.addScale(SCALE, { name: 'SencorFood' });

    const peripheral = await transport.resolve(SCALE.toLowerCase(), 10);
    expect(peripheral?.address).toBe(SCALE);
    expect(peripheral?.name).toBe('SencorFood');
  });

  test('resolve gives up with null after the timeout', async () => {
    await transport.initialize();
    await expect(transport.resolve(SCALE, 10)).resolves.toBeNull();
  });

  test('delivers notifications only to subscribed connections', async () => {
    await transport.initialize();
    transport.addScale(SCALE);
    expect(transport.notifyWeight(SCALE, 100)).toBe(false);

    const peripheral = await transport.resolve(SCALE, 10);
    if (!peripheral) throw new Error('scale did not resolve');
    const connection = await transport.connect(peripheral);
    const [channel] = await connection.listChannels();
    if (!channel) throw new Error('scale has no channels');

    const received: number[][] = [];
    await connection.subscribe(channel, data => received.push(Array.from(data)));

    expect(transport.notifyWeight(SCALE, 100)).toBe(true);
    expect(received).toEqual([[0x10, 0x0b, 0x00, 0x64, 0, 0, 0, 0]]);

    await connection.close();
    expect(transport.notifyWeight(SCALE, 100)).toBe(false);
    expect(transport.getStats(SCALE)).toEqual({ resolves: 1, connects: 1, closes: 1, subscribes: 1, unsubscribes: 0 });
  });

  test('dropLink emits disconnect on the open connection', async () => {
    await transport.initialize();
    transport.addScale(SCALE);
    const peripheral = await transport.resolve(SCALE, 10);
    if (!peripheral) throw new Error('scale did not resolve');
    const connection = await transport.connect(peripheral);
    const onDisconnect = jest.fn();
    connection.on('disconnect', onDisconnect);

    transport.dropLink(SCALE);

    expect(onDisconnect).toHaveBeenCalledTimes(1);
    expect(connection.isConnected()).toBe(false);
  });

  test('scans return matching advertisements only', async () => {
    await transport.initialize();
    transport.addScale(SCALE, { name: 'SencorFood' });
    transport.addScale('AA:BB:CC:DD:EE:02', { name: 'Thermometer' });

    const found = await transport.scanForAdvertisements(ad => ad.name.startsWith('Sencor'), 5);

    expect(found).toEqual([{ id: SCALE, name: 'SencorFood', address: SCALE, rssi: -50 }]);
    expect(transport.isScanning).toBe(false);
  });
});
