/**
 * node-ble Transport Tests
 * BlueZ is replaced by in-process adapter and device fakes
 */

import { EventEmitter } from 'events';
import { IConnectionStrategy } from '../interfaces/IConnectionStrategy';
import { IPeripheral } from '../interfaces/ITransport';
import { NodeBleTransport } from './NodeBleTransport';

jest.mock('node-ble', () => ({
  __esModule: true,
  default: {
    createBluetooth: () => ({
      bluetooth: { defaultAdapter: async () => mockAdapter },
      destroy: () => undefined,
    }),
  },
}));

const SCALE = 'AA:BB:CC:DD:EE:01';

class FakeCharacteristic extends EventEmitter {
  readonly getFlags = jest.fn(async () => ['notify']);
  readonly startNotifications = jest.fn(async () => undefined);
  readonly stopNotifications = jest.fn(async () => undefined);
}

class FakeDevice extends EventEmitter {
  readonly characteristic = new FakeCharacteristic();
  readonly connect = jest.fn(async () => undefined);
  readonly disconnect = jest.fn(async () => undefined);

  async getName(): Promise<string> {
    return 'SencorFood';
  }

  async gatt(): Promise<unknown> {
    return {
      services: async () => ['fff0'],
      getPrimaryService: async () => ({
        characteristics: async () => ['fff4'],
        getCharacteristic: async () => this.characteristic,
      }),
    };
  }
}

class FakeAdapter {
  device = new FakeDevice();
  discovering = false;
  readonly startDiscovery = jest.fn(async () => {
    this.discovering = true;
  });
  readonly stopDiscovery = jest.fn(async () => {
    this.discovering = false;
  });

  async isPowered(): Promise<boolean> {
    return true;
  }

  async getName(): Promise<string> {
    return 'hci0';
  }

  async getAddress(): Promise<string> {
    return '00:00:00:00:00:00';
  }

  async isDiscovering(): Promise<boolean> {
    return this.discovering;
  }

  async devices(): Promise<string[]> {
    return [];
  }

  async waitDevice(): Promise<FakeDevice> {
    return this.device;
  }
}

let mockAdapter = new FakeAdapter();

const directStrategy: IConnectionStrategy = {
  async connectSingle(peripheral: IPeripheral) {
    await peripheral.connect();
    return { deviceId: peripheral.id, success: true, attempts: 1 };
  },
};

describe('NodeBleTransport', () => {
  let transport: NodeBleTransport;

  beforeEach(async () => {
    mockAdapter = new FakeAdapter();
    transport = new NodeBleTransport(directStrategy);
    expect(await transport.initialize()).toBe(true);
  });

  afterEach(async () => {
    await transport.cleanup();
  });

  test('connections keep EventEmitter behaviour and forward notifications', async () => {
    const peripheral = await transport.resolve(SCALE.toLowerCase(), 1000);
    if (!peripheral) {
      throw new Error(`${SCALE} did not resolve`);
    }
    expect(peripheral.address).toBe(SCALE);

    const connection = await transport.connect(peripheral);
    const onDisconnect = jest.fn();
    connection.on('disconnect', onDisconnect);

    expect(connection.isConnected()).toBe(true);
    expect(connection.listeners('disconnect')).toEqual([onDisconnect]);

    const [channel] = await connection.listChannels();
    const received: number[][] = [];
    await connection.subscribe(channel, data => received.push(Array.from(data)));
    mockAdapter.device.characteristic.emit('valuechanged', Buffer.from([0x10, 0x0b, 0x00, 0x64]));
    expect(received).toEqual([[0x10, 0x0b, 0x00, 0x64]]);

    mockAdapter.device.emit('disconnect');
    expect(onDisconnect).toHaveBeenCalledTimes(1);
    expect(connection.isConnected()).toBe(false);
  });

  test('a failed discovery start does not give back a hold it never took', async () => {
    mockAdapter.startDiscovery.mockRejectedValueOnce(new Error('org.bluez.Error.NotReady'));

    const failing = transport.resolve(SCALE, 1000);
    const discovery = transport.scanForAdvertisements(() => true, 100);

    expect(await failing).toBeNull();
    expect(transport.isScanning).toBe(true);

    expect(await discovery).toEqual([]);
    expect(transport.isScanning).toBe(false);
  });
});
