/**
 * node-ble Transport Implementation
 * Wraps node-ble (BlueZ via DBus) for Linux/Raspberry Pi BLE operations
 */

import { EventEmitter } from 'events';
import NodeBle from 'node-ble';
import {
  ITransport,
  IPeripheral,
  IConnection,
  IChannel,
  NotifyHandler,
  PeripheralState,
  Advertisement,
  AdvertisementPredicate,
  TransportConfig,
  CharacteristicProperties,
  TransportNotInitializedError,
  ConnectionFailedError,
  normalizeAddress,
} from '../interfaces/ITransport';
import { IConnectionStrategy } from '../interfaces/IConnectionStrategy';
import { BLE_CONFIG } from '../BleBridgeConstants';
import { bleLogger, errorMessage } from '../BleLogger';
import { sleep, withTimeout } from '../utils/async';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const GATT_RETRY_ATTEMPTS = 3;
const GATT_RETRY_DELAY_MS = 500;
const GATT_STABILIZATION_MS = 200;

function toProperties(flags: string[]): CharacteristicProperties {
  return {
    read: flags.includes('read'),
    write: flags.includes('write'),
    writeWithoutResponse: flags.includes('write-without-response'),
    notify: flags.includes('notify'),
    indicate: flags.includes('indicate'),
  };
}

function isNotConnectedError(error: unknown): boolean {
  // "Not Connected" from BlueZ is actually success when disconnecting
  return errorMessage(error).includes('Not Connected') || errorMessage(error).includes('NotConnected');
}

// ─────────────────────────────────────────────────────────────────────────────
// node-ble Peripheral Wrapper
// ─────────────────────────────────────────────────────────────────────────────

export class NodeBlePeripheral implements IPeripheral {
  readonly id: string;
  readonly address: string;
  private _state: PeripheralState = 'disconnected';
  private gattServer: NodeBle.GattServer | null = null;

  constructor(
    readonly device: NodeBle.Device,
    address: string,
    readonly name: string,
    readonly rssi: number
  ) {
    this.address = normalizeAddress(address);
    this.id = this.address;

    this.device.on('disconnect', () => {
      this._state = 'disconnected';
      this.gattServer = null;
    });
  }

  get state(): PeripheralState {
    return this._state;
  }

  get gatt(): NodeBle.GattServer | null {
    return this.gattServer;
  }

  async connect(): Promise<void> {
    if (this._state === 'connected') return;

    this._state = 'connecting';
    try {
      await this.device.connect();
      await this.acquireGattServer();
      this._state = 'connected';
    } catch (error) {
      this._state = 'disconnected';
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this._state === 'disconnected') return;

    this._state = 'disconnecting';
    try {
      await this.device.disconnect();
    } catch (error) {
      if (!isNotConnectedError(error)) {
        this._state = 'error';
        throw error;
      }
    }

    this._state = 'disconnected';
    this.gattServer = null;
  }

  private async acquireGattServer(): Promise<void> {
    let lastError: unknown;

    for (let attempt = 0; attempt < GATT_RETRY_ATTEMPTS; attempt++) {
      try {
        // Wait for BlueZ stabilization
        await sleep(attempt === 0 ? GATT_STABILIZATION_MS : GATT_RETRY_DELAY_MS);
        this.gattServer = await this.device.gatt();
        return;
      } catch (error) {
        lastError = error;
        bleLogger.debug(`${this.address}: GATT attempt ${attempt + 1}/${GATT_RETRY_ATTEMPTS} failed`, { error: errorMessage(error) }, 'NODE-BLE');
      }
    }

    throw new Error(`Failed to acquire GATT server after ${GATT_RETRY_ATTEMPTS} attempts: ${errorMessage(lastError)}`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// node-ble Connection
// ─────────────────────────────────────────────────────────────────────────────

interface NodeBleChannel extends IChannel {
  readonly characteristic: NodeBle.GattCharacteristic;
}

class NodeBleConnection extends EventEmitter implements IConnection {
  private channels = new Map<string, NodeBleChannel>();
  private notifyListeners = new Map<string, (buffer: Buffer) => void>();
  private readonly onDisconnect = (): void => {
    this.emit('disconnect');
  };

  constructor(readonly peripheral: NodeBlePeripheral) {
    super();
    this.peripheral.device.on('disconnect', this.onDisconnect);
  }

  isConnected(): boolean {
    return this.peripheral.state === 'connected';
  }

  async listChannels(): Promise<IChannel[]> {
    const gattServer = this.peripheral.gatt;
    if (!gattServer) {
      throw new Error('Not connected - GATT server not available');
    }

    this.channels.clear();
    const serviceUuids = await gattServer.services();

    for (const serviceUuid of serviceUuids) {
      const service = await gattServer.getPrimaryService(serviceUuid);
      const characteristicUuids = await service.characteristics();

      for (const uuid of characteristicUuids) {
        const characteristic = await service.getCharacteristic(uuid);
        const flags = await characteristic.getFlags();
        const channel: NodeBleChannel = {
          uuid,
          serviceUuid,
          properties: toProperties(flags),
          characteristic,
        };
        this.channels.set(channelKey(channel), channel);
      }
    }

    return Array.from(this.channels.values());
  }

  async subscribe(channel: IChannel, onNotify: NotifyHandler): Promise<void> {
    const nodeBleChannel = this.requireChannel(channel);
    const key = channelKey(channel);
    const listener = (buffer: Buffer): void => onNotify(buffer);

    await nodeBleChannel.characteristic.startNotifications();
    nodeBleChannel.characteristic.on('valuechanged', listener);
    this.notifyListeners.set(key, listener);
  }

  async unsubscribe(channel: IChannel): Promise<void> {
    const nodeBleChannel = this.requireChannel(channel);
    const key = channelKey(channel);
    const listener = this.notifyListeners.get(key);

    if (listener) {
      nodeBleChannel.characteristic.removeListener('valuechanged', listener);
      this.notifyListeners.delete(key);
    }
    await nodeBleChannel.characteristic.stopNotifications();
  }

  async close(): Promise<void> {
    this.peripheral.device.removeListener('disconnect', this.onDisconnect);
    for (const [key, listener] of this.notifyListeners) {
      this.channels.get(key)?.characteristic.removeListener('valuechanged', listener);
    }
    this.notifyListeners.clear();
    await this.peripheral.disconnect();
  }

  private requireChannel(channel: IChannel): NodeBleChannel {
    const nodeBleChannel = this.channels.get(channelKey(channel));
    if (!nodeBleChannel) {
      throw new Error(`Unknown channel ${channel.uuid} on ${this.peripheral.address}`);
    }
    return nodeBleChannel;
  }
}

function channelKey(channel: IChannel): string {
  return `${channel.serviceUuid}/${channel.uuid}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// node-ble Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NodeBleTransport extends EventEmitter implements ITransport {
  private destroy: (() => void) | null = null;
  private adapter: NodeBle.Adapter | null = null;
  private _isInitialized = false;
  private discoveryHolds = 0;
  private peripherals: Map<string, NodeBlePeripheral> = new Map();
  private config: TransportConfig;

  constructor(
    private readonly strategy: IConnectionStrategy,
    config?: Partial<TransportConfig>
  ) {
    super();
    this.config = {
      minRssi: config?.minRssi ?? BLE_CONFIG.MIN_RSSI,
      scanTimeout: config?.scanTimeout ?? BLE_CONFIG.SCAN_TIMEOUT,
    };
  }

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  get isScanning(): boolean {
    return this.discoveryHolds > 0;
  }

  async initialize(): Promise<boolean> {
    if (this._isInitialized) return true;

    try {
      const { bluetooth, destroy } = NodeBle.createBluetooth();
      this.destroy = destroy;
      this.adapter = await bluetooth.defaultAdapter();

      if (!(await this.adapter.isPowered())) {
        bleLogger.error('Bluetooth adapter is not powered on (is bluetoothd running?)', undefined, 'NODE-BLE');
        this.releaseDbus();
        return false;
      }

      const adapterName = await this.adapter.getName();
      const adapterAddress = await this.adapter.getAddress();
      bleLogger.info(`Adapter: ${adapterName} (${adapterAddress})`, undefined, 'NODE-BLE');

      this._isInitialized = true;
      return true;
    } catch (error) {
      bleLogger.error('node-ble initialization failed', { error: errorMessage(error) }, 'NODE-BLE');
      this.releaseDbus();
      return false;
    }
  }

  async cleanup(): Promise<void> {
    if (this.discoveryHolds > 0) {
      this.discoveryHolds = 0;
      await this.stopDiscovery();
    }

    for (const peripheral of this.peripherals.values()) {
      try {
        await peripheral.disconnect();
      } catch (error) {
        bleLogger.warn('Error disconnecting peripheral', { address: peripheral.address, error: errorMessage(error) }, 'NODE-BLE');
      }
    }

    this.peripherals.clear();
    this.releaseDbus();
    this._isInitialized = false;
  }

  async scanForAdvertisements(predicate: AdvertisementPredicate, durationMs: number): Promise<Advertisement[]> {
    const adapter = this.requireAdapter();
    const found = new Map<string, Advertisement>();
    const deadline = Date.now() + durationMs;

    await this.acquireDiscovery();
    try {
      while (Date.now() < deadline) {
        for (const address of await adapter.devices()) {
          const normalized = normalizeAddress(address);
          if (found.has(normalized)) continue;

          const advertisement = await this.describeDevice(adapter, address);
          if (!advertisement || advertisement.rssi < this.config.minRssi) continue;

          this.emit('advertisement', advertisement);
          if (predicate(advertisement)) {
            found.set(normalized, advertisement);
          }
        }
        await sleep(Math.min(BLE_CONFIG.NODE_BLE_DISCOVERY_POLL, Math.max(0, deadline - Date.now())));
      }
    } finally {
      await this.releaseDiscovery();
    }

    return Array.from(found.values());
  }

  async resolve(address: string, timeoutMs: number): Promise<IPeripheral | null> {
    const adapter = this.requireAdapter();
    const wanted = normalizeAddress(address);

    try {
      await this.acquireDiscovery();
    } catch (error) {
      bleLogger.debug(`Discovery start failed while resolving ${wanted}`, { error: errorMessage(error) }, 'NODE-BLE');
      return null;
    }

    try {
      const device = await withTimeout(
        adapter.waitDevice(wanted, timeoutMs, BLE_CONFIG.NODE_BLE_DISCOVERY_POLL),
        timeoutMs + BLE_CONFIG.NODE_BLE_DISCOVERY_POLL,
        `Resolve ${wanted}`
      );
      const name = await device.getName().catch(() => wanted);
      const peripheral = new NodeBlePeripheral(device, wanted, name, 0);
      this.peripherals.set(wanted, peripheral);
      return peripheral;
    } catch (error) {
      bleLogger.debug(`${wanted} not seen within ${timeoutMs}ms`, { error: errorMessage(error) }, 'NODE-BLE');
      return null;
    } finally {
      await this.releaseDiscovery();
    }
  }

  async connect(peripheral: IPeripheral, signal?: AbortSignal): Promise<IConnection> {
    const nodeBlePeripheral = this.peripherals.get(normalizeAddress(peripheral.address));
    if (!nodeBlePeripheral) {
      throw new ConnectionFailedError(peripheral.address, 'peripheral was not resolved by this transport');
    }

    const result = await this.strategy.connectSingle(nodeBlePeripheral, signal);
    if (!result.success) {
      throw new ConnectionFailedError(peripheral.address, result.error ?? 'unknown error');
    }

    return new NodeBleConnection(nodeBlePeripheral);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private requireAdapter(): NodeBle.Adapter {
    if (!this._isInitialized || !this.adapter) {
      throw new TransportNotInitializedError('node-ble');
    }
    return this.adapter;
  }

  private async describeDevice(adapter: NodeBle.Adapter, address: string): Promise<Advertisement | null> {
    try {
      const device = await adapter.getDevice(address);
      const name = await device.getName().catch(() => '');
      const rssi = await device.getRSSI().then(Number).catch(() => 0);
      return { id: normalizeAddress(address), name, address: normalizeAddress(address), rssi };
    } catch {
      // Device went away between listing and lookup
      return null;
    }
  }

  private async acquireDiscovery(): Promise<void> {
    const adapter = this.requireAdapter();
    this.discoveryHolds++;

    if (this.discoveryHolds === 1 && !(await adapter.isDiscovering())) {
      try {
        await adapter.startDiscovery();
        this.emit('scanStarted');
      } catch (error) {
        // BlueZ reports "In Progress" when another client already started discovery
        if (!(await adapter.isDiscovering())) {
          this.discoveryHolds--;
          throw error;
        }
      }
    }
  }

  private async releaseDiscovery(): Promise<void> {
    this.discoveryHolds = Math.max(0, this.discoveryHolds - 1);
    if (this.discoveryHolds === 0) {
      await this.stopDiscovery();
    }
  }

  private async stopDiscovery(): Promise<void> {
    if (!this.adapter) return;
    try {
      if (await this.adapter.isDiscovering()) {
        await this.adapter.stopDiscovery();
      }
      this.emit('scanStopped');
    } catch (error) {
      bleLogger.warn('Error stopping discovery', { error: errorMessage(error) }, 'NODE-BLE');
    }
  }

  private releaseDbus(): void {
    if (this.destroy) {
      this.destroy();
      this.destroy = null;
    }
    this.adapter = null;
  }
}
