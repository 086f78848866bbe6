/**
 * Noble Transport Implementation
 * Wraps @abandonware/noble for Windows/macOS BLE operations
 *
 * Noble reports every advertisement through one global 'discover' event, so
 * resolution and discovery share a reference-counted scan: the radio scans
 * while at least one resolve() or scanForAdvertisements() is waiting.
 */

import { EventEmitter } from 'events';
import * as noble from '@abandonware/noble';
import type { Characteristic, Peripheral } from '@abandonware/noble';
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

const CONNECT_TIMEOUT_MS = 30000;

function toProperties(properties: string[]): CharacteristicProperties {
  return {
    read: properties.includes('read'),
    write: properties.includes('write'),
    writeWithoutResponse: properties.includes('writeWithoutResponse'),
    notify: properties.includes('notify'),
    indicate: properties.includes('indicate'),
  };
}

function toAdvertisement(peripheral: Peripheral): Advertisement {
  return {
    id: peripheral.id,
    name: peripheral.advertisement?.localName ?? '',
    address: normalizeAddress(peripheral.address || peripheral.id),
    rssi: peripheral.rssi,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Peripheral Adapter
// ─────────────────────────────────────────────────────────────────────────────

export class NoblePeripheral implements IPeripheral {
  readonly id: string;
  readonly address: string;
  private _name: string;

  constructor(readonly native: Peripheral) {
    this.id = native.id;
    this.address = normalizeAddress(native.address || native.id);
    this._name = native.advertisement?.localName || 'Unknown';
  }

  get name(): string {
    return this._name;
  }

  get rssi(): number {
    return this.native.rssi;
  }

  get state(): PeripheralState {
    return this.native.state;
  }

  async connect(): Promise<void> {
    if (this.state === 'connected') {
      return;
    }
    if (this.state !== 'disconnected') {
      bleLogger.warn(`${this.name}: unexpected state before connect: ${this.state}`, undefined, 'NOBLE');
    }
    await withTimeout(this.native.connectAsync(), CONNECT_TIMEOUT_MS, `Connect to ${this.address}`);
  }

  async disconnect(): Promise<void> {
    if (this.state === 'disconnected') return;
    await this.native.disconnectAsync();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Connection
// ─────────────────────────────────────────────────────────────────────────────

interface NobleChannel extends IChannel {
  readonly characteristic: Characteristic;
}

class NobleConnection extends EventEmitter implements IConnection {
  private channels = new Map<string, NobleChannel>();
  private notifyListeners = new Map<string, (data: Buffer) => void>();
  private readonly onDisconnect = (): void => {
    bleLogger.debug(`${this.peripheral.name}: disconnect event received`, undefined, 'NOBLE');
    this.emit('disconnect');
  };

  constructor(readonly peripheral: NoblePeripheral) {
    super();
    this.peripheral.native.on('disconnect', this.onDisconnect);
  }

  isConnected(): boolean {
    return this.peripheral.state === 'connected';
  }

  async listChannels(): Promise<IChannel[]> {
    const { services } = await this.peripheral.native.discoverAllServicesAndCharacteristicsAsync();
    this.channels.clear();

    for (const service of services) {
      for (const characteristic of service.characteristics ?? []) {
        const channel: NobleChannel = {
          uuid: characteristic.uuid,
          serviceUuid: service.uuid,
          properties: toProperties(characteristic.properties),
          characteristic,
        };
        this.channels.set(channelKey(channel), channel);
      }
    }

    return Array.from(this.channels.values());
  }

  async subscribe(channel: IChannel, onNotify: NotifyHandler): Promise<void> {
    const nobleChannel = this.requireChannel(channel);
    const key = channelKey(channel);
    const listener = (data: Buffer): void => onNotify(data);

    nobleChannel.characteristic.on('data', listener);
    this.notifyListeners.set(key, listener);

    try {
      await nobleChannel.characteristic.subscribeAsync();
    } catch (error) {
      nobleChannel.characteristic.removeListener('data', listener);
      this.notifyListeners.delete(key);
      throw error;
    }
  }

  async unsubscribe(channel: IChannel): Promise<void> {
    const nobleChannel = this.requireChannel(channel);
    const key = channelKey(channel);
    const listener = this.notifyListeners.get(key);

    if (listener) {
      nobleChannel.characteristic.removeListener('data', listener);
      this.notifyListeners.delete(key);
    }
    await nobleChannel.characteristic.unsubscribeAsync();
  }

  async close(): Promise<void> {
    this.peripheral.native.removeListener('disconnect', this.onDisconnect);
    for (const [key, listener] of this.notifyListeners) {
      this.channels.get(key)?.characteristic.removeListener('data', listener);
    }
    this.notifyListeners.clear();
    await this.peripheral.disconnect();
  }

  private requireChannel(channel: IChannel): NobleChannel {
    const nobleChannel = this.channels.get(channelKey(channel));
    if (!nobleChannel) {
      throw new Error(`Unknown channel ${channel.uuid} on ${this.peripheral.address}`);
    }
    return nobleChannel;
  }
}

function channelKey(channel: IChannel): string {
  return `${channel.serviceUuid}/${channel.uuid}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NobleTransport extends EventEmitter implements ITransport {
  private _isInitialized = false;
  private _isScanning = false;
  private scanHolds = 0;
  private peripherals: Map<string, NoblePeripheral> = new Map();
  private config: TransportConfig;

  private readonly onDiscover = (native: Peripheral): void => this.handleDiscovered(native);
  private readonly onStateChange = (state: string): void => {
    bleLogger.info(`Bluetooth state: ${state}`, undefined, 'NOBLE');
  };
  private readonly onScanStop = (): void => {
    this._isScanning = false;
  };

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
    return this._isScanning;
  }

  async initialize(): Promise<boolean> {
    if (this._isInitialized) return true;

    try {
      noble.on('stateChange', this.onStateChange);
      noble.on('discover', this.onDiscover);
      noble.on('scanStop', this.onScanStop);

      await this.waitForBluetoothReady();

      this._isInitialized = true;
      bleLogger.info('Noble transport initialized', undefined, 'NOBLE');
      return true;
    } catch (error) {
      bleLogger.error('Noble initialization failed', { error: errorMessage(error) }, 'NOBLE');
      this.detachNoble();
      return false;
    }
  }

  async cleanup(): Promise<void> {
    if (this._isScanning) {
      await this.stopRadioScan();
    }
    this.scanHolds = 0;

    for (const peripheral of this.peripherals.values()) {
      try {
        await peripheral.disconnect();
      } catch (error) {
        bleLogger.warn('Error disconnecting peripheral', { address: peripheral.address, error: errorMessage(error) }, 'NOBLE');
      }
    }

    this.detachNoble();
    this.peripherals.clear();
    this._isInitialized = false;
  }

  async scanForAdvertisements(predicate: AdvertisementPredicate, durationMs: number): Promise<Advertisement[]> {
    const found = new Map<string, Advertisement>();
    const collector = (advertisement: Advertisement): void => {
      if (advertisement.rssi < this.config.minRssi) return;
      if (!found.has(advertisement.address) && predicate(advertisement)) {
        found.set(advertisement.address, advertisement);
      }
    };

    await this.acquireScan();
    this.on('advertisement', collector);
    try {
      await sleep(durationMs);
    } finally {
      this.removeListener('advertisement', collector);
      await this.releaseScan();
    }

    return Array.from(found.values());
  }

  async resolve(address: string, timeoutMs: number): Promise<IPeripheral | null> {
    const wanted = normalizeAddress(address);

    return new Promise<IPeripheral | null>((resolve, reject) => {
      let settled = false;
      let holdsScan = true;
      const finish = (peripheral: IPeripheral | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.removeListener('advertisement', onAdvertisement);
        if (!holdsScan) {
          resolve(peripheral);
          return;
        }
        this.releaseScan().then(() => resolve(peripheral), reject);
      };
      const onAdvertisement = (advertisement: Advertisement): void => {
        if (advertisement.address !== wanted) return;
        const peripheral = this.peripherals.get(wanted);
        if (peripheral && peripheral.state === 'disconnected') {
          finish(peripheral);
        }
      };
      const timer = setTimeout(() => finish(null), timeoutMs);

      this.on('advertisement', onAdvertisement);
      this.acquireScan().catch((error: unknown) => {
        // acquireScan already gave its hold back
        holdsScan = false;
        bleLogger.debug(`Scan start failed while resolving ${wanted}`, { error: errorMessage(error) }, 'NOBLE');
        finish(null);
      });
    });
  }

  async connect(peripheral: IPeripheral, signal?: AbortSignal): Promise<IConnection> {
    const native = this.peripherals.get(normalizeAddress(peripheral.address));
    if (!native) {
      throw new ConnectionFailedError(peripheral.address, 'peripheral was not resolved by this transport');
    }

    const result = await this.strategy.connectSingle(native, signal);
    if (!result.success) {
      throw new ConnectionFailedError(peripheral.address, result.error ?? 'unknown error');
    }

    return new NobleConnection(native);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private async acquireScan(): Promise<void> {
    if (!this._isInitialized) {
      throw new TransportNotInitializedError('Noble');
    }

    this.scanHolds++;
    if (!this._isScanning) {
      this._isScanning = true;
      try {
        // Duplicates are needed so an already-known scale can be re-resolved
        await noble.startScanningAsync([], true);
      } catch (error) {
        this._isScanning = false;
        this.scanHolds = Math.max(0, this.scanHolds - 1);
        throw error;
      }
      this.emit('scanStarted');
    }
  }

  private async releaseScan(): Promise<void> {
    this.scanHolds = Math.max(0, this.scanHolds - 1);
    if (this.scanHolds === 0 && this._isScanning) {
      await this.stopRadioScan();
    }
  }

  private async stopRadioScan(): Promise<void> {
    try {
      await noble.stopScanningAsync();
    } catch (error) {
      bleLogger.warn('Error stopping scan', { error: errorMessage(error) }, 'NOBLE');
    }
    this._isScanning = false;
    this.emit('scanStopped');
  }

  private handleDiscovered(native: Peripheral): void {
    const advertisement = toAdvertisement(native);

    // Noble fires discover for every advertisement; keep the first wrapper
    // unless noble handed us a new object for the same radio
    const existing = this.peripherals.get(advertisement.address);
    if (!existing || existing.native !== native) {
      this.peripherals.set(advertisement.address, new NoblePeripheral(native));
    }

    bleLogger.trace(`Advertisement: ${advertisement.name} (${advertisement.address}, RSSI ${advertisement.rssi})`, undefined, 'NOBLE');
    this.emit('advertisement', advertisement);
  }

  private detachNoble(): void {
    noble.removeListener('stateChange', this.onStateChange);
    noble.removeListener('discover', this.onDiscover);
    noble.removeListener('scanStop', this.onScanStop);
  }

  private waitForBluetoothReady(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (noble._state === 'poweredOn') {
        resolve();
        return;
      }

      const stateChangeHandler = (state: string): void => {
        if (state === 'poweredOn') {
          clearTimeout(timeout);
          noble.removeListener('stateChange', stateChangeHandler);
          resolve();
        }
      };

      const timeout = setTimeout(() => {
        noble.removeListener('stateChange', stateChangeHandler);
        reject(new Error(`Bluetooth adapter timeout (${BLE_CONFIG.NOBLE_READY_TIMEOUT / 1000}s)`));
      }, BLE_CONFIG.NOBLE_READY_TIMEOUT);

      noble.on('stateChange', stateChangeHandler);
    });
  }
}
