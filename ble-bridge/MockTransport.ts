/**
 * Mock Transport for tests and dry runs without a Bluetooth adapter
 * Simulates kitchen scales that advertise, accept one connection and push
 * weight payloads over a notify characteristic
 */

import { EventEmitter } from 'events';
import {
  ITransport,
  IPeripheral,
  IConnection,
  IChannel,
  NotifyHandler,
  PeripheralState,
  Advertisement,
  AdvertisementPredicate,
  CharacteristicProperties,
  TransportNotInitializedError,
  ConnectionFailedError,
  normalizeAddress,
} from './interfaces/ITransport';
import { IConnectionStrategy } from './interfaces/IConnectionStrategy';
import { ParallelStrategy } from './strategies/ParallelStrategy';
import { getConfigForTransport } from './PlatformConfig';
import { bleLogger } from './BleLogger';
import { sleep } from './utils/async';

export const MOCK_SERVICE_UUID = 'ffb0';
export const MOCK_WEIGHT_CHARACTERISTIC_UUID = 'ffb2';

const NOTIFY_ONLY: CharacteristicProperties = {
  read: false,
  write: false,
  writeWithoutResponse: false,
  notify: true,
  indicate: false,
};

export interface MockChannelSpec {
  uuid: string;
  serviceUuid?: string;
  properties?: Partial<CharacteristicProperties>;
  failSubscribe?: boolean;
  failUnsubscribe?: boolean;
}

export interface MockScaleOptions {
  name?: string;
  rssi?: number;
  advertising?: boolean;
  channels?: MockChannelSpec[];
  failConnect?: boolean;
  connectDelayMs?: number;
  hangConnect?: boolean;
}

export interface MockScaleStats {
  resolves: number;
  connects: number;
  closes: number;
  subscribes: number;
  unsubscribes: number;
}

export function buildWeightPayload(weight: number): Buffer {
  const magnitude = Math.min(Math.abs(Math.trunc(weight)), 0xffff);
  return Buffer.from([0x10, 0x0b, (magnitude >> 8) & 0xff, magnitude & 0xff, 0x00, 0x00, 0x00, weight < 0 ? 0x01 : 0x00]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Mock Peripheral
// ─────────────────────────────────────────────────────────────────────────────

class MockScale implements IPeripheral {
  readonly id: string;
  readonly address: string;
  name: string;
  rssi: number;
  advertising: boolean;
  channels: MockChannelSpec[];
  failConnect: boolean;
  connectDelayMs: number;
  hangConnect: boolean;
  connection: MockConnection | null = null;
  stats: MockScaleStats = { resolves: 0, connects: 0, closes: 0, subscribes: 0, unsubscribes: 0 };
  private _state: PeripheralState = 'disconnected';

  constructor(address: string, options: MockScaleOptions) {
    this.address = normalizeAddress(address);
    this.id = this.address;
    this.name = options.name ?? 'sencorfood';
    this.rssi = options.rssi ?? -50;
    this.advertising = options.advertising ?? true;
    this.channels = options.channels ?? [{ uuid: MOCK_WEIGHT_CHARACTERISTIC_UUID }];
    this.failConnect = options.failConnect ?? false;
    this.connectDelayMs = options.connectDelayMs ?? 0;
    this.hangConnect = options.hangConnect ?? false;
  }

  get state(): PeripheralState {
    return this._state;
  }

  set state(state: PeripheralState) {
    this._state = state;
  }

  async connect(): Promise<void> {
    this.stats.connects++;
    this._state = 'connecting';

    if (this.hangConnect) {
      // Never settles, like a radio that stopped answering
      await new Promise<never>(() => undefined);
    }
    if (this.connectDelayMs > 0) {
      await sleep(this.connectDelayMs);
    }
    if (this.failConnect) {
      this._state = 'disconnected';
      throw new Error('Mock connection refused');
    }
    this._state = 'connected';
  }

  async disconnect(): Promise<void> {
    this._state = 'disconnected';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Mock Connection
// ─────────────────────────────────────────────────────────────────────────────

class MockConnection extends EventEmitter implements IConnection {
  readonly handlers = new Map<string, NotifyHandler>();

  constructor(readonly peripheral: MockScale) {
    super();
  }

  isConnected(): boolean {
    return this.peripheral.state === 'connected';
  }

  async listChannels(): Promise<IChannel[]> {
    return this.peripheral.channels.map(channelSpec => ({
      uuid: channelSpec.uuid,
      serviceUuid: channelSpec.serviceUuid ?? MOCK_SERVICE_UUID,
      properties: { ...NOTIFY_ONLY, ...channelSpec.properties },
    }));
  }

  async subscribe(channel: IChannel, onNotify: NotifyHandler): Promise<void> {
    this.peripheral.stats.subscribes++;
    if (this.channelSpec(channel)?.failSubscribe) {
      throw new Error(`Mock subscribe refused for ${channel.uuid}`);
    }
    this.handlers.set(channel.uuid, onNotify);
  }

  async unsubscribe(channel: IChannel): Promise<void> {
    this.peripheral.stats.unsubscribes++;
    this.handlers.delete(channel.uuid);
    if (this.channelSpec(channel)?.failUnsubscribe) {
      throw new Error(`Mock unsubscribe refused for ${channel.uuid}`);
    }
  }

  async close(): Promise<void> {
    this.peripheral.stats.closes++;
    this.handlers.clear();
    await this.peripheral.disconnect();
    if (this.peripheral.connection === this) {
      this.peripheral.connection = null;
    }
  }

  private channelSpec(channel: IChannel): MockChannelSpec | undefined {
    return this.peripheral.channels.find(channelSpec => channelSpec.uuid === channel.uuid);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Mock Transport
// ─────────────────────────────────────────────────────────────────────────────

export class MockTransport extends EventEmitter implements ITransport {
  private _isInitialized = false;
  private _isScanning = false;
  private scales = new Map<string, MockScale>();
  private simulationTimer: NodeJS.Timeout | null = null;
  private readonly strategy: IConnectionStrategy;

  constructor(strategy?: IConnectionStrategy) {
    super();
    this.strategy = strategy ?? new ParallelStrategy(getConfigForTransport('mock').strategy);
  }

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  get isScanning(): boolean {
    return this._isScanning;
  }

  async initialize(): Promise<boolean> {
    bleLogger.info('Mock transport initialized (no Bluetooth adapter used)', undefined, 'MOCK');
    this._isInitialized = true;
    return true;
  }

  async cleanup(): Promise<void> {
    this.stopSimulation();
    for (const scale of this.scales.values()) {
      await scale.connection?.close();
    }
    this._isInitialized = false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Scripting API
  // ─────────────────────────────────────────────────────────────────────────

  addScale(address: string, options: MockScaleOptions = {}): void {
    const scale = new MockScale(address, options);
    this.scales.set(scale.address, scale);
    if (scale.advertising) {
      this.emit('advertisement', this.toAdvertisement(scale));
    }
  }

  setAdvertising(address: string, advertising: boolean): void {
    const scale = this.requireScale(address);
    scale.advertising = advertising;
    if (advertising) {
      this.emit('advertisement', this.toAdvertisement(scale));
    }
  }

  setFailConnect(address: string, failConnect: boolean): void {
    this.requireScale(address).failConnect = failConnect;
  }

  /**
   * Push a payload to every subscribed channel of the scale's open connection.
   * Returns false when nothing was subscribed.
   */
  notify(address: string, payload: Buffer): boolean {
    const connection = this.requireScale(address).connection;
    if (!connection || !connection.isConnected() || connection.handlers.size === 0) {
      return false;
    }
    for (const handler of connection.handlers.values()) {
      handler(payload);
    }
    return true;
  }

  notifyWeight(address: string, weight: number): boolean {
    return this.notify(address, buildWeightPayload(weight));
  }

  /** Simulate a link drop initiated by the scale */
  dropLink(address: string): void {
    const scale = this.requireScale(address);
    scale.state = 'disconnected';
    scale.connection?.emit('disconnect');
  }

  isSubscribed(address: string): boolean {
    const connection = this.scales.get(normalizeAddress(address))?.connection;
    return !!connection && connection.isConnected() && connection.handlers.size > 0;
  }

  isConnected(address: string): boolean {
    return this.scales.get(normalizeAddress(address))?.state === 'connected';
  }

  getStats(address: string): MockScaleStats {
    return { ...this.requireScale(address).stats };
  }

  /**
   * Cycle through a weight sequence on every subscribed scale, like a scale
   * being loaded and unloaded on the counter
   */
  startSimulation(weights: number[], intervalMs: number): void {
    this.stopSimulation();
    let index = 0;
    this.simulationTimer = setInterval(() => {
      const weight = weights[index % weights.length];
      index++;
      for (const scale of this.scales.values()) {
        if (weight !== undefined) {
          this.notifyWeight(scale.address, weight);
        }
      }
    }, intervalMs);
  }

  stopSimulation(): void {
    if (this.simulationTimer) {
      clearInterval(this.simulationTimer);
      this.simulationTimer = null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ITransport
  // ─────────────────────────────────────────────────────────────────────────

  async scanForAdvertisements(predicate: AdvertisementPredicate, durationMs: number): Promise<Advertisement[]> {
    this.requireInitialized();
    this._isScanning = true;
    this.emit('scanStarted');
    try {
      await sleep(durationMs);
    } finally {
      this._isScanning = false;
      this.emit('scanStopped');
    }

    return Array.from(this.scales.values())
      .filter(scale => scale.advertising)
      .map(scale => this.toAdvertisement(scale))
      .filter(predicate);
  }

  async resolve(address: string, timeoutMs: number): Promise<IPeripheral | null> {
    this.requireInitialized();
    const wanted = normalizeAddress(address);
    const scale = this.scales.get(wanted);
    if (scale) {
      scale.stats.resolves++;
    }

    if (scale?.advertising) {
      return scale;
    }

    return new Promise<IPeripheral | null>(resolve => {
      const onAdvertisement = (advertisement: Advertisement): void => {
        if (advertisement.address !== wanted) return;
        clearTimeout(timer);
        this.removeListener('advertisement', onAdvertisement);
        resolve(this.scales.get(wanted) ?? null);
      };
      const timer = setTimeout(() => {
        this.removeListener('advertisement', onAdvertisement);
        resolve(null);
      }, timeoutMs);
      this.on('advertisement', onAdvertisement);
    });
  }

  async connect(peripheral: IPeripheral, signal?: AbortSignal): Promise<IConnection> {
    this.requireInitialized();
    const scale = this.scales.get(normalizeAddress(peripheral.address));
    if (!scale) {
      throw new ConnectionFailedError(peripheral.address, 'unknown mock scale');
    }

    const result = await this.strategy.connectSingle(scale, signal);
    if (!result.success) {
      throw new ConnectionFailedError(peripheral.address, result.error ?? 'unknown error');
    }

    const connection = new MockConnection(scale);
    scale.connection = connection;
    return connection;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private toAdvertisement(scale: MockScale): Advertisement {
    return { id: scale.id, name: scale.name, address: scale.address, rssi: scale.rssi };
  }

  private requireScale(address: string): MockScale {
    const scale = this.scales.get(normalizeAddress(address));
    if (!scale) {
      throw new Error(`Unknown mock scale ${address}`);
    }
    return scale;
  }

  private requireInitialized(): void {
    if (!this._isInitialized) {
      throw new TransportNotInitializedError('Mock');
    }
  }
}
