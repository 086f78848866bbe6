/**
 * BLE Transport Interface
 * Platform-agnostic abstraction for the radio operations a scale supervisor needs
 */

import { EventEmitter } from 'events';

// ─────────────────────────────────────────────────────────────────────────────
// Channel (GATT characteristic) Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface CharacteristicProperties {
  read: boolean;
  write: boolean;
  writeWithoutResponse: boolean;
  notify: boolean;
  indicate: boolean;
}

export interface IChannel {
  readonly uuid: string;
  readonly serviceUuid: string;
  readonly properties: CharacteristicProperties;
}

export type NotifyHandler = (data: Buffer) => void;

// ─────────────────────────────────────────────────────────────────────────────
// Peripheral (connectable handle) Interface
// ─────────────────────────────────────────────────────────────────────────────

export type PeripheralState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting' | 'error';

export interface IPeripheral {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  readonly rssi: number;
  readonly state: PeripheralState;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Connection Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface IConnection extends EventEmitter {
  readonly peripheral: IPeripheral;

  isConnected(): boolean;
  listChannels(): Promise<IChannel[]>;
  subscribe(channel: IChannel, onNotify: NotifyHandler): Promise<void>;
  unsubscribe(channel: IChannel): Promise<void>;
  close(): Promise<void>;

  // Events: 'disconnect'
}

// ─────────────────────────────────────────────────────────────────────────────
// Advertisement Info
// ─────────────────────────────────────────────────────────────────────────────

export interface Advertisement {
  id: string;
  name: string;
  address: string;
  rssi: number;
}

export type AdvertisementPredicate = (advertisement: Advertisement) => boolean;

// ─────────────────────────────────────────────────────────────────────────────
// Transport Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface TransportConfig {
  minRssi: number;
  scanTimeout: number;
}

export interface ITransport extends EventEmitter {
  readonly isInitialized: boolean;
  readonly isScanning: boolean;

  // Lifecycle
  initialize(): Promise<boolean>;
  cleanup(): Promise<void>;

  // Scanning
  scanForAdvertisements(predicate: AdvertisementPredicate, durationMs: number): Promise<Advertisement[]>;

  // Device access
  resolve(address: string, timeoutMs: number): Promise<IPeripheral | null>;
  // Retries stop once `signal` is aborted
  connect(peripheral: IPeripheral, signal?: AbortSignal): Promise<IConnection>;

  // Events:
  // 'advertisement' (Advertisement)
  // 'scanStarted'
  // 'scanStopped'
  // 'error' (Error)
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export class TransportNotInitializedError extends Error {
  constructor(public readonly transport: string) {
    super(`${transport} transport not initialized`);
    this.name = 'TransportNotInitializedError';
  }
}

export class ConnectionFailedError extends Error {
  constructor(
    public readonly address: string,
    public readonly reason: string
  ) {
    super(`Connection to ${address} failed: ${reason}`);
    this.name = 'ConnectionFailedError';
  }
}

/**
 * Normalize a link-layer address so that the same radio is one key regardless
 * of how it was typed. Noble reports lower-case addresses, BlueZ upper-case.
 */
export function normalizeAddress(address: string): string {
  return address.trim().toUpperCase();
}
