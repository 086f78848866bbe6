/**
 * Scale Manager
 *
 * Owns the device registry, the weight cache and the observer registry,
 * spawns one DeviceSupervisor per registered scale and propagates a single
 * stop signal to all of them.
 */

import { EventEmitter } from 'events';
import { ITransport, normalizeAddress } from '../ble-bridge/interfaces/ITransport';
import { BLE_CONFIG, TIMING } from '../ble-bridge/BleBridgeConstants';
import { bleLogger, describeError } from '../ble-bridge/BleLogger';
import { DeviceSupervisor } from './DeviceSupervisor';
import { ObserverRegistry } from './ObserverRegistry';
import { WeightCache } from './WeightCache';
import {
  ManagedDevice,
  ScaleDevice,
  SupervisorState,
  SupervisorStateChange,
  SupervisorTiming,
  WeightCallback,
  WeightEvent,
} from './types';

export interface ScaleManagerOptions {
  transport: ITransport;
  devices?: ScaleDevice[];
  timing?: Partial<SupervisorTiming>;
  devicePattern?: string;
  discoveryDurationMs?: number;
}

export const DEFAULT_TIMING: SupervisorTiming = {
  scanIntervalMs: TIMING.DEFAULT_SCAN_INTERVAL * 1000,
  offIntervalMs: TIMING.DEFAULT_OFF_INTERVAL * 1000,
  listenWindowMs: TIMING.LISTEN_WINDOW,
  resolveTimeoutMs: BLE_CONFIG.RESOLVE_TIMEOUT,
  pollIntervalMs: TIMING.LIVENESS_POLL_INTERVAL,
  teardownTimeoutMs: TIMING.TEARDOWN_TIMEOUT,
};

// Events emitted by ScaleManager
export interface ScaleManagerEvents {
  deviceAdded: (device: ScaleDevice) => void;
  weight: (event: WeightEvent) => void;
  stateChanged: (change: SupervisorStateChange) => void;
}

export class ScaleManager extends EventEmitter {
  private readonly transport: ITransport;
  private readonly timing: SupervisorTiming;
  private readonly devicePattern: string;
  private readonly discoveryDurationMs: number;

  private devices = new Map<string, ManagedDevice>();
  private readonly cache = new WeightCache();
  private readonly observers = new ObserverRegistry();

  private tasks: Promise<void>[] = [];
  private stopController: AbortController | null = null;

  constructor(options: ScaleManagerOptions) {
    super();
    this.transport = options.transport;
    this.timing = { ...DEFAULT_TIMING, ...options.timing };
    this.devicePattern = (options.devicePattern ?? BLE_CONFIG.DEVICE_NAME_PATTERN).toLowerCase();
    this.discoveryDurationMs = options.discoveryDurationMs ?? BLE_CONFIG.SCAN_TIMEOUT;

    for (const device of options.devices ?? []) {
      this.register(device.address, device.name);
    }
  }

  get isRunning(): boolean {
    return this.stopController !== null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Spawn a supervisor for every known scale.
   * Calling start twice without stop spawns a second set; callers must not.
   */
  start(): void {
    this.stopController = new AbortController();
    bleLogger.info(`Starting ${this.devices.size} scale supervisor(s)`, undefined, 'MANAGER');

    for (const device of this.devices.values()) {
      this.spawn(device);
    }
  }

  /**
   * Fire the stop signal and wait for every supervisor to terminate
   */
  async stop(): Promise<void> {
    const controller = this.stopController;
    if (!controller) return;

    bleLogger.info(`Stopping ${this.tasks.length} scale supervisor(s)`, undefined, 'MANAGER');
    controller.abort();

    const tasks = this.tasks;
    await Promise.allSettled(tasks);

    this.tasks = [];
    this.stopController = null;
    bleLogger.info('All scale supervisors terminated', undefined, 'MANAGER');
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Registry
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Register a scale. A known address only has its display name updated.
   * While running, a new scale is supervised immediately.
   */
  addDevice(address: string, name: string): void {
    const key = normalizeAddress(address);
    const existing = this.devices.get(key);
    if (existing) {
      existing.name = name || key;
      return;
    }

    const device = this.register(key, name);
    this.emit('deviceAdded', { address: device.address, name: device.name });

    if (this.isRunning) {
      this.spawn(device);
    }
  }

  getDevices(): Record<string, string> {
    const snapshot: Record<string, string> = {};
    for (const device of this.devices.values()) {
      snapshot[device.address] = device.name;
    }
    return snapshot;
  }

  getDeviceStates(): ManagedDevice[] {
    return Array.from(this.devices.values(), device => ({ ...device }));
  }

  getWeight(address: string): number | null {
    return this.cache.get(address);
  }

  registerCallback(address: string, callback: WeightCallback): void {
    this.observers.register(address, callback);
  }

  unregisterCallback(address: string, callback: WeightCallback): void {
    this.observers.unregister(address, callback);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Discovery
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Scan for advertising scales whose name contains the device pattern and
   * register every match
   */
  async discoverDevices(durationMs: number = this.discoveryDurationMs): Promise<ScaleDevice[]> {
    bleLogger.info(`Scanning ${durationMs}ms for "${this.devicePattern}" scales`, undefined, 'MANAGER');

    const advertisements = await this.transport.scanForAdvertisements(
      advertisement => advertisement.name.toLowerCase().includes(this.devicePattern),
      durationMs
    );

    const found = new Map<string, ScaleDevice>();
    for (const advertisement of advertisements) {
      const address = normalizeAddress(advertisement.address);
      found.set(address, { address, name: this.devices.get(address)?.name ?? advertisement.name });
    }

    for (const device of found.values()) {
      this.addDevice(device.address, device.name);
    }

    bleLogger.info(`Discovery found ${found.size} scale(s)`, Array.from(found.keys()), 'MANAGER');
    return Array.from(found.values());
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ───────────────────────────────────────────────────────────────────────────

  private register(address: string, name: string): ManagedDevice {
    const key = normalizeAddress(address);
    const device: ManagedDevice = {
      address: key,
      name: name || key,
      state: SupervisorState.IDLE,
      lastSeen: null,
      lastWeight: null,
      connectionAttempts: 0,
      lastError: null,
    };
    this.devices.set(key, device);
    return device;
  }

  /**
   * Re-emit a supervisor event to external listeners. Supervisors emit
   * synchronously from their own loop, so a throwing listener must not reach them.
   */
  private relay<K extends 'stateChanged' | 'weight'>(
    event: K,
    payload: Parameters<ScaleManagerEvents[K]>[0],
    address: string
  ): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      bleLogger.error(`"${event}" listener for ${address} threw`, describeError(error), 'MANAGER');
    }
  }

  private spawn(device: ManagedDevice): void {
    const controller = this.stopController;
    if (!controller) return;

    const supervisor = new DeviceSupervisor({
      device,
      transport: this.transport,
      timing: this.timing,
      cache: this.cache,
      observers: this.observers,
      signal: controller.signal,
    });

    supervisor.on('stateChanged', (change: SupervisorStateChange) => {
      device.state = change.next;
      this.relay('stateChanged', change, device.address);
    });
    supervisor.on('weight', (event: WeightEvent) => {
      device.lastWeight = event.weight;
      this.relay('weight', event, device.address);
    });
    supervisor.on('connectionAttempt', () => {
      device.connectionAttempts++;
    });
    supervisor.on('seen', (_address: string, timestamp: number) => {
      device.lastSeen = timestamp;
    });
    supervisor.on('cycleFailed', (_address: string, reason: string) => {
      device.lastError = reason;
    });

    this.tasks.push(
      supervisor.run().catch((error: unknown) => {
        bleLogger.error(`Supervisor for ${device.address} crashed`, describeError(error), 'MANAGER');
      })
    );
  }
}
