/**
 * Device Connection Supervisor
 *
 * One long-lived loop per scale:
 *   resolving → connecting → subscribing → listening → tearing_down → waiting → …
 * until the stop signal fires. Failures never leave the loop; they only select
 * the off interval as the next wait.
 */

import { EventEmitter } from 'events';
import { IChannel, IConnection, IPeripheral, ITransport, normalizeAddress } from '../ble-bridge/interfaces/ITransport';
import { bleLogger, errorMessage } from '../ble-bridge/BleLogger';
import { withTimeout } from '../ble-bridge/utils/async';
import { decodePayload, formatPayload } from './PayloadDecoder';
import { ZeroSuppressionFilter } from './ZeroSuppressionFilter';
import { WeightCache } from './WeightCache';
import { ObserverRegistry } from './ObserverRegistry';
import { StopRequestedError, untilStopped, waitForSignal } from './StopSignal';
import {
  DeviceRuntimeState,
  InvalidTransitionError,
  ScaleDevice,
  SupervisorState,
  SupervisorStateChange,
  SupervisorTiming,
  WeightEvent,
  isValidTransition,
} from './types';

// 'completed' waits the scan interval, 'failed' the off interval
type CycleOutcome = 'completed' | 'failed' | 'stopped';

export interface DeviceSupervisorOptions {
  device: ScaleDevice;
  transport: ITransport;
  timing: SupervisorTiming;
  cache: WeightCache;
  observers: ObserverRegistry;
  signal: AbortSignal;
}

// Events emitted by DeviceSupervisor
export interface SupervisorEvents {
  stateChanged: (change: SupervisorStateChange) => void;
  weight: (event: WeightEvent) => void;
  connectionAttempt: (address: string, attempt: number) => void;
  seen: (address: string, timestamp: number) => void;
  cycleFailed: (address: string, reason: string) => void;
}

export class DeviceSupervisor extends EventEmitter {
  readonly address: string;

  private readonly transport: ITransport;
  private readonly timing: SupervisorTiming;
  private readonly cache: WeightCache;
  private readonly observers: ObserverRegistry;
  private readonly signal: AbortSignal;
  private readonly filter = new ZeroSuppressionFilter();

  private _state = SupervisorState.IDLE;
  private runtime: DeviceRuntimeState = { lastWeight: null, zeroSuppressed: false };
  private connectionAttempts = 0;

  // Fired by the notification handler on the first propagated reading of a cycle
  private readingArrived: AbortController | null = null;

  constructor(options: DeviceSupervisorOptions) {
    super();
    this.address = normalizeAddress(options.device.address);
    this.transport = options.transport;
    this.timing = options.timing;
    this.cache = options.cache;
    this.observers = options.observers;
    this.signal = options.signal;
  }

  get state(): SupervisorState {
    return this._state;
  }

  get isContinuous(): boolean {
    return this.timing.scanIntervalMs === 0;
  }

  getRuntimeState(): DeviceRuntimeState {
    return { ...this.runtime };
  }

  /**
   * Run until the stop signal fires. Resolves once the supervisor is terminated.
   */
  async run(): Promise<void> {
    bleLogger.info(
      `Supervising ${this.address} (${this.isContinuous ? 'continuous' : `periodic every ${this.timing.scanIntervalMs}ms`})`,
      undefined,
      'SUPERVISOR'
    );

    while (!this.signal.aborted) {
      const outcome = await this.runCycle();
      if (outcome === 'stopped' || this.signal.aborted) {
        break;
      }

      const waitMs = outcome === 'completed' ? this.timing.scanIntervalMs : this.timing.offIntervalMs;
      this.transition(SupervisorState.WAITING);
      bleLogger.debug(`${this.address} waiting ${waitMs}ms before next cycle`, undefined, 'SUPERVISOR');

      if ((await waitForSignal(waitMs, this.signal)) !== null) {
        break;
      }
    }

    this.transition(SupervisorState.TERMINATED);
    bleLogger.info(`Supervisor for ${this.address} terminated`, undefined, 'SUPERVISOR');
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Cycle
  // ───────────────────────────────────────────────────────────────────────────

  private async runCycle(): Promise<CycleOutcome> {
    this.transition(SupervisorState.RESOLVING);

    let peripheral: IPeripheral | null;
    try {
      peripheral = await untilStopped(this.transport.resolve(this.address, this.timing.resolveTimeoutMs), this.signal);
    } catch (error) {
      if (error instanceof StopRequestedError) return 'stopped';
      return this.fail(`resolve failed: ${errorMessage(error)}`);
    }

    if (!peripheral) {
      return this.fail(`not advertising within ${this.timing.resolveTimeoutMs}ms`);
    }
    this.markSeen();

    this.transition(SupervisorState.CONNECTING);
    this.connectionAttempts++;
    this.emit('connectionAttempt', this.address, this.connectionAttempts);
    bleLogger.logConnection(this.address, peripheral.name, 'connecting', { attempt: this.connectionAttempts });

    let connection: IConnection;
    try {
      connection = await untilStopped(this.transport.connect(peripheral, this.signal), this.signal, orphan => {
        void this.closeAbandoned(orphan);
      });
    } catch (error) {
      if (error instanceof StopRequestedError) {
        await this.cancelPendingConnect(peripheral);
        return 'stopped';
      }
      bleLogger.logConnectionError(this.address, peripheral.name, 'connect', error);
      return this.fail(`connect failed: ${errorMessage(error)}`);
    }

    return this.runConnected(connection);
  }

  private async runConnected(connection: IConnection): Promise<CycleOutcome> {
    const subscribed: IChannel[] = [];
    const linkLost = new AbortController();
    const onDisconnect = (): void => linkLost.abort();
    connection.on('disconnect', onDisconnect);
    this.readingArrived = new AbortController();

    try {
      if (!connection.isConnected()) {
        return this.fail('connection reported not connected');
      }
      bleLogger.logConnection(this.address, connection.peripheral.name, 'connected');

      this.transition(SupervisorState.SUBSCRIBING);
      const channels = (await untilStopped(connection.listChannels(), this.signal))
        .filter(channel => channel.properties.notify || channel.properties.indicate);

      if (channels.length === 0) {
        return this.fail('no notification-capable channels');
      }

      await this.subscribeAll(connection, channels, subscribed);
      if (subscribed.length === 0) {
        return this.fail(`all ${channels.length} subscriptions failed`);
      }

      this.transition(SupervisorState.LISTENING);
      return this.isContinuous
        ? await this.listenContinuous(connection, linkLost.signal)
        : await this.listenPeriodic(linkLost.signal);
    } catch (error) {
      if (error instanceof StopRequestedError) return 'stopped';
      if (error instanceof InvalidTransitionError) throw error;
      return this.fail(`unexpected error while connected: ${errorMessage(error)}`);
    } finally {
      connection.removeListener('disconnect', onDisconnect);
      this.readingArrived = null;
      await this.teardown(connection, subscribed);
    }
  }

  // Per-channel failures are recorded and skipped
  private async subscribeAll(connection: IConnection, channels: IChannel[], subscribed: IChannel[]): Promise<void> {
    const failures: Array<{ channel: string; error: string }> = [];

    for (const channel of channels) {
      try {
        await untilStopped(connection.subscribe(channel, data => this.handleNotification(data)), this.signal);
        subscribed.push(channel);
      } catch (error) {
        if (error instanceof StopRequestedError) throw error;
        failures.push({ channel: channel.uuid, error: errorMessage(error) });
      }
    }

    if (failures.length > 0) {
      bleLogger.debug(`${this.address} subscribe failures`, failures, 'SUPERVISOR');
    }
    bleLogger.debug(`${this.address} subscribed to ${subscribed.length}/${channels.length} channels`, undefined, 'SUPERVISOR');
  }

  // Stays connected until stop or a link drop
  private async listenContinuous(connection: IConnection, linkLost: AbortSignal): Promise<CycleOutcome> {
    for (;;) {
      const fired = await waitForSignal(this.timing.pollIntervalMs, this.signal, linkLost);
      if (fired === this.signal) {
        return 'stopped';
      }
      if (fired === linkLost || !connection.isConnected()) {
        return this.fail('link dropped');
      }
    }
  }

  // First propagated reading or the listen window, whichever comes first
  private async listenPeriodic(linkLost: AbortSignal): Promise<CycleOutcome> {
    const readingArrived = this.readingArrived?.signal;
    const signals = readingArrived ? [this.signal, readingArrived, linkLost] : [this.signal, linkLost];

    const fired = await waitForSignal(this.timing.listenWindowMs, ...signals);
    if (fired === this.signal) {
      return 'stopped';
    }
    if (fired === linkLost) {
      return this.fail('link dropped before a reading arrived');
    }
    if (fired === null) {
      bleLogger.debug(`${this.address} listen window of ${this.timing.listenWindowMs}ms expired`, undefined, 'SUPERVISOR');
    }
    return 'completed';
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Notifications
  // ───────────────────────────────────────────────────────────────────────────

  private handleNotification(data: Buffer): void {
    if (this.signal.aborted) return;
    if (this._state !== SupervisorState.SUBSCRIBING && this._state !== SupervisorState.LISTENING) return;

    if (bleLogger.isEnabled('trace')) {
      bleLogger.trace(`${this.address} ${formatPayload(data)}`, undefined, 'PAYLOAD');
    }

    const decoded = decodePayload(data);
    if (decoded.weight === null) return;
    this.markSeen();

    const propagate = this.filter.apply(this.address, decoded.weight);
    this.runtime.zeroSuppressed = this.filter.isSuppressed(this.address);
    if (!propagate) return;

    const { weight, details } = decoded;
    this.runtime.lastWeight = weight;
    this.cache.set(this.address, weight);
    this.observers.publish(this.address, weight, details);
    this.emit('weight', { address: this.address, weight, details, timestamp: Date.now() });

    this.readingArrived?.abort();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Teardown
  // ───────────────────────────────────────────────────────────────────────────

  private async teardown(connection: IConnection, subscribed: IChannel[]): Promise<void> {
    this.transition(SupervisorState.TEARING_DOWN);
    const failures: Array<{ operation: string; error: string }> = [];

    for (const channel of subscribed) {
      try {
        await withTimeout(connection.unsubscribe(channel), this.timing.teardownTimeoutMs, `unsubscribe ${channel.uuid}`);
      } catch (error) {
        failures.push({ operation: `unsubscribe ${channel.uuid}`, error: errorMessage(error) });
      }
    }

    try {
      await withTimeout(connection.close(), this.timing.teardownTimeoutMs, 'close');
    } catch (error) {
      failures.push({ operation: 'close', error: errorMessage(error) });
    }

    if (failures.length > 0) {
      bleLogger.debug(`${this.address} teardown failures`, failures, 'SUPERVISOR');
    }
    bleLogger.logConnection(this.address, connection.peripheral.name, 'disconnected');
  }

  // A connect that completes after stop still gets closed
  private async closeAbandoned(connection: IConnection): Promise<void> {
    bleLogger.debug(`${this.address} connected after stop, closing`, undefined, 'SUPERVISOR');
    try {
      await withTimeout(connection.close(), this.timing.teardownTimeoutMs, 'close');
    } catch (error) {
      bleLogger.debug(`${this.address} closing abandoned connection failed: ${errorMessage(error)}`, undefined, 'SUPERVISOR');
    }
  }

  private async cancelPendingConnect(peripheral: IPeripheral): Promise<void> {
    try {
      await withTimeout(peripheral.disconnect(), this.timing.teardownTimeoutMs, 'cancel connect');
    } catch (error) {
      bleLogger.debug(`${this.address} cancelling connect failed: ${errorMessage(error)}`, undefined, 'SUPERVISOR');
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // State
  // ───────────────────────────────────────────────────────────────────────────

  private transition(next: SupervisorState): void {
    const previous = this._state;
    if (!isValidTransition(previous, next)) {
      throw new InvalidTransitionError(this.address, previous, next);
    }

    this._state = next;
    bleLogger.trace(`${this.address}: ${previous} → ${next}`, undefined, 'SUPERVISOR');
    this.emit('stateChanged', { address: this.address, previous, next, timestamp: Date.now() });
  }

  private fail(reason: string): CycleOutcome {
    bleLogger.warn(`${this.address} cycle failed: ${reason}`, undefined, 'SUPERVISOR');
    this.emit('cycleFailed', this.address, reason);
    return 'failed';
  }

  private markSeen(): void {
    this.emit('seen', this.address, Date.now());
  }
}
