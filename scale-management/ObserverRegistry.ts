/**
 * Observer Registry
 * Multicast weight callbacks per scale address
 */

import { normalizeAddress } from '../ble-bridge/interfaces/ITransport';
import { bleLogger, describeError } from '../ble-bridge/BleLogger';
import { WeightCallback, WeightDetails } from './types';

export class ObserverRegistry {
  private observers = new Map<string, Set<WeightCallback>>();

  register(address: string, callback: WeightCallback): void {
    const key = normalizeAddress(address);
    let callbacks = this.observers.get(key);
    if (!callbacks) {
      callbacks = new Set();
      this.observers.set(key, callbacks);
    }
    callbacks.add(callback);
  }

  // No-op for a callback that was never registered
  unregister(address: string, callback: WeightCallback): void {
    const key = normalizeAddress(address);
    const callbacks = this.observers.get(key);
    if (!callbacks) return;

    callbacks.delete(callback);
    if (callbacks.size === 0) {
      this.observers.delete(key);
    }
  }

  count(address: string): number {
    return this.observers.get(normalizeAddress(address))?.size ?? 0;
  }

  /**
   * Deliver a reading to every callback registered for the address.
   * Iterates over a copy, so callbacks may (un)register during delivery.
   * @returns number of callbacks that completed without throwing
   */
  publish(address: string, weight: number, details: WeightDetails): number {
    const key = normalizeAddress(address);
    const callbacks = this.observers.get(key);
    if (!callbacks) return 0;

    let delivered = 0;
    for (const callback of Array.from(callbacks)) {
      try {
        callback(key, weight, details);
        delivered++;
      } catch (error) {
        bleLogger.error(`Weight observer for ${key} threw`, describeError(error), 'OBSERVER');
      }
    }
    return delivered;
  }

  clear(): void {
    this.observers.clear();
  }
}
