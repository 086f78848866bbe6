/**
 * Last known weight per scale, the value external readers see
 */

import { normalizeAddress } from '../ble-bridge/interfaces/ITransport';

export class WeightCache {
  private weights = new Map<string, number>();

  set(address: string, weight: number): void {
    this.weights.set(normalizeAddress(address), weight);
  }

  get(address: string): number | null {
    return this.weights.get(normalizeAddress(address)) ?? null;
  }

  has(address: string): boolean {
    return this.weights.has(normalizeAddress(address));
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.weights);
  }

  clear(): void {
    this.weights.clear();
  }
}
