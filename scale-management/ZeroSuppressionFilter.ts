/**
 * Zero-Suppression Filter
 *
 * A scale idles by repeating zero. The first zero after a non-zero reading is
 * swallowed as noise and so is every zero after it, until a non-zero reading
 * clears the flag again.
 */

import { normalizeAddress } from '../ble-bridge/interfaces/ITransport';

export class ZeroSuppressionFilter {
  private suppressed = new Map<string, boolean>();

  /**
   * @returns true when the reading should be propagated
   */
  apply(address: string, weight: number): boolean {
    const key = normalizeAddress(address);

    if (weight !== 0) {
      this.suppressed.set(key, false);
      return true;
    }

    this.suppressed.set(key, true);
    return false;
  }

  isSuppressed(address: string): boolean {
    return this.suppressed.get(normalizeAddress(address)) ?? false;
  }

  reset(address: string): void {
    this.suppressed.delete(normalizeAddress(address));
  }
}
