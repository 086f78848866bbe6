/**
 * Stop-signal helpers
 * Every suspension point of a supervisor races against an AbortSignal.
 */

import { bleLogger, errorMessage } from '../ble-bridge/BleLogger';

export class StopRequestedError extends Error {
  constructor() {
    super('Stop requested');
    this.name = 'StopRequestedError';
  }
}

/**
 * Wait up to `ms` or until one of the signals aborts.
 * A zero wait still goes through a timer, so callers always yield to the event loop.
 * @returns the signal that fired, or null when the time ran out
 */
export function waitForSignal(ms: number, ...signals: AbortSignal[]): Promise<AbortSignal | null> {
  const fired = signals.find(signal => signal.aborted);
  if (fired) {
    return Promise.resolve(fired);
  }

  return new Promise<AbortSignal | null>(resolve => {
    const listeners: Array<[AbortSignal, () => void]> = [];
    const cleanup = (): void => {
      clearTimeout(timer);
      for (const [signal, listener] of listeners) {
        signal.removeEventListener('abort', listener);
      }
    };

    const timer = setTimeout(() => {
      cleanup();
      resolve(null);
    }, Math.max(0, ms));

    for (const signal of signals) {
      const listener = (): void => {
        cleanup();
        resolve(signal);
      };
      listeners.push([signal, listener]);
      signal.addEventListener('abort', listener, { once: true });
    }
  });
}

/**
 * @returns true when the stop signal fired before the time ran out
 */
export async function waitOrStop(ms: number, signal: AbortSignal): Promise<boolean> {
  return (await waitForSignal(ms, signal)) !== null;
}

/**
 * Race an operation against the stop signal.
 * Rejects with StopRequestedError when the signal wins. The operation keeps
 * running; a value it produces afterwards goes to `onAbandoned`.
 */
export function untilStopped<T>(
  work: Promise<T>,
  signal: AbortSignal,
  onAbandoned?: (value: T) => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let abandoned = false;
    const onAbort = (): void => {
      abandoned = true;
      reject(new StopRequestedError());
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        if (abandoned) {
          onAbandoned?.(value);
        } else {
          resolve(value);
        }
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (abandoned) {
          bleLogger.debug(`Operation abandoned on stop later failed: ${errorMessage(error)}`, undefined, 'SUPERVISOR');
        } else {
          reject(error);
        }
      }
    );
  });
}
