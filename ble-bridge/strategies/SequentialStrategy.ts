/**
 * Sequential Connection Strategy
 * Connects to devices one at a time with a delay between connections
 * Required for BlueZ/node-ble on Linux where parallel connections cause
 * "le-connection-abort-by-local" errors
 *
 * Only the radio connect itself is serialized. Retry backoff and state
 * verification run outside the queue, so one failing device cannot hold
 * the others back for its whole retry schedule.
 */

import {
  IConnectionStrategy,
  ConnectionResult,
  StrategyConfig,
  DEFAULT_STRATEGY_CONFIG,
} from '../interfaces/IConnectionStrategy';
import { IPeripheral } from '../interfaces/ITransport';
import { CONNECTION_CANCELLED, connectWithRetry } from './retry';
import { sleep } from '../utils/async';

interface QueuedConnection {
  peripheral: IPeripheral;
  resolve: () => void;
  reject: (error: Error) => void;
  detach: () => void;
}

export class SequentialStrategy implements IConnectionStrategy {
  private config: StrategyConfig;
  private connectionQueue: QueuedConnection[] = [];
  private isProcessing = false;

  constructor(config?: Partial<StrategyConfig>) {
    this.config = { ...DEFAULT_STRATEGY_CONFIG, ...config };
  }

  get queueLength(): number {
    return this.connectionQueue.length;
  }

  connectSingle(peripheral: IPeripheral, signal?: AbortSignal): Promise<ConnectionResult> {
    return connectWithRetry(peripheral, this.config, 'SequentialStrategy', {
      signal,
      attemptConnect: target => this.enqueue(target, signal),
    });
  }

  // Resolves once this peripheral's turn has run its connect
  private enqueue(peripheral: IPeripheral, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error(CONNECTION_CANCELLED));
        return;
      }

      const onAbort = (): void => {
        const index = this.connectionQueue.indexOf(item);
        if (index !== -1) {
          this.connectionQueue.splice(index, 1);
          reject(new Error(CONNECTION_CANCELLED));
        }
      };
      const item: QueuedConnection = {
        peripheral,
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.connectionQueue.push(item);
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessing) {
      return;
    }

    this.isProcessing = true;

    try {
      let first = true;
      for (;;) {
        if (!first && this.connectionQueue.length > 0) {
          // Let BlueZ settle before the next connection
          await sleep(this.config.interConnectionDelayMs);
        }
        // Shifted after the delay so a caller that stopped meanwhile is dropped
        const item = this.connectionQueue.shift();
        if (!item) break;
        first = false;

        item.detach();
        try {
          await item.peripheral.connect();
          item.resolve();
        } catch (error) {
          item.reject(error instanceof Error ? error : new Error(String(error)));
        }
      }
    } finally {
      this.isProcessing = false;
    }
  }
}
