/**
 * Shared connect-with-retry loop used by both connection strategies
 */

import { ConnectionResult, StrategyConfig } from '../interfaces/IConnectionStrategy';
import { IPeripheral } from '../interfaces/ITransport';
import { bleLogger, errorMessage } from '../BleLogger';
import { calculateBackoff, sleep } from '../utils/async';

export async function verifyConnectedState(peripheral: IPeripheral, timeoutMs: number): Promise<boolean> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeoutMs) {
    if (peripheral.state === 'connected') {
      return true;
    }
    if (peripheral.state === 'disconnected' || peripheral.state === 'error') {
      return false;
    }
    await sleep(50);
  }

  bleLogger.warn(`State verification timeout. Final state: ${peripheral.state}`, undefined, 'STRATEGY');
  return peripheral.state === 'connected';
}

export const CONNECTION_CANCELLED = 'Connection cancelled';

export interface RetryOptions {
  // Stops further attempts once aborted
  signal?: AbortSignal;
  // Performs one connect attempt; defaults to peripheral.connect()
  attemptConnect?: (peripheral: IPeripheral) => Promise<void>;
}

export async function connectWithRetry(
  peripheral: IPeripheral,
  config: StrategyConfig,
  tag: string,
  options: RetryOptions = {}
): Promise<ConnectionResult> {
  const deviceId = peripheral.id;
  const { signal, attemptConnect = target => target.connect() } = options;
  let lastError: string | undefined;
  let attempt = 0;

  while (attempt < config.maxRetries) {
    if (signal?.aborted) {
      return { deviceId, success: false, attempts: attempt, error: CONNECTION_CANCELLED };
    }

    attempt++;
    try {
      if (attempt > 1) {
        const wait = calculateBackoff(attempt - 2, config.retryDelayMs, config.maxRetryDelayMs);
        bleLogger.debug(`[${tag}] Retry ${attempt}/${config.maxRetries} for ${peripheral.name} in ${wait}ms`, undefined, 'STRATEGY');
        await sleep(wait);
        if (signal?.aborted) {
          return { deviceId, success: false, attempts: attempt - 1, error: CONNECTION_CANCELLED };
        }
      }

      bleLogger.debug(`[${tag}] Connecting to ${peripheral.name} (${deviceId})`, undefined, 'STRATEGY');
      await attemptConnect(peripheral);

      const verified = await verifyConnectedState(peripheral, config.stateVerificationTimeoutMs);
      if (!verified) {
        lastError = 'Connection state verification failed';
        continue;
      }

      return { deviceId, success: true, attempts: attempt };
    } catch (error) {
      lastError = errorMessage(error);
      bleLogger.debug(`[${tag}] Connection attempt ${attempt} failed for ${peripheral.name}: ${lastError}`, undefined, 'STRATEGY');
    }
  }

  return { deviceId, success: false, attempts: attempt, error: lastError ?? 'Unknown connection error' };
}
