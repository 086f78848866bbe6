/**
 * Connection Strategy Interface
 * Defines how peripheral connections are attempted (parallel vs sequential)
 * and owns the transport-level retry/backoff
 */

import { IPeripheral } from './ITransport';

// ─────────────────────────────────────────────────────────────────────────────
// Connection Result
// ─────────────────────────────────────────────────────────────────────────────

export interface ConnectionResult {
  deviceId: string;
  success: boolean;
  attempts: number;
  error?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Strategy Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface StrategyConfig {
  interConnectionDelayMs: number;  // Delay between queued connections (BlueZ needs 200ms+)
  stateVerificationTimeoutMs: number;  // Max time to wait for connected state
  maxRetries: number;  // Per-connect attempts
  retryDelayMs: number;  // Base delay between attempts, doubled each retry
  maxRetryDelayMs: number;
}

export const DEFAULT_STRATEGY_CONFIG: StrategyConfig = {
  interConnectionDelayMs: 200,
  stateVerificationTimeoutMs: 10000,
  maxRetries: 3,
  retryDelayMs: 500,
  maxRetryDelayMs: 4000,
};

// ─────────────────────────────────────────────────────────────────────────────
// Connection Strategy Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface IConnectionStrategy {
  /**
   * Connect to a single peripheral, retrying with backoff.
   * Never throws; failures are reported in the result. Once `signal` is
   * aborted no further attempt is started.
   */
  connectSingle(peripheral: IPeripheral, signal?: AbortSignal): Promise<ConnectionResult>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Strategy Type Enum
// ─────────────────────────────────────────────────────────────────────────────

export enum ConnectionStrategyType {
  PARALLEL = 'parallel',
  SEQUENTIAL = 'sequential',
}
