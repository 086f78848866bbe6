/**
 * Environment Configuration
 * Reads SCALE_* variables (a .env file is loaded by the CLI through dotenv)
 * and validates them into one typed object.
 */

import { BLE_CONFIG, TIMING } from '../ble-bridge/BleBridgeConstants';
import { LogLevel, isLogLevel } from '../ble-bridge/BleLogger';
import { normalizeAddress } from '../ble-bridge/interfaces/ITransport';
import type { TransportSelection } from '../ble-bridge/BleServiceFactory';
import type { ScaleDevice, SupervisorTiming } from '../scale-management/types';

export interface ScaleBridgeConfig {
  devices: ScaleDevice[];
  timing: SupervisorTiming;
  discoveryDurationMs: number;
  devicePattern: string;
  autoDiscover: boolean;
  transport: TransportSelection;
  logLevel: LogLevel;
  logDir: string | undefined;
}

const TRANSPORT_SELECTIONS: readonly TransportSelection[] = ['auto', 'noble', 'node-ble', 'mock'];

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsers (each records problems instead of throwing)
// ─────────────────────────────────────────────────────────────────────────────

function readSeconds(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultSeconds: number,
  issues: string[],
  minimum = 0
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return defaultSeconds;
  }
  if (!/^\d+$/.test(raw) || Number(raw) < minimum) {
    issues.push(`${name} must be an integer >= ${minimum} (got "${raw}")`);
    return defaultSeconds;
  }
  return Number(raw);
}

/**
 * "AA:BB:CC:DD:EE:FF=Kitchen,11:22:33:44:55:66" → devices.
 * A bare address is its own name; a repeated address keeps the last name.
 */
export function parseDeviceList(raw: string | undefined, issues: string[] = []): ScaleDevice[] {
  const devices = new Map<string, ScaleDevice>();

  for (const entry of (raw ?? '').split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf('=');
    const rawAddress = separator === -1 ? trimmed : trimmed.slice(0, separator);
    const rawName = separator === -1 ? '' : trimmed.slice(separator + 1).trim();

    if (!rawAddress.trim()) {
      issues.push(`SCALE_DEVICES entry "${trimmed}" has an empty address`);
      continue;
    }

    const address = normalizeAddress(rawAddress);
    devices.set(address, { address, name: rawName || address });
  }

  return Array.from(devices.values());
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, defaultValue: boolean, issues: string[]): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return defaultValue;
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;

  issues.push(`${name} must be true or false (got "${raw}")`);
  return defaultValue;
}

function readTransport(env: NodeJS.ProcessEnv, issues: string[]): TransportSelection {
  const raw = env.SCALE_TRANSPORT?.trim().toLowerCase();
  if (!raw) return 'auto';

  const selection = TRANSPORT_SELECTIONS.find(candidate => candidate === raw);
  if (!selection) {
    issues.push(`SCALE_TRANSPORT must be one of ${TRANSPORT_SELECTIONS.join(', ')} (got "${raw}")`);
    return 'auto';
  }
  return selection;
}

function readLogLevel(env: NodeJS.ProcessEnv, issues: string[]): LogLevel {
  const raw = env.SCALE_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return 'info';
  if (!isLogLevel(raw)) {
    issues.push(`SCALE_LOG_LEVEL must be trace, debug, info, warn, error or silent (got "${raw}")`);
    return 'info';
  }
  return raw;
}

// ─────────────────────────────────────────────────────────────────────────────
// Loader
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @throws ConfigValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScaleBridgeConfig {
  const issues: string[] = [];

  const devices = parseDeviceList(env.SCALE_DEVICES, issues);
  const scanInterval = readSeconds(env, 'SCALE_SCAN_INTERVAL', TIMING.DEFAULT_SCAN_INTERVAL, issues);
  const offInterval = readSeconds(env, 'SCALE_OFF_INTERVAL', TIMING.DEFAULT_OFF_INTERVAL, issues);
  const listenWindow = readSeconds(env, 'SCALE_LISTEN_WINDOW', TIMING.LISTEN_WINDOW / 1000, issues, 1);
  const resolveTimeout = readSeconds(env, 'SCALE_RESOLVE_TIMEOUT', BLE_CONFIG.RESOLVE_TIMEOUT / 1000, issues, 1);
  const discoveryDuration = readSeconds(env, 'SCALE_DISCOVERY_DURATION', BLE_CONFIG.SCAN_TIMEOUT / 1000, issues, 1);
  const autoDiscover = readBoolean(env, 'SCALE_AUTO_DISCOVER', devices.length === 0, issues);
  const transport = readTransport(env, issues);
  const logLevel = readLogLevel(env, issues);

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return {
    devices,
    timing: {
      scanIntervalMs: scanInterval * 1000,
      offIntervalMs: offInterval * 1000,
      listenWindowMs: listenWindow * 1000,
      resolveTimeoutMs: resolveTimeout * 1000,
      pollIntervalMs: TIMING.LIVENESS_POLL_INTERVAL,
      teardownTimeoutMs: TIMING.TEARDOWN_TIMEOUT,
    },
    discoveryDurationMs: discoveryDuration * 1000,
    devicePattern: env.SCALE_DEVICE_PATTERN?.trim() || BLE_CONFIG.DEVICE_NAME_PATTERN,
    autoDiscover,
    transport,
    logLevel,
    logDir: env.SCALE_LOG_DIR?.trim() || undefined,
  };
}
