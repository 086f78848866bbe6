/**
 * Platform Configuration
 * Detects the current platform and provides the matching BLE transport settings
 */

import * as fs from 'fs';
import { ConnectionStrategyType, StrategyConfig } from './interfaces/IConnectionStrategy';
import { bleLogger } from './BleLogger';

// ─────────────────────────────────────────────────────────────────────────────
// Platform Detection
// ─────────────────────────────────────────────────────────────────────────────

export type PlatformType = 'windows' | 'macos' | 'linux' | 'unknown';
export type TransportType = 'noble' | 'node-ble' | 'mock';

export function detectPlatform(platform: NodeJS.Platform = process.platform): PlatformType {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    case 'linux':
      return 'linux';
    default:
      return 'unknown';
  }
}

export function isRaspberryPi(): boolean {
  try {
    if (fs.existsSync('/proc/device-tree/model')) {
      const model = fs.readFileSync('/proc/device-tree/model', 'utf8');
      if (model.toLowerCase().includes('raspberry pi')) {
        return true;
      }
    }
    return false;
  } catch {
    return false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Platform Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface BLEPlatformConfig {
  platform: PlatformType;
  transportType: TransportType;
  strategyType: ConnectionStrategyType;
  strategy: StrategyConfig;
}

const NOBLE_CONFIG: BLEPlatformConfig = {
  platform: 'windows',
  transportType: 'noble',
  strategyType: ConnectionStrategyType.PARALLEL,
  strategy: {
    interConnectionDelayMs: 0,      // No delay needed for parallel
    stateVerificationTimeoutMs: 5000,
    maxRetries: 2,
    retryDelayMs: 300,
    maxRetryDelayMs: 2000,
  },
};

const NODEBLE_CONFIG: BLEPlatformConfig = {
  platform: 'linux',
  transportType: 'node-ble',
  strategyType: ConnectionStrategyType.SEQUENTIAL,
  strategy: {
    interConnectionDelayMs: 200,    // BlueZ needs delay between connections
    stateVerificationTimeoutMs: 10000,  // Longer timeout for BlueZ
    maxRetries: 3,                  // More retries for flaky BlueZ
    retryDelayMs: 500,
    maxRetryDelayMs: 4000,
  },
};

const MOCK_CONFIG: BLEPlatformConfig = {
  platform: 'unknown',
  transportType: 'mock',
  strategyType: ConnectionStrategyType.PARALLEL,
  strategy: {
    interConnectionDelayMs: 0,
    stateVerificationTimeoutMs: 1000,
    maxRetries: 1,
    retryDelayMs: 0,
    maxRetryDelayMs: 0,
  },
};

/**
 * Get the BLE configuration for the current platform
 */
export function getPlatformConfig(platform: PlatformType = detectPlatform()): BLEPlatformConfig {
  switch (platform) {
    case 'windows':
    case 'macos':
      return { ...NOBLE_CONFIG, platform };

    case 'linux':
      if (isRaspberryPi()) {
        bleLogger.debug('Detected Raspberry Pi - using node-ble with Pi-optimized settings', undefined, 'PLATFORM');
        return {
          ...NODEBLE_CONFIG,
          strategy: {
            ...NODEBLE_CONFIG.strategy,
            stateVerificationTimeoutMs: 15000,  // Pi connections can be slow
          },
        };
      }
      return { ...NODEBLE_CONFIG };

    default:
      bleLogger.warn('Unknown platform - defaulting to Noble', undefined, 'PLATFORM');
      return { ...NOBLE_CONFIG, platform: 'unknown' };
  }
}

/**
 * Force a specific transport type (for testing or override)
 */
export function getConfigForTransport(transportType: TransportType): BLEPlatformConfig {
  const platform = detectPlatform();

  switch (transportType) {
    case 'noble':
      return { ...NOBLE_CONFIG, platform };
    case 'node-ble':
      return { ...NODEBLE_CONFIG, platform };
    case 'mock':
      return { ...MOCK_CONFIG, platform };
  }
}
