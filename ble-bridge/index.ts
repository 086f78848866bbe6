/**
 * BLE Bridge - Platform-aware Bluetooth Low Energy transport layer
 *
 * Windows/Mac: Uses @abandonware/noble (HCI socket) with ParallelStrategy
 * Linux/Raspberry Pi: Uses node-ble (BlueZ via DBus) with SequentialStrategy
 *
 * The native transports are reached through createTransport() only.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Platform-aware factory (recommended way to create a transport)
// ─────────────────────────────────────────────────────────────────────────────

export { createTransport, createStrategy, resolvePlatformConfig } from './BleServiceFactory';
export type { TransportSelection } from './BleServiceFactory';

// ─────────────────────────────────────────────────────────────────────────────
// Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ITransport,
  IPeripheral,
  IConnection,
  IChannel,
  CharacteristicProperties,
  NotifyHandler,
  PeripheralState,
  Advertisement,
  AdvertisementPredicate,
  TransportConfig,
} from './interfaces/ITransport';

export {
  TransportNotInitializedError,
  ConnectionFailedError,
  normalizeAddress,
} from './interfaces/ITransport';

export {
  ConnectionStrategyType,
  DEFAULT_STRATEGY_CONFIG,
} from './interfaces/IConnectionStrategy';

export type {
  IConnectionStrategy,
  ConnectionResult,
  StrategyConfig,
} from './interfaces/IConnectionStrategy';

// ─────────────────────────────────────────────────────────────────────────────
// Strategies
// ─────────────────────────────────────────────────────────────────────────────

export { ParallelStrategy } from './strategies/ParallelStrategy';
export { SequentialStrategy } from './strategies/SequentialStrategy';

// ─────────────────────────────────────────────────────────────────────────────
// Mock transport (tests and dry runs)
// ─────────────────────────────────────────────────────────────────────────────

export { MockTransport, buildWeightPayload, MOCK_SERVICE_UUID, MOCK_WEIGHT_CHARACTERISTIC_UUID } from './MockTransport';
export type { MockScaleOptions, MockChannelSpec, MockScaleStats } from './MockTransport';

// ─────────────────────────────────────────────────────────────────────────────
// Platform, constants and logging
// ─────────────────────────────────────────────────────────────────────────────

export { detectPlatform, isRaspberryPi, getPlatformConfig, getConfigForTransport } from './PlatformConfig';
export type { PlatformType, TransportType, BLEPlatformConfig } from './PlatformConfig';
export { BLE_CONFIG, TIMING, PAYLOAD_LAYOUT } from './BleBridgeConstants';
export { BleLogger, bleLogger, LOG_LEVELS, isLogLevel, describeError, errorMessage } from './BleLogger';
export type { LogLevel, LoggerOptions } from './BleLogger';
export { TimeoutError, sleep, calculateBackoff, withTimeout } from './utils/async';
