/**
 * BLE Transport Factory - Platform-aware transport selector
 *
 * Windows/Mac: Uses @abandonware/noble (HCI socket)
 * Linux/Raspberry Pi: Uses node-ble (BlueZ via DBus)
 *
 * The native transports are imported lazily so that loading this module
 * never touches a Bluetooth binding.
 */

import { ITransport, TransportConfig } from './interfaces/ITransport';
import { ConnectionStrategyType, IConnectionStrategy, StrategyConfig } from './interfaces/IConnectionStrategy';
import { ParallelStrategy } from './strategies/ParallelStrategy';
import { SequentialStrategy } from './strategies/SequentialStrategy';
import { BLEPlatformConfig, TransportType, getConfigForTransport, getPlatformConfig } from './PlatformConfig';
import { MockTransport } from './MockTransport';
import { bleLogger } from './BleLogger';

export type TransportSelection = TransportType | 'auto';

export function createStrategy(type: ConnectionStrategyType, config: StrategyConfig): IConnectionStrategy {
  switch (type) {
    case ConnectionStrategyType.PARALLEL:
      return new ParallelStrategy(config);
    case ConnectionStrategyType.SEQUENTIAL:
      return new SequentialStrategy(config);
  }
}

export function resolvePlatformConfig(selection: TransportSelection): BLEPlatformConfig {
  return selection === 'auto' ? getPlatformConfig() : getConfigForTransport(selection);
}

/**
 * Factory function to create the transport for the current platform
 */
export async function createTransport(
  selection: TransportSelection = 'auto',
  config?: Partial<TransportConfig>
): Promise<ITransport> {
  const platformConfig = resolvePlatformConfig(selection);
  const strategy = createStrategy(platformConfig.strategyType, platformConfig.strategy);

  bleLogger.info(
    `Using ${platformConfig.transportType} transport (${platformConfig.strategyType} connections) on ${platformConfig.platform}`,
    undefined,
    'FACTORY'
  );

  switch (platformConfig.transportType) {
    case 'node-ble': {
      const { NodeBleTransport } = await import('./transports/NodeBleTransport');
      return new NodeBleTransport(strategy, config);
    }
    case 'noble': {
      const { NobleTransport } = await import('./transports/NobleTransport');
      return new NobleTransport(strategy, config);
    }
    case 'mock':
      return new MockTransport(strategy);
  }
}
