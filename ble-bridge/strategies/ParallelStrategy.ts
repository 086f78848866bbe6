/**
 * Parallel Connection Strategy
 * Each connect runs as soon as it is requested
 * Suitable for Noble on Windows/macOS where parallel connections are supported
 */

import {
  IConnectionStrategy,
  ConnectionResult,
  StrategyConfig,
  DEFAULT_STRATEGY_CONFIG,
} from '../interfaces/IConnectionStrategy';
import { IPeripheral } from '../interfaces/ITransport';
import { connectWithRetry } from './retry';

export class ParallelStrategy implements IConnectionStrategy {
  private config: StrategyConfig;

  constructor(config?: Partial<StrategyConfig>) {
    this.config = { ...DEFAULT_STRATEGY_CONFIG, ...config };
  }

  async connectSingle(peripheral: IPeripheral, signal?: AbortSignal): Promise<ConnectionResult> {
    return connectWithRetry(peripheral, this.config, 'ParallelStrategy', { signal });
  }
}
