/**
 * Scale Bridge Application
 * Wires configuration, transport and manager together for the command line
 */

import { ITransport } from '../ble-bridge/interfaces/ITransport';
import { createTransport } from '../ble-bridge/BleServiceFactory';
import { MockTransport } from '../ble-bridge/MockTransport';
import { bleLogger } from '../ble-bridge/BleLogger';
import { ScaleManager } from '../scale-management/ScaleManager';
import { WeightEvent } from '../scale-management/types';
import { ScaleBridgeConfig } from '../shared/config';

export interface ScaleBridgeAppOptions {
  config: ScaleBridgeConfig;
  // Injected transport; when omitted one is built from config.transport
  transport?: ITransport;
  output?: (line: string) => void;
}

// Dry-run scale used by the mock transport when nothing is configured
const DEMO_SCALE = { address: 'AA:BB:CC:DD:EE:01', name: 'SencorFood Demo' };
const DEMO_WEIGHTS = [0, 0, 125, 250, 250, 0, 0, 480, -20, 0];
const DEMO_INTERVAL_MS = 1500;

export function formatWeightLine(name: string, event: WeightEvent): string {
  return `${new Date(event.timestamp).toISOString()}  ${name} (${event.address})  ${event.weight} g`;
}

export class ScaleBridgeApp {
  private readonly config: ScaleBridgeConfig;
  private readonly output: (line: string) => void;
  private transport: ITransport | null;
  private manager: ScaleManager | null = null;

  constructor(options: ScaleBridgeAppOptions) {
    this.config = options.config;
    this.transport = options.transport ?? null;
    this.output = options.output ?? (line => console.log(line));
  }

  get scaleManager(): ScaleManager | null {
    return this.manager;
  }

  async start(): Promise<void> {
    const injected = this.transport !== null;
    const transport = this.transport ?? (await createTransport(this.config.transport));
    this.transport = transport;

    if (!(await transport.initialize())) {
      throw new Error('Bluetooth adapter did not become ready');
    }

    if (!injected && transport instanceof MockTransport) {
      this.seedMockScales(transport);
    }

    const manager = new ScaleManager({
      transport,
      devices: this.config.devices,
      timing: this.config.timing,
      devicePattern: this.config.devicePattern,
      discoveryDurationMs: this.config.discoveryDurationMs,
    });
    this.manager = manager;

    manager.on('weight', (event: WeightEvent) => {
      this.output(formatWeightLine(manager.getDevices()[event.address] ?? event.address, event));
    });

    if (this.config.autoDiscover) {
      await manager.discoverDevices();
    }

    const count = Object.keys(manager.getDevices()).length;
    if (count === 0) {
      bleLogger.warn('No scales configured or discovered; set SCALE_DEVICES or enable SCALE_AUTO_DISCOVER', undefined, 'APP');
    }

    manager.start();
    bleLogger.info(`Scale bridge running with ${count} scale(s)`, manager.getDevices(), 'APP');
  }

  async shutdown(): Promise<void> {
    bleLogger.info('Shutting down scale bridge', undefined, 'APP');
    await this.manager?.stop();
    await this.transport?.cleanup();
    await bleLogger.close();
  }

  private seedMockScales(transport: MockTransport): void {
    const scales = this.config.devices.length > 0 ? this.config.devices : [DEMO_SCALE];
    for (const scale of scales) {
      transport.addScale(scale.address, { name: scale.name });
    }
    transport.startSimulation(DEMO_WEIGHTS, DEMO_INTERVAL_MS);
  }
}
