#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { bleLogger, describeError } from '../ble-bridge/BleLogger';
import { ConfigValidationError, loadConfig } from '../shared/config';
import { ScaleBridgeApp } from './ScaleBridgeApp';

// Load .env from the working directory before reading any SCALE_* variable
loadDotenv();

async function main(): Promise<number> {
  let app: ScaleBridgeApp;
  try {
    const config = loadConfig(process.env);
    bleLogger.configure({ level: config.logLevel, logDir: config.logDir });
    app = new ScaleBridgeApp({ config });
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    bleLogger.info(`Received ${signal}`, undefined, 'APP');
    app.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        bleLogger.error('Shutdown failed', describeError(error), 'APP');
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await app.start();
  return 0;
}

main().then(
  code => {
    if (code !== 0) process.exit(code);
  },
  (error: unknown) => {
    bleLogger.error('Scale bridge failed to start', describeError(error), 'APP');
    process.exit(1);
  }
);
