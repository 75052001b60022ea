/**
 * AirLens tool engine - Main Entry Point
 */

import { buildApp } from './app.js';
import { config } from './config/index.js';
import { createEngineFromConfig } from './engine.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info({ env: config.env }, 'Starting AirLens tool engine');

  const engine = await createEngineFromConfig();

  const sensorsReachable = await engine.sensors.healthCheck();
  if (!sensorsReachable) {
    logger.warn({ sensors: engine.sensors.name }, 'Sensor store unreachable at startup');
  }

  // Build and start the app
  const app = await buildApp(engine);

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ port: config.server.port, host: config.server.host }, 'Server started');

    engine.sweeper.start();

    // Handle shutdown gracefully
    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Received shutdown signal');

      engine.sweeper.stop();

      // Stop accepting new requests
      await app.close();
      logger.info('Server closed');

      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error) => {
        logger.fatal({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Unhandled error during startup');
  process.exit(1);
});
