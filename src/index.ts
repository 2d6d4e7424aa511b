/**
 * Neighborhood Watch Registry Entry Point
 *
 * Community safety-alert registry:
 * - Residents register and build reputation
 * - Registered users report and respond to location-tagged alerts
 * - Verified users form neighborhoods
 * - REST API for clients, notification feed for indexers
 */

import { getConfig } from './config.js';
import { logger } from './utils/logger.js';
import { shortAddress } from './utils/address.js';
import { createRegistryStore } from './services/store.js';
import { RegistryService } from './services/registry.js';
import { startServer, stopServer } from './api/server.js';

async function main() {
  const config = getConfig();
  logger.level = config.logging.level;
  logger.info(
    { port: config.api.port, host: config.api.host, owner: shortAddress(config.registry.ownerAddress) },
    'Starting registry service'
  );

  const registry = new RegistryService(createRegistryStore(config.registry.ownerAddress));
  registry.onEvent((event) => {
    logger.debug({ seq: event.seq, type: event.type }, 'Registry event');
  });

  const server = await startServer(registry, config);

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    stopServer(server)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  logger.info('Registry service started successfully');
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start registry service');
  process.exit(1);
});
