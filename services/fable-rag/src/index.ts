import 'dotenv/config';
import { loadConfig, type Config } from './config';
import { createContainer, verifyIndexSchema } from './container';
import { ConfigError } from './errors';
import { createLogger } from './logger';
import { buildApp } from './server';

/**
 * Service entrypoint: validates configuration, wires components, checks the
 * index against the encoder and listens on the configured host/port.
 */
async function main() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger().fatal({ issues: err.issues }, err.message);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger(config.logLevel);
  const container = createContainer(config, logger);
  await verifyIndexSchema(container);

  const app = await buildApp({ ...container, corsOrigins: config.corsOrigins });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    try {
      await app.close();
      await container.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  await app.listen({ port: config.port, host: config.host });
  logger.info({ providers: container.registry.names, default: container.registry.defaultProvider }, 'Fable service ready');
}

// run
main().catch((err) => {
  // last-resort catch for any startup failure
  createLogger().fatal({ err }, 'Fatal error starting fable service');
  process.exit(1);
});
