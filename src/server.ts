import dotenv from 'dotenv';

// Load environment variables before any other imports
dotenv.config();

import { createApp, createServices } from './app';
import { loadConfig } from './backend/utils/config';
import { createLogger } from './backend/utils/logger';

const logger = createLogger('Server');

const config = loadConfig();
const services = createServices(config);
const app = createApp(services, config);

async function startServer() {
  try {
    await services.fileStorage.ensureDataDir();
    logger.info('Data directories initialized');

    services.engine.start();

    // Only start server if not in test environment
    if (process.env.NODE_ENV !== 'test') {
      const server = app.listen(config.port, config.host, () => {
        logger.info(`Server running on ${config.host}:${config.port}`);
        if (config.host !== '127.0.0.1' && config.host !== 'localhost') {
          logger.warn(
            `Server bound to ${config.host} - ensure this is intentional for security`
          );
        }
      });

      server.on('error', error => {
        logger.error('Server error', error);
      });

      const shutdown = () => {
        server.close();
        services.engine
          .stop()
          .catch(error => logger.error('Engine shutdown failed', error));
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    }
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }

  try {
    const outcome = await services.engine.activate();
    logger.info(`Launch sync finished (${outcome.mode})`);
  } catch (error) {
    // Catalog problems are retried on the next activation
    logger.error('Launch sync failed', error);
  }
}

// Initialize the server
void startServer();

export default app;
