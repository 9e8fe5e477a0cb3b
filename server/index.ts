// Load environment variables first before any other imports
import dotenv from 'dotenv';
dotenv.config();

import { config } from "./config/unified-config";
import { logger } from "./config/logger";
import { createApp } from "./app";
import { initializeStorage } from "./storage";
import { initializeGlobalErrorHandling } from "./middleware/global-error-handler";

initializeGlobalErrorHandling();

initializeStorage(config.storage.seedDataPath);

const app = createApp();

const server = app.listen(config.port, config.host, () => {
  logger.info({
    port: config.port,
    host: config.host,
    env: config.env,
    weights: config.recommender.weights,
  }, `Recommender API listening on http://${config.host}:${config.port}`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close((error) => {
    if (error) {
      logger.error({ error: error.message }, 'Error while closing HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
