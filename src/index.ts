import dotenv from 'dotenv';
import { createApp } from './app.js';
import { createServices } from './bootstrap.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';

dotenv.config();

const logger = createLogger('Server');
const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const server = app.listen(config.PORT, () => {
  logger.info(`Server listening on http://localhost:${config.PORT}`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    services.db.close();
    logger.info('HTTP server closed');
    process.exit(0);
  });
  // Force exit if server hasn't closed within 10 seconds
  setTimeout(() => {
    logger.error('Forced exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT',  () => shutdown('SIGINT'));
