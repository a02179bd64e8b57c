import 'dotenv/config';
import * as logger from 'firebase-functions/logger';
import { buildApp } from './bootstrap';
import { getSettings } from './config/settings';

const settings = getSettings();
const app = buildApp(settings);

const server = app.listen(settings.port, () => {
  logger.info(`${settings.projectName} API listening`, {
    port: settings.port,
    apiPrefix: settings.apiPrefix,
    corsOrigins: settings.corsOrigins,
    model: settings.gemini.model,
  });
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  server.close((err) => {
    if (err) {
      logger.error('Error while closing server', { error: err.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
