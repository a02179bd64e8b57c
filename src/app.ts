import cors from 'cors';
import express, { type Express } from 'express';
import type { Settings } from './config/settings';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { setupRoutes } from './routes';
import type { IdentityProvider } from './services/identity';
import type { Services } from './services';

export const API_VERSION = '0.1.0';

export interface AppDeps {
  settings: Settings;
  services: Services;
  identity: IdentityProvider;
}

export function createApp({ settings, services, identity }: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(
    cors({
      origin: settings.corsOrigins.includes('*') ? true : settings.corsOrigins,
      credentials: true,
    }),
  );
  app.use(requestLogger(settings.logLevel));

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', message: `${settings.projectName} API is operational` });
  });

  app.get('/', (_req, res) => {
    res.json({ message: `Welcome to ${settings.projectName} API`, version: API_VERSION });
  });

  setupRoutes(app, settings.apiPrefix, services, identity);

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
