import type { Application } from 'express';
import * as logger from 'firebase-functions/logger';
import { requireAuth } from '../middleware/auth';
import type { IdentityProvider } from '../services/identity';
import type { Services } from '../services';
import { createAnalyticsRoutes } from './analytics';
import { createAuthRoutes } from './auth';
import { createLessonRoutes } from './lessons';
import { createQARoutes } from './qa';
import { createUserRoutes } from './users';

/**
 * Mounts every API router under the prefix. All but `/auth` require a
 * verified ID token.
 */
export function setupRoutes(app: Application, urlPrefix: string, services: Services, identity: IdentityProvider): void {
  const authenticated = requireAuth(identity);

  app.use(`${urlPrefix}/auth`, createAuthRoutes(identity, services.users));
  app.use(`${urlPrefix}/users`, authenticated, createUserRoutes(services.users, identity));
  app.use(`${urlPrefix}/lessons`, authenticated, createLessonRoutes(services.lessons));
  app.use(`${urlPrefix}/qa`, authenticated, createQARoutes(services.qa));
  app.use(`${urlPrefix}/analytics`, authenticated, createAnalyticsRoutes(services.analytics));

  logger.debug('API routes configured', { urlPrefix });
}
