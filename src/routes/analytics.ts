import { Router, type NextFunction, type Request, type Response } from 'express';
import { currentUser } from '../middleware/auth';
import { AnalyticsPageQuerySchema, DashboardQuerySchema, parseWith } from '../schemas';
import type { AnalyticsService } from '../services/analytics';

/**
 * Learning analytics for the calling user. Mount behind `requireAuth`.
 */
export function createAnalyticsRoutes(analytics: AnalyticsService): Router {
  const router = Router();

  router.get('/me/completed-lessons', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const { limit, skip } = parseWith(AnalyticsPageQuerySchema, req.query);
      const lessons = await analytics.getCompletedLessons(uid, { limit, skip });
      res.json({ lessons, total: lessons.length, skip, limit });
    } catch (e) {
      next(e);
    }
  });

  router.get('/me/completion-stats', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      res.json(await analytics.getCompletionStats(uid));
    } catch (e) {
      next(e);
    }
  });

  router.get('/me/activity', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const { limit, skip } = parseWith(AnalyticsPageQuerySchema, req.query);
      const items = await analytics.getActivity(uid, { limit, skip });
      res.json({ items, total: items.length, skip, limit });
    } catch (e) {
      next(e);
    }
  });

  router.get('/dashboard', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const { timeRange } = parseWith(DashboardQuerySchema, req.query);
      res.json(await analytics.getDashboard(uid, timeRange));
    } catch (e) {
      next(e);
    }
  });

  return router;
}
