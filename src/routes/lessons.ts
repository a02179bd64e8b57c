import { Router, type NextFunction, type Request, type Response } from 'express';
import { HttpsError } from '../common/errors';
import { currentUser } from '../middleware/auth';
import {
  LessonGenerateSchema,
  LessonListQuerySchema,
  LessonProgressUpdateSchema,
  parseWith,
  RecommendedLessonsQuerySchema,
  UserLessonsQuerySchema,
} from '../schemas';
import type { LessonService } from '../services/lessons';
import type { Lesson } from '../types/lesson';

const toListItem = ({ id, title, subject, topic, difficulty, durationMinutes, createdAt, tags, summary }: Lesson) => ({
  id,
  title,
  subject,
  topic,
  difficulty,
  durationMinutes,
  createdAt,
  tags,
  summary,
});

/**
 * Lesson catalogue, generation and per-lesson progress. Mount behind `requireAuth`.
 */
export function createLessonRoutes(lessons: LessonService): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = parseWith(LessonListQuerySchema, req.query);
      const items = await lessons.listLessons(query);
      res.json({ lessons: items.map(toListItem), total: items.length, skip: query.skip, limit: query.limit });
    } catch (e) {
      next(e);
    }
  });

  router.get('/recommended', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const { limit } = parseWith(RecommendedLessonsQuerySchema, req.query);
      const recommended = await lessons.getRecommendedLessons(uid, limit);
      res.json({
        lessons: recommended.map((lesson) => ({ ...toListItem(lesson), recommendationReason: lesson.recommendationReason })),
        total: recommended.length,
      });
    } catch (e) {
      next(e);
    }
  });

  router.get('/my-lessons', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const query = parseWith(UserLessonsQuerySchema, req.query);
      const mine = await lessons.getUserLessons(uid, query);
      res.json({
        lessons: mine.map(({ lesson, progress }) => ({
          ...toListItem(lesson),
          progress: {
            progress: progress.progress,
            timeSpent: progress.timeSpent,
            completed: progress.completed,
            score: progress.score,
            lastAccessed: progress.lastAccessed,
            startedAt: progress.startedAt,
          },
        })),
        total: mine.length,
        skip: query.skip,
        limit: query.limit,
      });
    } catch (e) {
      next(e);
    }
  });

  router.post('/generate', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const request = parseWith(LessonGenerateSchema, req.body);
      res.status(201).json(await lessons.generateLesson(request, uid));
    } catch (e) {
      next(e);
    }
  });

  router.get('/:lessonId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const lesson = await lessons.getLesson(req.params.lessonId);
      if (!lesson) throw new HttpsError('not-found', `Lesson with ID ${req.params.lessonId} not found`);
      res.json(lesson);
    } catch (e) {
      next(e);
    }
  });

  router.post('/:lessonId/progress', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const update = parseWith(LessonProgressUpdateSchema, req.body);
      const progress = await lessons.trackProgress(uid, req.params.lessonId, update);
      res.json({ message: 'Progress updated successfully', progress });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
