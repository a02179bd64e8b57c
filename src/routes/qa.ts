import { Router, type NextFunction, type Request, type Response } from 'express';
import * as logger from 'firebase-functions/logger';
import { errorMessage, HttpsError } from '../common/errors';
import { currentUser } from '../middleware/auth';
import { parseWith, QAHistoryQuerySchema, QuestionRequestSchema } from '../schemas';
import type { QAService } from '../services/qa';
import type { QARecord } from '../types/qa';

export function toQAItemResponse(record: QARecord) {
  return {
    id: record.id,
    question: record.question,
    answer: record.answer ?? '',
    createdAt: record.createdAt,
    lessonId: record.lessonId,
    references: record.references,
  };
}

/**
 * Q&A endpoints. Mount behind `requireAuth`.
 */
export function createQARoutes(qa: QAService): Router {
  const router = Router();

  router.post('/ask', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const body = parseWith(QuestionRequestSchema, req.body);
      let answered: QARecord;
      try {
        answered = await qa.askQuestion(uid, body);
      } catch (e) {
        throw new HttpsError('internal', `Failed to process question: ${errorMessage(e)}`);
      }
      res.json({
        questionId: answered.id,
        question: answered.question,
        answer: answered.answer ?? '',
        createdAt: answered.createdAt,
        lessonId: answered.lessonId,
        references: answered.references,
      });
    } catch (e) {
      next(e);
    }
  });

  router.get('/history', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const { lessonId, limit, skip } = parseWith(QAHistoryQuerySchema, req.query);
      const history = await qa.getHistory(uid, { lessonId, limit, skip });
      // Pending and failed exchanges stay out of the history view.
      const items = history.filter((item) => item.status === 'completed' && item.answer).map(toQAItemResponse);
      res.json({ items, total: items.length, skip, limit });
    } catch (e) {
      next(e);
    }
  });

  router.get('/:questionId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const item = await qa.getItem(uid, req.params.questionId);
      res.json(toQAItemResponse(item));
    } catch (e) {
      if (!(e instanceof HttpsError)) {
        logger.error('Error retrieving Q&A item', { questionId: req.params.questionId, error: errorMessage(e) });
      }
      next(e);
    }
  });

  return router;
}
