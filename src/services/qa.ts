import * as logger from 'firebase-functions/logger';
import { errorMessage, HttpsError } from '../common/errors';
import { DEFAULT_HISTORY_LIMIT, paginate } from '../common/pagination';
import type { Repository } from '../stores/types';
import type { Lesson } from '../types/lesson';
import type { QARecord } from '../types/qa';
import type { AnswerGenerator } from './ai';

export interface QAServiceDeps {
  records: Repository<QARecord>;
  lessons: Repository<Lesson>;
  generator: AnswerGenerator;
  now?: () => Date;
}

export interface AskRequest {
  question: string;
  context?: string | null;
  lessonId?: string | null;
}

export interface HistoryOptions {
  lessonId?: string;
  questionId?: string;
  limit?: number;
  skip?: number;
}

export function createQAService({ records, lessons, generator, now = () => new Date() }: QAServiceDeps) {
  /** Writes the question as a pending record. No answer is attached yet. */
  async function submitQuestion(
    userId: string,
    question: string,
    context?: string | null,
    lessonId?: string | null,
  ): Promise<QARecord> {
    try {
      const id = records.newId();
      const record: QARecord = {
        id,
        userId,
        question,
        context: context ?? null,
        lessonId: lessonId ?? null,
        createdAt: now(),
        status: 'pending',
        answer: null,
        answerCreatedAt: null,
        references: [],
      };
      await records.set(id, record);
      return record;
    } catch (e) {
      logger.error('Error submitting question', { userId, error: errorMessage(e) });
      throw e;
    }
  }

  async function loadLessonContent(lessonId: string | null): Promise<Lesson['content'] | undefined> {
    if (!lessonId) return undefined;
    const lesson = await lessons.get(lessonId);
    return lesson?.content;
  }

  /**
   * Generates and stores the answer for a submitted question. A record that
   * is already answered comes back as is. On failure the record is marked
   * failed and the error is rethrown.
   */
  async function getAnswer(record: QARecord): Promise<QARecord> {
    if (record.status === 'completed' && record.answer) return record;

    try {
      const lessonContent = await loadLessonContent(record.lessonId);
      const generated = await generator.generateAnswer({
        question: record.question,
        context: record.context,
        lessonContent,
      });
      const update = {
        answer: generated.answer,
        answerCreatedAt: now(),
        status: 'completed',
        references: generated.references,
      } satisfies Partial<QARecord>;
      await records.update(record.id, update);
      return { ...record, ...update };
    } catch (e) {
      const message = errorMessage(e);
      try {
        await records.update(record.id, { status: 'failed', error: message });
      } catch (markError) {
        logger.error('Error marking question as failed', { questionId: record.id, error: errorMessage(markError) });
      }
      logger.error('Error generating answer', { questionId: record.id, error: message });
      throw e;
    }
  }

  async function askQuestion(userId: string, request: AskRequest): Promise<QARecord> {
    const record = await submitQuestion(userId, request.question, request.context, request.lessonId);
    logger.info('Question submitted', { questionId: record.id, userId, lessonId: record.lessonId });
    return getAnswer(record);
  }

  /**
   * The caller's Q&A records, newest first. A question id narrows the result
   * to that one record (if the caller owns it) and overrides the other filters.
   */
  async function getHistory(userId: string, options: HistoryOptions = {}): Promise<QARecord[]> {
    const { lessonId, questionId, limit = DEFAULT_HISTORY_LIMIT, skip = 0 } = options;
    try {
      if (questionId) {
        const record = await records.get(questionId);
        return record && record.userId === userId ? [record] : [];
      }
      const all = await records.list({
        where: { userId, lessonId },
        orderBy: { field: 'createdAt', direction: 'desc' },
      });
      return paginate(all, skip, limit);
    } catch (e) {
      logger.error('Error getting Q&A history', { userId, error: errorMessage(e) });
      throw e;
    }
  }

  async function getItem(userId: string, questionId: string): Promise<QARecord> {
    const [item] = await getHistory(userId, { questionId, limit: 1 });
    if (!item) throw new HttpsError('not-found', `Q&A item with ID ${questionId} not found`);
    if (!item.answer) throw new HttpsError('not-found', `Q&A item with ID ${questionId} is not yet complete`);
    return item;
  }

  return { submitQuestion, getAnswer, askQuestion, getHistory, getItem };
}

export type QAService = ReturnType<typeof createQAService>;
