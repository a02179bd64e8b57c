import * as logger from 'firebase-functions/logger';
import { errorMessage } from '../common/errors';
import { paginate } from '../common/pagination';
import type { Repository } from '../stores/types';
import type { Lesson, LessonProgressRecord } from '../types/lesson';
import type { CurrentLesson, LessonProgress } from '../types/user';
import type { ActivityService } from './activity';
import type { AnswerGenerator, LessonContentInput } from './ai';
import type { UserService } from './users';

export interface LessonServiceDeps {
  lessons: Repository<Lesson>;
  lessonProgress: Repository<LessonProgressRecord>;
  users: UserService;
  activity: ActivityService;
  generator: AnswerGenerator;
  now?: () => Date;
}

export interface LessonListOptions {
  subject?: string;
  difficulty?: string;
  limit?: number;
  skip?: number;
}

export interface ProgressUpdate {
  progress: number;
  timeSpent: number;
  completed: boolean;
  score?: number | null;
  lastPosition?: string | null;
  notes?: string | null;
}

export interface UserLessonOptions {
  limit?: number;
  skip?: number;
  includeCompleted?: boolean;
}

export type RecommendedLesson = Lesson & { recommendationReason: string };

/** A lesson the user has opened, with their progress on it. */
export interface UserLesson {
  lesson: Lesson;
  progress: LessonProgressRecord;
}

export const RECOMMENDATION_REASON = 'Recommended based on your interests';

export const lessonProgressId = (userId: string, lessonId: string) => `${userId}_${lessonId}`;

export function createLessonService({
  lessons,
  lessonProgress,
  users,
  activity,
  generator,
  now = () => new Date(),
}: LessonServiceDeps) {
  async function getLesson(lessonId: string): Promise<Lesson | null> {
    try {
      return await lessons.get(lessonId);
    } catch (e) {
      logger.error('Error getting lesson', { lessonId, error: errorMessage(e) });
      throw e;
    }
  }

  async function listLessons({ subject, difficulty, limit = 10, skip = 0 }: LessonListOptions = {}): Promise<Lesson[]> {
    try {
      const all = await lessons.list({
        where: { subject, difficulty },
        orderBy: { field: 'createdAt', direction: 'desc' },
      });
      return paginate(all, skip, limit);
    } catch (e) {
      logger.error('Error listing lessons', { subject, difficulty, error: errorMessage(e) });
      throw e;
    }
  }

  async function countLessons(subject?: string): Promise<number> {
    const matching = await lessons.list({ where: { subject } });
    return matching.length;
  }

  /** Newest lessons the user has not completed yet. */
  async function getRecommendedLessons(userId: string, limit = 3): Promise<RecommendedLesson[]> {
    try {
      const learning = await users.getLearningProgress(userId);
      const completed = new Set((learning?.completedLessons ?? []).map((l) => l.lessonId));
      const all = await lessons.list({ orderBy: { field: 'createdAt', direction: 'desc' } });
      return all
        .filter((lesson) => !completed.has(lesson.id))
        .slice(0, limit)
        .map((lesson) => ({ ...lesson, recommendationReason: RECOMMENDATION_REASON }));
    } catch (e) {
      logger.error('Error getting recommended lessons', { userId, error: errorMessage(e) });
      throw e;
    }
  }

  /**
   * Lessons the user has started, most recently opened first. Completed ones
   * are left out unless asked for.
   */
  async function getUserLessons(
    userId: string,
    { limit = 10, skip = 0, includeCompleted = false }: UserLessonOptions = {},
  ): Promise<UserLesson[]> {
    try {
      const records = await lessonProgress.list({
        where: { userId },
        orderBy: { field: 'lastAccessed', direction: 'desc' },
      });
      const wanted = includeCompleted ? records : records.filter((r) => !r.completed);
      const result: UserLesson[] = [];
      for (const progress of paginate(wanted, skip, limit)) {
        const lesson = await lessons.get(progress.lessonId);
        if (lesson) result.push({ lesson, progress });
      }
      return result;
    } catch (e) {
      logger.error('Error getting user lessons', { userId, error: errorMessage(e) });
      throw e;
    }
  }

  async function generateLesson(request: LessonContentInput, userId: string | null): Promise<Lesson> {
    try {
      const generated = await generator.generateLessonContent(request);
      const id = lessons.newId();
      const lesson: Lesson = {
        id,
        subject: request.subject,
        topic: request.topic,
        title: generated.title || `${request.subject}: ${request.topic}`,
        difficulty: request.difficulty,
        durationMinutes: request.durationMinutes,
        summary: generated.summary,
        content: generated.content,
        exercises: generated.exercises,
        resources: generated.resources,
        tags: generated.tags,
        createdAt: now(),
        createdBy: userId,
      };
      await lessons.set(id, lesson);
      logger.info('Lesson generated', { lessonId: id, subject: request.subject, topic: request.topic });
      return lesson;
    } catch (e) {
      logger.error('Error generating lesson', { subject: request.subject, topic: request.topic, error: errorMessage(e) });
      throw e;
    }
  }

  /** Merges the update into the per-lesson progress document, creating it on first write. */
  async function updateLessonProgress(userId: string, lessonId: string, update: ProgressUpdate): Promise<LessonProgressRecord> {
    const id = lessonProgressId(userId, lessonId);
    try {
      const timestamp = now();
      const patch = { ...update, updatedAt: timestamp, lastAccessed: timestamp };
      const existing = await lessonProgress.get(id);
      if (existing) {
        await lessonProgress.update(id, patch);
        return { ...existing, ...patch };
      }
      const created: LessonProgressRecord = {
        userId,
        lessonId,
        score: null,
        lastPosition: null,
        notes: null,
        startedAt: timestamp,
        ...patch,
      };
      await lessonProgress.set(id, created);
      return created;
    } catch (e) {
      logger.error('Error updating lesson progress', { userId, lessonId, error: errorMessage(e) });
      throw e;
    }
  }

  /**
   * Records progress on a lesson and folds it into the learner's overall
   * progress: a completion is appended once per lesson, anything else makes
   * the lesson the current one. Progress on a known lesson is also logged as
   * activity.
   */
  async function trackProgress(userId: string, lessonId: string, update: ProgressUpdate): Promise<LessonProgressRecord> {
    const record = await updateLessonProgress(userId, lessonId, update);
    const lesson = await getLesson(lessonId);
    if (!lesson) return record;

    const learning = await users.getLearningProgress(userId);
    const completedLessons = learning?.completedLessons ?? [];
    const firstCompletion = update.completed && !completedLessons.some((l) => l.lessonId === lessonId);
    await activity.record(userId, firstCompletion ? 'lesson_completion' : 'lesson_progress', {
      lessonId,
      timeSpent: update.timeSpent,
      score: update.score ?? null,
    });

    if (update.completed) {
      if (!firstCompletion) return record;
      const entry: LessonProgress = {
        lessonId,
        title: lesson.title,
        completed: true,
        completionDate: now(),
        score: update.score ?? null,
        timeSpent: update.timeSpent,
      };
      const currentLesson = learning?.currentLesson?.lessonId === lessonId ? null : learning?.currentLesson ?? null;
      await users.updateLearningProgress(userId, {
        completedLessons: [...completedLessons, entry],
        totalTimeSpent: (learning?.totalTimeSpent ?? 0) + update.timeSpent,
        currentLesson,
      });
    } else {
      const currentLesson: CurrentLesson = {
        lessonId,
        title: lesson.title,
        progress: update.progress,
        lastPosition: update.lastPosition ?? null,
      };
      await users.updateLearningProgress(userId, { currentLesson });
    }
    return record;
  }

  return {
    getLesson,
    listLessons,
    countLessons,
    getRecommendedLessons,
    getUserLessons,
    generateLesson,
    updateLessonProgress,
    trackProgress,
  };
}

export type LessonService = ReturnType<typeof createLessonService>;
