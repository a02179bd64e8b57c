import * as logger from 'firebase-functions/logger';
import { errorMessage } from '../common/errors';
import { DEFAULT_HISTORY_LIMIT, paginate } from '../common/pagination';
import type { TimeRange } from '../schemas/analytics';
import { DIFFICULTIES } from '../schemas/lesson';
import type { ActivityRecord } from '../types/activity';
import type { Lesson } from '../types/lesson';
import type { ActivityService } from './activity';
import type { LessonService } from './lessons';
import type { UserService } from './users';

export interface AnalyticsServiceDeps {
  users: UserService;
  lessons: LessonService;
  activity: ActivityService;
  now?: () => Date;
}

export interface PageOptions {
  limit?: number;
  skip?: number;
}

export interface CompletedLessonDetail {
  lessonId: string;
  title: string;
  subject: string;
  topic: string;
  difficulty: string;
  completionDate: Date | null;
  score: number | null;
  timeSpent: number;
}

export interface SubjectCompletion {
  subject: string;
  lessonsCompleted: number;
  totalLessons: number;
  completionRate: number;
  averageScore: number | null;
  totalTimeSpent: number;
}

export interface CompletionStats {
  totalLessonsCompleted: number;
  totalLessonsAvailable: number;
  overallCompletionRate: number;
  totalTimeSpent: number;
  averageScore: number | null;
  subjects: SubjectCompletion[];
  difficultyDistribution: Record<string, number>;
  lastActive: Date | null;
  streakDays: number;
}

export type ActivityItem = ActivityRecord & { lessonTitle: string | null };

export type ChangeDirection = 'up' | 'down' | 'flat';

export interface DashboardMetric {
  label: string;
  value: number;
  unit: string;
  change: number;
  changeDirection: ChangeDirection;
}

export interface TimeSeries {
  label: string;
  data: Array<{ date: string; value: number }>;
}

export interface Dashboard {
  timeRange: TimeRange;
  metrics: DashboardMetric[];
  timeSeries: TimeSeries[];
  subjectBreakdown: Record<string, number>;
  recommendations: Array<Pick<Lesson, 'title' | 'subject' | 'difficulty' | 'durationMinutes'> & { lessonId: string }>;
}

export interface Period {
  start: Date;
  previousStart: Date;
  previousEnd: Date;
}

interface Bucket {
  start: Date;
  end: Date;
}

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export const utcDateKey = (d: Date): string => d.toISOString().slice(0, 10);

function startOfUtcDay(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

/** The current period (open-ended) and the whole period before it. Weeks start on Monday; all in UTC. */
export function periodFor(range: TimeRange, now: Date): Period {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  const today = startOfUtcDay(now);
  switch (range) {
    case 'day':
      return { start: today, previousStart: new Date(today.getTime() - DAY_MS), previousEnd: today };
    case 'week': {
      const start = new Date(today.getTime() - ((now.getUTCDay() + 6) % 7) * DAY_MS);
      return { start, previousStart: new Date(start.getTime() - 7 * DAY_MS), previousEnd: start };
    }
    case 'month': {
      const start = new Date(Date.UTC(year, month, 1));
      return { start, previousStart: new Date(Date.UTC(year, month - 1, 1)), previousEnd: start };
    }
    case 'year': {
      const start = new Date(Date.UTC(year, 0, 1));
      return { start, previousStart: new Date(Date.UTC(year - 1, 0, 1)), previousEnd: start };
    }
  }
}

function evenBuckets(start: Date, count: number, size: number): Bucket[] {
  return Array.from({ length: count }, (_, i) => ({
    start: new Date(start.getTime() + i * size),
    end: new Date(start.getTime() + (i + 1) * size),
  }));
}

/** Hours of the day, days of the week or month, months of the year. */
export function bucketsFor(range: TimeRange, start: Date): Bucket[] {
  const year = start.getUTCFullYear();
  const month = start.getUTCMonth();
  switch (range) {
    case 'day':
      return evenBuckets(start, 24, HOUR_MS);
    case 'week':
      return evenBuckets(start, 7, DAY_MS);
    case 'month':
      return evenBuckets(start, new Date(Date.UTC(year, month + 1, 0)).getUTCDate(), DAY_MS);
    case 'year':
      return Array.from({ length: 12 }, (_, i) => ({
        start: new Date(Date.UTC(year, i, 1)),
        end: new Date(Date.UTC(year, i + 1, 1)),
      }));
  }
}

export function percentChange(current: number, previous: number): number {
  return previous > 0 ? ((current - previous) / previous) * 100 : 0;
}

function directionOf(change: number): ChangeDirection {
  if (change > 0) return 'up';
  return change < 0 ? 'down' : 'flat';
}

function metric(label: string, value: number, unit: string, current: number, previous: number): DashboardMetric {
  const change = percentChange(current, previous);
  return { label, value, unit, change, changeDirection: directionOf(change) };
}

function average(values: number[]): number | null {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : null;
}

function completionRate(done: number, total: number): number {
  return total > 0 ? (done / total) * 100 : 0;
}

/** Consecutive UTC days with activity, counting back from today. */
export function streakDays(timestamps: Date[], now: Date): number {
  const days = new Set(timestamps.map(utcDateKey));
  let streak = 0;
  for (let day = startOfUtcDay(now).getTime(); days.has(utcDateKey(new Date(day))); day -= DAY_MS) {
    streak += 1;
  }
  return streak;
}

const timeSpentIn = (items: ActivityRecord[]) => items.reduce((total, a) => total + (a.timeSpent ?? 0), 0);
const completionsIn = (items: ActivityRecord[]) => items.filter((a) => a.type === 'lesson_completion').length;
const averageScoreIn = (items: ActivityRecord[]) =>
  average(items.flatMap((a) => (a.score === null ? [] : [a.score]))) ?? 0;
const activeDaysIn = (items: ActivityRecord[]) => new Set(items.map((a) => utcDateKey(a.timestamp))).size;

const within = (a: ActivityRecord, start: Date, end?: Date) =>
  a.timestamp.getTime() >= start.getTime() && (!end || a.timestamp.getTime() < end.getTime());

function emptyStats(): CompletionStats {
  return {
    totalLessonsCompleted: 0,
    totalLessonsAvailable: 0,
    overallCompletionRate: 0,
    totalTimeSpent: 0,
    averageScore: null,
    subjects: [],
    difficultyDistribution: {},
    lastActive: null,
    streakDays: 0,
  };
}

export function createAnalyticsService({ users, lessons, activity, now = () => new Date() }: AnalyticsServiceDeps) {
  // Per-call lesson cache; the same lesson tends to appear many times.
  const lessonLookup = () => {
    const cache = new Map<string, Promise<Lesson | null>>();
    return (lessonId: string): Promise<Lesson | null> => {
      let lesson = cache.get(lessonId);
      if (!lesson) {
        lesson = lessons.getLesson(lessonId);
        cache.set(lessonId, lesson);
      }
      return lesson;
    };
  };

  async function getCompletedLessons(
    userId: string,
    { limit = DEFAULT_HISTORY_LIMIT, skip = 0 }: PageOptions = {},
  ): Promise<CompletedLessonDetail[]> {
    try {
      const progress = await users.getLearningProgress(userId);
      if (!progress) return [];
      const newestFirst = [...progress.completedLessons].sort(
        (a, b) => (b.completionDate?.getTime() ?? 0) - (a.completionDate?.getTime() ?? 0),
      );
      const details: CompletedLessonDetail[] = [];
      for (const entry of paginate(newestFirst, skip, limit)) {
        const lesson = await lessons.getLesson(entry.lessonId);
        if (!lesson) continue;
        details.push({
          lessonId: entry.lessonId,
          title: lesson.title,
          subject: lesson.subject,
          topic: lesson.topic,
          difficulty: lesson.difficulty,
          completionDate: entry.completionDate,
          score: entry.score,
          timeSpent: entry.timeSpent,
        });
      }
      return details;
    } catch (e) {
      logger.error('Error getting completed lessons', { userId, error: errorMessage(e) });
      throw e;
    }
  }

  async function getCompletionStats(userId: string): Promise<CompletionStats> {
    try {
      const progress = await users.getLearningProgress(userId);
      if (!progress) return emptyStats();

      const completed = progress.completedLessons;
      const getLesson = lessonLookup();
      const difficultyDistribution: Record<string, number> = Object.fromEntries(
        DIFFICULTIES.map((d): [string, number] => [d, 0]),
      );
      const bySubject = new Map<string, { lessonsCompleted: number; totalTimeSpent: number; scores: number[] }>();

      for (const entry of completed) {
        const lesson = await getLesson(entry.lessonId);
        if (!lesson) continue;
        if (Object.hasOwn(difficultyDistribution, lesson.difficulty)) difficultyDistribution[lesson.difficulty] += 1;
        const subject = bySubject.get(lesson.subject) ?? { lessonsCompleted: 0, totalTimeSpent: 0, scores: [] };
        subject.lessonsCompleted += 1;
        subject.totalTimeSpent += entry.timeSpent;
        if (entry.score !== null) subject.scores.push(entry.score);
        bySubject.set(lesson.subject, subject);
      }

      const subjects: SubjectCompletion[] = [];
      for (const [subject, totals] of bySubject) {
        const totalLessons = await lessons.countLessons(subject);
        subjects.push({
          subject,
          lessonsCompleted: totals.lessonsCompleted,
          totalLessons,
          completionRate: completionRate(totals.lessonsCompleted, totalLessons),
          averageScore: average(totals.scores),
          totalTimeSpent: totals.totalTimeSpent,
        });
      }

      const totalLessonsAvailable = await lessons.countLessons();
      const streak = progress.lastActive
        ? streakDays((await activity.listForUser(userId)).map((a) => a.timestamp), now())
        : 0;

      return {
        totalLessonsCompleted: completed.length,
        totalLessonsAvailable,
        overallCompletionRate: completionRate(completed.length, totalLessonsAvailable),
        totalTimeSpent: progress.totalTimeSpent,
        averageScore: average(completed.flatMap((l) => (l.score === null ? [] : [l.score]))),
        subjects,
        difficultyDistribution,
        lastActive: progress.lastActive,
        streakDays: streak,
      };
    } catch (e) {
      logger.error('Error getting completion stats', { userId, error: errorMessage(e) });
      throw e;
    }
  }

  async function getActivity(
    userId: string,
    { limit = DEFAULT_HISTORY_LIMIT, skip = 0 }: PageOptions = {},
  ): Promise<ActivityItem[]> {
    try {
      const getLesson = lessonLookup();
      const items: ActivityItem[] = [];
      for (const record of paginate(await activity.listForUser(userId), skip, limit)) {
        const lesson = record.lessonId ? await getLesson(record.lessonId) : null;
        items.push({ ...record, lessonTitle: lesson?.title ?? null });
      }
      return items;
    } catch (e) {
      logger.error('Error getting user activity', { userId, error: errorMessage(e) });
      throw e;
    }
  }

  /** Metrics for the current period compared with the previous one, plus a time-spent series. */
  async function getDashboard(userId: string, timeRange: TimeRange): Promise<Dashboard> {
    try {
      const { start, previousStart, previousEnd } = periodFor(timeRange, now());
      const all = await activity.listForUser(userId);
      const current = all.filter((a) => within(a, start));
      const previous = all.filter((a) => within(a, previousStart, previousEnd));

      const currentTime = timeSpentIn(current);
      const currentScore = averageScoreIn(current);
      const metrics = [
        metric('Time Spent', Math.ceil(currentTime / 60), 'min', currentTime, timeSpentIn(previous)),
        metric('Lessons Completed', completionsIn(current), '', completionsIn(current), completionsIn(previous)),
        metric('Average Score', Math.round(currentScore * 10) / 10, '%', currentScore, averageScoreIn(previous)),
        metric('Active Days', activeDaysIn(current), 'days', activeDaysIn(current), activeDaysIn(previous)),
      ];

      const timeSeries: TimeSeries[] = [
        {
          label: 'Time Spent (minutes)',
          data: bucketsFor(timeRange, start).map((bucket) => ({
            date: utcDateKey(bucket.start),
            value: timeSpentIn(current.filter((a) => within(a, bucket.start, bucket.end))) / 60,
          })),
        },
      ];

      const getLesson = lessonLookup();
      const subjectBreakdown: Record<string, number> = {};
      for (const item of current) {
        const lesson = item.lessonId ? await getLesson(item.lessonId) : null;
        if (!lesson?.subject) continue;
        subjectBreakdown[lesson.subject] = (subjectBreakdown[lesson.subject] ?? 0) + (item.timeSpent ?? 0) / 60;
      }

      const recommendations = (await lessons.getRecommendedLessons(userId, 3)).map((lesson) => ({
        lessonId: lesson.id,
        title: lesson.title,
        subject: lesson.subject,
        difficulty: lesson.difficulty,
        durationMinutes: lesson.durationMinutes,
      }));

      return { timeRange, metrics, timeSeries, subjectBreakdown, recommendations };
    } catch (e) {
      logger.error('Error getting dashboard metrics', { userId, timeRange, error: errorMessage(e) });
      throw e;
    }
  }

  return { getCompletedLessons, getCompletionStats, getActivity, getDashboard };
}

export type AnalyticsService = ReturnType<typeof createAnalyticsService>;
