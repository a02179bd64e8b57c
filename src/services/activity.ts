import * as logger from 'firebase-functions/logger';
import { errorMessage } from '../common/errors';
import type { Repository } from '../stores/types';
import type { ActivityRecord, ActivityType } from '../types/activity';

export interface ActivityServiceDeps {
  activity: Repository<ActivityRecord>;
  now?: () => Date;
}

export interface ActivityEntry {
  lessonId?: string | null;
  timeSpent?: number | null;
  score?: number | null;
  details?: Record<string, unknown>;
}

export function createActivityService({ activity, now = () => new Date() }: ActivityServiceDeps) {
  return {
    async record(userId: string, type: ActivityType, entry: ActivityEntry = {}): Promise<ActivityRecord> {
      try {
        const id = activity.newId();
        const record: ActivityRecord = {
          id,
          userId,
          type,
          timestamp: now(),
          lessonId: entry.lessonId ?? null,
          timeSpent: entry.timeSpent ?? null,
          score: entry.score ?? null,
          details: entry.details ?? {},
        };
        await activity.set(id, record);
        return record;
      } catch (e) {
        logger.error('Error logging user activity', { userId, type, error: errorMessage(e) });
        throw e;
      }
    },

    /** Everything the user did, newest first. */
    async listForUser(userId: string): Promise<ActivityRecord[]> {
      return activity.list({ where: { userId }, orderBy: { field: 'timestamp', direction: 'desc' } });
    },
  };
}

export type ActivityService = ReturnType<typeof createActivityService>;
