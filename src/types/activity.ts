import { z } from 'zod';

export const ACTIVITY_TYPES = ['lesson_progress', 'lesson_completion'] as const;

/** One learner action, kept for the activity feed and dashboard. */
export const ActivityRecordSchema = z.object({
  id: z.string(),
  userId: z.string(),
  type: z.string(),
  timestamp: z.date(),
  lessonId: z.string().nullable().default(null),
  timeSpent: z.number().int().min(0).nullable().default(null), // seconds
  score: z.number().nullable().default(null),
  details: z.record(z.unknown()).default({}),
});
export type ActivityRecord = z.infer<typeof ActivityRecordSchema>;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];
