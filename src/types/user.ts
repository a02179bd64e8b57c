import { z } from 'zod';

export const UserProfileSchema = z.object({
  uid: z.string(),
  email: z.string(),
  displayName: z.string(),
  avatarUrl: z.string().nullable().default(null),
  preferences: z.record(z.unknown()).default({}),
  createdAt: z.date(),
  updatedAt: z.date(),
});
export type UserProfile = z.infer<typeof UserProfileSchema>;

/** Progress on one lesson, as kept in the learner's completed list. */
export const LessonProgressSchema = z.object({
  lessonId: z.string(),
  title: z.string(),
  completed: z.boolean(),
  completionDate: z.date().nullable().default(null),
  score: z.number().min(0).max(100).nullable().default(null),
  timeSpent: z.number().int().min(0).default(0), // seconds
});
export type LessonProgress = z.infer<typeof LessonProgressSchema>;

export const CurrentLessonSchema = z.object({
  lessonId: z.string(),
  title: z.string(),
  progress: z.number().min(0).max(1).default(0),
  lastPosition: z.string().nullable().default(null),
});
export type CurrentLesson = z.infer<typeof CurrentLessonSchema>;

export const LearningProgressSchema = z.object({
  completedLessons: z.array(LessonProgressSchema).default([]),
  currentLesson: CurrentLessonSchema.nullable().default(null),
  totalTimeSpent: z.number().int().min(0).default(0),
  statistics: z.record(z.unknown()).default({}),
  lastActive: z.date().nullable().default(null),
});
export type LearningProgress = z.infer<typeof LearningProgressSchema>;

/** The identity of the caller, resolved from a verified ID token. */
export interface AuthUser {
  uid: string;
  email: string;
  displayName: string | null;
  emailVerified: boolean;
  disabled: boolean;
}
