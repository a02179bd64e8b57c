import { z } from 'zod';

export const LessonSectionSchema = z.object({
  title: z.string().default('Untitled Section'),
  content: z.string().default(''),
  order: z.number().int().default(0),
  type: z.string().default('text'), // text, video, quiz, interactive
  mediaUrl: z.string().nullable().default(null),
});
export type LessonSection = z.infer<typeof LessonSectionSchema>;

export const LessonExerciseSchema = z.object({
  question: z.string(),
  options: z.array(z.string()).nullable().default(null),
  correctAnswer: z.string().nullable().default(null),
  explanation: z.string().nullable().default(null),
  difficulty: z.string().default('medium'),
});
export type LessonExercise = z.infer<typeof LessonExerciseSchema>;

export const LessonResourceSchema = z.object({
  title: z.string(),
  url: z.string().default(''),
  type: z.string().default('link'),
  description: z.string().nullable().default(null),
});
export type LessonResource = z.infer<typeof LessonResourceSchema>;

export const LessonSchema = z.object({
  id: z.string(),
  subject: z.string(),
  topic: z.string(),
  title: z.string(),
  difficulty: z.string(),
  durationMinutes: z.number().int(),
  summary: z.string().default(''),
  content: z.array(LessonSectionSchema).default([]),
  exercises: z.array(LessonExerciseSchema).default([]),
  resources: z.array(LessonResourceSchema).default([]),
  tags: z.array(z.string()).default([]),
  createdAt: z.date(),
  createdBy: z.string().nullable().default(null),
});
export type Lesson = z.infer<typeof LessonSchema>;

export const LessonProgressRecordSchema = z.object({
  userId: z.string(),
  lessonId: z.string(),
  progress: z.number().min(0).max(1),
  completed: z.boolean(),
  timeSpent: z.number().int().min(0),
  score: z.number().nullable(),
  lastPosition: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
  startedAt: z.date(),
  lastAccessed: z.date(),
  updatedAt: z.date(),
});
export type LessonProgressRecord = z.infer<typeof LessonProgressRecordSchema>;
