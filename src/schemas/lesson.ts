import { z } from 'zod';

export const DIFFICULTIES = ['beginner', 'intermediate', 'advanced'] as const;

export const LessonGenerateSchema = z.object({
  subject: z.string().trim().min(2).max(50),
  topic: z.string().trim().min(2).max(100),
  difficulty: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(DIFFICULTIES, { errorMap: () => ({ message: `Difficulty must be one of: ${DIFFICULTIES.join(', ')}` }) })),
  durationMinutes: z.number().int().min(5).max(120),
  additionalInstructions: z.string().max(2000).nullable().optional(),
});
export type LessonGenerateRequest = z.infer<typeof LessonGenerateSchema>;

export const LessonProgressUpdateSchema = z.object({
  progress: z.number().min(0).max(1),
  timeSpent: z.number().int().min(0),
  completed: z.boolean().default(false),
  score: z.number().min(0).max(100).nullable().optional(),
  lastPosition: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
});
export type LessonProgressUpdateRequest = z.infer<typeof LessonProgressUpdateSchema>;

export const LessonListQuerySchema = z.object({
  subject: z.string().min(1).optional(),
  difficulty: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(50).default(10),
  skip: z.coerce.number().int().min(0).default(0),
});

export const RecommendedLessonsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(10).default(3),
});

// Query strings carry booleans as text.
const QueryBoolean = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

export const UserLessonsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
  skip: z.coerce.number().int().min(0).default(0),
  includeCompleted: QueryBoolean,
});
