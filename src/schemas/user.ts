import { z } from 'zod';
import { CurrentLessonSchema } from '../types/user';

export const PASSWORD_RULES: Array<{ test: (password: string) => boolean; message: string }> = [
  { test: (p) => p.length >= 8, message: 'Password must be at least 8 characters' },
  { test: (p) => /[A-Z]/.test(p), message: 'Password must contain at least one uppercase letter' },
  { test: (p) => /[a-z]/.test(p), message: 'Password must contain at least one lowercase letter' },
  { test: (p) => /[0-9]/.test(p), message: 'Password must contain at least one number' },
];

/** Every failing rule is reported, not just the first. */
export const PasswordSchema = z.string().superRefine((password, ctx) => {
  for (const rule of PASSWORD_RULES) {
    if (!rule.test(password)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: rule.message });
  }
});

const DisplayNameSchema = z.string().trim().min(2).max(50);

export const UserCreateSchema = z.object({
  email: z.string().trim().email(),
  displayName: DisplayNameSchema,
  password: PasswordSchema,
  preferences: z.record(z.unknown()).default({}),
});
export type UserCreate = z.infer<typeof UserCreateSchema>;

export const UserProfileUpdateSchema = z
  .object({
    displayName: DisplayNameSchema.optional(),
    avatarUrl: z.string().url().nullable().optional(),
    preferences: z.record(z.unknown()).optional(),
  })
  .strict();
export type UserProfileUpdate = z.infer<typeof UserProfileUpdateSchema>;

export const LearningProgressUpdateSchema = z
  .object({
    currentLesson: CurrentLessonSchema.nullable().optional(),
    statistics: z.record(z.unknown()).optional(),
    totalTimeSpent: z.number().int().min(0).optional(),
  })
  .strict();
export type LearningProgressUpdateRequest = z.infer<typeof LearningProgressUpdateSchema>;

export const VerifyTokenSchema = z.object({ token: z.string().min(1) });
