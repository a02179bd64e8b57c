import { z } from 'zod';

export const ReferenceSchema = z.object({
  title: z.string(),
  source: z.string().default(''),
  url: z.string().nullable().default(null),
});
export type Reference = z.infer<typeof ReferenceSchema>;

export const QAStatusSchema = z.enum(['pending', 'completed', 'failed']);
export type QAStatus = z.infer<typeof QAStatusSchema>;

export const QARecordSchema = z.object({
  id: z.string(),
  userId: z.string(),
  question: z.string(),
  context: z.string().nullable(),
  lessonId: z.string().nullable(),
  status: QAStatusSchema,
  answer: z.string().nullable(),
  answerCreatedAt: z.date().nullable(),
  references: z.array(ReferenceSchema).default([]),
  createdAt: z.date(),
  error: z.string().optional(),
});
export type QARecord = z.infer<typeof QARecordSchema>;
