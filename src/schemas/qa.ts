import { z } from 'zod';
import { DEFAULT_HISTORY_LIMIT } from '../common/pagination';

export const QuestionRequestSchema = z.object({
  question: z.string().trim().min(5).max(1000),
  context: z.string().max(2000).nullable().optional(),
  lessonId: z.string().min(1).nullable().optional(),
});
export type QuestionRequest = z.infer<typeof QuestionRequestSchema>;

export const QAHistoryQuerySchema = z.object({
  lessonId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(DEFAULT_HISTORY_LIMIT),
  skip: z.coerce.number().int().min(0).default(0),
});
export type QAHistoryQuery = z.infer<typeof QAHistoryQuerySchema>;
