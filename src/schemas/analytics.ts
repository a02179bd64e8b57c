import { z } from 'zod';
import { DEFAULT_HISTORY_LIMIT } from '../common/pagination';

export const TIME_RANGES = ['day', 'week', 'month', 'year'] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

export const AnalyticsPageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(DEFAULT_HISTORY_LIMIT),
  skip: z.coerce.number().int().min(0).default(0),
});

/** An unknown or missing range falls back to the current week. */
export const DashboardQuerySchema = z.object({
  timeRange: z.enum(TIME_RANGES).catch('week'),
});
