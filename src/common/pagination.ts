export const DEFAULT_HISTORY_LIMIT = 20;

/** Offset pagination over an already ordered list. */
export function paginate<T>(items: readonly T[], skip: number, limit: number): T[] {
  if (limit <= 0) return [];
  const start = Math.max(0, skip);
  return items.slice(start, start + limit);
}
