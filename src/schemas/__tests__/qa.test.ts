import { describe, it, expect } from 'vitest';
import { LessonGenerateSchema, QAHistoryQuerySchema, QuestionRequestSchema } from '..';

describe('QuestionRequestSchema', () => {
  it('trims the question before checking its length', () => {
    expect(QuestionRequestSchema.safeParse({ question: '  Why?  ' }).success).toBe(false);
    expect(QuestionRequestSchema.parse({ question: '  Why is the sky blue?  ' })).toEqual({ question: 'Why is the sky blue?' });
  });

  it('caps the question at 1000 characters', () => {
    expect(QuestionRequestSchema.safeParse({ question: 'a'.repeat(1001) }).success).toBe(false);
  });
});

describe('QAHistoryQuerySchema', () => {
  it('coerces query-string numbers and applies defaults', () => {
    expect(QAHistoryQuerySchema.parse({ limit: '5' })).toEqual({ limit: 5, skip: 0 });
    expect(QAHistoryQuerySchema.parse({})).toEqual({ limit: 20, skip: 0 });
  });

  it('bounds the limit', () => {
    expect(QAHistoryQuerySchema.safeParse({ limit: '0' }).success).toBe(false);
    expect(QAHistoryQuerySchema.safeParse({ limit: '101' }).success).toBe(false);
  });
});

describe('LessonGenerateSchema', () => {
  const base = { subject: 'Math', topic: 'Fractions', durationMinutes: 30 };

  it('normalises the difficulty', () => {
    expect(LessonGenerateSchema.parse({ ...base, difficulty: ' Beginner ' }).difficulty).toBe('beginner');
  });

  it('lists the allowed difficulties on failure', () => {
    const result = LessonGenerateSchema.safeParse({ ...base, difficulty: 'expert' });
    expect(result.success ? [] : result.error.issues.map((i) => i.message)).toEqual([
      'Difficulty must be one of: beginner, intermediate, advanced',
    ]);
  });
});
