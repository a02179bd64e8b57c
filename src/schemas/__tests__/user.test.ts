import { describe, it, expect } from 'vitest';
import { parseWith, PasswordSchema, UserCreateSchema, UserProfileUpdateSchema } from '..';

const messages = (password: string) => {
  const result = PasswordSchema.safeParse(password);
  return result.success ? [] : result.error.issues.map((issue) => issue.message);
};

describe('PasswordSchema', () => {
  it('accepts a password meeting every rule', () => {
    expect(messages('Secret123')).toEqual([]);
  });

  it('requires eight characters', () => {
    expect(messages('Ab1')).toEqual(['Password must be at least 8 characters']);
  });

  it('counts line breaks towards the length', () => {
    expect(messages('Ab1\n\n\n\n\n')).toEqual([]);
  });

  it('requires an uppercase letter', () => {
    expect(messages('secret123')).toEqual(['Password must contain at least one uppercase letter']);
  });

  it('requires a lowercase letter', () => {
    expect(messages('SECRET123')).toEqual(['Password must contain at least one lowercase letter']);
  });

  it('requires a digit', () => {
    expect(messages('SecretPass')).toEqual(['Password must contain at least one number']);
  });

  it('reports every failing rule at once', () => {
    expect(messages('abc')).toEqual([
      'Password must be at least 8 characters',
      'Password must contain at least one uppercase letter',
      'Password must contain at least one number',
    ]);
  });
});

describe('UserCreateSchema', () => {
  it('trims fields and defaults preferences', () => {
    expect(
      parseWith(UserCreateSchema, { email: ' learner@example.com ', displayName: ' Test Learner ', password: 'Secret123' }),
    ).toEqual({ email: 'learner@example.com', displayName: 'Test Learner', password: 'Secret123', preferences: {} });
  });

  it('surfaces failures as invalid-argument with the field path', () => {
    expect(() => parseWith(UserCreateSchema, { email: 'learner@example.com', displayName: 'Test', password: 'secret123' })).toThrow(
      'password: Password must contain at least one uppercase letter',
    );
  });
});

describe('UserProfileUpdateSchema', () => {
  it('rejects fields that cannot be changed', () => {
    expect(UserProfileUpdateSchema.safeParse({ email: 'other@example.com' }).success).toBe(false);
  });
});
