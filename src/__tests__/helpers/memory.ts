import type { DocumentData } from 'firebase-admin/firestore';
import { vi } from 'vitest';
import type { AnswerGenerator } from '../../services/ai';
import type { IdentityProvider } from '../../services/identity';
import type { Repositories } from '../../stores/firestore';
import type { ListOptions, Repository } from '../../stores/types';
import type { ActivityRecord } from '../../types/activity';
import type { Lesson, LessonProgressRecord } from '../../types/lesson';
import type { QARecord } from '../../types/qa';
import type { AuthUser, LearningProgress, UserProfile } from '../../types/user';

function sortable(value: unknown): number | string {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number' || typeof value === 'string') return value;
  return String(value);
}

/** In-process stand-in for a Firestore collection. */
export class MemoryRepository<T extends DocumentData> implements Repository<T> {
  readonly docs = new Map<string, T>();
  /** Every write in order, for asserting on write sequencing. */
  readonly writes: Array<{ op: 'set' | 'update'; id: string; data: Partial<T> }> = [];
  private counter = 0;

  constructor(private readonly prefix = 'doc') {}

  newId(): string {
    this.counter += 1;
    return `${this.prefix}-${this.counter}`;
  }

  async get(id: string): Promise<T | null> {
    const doc = this.docs.get(id);
    return doc ? structuredClone(doc) : null;
  }

  async set(id: string, value: T): Promise<void> {
    this.writes.push({ op: 'set', id, data: structuredClone(value) });
    this.docs.set(id, structuredClone(value));
  }

  async update(id: string, patch: Partial<T>): Promise<void> {
    const current = this.docs.get(id);
    if (!current) throw new Error(`NOT_FOUND: no document to update: ${id}`);
    this.writes.push({ op: 'update', id, data: structuredClone(patch) });
    this.docs.set(id, { ...current, ...structuredClone(patch) });
  }

  async list(options: ListOptions<T> = {}): Promise<T[]> {
    const filters = Object.entries(options.where ?? {}).filter(([, v]) => v !== undefined);
    const matches = [...this.docs.values()].filter((doc) => filters.every(([k, v]) => doc[k] === v));
    const { orderBy } = options;
    if (orderBy) {
      const sign = orderBy.direction === 'desc' ? -1 : 1;
      matches.sort((a, b) => {
        const x = sortable(a[orderBy.field]);
        const y = sortable(b[orderBy.field]);
        if (x === y) return 0;
        return x < y ? -sign : sign;
      });
    }
    return matches.map((doc) => structuredClone(doc));
  }
}

export function memoryRepositories() {
  return {
    users: new MemoryRepository<UserProfile>('user'),
    learningProgress: new MemoryRepository<LearningProgress>('progress'),
    qa: new MemoryRepository<QARecord>('qa'),
    lessons: new MemoryRepository<Lesson>('lesson'),
    lessonProgress: new MemoryRepository<LessonProgressRecord>('lp'),
    activity: new MemoryRepository<ActivityRecord>('activity'),
  } satisfies Repositories;
}

export function fakeGenerator() {
  return {
    generateAnswer: vi.fn<AnswerGenerator['generateAnswer']>().mockResolvedValue({
      answer: 'Photosynthesis turns light into chemical energy.',
      references: [{ title: 'Biology 101', source: 'textbook', url: null }],
    }),
    generateLessonContent: vi.fn<AnswerGenerator['generateLessonContent']>().mockResolvedValue({
      title: 'Fractions',
      summary: 'Adding and comparing fractions.',
      content: [{ title: 'Parts of a whole', content: 'A fraction names equal parts.', order: 1, type: 'text', mediaUrl: null }],
      exercises: [],
      resources: [],
      tags: ['math'],
    }),
  } satisfies AnswerGenerator;
}

export const TEST_USER: AuthUser = {
  uid: 'user-1',
  email: 'learner@example.com',
  displayName: 'Test Learner',
  emailVerified: true,
  disabled: false,
};

/** Accepts `test-token` for TEST_USER and rejects everything else. */
export function fakeIdentity(user: AuthUser = TEST_USER) {
  return {
    verifyIdToken: vi.fn<IdentityProvider['verifyIdToken']>(async (token) => {
      if (token !== 'test-token') throw new Error('auth/argument-error: invalid token');
      return { uid: user.uid };
    }),
    getUser: vi.fn<IdentityProvider['getUser']>(async () => user),
    createUser: vi.fn<IdentityProvider['createUser']>(async ({ email, displayName }) => ({
      uid: 'new-user',
      email,
      displayName,
      emailVerified: false,
      disabled: false,
    })),
    updateDisplayName: vi.fn<IdentityProvider['updateDisplayName']>(async () => undefined),
    createCustomToken: vi.fn<IdentityProvider['createCustomToken']>(async (uid) => `custom-token-for-${uid}`),
  } satisfies IdentityProvider;
}
