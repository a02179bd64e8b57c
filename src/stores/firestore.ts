import { Timestamp, type DocumentData, type Firestore, type Query } from 'firebase-admin/firestore';
import * as logger from 'firebase-functions/logger';
import type { z } from 'zod';
import { HttpsError } from '../common/errors';
import type { ActivityRecord } from '../types/activity';
import { ActivityRecordSchema } from '../types/activity';
import type { Lesson, LessonProgressRecord } from '../types/lesson';
import { LessonProgressRecordSchema, LessonSchema } from '../types/lesson';
import type { QARecord } from '../types/qa';
import { QARecordSchema } from '../types/qa';
import type { LearningProgress, UserProfile } from '../types/user';
import { LearningProgressSchema, UserProfileSchema } from '../types/user';
import type { ListOptions, Repository } from './types';

export const COLLECTIONS = {
  users: 'users',
  learningProgress: 'learningProgress',
  qa: 'qa',
  lessons: 'lessons',
  lessonProgress: 'lessonProgress',
  activity: 'userActivity',
} as const;

/** Firestore hands timestamps back as Timestamp; records carry Date. */
export function reviveTimestamps(value: unknown): unknown {
  if (value instanceof Timestamp) return value.toDate();
  if (Array.isArray(value)) return value.map(reviveTimestamps);
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, reviveTimestamps(v)]));
  }
  return value;
}

/** Firestore rejects undefined field values, so they are dropped before writing. */
export function toDocumentData(value: object): DocumentData {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

/** A stored document checked against its record schema; `null` when it does not match. */
export function readDocument<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  collection: string,
  id: string,
  data: unknown,
): T | null {
  const parsed = schema.safeParse(reviveTimestamps(data));
  if (parsed.success) return parsed.data;
  logger.warn('Stored document does not match its schema', {
    collection,
    id,
    issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
  return null;
}

export class FirestoreRepository<T extends DocumentData> implements Repository<T> {
  constructor(
    private readonly db: Firestore,
    private readonly collection: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  private get col() {
    return this.db.collection(this.collection);
  }

  newId(): string {
    return this.col.doc().id;
  }

  async get(id: string): Promise<T | null> {
    const snap = await this.col.doc(id).get();
    if (!snap.exists) return null;
    const record = readDocument(this.schema, this.collection, id, snap.data());
    if (!record) throw new HttpsError('internal', `Stored ${this.collection} document ${id} is invalid`);
    return record;
  }

  async set(id: string, value: T): Promise<void> {
    await this.col.doc(id).set(toDocumentData(value));
  }

  async update(id: string, patch: Partial<T>): Promise<void> {
    await this.col.doc(id).update(toDocumentData(patch));
  }

  async list(options: ListOptions<T> = {}): Promise<T[]> {
    let query: Query = this.col;
    for (const [field, value] of Object.entries(options.where ?? {})) {
      if (value !== undefined) query = query.where(field, '==', value);
    }
    if (options.orderBy) query = query.orderBy(options.orderBy.field, options.orderBy.direction);
    const snap = await query.get();
    // Documents that no longer match the schema are left out of listings.
    const records: T[] = [];
    for (const doc of snap.docs) {
      const record = readDocument(this.schema, this.collection, doc.id, doc.data());
      if (record) records.push(record);
    }
    return records;
  }
}

export interface Repositories {
  users: Repository<UserProfile>;
  learningProgress: Repository<LearningProgress>;
  qa: Repository<QARecord>;
  lessons: Repository<Lesson>;
  lessonProgress: Repository<LessonProgressRecord>;
  activity: Repository<ActivityRecord>;
}

export function createFirestoreRepositories(db: Firestore): Repositories {
  return {
    users: new FirestoreRepository(db, COLLECTIONS.users, UserProfileSchema),
    learningProgress: new FirestoreRepository(db, COLLECTIONS.learningProgress, LearningProgressSchema),
    qa: new FirestoreRepository(db, COLLECTIONS.qa, QARecordSchema),
    lessons: new FirestoreRepository(db, COLLECTIONS.lessons, LessonSchema),
    lessonProgress: new FirestoreRepository(db, COLLECTIONS.lessonProgress, LessonProgressRecordSchema),
    activity: new FirestoreRepository(db, COLLECTIONS.activity, ActivityRecordSchema),
  };
}
