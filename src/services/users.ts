import * as logger from 'firebase-functions/logger';
import { errorMessage, HttpsError } from '../common/errors';
import type { Repository } from '../stores/types';
import {
  LearningProgressSchema,
  type LearningProgress,
  type UserProfile,
} from '../types/user';

export interface UserServiceDeps {
  users: Repository<UserProfile>;
  learningProgress: Repository<LearningProgress>;
  now?: () => Date;
}

export type ProfileUpdate = Partial<Pick<UserProfile, 'displayName' | 'avatarUrl' | 'preferences'>>;
export type LearningProgressUpdate = Partial<Omit<LearningProgress, 'lastActive'>>;

export function createUserService({ users, learningProgress, now = () => new Date() }: UserServiceDeps) {
  return {
    async createUserProfile(
      uid: string,
      email: string,
      displayName: string,
      preferences: Record<string, unknown> = {},
    ): Promise<UserProfile> {
      try {
        const timestamp = now();
        const profile: UserProfile = {
          uid,
          email,
          displayName,
          avatarUrl: null,
          preferences,
          createdAt: timestamp,
          updatedAt: timestamp,
        };
        await users.set(uid, profile);
        return profile;
      } catch (e) {
        logger.error('Error creating user profile', { uid, error: errorMessage(e) });
        throw e;
      }
    },

    async getUserProfile(uid: string): Promise<UserProfile | null> {
      try {
        return await users.get(uid);
      } catch (e) {
        logger.error('Error getting user profile', { uid, error: errorMessage(e) });
        throw e;
      }
    },

    async updateUserProfile(uid: string, update: ProfileUpdate): Promise<UserProfile> {
      try {
        const existing = await users.get(uid);
        if (!existing) throw new HttpsError('not-found', 'User profile not found');
        const patch = { ...update, updatedAt: now() };
        await users.update(uid, patch);
        return { ...existing, ...patch };
      } catch (e) {
        logger.error('Error updating user profile', { uid, error: errorMessage(e) });
        throw e;
      }
    },

    async getLearningProgress(uid: string): Promise<LearningProgress | null> {
      try {
        return await learningProgress.get(uid);
      } catch (e) {
        logger.error('Error getting learning progress', { uid, error: errorMessage(e) });
        throw e;
      }
    },

    /** Creates the progress document on first write. */
    async updateLearningProgress(uid: string, update: LearningProgressUpdate): Promise<LearningProgress> {
      try {
        const patch = { ...update, lastActive: now() };
        const existing = await learningProgress.get(uid);
        if (!existing) {
          const created = LearningProgressSchema.parse(patch);
          await learningProgress.set(uid, created);
          return created;
        }
        await learningProgress.update(uid, patch);
        return { ...existing, ...patch };
      } catch (e) {
        logger.error('Error updating learning progress', { uid, error: errorMessage(e) });
        throw e;
      }
    },
  };
}

export type UserService = ReturnType<typeof createUserService>;

/** Progress as returned to clients; a learner with no record gets the empty defaults. */
export async function getLearningProgressResponse(service: UserService, uid: string): Promise<LearningProgress> {
  const progress = await service.getLearningProgress(uid);
  return progress ?? LearningProgressSchema.parse({});
}
