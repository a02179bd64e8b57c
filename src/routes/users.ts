import { Router, type NextFunction, type Request, type Response } from 'express';
import { HttpsError } from '../common/errors';
import { currentUser } from '../middleware/auth';
import { LearningProgressUpdateSchema, parseWith, UserProfileUpdateSchema } from '../schemas';
import type { IdentityProvider } from '../services/identity';
import { getLearningProgressResponse, type UserService } from '../services/users';
import type { AuthUser, UserProfile } from '../types/user';

function toProfileResponse(user: AuthUser, profile: UserProfile) {
  return {
    uid: user.uid,
    email: user.email || profile.email,
    displayName: profile.displayName,
    avatarUrl: profile.avatarUrl,
    preferences: profile.preferences,
    createdAt: profile.createdAt,
  };
}

/**
 * Profile and progress of the calling user. Mount behind `requireAuth`.
 */
export function createUserRoutes(users: UserService, identity: IdentityProvider): Router {
  const router = Router();

  router.get('/me', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = currentUser(req);
      const profile = await users.getUserProfile(user.uid);
      if (!profile) throw new HttpsError('not-found', 'User profile not found');
      res.json(toProfileResponse(user, profile));
    } catch (e) {
      next(e);
    }
  });

  router.put('/me', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = currentUser(req);
      const update = parseWith(UserProfileUpdateSchema, req.body);
      const profile = await users.updateUserProfile(user.uid, update);
      // Keep the identity provider's display name in step with the profile.
      if (update.displayName) await identity.updateDisplayName(user.uid, update.displayName);
      res.json(toProfileResponse(user, profile));
    } catch (e) {
      next(e);
    }
  });

  router.get('/me/progress', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      res.json(await getLearningProgressResponse(users, uid));
    } catch (e) {
      next(e);
    }
  });

  router.put('/me/progress', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { uid } = currentUser(req);
      const update = parseWith(LearningProgressUpdateSchema, req.body);
      res.json(await users.updateLearningProgress(uid, update));
    } catch (e) {
      next(e);
    }
  });

  return router;
}
