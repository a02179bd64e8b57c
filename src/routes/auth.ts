import { Router, type NextFunction, type Request, type Response } from 'express';
import * as logger from 'firebase-functions/logger';
import { errorMessage, firebaseErrorCode, HttpsError } from '../common/errors';
import { parseWith, UserCreateSchema, VerifyTokenSchema } from '../schemas';
import type { IdentityProvider } from '../services/identity';
import type { UserService } from '../services/users';

/**
 * Sign-up and token checks. Both are thin passthroughs to the identity
 * provider; everything else about sign-in happens client side.
 */
export function createAuthRoutes(identity: IdentityProvider, users: UserService): Router {
  const router = Router();

  router.post('/signup', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseWith(UserCreateSchema, req.body);
      let uid: string;
      try {
        ({ uid } = await identity.createUser(body));
      } catch (e) {
        const code = firebaseErrorCode(e);
        logger.error('Identity error during signup', { email: body.email, code, error: errorMessage(e) });
        if (code === 'auth/email-already-exists') throw new HttpsError('already-exists', 'Email already registered');
        if (code?.startsWith('auth/')) throw new HttpsError('invalid-argument', `Failed to create user: ${errorMessage(e)}`);
        throw e;
      }
      await users.createUserProfile(uid, body.email, body.displayName, body.preferences);
      const token = await identity.createCustomToken(uid);
      logger.info('User signed up', { uid });
      res.status(201).json({ uid, email: body.email, displayName: body.displayName, token });
    } catch (e) {
      next(e);
    }
  });

  router.post('/verify-token', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { token } = parseWith(VerifyTokenSchema, req.body);
      try {
        const { uid } = await identity.verifyIdToken(token);
        res.json({ uid });
      } catch (e) {
        logger.warn('Token verification failed', { error: errorMessage(e) });
        throw new HttpsError('unauthenticated', 'Invalid or expired token');
      }
    } catch (e) {
      next(e);
    }
  });

  return router;
}
