import type { NextFunction, Request, RequestHandler, Response } from 'express';
import * as logger from 'firebase-functions/logger';
import { errorMessage, HttpsError } from '../common/errors';
import type { IdentityProvider } from '../services/identity';
import type { AuthUser } from '../types/user';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

const BEARER = /^Bearer\s+(\S+)$/i;

export function bearerToken(header: string | undefined): string | null {
  const match = header ? BEARER.exec(header.trim()) : null;
  return match ? match[1] : null;
}

function credentialsError(): HttpsError {
  return new HttpsError('unauthenticated', 'Could not validate credentials');
}

/**
 * Verifies the `Authorization: Bearer <id token>` header and attaches the
 * caller to `req.user`. Any failure is a 401.
 */
export function requireAuth(identity: IdentityProvider): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    res.setHeader('WWW-Authenticate', 'Bearer');
    const token = bearerToken(req.get('Authorization'));
    if (!token) {
      next(credentialsError());
      return;
    }
    try {
      const { uid } = await identity.verifyIdToken(token);
      const user = await identity.getUser(uid);
      if (user.disabled) {
        logger.warn('Rejected token of disabled account', { uid });
        next(credentialsError());
        return;
      }
      req.user = user;
      res.removeHeader('WWW-Authenticate');
      next();
    } catch (e) {
      logger.warn('Token verification failed', { path: req.path, error: errorMessage(e) });
      next(credentialsError());
    }
  };
}

/** The authenticated caller; only valid behind `requireAuth`. */
export function currentUser(req: Request): AuthUser {
  if (!req.user) throw credentialsError();
  return req.user;
}
