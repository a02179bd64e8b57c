import * as admin from 'firebase-admin';
import * as logger from 'firebase-functions/logger';
import { getSettings, type Settings } from '../config/settings';

// Process-wide handles, created on first use.
let app: admin.app.App | null = null;
let db: admin.firestore.Firestore | null = null;

export function initializeFirebase(settings: Settings = getSettings()): admin.app.App {
  if (app) return app;

  const existing = admin.apps.find((a): a is admin.app.App => a !== null);
  if (existing) {
    app = existing;
    return app;
  }

  const { projectId, clientEmail, privateKey, storageBucket } = settings.firebase;
  const useServiceAccount = Boolean(projectId && clientEmail && privateKey);
  const credential = useServiceAccount
    ? admin.credential.cert({ projectId, clientEmail, privateKey })
    : admin.credential.applicationDefault();

  app = admin.initializeApp({ credential, projectId, storageBucket });
  logger.info('Firebase initialized', {
    projectId: projectId ?? '(default)',
    credential: useServiceAccount ? 'service-account' : 'application-default',
  });
  return app;
}

export function getDb(): admin.firestore.Firestore {
  if (!db) db = initializeFirebase().firestore();
  return db;
}

export function getAuthClient(): admin.auth.Auth {
  return initializeFirebase().auth();
}
