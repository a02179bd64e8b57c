import type { Express } from 'express';
import { createApp } from './app';
import { getAuthClient, getDb, initializeFirebase } from './common/firebase';
import type { Settings } from './config/settings';
import { createServices } from './services';
import { createGeminiGenerator } from './services/ai';
import { createFirebaseIdentity } from './services/identity';
import { createFirestoreRepositories } from './stores/firestore';

/** Wires the production app: Firestore storage, Firebase Auth and Gemini. */
export function buildApp(settings: Settings): Express {
  initializeFirebase(settings);
  return createApp({
    settings,
    services: createServices(createFirestoreRepositories(getDb()), createGeminiGenerator(settings.gemini)),
    identity: createFirebaseIdentity(getAuthClient()),
  });
}
