import * as functions from 'firebase-functions';
import { buildApp } from './bootstrap';
import { getSettings } from './config/settings';

// The whole REST API is served by one HTTPS function.
const app = buildApp(getSettings());

export const api = functions.https.onRequest(app);

export { createApp } from './app';
export type { AppDeps } from './app';
