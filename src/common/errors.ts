import * as functions from 'firebase-functions';
import type { ZodError } from 'zod';

export const HttpsError = functions.https.HttpsError;
export type HttpsError = functions.https.HttpsError;

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === 'string' ? e : 'Unknown error';
}

/** Errors thrown by firebase-admin carry a string `code` such as `auth/user-not-found`. */
export function firebaseErrorCode(e: unknown): string | null {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return null;
}

export function validationError(error: ZodError): HttpsError {
  const issues = error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message)).join('; ');
  return new HttpsError('invalid-argument', summary || 'Invalid request', { issues });
}

/**
 * Converts anything thrown inside a handler into an HttpsError. Errors that
 * already are one pass through untouched; everything else is `internal`.
 * Request payloads become `invalid-argument` earlier, in `parseWith`.
 */
export function toHttpsError(e: unknown, fallbackMessage = 'Internal server error'): HttpsError {
  if (e instanceof HttpsError) return e;
  return new HttpsError('internal', fallbackMessage);
}
