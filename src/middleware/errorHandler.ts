import type { ErrorRequestHandler, RequestHandler } from 'express';
import * as logger from 'firebase-functions/logger';
import { errorMessage, HttpsError, toHttpsError } from '../common/errors';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Last middleware: every error leaves as `{ error: { status, message, details? } }`. */
export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const httpsError = isBodyParseError(err)
      ? new HttpsError('invalid-argument', 'Malformed JSON body')
      : toHttpsError(err);
    const status = httpsError.httpErrorCode.status;
    const context = { method: req.method, path: req.originalUrl, status, code: httpsError.code };

    if (status >= 500) {
      logger.error('Request failed', { ...context, error: errorMessage(err) });
    } else {
      logger.warn('Request rejected', { ...context, error: httpsError.message });
    }
    if (res.headersSent) return;
    res.status(status).json({ error: httpsError.toJSON() });
  };
}

export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    res.status(404).json({
      error: { status: 'NOT_FOUND', message: `Route ${req.method} ${req.originalUrl} not found` },
    });
  };
}
