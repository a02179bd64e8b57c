import type { RequestHandler } from 'express';
import * as logger from 'firebase-functions/logger';
import type { LogLevel } from '../config/settings';

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 0, INFO: 1, WARNING: 2, ERROR: 3 };

export function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'ERROR';
  if (status >= 400) return 'WARNING';
  return 'INFO';
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export function requestLogger(minLevel: LogLevel): RequestHandler {
  return (req, res, next) => {
    const started = process.hrtime.bigint();
    res.on('finish', () => {
      const level = levelForStatus(res.statusCode);
      if (!shouldLog(level, minLevel)) return;
      const entry = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Number(process.hrtime.bigint() - started) / 1e6,
      };
      const line = `${req.method} ${req.originalUrl} ${res.statusCode}`;
      if (level === 'ERROR') logger.error(line, entry);
      else if (level === 'WARNING') logger.warn(line, entry);
      else logger.info(line, entry);
    });
    next();
  };
}
