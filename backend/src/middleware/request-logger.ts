/**
 * HTTP request logging
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../services/logging/index.js';

const logger = createLogger({ module: 'http' });

const DEBATE_PATH = /^\/api\/debates\/([^/]+)/;

/**
 * Debate id addressed by a request path, if any
 */
export function debateIdFromPath(path: string): string | undefined {
  return DEBATE_PATH.exec(path)?.[1];
}

export function getLogLevel(statusCode: number): 'info' | 'warn' | 'error' {
  if (statusCode >= 500) {
    return 'error';
  }
  return statusCode >= 400 ? 'warn' : 'info';
}

/**
 * One record per finished request; the request id is kept in res.locals
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const requestId = uuidv4();
  const path = req.path;
  res.locals.requestId = requestId;

  res.on('finish', () => {
    const durationMs = Date.now() - startTime;
    logger[getLogLevel(res.statusCode)]({
      requestId,
      method: req.method,
      path,
      debateId: debateIdFromPath(path),
      statusCode: res.statusCode,
      durationMs,
    }, `${req.method} ${path} ${res.statusCode} (${durationMs}ms)`);
  });

  next();
}

export function errorLogger(err: Error, req: Request, res: Response, next: NextFunction): void {
  const requestId: unknown = res.locals.requestId;
  logger.error({
    requestId: typeof requestId === 'string' ? requestId : undefined,
    method: req.method,
    path: req.path,
    err,
  }, `Request failed: ${err.message}`);

  next(err);
}
