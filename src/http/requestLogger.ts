import type { RequestHandler } from 'express';
import { createLogger, generateRequestId } from '../utils/logger.js';

export function createRequestLogger(): RequestHandler {
  const logger = createLogger({ component: 'http' });

  return (req, res, next) => {
    const requestId = generateRequestId();
    const requestLogger = logger.child({ requestId });
    const startedAt = Date.now();

    res.setHeader('x-request-id', requestId);
    requestLogger.info({ method: req.method, path: req.path }, 'Incoming request');
    res.on('finish', () => {
      requestLogger.info(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        'Request completed'
      );
    });
    next();
  };
}
