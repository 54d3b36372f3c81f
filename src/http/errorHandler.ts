import type { ErrorRequestHandler } from 'express';
import {
  CorruptStoreError,
  NotFoundError,
  PersistenceError,
  SleepDiaryError,
  ValidationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    issues?: string[];
  };
}

export interface ErrorResponse {
  status: number;
  body: ErrorBody;
}

// express.json() raises a SyntaxError tagged with this type on a malformed body
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: { code: error.code, message: error.message, issues: error.issues } } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: { code: error.code, message: error.message } } };
  }
  if (error instanceof CorruptStoreError || error instanceof PersistenceError) {
    return { status: 500, body: { error: { code: error.code, message: error.message } } };
  }
  if (error instanceof SleepDiaryError) {
    return { status: 500, body: { error: { code: error.code, message: error.message } } };
  }
  if (isBodyParseError(error)) {
    return {
      status: 400,
      body: { error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' } },
    };
  }
  return { status: 500, body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } } };
}

export function createErrorHandler(): ErrorRequestHandler {
  const logger = createLogger({ component: 'errorHandler' });

  return (err, req, res, _next) => {
    const { status, body } = toErrorResponse(err);
    const requestId = res.getHeader('x-request-id');
    if (status >= 500) {
      logger.error({ error: err, requestId, method: req.method, path: req.path }, 'Request failed');
    } else {
      logger.warn({ code: body.error.code, requestId, method: req.method, path: req.path }, body.error.message);
    }
    res.status(status).json(body);
  };
}
