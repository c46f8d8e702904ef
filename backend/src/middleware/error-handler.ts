import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('api');

// body-parser tags its failures with a `type` such as 'entity.parse.failed'.
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'invalid_request',
      issues: err.issues,
    });
  }

  if (isBodyParseError(err)) {
    return res.status(400).json({
      message: 'invalid_json',
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  logger.error('Unhandled error', err);
  return res.status(500).json({
    message: 'internal_error',
  });
};
