import { timingSafeEqual } from 'node:crypto';
import type { RequestHandler } from 'express';
import { forbidden, unauthorized } from '../errors.js';

export const API_KEY_HEADER = 'x-api-key';

function sameKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireApiKey(expected: string | null): RequestHandler {
  return (req, _res, next) => {
    const provided = req.get(API_KEY_HEADER);
    if (!provided) {
      return next(unauthorized());
    }

    if (!expected) {
      return next(unauthorized('server misconfiguration'));
    }

    if (!sameKey(provided, expected)) {
      return next(forbidden('invalid api key'));
    }

    return next();
  };
}
