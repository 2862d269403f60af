/**
 * Request correlation: every request carries an X-Request-ID, echoed from the
 * caller when present, generated otherwise. The id is exposed to handlers as
 * `res.locals.requestId` and returned on the response.
 */

import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export const REQUEST_ID_HEADER = 'X-Request-ID';

/** Accepted caller-supplied ids: short, printable, no whitespace */
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestId(req: Request, res: Response, next: NextFunction): void {
  const supplied = req.get(REQUEST_ID_HEADER);
  const id = supplied && REQUEST_ID_PATTERN.test(supplied) ? supplied : randomUUID();
  res.locals.requestId = id;
  res.set(REQUEST_ID_HEADER, id);
  next();
}

export function getRequestId(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : '';
}
