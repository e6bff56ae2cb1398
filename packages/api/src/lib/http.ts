import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodError } from 'zod';
import type { ServiceResult } from '../types/db.js';

/** Forward a rejected handler promise to the error middleware. */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

/** Send a service result: data on success, `{ error, code }` with its status otherwise. */
export function sendResult<T>(res: Response, result: ServiceResult<T>, successStatus = 200): void {
  if (!result.ok) {
    res.status(result.status).json({ error: result.error, code: result.code });
    return;
  }
  res.status(successStatus).json(result.data);
}

export function sendInvalid(res: Response, error: ZodError): void {
  res.status(400).json({ error: 'Invalid request', code: 'VALIDATION_ERROR', details: error.flatten() });
}
