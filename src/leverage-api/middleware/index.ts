import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import { ZodError } from 'zod';
import { DomainError, UnknownFlagError } from '@engine';
import type { ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

/** Forwards a rejected handler promise to the error middleware. */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Caller-input defects map to 400; anything else is ours. */
export function statusFor(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof DomainError || err instanceof UnknownFlagError) return 400;
  if (err instanceof RangeError) return 400;
  return 500;
}

export function toErrorResponse(err: unknown): { status: number; body: ApiResponse<never> } {
  const message = err instanceof ZodError
    ? formatZodError(err)
    : err instanceof Error
      ? err.message
      : String(err);
  return { status: statusFor(err), body: { success: false, error: message } };
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    console.error('[ERROR]', body.error);
  }
  res.status(status).json(body);
}
