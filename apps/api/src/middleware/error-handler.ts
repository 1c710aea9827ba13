import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

/** Error that carries the HTTP status it should be answered with. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// body-parser tags its errors (malformed JSON, oversized body) with a status
function clientStatusOf(err: Error): number | null {
  if (err instanceof HttpError) return err.status;
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof Error) {
    const status = clientStatusOf(err);
    if (status !== null) {
      res.status(status).json({ error: err.message });
      return;
    }
    console.error('[api] unhandled error', err);
    res.status(500).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
