import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { TelemetryError } from '../errors.js';

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
  if (err instanceof TelemetryError) {
    res.status(err.status).json({ error: err.code.toLowerCase(), message: err.message });
    return;
  }
  if (err instanceof Error) {
    console.error('[api] unhandled error', err);
    res.status(500).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
