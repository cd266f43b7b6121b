import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { PipelineError } from '@feedgate/domain';

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
  if (err instanceof PipelineError) {
    if (err.status >= 500) console.error(`[api] ${err.code}: ${err.message}`);
    res.status(err.status).json({ error: err.code, message: err.message, retryable: err.retryable });
    return;
  }
  if (err instanceof RangeError) {
    res.status(400).json({ error: 'validation_error', message: err.message });
    return;
  }
  // body-parser errors carry their own status (400 malformed JSON, 413 too large)
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'Internal server error' });
}
