import type { NextFunction, Request, Response } from 'express';

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/** Parse a positive integer query parameter; `undefined` when absent, `null` when malformed. */
export function parseLimit(raw: unknown, max: number): number | undefined | null {
  if (raw === undefined) return undefined;
  if (typeof raw !== 'string') return null;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) return null;
  return Math.min(value, max);
}
