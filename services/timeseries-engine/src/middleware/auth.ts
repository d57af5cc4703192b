import type { Request, Response, NextFunction, RequestHandler } from 'express';

// Write and admin routes only; reads and ops endpoints stay open.
export function requireApiKey(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const headerKey = req.header('x-api-key');
    if (!headerKey || headerKey !== apiKey) {
      res.status(401).json({
        error: { code: 'AUTH_REQUIRED', message: 'invalid or missing x-api-key' }
      });
      return;
    }
    next();
  };
}
