import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { EngineError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') } });
    return;
  }
  // body-parser reports malformed JSON as a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: { code: 'INVALID_JSON', message: err.message } });
    return;
  }
  if (err instanceof EngineError) {
    logger.warn({ err, rid: req.rid }, 'request refused');
    res.status(err.status).json({ error: { code: err.code, message: err.message } });
    return;
  }
  logger.error({ err, rid: req.rid }, 'request error');
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'internal error' } });
};
