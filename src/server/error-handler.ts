import type { ErrorRequestHandler } from 'express';
import { describeError } from '../utils/errors.js';

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  console.error(`[${String(res.locals.requestId ?? '-')}] ${req.method} ${req.originalUrl} failed: ${describeError(error)}`);
  if (res.headersSent) {
    next(error);
    return;
  }
  res.status(500).type('text/plain').send('Internal server error');
};
