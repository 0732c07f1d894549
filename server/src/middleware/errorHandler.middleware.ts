import { Request, Response, NextFunction } from 'express';
import { AppError, errorMessage } from '../utils/errors';
import { Logger, silentLogger } from '../utils/logger';

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/** Renders errors as `{ error, code }` JSON with the AppError status, else 500. */
export function createErrorHandler(logger: Logger = silentLogger) {
  // Express recognises error handlers by their four parameters
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'BAD_REQUEST' });
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}: ${errorMessage(err)}`);
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  };
}
