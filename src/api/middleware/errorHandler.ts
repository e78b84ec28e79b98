import { ErrorRequestHandler } from 'express';
import { logger } from '../../config/logger';
import { statusForError } from '../../errors';

/** Last-resort JSON error responses, e.g. for bodies express.json() could not parse. */
export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  const bodyParserStatus: unknown = err?.status;
  const status = typeof bodyParserStatus === 'number' ? bodyParserStatus : statusForError(err);
  if (status >= 500) {
    logger.error('Unhandled request error', { error: err instanceof Error ? err.message : String(err) });
  }
  res.status(status).json({ error: status < 500 && err instanceof Error ? err.message : 'Internal server error' });
};
