import { Request, Response, NextFunction } from 'express';
import { isSimError, type SimErrorKind } from '../errors';
import { createLogger } from '../logging';

const log = createLogger('Bridge');

const STATUS_BY_KIND: Record<SimErrorKind, number> = {
  InvalidAction: 400,
  EpisodeNotStarted: 409,
  ConfigurationError: 500,
  InvariantViolation: 500,
};

/**
 * Last handler in the chain. Simulator errors keep their kind in the body;
 * anything else is logged and reported as a bare 500.
 */
export const handleErrors = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (isSimError(err)) {
    const status = STATUS_BY_KIND[err.kind];
    if (status >= 500) {
      log.error(`${req.method} ${req.originalUrl} failed: ${err.kind}: ${err.message}`);
    }
    res.status(status).json({ error: err.message, kind: err.kind });
    return;
  }

  log.error(`${req.method} ${req.originalUrl} failed:`, err);
  res.status(500).json({ error: 'Internal server error' });
};
