import { Request, Response, NextFunction } from 'express';
import { AppError, ConfigurationError, ExternalServiceError, SMSError } from '../utils/errors';
import { env } from '../config/env';
import { logger } from '../utils/logger';

// body-parser marks unreadable JSON bodies with this type
function isMalformedBody(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ success: false, error: `No route for ${req.method} ${req.path}` });
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (isMalformedBody(err)) {
    logger.warn('Malformed request body', { path: req.path });
    return res.status(400).json({ success: false, error: 'Malformed JSON body' });
  }

  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  if (err instanceof SMSError) {
    return res.status(502).json({ success: false, error: 'SMS provider error' });
  }

  // Calendar, sheets, summaries or a provider without credentials
  if (err instanceof ExternalServiceError || err instanceof ConfigurationError) {
    return res.status(503).json({ success: false, error: 'Service temporarily unavailable' });
  }

  if (err instanceof AppError) {
    return res.status(err.statusCode).json({ success: false, error: err.message });
  }

  const message = env.NODE_ENV === 'production' ? 'Internal server error' : err.message;
  res.status(500).json({ success: false, error: message });
}
