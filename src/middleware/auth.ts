import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import { env } from '../config/env';
import { logger } from '../utils/logger';

export function parseApiKeys(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

function matches(candidate: string, key: string): boolean {
  const a = Buffer.from(candidate);
  const b = Buffer.from(key);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Guards the endpoints the voice agent calls back into (x-api-key header). */
export function requireApiKey(keys: string[] = parseApiKeys(env.API_KEYS)): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-api-key'];
    const apiKey = Array.isArray(header) ? header[0] : header;

    if (!apiKey) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (!keys.some((key) => matches(apiKey, key))) {
      logger.warn('Rejected API key', { path: req.path });
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}

export const apiKeyAuth = requireApiKey();
