import winston from 'winston';
import { env } from '../config/env';

const production = env.NODE_ENV === 'production' || env.NODE_ENV === 'staging';

// Callers' phone numbers and emails end up in metadata; keep only the last digits in production
const maskContact = winston.format((info) => {
  if (!production) return info;
  for (const key of ['to', 'from', 'phone', 'callerNumber', 'email']) {
    const value = info[key];
    if (typeof value === 'string' && value.length > 4) {
      info[key] = `***${value.slice(-4)}`;
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: env.LOG_LEVEL ?? (production ? 'info' : 'debug'),
  silent: env.NODE_ENV === 'test',
  format: winston.format.combine(
    maskContact(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    production ? winston.format.json() : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: { service: 'call-assistant-backend' },
  transports: [new winston.transports.Console()],
});
