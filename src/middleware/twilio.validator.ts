import { Request, Response, NextFunction, RequestHandler } from 'express';
import twilio from 'twilio';
import { env } from '../config/env';
import { logger } from '../utils/logger';

export interface TwilioValidationOptions {
  enabled: boolean;
  authToken?: string;
  /** Public URL Twilio was given; the signature covers it, not the local host. */
  baseUrl: string;
}

export function twilioWebhookValidator(options: Partial<TwilioValidationOptions> = {}): RequestHandler {
  const enabled = options.enabled ?? !(env.NODE_ENV === 'development' || env.NODE_ENV === 'test');
  const authToken = options.authToken ?? env.TWILIO_AUTH_TOKEN;
  const baseUrl = (options.baseUrl ?? env.WEBHOOK_BASE_URL).replace(/\/+$/, '');

  return (req: Request, res: Response, next: NextFunction) => {
    if (!enabled) {
      return next();
    }

    const signature = req.header('x-twilio-signature');
    if (!signature) {
      logger.warn('Call webhook without Twilio signature', { path: req.path });
      return res.status(403).json({ error: 'Missing signature' });
    }

    if (!authToken) {
      logger.warn('Twilio auth token not configured, rejecting call webhook');
      return res.status(503).json({ error: 'Twilio not configured' });
    }

    const url = `${baseUrl}${req.originalUrl}`;
    if (!twilio.validateRequest(authToken, signature, url, req.body ?? {})) {
      logger.warn('Invalid Twilio signature', { url, callSid: req.body?.CallSid });
      return res.status(403).json({ error: 'Invalid signature' });
    }

    next();
  };
}

export const validateTwilioWebhook = twilioWebhookValidator();
