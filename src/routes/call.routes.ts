import { Router, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import twilio from 'twilio';
import { DateTime } from 'luxon';
import { env } from '../config/env';
import { apiKeyAuth } from '../middleware/auth';
import { validateTwilioWebhook } from '../middleware/twilio.validator';
import { CallStatusStore, isCallStatus } from '../services/call-status.service';
import { CallStatus } from '../types/call';
import { isWithinBusinessHours } from '../utils/businessHours';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const { VoiceResponse } = twilio.twiml;

export const HOLD_MESSAGE = 'Hello! Please wait a moment while I connect you to our assistant.';
export const FAILURE_MESSAGE = "Sorry, we're experiencing technical difficulties. Please try again later.";
export const TRANSFER_MESSAGE = 'Thank you for your patience. Connecting you now.';
export const GOODBYE_MESSAGE = 'Thank you for calling. Goodbye!';

export interface CallRouterOptions {
  statuses: Pick<CallStatusStore, 'get' | 'set' | 'clear'>;
  baseUrl: string;
  forwardingNumber?: string;
  timezone: string;
  clock: () => DateTime;
}

interface StatusReport {
  callSid: string;
  status: CallStatus;
}

export function mediaStreamUrl(baseUrl: string, callSid: string): string {
  const base = baseUrl.replace(/\/+$/, '').replace(/^http/, 'ws');
  return `${base}/media-stream/${encodeURIComponent(callSid)}`;
}

function bodyString(req: Request, field: string): string | undefined {
  const value: unknown = req.body?.[field];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function parseStatusReport(req: Request): StatusReport {
  const callSid = bodyString(req, 'call_sid');
  const status = bodyString(req, 'status');

  if (!callSid || !status) {
    throw new ValidationError('Missing call_sid or status');
  }
  if (!isCallStatus(status)) {
    throw new ValidationError(`Unknown status: ${status}`);
  }
  return { callSid, status };
}

function sendTwiml(res: Response, twiml: InstanceType<typeof VoiceResponse>) {
  res.type('text/xml').send(twiml.toString());
}

export function createCallRouter(options: Partial<CallRouterOptions> = {}): Router {
  const router = Router();
  const statuses = options.statuses ?? new CallStatusStore();
  const baseUrl = options.baseUrl ?? env.WEBHOOK_BASE_URL;
  const forwardingNumber = options.forwardingNumber ?? env.FORWARDING_NUMBER;
  const timezone = options.timezone ?? env.BUSINESS_TIMEZONE;
  const clock = options.clock ?? (() => DateTime.now());

  const statusLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 60,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // Twilio: inbound call, bridge audio to the voice agent
  router.post('/handle-call', validateTwilioWebhook, async (req: Request, res: Response) => {
    const callSid = bodyString(req, 'CallSid');
    const from = bodyString(req, 'From');
    const response = new VoiceResponse();

    if (!callSid) {
      logger.warn('Inbound call without CallSid');
      response.say(FAILURE_MESSAGE);
      response.hangup();
      return sendTwiml(res, response);
    }

    try {
      await statuses.set(callSid, 'in_progress');

      response.say(HOLD_MESSAGE);
      const connect = response.connect();
      connect.stream({ url: mediaStreamUrl(baseUrl, callSid), track: 'inbound_track' });

      logger.info('Inbound call connected to media stream', { callSid, from });
      return sendTwiml(res, response);
    } catch (error: unknown) {
      logger.error('Failed to handle inbound call', {
        callSid,
        error: error instanceof Error ? error.message : String(error),
      });
      const fallback = new VoiceResponse();
      fallback.say(FAILURE_MESSAGE);
      fallback.hangup();
      return sendTwiml(res, fallback);
    }
  });

  // Voice agent: final status before it hangs up
  router.post('/report-status', statusLimiter, apiKeyAuth, async (req: Request, res: Response) => {
    try {
      const { callSid, status } = parseStatusReport(req);
      await statuses.set(callSid, status);
      return res.json({ success: true });
    } catch (error: unknown) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      logger.error('Failed to store call status', {
        error: error instanceof Error ? error.message : String(error),
      });
      return res.status(503).json({ success: false, error: 'Status store unavailable' });
    }
  });

  // Twilio: media stream ended, transfer or hang up
  router.post('/agent-finished', validateTwilioWebhook, async (req: Request, res: Response) => {
    const callSid = bodyString(req, 'CallSid');
    const response = new VoiceResponse();

    const status = callSid ? await statuses.get(callSid) : 'completed_normally';

    // Outside business hours the caller was already given a contact channel instead
    const staffed = isWithinBusinessHours(clock(), timezone);

    if (status === 'escalation_requested' && forwardingNumber && staffed) {
      logger.info('Transferring call', { callSid, to: forwardingNumber });
      response.say(TRANSFER_MESSAGE);
      response.dial(forwardingNumber);
    } else {
      if (status === 'escalation_requested' && !staffed) {
        logger.info('Escalation requested outside business hours, not transferring', { callSid });
      } else if (status === 'escalation_requested') {
        logger.warn('Escalation requested but no forwarding number configured', { callSid });
      }
      logger.info('Hanging up call', { callSid });
      response.say(GOODBYE_MESSAGE);
      response.hangup();
    }

    if (callSid) {
      await statuses.clear(callSid);
    }

    return sendTwiml(res, response);
  });

  return router;
}
