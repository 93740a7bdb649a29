import twilio from 'twilio';
import { SMSAdapter, SMSConfig, SMS_MAX_ATTEMPTS, backoff } from './sms.adapter';
import { logger } from '../../utils/logger';
import { SMSError, toError } from '../../utils/errors';

export class TwilioAdapter implements SMSAdapter {
  readonly provider = 'twilio' as const;
  private client: ReturnType<typeof twilio>;
  private from: string;
  private retryDelayMs: number;

  constructor(config: SMSConfig) {
    const accountSid = config.credentials.TWILIO_ACCOUNT_SID;
    const authToken = config.credentials.TWILIO_AUTH_TOKEN;
    const from = config.credentials.TWILIO_PHONE_NUMBER;

    if (!accountSid || !authToken || !from) {
      throw new SMSError('twilio', 'init', new Error('Missing Twilio credentials'), false);
    }

    this.client = twilio(accountSid, authToken);
    this.from = from;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
  }

  async sendSMS(to: string, message: string): Promise<void> {
    for (let attempt = 1; attempt <= SMS_MAX_ATTEMPTS; attempt++) {
      try {
        const result = await this.client.messages.create({ to, from: this.from, body: message });
        logger.info('SMS sent', { provider: this.provider, to, messageSid: result.sid, attempt });
        return;
      } catch (error: unknown) {
        const cause = toError(error);
        logger.warn('Twilio send failed', { to, attempt, error: cause.message });

        if (attempt === SMS_MAX_ATTEMPTS) {
          throw new SMSError(this.provider, 'sendSMS', cause, false);
        }

        await backoff(this.retryDelayMs, attempt);
      }
    }
  }
}
