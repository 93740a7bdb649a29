import { SMSAdapter, SMSConfig } from './sms.adapter';
import { TwilioAdapter } from './twilio.adapter';
import { BandwidthAdapter } from './bandwidth.adapter';
import { env } from '../../config/env';
import { logger } from '../../utils/logger';

export class SMSFactory {
  static create(config: SMSConfig): SMSAdapter {
    switch (config.provider) {
      case 'twilio':
        return new TwilioAdapter(config);
      case 'bandwidth':
        return new BandwidthAdapter(config);
    }
  }

  /** Adapter for the configured provider, or null when its credentials are absent. */
  static fromEnv(): SMSAdapter | null {
    try {
      return SMSFactory.create({
        provider: env.SMS_PROVIDER,
        credentials: {
          TWILIO_ACCOUNT_SID: env.TWILIO_ACCOUNT_SID,
          TWILIO_AUTH_TOKEN: env.TWILIO_AUTH_TOKEN,
          TWILIO_PHONE_NUMBER: env.TWILIO_PHONE_NUMBER,
          BANDWIDTH_ACCOUNT_ID: env.BANDWIDTH_ACCOUNT_ID,
          BANDWIDTH_API_TOKEN: env.BANDWIDTH_API_TOKEN,
          BANDWIDTH_API_SECRET: env.BANDWIDTH_API_SECRET,
          BANDWIDTH_APPLICATION_ID: env.BANDWIDTH_APPLICATION_ID,
          BANDWIDTH_PHONE_NUMBER: env.BANDWIDTH_PHONE_NUMBER,
        },
      });
    } catch (error: unknown) {
      logger.info('SMS provider not configured, text messages disabled', {
        provider: env.SMS_PROVIDER,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
