import { Client, ApiController } from '@bandwidth/messaging';
import { SMSAdapter, SMSConfig, SMS_MAX_ATTEMPTS, backoff } from './sms.adapter';
import { logger } from '../../utils/logger';
import { SMSError, toError } from '../../utils/errors';

export class BandwidthAdapter implements SMSAdapter {
  readonly provider = 'bandwidth' as const;
  private controller: ApiController;
  private accountId: string;
  private applicationId: string;
  private from: string;
  private retryDelayMs: number;

  constructor(config: SMSConfig) {
    const accountId = config.credentials.BANDWIDTH_ACCOUNT_ID;
    const apiToken = config.credentials.BANDWIDTH_API_TOKEN;
    const apiSecret = config.credentials.BANDWIDTH_API_SECRET;
    const applicationId = config.credentials.BANDWIDTH_APPLICATION_ID;
    const from = config.credentials.BANDWIDTH_PHONE_NUMBER;

    if (!accountId || !apiToken || !apiSecret || !applicationId || !from) {
      throw new SMSError('bandwidth', 'init', new Error('Missing Bandwidth credentials'), false);
    }

    this.accountId = accountId;
    this.applicationId = applicationId;
    this.from = from;
    this.retryDelayMs = config.retryDelayMs ?? 1000;

    const client = new Client({
      basicAuthUserName: apiToken,
      basicAuthPassword: apiSecret,
    });

    this.controller = new ApiController(client);
  }

  async sendSMS(to: string, message: string): Promise<void> {
    for (let attempt = 1; attempt <= SMS_MAX_ATTEMPTS; attempt++) {
      try {
        await this.controller.createMessage(this.accountId, {
          applicationId: this.applicationId,
          to: [to],
          from: this.from,
          text: message,
        });

        logger.info('SMS sent', { provider: this.provider, to, attempt });
        return;
      } catch (error: unknown) {
        const cause = toError(error);
        logger.warn('Bandwidth send failed', { to, attempt, error: cause.message });

        if (attempt === SMS_MAX_ATTEMPTS) {
          throw new SMSError(this.provider, 'sendSMS', cause, false);
        }

        await backoff(this.retryDelayMs, attempt);
      }
    }
  }
}
