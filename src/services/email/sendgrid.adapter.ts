import sgMail from '@sendgrid/mail';
import { env } from '../../config/env';
import { logger } from '../../utils/logger';
import { ExternalServiceError, toError } from '../../utils/errors';

export interface EmailSender {
  isConfigured(): boolean;
  sendEmail(to: string, subject: string, text: string, html?: string): Promise<void>;
}

export class SendGridAdapter implements EmailSender {
  constructor(
    private apiKey: string | undefined = env.SENDGRID_API_KEY,
    private fromEmail: string | undefined = env.SENDGRID_FROM_EMAIL
  ) {
    if (apiKey) {
      sgMail.setApiKey(apiKey);
    }
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey && this.fromEmail);
  }

  async sendEmail(to: string, subject: string, text: string, html?: string): Promise<void> {
    if (!this.apiKey || !this.fromEmail) {
      logger.warn('SendGrid not configured, skipping email', { subject });
      return;
    }

    try {
      await sgMail.send({
        to,
        from: this.fromEmail,
        subject,
        text,
        html: html || text,
      });

      logger.info('Email sent', { to, subject });
    } catch (error: unknown) {
      const failure = new ExternalServiceError('SendGrid', 'sendEmail', toError(error));
      logger.error('SendGrid email failed', { to, subject, error: failure.message });
      throw failure;
    }
  }
}
