import { Booking, ConfirmationOutcome, DeliveryStatus, NotificationChannel } from '../types/booking';
import { EmailSender, SendGridAdapter } from './email/sendgrid.adapter';
import { SMSAdapter } from './sms/sms.adapter';
import { SMSFactory } from './sms/sms.factory';
import { env } from '../config/env';
import { fromLocalIso, spokenTime } from '../utils/time';
import { logger } from '../utils/logger';
import { countDigits, MIN_PHONE_DIGITS } from './contact.service';

export interface AppointmentNotice {
  summary: string;
  start: string;
  timezone: string;
  name: string;
  phone: string;
  email: string;
}

function displayTime(notice: AppointmentNotice): string {
  const start = fromLocalIso(notice.start, notice.timezone).setLocale('en');
  return `${start.toFormat('cccc, LLLL d')} at ${spokenTime(start)}`;
}

export function confirmationText(notice: AppointmentNotice, businessName: string = env.BUSINESS_NAME): string {
  return `Appointment confirmed: '${notice.summary}' with ${businessName} on ${displayTime(notice)} (${notice.timezone}).`;
}

export function reminderText(notice: AppointmentNotice, businessName: string = env.BUSINESS_NAME): string {
  return `Reminder: '${notice.summary}' with ${businessName} is coming up on ${displayTime(notice)} (${notice.timezone}).`;
}

export function toNotice(booking: Booking): AppointmentNotice {
  return {
    summary: booking.summary,
    start: booking.start,
    timezone: booking.timezone,
    name: booking.attendee.name,
    phone: booking.attendee.phone,
    email: booking.attendee.email,
  };
}

/** Email and SMS delivery; a channel without configuration or a recipient is skipped. */
export class NotificationService {
  constructor(
    private email: EmailSender = new SendGridAdapter(),
    private sms: SMSAdapter | null = SMSFactory.fromEnv()
  ) {}

  canDeliver(channel: NotificationChannel, notice: Pick<AppointmentNotice, 'phone' | 'email'>): boolean {
    if (channel === 'email') {
      return this.email.isConfigured() && notice.email.includes('@');
    }
    return this.sms !== null && countDigits(notice.phone) >= MIN_PHONE_DIGITS;
  }

  async sendConfirmation(booking: Booking): Promise<ConfirmationOutcome> {
    const notice = toNotice(booking);
    const text = confirmationText(notice);

    const [email, sms] = await Promise.all([
      this.deliver('email', notice, `Appointment confirmed: ${notice.summary}`, text),
      this.deliver('sms', notice, '', text),
    ]);

    logger.info('Booking confirmation processed', { eventId: booking.eventId, email, sms });
    return { email, sms };
  }

  async sendReminder(channel: NotificationChannel, notice: AppointmentNotice): Promise<DeliveryStatus> {
    const status = await this.deliver(channel, notice, `Reminder: ${notice.summary}`, reminderText(notice));
    if (status === 'failed') {
      throw new Error(`Reminder delivery over ${channel} failed`);
    }
    return status;
  }

  private async deliver(
    channel: NotificationChannel,
    notice: AppointmentNotice,
    subject: string,
    text: string
  ): Promise<DeliveryStatus> {
    if (!this.canDeliver(channel, notice)) {
      logger.debug('Notification channel skipped', { channel });
      return 'skipped';
    }

    try {
      if (channel === 'email') {
        await this.email.sendEmail(notice.email, subject, text);
      } else if (this.sms) {
        await this.sms.sendSMS(notice.phone, text);
      }
      return 'sent';
    } catch (error: unknown) {
      logger.warn('Notification delivery failed', {
        channel,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'failed';
    }
  }
}
