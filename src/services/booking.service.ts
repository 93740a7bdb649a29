import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import {
  Booking,
  BookingRequest,
  BookingResult,
  ConfirmationOutcome,
  NotificationChannel,
} from '../types/booking';
import { CalendarAdapter, CalendarCreateResult } from '../types/calendar';
import { GoogleCalendarAdapter } from './calendar/google.adapter';
import { NotificationService } from './notification.service';
import { ReminderService } from './reminder.service';
import { MEETING_MINUTES } from './slot.service';
import { env } from '../config/env';
import { endSentence, fromLocalIso, spokenDateTime, toLocalIso } from '../utils/time';
import { logger } from '../utils/logger';

export interface ConfirmationSender {
  sendConfirmation(booking: Booking): Promise<ConfirmationOutcome>;
}

export interface ReminderScheduler {
  schedule(booking: Booking): Promise<NotificationChannel[]>;
}

export interface BookingDependencies {
  calendar: CalendarAdapter;
  confirmations: ConfirmationSender;
  reminders: ReminderScheduler;
}

export interface BookingOptions {
  timezone: string;
  reminderLeadHours: number;
  clock: () => DateTime;
}

export const BOOKING_FAILED_MESSAGE =
  "I'm sorry, I wasn't able to book that appointment just now. Could we try a different time, or would you like someone from our team to call you back?";

const INVALID_TIME_MESSAGE =
  "Sorry, I didn't catch which time that was. Could you tell me the day and time again?";

function channelPhrase(channels: NotificationChannel[]): string {
  return channels.map((channel) => (channel === 'email' ? 'email' : 'text message')).join(' and ');
}

function leadPhrase(hours: number): string {
  if (hours === 24) return 'a day';
  if (hours % 24 === 0) return `${hours / 24} days`;
  return hours === 1 ? 'an hour' : `${hours} hours`;
}

/**
 * Create event → send confirmation → schedule reminder. Later stages never undo earlier
 * ones: a confirmation or reminder failure only softens the final message.
 */
export class BookingService {
  private calendar: CalendarAdapter;
  private confirmations: ConfirmationSender;
  private reminders: ReminderScheduler;
  private options: BookingOptions;

  constructor(deps: Partial<BookingDependencies> = {}, options: Partial<BookingOptions> = {}) {
    this.calendar = deps.calendar ?? new GoogleCalendarAdapter();
    if (deps.confirmations && deps.reminders) {
      this.confirmations = deps.confirmations;
      this.reminders = deps.reminders;
    } else {
      const notifications = new NotificationService();
      this.confirmations = deps.confirmations ?? notifications;
      this.reminders = deps.reminders ?? new ReminderService(notifications);
    }
    this.options = {
      timezone: options.timezone ?? env.BUSINESS_TIMEZONE,
      reminderLeadHours: options.reminderLeadHours ?? env.REMINDER_LEAD_HOURS,
      clock: options.clock ?? (() => DateTime.now().setZone(env.BUSINESS_TIMEZONE)),
    };
  }

  async finalize(request: BookingRequest): Promise<BookingResult> {
    const { timezone } = this.options;
    const start = fromLocalIso(request.start, timezone);

    if (!start.isValid) {
      logger.warn('Booking rejected: unparseable start time', { start: request.start });
      return this.notBooked(INVALID_TIME_MESSAGE);
    }

    const end = start.plus({ minutes: MEETING_MINUTES });
    if (request.end && request.end !== toLocalIso(end)) {
      logger.warn('Meeting length is fixed, adjusting end time', { requestedEnd: request.end, end: toLocalIso(end) });
    }

    const created = await this.createEvent(request, start, end);
    if (!created.success) {
      logger.warn('Booking halted at calendar stage', { error: created.error });
      return this.notBooked(BOOKING_FAILED_MESSAGE);
    }

    const booking: Booking = Object.freeze({
      eventId: created.eventId || uuidv4(),
      summary: request.summary,
      start: toLocalIso(start),
      end: toLocalIso(end),
      timezone,
      attendee: Object.freeze({ ...request.attendee }),
      reminderPreference: request.reminderPreference,
      description: request.description ?? '',
    });

    const confirmationChannels = await this.confirm(booking);
    const reminderChannels = await this.remind(booking);

    const result: BookingResult = {
      booked: true,
      confirmed: confirmationChannels.sent.length > 0,
      reminderScheduled: reminderChannels.length > 0,
      eventId: booking.eventId,
      confirmationChannels: confirmationChannels.sent,
      reminderChannels,
      message: this.composeMessage(booking, start, confirmationChannels, reminderChannels),
    };

    logger.info('Booking finalized', {
      eventId: booking.eventId,
      confirmed: result.confirmed,
      reminderScheduled: result.reminderScheduled,
    });

    return result;
  }

  private async createEvent(request: BookingRequest, start: DateTime, end: DateTime): Promise<CalendarCreateResult> {
    const { name, phone, email } = request.attendee;
    const description = [request.description, `Attendee: ${name} | ${phone} | ${email}`]
      .filter((part): part is string => Boolean(part))
      .join('\n\n');

    try {
      return await this.calendar.createEvent({
        summary: request.summary,
        start: toLocalIso(start),
        end: toLocalIso(end),
        timezone: this.options.timezone,
        description,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Calendar create threw', { error: message });
      return { success: false, error: message };
    }
  }

  private async confirm(booking: Booking): Promise<{ sent: NotificationChannel[]; failed: boolean }> {
    try {
      const outcome = await this.confirmations.sendConfirmation(booking);
      const channels: NotificationChannel[] = ['email', 'sms'];
      return {
        sent: channels.filter((channel) => outcome[channel] === 'sent'),
        failed: channels.some((channel) => outcome[channel] === 'failed'),
      };
    } catch (error: unknown) {
      logger.warn('Booking confirmation failed, booking kept', {
        eventId: booking.eventId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { sent: [], failed: true };
    }
  }

  private async remind(booking: Booking): Promise<NotificationChannel[]> {
    if (booking.reminderPreference === 'none') return [];

    try {
      return await this.reminders.schedule(booking);
    } catch (error: unknown) {
      logger.warn('Reminder scheduling failed, booking kept', {
        eventId: booking.eventId,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private composeMessage(
    booking: Booking,
    start: DateTime,
    confirmation: { sent: NotificationChannel[]; failed: boolean },
    reminderChannels: NotificationChannel[]
  ): string {
    const when = spokenDateTime(start, this.options.clock());
    const parts = [`Perfect, you're booked! I've scheduled "${booking.summary}" for ${endSentence(when)}`];

    if (confirmation.sent.length > 0) {
      parts.push(`I've sent a confirmation by ${channelPhrase(confirmation.sent)}.`);
    } else if (confirmation.failed) {
      parts.push("I couldn't send the confirmation message just now, but it's definitely on our calendar.");
    }

    if (reminderChannels.length > 0) {
      parts.push(
        `You'll get a reminder by ${channelPhrase(reminderChannels)} ${leadPhrase(this.options.reminderLeadHours)} before.`
      );
    } else if (booking.reminderPreference !== 'none') {
      parts.push("I wasn't able to set up the reminder, so please make a note of the time.");
    }

    return parts.join(' ');
  }

  private notBooked(message: string): BookingResult {
    return {
      booked: false,
      confirmed: false,
      reminderScheduled: false,
      message,
      confirmationChannels: [],
      reminderChannels: [],
    };
  }
}
