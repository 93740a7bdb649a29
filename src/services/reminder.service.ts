import { DateTime } from 'luxon';
import { Booking, NotificationChannel, ReminderPreference } from '../types/booking';
import { addReminderJob, ReminderJobData } from '../config/queue';
import { env } from '../config/env';
import { fromLocalIso } from '../utils/time';
import { logger } from '../utils/logger';
import { NotificationService, toNotice } from './notification.service';

export type EnqueueReminder = (data: ReminderJobData, delayMs: number) => Promise<void>;

export function channelsFor(preference: ReminderPreference): NotificationChannel[] {
  switch (preference) {
    case 'email':
      return ['email'];
    case 'sms':
      return ['sms'];
    case 'both':
      return ['email', 'sms'];
    case 'none':
      return [];
  }
}

export class ReminderService {
  constructor(
    private notifications: Pick<NotificationService, 'canDeliver'>,
    private enqueue: EnqueueReminder = addReminderJob,
    private leadHours: number = env.REMINDER_LEAD_HOURS,
    private clock: () => DateTime = () => DateTime.now()
  ) {}

  /**
   * Queues a reminder `leadHours` before the appointment on each requested channel that
   * can be delivered. Returns the channels actually queued; a channel whose enqueue fails is
   * left out. When the lead time has
   * already passed the reminder goes out immediately.
   */
  async schedule(booking: Booking): Promise<NotificationChannel[]> {
    const notice = toNotice(booking);
    const channels = channelsFor(booking.reminderPreference).filter((channel) =>
      this.notifications.canDeliver(channel, notice)
    );

    if (channels.length === 0) {
      logger.info('No deliverable reminder channel', {
        eventId: booking.eventId,
        preference: booking.reminderPreference,
      });
      return [];
    }

    const remindAt = fromLocalIso(booking.start, booking.timezone).minus({ hours: this.leadHours });
    const delayMs = remindAt.diff(this.clock()).as('milliseconds');

    const queued: NotificationChannel[] = [];
    for (const channel of channels) {
      try {
        await this.enqueue({ channel, eventId: booking.eventId, notice }, delayMs);
        queued.push(channel);
      } catch (error) {
        logger.warn('Reminder enqueue failed', {
          eventId: booking.eventId,
          channel,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (queued.length > 0) {
      logger.info('Reminder scheduled', { eventId: booking.eventId, channels: queued, remindAt: remindAt.toISO() });
    }
    return queued;
  }
}
