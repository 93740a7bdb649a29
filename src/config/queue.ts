import { Queue } from 'bullmq';
import { env } from './env';
import { NotificationChannel } from '../types/booking';
import { AppointmentNotice } from '../services/notification.service';
import { logger } from '../utils/logger';

const redisUrl = new URL(env.REDIS_URL);

export const connection = {
  host: redisUrl.hostname,
  port: Number(redisUrl.port || 6379),
  password: redisUrl.password ? decodeURIComponent(redisUrl.password) : undefined,
};

export const REMINDER_QUEUE = 'appointment-reminders';

export interface ReminderJobData {
  channel: NotificationChannel;
  eventId: string;
  notice: AppointmentNotice;
}

let reminderQueue: Queue<ReminderJobData> | null = null;

function getReminderQueue(): Queue<ReminderJobData> {
  if (!reminderQueue) {
    reminderQueue = new Queue<ReminderJobData>(REMINDER_QUEUE, { connection });
  }
  return reminderQueue;
}

/** Queues one delayed reminder; rejects when the queue is unreachable. */
export async function addReminderJob(data: ReminderJobData, delayMs: number): Promise<void> {
  await getReminderQueue().add('remind', data, {
    jobId: `${data.eventId}-${data.channel}`,
    delay: Math.max(0, delayMs),
    attempts: 3,
    backoff: { type: 'exponential', delay: 5000 },
    removeOnComplete: 100,
    removeOnFail: 500,
  });
  logger.info('Reminder job queued', { eventId: data.eventId, channel: data.channel, delayMs });
}

export async function closeReminderQueue(): Promise<void> {
  if (reminderQueue) {
    await reminderQueue.close();
    reminderQueue = null;
  }
}
