import { Worker, Job } from 'bullmq';
import { connection, REMINDER_QUEUE, ReminderJobData } from '../config/queue';
import { NotificationService } from '../services/notification.service';
import { DeliveryStatus } from '../types/booking';
import { logger } from '../utils/logger';

type ReminderJob = Pick<Job<ReminderJobData>, 'data' | 'attemptsMade'>;

export function createReminderProcessor(
  notifications: Pick<NotificationService, 'sendReminder'>
): (job: ReminderJob) => Promise<DeliveryStatus> {
  return async (job: ReminderJob): Promise<DeliveryStatus> => {
    const { channel, eventId, notice } = job.data;

    logger.info('Processing reminder', { eventId, channel, attempt: job.attemptsMade + 1 });

    // A failed delivery throws so bullmq retries with backoff
    const status = await notifications.sendReminder(channel, notice);
    if (status === 'skipped') {
      logger.warn('Reminder channel no longer deliverable', { eventId, channel });
    }
    return status;
  };
}

export function startReminderWorker(
  notifications: Pick<NotificationService, 'sendReminder'> = new NotificationService()
): Worker<ReminderJobData, DeliveryStatus> {
  const worker = new Worker<ReminderJobData, DeliveryStatus>(REMINDER_QUEUE, createReminderProcessor(notifications), {
    connection,
    concurrency: 5,
  });

  worker.on('completed', (job) => {
    logger.info('Reminder job completed', { jobId: job.id, status: job.returnvalue });
  });

  worker.on('failed', (job, err) => {
    logger.error('Reminder job failed', {
      jobId: job?.id,
      eventId: job?.data.eventId,
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  logger.info('Reminder worker started');
  return worker;
}
