import { JobsOptions, Queue } from 'bullmq';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const NOTIFICATION_QUEUE = 'notifications';

export interface NotificationJobData {
  chatId: string;
  text: string;
}

/** The subset of a bullmq Queue the notifier needs. */
export interface NotificationQueue {
  add(name: string, data: NotificationJobData, opts?: JobsOptions): Promise<unknown>;
}

export function redisConnection(redisUrl: string) {
  return { url: redisUrl };
}

export function createNotificationQueue(redisUrl: string): Queue<NotificationJobData> {
  return new Queue<NotificationJobData>(NOTIFICATION_QUEUE, { connection: redisConnection(redisUrl) });
}

export async function addNotificationJob(queue: NotificationQueue, data: NotificationJobData): Promise<void> {
  try {
    await queue.add('notify', data, {
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
      removeOnComplete: 100,
      removeOnFail: 500,
    });
    logger.info('Notification job queued', { chatId: data.chatId });
  } catch (error) {
    logger.error('Failed to queue notification job', { error: errorMessage(error) });
  }
}
