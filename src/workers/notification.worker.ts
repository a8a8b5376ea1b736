import { Worker, Job } from 'bullmq';
import { NOTIFICATION_QUEUE, NotificationJobData, redisConnection } from '../config/queue';
import { TransportAdapter } from '../services/transport/transport.adapter';
import { logger } from '../utils/logger';

export function createNotificationProcessor(transport: TransportAdapter) {
  return async function processNotification(job: Pick<Job<NotificationJobData>, 'data' | 'attemptsMade'>): Promise<void> {
    const { chatId, text } = job.data;
    logger.info('Processing notification', { chatId, attempt: job.attemptsMade + 1 });

    const delivered = await transport.sendText(chatId, text);
    if (!delivered) {
      // let bullmq retry the job with its own backoff
      throw new Error(`Notification to ${chatId} was not delivered`);
    }
  };
}

export function startNotificationWorker(redisUrl: string, transport: TransportAdapter): Worker<NotificationJobData> {
  const worker = new Worker<NotificationJobData>(NOTIFICATION_QUEUE, createNotificationProcessor(transport), {
    connection: redisConnection(redisUrl),
    concurrency: 5,
    limiter: { max: 20, duration: 1000 },
  });

  worker.on('completed', (job) => {
    logger.info('Notification job completed', { jobId: job.id, chatId: job.data.chatId });
  });

  worker.on('failed', (job, err) => {
    logger.error('Notification job failed', {
      jobId: job?.id,
      chatId: job?.data.chatId,
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  logger.info('Notification worker started');
  return worker;
}
