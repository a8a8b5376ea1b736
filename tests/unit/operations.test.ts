const mockWorkerOn = jest.fn();
jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation((name: string) => ({
    name,
    add: jest.fn().mockResolvedValue({ id: 'job-1' }),
  })),
  Worker: jest.fn().mockImplementation(() => ({
    on: mockWorkerOn,
  })),
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { Queue, Worker } from 'bullmq';
import { NotificationJobData, addNotificationJob, createNotificationQueue } from '../../src/config/queue';
import {
  LoggingOperationsChannel,
  QueuedOperationsChannel,
  TransportOperationsChannel,
} from '../../src/services/operations.service';
import { TransportAdapter } from '../../src/services/transport/transport.adapter';
import { createNotificationProcessor, startNotificationWorker } from '../../src/workers/notification.worker';
import { logger } from '../../src/utils/logger';

function fakeTransport(sendText: jest.Mock): TransportAdapter {
  return {
    channel: 'telegram',
    sendText,
    parseInbound: () => [],
    validateWebhook: () => true,
  };
}

function job(data: NotificationJobData) {
  return { data, attemptsMade: 0 };
}

describe('Operations channels', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('sends notifications straight to the ops chat', async () => {
    const sendText = jest.fn().mockResolvedValue(true);

    await new TransportOperationsChannel(fakeTransport(sendText), '-100200').notify('New repair order #17');

    expect(sendText).toHaveBeenCalledWith('-100200', 'New repair order #17');
  });

  it('swallows delivery errors', async () => {
    const sendText = jest.fn().mockRejectedValue(new Error('network down'));
    const channel = new TransportOperationsChannel(fakeTransport(sendText), '-100200');

    await expect(channel.notify('New repair order #17')).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Operations notification failed', {
      chatId: '-100200',
      error: 'network down',
    });
  });

  it('queues notifications when a queue is configured', async () => {
    const add = jest.fn().mockResolvedValue({ id: 'job-1' });

    await new QueuedOperationsChannel({ add }, '-100200').notify('New repair order #17');

    expect(add).toHaveBeenCalledWith(
      'notify',
      { chatId: '-100200', text: 'New repair order #17' },
      expect.objectContaining({ attempts: 3 })
    );
  });

  it('does not surface queue failures', async () => {
    const add = jest.fn().mockRejectedValue(new Error('redis down'));

    await expect(new QueuedOperationsChannel({ add }, '-100200').notify('x')).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('Failed to queue notification job', { error: 'redis down' });
  });

  it('logs notifications when no ops chat exists', async () => {
    await new LoggingOperationsChannel().notify('New repair order #17');

    expect(logger.info).toHaveBeenCalledWith('Operations notification (no ops chat configured)', {
      text: 'New repair order #17',
    });
  });
});

describe('Notification queue and worker', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('creates the notifications queue on the given Redis', () => {
    createNotificationQueue('redis://localhost:6379');

    expect(Queue).toHaveBeenCalledWith('notifications', { connection: { url: 'redis://localhost:6379' } });
  });

  it('adds jobs with retry settings', async () => {
    const add = jest.fn().mockResolvedValue({ id: 'job-1' });

    await addNotificationJob({ add }, { chatId: '-100200', text: 'hello' });

    expect(add).toHaveBeenCalledWith(
      'notify',
      { chatId: '-100200', text: 'hello' },
      { attempts: 3, backoff: { type: 'exponential', delay: 1000 }, removeOnComplete: 100, removeOnFail: 500 }
    );
  });

  it('delivers a job through the transport', async () => {
    const sendText = jest.fn().mockResolvedValue(true);

    await createNotificationProcessor(fakeTransport(sendText))(job({ chatId: '-100200', text: 'hello' }));

    expect(sendText).toHaveBeenCalledWith('-100200', 'hello');
  });

  it('fails the job when delivery fails so it is retried', async () => {
    const sendText = jest.fn().mockResolvedValue(false);

    await expect(
      createNotificationProcessor(fakeTransport(sendText))(job({ chatId: '-100200', text: 'hello' }))
    ).rejects.toThrow('Notification to -100200 was not delivered');
  });

  it('starts a worker on the notifications queue', () => {
    startNotificationWorker('redis://localhost:6379', fakeTransport(jest.fn()));

    expect(Worker).toHaveBeenCalledWith('notifications', expect.any(Function), {
      connection: { url: 'redis://localhost:6379' },
      concurrency: 5,
      limiter: { max: 20, duration: 1000 },
    });
    expect(mockWorkerOn).toHaveBeenCalledWith('completed', expect.any(Function));
    expect(mockWorkerOn).toHaveBeenCalledWith('failed', expect.any(Function));
  });
});
