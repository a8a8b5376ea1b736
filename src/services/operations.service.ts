import { NotificationQueue, addNotificationJob } from '../config/queue';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { TransportAdapter } from './transport/transport.adapter';

/** Staff-facing notifications. Best-effort: implementations never throw. */
export interface OperationsChannel {
  notify(text: string): Promise<void>;
}

export class TransportOperationsChannel implements OperationsChannel {
  constructor(
    private transport: TransportAdapter,
    private chatId: string
  ) {}

  async notify(text: string): Promise<void> {
    try {
      const delivered = await this.transport.sendText(this.chatId, text);
      if (!delivered) {
        logger.warn('Operations notification not delivered', { chatId: this.chatId });
      }
    } catch (error) {
      logger.warn('Operations notification failed', { chatId: this.chatId, error: errorMessage(error) });
    }
  }
}

export class QueuedOperationsChannel implements OperationsChannel {
  constructor(
    private queue: NotificationQueue,
    private chatId: string
  ) {}

  async notify(text: string): Promise<void> {
    await addNotificationJob(this.queue, { chatId: this.chatId, text });
  }
}

export class LoggingOperationsChannel implements OperationsChannel {
  async notify(text: string): Promise<void> {
    logger.info('Operations notification (no ops chat configured)', { text });
  }
}
