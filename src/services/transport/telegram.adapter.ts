import crypto from 'crypto';
import { Telegraf } from 'telegraf';
import { z } from 'zod';
import {
  InboundMessage,
  SEND_ATTEMPTS,
  SendOptions,
  TransportAdapter,
  WebhookRequest,
  sendBackoff,
} from './transport.adapter';
import { TransportError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface TelegramConfig {
  botToken?: string;
  webhookSecret?: string;
  retryDelayMs?: number;
}

const updateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      date: z.number().optional(),
      chat: z.object({ id: z.union([z.number(), z.string()]) }),
      from: z
        .object({
          id: z.number(),
          first_name: z.string().optional(),
          last_name: z.string().optional(),
          username: z.string().optional(),
        })
        .optional(),
      text: z.string().optional(),
    })
    .optional(),
});

type TelegramUser = NonNullable<NonNullable<z.infer<typeof updateSchema>['message']>['from']>;

export function telegramDisplayName(user?: TelegramUser): string {
  if (!user) return 'Telegram User';
  const name = [user.first_name ?? '', user.last_name ?? ''].filter((part) => part).join(' ').trim();
  return name || user.username || `id${user.id}`;
}

export class TelegramAdapter implements TransportAdapter {
  readonly channel = 'telegram' as const;
  private bot: Telegraf;
  private webhookSecret: string;
  private retryDelayMs?: number;

  constructor(config: TelegramConfig) {
    if (!config.botToken) {
      throw new TransportError('telegram', 'init', new Error('Missing Telegram bot token'), false);
    }
    if (!config.webhookSecret) {
      throw new TransportError('telegram', 'init', new Error('Missing Telegram webhook secret'), false);
    }

    this.bot = new Telegraf(config.botToken);
    this.webhookSecret = config.webhookSecret;
    this.retryDelayMs = config.retryDelayMs;
  }

  async registerWebhook(url: string): Promise<void> {
    await this.bot.telegram.setWebhook(url, { secret_token: this.webhookSecret });
    logger.info('Telegram webhook registered', { url });
  }

  async sendText(conversationId: string, text: string, options: SendOptions = {}): Promise<boolean> {
    for (let attempt = 1; attempt <= SEND_ATTEMPTS; attempt++) {
      try {
        await this.bot.telegram.sendMessage(conversationId, text, options.richFormatting ? { parse_mode: 'HTML' } : {});
        logger.info('Message sent', { provider: 'telegram', conversationId, attempt });
        return true;
      } catch (error) {
        logger.warn('Telegram send failed', { conversationId, attempt, error: errorMessage(error) });
        if (attempt < SEND_ATTEMPTS) {
          await sendBackoff(attempt, this.retryDelayMs);
        }
      }
    }

    logger.error('Telegram send gave up', { conversationId, attempts: SEND_ATTEMPTS });
    return false;
  }

  parseInbound(payload: unknown): InboundMessage[] {
    const parsed = updateSchema.safeParse(payload);
    if (!parsed.success || !parsed.data.message?.text) {
      return [];
    }

    const message = parsed.data.message;
    return [
      {
        conversationId: String(message.chat.id),
        text: message.text ?? '',
        displayName: telegramDisplayName(message.from),
        timestamp: message.date ? new Date(message.date * 1000) : new Date(),
        provider: 'telegram',
      },
    ];
  }

  validateWebhook(req: WebhookRequest): boolean {
    const header = req.headers['x-telegram-bot-api-secret-token'];
    if (typeof header !== 'string') return false;

    const expected = Buffer.from(this.webhookSecret);
    const received = Buffer.from(header);
    return expected.length === received.length && crypto.timingSafeEqual(expected, received);
  }
}
