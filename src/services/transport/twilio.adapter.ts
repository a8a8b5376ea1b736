import twilio from 'twilio';
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

export interface TwilioConfig {
  accountSid?: string;
  authToken?: string;
  phoneNumber?: string;
  webhookBaseUrl?: string;
  retryDelayMs?: number;
}

const inboundSchema = z.object({
  From: z.string().min(1),
  To: z.string().optional(),
  Body: z.string(),
  ProfileName: z.string().optional(),
});

const WHATSAPP_PREFIX = 'whatsapp:';

export class TwilioAdapter implements TransportAdapter {
  readonly channel = 'sms' as const;
  private client: ReturnType<typeof twilio>;
  private authToken: string;
  private phoneNumber: string;

  constructor(private config: TwilioConfig) {
    if (!config.accountSid || !config.authToken || !config.phoneNumber) {
      throw new TransportError('twilio', 'init', new Error('Missing Twilio credentials'), false);
    }

    this.client = twilio(config.accountSid, config.authToken);
    this.authToken = config.authToken;
    this.phoneNumber = config.phoneNumber;
  }

  async sendText(conversationId: string, text: string, _options: SendOptions = {}): Promise<boolean> {
    // WhatsApp-over-Twilio conversations must reply from the WhatsApp sender
    const from = conversationId.startsWith(WHATSAPP_PREFIX) ? `${WHATSAPP_PREFIX}${this.phoneNumber}` : this.phoneNumber;

    for (let attempt = 1; attempt <= SEND_ATTEMPTS; attempt++) {
      try {
        const result = await this.client.messages.create({ to: conversationId, from, body: text });
        logger.info('Message sent', { provider: 'twilio', to: conversationId, messageSid: result.sid, attempt });
        return true;
      } catch (error) {
        logger.warn('Twilio send failed', { to: conversationId, attempt, error: errorMessage(error) });
        if (attempt < SEND_ATTEMPTS) {
          await sendBackoff(attempt, this.config.retryDelayMs);
        }
      }
    }

    logger.error('Twilio send gave up', { to: conversationId });
    return false;
  }

  parseInbound(payload: unknown): InboundMessage[] {
    const parsed = inboundSchema.safeParse(payload);
    if (!parsed.success) return [];

    const { From: from, Body: body, ProfileName: profileName } = parsed.data;
    const phone = from.startsWith(WHATSAPP_PREFIX) ? from.slice(WHATSAPP_PREFIX.length) : from;
    return [
      {
        conversationId: from,
        text: body,
        displayName: profileName || phone,
        senderPhone: phone,
        timestamp: new Date(),
        provider: 'twilio',
      },
    ];
  }

  validateWebhook(req: WebhookRequest): boolean {
    const signature = req.headers['x-twilio-signature'];
    const baseUrl = this.config.webhookBaseUrl || '';

    if (typeof signature !== 'string' || !baseUrl) {
      return false;
    }

    const url = `${baseUrl}${req.originalUrl}`;
    return twilio.validateRequest(this.authToken, signature, url, req.body);
  }
}
