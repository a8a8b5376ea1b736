import crypto from 'crypto';
import { z } from 'zod';
import {
  InboundMessage,
  SEND_ATTEMPTS,
  SendOptions,
  TransportAdapter,
  WebhookRequest,
  sendBackoff,
} from './transport.adapter';
import { HttpError, TransportError, errorMessage } from '../../utils/errors';
import { normalizePhone } from '../../utils/fields';
import { logger } from '../../utils/logger';

const GRAPH_BASE_URL = 'https://graph.facebook.com/v20.0';
const SEND_TIMEOUT_MS = 15_000;

export interface WhatsAppConfig {
  token?: string;
  phoneId?: string;
  verifyToken?: string;
  appSecret?: string;
  retryDelayMs?: number;
}

const webhookSchema = z.object({
  entry: z
    .array(
      z.object({
        changes: z
          .array(
            z.object({
              value: z
                .object({
                  contacts: z
                    .array(z.object({ wa_id: z.string().optional(), profile: z.object({ name: z.string().optional() }).optional() }))
                    .optional(),
                  messages: z
                    .array(
                      z.object({
                        from: z.string(),
                        type: z.string(),
                        timestamp: z.string().optional(),
                        text: z.object({ body: z.string() }).optional(),
                      })
                    )
                    .optional(),
                })
                .optional(),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

export class WhatsAppCloudAdapter implements TransportAdapter {
  readonly channel = 'whatsapp' as const;
  private token: string;
  private phoneId: string;

  constructor(private config: WhatsAppConfig) {
    if (!config.token || !config.phoneId) {
      throw new TransportError('whatsapp', 'init', new Error('Missing WhatsApp Cloud API credentials'), false);
    }

    this.token = config.token;
    this.phoneId = config.phoneId;
  }

  /** Meta's GET handshake; returns the challenge to echo, or null to refuse. */
  verifySubscription(mode: unknown, token: unknown, challenge: unknown): string | null {
    if (mode === 'subscribe' && typeof token === 'string' && token === this.config.verifyToken) {
      return typeof challenge === 'string' ? challenge : '';
    }
    return null;
  }

  async sendText(conversationId: string, text: string, _options: SendOptions = {}): Promise<boolean> {
    for (let attempt = 1; attempt <= SEND_ATTEMPTS; attempt++) {
      try {
        const res = await fetch(`${GRAPH_BASE_URL}/${this.phoneId}/messages`, {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${this.token}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            messaging_product: 'whatsapp',
            to: conversationId,
            text: { body: text },
          }),
          signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
        });

        if (!res.ok) {
          throw new HttpError(res.status, await res.text(), 'WhatsApp');
        }

        logger.info('Message sent', { provider: 'whatsapp', to: conversationId, attempt });
        return true;
      } catch (error) {
        logger.warn('WhatsApp send failed', { to: conversationId, attempt, error: errorMessage(error) });

        // 4xx other than throttling will not succeed on retry
        if (error instanceof HttpError && !error.retryable) break;
        if (attempt < SEND_ATTEMPTS) {
          await sendBackoff(attempt, this.config.retryDelayMs);
        }
      }
    }

    logger.error('WhatsApp send gave up', { to: conversationId });
    return false;
  }

  parseInbound(payload: unknown): InboundMessage[] {
    const parsed = webhookSchema.safeParse(payload);
    if (!parsed.success) return [];

    const inbound: InboundMessage[] = [];
    for (const entry of parsed.data.entry) {
      for (const change of entry.changes) {
        const value = change.value;
        for (const msg of value?.messages ?? []) {
          if (msg.type !== 'text' || !msg.text) continue;

          const contact = value?.contacts?.find((c) => c.wa_id === msg.from) ?? value?.contacts?.[0];
          inbound.push({
            conversationId: msg.from,
            text: msg.text.body,
            displayName: contact?.profile?.name || msg.from,
            senderPhone: normalizePhone(msg.from) ?? undefined,
            timestamp: msg.timestamp ? new Date(Number(msg.timestamp) * 1000) : new Date(),
            provider: 'whatsapp',
          });
        }
      }
    }
    return inbound;
  }

  validateWebhook(req: WebhookRequest): boolean {
    if (!this.config.appSecret) return true;

    const header = req.headers['x-hub-signature-256'];
    if (typeof header !== 'string' || !req.rawBody) return false;

    const received = Buffer.from(header.replace(/^sha256=/, ''));
    const expected = Buffer.from(
      crypto.createHmac('sha256', this.config.appSecret).update(req.rawBody).digest('hex')
    );
    return expected.length === received.length && crypto.timingSafeEqual(expected, received);
  }
}
