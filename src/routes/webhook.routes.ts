import { Router, Request, Response } from 'express';
import { BotService } from '../services/bot.service';
import { InboundMessage, TransportAdapter } from '../services/transport/transport.adapter';
import { TelegramAdapter } from '../services/transport/telegram.adapter';
import { TwilioAdapter } from '../services/transport/twilio.adapter';
import { WhatsAppCloudAdapter } from '../services/transport/whatsapp.adapter';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface WebhookDependencies {
  bot: BotService;
  telegram: TelegramAdapter | null;
  whatsapp: WhatsAppCloudAdapter | null;
  twilio: TwilioAdapter | null;
}

const EMPTY_TWIML = '<Response></Response>';

/** Runs each inbound message through the bot and sends the reply back on the same transport. */
export async function deliverReplies(bot: BotService, adapter: TransportAdapter, inbound: InboundMessage[]): Promise<void> {
  for (const message of inbound) {
    logger.info('Message received', { provider: message.provider, conversationId: message.conversationId });

    const reply = await bot.handleMessage({
      conversationId: message.conversationId,
      text: message.text,
      displayName: message.displayName,
      channel: adapter.channel,
      senderPhone: message.senderPhone,
    });

    const sent = await adapter.sendText(message.conversationId, reply.text, { richFormatting: reply.richFormatting });
    if (!sent) {
      logger.warn('Reply not delivered', { provider: message.provider, conversationId: message.conversationId });
    }
  }
}

export function createWebhookRouter(deps: WebhookDependencies): Router {
  const router = Router();
  const { bot, telegram, whatsapp, twilio } = deps;

  if (telegram) {
    router.post('/telegram', async (req: Request, res: Response) => {
      if (!telegram.validateWebhook(req)) {
        logger.warn('Invalid Telegram webhook secret');
        return res.status(401).json({ error: 'unauthorized' });
      }

      try {
        await deliverReplies(bot, telegram, telegram.parseInbound(req.body));
      } catch (error) {
        logger.error('Telegram webhook error', { error: errorMessage(error) });
      }
      // Always acknowledge so Telegram does not redeliver
      res.json({ ok: true });
    });
  }

  if (whatsapp) {
    router.get('/whatsapp', (req: Request, res: Response) => {
      const challenge = whatsapp.verifySubscription(
        req.query['hub.mode'],
        req.query['hub.verify_token'],
        req.query['hub.challenge']
      );
      if (challenge === null) {
        logger.warn('WhatsApp verification refused');
        return res.status(403).send('forbidden');
      }
      res.status(200).send(challenge);
    });

    router.post('/whatsapp', async (req: Request, res: Response) => {
      if (!whatsapp.validateWebhook(req)) {
        logger.warn('Invalid WhatsApp webhook signature');
        return res.status(401).json({ error: 'unauthorized' });
      }

      try {
        await deliverReplies(bot, whatsapp, whatsapp.parseInbound(req.body));
      } catch (error) {
        logger.error('WhatsApp webhook error', { error: errorMessage(error) });
      }
      res.json({ ok: true });
    });
  }

  if (twilio) {
    router.post('/twilio', async (req: Request, res: Response) => {
      if (!twilio.validateWebhook(req)) {
        logger.warn('Invalid Twilio signature', { url: req.originalUrl });
        return res.status(403).json({ error: 'Invalid signature' });
      }

      try {
        await deliverReplies(bot, twilio, twilio.parseInbound(req.body));
      } catch (error) {
        logger.error('Twilio webhook error', { error: errorMessage(error) });
      }
      // Empty TwiML: the reply goes out through the API, not TwiML
      res.type('text/xml').send(EMPTY_TWIML);
    });
  }

  return router;
}
