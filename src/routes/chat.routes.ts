import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BotService } from '../services/bot.service';
import { AUTHOR_ID_MAX_LENGTH } from '../types/agent';
import { ValidationError } from '../utils/errors';

const WEB_PREFIX = 'web:';

export const chatMessageSchema = z.object({
  conversation_id: z.string().min(1).max(AUTHOR_ID_MAX_LENGTH - WEB_PREFIX.length),
  display_name: z.string().min(1).max(100).default('Guest'),
  phone: z.string().min(1).max(32).optional(),
  message: z.string().min(1).max(5000),
});

export function webConversationId(id: string): string {
  return `${WEB_PREFIX}${id}`;
}

/** Test channel for trying the bot without a messaging platform. */
export function createChatRouter(bot: BotService): Router {
  const router = Router();

  router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => i.message).join(', '));
      }

      const reply = await bot.handleMessage({
        conversationId: webConversationId(parsed.data.conversation_id),
        text: parsed.data.message,
        displayName: parsed.data.display_name,
        channel: 'web',
        senderPhone: parsed.data.phone,
      });

      res.json({ success: true, ...reply });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
