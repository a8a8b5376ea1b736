import { z } from 'zod';
import { Session } from '../types/session';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { SessionStore } from './session.service';

const KEY_PREFIX = 'session:';

const sessionSchema = z.object({
  conversationId: z.string(),
  channel: z.enum(['telegram', 'whatsapp', 'sms', 'web']),
  formState: z.enum([
    'NONE',
    'AWAITING_PHONE',
    'AWAITING_MODEL',
    'AWAITING_PLATE',
    'AWAITING_ODOMETER',
    'AWAITING_ISSUE',
    'AWAITING_CONFIRM',
  ]),
  draft: z.object({
    phone: z.string().optional(),
    makeModel: z.string().optional(),
    plate: z.string().optional(),
    odometer: z.number().optional(),
    issue: z.string().optional(),
  }),
  history: z.array(z.object({ role: z.enum(['user', 'assistant']), text: z.string() })),
  knownPhone: z.string().optional(),
  knownName: z.string().optional(),
  awaitingName: z.boolean(),
  hintCounter: z.number(),
  leadId: z.string().optional(),
  updatedAt: z.string(),
});

/** The subset of the node-redis client the store needs. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: { EX?: number }): Promise<unknown>;
}

export class RedisSessionStore implements SessionStore {
  constructor(
    private redis: RedisLike,
    private ttlSeconds?: number
  ) {}

  async get(conversationId: string): Promise<Session | null> {
    try {
      const data = await this.redis.get(`${KEY_PREFIX}${conversationId}`);
      if (!data) return null;

      const parsed = sessionSchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        logger.warn('Stored session is malformed, starting fresh', { conversationId });
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn('Session read failed', { conversationId, error: errorMessage(error) });
      return null;
    }
  }

  async put(conversationId: string, session: Session): Promise<void> {
    try {
      const value = JSON.stringify(session);
      if (this.ttlSeconds) {
        await this.redis.set(`${KEY_PREFIX}${conversationId}`, value, { EX: this.ttlSeconds });
      } else {
        await this.redis.set(`${KEY_PREFIX}${conversationId}`, value);
      }
    } catch (error) {
      logger.warn('Session write failed', { conversationId, error: errorMessage(error) });
    }
  }
}
