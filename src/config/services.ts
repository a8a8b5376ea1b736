import { Queue } from 'bullmq';
import { Env } from './env';
import { buildBusinessProfile } from './business';
import { NotificationJobData, createNotificationQueue } from './queue';
import { RedisClient, createRedisClient } from './redis';
import { AssistantService } from '../services/assistant.service';
import { BotService } from '../services/bot.service';
import { RedisSessionStore } from '../services/cache.service';
import { CRMFactory } from '../services/crm/crm.adapter';
import { RepairOrderRepository } from '../services/database.service';
import { FieldExtractionService } from '../services/extraction.service';
import { IntakeService } from '../services/intake.service';
import { KnowledgeBaseService, loadKnowledgeEntries } from '../services/knowledge.service';
import { LeadService } from '../services/lead.service';
import { LLMFactory } from '../services/llm/llm.factory';
import {
  LoggingOperationsChannel,
  OperationsChannel,
  QueuedOperationsChannel,
  TransportOperationsChannel,
} from '../services/operations.service';
import { FreeTextRouter } from '../services/router.service';
import { MemorySessionStore, SessionStore } from '../services/session.service';
import { TelegramAdapter } from '../services/transport/telegram.adapter';
import { TwilioAdapter } from '../services/transport/twilio.adapter';
import { WhatsAppCloudAdapter } from '../services/transport/whatsapp.adapter';
import { logger } from '../utils/logger';

export interface Services {
  bot: BotService;
  telegram: TelegramAdapter | null;
  whatsapp: WhatsAppCloudAdapter | null;
  twilio: TwilioAdapter | null;
  redis: RedisClient | null;
  notificationQueue: Queue<NotificationJobData> | null;
}

function buildSessionStore(config: Env, redis: RedisClient | null): SessionStore {
  if (redis) {
    return new RedisSessionStore(
      {
        get: (key) => redis.get(key),
        set: (key, value, options) => redis.set(key, value, options),
      },
      config.SESSION_TTL_SECONDS
    );
  }
  const ttlMs = config.SESSION_TTL_SECONDS !== undefined ? config.SESSION_TTL_SECONDS * 1000 : undefined;
  return new MemorySessionStore(ttlMs);
}

function buildOperationsChannel(
  config: Env,
  telegram: TelegramAdapter | null,
  queue: Queue<NotificationJobData> | null
): OperationsChannel {
  const chatId = config.TELEGRAM_OPS_CHAT_ID;
  if (!chatId || !telegram) {
    return new LoggingOperationsChannel();
  }
  return queue ? new QueuedOperationsChannel(queue, chatId) : new TransportOperationsChannel(telegram, chatId);
}

/** Wires every service from validated configuration. Nothing connects until the caller starts it. */
export function createServices(config: Env): Services {
  const profile = buildBusinessProfile(config);
  const phonePattern = new RegExp(config.PHONE_PATTERN);

  const telegram = config.TELEGRAM_BOT_TOKEN
    ? new TelegramAdapter({ botToken: config.TELEGRAM_BOT_TOKEN, webhookSecret: config.TELEGRAM_WEBHOOK_SECRET })
    : null;
  const whatsapp =
    config.WA_TOKEN && config.WA_PHONE_ID
      ? new WhatsAppCloudAdapter({
          token: config.WA_TOKEN,
          phoneId: config.WA_PHONE_ID,
          verifyToken: config.WA_VERIFY_TOKEN,
          appSecret: config.WA_APP_SECRET,
        })
      : null;
  const twilio =
    config.TWILIO_ACCOUNT_SID && config.TWILIO_AUTH_TOKEN && config.TWILIO_PHONE_NUMBER
      ? new TwilioAdapter({
          accountSid: config.TWILIO_ACCOUNT_SID,
          authToken: config.TWILIO_AUTH_TOKEN,
          phoneNumber: config.TWILIO_PHONE_NUMBER,
          webhookBaseUrl: config.WEBHOOK_BASE_URL,
        })
      : null;

  const redis = config.REDIS_URL ? createRedisClient(config.REDIS_URL) : null;
  const notificationQueue = config.REDIS_URL ? createNotificationQueue(config.REDIS_URL) : null;

  const completion = LLMFactory.create(config.LLM_PROVIDER, {
    apiKey: config.LLM_PROVIDER === 'anthropic' ? config.ANTHROPIC_API_KEY : config.OPENAI_API_KEY,
    model: config.LLM_PROVIDER === 'anthropic' ? config.ANTHROPIC_MODEL : config.OPENAI_MODEL,
  });
  const crm = config.ROAPP_API_KEY
    ? CRMFactory.create('roapp', { apiKey: config.ROAPP_API_KEY, baseUrl: config.ROAPP_BASE_URL })
    : null;

  const knowledge = new KnowledgeBaseService(loadKnowledgeEntries(config.KB_PATH), profile);
  const router = new FreeTextRouter({
    knowledge,
    assistant: new AssistantService(completion, profile),
    leads: new LeadService(crm, { locationId: config.ROAPP_LOCATION_ID, source: config.ROAPP_SOURCE }),
    extractor: new FieldExtractionService(completion, phonePattern),
    profile,
    phonePattern,
    leadWhenPhoneKnown: config.LEAD_WHEN_PHONE_KNOWN,
  });
  const intake = new IntakeService(
    new RepairOrderRepository(),
    buildOperationsChannel(config, telegram, notificationQueue),
    { phonePattern }
  );

  logger.info('Services configured', {
    transports: [telegram && 'telegram', whatsapp && 'whatsapp', twilio && 'twilio'].filter(Boolean),
    llm: completion ? completion.provider : 'offline',
    crm: crm ? 'roapp' : 'none',
    sessions: redis ? 'redis' : 'memory',
    knowledgeEntries: knowledge.size,
  });

  return {
    bot: new BotService({ sessions: buildSessionStore(config, redis), intake, router, profile }),
    telegram,
    whatsapp,
    twilio,
    redis,
    notificationQueue,
  };
}
