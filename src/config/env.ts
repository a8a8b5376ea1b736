import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const optionalNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().nonnegative().optional()
);

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : undefined),
    z.enum(['true', 'false', '1', '0', 'yes', 'no']).optional()
  ).transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const envSchema = z
  .object({
    PORT: z.string().default('3000'),
    NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
    LOG_LEVEL: optionalString,
    DATABASE_URL: z.string().min(1),
    REDIS_URL: optionalString,
    SESSION_TTL_SECONDS: optionalNumber,
    WEBHOOK_BASE_URL: z.string().url(),

    TELEGRAM_BOT_TOKEN: optionalString,
    // Telegram accepts A-Z, a-z, 0-9, _ and - in a secret token.
    TELEGRAM_WEBHOOK_SECRET: z.preprocess(
      (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
      z.string().regex(/^[A-Za-z0-9_-]{1,256}$/).optional()
    ),
    TELEGRAM_OPS_CHAT_ID: optionalString,

    WA_TOKEN: optionalString,
    WA_PHONE_ID: optionalString,
    WA_VERIFY_TOKEN: z.string().default('moto-verify'),
    WA_APP_SECRET: optionalString,

    TWILIO_ACCOUNT_SID: optionalString,
    TWILIO_AUTH_TOKEN: optionalString,
    TWILIO_PHONE_NUMBER: optionalString,

    ROAPP_API_KEY: optionalString,
    ROAPP_BASE_URL: z.string().url().default('https://api.roapp.io'),
    ROAPP_LOCATION_ID: optionalNumber,
    ROAPP_SOURCE: optionalString,
    CRM_SECRET: optionalString,

    LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),

    PHONE_PATTERN: z.string().default('^\\+\\d{7,15}$'),
    LEAD_WHEN_PHONE_KNOWN: booleanFlag(true),
    COMPANY_NAME: z.string().default('Moto Service'),
    COMPANY_TOWN: z.string().default('Cape Town'),
    COMPANY_ADDRESS: z.string().default('address available on request'),
    COMPANY_HOURS: z.string().default('Mon-Fri 8:00-17:00'),
    COMPANY_CONTACT: z.string().default(''),
    PICKUP_PRICE: optionalNumber,
    CURRENCY_SYMBOL: z.string().default('R'),
    KB_PATH: optionalString,

    API_KEYS: optionalString,
    SENTRY_DSN: optionalString,
  })
  .superRefine((value, ctx) => {
    const hasTelegram = Boolean(value.TELEGRAM_BOT_TOKEN);
    const hasWhatsApp = Boolean(value.WA_TOKEN && value.WA_PHONE_ID);
    const hasTwilio = Boolean(value.TWILIO_ACCOUNT_SID && value.TWILIO_AUTH_TOKEN && value.TWILIO_PHONE_NUMBER);

    if (!hasTelegram && !hasWhatsApp && !hasTwilio) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TELEGRAM_BOT_TOKEN'],
        message: 'Configure at least one transport: Telegram, WhatsApp Cloud API or Twilio',
      });
    }

    if (hasTelegram && !value.TELEGRAM_WEBHOOK_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TELEGRAM_WEBHOOK_SECRET'],
        message: 'Required when Telegram is configured',
      });
    }

    try {
      new RegExp(value.PHONE_PATTERN);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['PHONE_PATTERN'], message: 'Not a valid regular expression' });
    }
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export type Env = typeof env;
