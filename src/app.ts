/// <reference path="types/express.d.ts" />
import express, { Request } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { checkDatabaseHealth } from './config/database';
import { Env } from './config/env';
import { checkRedisHealth } from './config/redis';
import { Services } from './config/services';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createWebhookRouter } from './routes/webhook.routes';
import { createCrmRouter } from './routes/crm.routes';
import { createChatRouter } from './routes/chat.routes';

function keepRawBody(req: Request, _res: unknown, buf: Buffer) {
  req.rawBody = buf;
}

export function createApp(config: Env, services: Services) {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());

  // Twilio posts form-encoded bodies; signatures elsewhere need the raw bytes
  app.use(express.json({ verify: keepRawBody }));
  app.use(express.urlencoded({ extended: false, verify: keepRawBody }));

  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);
  app.use('/api', apiKeyAuth(config.API_KEYS));

  // Routes
  app.use('/webhook', createWebhookRouter(services));
  app.use('/', createCrmRouter(config.CRM_SECRET));
  app.use('/api/chat', createChatRouter(services.bot));

  // Health checks (no auth)
  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/health', async (_req, res) => {
    const database = await checkDatabaseHealth();
    const redis = services.redis ? await checkRedisHealth(services.redis) : { status: 'disabled' };
    const healthy = database.status === 'healthy' && redis.status !== 'unhealthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      services: { database, redis },
    });
  });

  // Error handler
  if (config.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
