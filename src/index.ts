import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { createServices } from './config/services';
import { connectRedis } from './config/redis';
import { createApp } from './app';
import { startNotificationWorker } from './workers/notification.worker';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

const services = createServices(env);
const app = createApp(env, services);

// Start
async function start() {
  try {
    if (services.redis) {
      await connectRedis(services.redis);
    }

    if (env.REDIS_URL && services.telegram) {
      startNotificationWorker(env.REDIS_URL, services.telegram);
    }

    if (services.telegram) {
      await services.telegram.registerWebhook(`${env.WEBHOOK_BASE_URL}/webhook/telegram`);
    }

    app.listen(parseInt(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void start();

export default app;
