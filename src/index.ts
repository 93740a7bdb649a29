import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { connectRedis, checkRedisHealth, disconnectRedis } from './config/redis';
import { closeReminderQueue } from './config/queue';
import { logger } from './utils/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createCallRouter } from './routes/call.routes';
import { startReminderWorker } from './workers/reminder.worker';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

const app = express();

// Middleware
app.use(helmet());
app.use(cors());

// Twilio webhooks are form-encoded, the voice agent posts JSON
app.use(express.urlencoded({ extended: false }));
app.use(express.json());

// Routes
app.use('/', createCallRouter());

// Health check (no auth)
app.get('/health', async (_req, res) => {
  const redis = await checkRedisHealth();
  res.json({ status: 'ok', redis: redis.status, timestamp: new Date().toISOString() });
});

app.use(notFoundHandler);

// Error handler
if (env.SENTRY_DSN) {
  Sentry.setupExpressErrorHandler(app);
}
app.use(errorHandler);

// Start
async function start() {
  try {
    await connectRedis();
    const worker = startReminderWorker();

    const server = app.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });

    const shutdown = async (signal: string) => {
      logger.info('Shutting down', { signal });
      server.close();
      try {
        await worker.close();
        await closeReminderQueue();
        await disconnectRedis();
        process.exit(0);
      } catch (error: unknown) {
        logger.error('Unclean shutdown', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      }
    };

    process.once('SIGTERM', (signal) => void shutdown(signal));
    process.once('SIGINT', (signal) => void shutdown(signal));
  } catch (error: unknown) {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

void start();

export default app;
