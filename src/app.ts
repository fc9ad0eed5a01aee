import express from 'express';
import type { Express } from 'express';
import type { Services } from './bootstrap.js';
import { errorHandler } from './middleware/error-handler.js';
import { globalLimiter, verificationEmailLimiter } from './middleware/rate-limit.js';
import { createEmailRouter } from './routes/email.js';
import { createQueueRouter } from './routes/queue.js';
import { createUserRouter } from './routes/users.js';

export interface AppOptions {
  rateLimit?: boolean;
}

/**
 * Builds the admin API without listening, so tests can hand it to supertest.
 */
export function createApp(services: Services, options: AppOptions = {}): Express {
  const rateLimit = options.rateLimit ?? true;
  const app = express();

  if (rateLimit) {
    app.use(globalLimiter);
  }

  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', jobs: services.registry.names() });
  });

  app.use('/queue', createQueueRouter(services.queueAdmin));
  app.use('/users', createUserRouter({
    registry: services.registry,
    dispatcher: services.dispatcher,
    limiter: rateLimit ? verificationEmailLimiter : undefined,
  }));
  app.use('/email', createEmailRouter(services.verification));

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
