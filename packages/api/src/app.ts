import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import {
  resolveConfig,
  createMailwardenContext,
  type ContextOverrides,
  type DeepPartial,
  type MailwardenConfig,
  type MailwardenContext,
} from '@mailwarden/core';
import { createAuthMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createTrustRoutes } from './routes/trust.js';
import { createRuleRoutes } from './routes/rules.js';
import { createMailRoutes } from './routes/mail.js';

export const API_PREFIX = '/api/mailwarden';

export interface CreateAppOptions {
  config?: DeepPartial<MailwardenConfig>;
  /** Substitute collaborators (message store, database, ...) */
  overrides?: ContextOverrides;
  version?: string;
  /** Requests per minute per client; 0 disables the limiter */
  rateLimitPerMinute?: number;
}

export function createApp(options: CreateAppOptions = {}): {
  app: express.Express;
  context: MailwardenContext;
} {
  const config = resolveConfig(options.config);
  const context = createMailwardenContext(config, options.overrides);

  const app = express();

  // Global middleware
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));
  const perMinute = options.rateLimitPerMinute ?? 100;
  if (perMinute > 0) {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        limit: perMinute,
        standardHeaders: true,
        legacyHeaders: false,
        message: { error: 'Too many requests, please try again later' },
      }),
    );
  }

  // Health route (no auth required)
  app.use(API_PREFIX, createHealthRoutes(context, options.version ?? '0.1.0'));

  // Auth middleware for all other API routes
  app.use(API_PREFIX, createAuthMiddleware(() => config.masterKey));

  app.use(API_PREFIX, createTrustRoutes(context));
  app.use(API_PREFIX, createRuleRoutes(context));
  app.use(API_PREFIX, createMailRoutes(context));

  // 404 handler for unmatched API routes
  app.use(API_PREFIX, (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use(errorHandler);

  return { app, context };
}
