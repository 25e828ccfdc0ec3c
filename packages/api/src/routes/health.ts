import { Router } from 'express';
import type { MailwardenContext } from '@mailwarden/core';

export function createHealthRoutes(context: MailwardenContext, version: string): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const { tokens } = await context.trustStore.load();
      res.json({
        status: 'ok',
        version,
        services: { api: 'ok', storage: 'ok' },
        trustList: { entries: tokens.length },
        elicitation: {
          enabled: context.config.trust.elicitationEnabled,
          fallbackPolicy: context.config.trust.fallbackPolicy,
        },
        timestamp: new Date().toISOString(),
      });
    } catch {
      res.status(503).json({
        status: 'degraded',
        version,
        services: { api: 'ok', storage: 'unreachable' },
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
