import { Router } from 'express';
import { readCreateRuleInput, type MailwardenContext } from '@mailwarden/core';

export function createRuleRoutes(context: MailwardenContext): Router {
  const router = Router();
  const { rules } = context;

  router.get('/rules', (_req, res, next) => {
    try {
      const list = rules.list();
      res.json({ rules: list, count: list.length });
    } catch (err) { next(err); }
  });

  router.post('/rules', async (req, res, next) => {
    try {
      res.status(201).json(await rules.create(readCreateRuleInput(req.body)));
    } catch (err) { next(err); }
  });

  router.get('/rules/:id', (req, res, next) => {
    try {
      res.json(rules.get(req.params.id));
    } catch (err) { next(err); }
  });

  router.delete('/rules/:id', (req, res, next) => {
    try {
      const rule = rules.delete(req.params.id);
      res.json({ success: true, deleted: rule.id, name: rule.name });
    } catch (err) { next(err); }
  });

  router.post('/rules/:id/apply', async (req, res, next) => {
    try {
      res.json(await rules.apply(req.params.id));
    } catch (err) { next(err); }
  });

  return router;
}
