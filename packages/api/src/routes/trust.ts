import { Router } from 'express';
import { ValidationError, isRecord, readEntries, type MailwardenContext } from '@mailwarden/core';

function entriesOf(body: unknown): string[] {
  if (!isRecord(body)) throw new ValidationError('Request body must be an object');
  return readEntries(body.entries ?? body.emails ?? body.email, 'entries');
}

export function createTrustRoutes(context: MailwardenContext): Router {
  const router = Router();
  const { trustList } = context;

  router.get('/trust-list', async (_req, res, next) => {
    try {
      res.json(await trustList.view());
    } catch (err) { next(err); }
  });

  router.post('/trust-list', async (req, res, next) => {
    try {
      const result = await trustList.add(entriesOf(req.body));
      res.status(result.added.length > 0 ? 201 : 200).json(result);
    } catch (err) { next(err); }
  });

  router.delete('/trust-list', async (req, res, next) => {
    try {
      res.json(await trustList.remove(entriesOf(req.body)));
    } catch (err) { next(err); }
  });

  router.post('/trust-list/labels/:label', async (req, res, next) => {
    try {
      res.json(await trustList.labelAdd(req.params.label, entriesOf(req.body)));
    } catch (err) { next(err); }
  });

  router.delete('/trust-list/labels/:label', async (req, res, next) => {
    try {
      res.json(await trustList.labelRemove(req.params.label, entriesOf(req.body)));
    } catch (err) { next(err); }
  });

  return router;
}
