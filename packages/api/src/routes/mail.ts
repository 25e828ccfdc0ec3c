import { Router } from 'express';
import {
  readSendRequest,
  type ElicitationTransport,
  type MailwardenContext,
  type OutboundResult,
  type SendIntent,
  type TransportOutcome,
} from '@mailwarden/core';

/** HTTP callers cannot be prompted mid-request; the fallback policy decides. */
export class NonInteractiveTransport implements ElicitationTransport {
  async prompt(): Promise<TransportOutcome> {
    return { kind: 'unsupported', reason: 'HTTP requests cannot answer confirmation prompts' };
  }
}

function statusFor(result: OutboundResult): number {
  switch (result.outcome) {
    case 'sent': return 200;
    case 'draft_saved': return 202;
    case 'blocked': return 403;
    case 'cancelled': return 409;
    case 'timed_out': return 408;
    case 'hard_failure': return 502;
  }
}

export function createMailRoutes(context: MailwardenContext): Router {
  const router = Router();
  const transport = new NonInteractiveTransport();

  const route = (intent: SendIntent) => {
    router.post(`/mail/${intent}`, async (req, res, next) => {
      try {
        const result = await context.outbound.send(readSendRequest(req.body, intent), transport);
        res.status(statusFor(result)).json(result);
      } catch (err) { next(err); }
    });
  };

  route('send');
  route('forward');
  route('reply');

  return router;
}
