import { ValidationError } from '../errors.js';
import type { ElicitationController } from '../elicitation/controller.js';
import type { ElicitationOutcome, ElicitationTransport } from '../elicitation/types.js';
import type { TrustGate } from '../trust/gate.js';
import { EMAIL_PATTERN, maskAddress } from '../trust/tokens.js';
import type { MailContent, MessageStore, SendIntent, SendRequest } from './types.js';

const SEND_INTENTS: readonly SendIntent[] = ['send', 'forward', 'reply'];

export interface OutboundResult {
  success: boolean;
  outcome: ElicitationOutcome['kind'];
  summary: string;
  intent: SendIntent;
  recipients: string[];
  untrustedRecipients: string[];
  messageId?: string;
  draftId?: string;
}

function describe(outcome: ElicitationOutcome, intent: SendIntent, untrusted: readonly string[]): string {
  const verb = intent === 'send' ? 'Email' : intent === 'forward' ? 'Forward' : 'Reply';
  switch (outcome.kind) {
    case 'sent':
      return outcome.via === 'fallback_allow'
        ? `${verb} sent (confirmation unavailable, fallback policy allows untrusted recipients)`
        : `${verb} sent`;
    case 'draft_saved':
      return outcome.via === 'fallback_draft'
        ? `${verb} saved as draft ${outcome.draftId} (confirmation unavailable, fallback policy saves drafts)`
        : `${verb} saved as draft ${outcome.draftId}`;
    case 'blocked':
      return `${verb} blocked: ${untrusted.length} recipient(s) not on the trust list (${untrusted.join(', ')})`;
    case 'cancelled':
      return outcome.reason === 'declined' ? `${verb} declined by user` : `${verb} cancelled by user`;
    case 'timed_out':
      return `${verb} not sent: no confirmation received before the deadline`;
    case 'hard_failure':
      return `${verb} not sent: confirmation failed (${outcome.error.message})`;
  }
}

/**
 * Send / forward / reply entry point: validate, expand group recipients,
 * run the trust decision and the confirmation flow, then act through the
 * MessageStore.
 */
export class OutboundGateway {
  constructor(
    private gate: TrustGate,
    private controller: ElicitationController,
    private store: MessageStore,
  ) {}

  async send(request: SendRequest, transport: ElicitationTransport | null = null): Promise<OutboundResult> {
    if (!SEND_INTENTS.includes(request.intent)) {
      throw new ValidationError(`Unsupported intent: ${String(request.intent)}`);
    }
    const subject = request.subject.trim();
    if (request.intent === 'send' && !subject) throw new ValidationError('subject is required');

    const { recipients, decision } = await this.gate.check(request);
    const unresolved = recipients.groups.filter(g => g.ref === null || g.error !== undefined);
    if (unresolved.length > 0) {
      const details = unresolved.map(g => `${g.token} (${g.error ?? 'malformed group token'})`);
      throw new ValidationError(`Could not resolve recipient group(s): ${details.join(', ')}`);
    }
    if (decision.recipients.length === 0) {
      throw new ValidationError('At least one recipient is required');
    }
    const malformed = decision.recipients.filter(r => !EMAIL_PATTERN.test(r));
    if (malformed.length > 0) {
      throw new ValidationError(`Invalid recipient address(es): ${malformed.join(', ')}`);
    }

    const content: MailContent = {
      to: recipients.to,
      cc: recipients.cc.length ? recipients.cc : undefined,
      bcc: recipients.bcc.length ? recipients.bcc : undefined,
      subject,
      text: request.text,
      html: request.html,
      inReplyTo: request.inReplyTo,
      references: request.references,
    };

    const outcome = await this.controller.process(
      { intent: request.intent, decision, content },
      this.store,
      transport,
    );

    if (outcome.kind === 'blocked') {
      console.warn(`[mailwarden] Blocked ${request.intent} to ${outcome.untrustedRecipients.map(maskAddress).join(', ')}`);
    }

    return {
      success: outcome.kind === 'sent' || outcome.kind === 'draft_saved',
      outcome: outcome.kind,
      summary: describe(outcome, request.intent, decision.untrustedRecipients),
      intent: request.intent,
      recipients: decision.recipients,
      untrustedRecipients: decision.untrustedRecipients,
      messageId: outcome.kind === 'sent' ? outcome.messageId : undefined,
      draftId: outcome.kind === 'draft_saved' ? outcome.draftId : undefined,
    };
  }
}
