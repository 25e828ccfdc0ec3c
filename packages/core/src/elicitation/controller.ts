import { debug } from '../debug.js';
import { ValidationError, errorMessage } from '../errors.js';
import type { MessageStore } from '../mail/types.js';
import { maskAddress } from '../trust/tokens.js';
import type { TrustDecision } from '../trust/types.js';
import { classifyTransportError } from './classify.js';
import { buildConfirmationMessage } from './message.js';
import {
  EMAIL_ACTION_SCHEMA,
  isEmailAction,
  type ElicitationContext,
  type ElicitationDecision,
  type ElicitationOutcome,
  type ElicitationResponse,
  type ElicitationSettings,
  type ElicitationTransport,
  type FallbackPolicy,
  type SessionState,
  type TransportOutcome,
} from './types.js';

export const DEFAULT_ELICITATION_TIMEOUT_MS = 300_000;

function maskedList(addresses: readonly string[]): string {
  return addresses.map(maskAddress).join(', ');
}

/**
 * One confirmation round for one request. Leaves `awaiting_response` exactly
 * once; any later transition is a programming error.
 */
export class ElicitationSession {
  readonly deadline: number;
  private current: SessionState = { kind: 'awaiting_response' };

  constructor(readonly decision: TrustDecision, timeoutMs: number, now: number = Date.now()) {
    this.deadline = now + timeoutMs;
  }

  get state(): SessionState {
    return this.current;
  }

  get terminal(): boolean {
    return this.current.kind !== 'awaiting_response';
  }

  transition(next: SessionState): void {
    if (this.terminal) {
      throw new Error(`Elicitation session already ended in state "${this.current.kind}"`);
    }
    if (next.kind === 'awaiting_response') {
      throw new Error('Elicitation session cannot return to awaiting_response');
    }
    debug('elicitation', `awaiting_response -> ${next.kind}`);
    this.current = next;
  }
}

type RaceResult = { kind: 'outcome'; outcome: TransportOutcome } | { kind: 'timeout' };

export class ElicitationController {
  /**
   * @param settings read on every call so a config change applies to the next send
   */
  constructor(private settings: () => ElicitationSettings) {}

  /**
   * Runs the decision phase: at most one prompt, no retries, no side effects.
   * `transport` is null when the caller has no interactive channel at all.
   */
  async decide(context: ElicitationContext, transport: ElicitationTransport | null): Promise<ElicitationDecision> {
    const { decision } = context;
    if (decision.untrustedRecipients.length === 0) return { kind: 'no_session_needed' };

    const settings = this.settings();
    if (!settings.enabled) {
      return this.fallback('interactive confirmation is disabled', decision);
    }
    if (!transport) {
      return this.fallback('no interactive transport is available', decision);
    }

    const timeoutMs = settings.timeoutMs > 0 ? settings.timeoutMs : DEFAULT_ELICITATION_TIMEOUT_MS;
    const session = new ElicitationSession(decision, timeoutMs);
    debug('elicitation', `Prompting for ${decision.untrustedRecipients.length} untrusted recipient(s), deadline in ${timeoutMs}ms`);

    const result = await this.promptWithDeadline(transport, buildConfirmationMessage(context, timeoutMs), timeoutMs);

    if (result.kind === 'timeout') {
      session.transition({ kind: 'timed_out' });
      console.warn(`[elicitation] No response within ${timeoutMs}ms; request for ${maskedList(decision.untrustedRecipients)} timed out`);
      return { kind: 'timed_out' };
    }

    const { outcome } = result;
    switch (outcome.kind) {
      case 'unsupported':
        session.transition({ kind: 'unsupported', reason: outcome.reason });
        return this.fallback(`interactive confirmation unsupported (${outcome.reason})`, decision);
      case 'error':
        session.transition({ kind: 'failed', error: outcome.error });
        console.error(`[elicitation] Confirmation failed: ${outcome.error.message}`);
        return { kind: 'hard_failure', error: outcome.error };
      case 'response':
        return this.fromResponse(session, outcome.response);
    }
  }

  /**
   * Decides, then performs the single side effect the decision calls for.
   * MessageStore errors from that side effect propagate.
   */
  async process(
    context: ElicitationContext,
    store: MessageStore,
    transport: ElicitationTransport | null,
  ): Promise<ElicitationOutcome> {
    const decision = await this.decide(context, transport);
    switch (decision.kind) {
      case 'no_session_needed': {
        const { messageId } = await store.send(context.content);
        return { kind: 'sent', messageId, via: 'no_session_needed' };
      }
      case 'proceed': {
        const { messageId } = await store.send(context.content);
        return { kind: 'sent', messageId, via: 'accepted' };
      }
      case 'save_draft': {
        const { draftId } = await store.createDraft(context.content);
        return { kind: 'draft_saved', draftId, via: 'accepted' };
      }
      case 'fallback_applied':
        return this.applyFallback(decision.policy, context, store);
      case 'cancelled':
        return { kind: 'cancelled', reason: decision.reason };
      case 'timed_out':
        return { kind: 'timed_out' };
      case 'hard_failure':
        return { kind: 'hard_failure', error: decision.error };
    }
  }

  private async applyFallback(
    policy: FallbackPolicy,
    context: ElicitationContext,
    store: MessageStore,
  ): Promise<ElicitationOutcome> {
    switch (policy) {
      case 'block':
        return { kind: 'blocked', untrustedRecipients: [...context.decision.untrustedRecipients] };
      case 'allow': {
        const { messageId } = await store.send(context.content);
        return { kind: 'sent', messageId, via: 'fallback_allow' };
      }
      case 'draft': {
        const { draftId } = await store.createDraft(context.content);
        return { kind: 'draft_saved', draftId, via: 'fallback_draft' };
      }
    }
  }

  private fallback(reason: string, decision: TrustDecision): ElicitationDecision {
    const policy = this.settings().fallbackPolicy;
    console.warn(`[elicitation] Fallback "${policy}" applied (${reason}) for ${maskedList(decision.untrustedRecipients)}`);
    return { kind: 'fallback_applied', policy, reason };
  }

  private fromResponse(session: ElicitationSession, response: ElicitationResponse): ElicitationDecision {
    if (response.kind === 'decline' || response.kind === 'cancel') {
      session.transition({ kind: 'declined' });
      return { kind: 'cancelled', reason: response.kind === 'decline' ? 'declined' : 'cancelled' };
    }

    const action: unknown = response.content.action;
    if (!isEmailAction(action)) {
      const error = new ValidationError(`Unrecognized confirmation action: ${JSON.stringify(action)}`);
      session.transition({ kind: 'failed', error });
      console.error(`[elicitation] ${error.message}`);
      return { kind: 'hard_failure', error };
    }

    session.transition({ kind: 'accepted', action });
    switch (action) {
      case 'cancel':
        return { kind: 'cancelled', reason: 'action_cancel' };
      case 'save_draft':
        return { kind: 'save_draft' };
      case 'send':
        return { kind: 'proceed' };
    }
  }

  private async promptWithDeadline(
    transport: ElicitationTransport,
    message: string,
    timeoutMs: number,
  ): Promise<RaceResult> {
    const abort = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<RaceResult>(resolve => {
      timer = setTimeout(() => {
        abort.abort();
        resolve({ kind: 'timeout' });
      }, timeoutMs);
    });

    const prompt = transport
      .prompt(message, EMAIL_ACTION_SCHEMA, { timeoutMs, signal: abort.signal })
      .then(
        (outcome): RaceResult => ({ kind: 'outcome', outcome }),
        (err: unknown): RaceResult => {
          debug('elicitation', `Transport threw: ${errorMessage(err)}`);
          return { kind: 'outcome', outcome: classifyTransportError(err) };
        },
      );

    try {
      return await Promise.race([prompt, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
