import type { MailContent, SendIntent } from '../mail/types.js';
import type { TrustDecision } from '../trust/types.js';

export const FALLBACK_POLICIES = ['block', 'allow', 'draft'] as const;
export type FallbackPolicy = (typeof FALLBACK_POLICIES)[number];

export const EMAIL_ACTIONS = ['send', 'save_draft', 'cancel'] as const;
export type EmailAction = (typeof EMAIL_ACTIONS)[number];

export function isEmailAction(value: unknown): value is EmailAction {
  return typeof value === 'string' && EMAIL_ACTIONS.some(a => a === value);
}

/** JSON schema the interactive caller fills in. Flat object of primitives. */
export interface ResponseSchema {
  type: 'object';
  properties: Record<string, {
    type: 'string';
    title?: string;
    description?: string;
    enum?: string[];
  }>;
  required?: string[];
}

export const EMAIL_ACTION_SCHEMA: ResponseSchema = {
  type: 'object',
  properties: {
    action: {
      type: 'string',
      title: 'Action',
      description: 'What to do with this email: send (send anyway), save_draft (save as draft) or cancel',
      enum: [...EMAIL_ACTIONS],
    },
  },
  required: ['action'],
};

/** What the caller answered. `accept` carries the raw choice; it is validated by the controller. */
export type ElicitationResponse =
  | { kind: 'decline' }
  | { kind: 'cancel' }
  | { kind: 'accept'; content: Record<string, unknown> };

export type TransportOutcome =
  | { kind: 'response'; response: ElicitationResponse }
  | { kind: 'unsupported'; reason: string }
  | { kind: 'error'; error: Error };

export interface PromptOptions {
  timeoutMs: number;
  /** Aborted by the controller when the deadline passes */
  signal: AbortSignal;
}

/**
 * Presents a confirmation prompt to the interactive caller. Implementations
 * never throw: a missing capability is `unsupported`, anything else `error`.
 */
export interface ElicitationTransport {
  prompt(message: string, schema: ResponseSchema, options: PromptOptions): Promise<TransportOutcome>;
}

export type SessionState =
  | { kind: 'awaiting_response' }
  | { kind: 'accepted'; action: EmailAction }
  | { kind: 'declined' }
  | { kind: 'timed_out' }
  | { kind: 'unsupported'; reason: string }
  | { kind: 'failed'; error: Error };

/** Terminal result of the decision phase; no side effect has happened yet. */
export type ElicitationDecision =
  | { kind: 'no_session_needed' }
  | { kind: 'fallback_applied'; policy: FallbackPolicy; reason: string }
  | { kind: 'cancelled'; reason: 'declined' | 'cancelled' | 'action_cancel' }
  | { kind: 'save_draft' }
  | { kind: 'proceed' }
  | { kind: 'timed_out' }
  | { kind: 'hard_failure'; error: Error };

export type ElicitationOutcome =
  | { kind: 'sent'; messageId: string; via: 'no_session_needed' | 'accepted' | 'fallback_allow' }
  | { kind: 'draft_saved'; draftId: string; via: 'accepted' | 'fallback_draft' }
  | { kind: 'blocked'; untrustedRecipients: string[] }
  | { kind: 'cancelled'; reason: 'declined' | 'cancelled' | 'action_cancel' }
  | { kind: 'timed_out' }
  | { kind: 'hard_failure'; error: Error };

export interface ElicitationSettings {
  enabled: boolean;
  fallbackPolicy: FallbackPolicy;
  timeoutMs: number;
}

export interface ElicitationContext {
  intent: SendIntent;
  decision: TrustDecision;
  /** Expanded, concrete recipients and body exactly as they would go out */
  content: MailContent;
}
