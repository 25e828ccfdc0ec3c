import type { CompiledQuery, RuleAction } from '../rules/types.js';

export type SendIntent = 'send' | 'forward' | 'reply';

/** What actually goes out (or into Drafts). Recipients are concrete addresses. */
export interface MailContent {
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  text?: string;
  html?: string;
  inReplyTo?: string;
  references?: string[];
}

/**
 * An outbound request as a caller supplies it. Recipient strings may be
 * comma-joined and may contain group tokens; both are resolved before the
 * trust decision.
 */
export interface SendRequest {
  intent: SendIntent;
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  text?: string;
  html?: string;
  inReplyTo?: string;
  references?: string[];
}

export interface ListPage {
  ids: string[];
  nextPageToken: string | null;
}

export interface ListOptions {
  pageToken?: string | null;
  pageSize?: number;
}

export interface DraftResult {
  draftId: string;
}

export interface SentResult {
  messageId: string;
}

/**
 * Remote mailbox the gateway and the applier act on. Every method is a
 * suspension point; failures are thrown (AuthError, TransientApiError, ...).
 */
export interface MessageStore {
  list(query: CompiledQuery, options?: ListOptions): Promise<ListPage>;
  batchMutate(ids: string[], action: RuleAction): Promise<void>;
  mutate(id: string, action: RuleAction): Promise<void>;
  createDraft(content: MailContent): Promise<DraftResult>;
  send(content: MailContent): Promise<SentResult>;
}
