import { ImapFlow, type SearchObject } from 'imapflow';
import nodemailer from 'nodemailer';
import MailComposer from 'nodemailer/lib/mail-composer/index.js';
import type { SendMailOptions, Transporter } from 'nodemailer';
import { debug } from '../debug.js';
import { AuthError, MailwardenError, TransientApiError, ValidationError, errorMessage } from '../errors.js';
import type { CompiledQuery, RuleAction } from '../rules/types.js';
import type { DraftResult, ListOptions, ListPage, MailContent, MessageStore, SentResult } from './types.js';

export interface ImapMessageStoreOptions {
  imap: {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
    mailbox: string;
    draftsMailbox: string;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
    from: string;
  };
  defaultPageSize?: number;
}

const DEFAULT_PAGE_SIZE = 500;

/** IMAP keywords are atoms; anything else in a label id becomes `_` */
export function labelKeyword(labelId: string): string {
  return labelId.trim().replace(/[\s(){}%*"\\\]]/g, '_');
}

/** Compiled query terms → IMAP SEARCH criteria (all terms ANDed) */
export function toImapSearch(query: CompiledQuery): SearchObject {
  const search: SearchObject = {};
  for (const term of query.terms) {
    switch (term.field) {
      case 'from': search.from = term.value; break;
      case 'to': search.to = term.value; break;
      case 'subject': search.subject = term.value; break;
      case 'text': search.text = term.value; break;
      case 'hasAttachment':
        // No attachment flag in IMAP; multipart/mixed is the usual carrier
        if (term.value) search.header = { 'content-type': 'multipart/mixed' };
        else search.not = { header: { 'content-type': 'multipart/mixed' } };
        break;
      case 'size':
        if (term.comparison === 'larger') search.larger = term.bytes;
        else search.smaller = term.bytes;
        break;
    }
  }
  if (Object.keys(search).length === 0) search.all = true;
  return search;
}

export function parsePageToken(token: string | null | undefined): number {
  if (token === undefined || token === null || token === '') return 0;
  const offset = Number(token);
  if (!Number.isInteger(offset) || offset < 0) throw new ValidationError(`Invalid page token: ${token}`);
  return offset;
}

/** imapflow flags `authenticationFailed`; nodemailer uses code EAUTH */
export function toStoreError(err: unknown, operation: string): MailwardenError {
  if (err instanceof MailwardenError) return err;
  const failedAuth = typeof err === 'object' && err !== null
    && (Reflect.get(err, 'authenticationFailed') === true || Reflect.get(err, 'code') === 'EAUTH');
  if (failedAuth) return new AuthError(`${operation}: authentication failed`, { cause: err });
  return new TransientApiError(`${operation}: ${errorMessage(err)}`, { cause: err });
}

/**
 * MessageStore over one IMAP mailbox (search, keyword flags, APPEND for
 * drafts) and an SMTP relay for sending. Message ids are IMAP UIDs; labels
 * are IMAP keywords.
 */
export class ImapMessageStore implements MessageStore {
  private client: ImapFlow;
  private transporter: Transporter;
  private connected = false;

  constructor(private options: ImapMessageStoreOptions) {
    this.client = new ImapFlow({
      host: options.imap.host,
      port: options.imap.port,
      secure: options.imap.secure,
      auth: {
        user: options.imap.user,
        pass: options.imap.password,
      },
      logger: false,
    });
    this.transporter = nodemailer.createTransport({
      host: options.smtp.host,
      port: options.smtp.port,
      secure: options.smtp.secure,
      auth: options.smtp.user ? { user: options.smtp.user, pass: options.smtp.password } : undefined,
      connectionTimeout: 10_000,
      greetingTimeout: 10_000,
      socketTimeout: 15_000,
    });
  }

  private async connect(): Promise<void> {
    if (this.connected) return;
    try {
      await this.client.connect();
    } catch (err) {
      throw toStoreError(err, 'IMAP connect');
    }
    this.connected = true;

    // Keep connected flag in sync with actual IMAP state
    this.client.on('close', () => { this.connected = false; });
    this.client.on('error', (err: Error) => {
      this.connected = false;
      console.error(`[imap] Connection error: ${err.message}`);
    });
  }

  private async withMailbox<T>(mailbox: string, operation: string, fn: () => Promise<T>): Promise<T> {
    await this.connect();
    try {
      const lock = await this.client.getMailboxLock(mailbox);
      try {
        return await fn();
      } finally {
        lock.release();
      }
    } catch (err) {
      throw toStoreError(err, operation);
    }
  }

  async list(query: CompiledQuery, options: ListOptions = {}): Promise<ListPage> {
    const offset = parsePageToken(options.pageToken);
    const pageSize = options.pageSize ?? this.options.defaultPageSize ?? DEFAULT_PAGE_SIZE;
    return this.withMailbox(this.options.imap.mailbox, 'IMAP search', async () => {
      const results = await this.client.search(toImapSearch(query), { uid: true });
      const uids = Array.isArray(results) ? [...results].sort((a, b) => b - a) : [];
      const page = uids.slice(offset, offset + pageSize).map(String);
      const next = offset + pageSize < uids.length ? String(offset + pageSize) : null;
      debug('imap', `search "${query.expression}" → ${uids.length} match(es), page at ${offset}`);
      return { ids: page, nextPageToken: next };
    });
  }

  async batchMutate(ids: string[], action: RuleAction): Promise<void> {
    if (ids.length === 0) return;
    const range = ids.join(',');
    const add = (action.addLabelIds ?? []).map(labelKeyword).filter(Boolean);
    const remove = (action.removeLabelIds ?? []).map(labelKeyword).filter(Boolean);
    await this.withMailbox(this.options.imap.mailbox, 'IMAP store flags', async () => {
      if (add.length) await this.client.messageFlagsAdd(range, add, { uid: true });
      if (remove.length) await this.client.messageFlagsRemove(range, remove, { uid: true });
    });
  }

  async mutate(id: string, action: RuleAction): Promise<void> {
    await this.batchMutate([id], action);
  }

  private mailOptions(content: MailContent): SendMailOptions {
    return {
      from: this.options.smtp.from || this.options.smtp.user,
      to: content.to.join(', '),
      cc: content.cc?.join(', '),
      bcc: content.bcc?.join(', '),
      subject: content.subject,
      text: content.text,
      html: content.html,
      inReplyTo: content.inReplyTo,
      references: content.references?.join(' '),
    };
  }

  async createDraft(content: MailContent): Promise<DraftResult> {
    const composer = new MailComposer(this.mailOptions(content));
    const raw = await composer.compile().build();
    const mailbox = this.options.imap.draftsMailbox;
    return this.withMailbox(mailbox, 'IMAP append draft', async () => {
      const appended: unknown = await this.client.append(mailbox, raw, ['\\Draft', '\\Seen'], new Date());
      const uid = typeof appended === 'object' && appended !== null ? Reflect.get(appended, 'uid') : undefined;
      if (typeof uid !== 'number') {
        throw new TransientApiError(`Draft appended to ${mailbox} but the server returned no UID`);
      }
      return { draftId: String(uid) };
    });
  }

  async send(content: MailContent): Promise<SentResult> {
    try {
      const result = await this.transporter.sendMail(this.mailOptions(content));
      return { messageId: result.messageId };
    } catch (err) {
      throw toStoreError(err, 'SMTP send');
    }
  }

  async close(): Promise<void> {
    this.transporter.close();
    if (!this.connected) return;
    await this.client.logout();
    this.connected = false;
  }
}
