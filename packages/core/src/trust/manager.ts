import { debug } from '../debug.js';
import { ConflictError, ValidationError } from '../errors.js';
import { normalizeAddresses, splitAddressList } from '../mail/recipients.js';
import { EMAIL_PATTERN, formatGroupRef, maskAddress, parseTrustEntry } from './tokens.js';
import type { GroupDirectory, TrustEntry, TrustListStore } from './types.js';

const MAX_WRITE_ATTEMPTS = 3;

export interface TrustListAddResult {
  success: boolean;
  summary: string;
  added: string[];
  alreadyPresent: string[];
  invalid: string[];
  total: number;
}

export interface TrustListRemoveResult {
  success: boolean;
  summary: string;
  removed: string[];
  notPresent: string[];
  total: number;
}

export interface TrustListView {
  success: true;
  summary: string;
  total: number;
  /** Literal addresses, masked */
  addresses: string[];
  /** Group tokens in their stored form */
  groups: string[];
  version: number;
}

export interface LabelAddResult {
  success: boolean;
  summary: string;
  label: string;
  groupId: string;
  added: string[];
  alreadyMember: string[];
  invalid: string[];
}

export interface LabelRemoveResult {
  success: boolean;
  summary: string;
  label: string;
  groupId: string;
  removed: string[];
  notMember: string[];
}

/** Identity used to compare tokens: lowercased address, or kind + lowercased group value */
function entryKey(entry: TrustEntry): string {
  return entry.kind === 'address' ? entry.email : `${entry.ref.kind}:${entry.ref.value.toLowerCase()}`;
}

function tokenKey(token: string): string {
  const entry = parseTrustEntry(token);
  return entry ? entryKey(entry) : token.trim().toLowerCase();
}

/** Stored form: lowercased literal address, or a group token as the caller wrote it (prefix canonicalized) */
function storedForm(entry: TrustEntry): string {
  return entry.kind === 'address' ? entry.email : formatGroupRef(entry.ref);
}

function entries(n: number): string {
  return `${n} ${n === 1 ? 'entry' : 'entries'}`;
}

/**
 * The add/remove/view/label_add/label_remove verbs. Each list mutation is a
 * read-modify-write guarded by the store's version check.
 */
export class TrustListManager {
  constructor(
    private store: TrustListStore,
    private directory: GroupDirectory | null,
  ) {}

  private async readModifyWrite<T>(
    apply: (tokens: string[]) => { tokens: string[] | null; result: T },
  ): Promise<{ result: T; total: number }> {
    for (let attempt = 1; ; attempt++) {
      const snapshot = await this.store.load();
      const { tokens, result } = apply(snapshot.tokens);
      if (!tokens) return { result, total: snapshot.tokens.length };
      try {
        const saved = await this.store.save(tokens, snapshot.version);
        return { result, total: saved.tokens.length };
      } catch (err) {
        if (!(err instanceof ConflictError) || attempt >= MAX_WRITE_ATTEMPTS) throw err;
        debug('trust', `Version conflict on attempt ${attempt}, retrying`);
      }
    }
  }

  async add(rawEntries: readonly string[]): Promise<TrustListAddResult> {
    const candidates = splitAddressList(rawEntries);
    if (candidates.length === 0) throw new ValidationError('At least one email address or group token is required');

    const invalid: string[] = [];
    const parsed: TrustEntry[] = [];
    for (const candidate of candidates) {
      const entry = parseTrustEntry(candidate);
      if (!entry || (entry.kind === 'address' && !EMAIL_PATTERN.test(entry.raw))) invalid.push(candidate);
      else parsed.push(entry);
    }

    const { result, total } = await this.readModifyWrite(tokens => {
      const keys = new Set(tokens.map(tokenKey));
      const added: string[] = [];
      const alreadyPresent: string[] = [];
      for (const entry of parsed) {
        const key = entryKey(entry);
        const form = storedForm(entry);
        if (keys.has(key)) {
          if (!alreadyPresent.includes(form)) alreadyPresent.push(form);
          continue;
        }
        keys.add(key);
        added.push(form);
      }
      return { tokens: added.length > 0 ? [...tokens, ...added] : null, result: { added, alreadyPresent } };
    });

    const parts: string[] = [];
    if (result.added.length) parts.push(`Added ${entries(result.added.length)}`);
    if (result.alreadyPresent.length) parts.push(`${result.alreadyPresent.length} already present`);
    if (invalid.length) parts.push(`${invalid.length} invalid skipped`);
    const summary = result.added.length === 0 && result.alreadyPresent.length === 0
      ? `No valid entries to add. Invalid: ${invalid.join(', ')}`
      : `${parts.join('; ')}. Trust list now has ${entries(total)}.`;

    return {
      success: result.added.length > 0 || result.alreadyPresent.length > 0,
      summary,
      added: result.added,
      alreadyPresent: result.alreadyPresent,
      invalid,
      total,
    };
  }

  async remove(rawEntries: readonly string[]): Promise<TrustListRemoveResult> {
    const candidates = splitAddressList(rawEntries);
    if (candidates.length === 0) throw new ValidationError('At least one email address or group token is required');

    const { result, total } = await this.readModifyWrite(tokens => {
      const wanted = new Map(candidates.map(c => [tokenKey(c), c]));
      const removed: string[] = [];
      const kept: string[] = [];
      for (const token of tokens) {
        const key = tokenKey(token);
        if (wanted.has(key)) {
          removed.push(token);
          wanted.delete(key);
        } else {
          kept.push(token);
        }
      }
      return { tokens: removed.length > 0 ? kept : null, result: { removed, notPresent: [...wanted.values()] } };
    });

    const summary = result.removed.length > 0
      ? `Removed ${result.removed.length} of ${candidates.length} requested; ${result.notPresent.length} not present.`
      : 'None of the requested entries were on the trust list.';
    return { success: result.removed.length > 0, summary, ...result, total };
  }

  async view(): Promise<TrustListView> {
    const { tokens, version } = await this.store.load();
    const addresses: string[] = [];
    const groups: string[] = [];
    for (const token of tokens) {
      const entry = parseTrustEntry(token);
      if (!entry) continue;
      if (entry.kind === 'address') addresses.push(maskAddress(entry.email));
      else groups.push(entry.raw);
    }
    const total = addresses.length + groups.length;
    const summary = total === 0
      ? 'Trust list is empty; every recipient is treated as trusted.'
      : `Trust list has ${addresses.length} address(es) and ${groups.length} group(s).`;
    return { success: true, summary, total, addresses, groups, version };
  }

  private requireDirectory(): GroupDirectory {
    if (!this.directory) throw new ValidationError('No group directory is configured');
    return this.directory;
  }

  async labelAdd(label: string, rawEmails: readonly string[]): Promise<LabelAddResult> {
    const name = label.trim();
    if (!name) throw new ValidationError('label is required');
    const emails = normalizeAddresses(splitAddressList(rawEmails));
    const valid = emails.filter(e => EMAIL_PATTERN.test(e));
    const invalid = emails.filter(e => !EMAIL_PATTERN.test(e));
    if (valid.length === 0) throw new ValidationError('At least one valid email address is required');

    const directory = this.requireDirectory();
    const groupId = await directory.ensureGroup(name);
    const { created, existing } = await directory.addMembers(groupId, valid);

    return {
      success: true,
      summary: `Group "${name}": ${created.length} added, ${existing.length} already member(s). Trust it with "group:${name}".`,
      label: name,
      groupId,
      added: created,
      alreadyMember: existing,
      invalid,
    };
  }

  async labelRemove(label: string, rawEmails: readonly string[]): Promise<LabelRemoveResult> {
    const name = label.trim();
    if (!name) throw new ValidationError('label is required');
    const emails = normalizeAddresses(splitAddressList(rawEmails));
    if (emails.length === 0) throw new ValidationError('At least one email address is required');

    const directory = this.requireDirectory();
    const groupId = await directory.ensureGroup(name);
    const members: string[] = [];
    const notMember: string[] = [];
    for (const email of emails) {
      const ids = await directory.findMembersByEmail(groupId, email);
      if (ids.length > 0) members.push(email);
      else notMember.push(email);
    }
    const count = members.length > 0 ? await directory.removeMembers(groupId, members) : 0;

    return {
      success: count > 0,
      summary: count > 0
        ? `Group "${name}": removed ${count} member(s); ${notMember.length} not a member.`
        : `Group "${name}": none of the addresses were members.`,
      label: name,
      groupId,
      removed: members,
      notMember,
    };
  }
}
