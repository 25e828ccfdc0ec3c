/**
 * Trust-list token grammar (persisted form is comma-separated):
 *
 *   token := literal-email | "group:" name | "groupId:" resource-id
 *
 * Prefixes match case-insensitively after trimming.
 */
import type { GroupRef, TrustEntry } from './types.js';

const GROUP_NAME_PREFIX = 'group:';
const GROUP_ID_PREFIX = 'groupid:';

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isGroupToken(token: string): boolean {
  const lower = token.trim().toLowerCase();
  return lower.startsWith(GROUP_NAME_PREFIX) || lower.startsWith(GROUP_ID_PREFIX);
}

export interface SplitTokens {
  literalTokens: string[];
  groupTokens: string[];
}

export function splitTokens(rawTokens: readonly string[]): SplitTokens {
  const literalTokens: string[] = [];
  const groupTokens: string[] = [];
  for (const raw of rawTokens) {
    const token = raw.trim();
    if (!token) continue;
    if (isGroupToken(token)) groupTokens.push(token);
    else literalTokens.push(token);
  }
  return { literalTokens, groupTokens };
}

/** null for a group token with nothing after the prefix */
export function parseGroupRef(token: string): GroupRef | null {
  const trimmed = token.trim();
  const lower = trimmed.toLowerCase();
  let ref: GroupRef | null = null;
  if (lower.startsWith(GROUP_ID_PREFIX)) {
    ref = { kind: 'id', value: trimmed.slice(GROUP_ID_PREFIX.length).trim() };
  } else if (lower.startsWith(GROUP_NAME_PREFIX)) {
    ref = { kind: 'name', value: trimmed.slice(GROUP_NAME_PREFIX.length).trim() };
  }
  if (!ref || !ref.value) return null;
  return Object.freeze(ref);
}

export function parseTrustEntry(token: string): TrustEntry | null {
  const raw = token.trim();
  if (!raw) return null;
  if (isGroupToken(raw)) {
    const ref = parseGroupRef(raw);
    if (!ref) return null;
    const entry: TrustEntry = { kind: 'group', raw, ref };
    return Object.freeze(entry);
  }
  const entry: TrustEntry = { kind: 'address', raw, email: raw.toLowerCase() };
  return Object.freeze(entry);
}

export function formatGroupRef(ref: GroupRef): string {
  return ref.kind === 'id' ? `groupId:${ref.value}` : `group:${ref.value}`;
}

export function parseTrustListValue(value: string): string[] {
  return value.split(',').map(t => t.trim()).filter(Boolean);
}

export function formatTrustListValue(tokens: readonly string[]): string {
  return tokens.join(',');
}

/** `jo***@example.com` for local parts longer than 3 characters, `***@example.com` otherwise */
export function maskAddress(email: string): string {
  const at = email.indexOf('@');
  if (at < 0) return email.length > 3 ? `${email.slice(0, 3)}***` : '***';
  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  return local.length > 3 ? `${local.slice(0, 2)}***@${domain}` : `***@${domain}`;
}
