import { ValidationError } from '../errors.js';
import { flattenMultiValue, splitAddressList, toMultiValue } from './recipients.js';
import type { SendIntent, SendRequest } from './types.js';

export function isRecord(raw: unknown): raw is Record<string, unknown> {
  return raw !== null && typeof raw === 'object' && !Array.isArray(raw);
}

function optionalString(body: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = body[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') throw new ValidationError(`${key} must be a string`);
    return value;
  }
  return undefined;
}

/** Raw recipient field → list of entries, case kept so group names survive */
function recipientField(body: Record<string, unknown>, key: string): string[] {
  return splitAddressList(flattenMultiValue(toMultiValue(body[key], key)));
}

/**
 * Reads a send/forward/reply payload from an HTTP body or tool arguments.
 * `body` is accepted as an alias of `text`, `in_reply_to` of `inReplyTo`.
 */
export function readSendRequest(raw: unknown, intent: SendIntent): SendRequest {
  if (!isRecord(raw)) throw new ValidationError('Request body must be an object');
  const references = flattenMultiValue(toMultiValue(raw.references, 'references'))
    .flatMap(r => r.split(/\s+/))
    .filter(Boolean);

  return {
    intent,
    to: recipientField(raw, 'to'),
    cc: recipientField(raw, 'cc'),
    bcc: recipientField(raw, 'bcc'),
    subject: optionalString(raw, 'subject') ?? '',
    text: optionalString(raw, 'text', 'body'),
    html: optionalString(raw, 'html'),
    inReplyTo: optionalString(raw, 'inReplyTo', 'in_reply_to'),
    references: references.length ? references : undefined,
  };
}

/** Trust-list entries: a string, a list, or a map keyed by display name */
export function readEntries(raw: unknown, field = 'entries'): string[] {
  return splitAddressList(flattenMultiValue(toMultiValue(raw, field)));
}
