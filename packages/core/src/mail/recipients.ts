import { ValidationError } from '../errors.js';

/**
 * Input that callers may give as one value, a list, or a map keyed by some
 * name (e.g. display name → address). Normalized once at the API boundary.
 */
export type MultiValue<T> =
  | { kind: 'single'; value: T }
  | { kind: 'many'; values: T[] }
  | { kind: 'keyed'; entries: Record<string, T> };

function isStringRecord(raw: unknown): raw is Record<string, string> {
  return raw !== null
    && typeof raw === 'object'
    && !Array.isArray(raw)
    && Object.values(raw).every(v => typeof v === 'string');
}

export function toMultiValue(raw: unknown, field: string): MultiValue<string> {
  if (raw === undefined || raw === null) return { kind: 'many', values: [] };
  if (typeof raw === 'string') return { kind: 'single', value: raw };
  if (Array.isArray(raw)) {
    const values: string[] = [];
    for (const item of raw) {
      if (typeof item !== 'string') throw new ValidationError(`${field} must contain only strings`);
      values.push(item);
    }
    return { kind: 'many', values };
  }
  if (isStringRecord(raw)) return { kind: 'keyed', entries: { ...raw } };
  throw new ValidationError(`${field} must be a string, a list of strings, or a map of strings`);
}

export function flattenMultiValue<T>(value: MultiValue<T>): T[] {
  switch (value.kind) {
    case 'single': return [value.value];
    case 'many': return [...value.values];
    case 'keyed': return Object.keys(value.entries).sort().map(k => value.entries[k]);
  }
}

/** Split comma-joined entries and trim; empty pieces are dropped. Case is kept. */
export function splitAddressList(values: readonly string[]): string[] {
  const out: string[] = [];
  for (const v of values) {
    for (const piece of v.split(',')) {
      const trimmed = piece.trim();
      if (trimmed) out.push(trimmed);
    }
  }
  return out;
}

/** Split, trim, lowercase and dedupe, keeping first-seen order. */
export function normalizeAddresses(values: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const addr of splitAddressList(values)) seen.add(addr.toLowerCase());
  return [...seen];
}

/**
 * Label ids arrive as a list, a JSON array string, a comma-separated string,
 * or a single id.
 */
export function parseLabelIds(raw: unknown): string[] {
  if (raw === undefined || raw === null || raw === '') return [];
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (trimmed.startsWith('[')) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        throw new ValidationError(`Label ids are not valid JSON: ${trimmed}`);
      }
      return parseLabelIds(parsed);
    }
    return parseLabelIds(splitAddressList([trimmed]));
  }
  if (Array.isArray(raw)) {
    const ids: string[] = [];
    for (const item of raw) {
      if (typeof item !== 'string') throw new ValidationError('Label ids must be strings');
      const id = item.trim();
      if (id && !ids.includes(id)) ids.push(id);
    }
    return ids;
  }
  throw new ValidationError('Label ids must be a string or a list of strings');
}
