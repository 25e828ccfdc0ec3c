import { ValidationError } from '../errors.js';
import { parseLabelIds } from '../mail/recipients.js';
import { isRecord } from '../mail/request.js';
import type { CreateRuleInput } from './manager.js';
import type { RetroactiveRunState, RuleDefinitionAction, RuleSelector, SizeComparison } from './types.js';

type Fields = Record<string, unknown>;

/** First defined value among a camelCase name and its snake_case alias */
function pick(source: Fields, ...names: string[]): unknown {
  for (const name of names) {
    if (source[name] !== undefined && source[name] !== null) return source[name];
  }
  return undefined;
}

function optionalString(source: Fields, ...names: string[]): string | undefined {
  const value = pick(source, ...names);
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${names[0]} must be a string`);
  return value.trim() || undefined;
}

function optionalBoolean(source: Fields, ...names: string[]): boolean | undefined {
  const value = pick(source, ...names);
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ValidationError(`${names[0]} must be a boolean`);
}

function optionalNumber(source: Fields, ...names: string[]): number | undefined {
  const value = pick(source, ...names);
  if (value === undefined) return undefined;
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) throw new ValidationError(`${names[0]} must be a number`);
  return n;
}

function isSizeComparison(value: string): value is SizeComparison {
  return value === 'larger' || value === 'smaller';
}

function withoutUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) Reflect.deleteProperty(value, key);
  }
  return value;
}

export function readSelector(raw: unknown): RuleSelector {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ValidationError('criteria must be an object');
  const rawComparison = optionalString(raw, 'sizeComparison', 'size_comparison');
  if (rawComparison !== undefined && !isSizeComparison(rawComparison)) {
    throw new ValidationError('sizeComparison must be "larger" or "smaller"');
  }
  const comparison = rawComparison !== undefined && isSizeComparison(rawComparison) ? rawComparison : undefined;
  return withoutUndefined<RuleSelector>({
    from: optionalString(raw, 'from', 'from_address'),
    to: optionalString(raw, 'to', 'to_address'),
    subject: optionalString(raw, 'subject', 'subject_contains'),
    query: optionalString(raw, 'query'),
    hasAttachment: optionalBoolean(raw, 'hasAttachment', 'has_attachment'),
    size: optionalNumber(raw, 'size'),
    sizeComparison: comparison,
  });
}

export function readAction(raw: unknown): RuleDefinitionAction {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ValidationError('action must be an object');
  const add = parseLabelIds(pick(raw, 'addLabelIds', 'add_label_ids'));
  const remove = parseLabelIds(pick(raw, 'removeLabelIds', 'remove_label_ids'));
  return withoutUndefined<RuleDefinitionAction>({
    addLabelIds: add.length ? add : undefined,
    removeLabelIds: remove.length ? remove : undefined,
    forward: optionalString(raw, 'forward', 'forward_to'),
    markAsSpam: optionalBoolean(raw, 'markAsSpam', 'mark_as_spam'),
    markAsImportant: optionalBoolean(raw, 'markAsImportant', 'mark_as_important'),
    neverMarkAsSpam: optionalBoolean(raw, 'neverMarkAsSpam', 'never_mark_as_spam'),
    neverMarkAsImportant: optionalBoolean(raw, 'neverMarkAsImportant', 'never_mark_as_important'),
  });
}

/**
 * A create-rule payload. Criteria and action may be nested (`criteria` /
 * `selector`, `action`) or given flat at the top level.
 */
export function readCreateRuleInput(raw: unknown): CreateRuleInput {
  if (!isRecord(raw)) throw new ValidationError('Request body must be an object');
  const criteria = pick(raw, 'criteria', 'selector') ?? raw;
  const action = pick(raw, 'action') ?? raw;
  return {
    name: optionalString(raw, 'name'),
    selector: readSelector(criteria),
    action: readAction(action),
    retroactive: optionalBoolean(raw, 'retroactive', 'apply_retroactively'),
  };
}

export function readRunState(raw: unknown): RetroactiveRunState | null {
  if (!isRecord(raw)) return null;
  const count = (key: string): number => {
    const value = raw[key];
    return typeof value === 'number' ? value : 0;
  };
  const errors = Array.isArray(raw.errors) ? raw.errors.filter((e): e is string => typeof e === 'string') : [];
  return {
    totalFound: count('totalFound'),
    processedCount: count('processedCount'),
    errorCount: count('errorCount'),
    errors,
    truncated: raw.truncated === true,
    cancelled: raw.cancelled === true,
  };
}

/** Parse a JSON column; unreadable content yields `fallback` */
export function parseStoredJson<T>(text: string, read: (raw: unknown) => T, fallback: T): T {
  try {
    return read(JSON.parse(text));
  } catch {
    return fallback;
  }
}
