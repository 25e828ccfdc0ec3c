import { ValidationError } from '../errors.js';
import type { CompiledQuery, QueryTerm, RuleAction, RuleDefinitionAction, RuleSelector } from './types.js';

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function hasSelectorCriteria(selector: RuleSelector): boolean {
  return Boolean(
    text(selector.from) || text(selector.to) || text(selector.subject) || text(selector.query)
      || selector.hasAttachment !== undefined || selector.size !== undefined,
  );
}

export function validateSelector(selector: RuleSelector): void {
  if (selector.size !== undefined) {
    if (!Number.isInteger(selector.size) || selector.size <= 0) {
      throw new ValidationError('size must be a positive whole number of bytes');
    }
    if (selector.sizeComparison !== 'larger' && selector.sizeComparison !== 'smaller') {
      throw new ValidationError('sizeComparison must be "larger" or "smaller" when size is given');
    }
  } else if (selector.sizeComparison !== undefined) {
    throw new ValidationError('sizeComparison requires size');
  }
}

/**
 * Combines every present criterion into one query. Terms appear in a fixed
 * order: from, to, subject, free text, attachment, size.
 */
export function compileSelector(selector: RuleSelector): CompiledQuery {
  validateSelector(selector);
  const terms: QueryTerm[] = [];
  const parts: string[] = [];

  const from = text(selector.from);
  if (from) {
    terms.push({ field: 'from', value: from });
    parts.push(`from:${from}`);
  }
  const to = text(selector.to);
  if (to) {
    terms.push({ field: 'to', value: to });
    parts.push(`to:${to}`);
  }
  const subject = text(selector.subject);
  if (subject) {
    terms.push({ field: 'subject', value: subject });
    parts.push(`subject:(${subject})`);
  }
  const query = text(selector.query);
  if (query) {
    terms.push({ field: 'text', value: query });
    parts.push(query);
  }
  if (selector.hasAttachment !== undefined) {
    terms.push({ field: 'hasAttachment', value: selector.hasAttachment });
    parts.push(selector.hasAttachment ? 'has:attachment' : '-has:attachment');
  }
  if (selector.size !== undefined && selector.sizeComparison) {
    terms.push({ field: 'size', comparison: selector.sizeComparison, bytes: selector.size });
    parts.push(`${selector.sizeComparison}:${selector.size}`);
  }

  return { expression: parts.join(' '), terms };
}

export function hasLabelMutation(action: RuleAction): boolean {
  return (action.addLabelIds?.length ?? 0) > 0 || (action.removeLabelIds?.length ?? 0) > 0;
}

export function hasAnyAction(action: RuleDefinitionAction): boolean {
  return hasLabelMutation(action)
    || Boolean(text(action.forward))
    || Boolean(action.markAsSpam || action.markAsImportant || action.neverMarkAsSpam || action.neverMarkAsImportant);
}

/** The part of a rule's action that is applied retroactively */
export function labelActionOf(action: RuleDefinitionAction): RuleAction {
  return {
    addLabelIds: [...(action.addLabelIds ?? [])],
    removeLabelIds: [...(action.removeLabelIds ?? [])],
  };
}

export function describeSelector(selector: RuleSelector): string[] {
  const lines: string[] = [];
  const from = text(selector.from);
  if (from) lines.push(`From: ${from}`);
  const to = text(selector.to);
  if (to) lines.push(`To: ${to}`);
  const subject = text(selector.subject);
  if (subject) lines.push(`Subject contains: ${subject}`);
  const query = text(selector.query);
  if (query) lines.push(`Query: ${query}`);
  if (selector.hasAttachment !== undefined) lines.push(selector.hasAttachment ? 'Has attachment' : 'No attachment');
  if (selector.size !== undefined && selector.sizeComparison) {
    lines.push(`Size ${selector.sizeComparison === 'larger' ? 'larger' : 'smaller'} than ${selector.size} bytes`);
  }
  return lines;
}

export function describeAction(action: RuleDefinitionAction): string[] {
  const lines: string[] = [];
  if (action.addLabelIds?.length) lines.push(`Add labels: ${action.addLabelIds.join(', ')}`);
  if (action.removeLabelIds?.length) lines.push(`Remove labels: ${action.removeLabelIds.join(', ')}`);
  const forward = text(action.forward);
  if (forward) lines.push(`Forward to: ${forward}`);
  if (action.markAsSpam) lines.push('Mark as spam');
  if (action.markAsImportant) lines.push('Mark as important');
  if (action.neverMarkAsSpam) lines.push('Never mark as spam');
  if (action.neverMarkAsImportant) lines.push('Never mark as important');
  return lines;
}
