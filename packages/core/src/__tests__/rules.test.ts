import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AuthError, NotFoundError, ValidationError } from '../errors.js';
import { RetroactiveRuleApplier } from '../rules/applier.js';
import { readAction, readSelector } from '../rules/input.js';
import { RuleManager } from '../rules/manager.js';
import { compileSelector, describeSelector, hasAnyAction, hasSelectorCriteria } from '../rules/selector.js';
import { createTestDatabase } from '../storage/db.js';
import { FakeMessageStore, noSleep } from './fakes.js';

describe('compileSelector', () => {
  it('combines every criterion into one expression in a fixed order', () => {
    const query = compileSelector({
      size: 1000,
      sizeComparison: 'larger',
      hasAttachment: true,
      query: 'invoice OR receipt',
      subject: 'Q3 report',
      to: 'me@example.com',
      from: 'boss@example.com',
    });
    expect(query.expression).toBe(
      'from:boss@example.com to:me@example.com subject:(Q3 report) invoice OR receipt has:attachment larger:1000',
    );
    expect(query.terms).toHaveLength(6);
  });

  it('negates attachment presence and ignores blank strings', () => {
    expect(compileSelector({ hasAttachment: false, subject: '   ' }).expression).toBe('-has:attachment');
  });

  it('requires a direction with a size and a positive size', () => {
    expect(() => compileSelector({ size: 10 })).toThrow(ValidationError);
    expect(() => compileSelector({ size: -1, sizeComparison: 'smaller' })).toThrow('size must be a positive whole number of bytes');
    expect(() => compileSelector({ sizeComparison: 'smaller' })).toThrow('sizeComparison requires size');
  });
});

describe('selector and action checks', () => {
  it('detects criteria and actions', () => {
    expect(hasSelectorCriteria({})).toBe(false);
    expect(hasSelectorCriteria({ hasAttachment: false })).toBe(true);
    expect(hasAnyAction({})).toBe(false);
    expect(hasAnyAction({ markAsSpam: true })).toBe(true);
    expect(hasAnyAction({ addLabelIds: [] })).toBe(false);
  });

  it('describes criteria for people', () => {
    expect(describeSelector({ from: 'a@example.com', size: 5, sizeComparison: 'smaller' }))
      .toEqual(['From: a@example.com', 'Size smaller than 5 bytes']);
  });
});

describe('rule input readers', () => {
  it('accepts camelCase and snake_case fields', () => {
    expect(readSelector({ from_address: 'a@example.com', has_attachment: 'true', size: '200', size_comparison: 'larger' }))
      .toEqual({ from: 'a@example.com', hasAttachment: true, size: 200, sizeComparison: 'larger' });
    expect(readAction({ add_label_ids: 'Work,Later', markAsImportant: true }))
      .toEqual({ addLabelIds: ['Work', 'Later'], markAsImportant: true });
  });

  it('rejects wrongly typed fields', () => {
    expect(() => readSelector({ from: 3 })).toThrow('from must be a string');
    expect(() => readSelector({ sizeComparison: 'equal' })).toThrow('sizeComparison must be "larger" or "smaller"');
    expect(() => readAction('nope')).toThrow('action must be an object');
  });
});

describe('RuleManager', () => {
  let store: FakeMessageStore;
  let manager: RuleManager;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    store = new FakeMessageStore(['m1', 'm2', 'm3'], 100);
    manager = new RuleManager(
      createTestDatabase(),
      new RetroactiveRuleApplier(store, noSleep),
      () => ({ batchSize: 100, maxItems: 10_000, rateLimitDelayMs: 0 }),
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requires at least one criterion and one action', async () => {
    await expect(manager.create({ selector: {}, action: { addLabelIds: ['Work'] } })).rejects.toThrow(ValidationError);
    await expect(manager.create({ selector: { from: 'a@example.com' }, action: {} })).rejects.toThrow(ValidationError);
    expect(manager.list()).toHaveLength(0);
  });

  it('applies label changes retroactively by default and embeds the report', async () => {
    const result = await manager.create({
      name: 'Boss mail',
      selector: { from: 'boss@example.com' },
      action: { addLabelIds: ['Work'], markAsImportant: true },
    });

    expect(result.success).toBe(true);
    expect(result.query).toBe('from:boss@example.com');
    expect(result.retroactive.attempted).toBe(true);
    expect(result.retroactive.state?.processedCount).toBe(3);
    expect(result.rule.lastRetroactive?.totalFound).toBe(3);
    expect(result.summary).toBe('Rule "Boss mail" created; 3/3 existing message(s) updated');
    expect(store.batchCalls).toEqual([['m1', 'm2', 'm3']]);
  });

  it('skips retroactive application when asked or when only non-label actions exist', async () => {
    const off = await manager.create({ selector: { from: 'a@example.com' }, action: { addLabelIds: ['X'] }, retroactive: false });
    const forwardOnly = await manager.create({ selector: { from: 'b@example.com' }, action: { forward: 'c@example.com' } });
    expect(off.retroactive).toEqual({ attempted: false, state: null });
    expect(forwardOnly.retroactive).toEqual({ attempted: false, state: null });
    expect(store.listCalls).toHaveLength(0);
  });

  it('keeps the rule when the retroactive run fails outright', async () => {
    store.failListPage = 1;
    store.listError = new AuthError('token revoked');
    const result = await manager.create({ selector: { subject: 'x' }, action: { removeLabelIds: ['INBOX'] } });
    expect(result.success).toBe(true);
    expect(result.retroactive).toEqual({ attempted: true, state: null, error: 'token revoked' });
    expect(manager.get(result.rule.id).name).toBe('Subject contains: x');
  });

  it('gets, lists and deletes rules', async () => {
    const { rule } = await manager.create({ selector: { from: 'a@example.com' }, action: { markAsSpam: true } });
    expect(manager.get(rule.id).selector).toEqual({ from: 'a@example.com' });
    expect(manager.list().map(r => r.id)).toEqual([rule.id]);
    expect(manager.delete(rule.id).id).toBe(rule.id);
    expect(() => manager.get(rule.id)).toThrow(NotFoundError);
    expect(() => manager.delete(rule.id)).toThrow(`Rule not found: ${rule.id}`);
  });

  it('re-applies a stored rule and records the new report', async () => {
    const { rule } = await manager.create({ selector: { from: 'a@example.com' }, action: { addLabelIds: ['Y'] }, retroactive: false });
    const result = await manager.apply(rule.id);
    expect(result.success).toBe(true);
    expect(result.state.processedCount).toBe(3);
    expect(manager.get(rule.id).lastRetroactive?.processedCount).toBe(3);
  });
});
