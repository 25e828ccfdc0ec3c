import { describe, it, expect, vi, afterEach } from 'vitest';
import { TrustGate } from '../trust/gate.js';
import { TrustListResolver } from '../trust/resolver.js';
import { MemoryTrustListStore } from '../trust/store.js';
import { FakeGroupDirectory } from './fakes.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('TrustListResolver', () => {
  it('merges literals and group members, lowercased and deduped', async () => {
    const directory = new FakeGroupDirectory({ VIP: ['Carol@Example.com', 'alice@example.com'] });
    const resolver = new TrustListResolver(directory);

    const set = await resolver.resolveTrustSet(['ALICE@example.com', ' group:vip ']);

    expect([...set.addresses].sort()).toEqual(['alice@example.com', 'carol@example.com']);
    expect(set.provenance.get('alice@example.com')).toEqual(['explicit', 'group:vip']);
    expect(set.provenance.get('carol@example.com')).toEqual(['group:vip']);
  });

  it('treats a failing or missing group as contributing no members', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const directory = new FakeGroupDirectory({ Ops: ['ops@example.com'], Down: ['x@example.com'] });
    directory.failing.add('down');
    const resolver = new TrustListResolver(directory);

    const set = await resolver.resolveTrustSet(['group:Down', 'group:Missing', 'group:Ops']);

    expect([...set.addresses]).toEqual(['ops@example.com']);
    expect(set.groups.map(g => g.error !== undefined)).toEqual([true, true, false]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('skips malformed group tokens without consulting the directory', async () => {
    const directory = new FakeGroupDirectory();
    const resolver = new TrustListResolver(directory);
    const [resolution] = await resolver.resolve(['group:']);
    expect(resolution).toEqual({ token: 'group:', ref: null, members: [] });
    expect(directory.expandCalls).toHaveLength(0);
  });

  it('yields the same set regardless of token order', async () => {
    const directory = new FakeGroupDirectory({ A: ['a@example.com'], B: ['b@example.com'] });
    const resolver = new TrustListResolver(directory);
    const first = await resolver.resolveTrustSet(['group:A', 'x@example.com', 'group:B']);
    const second = await resolver.resolveTrustSet(['group:B', 'group:A', 'x@example.com']);
    expect([...first.addresses].sort()).toEqual([...second.addresses].sort());
  });
});

describe('TrustGate', () => {
  function makeGate(tokens: string[], groups: Record<string, string[]> = {}) {
    const directory = new FakeGroupDirectory(groups);
    const resolver = new TrustListResolver(directory);
    return { gate: new TrustGate(new MemoryTrustListStore(tokens), resolver), resolver, directory };
  }

  it('matches recipients case-insensitively', async () => {
    const { gate, resolver } = makeGate(['user@example.com']);
    const set = await resolver.resolveTrustSet(['user@example.com']);
    const decision = gate.evaluate({ to: ['User@Example.com'] }, set);
    expect(decision.trustedRecipients).toEqual(['user@example.com']);
    expect(decision.untrustedRecipients).toEqual([]);
  });

  it('trusts everyone when no trust list is configured', async () => {
    const { gate } = makeGate([]);
    const { decision } = await gate.check({ to: ['a@example.com'], cc: ['b@example.com'] });
    expect(decision.trustedRecipients).toEqual(['a@example.com', 'b@example.com']);
    expect(decision.untrustedRecipients).toEqual([]);
  });

  it('partitions the union of to, cc and bcc', async () => {
    const { gate } = makeGate(['a@example.com']);
    const { decision } = await gate.check({
      to: ['a@example.com, b@example.com'],
      cc: ['B@example.com'],
      bcc: ['c@example.com'],
    });
    expect(decision.recipients).toEqual(['a@example.com', 'b@example.com', 'c@example.com']);
    expect(decision.trustedRecipients).toEqual(['a@example.com']);
    expect(decision.untrustedRecipients).toEqual(['b@example.com', 'c@example.com']);
  });

  it('expands a group token recipient instead of evaluating it literally', async () => {
    const { gate } = makeGate(['lead@example.com'], { VIP: ['lead@example.com', 'guest@example.com'] });
    const { decision, recipients } = await gate.check({ to: ['group:VIP'] });

    expect(recipients.to).toEqual(['lead@example.com', 'guest@example.com']);
    expect(decision.untrustedRecipients).toEqual(['guest@example.com']);
    expect(decision.untrustedRecipients).not.toContain('group:vip');
    expect(decision.recipients).not.toContain('group:vip');
  });

  it('reports an unresolvable group recipient with its error and delivers nothing for it', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { gate } = makeGate(['a@example.com']);
    const { recipients } = await gate.check({ to: ['group:Nobody', 'a@example.com'] });
    expect(recipients.to).toEqual(['a@example.com']);
    expect(recipients.groups).toEqual([
      { token: 'group:Nobody', ref: { kind: 'name', value: 'Nobody' }, members: [], error: 'Group not found: name:Nobody' },
    ]);
  });

  it('trusts nobody when every configured group fails to resolve', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { gate, directory } = makeGate(['group:VIP'], { VIP: ['lead@example.com'] });
    directory.failing.add('vip');

    const { trustSet, decision } = await gate.check({ to: ['stranger@example.com'] });

    expect(trustSet.addresses.size).toBe(0);
    expect(trustSet.configured).toBe(true);
    expect(decision.trustedRecipients).toEqual([]);
    expect(decision.untrustedRecipients).toEqual(['stranger@example.com']);
  });
});
