import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ElicitationController } from '../elicitation/controller.js';
import type { ElicitationSettings } from '../elicitation/types.js';
import { ValidationError } from '../errors.js';
import { OutboundGateway } from '../mail/outbound.js';
import { TrustGate } from '../trust/gate.js';
import { TrustListResolver } from '../trust/resolver.js';
import { MemoryTrustListStore } from '../trust/store.js';
import { FakeGroupDirectory, FakeMessageStore, ScriptedTransport } from './fakes.js';

function setup(tokens: string[], settings: Partial<ElicitationSettings> = {}) {
  const store = new FakeMessageStore();
  const directory = new FakeGroupDirectory({ Team: ['Lead@example.com', 'dev@example.com'] });
  const gate = new TrustGate(new MemoryTrustListStore(tokens), new TrustListResolver(directory));
  const controller = new ElicitationController(() => ({
    enabled: true,
    fallbackPolicy: 'block',
    timeoutMs: 300_000,
    ...settings,
  }));
  return { store, directory, gateway: new OutboundGateway(gate, controller, store) };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('OutboundGateway', () => {
  it('sends directly when every recipient is trusted', async () => {
    const { store, gateway } = setup(['friend@example.com']);
    const result = await gateway.send({ intent: 'send', to: ['Friend@example.com'], subject: 'Hi', text: 'Hello' });

    expect(result).toEqual({
      success: true,
      outcome: 'sent',
      summary: 'Email sent',
      intent: 'send',
      recipients: ['friend@example.com'],
      untrustedRecipients: [],
      messageId: 'msg-1',
      draftId: undefined,
    });
    expect(store.sent[0].to).toEqual(['friend@example.com']);
  });

  it('blocks untrusted recipients without a transport under the block policy', async () => {
    const { store, gateway } = setup(['friend@example.com']);
    const result = await gateway.send({ intent: 'reply', to: ['friend@example.com'], cc: ['stranger@example.com'], subject: 'Re: hi' });

    expect(result.success).toBe(false);
    expect(result.outcome).toBe('blocked');
    expect(result.untrustedRecipients).toEqual(['stranger@example.com']);
    expect(result.summary).toBe('Reply blocked: 1 recipient(s) not on the trust list (stranger@example.com)');
    expect(store.sent).toHaveLength(0);
  });

  it('delivers to expanded group members', async () => {
    const { store, gateway } = setup(['lead@example.com', 'dev@example.com']);
    const result = await gateway.send({ intent: 'forward', to: ['group:Team'], subject: 'Fwd: plan' });

    expect(result.outcome).toBe('sent');
    expect(store.sent[0].to).toEqual(['lead@example.com', 'dev@example.com']);
  });

  it('saves a draft when the user chooses to', async () => {
    const { store, gateway } = setup(['friend@example.com']);
    const transport = new ScriptedTransport({ kind: 'response', response: { kind: 'accept', content: { action: 'save_draft' } } });
    const result = await gateway.send({ intent: 'send', to: ['new@example.com'], subject: 'Intro' }, transport);

    expect(result.outcome).toBe('draft_saved');
    expect(result.draftId).toBe('draft-1');
    expect(result.summary).toBe('Email saved as draft draft-1');
    expect(store.sent).toHaveLength(0);
  });

  it('validates before any side effect', async () => {
    const { store, gateway } = setup([]);
    await expect(gateway.send({ intent: 'send', to: ['a@example.com'], subject: '  ' })).rejects.toThrow('subject is required');
    await expect(gateway.send({ intent: 'send', to: [' , '], subject: 'x' })).rejects.toThrow('At least one recipient is required');
    await expect(gateway.send({ intent: 'send', to: ['group:Nobody'], subject: 'x' })).rejects.toBeInstanceOf(ValidationError);
    await expect(gateway.send({ intent: 'send', to: ['group:'], subject: 'x' }))
      .rejects.toThrow('Could not resolve recipient group(s): group: (malformed group token)');
    await expect(gateway.send({ intent: 'send', to: ['not-an-address'], subject: 'x' }))
      .rejects.toThrow('Invalid recipient address(es): not-an-address');
    expect(store.sent).toHaveLength(0);
    expect(store.drafts).toHaveLength(0);
  });

  it('rejects a send naming a group it cannot resolve instead of delivering to the rest', async () => {
    const { store, gateway } = setup([]);
    await expect(gateway.send({ intent: 'send', to: ['group:Board', 'a@example.com'], subject: 'Minutes' }))
      .rejects.toThrow('Could not resolve recipient group(s): group:Board (Group not found: name:Board)');
    expect(store.sent).toHaveLength(0);
  });

  it('asks before sending when the trust list only names groups the directory cannot reach', async () => {
    const { store, directory, gateway } = setup(['group:Team']);
    directory.failing.add('team');
    const transport = new ScriptedTransport({ kind: 'response', response: { kind: 'decline' } });

    const result = await gateway.send({ intent: 'send', to: ['stranger@example.com'], subject: 'Hello' }, transport);

    expect(result.outcome).toBe('cancelled');
    expect(result.untrustedRecipients).toEqual(['stranger@example.com']);
    expect(transport.prompts).toHaveLength(1);
    expect(store.sent).toHaveLength(0);
  });
});
