import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ElicitRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  createMailwardenContext,
  createTestDatabase,
  isRecord,
  resolveConfig,
  type MailwardenContext,
} from '@mailwarden/core';
import { FakeMessageStore, noSleep } from '../../../core/src/__tests__/fakes.js';
import { createMcpServer } from '../server.js';

let context: MailwardenContext;
let store: FakeMessageStore;

function textOf(result: unknown): string {
  const content = isRecord(result) ? result.content : undefined;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  if (!isRecord(first) || typeof first.text !== 'string') throw new Error('tool result has no text content');
  return first.text;
}

async function connect(answer?: { action: 'accept' | 'decline' | 'cancel'; content?: Record<string, string> }) {
  const client = new Client(
    { name: 'test-client', version: '1.0.0' },
    { capabilities: answer ? { elicitation: {} } : {} },
  );
  const prompts: Array<{ message: string; requestedSchema: unknown }> = [];
  if (answer) {
    client.setRequestHandler(ElicitRequestSchema, async (request) => {
      prompts.push({ message: request.params.message, requestedSchema: request.params.requestedSchema });
      return answer;
    });
  }
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const server = createMcpServer(context);
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return { client, prompts };
}

beforeEach(() => {
  process.env.MAILWARDEN_DATA_DIR = join(tmpdir(), `mailwarden-mcp-test-${process.pid}`);
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  store = new FakeMessageStore(['u1', 'u2']);
  context = createMailwardenContext(resolveConfig({ trust: { fallbackPolicy: 'block' } }), {
    db: createTestDatabase(),
    store,
    sleep: noSleep,
  });
});

afterEach(() => {
  delete process.env.MAILWARDEN_DATA_DIR;
  vi.restoreAllMocks();
});

describe('MCP server', () => {
  it('lists every tool', async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    expect(tools.map(t => t.name)).toEqual([
      'send_email',
      'forward_email',
      'reply_email',
      'manage_trust_list',
      'create_rule',
      'get_rule',
      'delete_rule',
      'list_rules',
      'apply_rule',
    ]);
  });

  it('asks the client before sending to an untrusted recipient and saves a draft on request', async () => {
    await context.trustList.add(['friend@example.com']);
    const { client, prompts } = await connect({ action: 'accept', content: { action: 'save_draft' } });

    const result = await client.callTool({
      name: 'send_email',
      arguments: { to: ['friend@example.com', 'new@example.com'], subject: 'Plans', text: 'See you soon' },
    });

    expect(JSON.parse(textOf(result))).toMatchObject({ outcome: 'draft_saved', draftId: 'draft-1' });
    expect(prompts).toHaveLength(1);
    expect(prompts[0].requestedSchema).toMatchObject({ type: 'object', required: ['action'], properties: { action: { type: 'string' } } });
    expect(prompts[0].message).toContain('Not on your trust list: new@example.com');
    expect(store.sent).toHaveLength(0);
  });

  it('cancels when the client declines', async () => {
    await context.trustList.add(['friend@example.com']);
    const { client } = await connect({ action: 'decline' });

    const result = await client.callTool({ name: 'reply_email', arguments: { to: 'new@example.com', subject: 'Re: hi' } });
    expect(JSON.parse(textOf(result))).toMatchObject({ success: false, outcome: 'cancelled', summary: 'Reply declined by user' });
    expect(store.sent).toHaveLength(0);
    expect(store.drafts).toHaveLength(0);
  });

  it('falls back to the configured policy when the client cannot be asked', async () => {
    await context.trustList.add(['friend@example.com']);
    const { client } = await connect();

    const result = await client.callTool({ name: 'send_email', arguments: { to: 'new@example.com', subject: 'Hello' } });
    expect(JSON.parse(textOf(result))).toMatchObject({ outcome: 'blocked', untrustedRecipients: ['new@example.com'] });
  });

  it('manages the trust list and rules', async () => {
    const { client } = await connect();

    const added = await client.callTool({ name: 'manage_trust_list', arguments: { action: 'add', entries: 'boss@example.com' } });
    expect(JSON.parse(textOf(added))).toMatchObject({ added: ['boss@example.com'], total: 1 });

    const rule = await client.callTool({
      name: 'create_rule',
      arguments: { criteria: { from: 'boss@example.com' }, action: { addLabelIds: ['Boss'] } },
    });
    expect(JSON.parse(textOf(rule))).toMatchObject({
      summary: 'Rule "From: boss@example.com" created; 2/2 existing message(s) updated',
    });

    const listed = await client.callTool({ name: 'list_rules', arguments: {} });
    expect(JSON.parse(textOf(listed))).toMatchObject({ count: 1 });
  });

  it('reports retroactive progress to a client that asked for it', async () => {
    const { client } = await connect();
    const updates: Array<{ progress: number; message?: string }> = [];

    const result = await client.callTool(
      { name: 'create_rule', arguments: { criteria: { subject: 'invoice' }, action: { addLabelIds: ['Billing'] } } },
      undefined,
      { onprogress: update => updates.push(update) },
    );

    expect(JSON.parse(textOf(result))).toMatchObject({ retroactive: { attempted: true, state: { processedCount: 2 } } });
    expect(updates.map(u => u.progress)).toEqual([1, 2, 3]);
    expect(updates.map(u => u.message)).toEqual([
      'Listed page 1: 2 matching message(s) so far',
      'Batch 1/1: 2 message(s), 0 failed',
      'Done: 2/2 message(s) updated',
    ]);
  });

  it('returns errors as tool results', async () => {
    const { client } = await connect();

    const unknown = await client.callTool({ name: 'nope', arguments: {} });
    expect(unknown).toMatchObject({ isError: true });
    expect(textOf(unknown)).toBe('Error: Unknown tool: nope');

    const missing = await client.callTool({ name: 'get_rule', arguments: { id: 'missing' } });
    expect(textOf(missing)).toBe('Error: Rule not found: missing');

    const badAction = await client.callTool({ name: 'manage_trust_list', arguments: { action: 'purge' } });
    expect(textOf(badAction)).toBe('Error: Unknown trust list action: purge');
  });
});
