import { describe, it, expect } from 'vitest';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { EMAIL_ACTION_SCHEMA, type ResponseSchema } from '@mailwarden/core';
import { McpElicitationTransport, type ElicitingServer } from '../elicitation.js';

type Answer = { action: string; content?: Record<string, unknown> } | Error;

class FakeServer implements ElicitingServer {
  calls: Array<{ message: string; timeout?: number; signal?: AbortSignal }> = [];

  constructor(private answer: Answer, private capabilities: { elicitation?: object } | undefined = { elicitation: {} }) {}

  getClientCapabilities() {
    return this.capabilities;
  }

  async elicitInput(
    params: { message: string; requestedSchema: ResponseSchema },
    options?: { signal?: AbortSignal; timeout?: number },
  ) {
    this.calls.push({ message: params.message, timeout: options?.timeout, signal: options?.signal });
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

function options() {
  return { timeoutMs: 300_000, signal: new AbortController().signal };
}

describe('McpElicitationTransport', () => {
  it('reports unsupported without a round trip when the client lacks the capability', async () => {
    const server = new FakeServer({ action: 'accept' }, {});
    const outcome = await new McpElicitationTransport(server).prompt('confirm?', EMAIL_ACTION_SCHEMA, options());
    expect(outcome).toEqual({ kind: 'unsupported', reason: 'client did not declare the elicitation capability' });
    expect(server.calls).toHaveLength(0);
  });

  it('maps accept, decline and cancel answers', async () => {
    const accept = await new McpElicitationTransport(new FakeServer({ action: 'accept', content: { action: 'send' } }))
      .prompt('confirm?', EMAIL_ACTION_SCHEMA, options());
    expect(accept).toEqual({ kind: 'response', response: { kind: 'accept', content: { action: 'send' } } });

    const decline = await new McpElicitationTransport(new FakeServer({ action: 'decline' }))
      .prompt('confirm?', EMAIL_ACTION_SCHEMA, options());
    expect(decline).toEqual({ kind: 'response', response: { kind: 'decline' } });

    const cancel = await new McpElicitationTransport(new FakeServer({ action: 'cancel' }))
      .prompt('confirm?', EMAIL_ACTION_SCHEMA, options());
    expect(cancel).toEqual({ kind: 'response', response: { kind: 'cancel' } });
  });

  it('gives the request a timeout past the controller deadline and forwards the signal', async () => {
    const server = new FakeServer({ action: 'decline' });
    const opts = options();
    await new McpElicitationTransport(server).prompt('confirm?', EMAIL_ACTION_SCHEMA, opts);
    expect(server.calls[0].timeout).toBe(305_000);
    expect(server.calls[0].signal).toBe(opts.signal);
  });

  it('treats method-not-found as unsupported and anything else as an error', async () => {
    const missing = await new McpElicitationTransport(new FakeServer(new McpError(ErrorCode.MethodNotFound, 'no elicitation')))
      .prompt('confirm?', EMAIL_ACTION_SCHEMA, options());
    expect(missing.kind).toBe('unsupported');

    const broken = await new McpElicitationTransport(new FakeServer(new Error('connection closed')))
      .prompt('confirm?', EMAIL_ACTION_SCHEMA, options());
    expect(broken).toEqual({ kind: 'error', error: new Error('connection closed') });
  });

  it('rejects an action it does not know', async () => {
    const outcome = await new McpElicitationTransport(new FakeServer({ action: 'maybe' }))
      .prompt('confirm?', EMAIL_ACTION_SCHEMA, options());
    expect(outcome).toEqual({ kind: 'error', error: new Error('Unknown elicitation action: maybe') });
  });
});
