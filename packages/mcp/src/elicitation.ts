import {
  classifyTransportError,
  debug,
  type ElicitationTransport,
  type PromptOptions,
  type ResponseSchema,
  type TransportOutcome,
} from '@mailwarden/core';

/** Grace added to the SDK request timeout so the controller's deadline fires first */
const SDK_TIMEOUT_GRACE_MS = 5_000;

/** The slice of the SDK `Server` this transport needs */
export interface ElicitingServer {
  getClientCapabilities(): { elicitation?: object } | undefined;
  elicitInput(
    params: { message: string; requestedSchema: ResponseSchema },
    options?: { signal?: AbortSignal; timeout?: number },
  ): Promise<{ action: string; content?: Record<string, unknown> }>;
}

/**
 * Issues `elicitation/create` to the connected client. A client that never
 * declared the capability is reported as unsupported without a round trip.
 */
export class McpElicitationTransport implements ElicitationTransport {
  constructor(private server: ElicitingServer) {}

  async prompt(message: string, schema: ResponseSchema, options: PromptOptions): Promise<TransportOutcome> {
    if (!this.server.getClientCapabilities()?.elicitation) {
      return { kind: 'unsupported', reason: 'client did not declare the elicitation capability' };
    }

    try {
      const result = await this.server.elicitInput(
        { message, requestedSchema: schema },
        { signal: options.signal, timeout: options.timeoutMs + SDK_TIMEOUT_GRACE_MS },
      );
      debug('mcp', `elicitation answered with "${result.action}"`);
      switch (result.action) {
        case 'accept':
          return { kind: 'response', response: { kind: 'accept', content: result.content ?? {} } };
        case 'decline':
          return { kind: 'response', response: { kind: 'decline' } };
        case 'cancel':
          return { kind: 'response', response: { kind: 'cancel' } };
        default:
          return { kind: 'error', error: new Error(`Unknown elicitation action: ${result.action}`) };
      }
    } catch (err) {
      // McpError(MethodNotFound) lands in the unsupported branch
      return classifyTransportError(err);
    }
  }
}
