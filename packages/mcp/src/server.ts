import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage, type MailwardenContext } from '@mailwarden/core';
import { McpElicitationTransport } from './elicitation.js';
import { createProgressReporter } from './progress.js';
import { handleToolCall, toolDefinitions } from './tools.js';

/**
 * One server per client connection; the elicitation transport reaches back
 * to whichever client this server is connected to.
 */
export function createMcpServer(context: MailwardenContext, version = '0.1.0'): Server {
  const server = new Server(
    { name: 'mailwarden', version },
    { capabilities: { tools: {} } },
  );
  const elicitation = new McpElicitationTransport(server);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: toolDefinitions }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const progress = createProgressReporter(request.params._meta?.progressToken, extra.sendNotification, extra.signal);
    try {
      const result = await handleToolCall(context, name, args ?? {}, elicitation, progress.runOptions);
      await progress.flush();
      return { content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }] };
    } catch (err) {
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });

  return server;
}
