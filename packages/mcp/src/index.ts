#!/usr/bin/env node
import 'dotenv/config';
import { createServer } from 'node:http';
import { randomUUID } from 'node:crypto';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createMailwardenContext, errorMessage, resolveConfig } from '@mailwarden/core';
import { createMcpServer } from './server.js';

const VERSION = '0.1.0';

const context = createMailwardenContext(resolveConfig());

// Parse CLI args
const args = process.argv.slice(2);
const httpFlag = args.includes('--http');
const portArg = args.find(a => a.startsWith('--port='));
const httpPort = portArg ? parseInt(portArg.split('=')[1], 10) : (parseInt(process.env.MCP_PORT || '', 10) || 8014);

function sessionIdOf(header: string | string[] | undefined): string | undefined {
  return typeof header === 'string' ? header : undefined;
}

if (httpFlag || process.env.MCP_HTTP === '1') {
  // ─── Streamable HTTP Transport ────────────────────────────────────
  // Usage: mailwarden-mcp --http [--port=8014]
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const httpServer = createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', `http://localhost:${httpPort}`);

    // Health check
    if (url.pathname === '/health' && req.method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', transport: 'streamable-http', sessions: transports.size }));
      return;
    }

    // Only handle /mcp endpoint
    if (url.pathname !== '/mcp') {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found. MCP endpoint is POST /mcp' }));
      return;
    }

    const sessionId = sessionIdOf(req.headers['mcp-session-id']);
    const existing = sessionId ? transports.get(sessionId) : undefined;

    try {
      if (req.method === 'DELETE' || req.method === 'GET') {
        if (!existing) {
          res.writeHead(400, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: 'Invalid or missing session ID. Send a POST /mcp with initialize first.' }));
          return;
        }
        await existing.handleRequest(req, res);
        if (req.method === 'DELETE' && sessionId) transports.delete(sessionId);
        return;
      }

      if (req.method === 'POST') {
        if (existing) {
          await existing.handleRequest(req, res);
          return;
        }

        // New session: a server per client so elicitation goes back to that client
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            transports.set(sid, transport);
          },
        });
        transport.onclose = () => {
          if (transport.sessionId) transports.delete(transport.sessionId);
        };

        const sessionServer = createMcpServer(context, VERSION);
        await sessionServer.connect(transport);
        await transport.handleRequest(req, res);
        return;
      }

      res.writeHead(405, { 'Allow': 'GET, POST, DELETE', 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Method not allowed. Use POST /mcp for JSON-RPC, GET /mcp for SSE stream.' }));
    } catch (err) {
      console.error('[mailwarden-mcp] Request failed:', errorMessage(err));
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Internal server error' }));
      }
    }
  });

  httpServer.listen(httpPort, () => {
    console.log(`[mailwarden-mcp] Streamable HTTP endpoint: http://localhost:${httpPort}/mcp`);
  });

  async function shutdown(): Promise<void> {
    for (const transport of transports.values()) {
      try {
        await transport.close();
      } catch (err) {
        console.error('[mailwarden-mcp] Closing a session failed:', errorMessage(err));
      }
    }
    httpServer.close();
    process.exit(0);
  }
  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
} else {
  // ─── Stdio Transport (default) ────────────────────────────────────
  const server = createMcpServer(context, VERSION);
  const transport = new StdioServerTransport();
  try {
    await server.connect(transport);
  } catch (err) {
    console.error('[mailwarden-mcp] Failed to start:', err);
    process.exit(1);
  }

  async function shutdown(): Promise<void> {
    try {
      await server.close();
    } catch (err) {
      console.error('[mailwarden-mcp] Shutdown failed:', errorMessage(err));
    }
    process.exit(0);
  }
  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}
