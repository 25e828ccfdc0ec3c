import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { closeDatabase, errorMessage, ImapMessageStore } from '@mailwarden/core';
import { API_PREFIX, createApp } from './app.js';

const VERSION = (() => {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    // Works from both src/ (dev) and dist/ (built)
    const pkg: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    const version = typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
    return typeof version === 'string' ? version : '0.1.0';
  } catch {
    return '0.1.0';
  }
})();

const { app, context } = createApp({ version: VERSION });
const { port, host } = context.config.api;

if (!context.config.masterKey) {
  console.warn('[mailwarden] MAILWARDEN_MASTER_KEY is not set; every authenticated route will answer 401');
}

const server = app.listen(port, host, () => {
  console.log(`[mailwarden] v${VERSION} listening on http://${host}:${port}${API_PREFIX}`);
  console.log(`[mailwarden] Fallback policy for untrusted recipients: ${context.config.trust.fallbackPolicy}`);
});

server.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EADDRINUSE') {
    console.error(`Port ${port} is already in use`);
  } else {
    console.error('Failed to start server:', err);
  }
  process.exit(1);
});

// Graceful shutdown
let shuttingDown = false;
async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log('\nShutting down...');
  if (context.store instanceof ImapMessageStore) {
    try {
      await context.store.close();
    } catch (err) {
      console.error('[mailwarden] Closing the mailbox connection failed:', errorMessage(err));
    }
  }
  closeDatabase();
  server.close(() => process.exit(0));
  // Force exit after 5 seconds
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown().catch(() => process.exit(1)));
process.on('SIGINT', () => shutdown().catch(() => process.exit(1)));

process.on('unhandledRejection', (reason) => {
  console.error('[mailwarden] Unhandled promise rejection:', errorMessage(reason));
});
