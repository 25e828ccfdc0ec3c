/**
 * Debug logger. Only outputs when MAILWARDEN_DEBUG is set.
 * Writes to stderr: stdout carries the MCP stdio stream.
 */
const enabled = () => !!process.env.MAILWARDEN_DEBUG;

export function debug(tag: string, message: string): void {
  if (enabled()) console.error(`[${tag}] ${message}`);
}

export function debugWarn(tag: string, message: string): void {
  if (enabled()) console.warn(`[${tag}] ${message}`);
}
