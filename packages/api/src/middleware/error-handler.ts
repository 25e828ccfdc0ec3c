import type { Request, Response, NextFunction } from 'express';
import { debug, errorMessage } from '@mailwarden/core';

function numericField(err: unknown, key: string): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'number' ? value : undefined;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const message = errorMessage(err);

  // Don't send response if headers already sent
  if (res.headersSent) return;

  // JSON parse error from express.json() middleware
  if (err instanceof SyntaxError && numericField(err, 'status') === 400) {
    res.status(400).json({ error: 'Invalid JSON in request body' });
    return;
  }

  // Use explicit status if set on the error object
  const statusCode = numericField(err, 'statusCode');
  if (statusCode !== undefined) {
    if (statusCode >= 500) console.error(`[ERROR] ${req.method} ${req.path}: ${message}`);
    else debug('api', `${req.method} ${req.path} -> ${statusCode}: ${message}`);
    res.status(statusCode).json({ error: message });
    return;
  }

  console.error(`[ERROR] ${req.method} ${req.path}:`, err instanceof Error ? err.stack || message : message);

  // Pattern-match common error messages (fallback heuristic)
  const lowerMsg = message.toLowerCase();
  if (lowerMsg.includes('not found')) {
    res.status(404).json({ error: message });
    return;
  }

  if (lowerMsg.includes('unique constraint')) {
    res.status(409).json({ error: 'Resource already exists' });
    return;
  }

  if (lowerMsg.includes('invalid') || lowerMsg.includes('required') || lowerMsg.includes('must ')) {
    res.status(400).json({ error: message });
    return;
  }

  res.status(500).json({ error: message || 'Internal server error' });
}
