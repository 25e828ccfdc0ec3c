import { UnsupportedCapabilityError, errorMessage } from '../errors.js';
import type { TransportOutcome } from './types.js';

/** JSON-RPC "method not found" */
const METHOD_NOT_FOUND = -32601;

function hasNumericCode(err: unknown, code: number): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'code') === code;
}

/**
 * The one place a thrown transport error is turned into an outcome. Missing
 * capability (our own error or a JSON-RPC method-not-found) is soft;
 * everything else is a hard failure.
 */
export function classifyTransportError(err: unknown): TransportOutcome {
  if (err instanceof UnsupportedCapabilityError) {
    return { kind: 'unsupported', reason: err.message };
  }
  if (hasNumericCode(err, METHOD_NOT_FOUND)) {
    return { kind: 'unsupported', reason: errorMessage(err) };
  }
  return { kind: 'error', error: err instanceof Error ? err : new Error(String(err)) };
}
