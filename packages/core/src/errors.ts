// ─── Error taxonomy ──────────────────────────────────────────────────

export type ErrorCode =
  | 'validation'
  | 'auth'
  | 'not_found'
  | 'conflict'
  | 'transient_api'
  | 'unsupported_capability';

export class MailwardenError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(code: ErrorCode, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** Malformed or missing input. Raised before any side effect. */
export class ValidationError extends MailwardenError {
  constructor(message: string) {
    super('validation', 400, message);
  }
}

/** Credential or permission failure from a remote collaborator. Never downgraded. */
export class AuthError extends MailwardenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('auth', 401, message, options);
  }
}

export class NotFoundError extends MailwardenError {
  readonly resource: string;
  readonly identifier: string;

  constructor(resource: string, identifier: string) {
    super('not_found', 404, `${resource} not found: ${identifier}`);
    this.resource = resource;
    this.identifier = identifier;
  }
}

/** Optimistic version mismatch on a read-modify-write. */
export class ConflictError extends MailwardenError {
  constructor(message: string) {
    super('conflict', 409, message);
  }
}

/** Rate limiting, server error, or dropped connection on a single remote call. */
export class TransientApiError extends MailwardenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient_api', 503, message, options);
  }
}

export class UnsupportedCapabilityError extends MailwardenError {
  constructor(message: string) {
    super('unsupported_capability', 501, message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
