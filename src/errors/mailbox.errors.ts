export type MailboxErrorCode =
  | 'not_connected'
  | 'decryption_failed'
  | 'reauth_needed'
  | 'upstream_error'
  | 'auth_missing'
  | 'transport_error'
  | 'invalid_request';

/**
 * Base class for failures that carry a semantic classification.
 * The error handler turns these into HTTP responses; messages must never contain token material.
 */
export abstract class MailboxError extends Error {
  abstract readonly code: MailboxErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No active Microsoft connection row for the user. */
export class NotConnectedError extends MailboxError {
  readonly code = 'not_connected';
  readonly statusCode = 404;

  constructor(public readonly userId: string) {
    super('No Microsoft connection found. Please connect your Outlook account.');
  }
}

/** Stored ciphertext could not be decrypted (key mismatch or corrupt data). */
export class DecryptionFailedError extends MailboxError {
  readonly code = 'decryption_failed';
  readonly statusCode = 500;

  constructor() {
    super('Token decryption failed. Please reconnect.');
  }
}

/** The provider rejected a refresh, or the mailbox API answered 401. */
export class ReauthNeededError extends MailboxError {
  readonly code = 'reauth_needed';
  readonly statusCode = 401;

  constructor(message = 'Session expired. Please reconnect your Outlook account.') {
    super(message);
  }
}

export class UpstreamError extends MailboxError {
  readonly code = 'upstream_error';
  readonly statusCode = 502;

  constructor(public readonly upstreamStatus: number) {
    super(`Microsoft Graph API error: ${upstreamStatus}`);
  }
}

/** No bearer token bound to the current request context. */
export class AuthMissingError extends MailboxError {
  readonly code = 'auth_missing';
  readonly statusCode = 401;

  constructor() {
    super('Microsoft authentication required. Please connect your Outlook account.');
  }
}

/**
 * Network-level failure. Only the target and a short reason code are kept;
 * the underlying client error holds request headers and is not attached.
 */
export class TransportError extends MailboxError {
  readonly code = 'transport_error';
  readonly statusCode = 502;

  constructor(target: string, public readonly reason?: string) {
    super(reason ? `Could not reach ${target} (${reason})` : `Could not reach ${target}`);
  }
}

export class ValidationError extends MailboxError {
  readonly code = 'invalid_request';
  readonly statusCode = 400;
}

export function isMailboxError(error: unknown): error is MailboxError {
  return error instanceof MailboxError;
}
