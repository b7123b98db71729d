/**
 * Relay error taxonomy and the uniform `{ error: { message, type } }`
 * envelope sent to clients.
 * @packageDocumentation
 */

export type RelayErrorType =
  | 'invalid_request_error'
  | 'authentication_error'
  | 'not_found_error'
  | 'upstream_error'
  | 'server_error';

export class RelayError extends Error {
  readonly status: number;
  readonly type: RelayErrorType;

  constructor(message: string, status: number, type: RelayErrorType, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.type = type;
  }
}

/** Malformed request, non-user final message or unknown model. */
export class ValidationError extends RelayError {
  constructor(message: string) {
    super(message, 400, 'invalid_request_error');
  }
}

/** Missing or incorrect bearer token. */
export class AuthError extends RelayError {
  constructor(message = 'Unauthorized') {
    super(message, 401, 'authentication_error');
  }
}

export class NotFoundError extends RelayError {
  constructor(message = 'Not found') {
    super(message, 404, 'not_found_error');
  }
}

/** Backend unreachable, misconfigured, or still rejecting after re-login. */
export class UpstreamUnavailableError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, 'upstream_error', options);
  }
}

export interface ErrorEnvelope {
  error: {
    message: string;
    type: RelayErrorType;
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Convert any thrown value into a status code and wire envelope.
 */
export function toErrorEnvelope(err: unknown): { status: number; body: ErrorEnvelope } {
  if (err instanceof RelayError) {
    return { status: err.status, body: { error: { message: err.message, type: err.type } } };
  }
  return {
    status: 500,
    body: { error: { message: `Internal error: ${errorMessage(err)}`, type: 'server_error' } },
  };
}
