/**
 * Error taxonomy for a single invocation. Everything here is fatal for the
 * command that raised it; none of these are retried.
 */

export type ScoutErrorKind = 'config' | 'auth' | 'transport' | 'api' | 'decode';

export abstract class ScoutError extends Error {
  abstract readonly kind: ScoutErrorKind;
}

/** Missing token, missing query, unknown command, bad option value. Raised before any request. */
export class ConfigError extends ScoutError {
  readonly kind = 'config';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The authenticated account could not be identified. */
export class AuthError extends ScoutError {
  readonly kind = 'auth';

  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export class TransportError extends ScoutError {
  readonly kind = 'transport';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class ApiError extends ScoutError {
  readonly kind = 'api';
  readonly statusCode: number;
  readonly body: string;

  constructor(statusCode: number, body: string) {
    super(`API error (status ${statusCode}): ${body}`);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class DecodeError extends ScoutError {
  readonly kind = 'decode';

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`parsing response: ${detail}`, options);
    this.name = 'DecodeError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
