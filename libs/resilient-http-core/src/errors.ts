import type { ErrorKind } from './types';

/**
 * Whether an error of the given kind needs a human (credential fix, config fix)
 * before another attempt can succeed.
 */
export const KIND_PERMANENCE: Readonly<Record<ErrorKind, boolean>> = {
  auth_failure: true,
  timeout: false,
  dns_error: true,
  https_required: true,
  ssl_error: true,
  version_incompatible: true,
  connection_refused: false,
  network_unreachable: false,
  bad_gateway: false,
  service_unavailable: false,
  unknown: false,
};

export interface ClientErrorOptions {
  /** Overrides the kind's default permanence. */
  permanent?: boolean;
  cause?: unknown;
  status?: number;
  body?: string;
}

/**
 * A classified failure. Everything the retry loop decides is based on `kind`
 * and `permanent`.
 */
export class ClientError extends Error {
  readonly kind: ErrorKind;
  readonly permanent: boolean;
  readonly status?: number;
  readonly body?: string;

  constructor(kind: ErrorKind, message: string, options: ClientErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClientError';
    this.kind = kind;
    this.permanent = options.permanent ?? KIND_PERMANENCE[kind];
    this.status = options.status;
    this.body = options.body;
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Terminal failure of a retried operation: either a permanent error or the last
 * transient error once every attempt was used.
 */
export class OperationError extends Error {
  readonly label: string;
  readonly attempts: number;
  readonly exhausted: boolean;
  readonly error: ClientError;

  constructor(label: string, attempts: number, error: ClientError, exhausted: boolean) {
    super(
      exhausted
        ? `${label} failed after ${attempts} attempts: ${error.message}`
        : `${label} failed: ${error.message}`,
      { cause: error },
    );
    this.name = 'OperationError';
    this.label = label;
    this.attempts = attempts;
    this.exhausted = exhausted;
    this.error = error;
  }
}

export class OperationCancelledError extends Error {
  readonly label: string;
  readonly duringBackoff: boolean;

  constructor(label: string, duringBackoff: boolean, reason?: unknown) {
    super(
      duringBackoff ? `${label} cancelled during retry` : `${label} cancelled`,
      reason === undefined ? undefined : { cause: reason },
    );
    this.name = 'OperationCancelledError';
    this.label = label;
    this.duringBackoff = duringBackoff;
  }
}
