import type { ClientError } from '@qbit-kit/resilient-http-core';
import { SessionCache } from './sessionCache';
import type { ConnectionState, SessionInfo } from './types';

/**
 * Mutable session state owned by one client instance.
 *
 * Every mutation is a synchronous method, so no two writers ever interleave on
 * the event loop.
 */
export class SessionState {
  readonly cache: SessionCache;
  private valid = false;
  private permanentlyFailed = false;
  private lastAuthenticatedAt?: number;
  private lastObservedError?: ClientError;
  private currentStatus: ConnectionState = 'initializing';

  constructor(
    expiryWindowMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.cache = new SessionCache(expiryWindowMs, now);
  }

  get isValid(): boolean {
    return this.valid;
  }

  get authPermanentlyFailed(): boolean {
    return this.permanentlyFailed;
  }

  get lastAuthenticationTime(): number | undefined {
    return this.lastAuthenticatedAt;
  }

  get lastError(): ClientError | undefined {
    return this.lastObservedError;
  }

  get status(): ConnectionState {
    return this.currentStatus;
  }

  markAuthenticated(artifacts: Readonly<Record<string, string>>): void {
    this.cache.update(artifacts);
    this.valid = true;
    this.lastAuthenticatedAt = this.now();
    this.currentStatus = 'connected';
    this.lastObservedError = undefined;
  }

  /** Server confirmed the cached session; the login time is left as is. */
  confirm(): void {
    this.valid = true;
    this.currentStatus = 'connected';
  }

  invalidate(): void {
    this.valid = false;
    this.cache.clear();
    this.currentStatus = 'unauthorized';
  }

  setStatus(status: ConnectionState): void {
    this.currentStatus = status;
  }

  /** Records an error; a permanent auth failure latches the state. */
  recordError(error: ClientError): void {
    this.lastObservedError = error;
    if (error.kind === 'auth_failure' && error.permanent) {
      this.permanentlyFailed = true;
    }
  }

  latch(error: ClientError): void {
    this.lastObservedError = error;
    this.permanentlyFailed = true;
  }

  resetAuthFailure(): void {
    this.permanentlyFailed = false;
    this.lastObservedError = undefined;
    this.currentStatus = 'initializing';
  }

  /** True when the last login is older than the expiry window. */
  isPastExpiryWindow(windowMs: number): boolean {
    return (
      this.lastAuthenticatedAt !== undefined && this.now() - this.lastAuthenticatedAt > windowMs
    );
  }

  info(): SessionInfo {
    return {
      valid: this.valid,
      artifactCount: this.cache.size,
      lastAuthenticationTime: this.lastAuthenticatedAt,
      artifactExpiry: this.cache.expiry,
      authPermanentlyFailed: this.permanentlyFailed,
      status: this.currentStatus,
      lastError: this.lastObservedError,
    };
  }
}
