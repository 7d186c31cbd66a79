import {
  ClientError,
  RetryExecutor,
  classify,
  classifyStatus,
  type RetryPolicy,
  type SessionGate,
} from '@qbit-kit/resilient-http-core';
import { delegatingLogger } from './config';
import type { Requester } from './requester';
import { parseSetCookie } from './sessionCache';
import type { SessionState } from './sessionState';
import type { QbittorrentResponse, ResolvedClientConfig } from './types';

export const LOGIN_PATH = '/api/v2/auth/login';
export const LOGOUT_PATH = '/api/v2/auth/logout';
/** Reachability probe; any answer below 500 counts as reachable. */
export const PROBE_PATH = '/api/v2/app/version';
/** Body the WebUI returns with a 200 when the credentials are wrong. */
export const LOGIN_FAILURE_SENTINEL = 'Fails.';
export const SESSION_PROBE_TIMEOUT_MS = 5_000;

const PERMANENT_FAILURE_MESSAGE =
  'Authentication has permanently failed - update credentials and restart';

/**
 * Owns login, logout and session freshness for one client.
 *
 * Logins go through a dedicated RetryExecutor that uses this manager as its
 * gate, so a latched auth failure stops a login loop between attempts too.
 */
export class SessionManager implements SessionGate {
  private readonly loginExecutor: RetryExecutor;
  private sweepTimer?: NodeJS.Timeout;
  private consecutiveRejections = 0;

  constructor(
    private readonly config: () => ResolvedClientConfig,
    private readonly state: SessionState,
    private readonly requester: Requester,
    policy: RetryPolicy,
  ) {
    this.loginExecutor = new RetryExecutor({
      policy,
      gate: this,
      logger: delegatingLogger(() => this.config().logger),
    });
  }

  isAuthPermanentlyFailed(): boolean {
    return this.state.authPermanentlyFailed;
  }

  permanentFailure(): ClientError {
    return new ClientError('auth_failure', PERMANENT_FAILURE_MESSAGE, {
      permanent: true,
      cause: this.state.lastError,
    });
  }

  async ensureAuthenticated(signal?: AbortSignal): Promise<void> {
    if (this.state.isValid) {
      return;
    }
    await this.loginExecutor.executeWithRetry(() => this.login(signal), 'login', {
      signal,
      authenticate: false,
    });
  }

  /**
   * One login attempt: reachability probe, then the credential POST.
   * Throws a ClientError describing why the attempt failed.
   */
  async login(signal?: AbortSignal): Promise<void> {
    if (this.state.authPermanentlyFailed) {
      throw this.permanentFailure();
    }

    await this.probeReachability(signal);

    const config = this.config();
    const response = await this.send(
      () =>
        this.requester.perform({
          method: 'POST',
          path: LOGIN_PATH,
          form: { username: config.username, password: config.password },
          headers: { referer: config.baseUrl },
          signal,
        }),
      signal,
    );

    if (response.status !== 200) {
      const error = classifyStatus(response.status, response.body);
      if (error.kind === 'auth_failure') {
        this.state.setStatus('unauthorized');
      }
      throw this.recorded(error);
    }

    if (response.body.includes(LOGIN_FAILURE_SENTINEL)) {
      this.state.setStatus('unauthorized');
      throw this.recorded(
        new ClientError('auth_failure', 'Invalid username or password', {
          permanent: true,
          status: response.status,
          body: response.body,
        }),
      );
    }

    this.state.markAuthenticated(parseSetCookie(response.cookies));
    config.logger.info('qbt.session.login.success', {
      baseUrl: config.baseUrl,
      artifacts: this.state.cache.size,
    });
  }

  /**
   * Cached validity first, then the local expiry window (a client that never
   * logged in counts as expired), then one authenticated request to the server.
   */
  async isSessionValid(signal?: AbortSignal): Promise<boolean> {
    if (this.state.isValid) {
      return true;
    }
    if (
      this.state.lastAuthenticationTime === undefined ||
      this.state.cache.isExpired() ||
      this.state.isPastExpiryWindow(this.config().sessionExpiryMs)
    ) {
      return false;
    }

    let response: QbittorrentResponse;
    try {
      response = await this.requester.perform({
        method: 'GET',
        path: PROBE_PATH,
        useSession: true,
        signal,
        timeoutMs: SESSION_PROBE_TIMEOUT_MS,
      });
    } catch (error) {
      this.config().logger.debug('qbt.session.probe.failed', {
        errorKind: classify(error).kind,
      });
      return false;
    }

    if (response.status === 200) {
      this.state.confirm();
      return true;
    }
    if (response.status === 401 || response.status === 403) {
      this.state.invalidate();
    }
    return false;
  }

  invalidate(): void {
    this.state.invalidate();
    this.config().logger.debug('qbt.session.invalidated');
  }

  onSessionRejected(status: number): void {
    this.invalidate();
    this.consecutiveRejections += 1;

    const threshold = this.config().authRejectionLatchThreshold;
    if (threshold !== undefined && this.consecutiveRejections >= threshold) {
      const error = new ClientError(
        'auth_failure',
        `Session rejected ${this.consecutiveRejections} consecutive times after login - credentials may have been revoked`,
        { permanent: true, status },
      );
      this.state.latch(error);
      this.config().logger.error('qbt.session.auth.latched', {
        status,
        rejections: this.consecutiveRejections,
      });
    }
  }

  onSessionAccepted(): void {
    this.consecutiveRejections = 0;
  }

  resetAuthFailure(): void {
    this.state.resetAuthFailure();
    this.consecutiveRejections = 0;
  }

  /** Remote logout. Local state is left to the caller. */
  async logout(signal?: AbortSignal): Promise<void> {
    const response = await this.requester.perform({
      method: 'POST',
      path: LOGOUT_PATH,
      useSession: true,
      signal,
    });
    if (response.status !== 200) {
      throw new Error(`logout failed. Status: ${response.status}, Response: ${response.body}`);
    }
  }

  startExpirySweep(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => this.sweep(), this.config().expirySweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopExpirySweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /** Invalidates the session once the last login is older than the expiry window. */
  sweep(): void {
    const config = this.config();
    if (!this.state.isPastExpiryWindow(config.sessionExpiryMs)) {
      return;
    }
    if (!this.state.isValid && this.state.cache.size === 0) {
      return;
    }
    this.invalidate();
    config.logger.info('qbt.session.expired', {
      lastAuthenticationTime: this.state.lastAuthenticationTime,
      expiryMs: config.sessionExpiryMs,
    });
  }

  private async probeReachability(signal?: AbortSignal): Promise<void> {
    let response: QbittorrentResponse;
    try {
      response = await this.requester.perform({ method: 'GET', path: PROBE_PATH, signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.state.setStatus('unreachable');
      throw this.recorded(classify(error));
    }

    if (response.status >= 500) {
      this.state.setStatus('unreachable');
      throw this.recorded(classifyStatus(response.status, response.body));
    }
  }

  private async send(
    request: () => Promise<QbittorrentResponse>,
    signal?: AbortSignal,
  ): Promise<QbittorrentResponse> {
    try {
      return await request();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.state.setStatus('unreachable');
      throw this.recorded(classify(error));
    }
  }

  private recorded(error: ClientError): ClientError {
    this.state.recordError(error);
    return error;
  }
}
