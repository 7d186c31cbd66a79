import {
  ClientError,
  RetryExecutor,
  classifyStatus,
  type ExecuteOptions,
  type HttpMethod,
  type RetryableOperation,
} from '@qbit-kit/resilient-http-core';
import type { ZodTypeAny, output } from 'zod';
import { configFromEnv, delegatingLogger, resolveConfig } from './config';
import { Requester } from './requester';
import {
  categoriesSchema,
  torrentListSchema,
  transferInfoSchema,
  type Category,
  type Torrent,
  type TransferInfo,
} from './schemas';
import { SessionManager } from './sessionManager';
import { SessionState } from './sessionState';
import type {
  ConnectionState,
  ConnectionStatus,
  ListTorrentsOptions,
  QbittorrentClientConfig,
  QbittorrentResponse,
  RequestOptions,
  ResolvedClientConfig,
  SessionInfo,
} from './types';

/**
 * qBittorrent WebUI client.
 *
 * Every call runs through a RetryExecutor gated by the SessionManager: the
 * client logs in on demand, re-logs in when the server answers 401/403, and
 * retries transient failures with exponential backoff. Once a login fails with
 * bad credentials every call fails fast until `resetAuthFailure()` or an
 * `update()` that changes the credentials.
 *
 * @example
 * const client = new QbittorrentClient({
 *   baseUrl: 'http://localhost:8080',
 *   username: 'admin',
 *   password: 'test-secret',
 * });
 * const torrents = await client.listTorrents({ category: 'linux' });
 * await client.close();
 */
export class QbittorrentClient {
  private rawConfig: QbittorrentClientConfig;
  private config: ResolvedClientConfig;
  private readonly state: SessionState;
  private readonly requester: Requester;
  private readonly session: SessionManager;
  private readonly executor: RetryExecutor;
  private closed = false;

  constructor(config: QbittorrentClientConfig) {
    this.rawConfig = config;
    this.config = resolveConfig(config);
    this.state = new SessionState(this.config.sessionExpiryMs);

    const current = () => this.config;
    this.requester = new Requester(current, this.state);
    this.session = new SessionManager(current, this.state, this.requester, this.config.retryPolicy);
    this.executor = new RetryExecutor({
      policy: this.config.retryPolicy,
      gate: this.session,
      logger: delegatingLogger(() => this.config.logger),
    });

    this.session.startExpirySweep();
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  getStatus(): ConnectionState {
    return this.state.status;
  }

  getLastError(): ClientError | undefined {
    return this.state.lastError;
  }

  getConnectionStatus(): ConnectionStatus {
    const error = this.state.lastError;
    if (!error) {
      return { status: this.state.status };
    }
    return {
      status: this.state.status,
      errorKind: error.kind,
      message: error.message,
      permanent: error.permanent,
    };
  }

  getSessionInfo(): SessionInfo {
    return this.state.info();
  }

  isAuthPermanentlyFailed(): boolean {
    return this.state.authPermanentlyFailed;
  }

  resetAuthFailure(): void {
    this.session.resetAuthFailure();
  }

  invalidateSession(): void {
    this.session.invalidate();
  }

  async isSessionValid(signal?: AbortSignal): Promise<boolean> {
    this.assertOpen();
    return this.session.isSessionValid(signal);
  }

  /**
   * Replaces the connection settings and drops the current session. A change
   * of credentials also clears a latched auth failure. The retry policy is
   * fixed at construction and is not affected.
   */
  update(changes: Partial<QbittorrentClientConfig>): void {
    this.assertOpen();
    const next: QbittorrentClientConfig = { ...this.rawConfig, ...changes };
    this.config = resolveConfig(next, this.config.retryPolicy);
    this.rawConfig = next;

    if (changes.username !== undefined || changes.password !== undefined) {
      this.session.resetAuthFailure();
    }
    this.session.invalidate();
    this.session.stopExpirySweep();
    this.session.startExpirySweep();
  }

  /**
   * Logs out remotely, then drops the session and stops the expiry sweep
   * whether or not the logout succeeded. Later calls fail with "client is
   * closed"; calling close again does nothing.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      if (this.config.baseUrl) {
        await this.session.logout();
      }
    } finally {
      this.session.stopExpirySweep();
      this.session.invalidate();
    }
  }

  // ==========================================================================
  // Requests
  // ==========================================================================

  executeWithRetry<T>(
    operation: RetryableOperation<T>,
    label: string,
    options?: ExecuteOptions<T>,
  ): Promise<T> {
    this.assertOpen();
    return this.executor.executeWithRetry(operation, label, options);
  }

  /**
   * Sends an authenticated request through the retry loop and returns the
   * final response. Non-retryable error statuses are returned, not thrown.
   */
  request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<QbittorrentResponse> {
    return this.executeWithRetry(
      ({ signal }) =>
        this.requester.perform({
          method,
          path,
          query: options.query,
          form: options.form,
          useSession: true,
          applyReceivedArtifacts: true,
          signal,
        }),
      `${method} ${path}`,
      {
        signal: options.signal,
        statusOf: (response) => response.status,
        bodyOf: (response) => response.body,
      },
    );
  }

  get(path: string, options: Omit<RequestOptions, 'form'> = {}): Promise<QbittorrentResponse> {
    return this.request('GET', path, options);
  }

  post(path: string, options: RequestOptions = {}): Promise<QbittorrentResponse> {
    return this.request('POST', path, options);
  }

  /** GET, then parse the body as JSON and validate it against `schema`. */
  async getJson<S extends ZodTypeAny>(
    path: string,
    schema: S,
    options: Omit<RequestOptions, 'form'> = {},
  ): Promise<output<S>> {
    const response = await this.get(path, options);
    const payload = parseJsonBody(path, ensureOk(response));
    const result = schema.safeParse(payload);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ClientError('unknown', `Unexpected response from ${path}: ${details}`, {
        status: response.status,
        cause: result.error,
      });
    }
    return result.data;
  }

  // ==========================================================================
  // Typed calls
  // ==========================================================================

  async getAppVersion(signal?: AbortSignal): Promise<string> {
    const response = await this.get('/api/v2/app/version', { signal });
    return ensureOk(response).trim();
  }

  async getApiVersion(signal?: AbortSignal): Promise<string> {
    const response = await this.get('/api/v2/app/webapiVersion', { signal });
    return ensureOk(response).trim();
  }

  listTorrents(options: ListTorrentsOptions = {}): Promise<Torrent[]> {
    return this.getJson('/api/v2/torrents/info', torrentListSchema, {
      query: { category: options.category || undefined },
      signal: options.signal,
    });
  }

  getTransferInfo(signal?: AbortSignal): Promise<TransferInfo> {
    return this.getJson('/api/v2/transfer/info', transferInfoSchema, { signal });
  }

  getCategories(signal?: AbortSignal): Promise<Record<string, Category>> {
    return this.getJson('/api/v2/torrents/categories', categoriesSchema, { signal });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('client is closed');
    }
  }
}

/**
 * Creates a client from QBITTORRENT_* environment variables.
 */
export function createQbittorrentClient(
  overrides?: Partial<QbittorrentClientConfig>,
): QbittorrentClient {
  return new QbittorrentClient(configFromEnv(process.env, overrides));
}

function ensureOk(response: QbittorrentResponse): string {
  if (response.status < 200 || response.status >= 300) {
    throw classifyStatus(response.status, response.body);
  }
  return response.body;
}

function parseJsonBody(path: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ClientError('unknown', `Invalid JSON from ${path}`, { cause: error, body });
  }
}
