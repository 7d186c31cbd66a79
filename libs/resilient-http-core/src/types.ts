export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Transport request structure.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

/**
 * Raw HTTP response handed back by a transport.
 * `cookies` holds the raw `Set-Cookie` lines, which cannot survive the
 * flattening of `headers` into a plain object.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  cookies?: string[];
  body: ArrayBuffer;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * Error kinds produced by the classifier.
 *
 * - 'auth_failure': bad credentials, 401/403 on login, the "Fails." body
 * - 'timeout': deadline exceeded, 504
 * - 'dns_error': name resolution failure
 * - 'https_required': plaintext sent to a TLS-only endpoint
 * - 'ssl_error': certificate or handshake failure
 * - 'version_incompatible': remote API too old or too new
 * - 'connection_refused': remote actively refused
 * - 'network_unreachable': routing failure
 * - 'bad_gateway': 502
 * - 'service_unavailable': 503
 * - 'unknown': unmatched
 */
export type ErrorKind =
  | 'auth_failure'
  | 'timeout'
  | 'dns_error'
  | 'https_required'
  | 'ssl_error'
  | 'version_incompatible'
  | 'connection_refused'
  | 'network_unreachable'
  | 'bad_gateway'
  | 'service_unavailable'
  | 'unknown';

/**
 * Retry policy. Built once from configuration and never mutated.
 */
export interface RetryPolicy {
  /** Attempts beyond the first. */
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffFactor: number;
  readonly retryableStatusCodes: ReadonlySet<number>;
}

export interface RetryPolicyOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  retryableStatusCodes?: Iterable<number>;
}

/**
 * The authentication side of the retry loop. The executor consults it before
 * every attempt and tells it when the remote side rejected the session.
 */
export interface SessionGate {
  isAuthPermanentlyFailed(): boolean;
  /** The error returned to callers once the gate has latched. */
  permanentFailure(): Error;
  ensureAuthenticated(signal?: AbortSignal): Promise<void>;
  /** Called when an authenticated call came back 401/403. */
  onSessionRejected(status: number): void;
  /** Called when an authenticated call got a non-auth response. */
  onSessionAccepted?(): void;
}

export interface AttemptContext {
  /** Zero-based attempt index. */
  attempt: number;
  signal?: AbortSignal;
}

export type RetryableOperation<T> = (ctx: AttemptContext) => Promise<T>;

export interface ExecuteOptions<T> {
  signal?: AbortSignal;
  /**
   * Run the session gate before each attempt. Defaults to true when the
   * executor has a gate. The login operation itself turns it off.
   */
  authenticate?: boolean;
  /** Extracts the HTTP status from a result so the executor can inspect it. */
  statusOf?: (result: T) => number | undefined;
  /** Extracts a short body excerpt used when classifying a retryable status. */
  bodyOf?: (result: T) => string | undefined;
}
