import type {
  ClientError,
  ErrorKind,
  HttpHeaders,
  HttpMethod,
  HttpTransport,
  Logger,
  QueryParams,
  RetryPolicy,
} from '@qbit-kit/resilient-http-core';

/**
 * qBittorrent Client Types
 *
 * Configuration, session and response types shared by the client modules.
 */

// ============================================================================
// Core Client Configuration
// ============================================================================

export interface QbittorrentClientConfig {
  /** WebUI address, e.g. "http://localhost:8080". */
  baseUrl: string;
  username: string;
  password: string;
  /** Per-request timeout. Default 30s. */
  timeoutMs?: number;
  /** Attempts beyond the first. Default 3. */
  maxRetries?: number;
  /** Backoff before the first retry. Default 1s. */
  retryBackoffMs?: number;
  /** Backoff ceiling. Default 30s. */
  maxRetryDelayMs?: number;
  /** Default 2. */
  backoffFactor?: number;
  /** Default 408, 429, 500, 502, 503, 504. */
  retryableStatusCodes?: number[];
  /** Local lifetime of a session cookie. Default 24h. */
  sessionExpiryMs?: number;
  /** Interval of the background expiry sweep. Default 5m. */
  expirySweepIntervalMs?: number;
  /**
   * Latch the permanent auth failure after this many consecutive 401/403
   * answers with no accepted call in between. Off when unset.
   */
  authRejectionLatchThreshold?: number;
  /** Emit per-attempt debug records. */
  debug?: boolean;
  logger?: Logger;
  transport?: HttpTransport;
}

export interface ResolvedClientConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
  sessionExpiryMs: number;
  expirySweepIntervalMs: number;
  authRejectionLatchThreshold?: number;
  debug: boolean;
  logger: Logger;
  transport: HttpTransport;
  retryPolicy: RetryPolicy;
}

// ============================================================================
// Session Types
// ============================================================================

export type ConnectionState = 'initializing' | 'connected' | 'unauthorized' | 'unreachable';

export interface ConnectionStatus {
  status: ConnectionState;
  errorKind?: ErrorKind;
  message?: string;
  permanent?: boolean;
}

export interface SessionInfo {
  valid: boolean;
  artifactCount: number;
  lastAuthenticationTime?: number;
  artifactExpiry: number;
  authPermanentlyFailed: boolean;
  status: ConnectionState;
  lastError?: ClientError;
}

// ============================================================================
// Transport Types
// ============================================================================

export type FormFields = Record<string, string | number | boolean | undefined>;

export interface PerformRequestOptions {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  form?: FormFields;
  headers?: HttpHeaders;
  /** Attach the cached session cookies. */
  useSession?: boolean;
  /** Store cookies the server sends back into the session cache. */
  applyReceivedArtifacts?: boolean;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface QbittorrentResponse {
  status: number;
  headers: HttpHeaders;
  cookies: string[];
  body: string;
}

export interface RequestOptions {
  query?: QueryParams;
  form?: FormFields;
  signal?: AbortSignal;
}

// ============================================================================
// Magnet Links
// ============================================================================

export interface MagnetLink {
  hash: string;
  displayName: string;
  trackers: string[];
  exactLength: string;
  exactSource: string;
  keywords: string;
  acceptableSource: string;
}

export interface ListTorrentsOptions {
  category?: string;
  signal?: AbortSignal;
}
