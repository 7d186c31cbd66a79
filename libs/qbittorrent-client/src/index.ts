export * from './types';
export {
  DEFAULT_EXPIRY_SWEEP_INTERVAL_MS,
  DEFAULT_SESSION_EXPIRY_MS,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
  buildRetryPolicy,
  configFromEnv,
  configSchema,
  parseClientConfig,
  resolveConfig,
} from './config';
export type { ParsedClientConfig } from './config';
export { SessionCache, parseSetCookie } from './sessionCache';
export { SessionState } from './sessionState';
export { Requester, buildUrl, encodeForm } from './requester';
export {
  LOGIN_FAILURE_SENTINEL,
  LOGIN_PATH,
  LOGOUT_PATH,
  PROBE_PATH,
  SessionManager,
} from './sessionManager';
export { parseMagnetLink } from './magnet';
export {
  categoriesSchema,
  categorySchema,
  torrentListSchema,
  torrentSchema,
  transferInfoSchema,
} from './schemas';
export type { Category, Torrent, TransferInfo } from './schemas';
export { QbittorrentClient, createQbittorrentClient } from './qbittorrentClient';
export {
  ClientError,
  OperationCancelledError,
  OperationError,
  TimeoutError,
  getErrorKind,
  isPermanentError,
  isRetryableError,
} from '@qbit-kit/resilient-http-core';
