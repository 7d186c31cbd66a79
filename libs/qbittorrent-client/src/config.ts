import { z } from 'zod';
import {
  createLogger,
  createRetryPolicy,
  fetchTransport,
  type Logger,
  type RetryPolicy,
} from '@qbit-kit/resilient-http-core';
import type { QbittorrentClientConfig, ResolvedClientConfig } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_SESSION_EXPIRY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_EXPIRY_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

const optionalNumber = z.number().finite().optional();
/** Largest delay setTimeout and setInterval accept before clamping to 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
const optionalTimerDelay = z.number().finite().max(MAX_TIMER_DELAY_MS).optional();

export const configSchema = z.object({
  baseUrl: z.string(),
  username: z.string(),
  password: z.string(),
  timeoutMs: optionalTimerDelay,
  maxRetries: optionalNumber,
  retryBackoffMs: optionalTimerDelay,
  maxRetryDelayMs: optionalTimerDelay,
  backoffFactor: optionalNumber,
  retryableStatusCodes: z.array(z.number().int().min(100).max(599)).optional(),
  sessionExpiryMs: optionalNumber,
  expirySweepIntervalMs: optionalTimerDelay,
  authRejectionLatchThreshold: z.number().int().positive().optional(),
  debug: z.boolean().optional(),
});

export type ParsedClientConfig = z.infer<typeof configSchema>;

/**
 * Validates a client configuration. `logger` and `transport` are functions and
 * are passed through without validation.
 */
export function parseClientConfig(config: QbittorrentClientConfig): ParsedClientConfig {
  const { logger: _logger, transport: _transport, ...plain } = config;
  const result = configSchema.safeParse(plain);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid qBittorrent client configuration: ${details}`);
  }
  return result.data;
}

export function buildRetryPolicy(config: ParsedClientConfig): RetryPolicy {
  return createRetryPolicy({
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBackoffMs,
    maxDelayMs: config.maxRetryDelayMs,
    backoffFactor: config.backoffFactor,
    retryableStatusCodes: config.retryableStatusCodes,
  });
}

/**
 * Fills in defaults. Zero and negative durations take the default.
 * `retryPolicy` may be passed to keep an existing policy across updates.
 */
export function resolveConfig(
  config: QbittorrentClientConfig,
  retryPolicy?: RetryPolicy,
): ResolvedClientConfig {
  const parsed = parseClientConfig(config);
  const debug = parsed.debug ?? false;

  return {
    baseUrl: parsed.baseUrl.replace(/\/+$/, ''),
    username: parsed.username,
    password: parsed.password,
    timeoutMs: positiveOr(parsed.timeoutMs, DEFAULT_TIMEOUT_MS),
    sessionExpiryMs: positiveOr(parsed.sessionExpiryMs, DEFAULT_SESSION_EXPIRY_MS),
    expirySweepIntervalMs: positiveOr(
      parsed.expirySweepIntervalMs,
      DEFAULT_EXPIRY_SWEEP_INTERVAL_MS,
    ),
    authRejectionLatchThreshold: parsed.authRejectionLatchThreshold,
    debug,
    logger: createLogger({ debug, logger: config.logger }),
    transport: config.transport ?? fetchTransport,
    retryPolicy: retryPolicy ?? buildRetryPolicy(parsed),
  };
}

/**
 * Reads client configuration from the environment.
 *
 * Required: QBITTORRENT_URL, QBITTORRENT_USERNAME, QBITTORRENT_PASSWORD.
 * Optional: QBITTORRENT_TIMEOUT_MS, QBITTORRENT_MAX_RETRIES,
 * QBITTORRENT_RETRY_BACKOFF_MS, QBITTORRENT_DEBUG.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<QbittorrentClientConfig> = {},
): QbittorrentClientConfig {
  const baseUrl = overrides.baseUrl ?? env.QBITTORRENT_URL;
  const username = overrides.username ?? env.QBITTORRENT_USERNAME;
  const password = overrides.password ?? env.QBITTORRENT_PASSWORD;

  if (!baseUrl) {
    throw new Error('QBITTORRENT_URL environment variable is required');
  }
  if (!username) {
    throw new Error('QBITTORRENT_USERNAME environment variable is required');
  }
  if (password === undefined) {
    throw new Error('QBITTORRENT_PASSWORD environment variable is required');
  }

  return {
    timeoutMs: parseNumberOrDefault(env.QBITTORRENT_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    maxRetries: parseNumberOrDefault(env.QBITTORRENT_MAX_RETRIES, undefined),
    retryBackoffMs: parseNumberOrDefault(env.QBITTORRENT_RETRY_BACKOFF_MS, undefined),
    debug: parseBoolean(env.QBITTORRENT_DEBUG),
    ...overrides,
    baseUrl,
    username,
    password,
  };
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

function parseNumberOrDefault<T extends number | undefined>(
  value: string | undefined,
  fallback: T,
): number | T {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/** Logger that always writes to the current configuration's logger. */
export function delegatingLogger(source: () => Logger): Logger {
  return {
    debug: (message, meta) => source().debug(message, meta),
    info: (message, meta) => source().info(message, meta),
    warn: (message, meta) => source().warn(message, meta),
    error: (message, meta) => source().error(message, meta),
  };
}
