import { ClientError, TimeoutError } from './errors';
import type { ErrorKind } from './types';

export type MessagePattern = readonly [substring: string, kind: ErrorKind];

/**
 * Free-text fallback, consulted only when no structured signal is present.
 * Matching is case-insensitive and the first hit wins, so order matters.
 */
export const MESSAGE_PATTERNS: readonly MessagePattern[] = [
  ['timeout', 'timeout'],
  ['timed out', 'timeout'],
  ['deadline exceeded', 'timeout'],
  ['context canceled', 'timeout'],
  ['certificate', 'ssl_error'],
  ['x509', 'ssl_error'],
  ['tls', 'ssl_error'],
  ['ssl', 'ssl_error'],
  ['malformed http response', 'https_required'],
  ['http request to an https server', 'https_required'],
  ['plain http request was sent to https port', 'https_required'],
  ['connection refused', 'connection_refused'],
  ['econnrefused', 'connection_refused'],
  ['network is unreachable', 'network_unreachable'],
  ['no route to host', 'network_unreachable'],
  ['no such host', 'dns_error'],
  ['getaddrinfo', 'dns_error'],
  ['lookup', 'dns_error'],
  ['dns', 'dns_error'],
  ['fails.', 'auth_failure'],
  ['unauthorized', 'auth_failure'],
  ['authentication failed', 'auth_failure'],
  ['invalid username', 'auth_failure'],
  ['invalid password', 'auth_failure'],
  ['invalid credentials', 'auth_failure'],
];

/** System and undici error codes that identify a failure without reading its text. */
export const ERROR_CODE_KINDS: ReadonlyMap<string, ErrorKind> = new Map<string, ErrorKind>([
  ['ENOTFOUND', 'dns_error'],
  ['EAI_AGAIN', 'dns_error'],
  ['EAI_NONAME', 'dns_error'],
  ['ECONNREFUSED', 'connection_refused'],
  ['ENETUNREACH', 'network_unreachable'],
  ['EHOSTUNREACH', 'network_unreachable'],
  ['ETIMEDOUT', 'timeout'],
  ['UND_ERR_CONNECT_TIMEOUT', 'timeout'],
  ['UND_ERR_HEADERS_TIMEOUT', 'timeout'],
  ['UND_ERR_BODY_TIMEOUT', 'timeout'],
  ['ECONNABORTED', 'timeout'],
  ['HPE_INVALID_CONSTANT', 'https_required'],
  ['HPE_INVALID_VERSION', 'https_required'],
  ['CERT_HAS_EXPIRED', 'ssl_error'],
  ['DEPTH_ZERO_SELF_SIGNED_CERT', 'ssl_error'],
  ['SELF_SIGNED_CERT_IN_CHAIN', 'ssl_error'],
  ['UNABLE_TO_VERIFY_LEAF_SIGNATURE', 'ssl_error'],
  ['UNABLE_TO_GET_ISSUER_CERT_LOCALLY', 'ssl_error'],
  ['ERR_TLS_CERT_ALTNAME_INVALID', 'ssl_error'],
  ['ERR_SSL_WRONG_VERSION_NUMBER', 'ssl_error'],
]);

const KIND_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  auth_failure: 'Invalid username or password',
  timeout: 'Request timed out',
  dns_error: 'DNS resolution failed - check hostname',
  https_required: 'Protocol mismatch - try using HTTPS instead of HTTP',
  ssl_error: 'SSL/TLS connection failed - check certificate configuration',
  version_incompatible: 'Incompatible server version',
  connection_refused: 'Connection refused - server may be down or port is incorrect',
  network_unreachable: 'Network unreachable - check network connectivity',
  bad_gateway: 'Bad Gateway',
  service_unavailable: 'Service Unavailable',
  unknown: 'Unknown error occurred',
};

const MAX_CAUSE_DEPTH = 8;

function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return undefined;
  }
  const code = value.code;
  return typeof code === 'string' ? code : undefined;
}

function describe(error: unknown): string {
  return causeChain(error)
    .map((entry) => (entry instanceof Error ? entry.message : String(entry)))
    .filter((message) => message.length > 0)
    .join(': ');
}

function withDetail(kind: ErrorKind, error: unknown): ClientError {
  const detail = describe(error);
  const message = detail ? `${KIND_MESSAGES[kind]}: ${detail}` : KIND_MESSAGES[kind];
  return new ClientError(kind, message, { cause: error });
}

function classifyStructured(error: unknown): ClientError | undefined {
  for (const entry of causeChain(error)) {
    if (entry instanceof TimeoutError || (entry instanceof Error && entry.name === 'TimeoutError')) {
      return withDetail('timeout', error);
    }
    const code = errorCode(entry);
    const kind = code ? ERROR_CODE_KINDS.get(code) : undefined;
    if (kind) {
      return withDetail(kind, error);
    }
  }
  return undefined;
}

/**
 * Matches a message against an ordered pattern table. Exported so the table
 * can be exercised on its own.
 */
export function matchMessage(
  message: string,
  patterns: readonly MessagePattern[] = MESSAGE_PATTERNS,
): ErrorKind | undefined {
  const lower = message.toLowerCase();
  for (const [substring, kind] of patterns) {
    if (lower.includes(substring)) {
      return kind;
    }
  }
  return undefined;
}

/**
 * Maps any thrown value to a ClientError.
 *
 * An already-classified error anywhere in the cause chain is returned unchanged.
 * Structured signals (error codes, TimeoutError) win over message matching.
 */
export function classify(error: unknown): ClientError {
  for (const entry of causeChain(error)) {
    if (entry instanceof ClientError) {
      return entry;
    }
  }

  const structured = classifyStructured(error);
  if (structured) {
    return structured;
  }

  return withDetail(matchMessage(describe(error)) ?? 'unknown', error);
}

export function classifyStatus(status: number, body = ''): ClientError {
  switch (status) {
    case 401:
    case 403:
      return new ClientError('auth_failure', `Authentication failed with status ${status}`, {
        status,
        body,
      });
    case 502:
      return new ClientError('bad_gateway', `Bad Gateway (502): ${body}`, { status, body });
    case 503:
      return new ClientError('service_unavailable', `Service Unavailable (503): ${body}`, {
        status,
        body,
      });
    case 504:
      return new ClientError('timeout', `Gateway Timeout (504): ${body}`, { status, body });
    default:
      return new ClientError('unknown', `Request failed with status ${status}: ${body}`, {
        status,
        body,
      });
  }
}

export function isPermanentError(error: unknown): boolean {
  if (error === undefined || error === null) {
    return false;
  }
  return classify(error).permanent;
}

export function isRetryableError(error: unknown): boolean {
  if (error === undefined || error === null) {
    return false;
  }
  return !classify(error).permanent;
}

export function getErrorKind(error: unknown): ErrorKind | 'none' {
  if (error === undefined || error === null) {
    return 'none';
  }
  return classify(error).kind;
}
