export * from './types';
export {
  ClientError,
  KIND_PERMANENCE,
  OperationCancelledError,
  OperationError,
  TimeoutError,
} from './errors';
export type { ClientErrorOptions } from './errors';
export {
  ERROR_CODE_KINDS,
  MESSAGE_PATTERNS,
  classify,
  classifyStatus,
  getErrorKind,
  isPermanentError,
  isRetryableError,
  matchMessage,
} from './classifier';
export type { MessagePattern } from './classifier';
export {
  DEFAULT_BACKOFF_FACTOR,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRYABLE_STATUS_CODES,
  createRetryPolicy,
  delayForAttempt,
} from './backoff';
export { RetryExecutor } from './RetryExecutor';
export type { RetryExecutorConfig } from './RetryExecutor';
export { ConsoleLogger, createLogger } from './logger';
export type { CreateLoggerOptions } from './logger';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
