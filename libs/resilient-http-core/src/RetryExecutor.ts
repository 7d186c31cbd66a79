import { setTimeout as sleep } from 'timers/promises';
import { delayForAttempt } from './backoff';
import { classify, classifyStatus } from './classifier';
import { ClientError, OperationCancelledError, OperationError } from './errors';
import type {
  ExecuteOptions,
  Logger,
  RetryableOperation,
  RetryPolicy,
  SessionGate,
} from './types';

const AUTH_REJECTION_STATUSES = new Set([401, 403]);

export interface RetryExecutorConfig {
  policy: RetryPolicy;
  logger?: Logger;
  /** Session gate consulted before every attempt; omit for unauthenticated use. */
  gate?: SessionGate;
}

/**
 * Runs an operation with bounded retries and exponential backoff.
 *
 * Every attempt first checks for cancellation and for a latched authentication
 * failure, then asks the gate for a valid session. A 401/403 response from an
 * authenticated operation invalidates the session and counts as a transient
 * failure, so the next attempt logs in again. Permanent errors end the loop at
 * once; transient ones are retried until `policy.maxRetries` is used up.
 *
 * The operation is awaited inside the loop, so one call never has two attempts
 * in flight.
 */
export class RetryExecutor {
  readonly policy: RetryPolicy;
  private readonly logger?: Logger;
  private readonly gate?: SessionGate;

  constructor(config: RetryExecutorConfig) {
    this.policy = config.policy;
    this.logger = config.logger;
    this.gate = config.gate;
  }

  async executeWithRetry<T>(
    operation: RetryableOperation<T>,
    label: string,
    options: ExecuteOptions<T> = {},
  ): Promise<T> {
    const { signal, statusOf, bodyOf } = options;
    const gate = this.gate;
    const sessionGate = options.authenticate === false ? undefined : gate;
    const maxAttempts = this.policy.maxRetries + 1;
    let lastError: ClientError | undefined;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        throw new OperationCancelledError(label, false, signal.reason);
      }

      if (gate?.isAuthPermanentlyFailed()) {
        throw new OperationError(label, attempt, classify(gate.permanentFailure()), false);
      }

      this.logger?.debug('retry.attempt', { label, attempt: attempt + 1, maxAttempts });

      try {
        if (sessionGate) {
          await sessionGate.ensureAuthenticated(signal);
        }

        const result = await operation({ attempt, signal });
        const status = statusOf?.(result);

        if (status !== undefined && sessionGate && AUTH_REJECTION_STATUSES.has(status)) {
          sessionGate.onSessionRejected(status);
          lastError = new ClientError('auth_failure', `Session rejected with status ${status}`, {
            permanent: false,
            status,
          });
        } else if (status !== undefined && this.policy.retryableStatusCodes.has(status)) {
          lastError = classifyStatus(status, bodyOf?.(result) ?? '');
        } else {
          if (status !== undefined && sessionGate) {
            sessionGate.onSessionAccepted?.();
          }
          if (attempt > 0) {
            this.logger?.debug('retry.succeeded', { label, retries: attempt });
          }
          return result;
        }
      } catch (error) {
        if (signal?.aborted || error instanceof OperationCancelledError) {
          throw new OperationCancelledError(label, false, signal?.reason ?? error);
        }

        const classified = classify(error);
        lastError = classified;
        if (classified.permanent) {
          this.logger?.debug('retry.permanent', {
            label,
            attempt: attempt + 1,
            errorKind: classified.kind,
            error: classified.message,
          });
          throw new OperationError(label, attempt + 1, classified, false);
        }
      }

      if (gate?.isAuthPermanentlyFailed()) {
        throw new OperationError(label, attempt + 1, classify(gate.permanentFailure()), false);
      }

      if (attempt + 1 < maxAttempts) {
        const delayMs = delayForAttempt(this.policy, attempt);
        this.logger?.debug('retry.attempt.failed', {
          label,
          attempt: attempt + 1,
          maxAttempts,
          delayMs,
          errorKind: lastError?.kind,
          error: lastError?.message,
        });
        await this.backoff(delayMs, label, signal);
      }
    }

    const cause = lastError ?? new ClientError('unknown', 'No attempt was made');
    this.logger?.debug('retry.exhausted', { label, attempts: maxAttempts, errorKind: cause.kind });
    throw new OperationError(label, maxAttempts, cause, true);
  }

  private async backoff(delayMs: number, label: string, signal?: AbortSignal): Promise<void> {
    try {
      await sleep(delayMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError(label, true, signal.reason);
      }
      throw error;
    }
  }
}
