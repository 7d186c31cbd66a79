import { setTimeout as sleep } from 'timers/promises';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createRetryPolicy } from '../backoff';
import { ClientError, OperationCancelledError, OperationError } from '../errors';
import { RetryExecutor } from '../RetryExecutor';
import type { AttemptContext, Logger, SessionGate } from '../types';

interface FakeResponse {
  status: number;
  body?: string;
}

const fastPolicy = createRetryPolicy({ maxRetries: 2, baseDelayMs: 10, maxDelayMs: 100 });

const createGate = (overrides: Partial<SessionGate> = {}) => ({
  isAuthPermanentlyFailed: vi.fn(() => false),
  permanentFailure: vi.fn(
    () =>
      new ClientError('auth_failure', 'Authentication has permanently failed', { permanent: true }),
  ),
  ensureAuthenticated: vi.fn(async () => undefined),
  onSessionRejected: vi.fn(),
  onSessionAccepted: vi.fn(),
  ...overrides,
});

const operationError = async (promise: Promise<unknown>): Promise<OperationError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof OperationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the operation to fail');
};

const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('RetryExecutor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('succeeds on the third call after two transient failures', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('simulated error'))
      .mockRejectedValueOnce(new Error('simulated error'))
      .mockResolvedValue('ok');

    const started = performance.now();
    await expect(executor.executeWithRetry(operation, 'sync')).resolves.toBe('ok');
    const elapsed = performance.now() - started;

    expect(operation).toHaveBeenCalledTimes(3);
    // 10ms + 20ms of backoff; timers may round down by a millisecond
    expect(elapsed).toBeGreaterThanOrEqual(29);
  });

  it('reports exhaustion with the attempt count', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const operation = vi.fn(async () => {
      throw new Error('persistent error');
    });

    const error = await operationError(executor.executeWithRetry(operation, 'sync'));

    expect(operation).toHaveBeenCalledTimes(3);
    expect(error).toMatchObject({ attempts: 3, exhausted: true, label: 'sync' });
    expect(error.message).toContain('failed after 3 attempts');
    expect(error.message).toBe(
      'sync failed after 3 attempts: Unknown error occurred: persistent error',
    );
  });

  it('stops at once on a permanent error', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const operation = vi.fn(async () => {
      throw new Error('x509: certificate has expired');
    });

    const error = await operationError(executor.executeWithRetry(operation, 'sync'));

    expect(operation).toHaveBeenCalledTimes(1);
    expect(error).toMatchObject({ attempts: 1, exhausted: false });
    expect(error.error.kind).toBe('ssl_error');
  });

  it('is cancelled promptly during a backoff sleep', async () => {
    const executor = new RetryExecutor({
      policy: createRetryPolicy({ maxRetries: 3, baseDelayMs: 5_000 }),
    });
    const operation = vi.fn(async () => {
      throw new Error('connection refused');
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const started = performance.now();
    const error = await executor
      .executeWithRetry(operation, 'sync', { signal: controller.signal })
      .catch((err: unknown) => err);

    expect(performance.now() - started).toBeLessThan(1_000);
    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({ duringBackoff: true, message: 'sync cancelled during retry' });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('is cancelled when the signal aborts during the call', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const operation = vi.fn(({ signal }: AttemptContext) => sleep(2_000, 'late', { signal }));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const started = performance.now();
    const error = await executor
      .executeWithRetry(operation, 'sync', { signal: controller.signal })
      .catch((err: unknown) => err);

    expect(performance.now() - started).toBeLessThan(1_000);
    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({ duringBackoff: false, message: 'sync cancelled' });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not run when the signal is already aborted', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const operation = vi.fn(async () => 'ok');
    const controller = new AbortController();
    controller.abort();

    await expect(
      executor.executeWithRetry(operation, 'sync', { signal: controller.signal }),
    ).rejects.toThrow('sync cancelled');
    expect(operation).not.toHaveBeenCalled();
  });

  describe('with a session gate', () => {
    it('invalidates on 403 and retries after a fresh login', async () => {
      const gate = createGate();
      const executor = new RetryExecutor({ policy: fastPolicy, gate });
      const operation = vi
        .fn<() => Promise<FakeResponse>>()
        .mockResolvedValueOnce({ status: 403 })
        .mockResolvedValueOnce({ status: 200, body: 'ok' });

      const result = await executor.executeWithRetry(operation, 'list', {
        statusOf: (response) => response.status,
      });

      expect(result).toEqual({ status: 200, body: 'ok' });
      expect(gate.onSessionRejected).toHaveBeenCalledTimes(1);
      expect(gate.onSessionRejected).toHaveBeenCalledWith(403);
      expect(gate.ensureAuthenticated).toHaveBeenCalledTimes(2);
      expect(gate.onSessionAccepted).toHaveBeenCalledTimes(1);
    });

    it('fails fast without calling anything once the gate has latched', async () => {
      const gate = createGate({ isAuthPermanentlyFailed: vi.fn(() => true) });
      const executor = new RetryExecutor({ policy: fastPolicy, gate });
      const operation = vi.fn(async () => ({ status: 200 }));

      const error = await operationError(executor.executeWithRetry(operation, 'list'));

      expect(error.message).toBe(
        'list failed: Authentication has permanently failed',
      );
      expect(gate.ensureAuthenticated).not.toHaveBeenCalled();
      expect(operation).not.toHaveBeenCalled();
    });

    it('fails without a backoff sleep once a rejection latches the gate', async () => {
      let latched = false;
      const gate = createGate({
        isAuthPermanentlyFailed: vi.fn(() => latched),
        onSessionRejected: vi.fn(() => {
          latched = true;
        }),
      });
      const executor = new RetryExecutor({
        policy: createRetryPolicy({ maxRetries: 3, baseDelayMs: 5_000 }),
        gate,
      });
      const operation = vi.fn(async (): Promise<FakeResponse> => ({ status: 401 }));

      const started = performance.now();
      const error = await operationError(
        executor.executeWithRetry(operation, 'list', { statusOf: (response) => response.status }),
      );

      expect(performance.now() - started).toBeLessThan(1_000);
      expect(error).toMatchObject({ attempts: 1, exhausted: false });
      expect(error.message).toBe('list failed: Authentication has permanently failed');
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('treats a permanent login failure as terminal', async () => {
      const gate = createGate({
        ensureAuthenticated: vi.fn(async () => {
          throw new ClientError('auth_failure', 'Invalid username or password', {
            permanent: true,
          });
        }),
      });
      const executor = new RetryExecutor({ policy: fastPolicy, gate });
      const operation = vi.fn(async () => ({ status: 200 }));

      await expect(executor.executeWithRetry(operation, 'list')).rejects.toThrow(
        'list failed: Invalid username or password',
      );
      expect(gate.ensureAuthenticated).toHaveBeenCalledTimes(1);
      expect(operation).not.toHaveBeenCalled();
    });

    it('skips the gate when authentication is turned off', async () => {
      const gate = createGate();
      const executor = new RetryExecutor({ policy: fastPolicy, gate });

      await executor.executeWithRetry(async () => 'ok', 'login', { authenticate: false });

      expect(gate.ensureAuthenticated).not.toHaveBeenCalled();
      expect(gate.isAuthPermanentlyFailed).toHaveBeenCalledTimes(1);
    });
  });

  it('retries retryable statuses and classifies the last one', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const operation = vi.fn(async (): Promise<FakeResponse> => ({ status: 503, body: 'busy' }));

    const error = await operationError(
      executor.executeWithRetry(operation, 'svc', {
        statusOf: (response) => response.status,
        bodyOf: (response) => response.body,
      }),
    );

    expect(operation).toHaveBeenCalledTimes(3);
    expect(error.message).toBe('svc failed after 3 attempts: Service Unavailable (503): busy');
    expect(error.error.kind).toBe('service_unavailable');
  });

  it('returns non-retryable statuses to the caller', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const operation = vi.fn(async (): Promise<FakeResponse> => ({ status: 404 }));

    await expect(
      executor.executeWithRetry(operation, 'svc', { statusOf: (response) => response.status }),
    ).resolves.toEqual({ status: 404 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('traces failed attempts at debug level', async () => {
    const logger = createLogger();
    const executor = new RetryExecutor({ policy: fastPolicy, logger });
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockResolvedValue('ok');

    await executor.executeWithRetry(operation, 'sync');

    expect(logger.debug).toHaveBeenCalledWith(
      'retry.attempt.failed',
      expect.objectContaining({
        label: 'sync',
        attempt: 1,
        maxAttempts: 3,
        delayMs: 10,
        errorKind: 'connection_refused',
      }),
    );
    expect(logger.debug).toHaveBeenCalledWith('retry.succeeded', { label: 'sync', retries: 1 });
  });
});
