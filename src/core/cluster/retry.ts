import { describeCause } from '../errors.js';
import type { AppLogger } from '../../logging.js';

export const MAX_RETRIES = 3;
export const INITIAL_BACKOFF_MS = 500;
export const MAX_BACKOFF_MS = 4000;

/** kafkajs error names that mean the credentials or ACLs are wrong. */
const AUTH_ERROR_NAMES: ReadonlySet<string> = new Set([
  'KafkaJSSASLAuthenticationError',
]);

/** Broker error codes (kafkajs `type`) that mean the credentials or ACLs are wrong. */
const AUTH_ERROR_TYPES: ReadonlySet<string> = new Set([
  'SASL_AUTHENTICATION_FAILED',
  'UNSUPPORTED_SASL_MECHANISM',
  'ILLEGAL_SASL_STATE',
  'TOPIC_AUTHORIZATION_FAILED',
  'CLUSTER_AUTHORIZATION_FAILED',
  'GROUP_AUTHORIZATION_FAILED',
  'TRANSACTIONAL_ID_AUTHORIZATION_FAILED',
]);

/** Socket-level error codes worth another attempt. */
const TRANSIENT_SOCKET_CODES: ReadonlySet<string> = new Set(['ETIMEDOUT', 'ECONNRESET', 'EPIPE']);

function stringProperty(error: unknown, key: string): string | undefined {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * kafkajs wraps the failure of its last attempt; look through the wrapper.
 */
export function unwrapKafkaError(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'originalError' in error && error.originalError instanceof Error) {
    return error.originalError;
  }
  return error;
}

/** Authentication or authorization failure. Retrying will not help. */
export function isAuthError(failure: unknown): boolean {
  const error = unwrapKafkaError(failure);
  const name = stringProperty(error, 'name');
  if (name !== undefined && AUTH_ERROR_NAMES.has(name)) {
    return true;
  }
  const type = stringProperty(error, 'type');
  return type !== undefined && AUTH_ERROR_TYPES.has(type);
}

/** Transient broker or socket failure where another attempt may succeed. */
export function isRetryable(failure: unknown): boolean {
  const error = unwrapKafkaError(failure);
  if (error === null || error === undefined || isAuthError(error)) {
    return false;
  }
  if (typeof error === 'object' && 'retriable' in error && typeof error.retriable === 'boolean') {
    return error.retriable;
  }
  const code = stringProperty(error, 'code');
  return code !== undefined && TRANSIENT_SOCKET_CODES.has(code);
}

export interface RetryOptions {
  readonly maxRetries?: number;
  readonly initialBackoffMs?: number;
  readonly maxBackoffMs?: number;
  readonly signal?: AbortSignal;
  readonly logger?: AppLogger;
  /** Injected in tests. */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Thrown when retries run out or the signal aborts between attempts. */
export class RetryError extends Error {
  readonly lastError: unknown;

  constructor(message: string, lastError: unknown) {
    super(message, { cause: lastError });
    this.name = 'RetryError';
    this.lastError = lastError;
  }
}

/**
 * Run `fn` up to `maxRetries + 1` times with doubling backoff.
 * Auth errors and errors that are not retryable are rethrown at once.
 */
export async function withRetry<T>(description: string, fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
  const sleep = options.sleep ?? abortableSleep;
  let backoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;
    }

    if (!isRetryable(lastError)) {
      throw lastError;
    }
    if (attempt === maxRetries) {
      break;
    }

    options.logger?.warn(
      {
        operation: description,
        attempt: attempt + 1,
        maxAttempts: maxRetries + 1,
        backoffMs,
        err: describeCause(lastError),
      },
      'retrying after transient error',
    );

    if (options.signal?.aborted === true) {
      throw new RetryError(`${description}: aborted (last error: ${describeCause(lastError)})`, lastError);
    }
    try {
      await sleep(backoffMs, options.signal);
    } catch (error: unknown) {
      throw new RetryError(`${description}: aborted (last error: ${describeCause(lastError)})`, error);
    }

    backoffMs = Math.min(backoffMs * 2, maxBackoffMs);
  }

  throw new RetryError(
    `${description}: ${String(maxRetries + 1)} attempts exhausted: ${describeCause(lastError)}`,
    lastError,
  );
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted === true) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
