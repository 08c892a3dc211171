import { Logger } from '@nestjs/common';

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  '57P01', // admin_shutdown
  '08000', // connection_exception
  '08003', // connection_does_not_exist
  '08006', // connection_failure
  '40001', // serialization_failure
]);

// Raised before any statement reaches the server
const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  '08001', // sqlclient_unable_to_establish_sqlconnection
  '08004', // sqlserver_rejected_establishment_of_sqlconnection
]);

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /**
   * False for writes that must not run twice (inserts, counters). Those are only
   * retried when the connection could not be opened at all.
   */
  idempotent: boolean;
}

const DEFAULT_RETRY: RetryOptions = { attempts: 3, delayMs: 100, idempotent: true };

const logger = new Logger('DatabaseRetry');

export function isTransientDatabaseError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code);
}

export function isConnectError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && CONNECT_ERROR_CODES.has(code);
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs a store operation, retrying connection-level failures with linear back-off.
 * Anything else (constraint violations, bad SQL) is rethrown immediately.
 * A non-idempotent write may already have committed when the connection drops,
 * so it is only retried on errors raised while connecting.
 */
export async function withRetry<T>(
  label: string,
  operation: () => Promise<T>,
  overrides: Partial<RetryOptions> = {},
): Promise<T> {
  const options: RetryOptions = { ...DEFAULT_RETRY, ...overrides };
  const shouldRetry = options.idempotent ? isTransientDatabaseError : isConnectError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!shouldRetry(error) || attempt >= options.attempts) {
        throw error;
      }
      logger.warn(`${label} failed with a transient error (attempt ${attempt}/${options.attempts}), retrying`);
      await sleep(options.delayMs * attempt);
    }
  }
}
