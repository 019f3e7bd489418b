import { logger as rootLogger, type Logger } from '../logger.js';
import {
  AuthorizationError,
  CatalogApiError,
  MutationRejectedError,
  RateLimitExceededError,
  TransientCallFailedError
} from '../errors.js';

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  baseDelayMs: 1000, // Start with 1 second
  maxDelayMs: 300000 // Cap at 5 minutes
};

export interface InvokerDependencies {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
  logger?: Logger;
}

export type CallFailure =
  | { kind: 'rate-limit'; retryAfterMs?: number }
  | { kind: 'transient' }
  | { kind: 'authorization' }
  | { kind: 'rejected'; statusCode: number }
  | { kind: 'unknown' };

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ERR_GOT_REQUEST_ERROR'
]);

export const classifyFailure = (error: unknown): CallFailure => {
  if (error instanceof AuthorizationError) {
    return { kind: 'authorization' };
  }
  if (!(error instanceof CatalogApiError)) {
    return { kind: 'unknown' };
  }

  const { statusCode, code, retryAfterSeconds } = error;

  if (statusCode === 429) {
    return {
      kind: 'rate-limit',
      retryAfterMs: retryAfterSeconds === undefined ? undefined : retryAfterSeconds * 1000
    };
  }
  if (statusCode === 401 || statusCode === 403) {
    return { kind: 'authorization' };
  }
  if (statusCode === 408 || (statusCode !== undefined && statusCode >= 500)) {
    return { kind: 'transient' };
  }
  if (statusCode !== undefined && statusCode >= 400) {
    return { kind: 'rejected', statusCode };
  }
  if (code !== undefined && TRANSIENT_CODES.has(code)) {
    return { kind: 'transient' };
  }
  return { kind: 'unknown' };
};

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs destination API calls with backoff. One instance is shared by search
 * and mutation calls so a Retry-After from either delays both.
 */
export class RateLimitedInvoker {
  private readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly logger: Logger;
  private rateLimitResetAt = 0;

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY, deps: InvokerDependencies = {}) {
    this.policy = policy;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger ?? rootLogger;
  }

  async invoke<T>(label: string, call: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      await this.waitForRateLimit();

      try {
        return await call();
      } catch (error) {
        const failure = classifyFailure(error);

        switch (failure.kind) {
          case 'authorization':
            throw error instanceof AuthorizationError
              ? error
              : new AuthorizationError(`${label} was rejected as unauthorized`, { cause: error });
          case 'rejected':
            throw new MutationRejectedError(label, failure.statusCode, error);
          case 'unknown':
            throw error;
        }

        const attempts = attempt + 1;
        if (attempt >= this.policy.maxRetries) {
          this.logger.warn({ label, attempts }, 'giving up on destination call');
          throw failure.kind === 'rate-limit'
            ? new RateLimitExceededError(label, attempts, error)
            : new TransientCallFailedError(label, attempts, error);
        }

        const delayMs = this.delayFor(failure, attempt);
        if (failure.kind === 'rate-limit' && failure.retryAfterMs !== undefined) {
          this.rateLimitResetAt = this.now() + delayMs;
        }

        this.logger.warn(
          {
            label,
            attempt: attempts,
            maxRetries: this.policy.maxRetries,
            delayMs,
            failure: failure.kind,
            error: error instanceof Error ? error.message : String(error)
          },
          'destination call failed, retrying after delay'
        );
        await this.sleep(delayMs);
      }
    }
  }

  private delayFor(failure: { kind: 'rate-limit'; retryAfterMs?: number } | { kind: 'transient' }, attempt: number): number {
    const exponential = Math.min(this.policy.baseDelayMs * Math.pow(2, attempt), this.policy.maxDelayMs);

    if (failure.kind === 'rate-limit') {
      return failure.retryAfterMs === undefined
        ? exponential
        : Math.min(failure.retryAfterMs, this.policy.maxDelayMs);
    }

    // Half fixed, half random
    return Math.round(exponential / 2 + this.random() * (exponential / 2));
  }

  /**
   * Hold back while a Retry-After window announced by an earlier call is open
   */
  private async waitForRateLimit(): Promise<void> {
    const waitMs = this.rateLimitResetAt - this.now();
    if (waitMs > 0) {
      this.logger.info({ waitMs }, 'waiting for destination rate limit to reset');
      await this.sleep(waitMs);
    }
  }
}
