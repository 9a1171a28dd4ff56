/**
 * Retry policy.
 *
 * An explicit value object instead of a decorator on the call site, so the
 * backoff schedule can be checked without any network access.
 */

import { RetryPolicyConfig } from '../domain/pipeline';
import { FailureClass } from './failure';

/** Defaults: three attempts, 1s doubling delay capped at 10s, 30s per call. */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicyConfig> = {
  maxAttempts: 3,
  backoffBaseMs: 1_000,
  backoffCapMs: 10_000,
  timeoutMs: 30_000,
};

/** Problems with a policy; empty when the policy is usable. */
export function validateRetryPolicy(config: RetryPolicyConfig): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    errors.push(`maxAttempts must be a positive integer (got ${config.maxAttempts})`);
  }
  if (!Number.isFinite(config.backoffBaseMs) || config.backoffBaseMs < 0) {
    errors.push(`backoffBaseMs must be a non-negative number (got ${config.backoffBaseMs})`);
  }
  if (!Number.isFinite(config.backoffCapMs) || config.backoffCapMs < 0) {
    errors.push(`backoffCapMs must be a non-negative number (got ${config.backoffCapMs})`);
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    errors.push(`timeoutMs must be a positive number (got ${config.timeoutMs})`);
  }
  return errors;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffBaseMs: number;
  readonly backoffCapMs: number;
  readonly timeoutMs: number;

  constructor(config: RetryPolicyConfig = DEFAULT_RETRY_POLICY) {
    this.maxAttempts = config.maxAttempts;
    this.backoffBaseMs = config.backoffBaseMs;
    this.backoffCapMs = config.backoffCapMs;
    this.timeoutMs = config.timeoutMs;
  }

  /** Layer a stage's overrides on top of a base policy. */
  static merge(base: RetryPolicyConfig, override?: Partial<RetryPolicyConfig>): RetryPolicy {
    return new RetryPolicy({ ...base, ...override });
  }

  /**
   * Delay to wait after `attempt` (1-based) failed: base × 2^(attempt-1),
   * never above the cap.
   */
  delayAfter(attempt: number): number {
    const delay = this.backoffBaseMs * Math.pow(2, Math.max(0, attempt - 1));
    return Math.min(this.backoffCapMs, delay);
  }

  /** The full delay schedule between consecutive attempts. */
  schedule(): number[] {
    const delays: number[] = [];
    for (let attempt = 1; attempt < this.maxAttempts; attempt++) {
      delays.push(this.delayAfter(attempt));
    }
    return delays;
  }

  /** Whether another attempt should follow a failure on `attempt`. */
  shouldRetry(failureClass: FailureClass, attempt: number): boolean {
    return failureClass === FailureClass.Transient && attempt < this.maxAttempts;
  }

  toConfig(): RetryPolicyConfig {
    return {
      maxAttempts: this.maxAttempts,
      backoffBaseMs: this.backoffBaseMs,
      backoffCapMs: this.backoffCapMs,
      timeoutMs: this.timeoutMs,
    };
  }
}
