/**
 * Stage runner: calls a stage's execute or compensate under a retry policy.
 *
 * Each call gets its own AbortSignal that fires when the call exceeds the
 * policy's timeout; the timeout counts as a transient failure. Transient
 * failures are retried after the policy's backoff delay, permanent ones
 * return immediately.
 */

import { Artifact, CommittedEffect } from '../domain/artifact';
import { TypedError, stagePermanentError, stageRetriesExhaustedError, stageTimeoutError } from '../domain/errors';
import { Stage, StageContext, StageExecution } from '../domain/pipeline';
import { Logger, describeError } from '../logger';
import {
  FailureClass,
  StageTimeoutError,
  classifyFailure,
  failureMessage,
  failureStatusCode,
} from './failure';
import { RetryPolicy } from './retry-policy';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryNotice {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface AttemptOptions {
  runId: string;
  stage: string;
  policy: RetryPolicy;
  logger: Logger;
  sleep?: Sleep;
  /** Checked before every retry; a canceled run makes no further attempts. */
  isCanceled?: () => boolean;
  onRetry?: (notice: RetryNotice) => void | Promise<void>;
}

export type AttemptResult<T> =
  | { status: 'succeeded'; value: T; attempts: number }
  | { status: 'failed'; error: unknown; failureClass: FailureClass; attempts: number }
  | { status: 'canceled'; attempts: number };

/** Run `fn` until it succeeds, fails permanently, runs out of attempts, or the run is canceled. */
export async function runWithRetry<T>(
  fn: (context: StageContext) => Promise<T>,
  options: AttemptOptions,
): Promise<AttemptResult<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const stageLogger = options.logger.child({ stage: options.stage });

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await executeWithTimeout(
        (signal) => fn({ runId: options.runId, stage: options.stage, attempt, signal, logger: stageLogger }),
        options.policy.timeoutMs,
      );
      return { status: 'succeeded', value, attempts: attempt };
    } catch (err) {
      const failureClass = classifyFailure(err);
      if (!options.policy.shouldRetry(failureClass, attempt)) {
        return { status: 'failed', error: err, failureClass, attempts: attempt };
      }

      const delayMs = options.policy.delayAfter(attempt);
      stageLogger.warn('Transient failure, retrying', { attempt, delayMs, ...describeError(err) });
      await options.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);

      if (options.isCanceled?.()) {
        return { status: 'canceled', attempts: attempt };
      }
    }
  }
}

/** Call a stage's execute under its policy. */
export function executeStage(
  stage: Stage,
  artifact: Artifact,
  options: AttemptOptions,
): Promise<AttemptResult<StageExecution>> {
  return runWithRetry((context) => stage.execute(artifact, context), options);
}

/**
 * Call a stage's compensate under its policy. Callers must only pass stages
 * that define compensate.
 */
export function compensateEffect(
  stage: Stage,
  effect: CommittedEffect,
  options: AttemptOptions,
): Promise<AttemptResult<void>> {
  return runWithRetry(async (context) => {
    if (stage.compensate) await stage.compensate(effect, context);
  }, options);
}

/** Turn a terminal failure into the typed error reported in results. */
export function toStageError(
  stage: string,
  failure: { error: unknown; failureClass: FailureClass; attempts: number },
): TypedError {
  const { error, failureClass, attempts } = failure;
  const statusCode = failureStatusCode(error);
  const details: Record<string, unknown> = statusCode === undefined ? {} : { statusCode };

  if (failureClass === FailureClass.Permanent) {
    return stagePermanentError(stage, failureMessage(error), attempts, details);
  }
  if (error instanceof StageTimeoutError) {
    return stageTimeoutError(stage, error.timeoutMs, attempts);
  }
  return stageRetriesExhaustedError(stage, failureMessage(error), attempts, details);
}

/** Execute a function with a timeout, aborting its signal when time runs out. */
async function executeWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new StageTimeoutError(timeoutMs));
    }, timeoutMs);
    // A function that throws before returning its promise still clears the timer
    Promise.resolve()
      .then(() => fn(controller.signal))
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
