/**
 * Typed error model for machine-actionable error handling.
 *
 * Stage failures, cancellations and compensation failures are reported in a
 * PipelineResult as typed values rather than thrown, so dashboards and
 * operators can act on the code without parsing messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'STAGE'
  | 'PIPELINE'
  | 'COMPENSATION'
  | 'STORAGE'
  | 'CDN'
  | 'OPTIMIZER'
  | 'VALIDATION'
  | 'AUTH'
  | 'RATE_LIMIT'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix an operator or agent can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure carried in results, events and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "STAGE.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Stage the error belongs to, if any. */
  stage?: string;
  /** Run the error belongs to, if any. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stage?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stage: params.stage,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function stageTimeoutError(stage: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'STAGE.TIMEOUT',
    message: `Stage "${stage}" timed out after ${timeoutMs}ms`,
    stage,
    retryable: true,
    details: { timeoutMs, attempt },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

/** A transient failure that used up every attempt the stage's policy allows. */
export function stageRetriesExhaustedError(
  stage: string,
  message: string,
  attempts: number,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: 'STAGE.RETRIES_EXHAUSTED',
    message: `Stage "${stage}" failed after ${attempts} attempts: ${message}`,
    stage,
    retryable: true,
    details: { attempts, ...details },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: {}, description: 'The external service kept failing transiently. Re-run the pipeline later.' },
      { type: 'INCREASE_MAX_ATTEMPTS', params: { maxAttempts: attempts + 2 } },
    ],
  });
}

/** A failure that retrying cannot fix (authorization, validation, not-found). */
export function stagePermanentError(
  stage: string,
  message: string,
  attempt: number,
  details?: Record<string, unknown>,
): TypedError {
  const statusCode = details?.statusCode;
  const fixes: SuggestedFix[] = [];
  if (statusCode === 401 || statusCode === 403) {
    fixes.push({ type: 'CHECK_CREDENTIALS', params: { statusCode }, description: 'Verify the access key has the required permissions.' });
  } else if (statusCode === 404) {
    fixes.push({ type: 'FIX_RESOURCE_NOT_FOUND', params: { statusCode }, description: 'Verify the bucket, key or CDN service identifier.' });
  }

  return createTypedError({
    code: 'STAGE.PERMANENT',
    message,
    stage,
    retryable: false,
    details: { attempt, ...details },
    suggestedFixes: fixes,
  });
}

export function pipelineCanceledError(runId: string, afterStage?: string, reason?: string): TypedError {
  return createTypedError({
    code: 'PIPELINE.CANCELED',
    message: reason ? `Pipeline canceled: ${reason}` : 'Pipeline canceled',
    runId,
    stage: afterStage,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function compensationFailedError(stage: string, effectId: string, message: string, attempts: number): TypedError {
  return createTypedError({
    code: 'COMPENSATION.FAILED',
    message: `Could not undo effect ${effectId} of stage "${stage}": ${message}`,
    stage,
    retryable: true,
    details: { effectId, attempts },
    suggestedFixes: [
      { type: 'MANUAL_CLEANUP', params: { effectId }, description: 'Remove the leftover resource by hand; it is listed in remainingEffects.' },
    ],
  });
}

export function configError(message: string, issues: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message,
    retryable: false,
    details: { issues },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
