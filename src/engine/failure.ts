/**
 * Failure classification.
 *
 * Stage adapters throw TransientStageError or PermanentStageError when they
 * know which kind of failure they hit. Anything else (vendor SDK errors,
 * Node network errors, plain Errors) is classified structurally by
 * classifyFailure().
 */

export enum FailureClass {
  /** Retried per the stage's policy. */
  Transient = 'transient',
  /** Not retried; triggers rollback immediately. */
  Permanent = 'permanent',
}

export interface StageErrorOptions {
  statusCode?: number;
  /** Vendor or protocol error code, e.g. "NoSuchKey". */
  code?: string;
  cause?: unknown;
}

/** Base class for failures a stage adapter reports deliberately. */
export class StageError extends Error {
  readonly failureClass: FailureClass;
  readonly statusCode?: number;
  readonly code?: string;

  constructor(message: string, failureClass: FailureClass, options: StageErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StageError';
    this.failureClass = failureClass;
    this.statusCode = options.statusCode;
    this.code = options.code;
  }
}

/** Network timeout, rate limiting, 5xx-class response. */
export class TransientStageError extends StageError {
  constructor(message: string, options?: StageErrorOptions) {
    super(message, FailureClass.Transient, options);
    this.name = 'TransientStageError';
  }
}

/** Authorization, validation or not-found failure. */
export class PermanentStageError extends StageError {
  constructor(message: string, options?: StageErrorOptions) {
    super(message, FailureClass.Permanent, options);
    this.name = 'PermanentStageError';
  }
}

/** Raised by the stage runner when a call exceeds its timeout. */
export class StageTimeoutError extends TransientStageError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Node socket/DNS error codes worth retrying. */
const TRANSIENT_NETWORK_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/** Error names used by AWS SDK v3 and fetch for retryable conditions. */
const TRANSIENT_ERROR_NAMES = new Set([
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
  'ThrottlingException',
  'Throttling',
  'TooManyRequestsException',
  'SlowDown',
  'ServiceUnavailable',
  'InternalError',
]);

/** Classify an HTTP status code. */
export function classifyHttpStatus(statusCode: number): FailureClass {
  if (statusCode === 408 || statusCode === 425 || statusCode === 429 || statusCode >= 500) {
    return FailureClass.Transient;
  }
  return FailureClass.Permanent;
}

function readStatusCode(err: object): number | undefined {
  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  if ('$metadata' in err && typeof err.$metadata === 'object' && err.$metadata !== null) {
    const metadata = err.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      return metadata.httpStatusCode;
    }
  }
  return undefined;
}

function readCode(err: object): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('Code' in err && typeof err.Code === 'string') return err.Code;
  return undefined;
}

/** Decide whether a thrown value is worth retrying. */
export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof StageError) return err.failureClass;
  if (typeof err !== 'object' || err === null) return FailureClass.Permanent;

  const code = readCode(err);
  if (code && TRANSIENT_NETWORK_CODES.has(code)) return FailureClass.Transient;

  if ('name' in err && typeof err.name === 'string' && TRANSIENT_ERROR_NAMES.has(err.name)) {
    return FailureClass.Transient;
  }

  const statusCode = readStatusCode(err);
  if (statusCode !== undefined) return classifyHttpStatus(statusCode);

  // fetch() wraps socket failures in a TypeError whose cause carries the code
  if ('cause' in err && typeof err.cause === 'object' && err.cause !== null) {
    const causeCode = readCode(err.cause);
    if (causeCode && TRANSIENT_NETWORK_CODES.has(causeCode)) return FailureClass.Transient;
  }

  return FailureClass.Permanent;
}

/** Status code carried by an error, if any. Used for error details. */
export function failureStatusCode(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  return readStatusCode(err);
}

export function failureMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
