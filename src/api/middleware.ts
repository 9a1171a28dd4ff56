/**
 * API middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, createTypedError, TypedError, validationError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** Log one line per request once the response is sent. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    log.debug('Request handled', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start,
    });
  });
  next();
}

export function isTypedError(value: unknown): value is TypedError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'retryable' in value &&
    typeof value.retryable === 'boolean' &&
    'suggestedFixes' in value &&
    Array.isArray(value.suggestedFixes)
  );
}

/** The TypedError an error class carries on `typedError`, if any. */
function carriedTypedError(err: unknown): TypedError | undefined {
  if (typeof err === 'object' && err !== null && 'typedError' in err && isTypedError(err.typedError)) {
    return err.typedError;
  }
  return undefined;
}

/** express.json() rejects malformed bodies with a 4xx error carrying `status`. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const typedError = carriedTypedError(err);
  if (typedError) {
    const status = getHttpStatus(typedError);
    log.warn('Request error', { code: typedError.code, status });
    res.status(status).json(apiError(typedError));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  const clientStatus = clientErrorStatus(err);
  if (clientStatus) {
    res.status(clientStatus).json(apiError(validationError(`Malformed request: ${message}`)));
    return;
  }

  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}

/** Map a typed error code onto an HTTP status. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'PIPELINE.ALREADY_RUNNING') return 409;
  if (error.code === 'PIPELINE.INVALID_DEFINITION') return 422;
  if (error.code === 'PIPELINE.NOT_CONFIGURED' || error.code.startsWith('CONFIG.')) return 503;
  if (error.code.startsWith('RATE_LIMIT.')) return 429;
  return 500;
}
