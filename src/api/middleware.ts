/**
 * API Middleware: client identification, outcome rendering, error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { canonicalizeAddress } from '../auth/ip-whitelist';
import { extractBearerToken } from '../auth/token-format';
import { RequestOutcome } from '../domain/decision';
import {
  apiError,
  backendError,
  createTypedError,
  forbiddenError,
  httpStatusFor,
  internalError,
  rateLimitError,
  TypedError,
  unauthenticatedError,
  validationError,
} from '../domain/errors';
import { RequestContext } from '../proxy/update-processor';
import { logger } from '../logger';

/**
 * Address of the calling client. With `trustProxy`, the first entry of
 * X-Forwarded-For wins; otherwise the socket peer. IPv4-mapped IPv6 peers
 * are reported in IPv4 form.
 */
export function clientIp(req: Request, trustProxy: boolean): string {
  let candidate: string | undefined;
  if (trustProxy) {
    const forwarded = req.headers['x-forwarded-for'];
    const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    candidate = header?.split(',')[0]?.trim() || undefined;
  }
  candidate = candidate ?? req.socket.remoteAddress ?? '';
  return canonicalizeAddress(candidate) ?? candidate;
}

/** Caller facts handed to the update pipeline. */
export function requestContext(req: Request, trustProxy: boolean): RequestContext {
  return {
    sourceIp: clientIp(req, trustProxy),
    userAgent: req.get('user-agent'),
    token: extractBearerToken(req.get('authorization')),
  };
}

/** Typed error for a non-success outcome of the JSON API. */
export function outcomeError(outcome: RequestOutcome): TypedError | null {
  switch (outcome.kind) {
    case 'success':
      return null;
    case 'unauthenticated':
      return unauthenticatedError();
    case 'denied':
      return forbiddenError(outcome.reason);
    case 'invalid':
      switch (outcome.reason) {
        case 'record_not_found':
          return createTypedError({ code: 'VALIDATION.NOT_FOUND', message: 'DNS record not found' });
        case 'invalid_hostname':
          return validationError('Invalid domain name');
        case 'invalid_ip':
          return validationError('Invalid IP address');
        case 'invalid_record':
          return validationError(outcome.message ?? 'Invalid DNS record');
      }
      break;
    case 'backend_error':
      return backendError();
    case 'rate_limited':
      return rateLimitError(outcome.retryAfterMs);
    case 'internal_fault':
      return internalError();
  }
  return internalError();
}

/** Write an outcome as JSON. Success bodies are the outcome payload. */
export function sendOutcome(res: Response, outcome: RequestOutcome, successStatus = 200): void {
  if (outcome.kind === 'rate_limited') {
    res.set('Retry-After', String(Math.ceil(outcome.retryAfterMs / 1000)));
  }
  if (outcome.kind === 'success') {
    res.status(successStatus).json({ status: 'success', ...outcome.payload });
    return;
  }
  const error = outcomeError(outcome) ?? internalError();
  res.status(httpStatusFor(error)).json(apiError(error));
}

interface HttpError {
  status: number;
  message: string;
}

/** body-parser and friends attach a 4xx `status` to client errors. */
function isClientHttpError(err: unknown): err is HttpError {
  if (!(err instanceof Error) || !('status' in err)) return false;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isClientHttpError(err)) {
    logger.warn('Rejected malformed request', { path: req.path, status: err.status });
    res.status(400).json(apiError(validationError('Malformed request body')));
    return;
  }

  logger.error('Unhandled request error', {
    path: req.path,
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(internalError()));
}
