/**
 * Typed error model for machine-actionable error handling.
 *
 * Errors are returned as typed values rather than thrown exceptions. The
 * generic JSON API serializes them into a stable `{ status, error_code,
 * message }` body; the DDNS endpoints never expose them at all.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'AUTH'
  | 'RATE_LIMIT'
  | 'VALIDATION'
  | 'BACKEND'
  | 'SYSTEM';

/** Typed suggested fix a client can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "AUTH.UNAUTHENTICATED"). */
  code: string;
  /** Client-safe message. Never carries internal detail. */
  message: string;
  /** Whether the same request is expected to succeed later without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
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

/**
 * Every authentication failure maps to this one error. Unknown tokens,
 * wrong secrets and expired tokens are indistinguishable to the caller.
 */
export function unauthenticatedError(): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message: 'Invalid or expired token',
    retryable: false,
  });
}

export function forbiddenError(reason: string): TypedError {
  return createTypedError({
    code: 'AUTH.FORBIDDEN',
    message: 'Not permitted by token scope',
    retryable: false,
    details: { reason },
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function rateLimitError(retryAfterMs?: number): TypedError {
  return createTypedError({
    code: 'RATE_LIMIT.EXCEEDED',
    message: 'Rate limit exceeded',
    retryable: true,
    details: retryAfterMs ? { retryAfterMs } : undefined,
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs ?? 1000 } },
    ],
  });
}

export function backendError(): TypedError {
  return createTypedError({
    code: 'BACKEND.UNAVAILABLE',
    message: 'DNS backend request failed',
    retryable: true,
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: 5000 }, description: 'Retry idempotent requests after backoff.' },
    ],
  });
}

export function internalError(): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: 'Internal server error',
    retryable: false,
  });
}

/** Map a typed error onto its HTTP status. */
export function httpStatusFor(error: TypedError): number {
  if (error.code.startsWith('AUTH.UNAUTHENTICATED')) return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('RATE_LIMIT.')) return 429;
  if (error.code.startsWith('BACKEND.')) return 502;
  return 500;
}

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * SECRET REDACTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Audit details and log context are built from request data, which can carry
 * bearer tokens, passwords and backend API keys. `redactSecrets()` walks a
 * plain object and replaces the value of every sensitive key with a fixed
 * marker, at any depth. Key matching is case-insensitive.
 *
 * ```ts
 * redactSecrets({ hostname: 'a.example.com', token: 'rdg_x_y' });
 * // → { hostname: 'a.example.com', token: '***MASKED***' }
 * ```
 * ═══════════════════════════════════════════════════════════════════════════
 */

export const REDACTED = '***MASKED***';

const SENSITIVE_KEYS = new Set([
  'token',
  'password',
  'secret',
  'apikey',
  'api_key',
  'apipassword',
  'apisessionid',
  'authorization',
]);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

export function redactSecrets(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactValue(entry);
  }
  return result;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactValue);
  if (isPlainObject(value)) return redactSecrets(value);
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/** JSON error body returned by the generic API. */
export interface ApiErrorResponse {
  status: 'error';
  error_code: string;
  message: string;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { status: 'error', error_code: error.code, message: error.message };
}
