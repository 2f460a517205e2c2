import {
  apiError,
  backendError,
  forbiddenError,
  httpStatusFor,
  internalError,
  isSensitiveKey,
  notFoundError,
  rateLimitError,
  REDACTED,
  redactSecrets,
  unauthenticatedError,
  validationError,
} from '../../src/domain/errors';

describe('redactSecrets', () => {
  test('masks sensitive keys at any depth', () => {
    const input = {
      hostname: 'home.example.com',
      Token: 'rdg_dev_abcdefgh1234',
      nested: {
        apiKey: 'test-secret',
        list: [{ password: 'test-secret', ok: 1 }, 'plain'],
      },
    };
    expect(redactSecrets(input)).toEqual({
      hostname: 'home.example.com',
      Token: REDACTED,
      nested: {
        apiKey: REDACTED,
        list: [{ password: REDACTED, ok: 1 }, 'plain'],
      },
    });
  });

  test('does not modify its input', () => {
    const input = { secret: 'test-secret' };
    redactSecrets(input);
    expect(input.secret).toBe('test-secret');
  });

  test('matches keys case-insensitively', () => {
    expect(isSensitiveKey('AUTHORIZATION')).toBe(true);
    expect(isSensitiveKey('api_key')).toBe(true);
    expect(isSensitiveKey('hostname')).toBe(false);
  });
});

describe('httpStatusFor', () => {
  test.each([
    [unauthenticatedError(), 401],
    [forbiddenError('out_of_scope'), 403],
    [notFoundError('Realm', 'realm_1'), 404],
    [validationError('bad'), 400],
    [rateLimitError(1000), 429],
    [backendError(), 502],
    [internalError(), 500],
  ])('%o → %i', (error, status) => {
    expect(httpStatusFor(error)).toBe(status);
  });
});

describe('apiError', () => {
  test('exposes only code and message', () => {
    expect(apiError(forbiddenError('out_of_scope'))).toEqual({
      status: 'error',
      error_code: 'AUTH.FORBIDDEN',
      message: 'Not permitted by token scope',
    });
  });

  test('uses one message for every authentication failure', () => {
    expect(apiError(unauthenticatedError())).toEqual({
      status: 'error',
      error_code: 'AUTH.UNAUTHENTICATED',
      message: 'Invalid or expired token',
    });
  });
});
