import {
  createTypedError,
  isRetryableStatus,
  GitlabError,
  GitlabAttributeError,
  GitlabAuthenticationError,
  GitlabConfigError,
  GitlabConnectionError,
  GitlabDeleteError,
  GitlabGetError,
  GitlabHttpError,
  GitlabOperationError,
  GitlabParsingError,
  GitlabErrorClass,
  withHttpError,
  maskSecret,
  maskSecretsInMessage,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('isRetryableStatus', () => {
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(500)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(404)).toBe(false);
    expect(isRetryableStatus(undefined)).toBe(false);
  });
});

describe('GitlabError hierarchy', () => {
  const cases: Array<[string, string, GitlabErrorClass]> = [
    ['GitlabError', 'CLIENT.ERROR', GitlabError],
    ['GitlabAttributeError', 'CLIENT.MISSING_ATTRIBUTE', GitlabAttributeError],
    ['GitlabConfigError', 'CLIENT.CONFIG', GitlabConfigError],
    ['GitlabConnectionError', 'HTTP.CONNECTION', GitlabConnectionError],
    ['GitlabAuthenticationError', 'AUTH.UNAUTHORIZED', GitlabAuthenticationError],
    ['GitlabHttpError', 'HTTP.STATUS', GitlabHttpError],
    ['GitlabParsingError', 'HTTP.PARSE', GitlabParsingError],
    ['GitlabOperationError', 'OPERATION.FAILED', GitlabOperationError],
    ['GitlabGetError', 'OPERATION.GET', GitlabGetError],
    ['GitlabDeleteError', 'OPERATION.DELETE', GitlabDeleteError],
  ];

  test.each(cases)('%s has code %s', (name, code, ErrorClass) => {
    const err = new ErrorClass('boom');
    expect(err).toBeInstanceOf(GitlabError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe(name);
    expect(err.typedError.code).toBe(code);
    expect(err.typedError.message).toBe('boom');
  });

  test('operation errors share a base class', () => {
    expect(new GitlabGetError('x')).toBeInstanceOf(GitlabOperationError);
    expect(new GitlabDeleteError('x')).toBeInstanceOf(GitlabOperationError);
  });

  test('carries status and body', () => {
    const err = new GitlabHttpError('404 Not found', 404, '{"message":"404 Not found"}');
    expect(err.statusCode).toBe(404);
    expect(err.responseBody).toBe('{"message":"404 Not found"}');
    expect(err.typedError.details).toEqual({ statusCode: 404 });
    expect(err.typedError.retryable).toBe(false);
    expect(err.typedError.suggestedFixes[0].type).toBe('FIX_RESOURCE_NOT_FOUND');
  });

  test('rejected credentials suggest checking the token', () => {
    const err = new GitlabAuthenticationError('401 Unauthorized', 401);
    expect(err.typedError.suggestedFixes[0].type).toBe('CHECK_TOKEN');
  });

  test('server errors are retryable', () => {
    const err = new GitlabHttpError('Bad Gateway', 502);
    expect(err.typedError.retryable).toBe(true);
    expect(err.typedError.suggestedFixes[0].type).toBe('WAIT_AND_RETRY');
  });

  test('errors without a response have no details', () => {
    const err = new GitlabConnectionError('GET https://gitlab.example.com failed: fetch failed');
    expect(err.statusCode).toBeUndefined();
    expect(err.typedError.details).toBeUndefined();
    expect(err.typedError.suggestedFixes).toEqual([]);
  });
});

describe('withHttpError', () => {
  test('returns the result on success', async () => {
    await expect(withHttpError(GitlabGetError, async () => 'ok')).resolves.toBe('ok');
  });

  test('converts GitlabHttpError to the given class', async () => {
    const err = await withHttpError(GitlabDeleteError, async () => {
      throw new GitlabHttpError('locked', 409, '{"message":"locked"}');
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GitlabDeleteError);
    if (!(err instanceof GitlabDeleteError)) return;
    expect(err.message).toBe('locked');
    expect(err.statusCode).toBe(409);
    expect(err.responseBody).toBe('{"message":"locked"}');
  });

  test('passes authentication errors through', async () => {
    const original = new GitlabAuthenticationError('403 Forbidden', 403);
    await expect(
      withHttpError(GitlabGetError, async () => {
        throw original;
      }),
    ).rejects.toBe(original);
  });

  test('passes other errors through', async () => {
    const original = new RangeError('chunkSize must be a positive integer, got 0');
    await expect(
      withHttpError(GitlabGetError, async () => {
        throw original;
      }),
    ).rejects.toBe(original);
  });
});

describe('maskSecret', () => {
  it('masks all but last 4 characters for long secrets', () => {
    expect(maskSecret('test-job-token')).toBe('**********oken');
  });

  it('fully masks secrets shorter than 8 characters', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('')).toBe('****');
  });

  it('preserves last 4 characters for 8-character secrets', () => {
    expect(maskSecret('12345678')).toBe('****5678');
  });
});

describe('maskSecretsInMessage', () => {
  it('masks every occurrence of every secret', () => {
    const result = maskSecretsInMessage('a=test-secret b=test-secret c=other-secret', ['test-secret', 'other-secret']);
    expect(result).toBe('a=*******cret b=*******cret c=********cret');
  });

  it('treats regex metacharacters literally', () => {
    expect(maskSecretsInMessage('token a.b*c+d?e', ['a.b*c+d?e'])).toBe('token *****+d?e');
  });

  it('leaves the message alone without secrets', () => {
    expect(maskSecretsInMessage('nothing to hide', [])).toBe('nothing to hide');
  });
});
