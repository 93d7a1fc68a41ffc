import { classify, toClassifiedError, TransportOutcome } from '../../src/services/classifier';
import { RateLimitError, ValidationError } from '../../src/utils/errorHandler';

function response(status: number, body: unknown = {}, headers: Record<string, string> = {}): TransportOutcome {
  return {
    type: 'response',
    status,
    headers,
    bodyText: typeof body === 'string' ? body : JSON.stringify(body)
  };
}

describe('classify', () => {
  it.each([
    [401, 'authentication'],
    [403, 'authentication'],
    [404, 'not_found'],
    [429, 'rate_limited'],
    [400, 'validation'],
    [422, 'validation'],
    [500, 'server_error'],
    [502, 'server_error'],
    [503, 'server_error'],
    [504, 'server_error'],
    [409, 'api'],
    [418, 'api']
  ])('maps HTTP %i to %s', (status, kind) => {
    expect(classify(response(status))).toBe(kind);
  });

  it('maps connection failures and timeouts to timeout', () => {
    expect(classify({ type: 'transport', error: new TypeError('fetch failed'), timedOut: false })).toBe('timeout');
    expect(classify({ type: 'transport', error: new Error('aborted'), timedOut: true })).toBe('timeout');
  });

  it('maps a malformed 2xx body to decode', () => {
    expect(classify(response(200, '{"code": 0,'))).toBe('decode');
  });

  it('returns null for a 2xx JSON body', () => {
    expect(classify(response(200, { code: 0, data: {} }))).toBeNull();
  });
});

describe('toClassifiedError', () => {
  it('reads Retry-After seconds on 429', () => {
    const error = toClassifiedError(response(429, {}, { 'Retry-After': '7' }));

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError && error.retryAfterSeconds).toBe(7);
  });

  it('defaults retry-after to 5 seconds', () => {
    const error = toClassifiedError(response(429));

    expect(error instanceof RateLimitError && error.retryAfterSeconds).toBe(5);
  });

  it('reads Retry-After as an HTTP date', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    const error = toClassifiedError(response(429, {}, { 'retry-after': 'Wed, 21 Oct 2026 07:29:00 GMT' }), now);

    expect(error instanceof RateLimitError && error.retryAfterSeconds).toBe(60);
  });

  it('rounds a partial second up and clamps past dates to zero', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT') + 500;
    const soon = toClassifiedError(response(429, {}, { 'retry-after': 'Wed, 21 Oct 2026 07:28:10 GMT' }), now);
    const past = toClassifiedError(response(429, {}, { 'retry-after': 'Wed, 21 Oct 2026 07:27:00 GMT' }), now);

    expect(soon instanceof RateLimitError && soon.retryAfterSeconds).toBe(10);
    expect(past instanceof RateLimitError && past.retryAfterSeconds).toBe(0);
  });

  it('falls back to the default for an unreadable Retry-After', () => {
    const error = toClassifiedError(response(429, {}, { 'retry-after': 'soon' }));

    expect(error instanceof RateLimitError && error.retryAfterSeconds).toBe(5);
  });

  it('carries field errors and request id on validation failures', () => {
    const error = toClassifiedError(
      response(422, {
        message: 'Invalid params',
        request_id: 'req-42',
        detail: [{ loc: ['body', 'prompt'], msg: 'field required' }]
      })
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error?.message).toBe('Invalid params');
    expect(error?.requestId).toBe('req-42');
    expect(error instanceof ValidationError && error.fieldErrors).toEqual([
      { path: 'body.prompt', message: 'field required' }
    ]);
  });

  it('keeps status code and message for generic API errors', () => {
    const error = toClassifiedError(response(409, { code: 1303, message: 'Too many parallel tasks' }));

    expect(error?.kind).toBe('api');
    expect(error?.statusCode).toBe(409);
    expect(error?.code).toBe(1303);
    expect(error?.message).toBe('Too many parallel tasks');
  });

  it('uses the plain body text when the error body is not JSON', () => {
    const error = toClassifiedError(response(502, 'Bad Gateway'));

    expect(error?.kind).toBe('server_error');
    expect(error?.message).toBe('Bad Gateway');
  });

  it('falls back to the x-request-id header', () => {
    const error = toClassifiedError(response(404, {}, { 'x-request-id': 'hdr-1' }));

    expect(error?.requestId).toBe('hdr-1');
  });
});
