import {
  ApiError,
  AuthenticationError,
  DecodeError,
  ErrorKind,
  FieldError,
  KlingError,
  NotFoundError,
  RateLimitError,
  ServerError,
  TimeoutError,
  ValidationError
} from '../utils/errorHandler';

export const DEFAULT_RETRY_AFTER_SECONDS = 5;

export type TransportOutcome =
  | { type: 'transport'; error: unknown; timedOut: boolean }
  | { type: 'response'; status: number; headers: Record<string, string>; bodyText: string };

interface ErrorBody {
  message?: string;
  requestId?: string;
  code?: number;
  fieldErrors: FieldError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function toFieldErrors(raw: unknown): FieldError[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.map((item) => {
    if (isRecord(item)) {
      const location = item.loc ?? item.path ?? item.field;
      const path = Array.isArray(location) ? location.map(String).join('.') : String(location ?? '');
      return { path, message: String(item.msg ?? item.message ?? 'invalid value') };
    }
    return { path: '', message: String(item) };
  });
}

function readErrorBody(bodyText: string): ErrorBody {
  const parsed = parseJson(bodyText);
  if (!parsed.ok || !isRecord(parsed.value)) {
    return { message: bodyText.trim() || undefined, fieldErrors: [] };
  }
  const body = parsed.value;
  return {
    message: typeof body.message === 'string' ? body.message : undefined,
    requestId: typeof body.request_id === 'string' ? body.request_id : undefined,
    code: typeof body.code === 'number' ? body.code : undefined,
    fieldErrors: toFieldErrors(body.errors ?? body.detail)
  };
}

// Retry-After is either delay-seconds or an HTTP-date
function parseRetryAfter(header: string | undefined, now: number): number {
  if (header === undefined) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const value = header.trim();
  const seconds = Number(value);
  if (value !== '' && Number.isFinite(seconds) && seconds >= 0) {
    return seconds;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, Math.ceil((date - now) / 1000));
  }
  return DEFAULT_RETRY_AFTER_SECONDS;
}

function header(headers: Record<string, string>, name: string): string | undefined {
  const match = Object.keys(headers).find((key) => key.toLowerCase() === name);
  return match === undefined ? undefined : headers[match];
}

/**
 * Maps one HTTP exchange to a typed error, or `null` when the response is a
 * 2xx carrying a JSON body. `now` resolves date-valued Retry-After headers.
 */
export function toClassifiedError(outcome: TransportOutcome, now: number = Date.now()): KlingError | null {
  if (outcome.type === 'transport') {
    const reason = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
    return new TimeoutError(outcome.timedOut ? 'Request timed out' : `Connection failed: ${reason}`, {
      cause: outcome.error
    });
  }

  const { status, headers, bodyText } = outcome;

  if (status >= 200 && status < 300) {
    return parseJson(bodyText).ok
      ? null
      : new DecodeError('Response body is not valid JSON', {
        statusCode: status,
        requestId: header(headers, 'x-request-id')
      });
  }

  const body = readErrorBody(bodyText);
  const options = {
    statusCode: status,
    requestId: body.requestId ?? header(headers, 'x-request-id'),
    code: body.code
  };

  if (status === 401 || status === 403) {
    return new AuthenticationError(body.message ?? 'Authentication failed', options);
  }
  if (status === 404) {
    return new NotFoundError(body.message ?? 'Resource not found', options);
  }
  if (status === 429) {
    return new RateLimitError(parseRetryAfter(header(headers, 'retry-after'), now), options);
  }
  if (status === 400 || status === 422) {
    return new ValidationError(body.message ?? 'Request rejected by the API', body.fieldErrors, options);
  }
  if (status >= 500) {
    return new ServerError(body.message ?? `Server error ${status}`, options);
  }
  return new ApiError(body.message ?? `HTTP error ${status}`, options);
}

export function classify(outcome: TransportOutcome): ErrorKind | null {
  return toClassifiedError(outcome)?.kind ?? null;
}
