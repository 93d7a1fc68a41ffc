import logger from '../utils/logger';
import { AbortedError, Clock, systemClock } from '../utils/clock';
import { ClientConfig } from '../utils/config';
import { ApiError, DecodeError, ErrorContext } from '../utils/errorHandler';
import { RetryPolicy, withRetry } from '../utils/retry';
import { Envelope, envelopeSchema } from '../types';
import { TransportOutcome, parseJson, toClassifiedError } from './classifier';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type QueryValue = string | number | undefined;

export interface ApiRequest {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface HttpClientOptions {
  config: ClientConfig;
  fetch?: FetchLike;
  clock?: Clock;
  retryPolicy?: RetryPolicy;
}

/**
 * Bearer-authenticated JSON transport shared by every endpoint family.
 * Each call is classified, retried under the policy, and unwrapped from the
 * `{code, message, request_id, data}` envelope.
 */
export class KlingHttpClient {
  readonly baseUrl: string;
  readonly retryPolicy: RetryPolicy;
  readonly clock: Clock;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.config.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.config.apiKey;
    this.timeoutMs = options.config.timeoutSeconds * 1000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? systemClock;
    this.retryPolicy = options.retryPolicy ?? RetryPolicy.fromMaxRetries(options.config.maxRetries);
  }

  buildUrl(path: string, query: Record<string, QueryValue> = {}): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /** Performs a single HTTP exchange without classification or retry. */
  async send(request: ApiRequest): Promise<TransportOutcome> {
    if (request.signal?.aborted) {
      throw new AbortedError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const url = this.buildUrl(request.path, request.query);
    logger.debug('Sending Kling API request', { method: request.method, url });

    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json'
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return {
        type: 'response',
        status: response.status,
        headers,
        bodyText: await response.text()
      };
    } catch (error) {
      if (request.signal?.aborted) {
        throw new AbortedError();
      }
      return { type: 'transport', error, timedOut };
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /**
   * Sends a request under the retry policy and returns the envelope's `data`.
   */
  async request(request: ApiRequest, context: ErrorContext = {}): Promise<unknown> {
    return withRetry(
      async () => {
        const outcome = await this.send(request);
        const classified = toClassifiedError(outcome, this.clock.now());
        if (classified) {
          throw classified;
        }
        if (outcome.type !== 'response') {
          throw new DecodeError('Missing response');
        }
        return this.unwrap(outcome).data;
      },
      this.retryPolicy,
      { ...context, operation: context.operation ?? `${request.method} ${request.path}` },
      this.clock,
      request.signal
    );
  }

  private unwrap(outcome: Extract<TransportOutcome, { type: 'response' }>): Envelope {
    const parsed = parseJson(outcome.bodyText);
    const envelope = envelopeSchema.safeParse(parsed.ok ? parsed.value : undefined);
    if (!envelope.success) {
      throw new DecodeError('Response does not match the API envelope', {
        statusCode: outcome.status,
        details: { issues: envelope.error.issues.map((issue) => issue.message) }
      });
    }

    const { code, message, request_id: requestId } = envelope.data;
    if (code !== 0) {
      throw new ApiError(message ?? 'API returned an error', {
        statusCode: outcome.status,
        code,
        requestId: requestId ?? undefined
      });
    }
    return envelope.data;
  }
}
