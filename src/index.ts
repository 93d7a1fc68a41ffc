export { KlingClient, KlingClientOptions } from './services/klingClient';
export { KlingHttpClient, FetchLike, ApiRequest } from './services/httpClient';
export { TaskApi, FamilyDescriptor, decodeSnapshot } from './services/taskApi';
export { AccountApi } from './services/account';
export { classify, toClassifiedError, TransportOutcome, DEFAULT_RETRY_AFTER_SECONDS } from './services/classifier';
export { pollUntilTerminal, PollOptions, DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS } from './services/poller';
export { resolveSnapshot } from './services/resolver';
export { downloadResult } from './services/media';
export * as families from './services/families';
export { createApp, AppOptions } from './app';
export { startServer } from './server';
export { createCallbackRouter, processCallback, CallbackHandler, CallbackRouterOptions } from './routes/callbacks';
export { RetryPolicy, RetryOptions, DEFAULT_RETRY_OPTIONS, withRetry } from './utils/retry';
export { Clock, systemClock } from './utils/clock';
export { ClientConfig, loadClientConfig, loadServerConfig } from './utils/config';
export { signPayload, isValidSignature } from './utils/signature';
export * from './utils/errorHandler';
export * from './types';
export * from './types/requests';
