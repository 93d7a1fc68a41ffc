import { Clock } from '../utils/clock';
import { ClientConfigInput, loadClientConfig } from '../utils/config';
import { RetryPolicy } from '../utils/retry';
import { AccountApi } from './account';
import {
  imageGeneration,
  imageToVideo,
  lipSync,
  multiImageToVideo,
  textToVideo,
  videoEffects,
  videoExtension,
  virtualTryOn
} from './families';
import { FetchLike, KlingHttpClient } from './httpClient';
import { TaskApi } from './taskApi';

export interface KlingClientOptions extends Partial<ClientConfigInput> {
  fetch?: FetchLike;
  clock?: Clock;
  retryPolicy?: RetryPolicy;
}

/**
 * Entry point of the SDK. Every instance owns its transport; create one per
 * API key and share it between concurrent tasks.
 */
export class KlingClient {
  readonly http: KlingHttpClient;
  readonly imageGeneration: TaskApi<typeof imageGeneration.requestSchema, 'images'>;
  readonly virtualTryOn: TaskApi<typeof virtualTryOn.requestSchema, 'images'>;
  readonly textToVideo: TaskApi<typeof textToVideo.requestSchema, 'videos'>;
  readonly imageToVideo: TaskApi<typeof imageToVideo.requestSchema, 'videos'>;
  readonly multiImageToVideo: TaskApi<typeof multiImageToVideo.requestSchema, 'videos'>;
  readonly videoExtension: TaskApi<typeof videoExtension.requestSchema, 'videos'>;
  readonly lipSync: TaskApi<typeof lipSync.requestSchema, 'videos'>;
  readonly videoEffects: TaskApi<typeof videoEffects.requestSchema, 'videos'>;
  readonly account: AccountApi;

  constructor(options: KlingClientOptions = {}) {
    const { fetch, clock, retryPolicy, ...config } = options;

    this.http = new KlingHttpClient({
      config: loadClientConfig(config),
      fetch,
      clock,
      retryPolicy
    });

    this.imageGeneration = new TaskApi(this.http, imageGeneration);
    this.virtualTryOn = new TaskApi(this.http, virtualTryOn);
    this.textToVideo = new TaskApi(this.http, textToVideo);
    this.imageToVideo = new TaskApi(this.http, imageToVideo);
    this.multiImageToVideo = new TaskApi(this.http, multiImageToVideo);
    this.videoExtension = new TaskApi(this.http, videoExtension);
    this.lipSync = new TaskApi(this.http, lipSync);
    this.videoEffects = new TaskApi(this.http, videoEffects);
    this.account = new AccountApi(this.http);
  }
}
