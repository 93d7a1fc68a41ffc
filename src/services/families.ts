import {
  imageGenerationRequestSchema,
  imageToVideoRequestSchema,
  lipSyncRequestSchema,
  multiImageToVideoRequestSchema,
  textToVideoRequestSchema,
  videoEffectsRequestSchema,
  videoExtensionRequestSchema,
  virtualTryOnRequestSchema
} from '../types/requests';
import { FamilyDescriptor } from './taskApi';

export const imageGeneration = {
  name: 'imageGeneration',
  path: '/v1/images/generations',
  requestSchema: imageGenerationRequestSchema,
  resultKind: 'images'
} satisfies FamilyDescriptor<typeof imageGenerationRequestSchema, 'images'>;

export const virtualTryOn = {
  name: 'virtualTryOn',
  path: '/v1/images/kolors-virtual-try-on',
  requestSchema: virtualTryOnRequestSchema,
  resultKind: 'images'
} satisfies FamilyDescriptor<typeof virtualTryOnRequestSchema, 'images'>;

export const textToVideo = {
  name: 'textToVideo',
  path: '/v1/videos/text2video',
  requestSchema: textToVideoRequestSchema,
  resultKind: 'videos'
} satisfies FamilyDescriptor<typeof textToVideoRequestSchema, 'videos'>;

export const imageToVideo = {
  name: 'imageToVideo',
  path: '/v1/videos/image2video',
  requestSchema: imageToVideoRequestSchema,
  resultKind: 'videos'
} satisfies FamilyDescriptor<typeof imageToVideoRequestSchema, 'videos'>;

export const multiImageToVideo = {
  name: 'multiImageToVideo',
  path: '/v1/videos/multi-image-to-video',
  requestSchema: multiImageToVideoRequestSchema,
  resultKind: 'videos'
} satisfies FamilyDescriptor<typeof multiImageToVideoRequestSchema, 'videos'>;

export const videoExtension = {
  name: 'videoExtension',
  path: '/v1/videos/video-extend',
  requestSchema: videoExtensionRequestSchema,
  resultKind: 'videos'
} satisfies FamilyDescriptor<typeof videoExtensionRequestSchema, 'videos'>;

export const lipSync = {
  name: 'lipSync',
  path: '/v1/lip-sync/tasks',
  requestSchema: lipSyncRequestSchema,
  resultKind: 'videos'
} satisfies FamilyDescriptor<typeof lipSyncRequestSchema, 'videos'>;

export const videoEffects = {
  name: 'videoEffects',
  path: '/v1/video-effects/tasks',
  requestSchema: videoEffectsRequestSchema,
  resultKind: 'videos',
  cancellable: true
} satisfies FamilyDescriptor<typeof videoEffectsRequestSchema, 'videos'>;
