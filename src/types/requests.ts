import { z } from 'zod';

const MAX_PROMPT_LENGTH = 2500;

const prompt = z.string().min(1).max(MAX_PROMPT_LENGTH);
const optionalPrompt = z.string().max(MAX_PROMPT_LENGTH).optional();
const unitInterval = z.number().min(0).max(1);
const callbackUrl = z.string().url().optional();
const externalTaskId = z.string().min(1).optional();

export const videoModelNames = ['kling-v1', 'kling-v1-6', 'kling-v2-master'] as const;
export const imageModelNames = ['kling-v1', 'kling-v1-5', 'kling-v2'] as const;

const videoModel = z.enum(videoModelNames).default('kling-v1');
const videoMode = z.enum(['std', 'pro']).default('std');
const videoAspectRatio = z.enum(['16:9', '9:16', '1:1']).default('16:9');
// The API expects the duration as a string
const videoDuration = z.union([z.literal(5), z.literal(10)]).default(5).transform((value) => String(value));

export const CAMERA_AXES = ['horizontal', 'vertical', 'pan', 'tilt', 'roll', 'zoom'] as const;

export type CameraAxis = (typeof CAMERA_AXES)[number];

const cameraAxis = z.number().min(-10).max(10).optional();

export const cameraConfigSchema = z.object({
  horizontal: cameraAxis,
  vertical: cameraAxis,
  pan: cameraAxis,
  tilt: cameraAxis,
  roll: cameraAxis,
  zoom: cameraAxis
});

export const cameraControlSchema = z
  .object({
    type: z.enum(['simple', 'down_back', 'forward_up', 'right_turn_forward', 'left_turn_forward']),
    config: cameraConfigSchema.optional()
  })
  .superRefine((control, ctx) => {
    if (control.type !== 'simple') {
      if (control.config !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['config'],
          message: `config is only accepted when type is 'simple'`
        });
      }
      return;
    }

    const config: Partial<Record<CameraAxis, number>> = control.config ?? {};
    const moving = CAMERA_AXES.filter((axis) => (config[axis] ?? 0) !== 0);
    if (moving.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['config'],
        message: `Exactly one camera movement must be non-zero when type is 'simple' (got ${moving.length})`
      });
    }
  });

export type CameraControl = z.input<typeof cameraControlSchema>;

export const imageGenerationRequestSchema = z
  .object({
    modelName: z.enum(imageModelNames).default('kling-v1'),
    prompt,
    negativePrompt: optionalPrompt,
    image: z.string().min(1).optional(),
    imageReference: z.enum(['subject', 'face']).optional(),
    imageFidelity: unitInterval.default(0.5),
    humanFidelity: unitInterval.optional(),
    n: z.number().int().min(1).max(9).default(1),
    aspectRatio: z.enum(['16:9', '9:16', '1:1', '4:3', '3:4', '3:2', '2:3', '21:9']).default('16:9'),
    callbackUrl
  })
  .superRefine((request, ctx) => {
    if (request.humanFidelity !== undefined && request.imageReference !== 'subject') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['humanFidelity'],
        message: `humanFidelity can only be set when imageReference is 'subject'`
      });
    }
    if (request.image !== undefined && request.modelName === 'kling-v1-5' && request.imageReference === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['imageReference'],
        message: 'imageReference is required when an image is given to kling-v1-5'
      });
    }
  });

export const virtualTryOnRequestSchema = z.object({
  modelName: z.enum(['kolors-virtual-try-on-v1', 'kolors-virtual-try-on-v1-5']).default('kolors-virtual-try-on-v1-5'),
  humanImage: z.string().min(1),
  clothImage: z.string().min(1).optional(),
  callbackUrl
});

export const textToVideoRequestSchema = z.object({
  modelName: videoModel,
  prompt,
  negativePrompt: optionalPrompt,
  cfgScale: unitInterval.default(0.5),
  mode: videoMode,
  cameraControl: cameraControlSchema.optional(),
  aspectRatio: videoAspectRatio,
  duration: videoDuration,
  callbackUrl,
  externalTaskId
});

export const dynamicMaskSchema = z.object({
  mask: z.string().min(1),
  trajectories: z.array(z.object({ x: z.number().int(), y: z.number().int() })).min(2).max(77)
});

export const imageToVideoRequestSchema = z.object({
  modelName: videoModel,
  image: z.string().min(1),
  imageTail: z.string().min(1).optional(),
  prompt: optionalPrompt,
  negativePrompt: optionalPrompt,
  cfgScale: unitInterval.default(0.5),
  mode: videoMode,
  staticMask: z.string().min(1).optional(),
  dynamicMasks: z.array(dynamicMaskSchema).max(6).optional(),
  cameraControl: cameraControlSchema.optional(),
  duration: videoDuration,
  callbackUrl,
  externalTaskId
});

export const multiImageToVideoRequestSchema = z.object({
  modelName: z.enum(videoModelNames).default('kling-v1-6'),
  imageList: z.array(z.object({ image: z.string().min(1) })).min(1).max(4),
  prompt,
  negativePrompt: optionalPrompt,
  mode: videoMode,
  duration: videoDuration,
  aspectRatio: videoAspectRatio,
  callbackUrl,
  externalTaskId
});

export const videoExtensionRequestSchema = z.object({
  videoId: z.string().min(1),
  prompt: optionalPrompt,
  negativePrompt: optionalPrompt,
  cfgScale: unitInterval.default(0.5),
  callbackUrl,
  externalTaskId
});

const metadata = z.record(z.string()).optional();

export const lipSyncRequestSchema = z.object({
  videoUrl: z.string().url(),
  audioUrl: z.string().url(),
  outputFormat: z.enum(['mp4', 'gif']).default('mp4'),
  resolution: z.string().regex(/^\d{3,4}p$/).default('720p'),
  fps: z.number().int().min(1).max(60).default(30),
  callbackUrl,
  metadata
});

export const videoEffectsRequestSchema = z
  .object({
    videoUrl: z.string().url(),
    effectType: z.enum(['style_transfer', 'filter', 'enhance', 'stabilize']),
    intensity: unitInterval.default(0.5),
    quality: z.enum(['low', 'medium', 'high', 'ultra']).default('high'),
    styleReference: z.string().url().optional(),
    callbackUrl,
    metadata
  })
  .superRefine((request, ctx) => {
    if (request.effectType === 'style_transfer' && request.styleReference === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['styleReference'],
        message: 'styleReference is required for style_transfer'
      });
    }
  });

export type ImageGenerationRequest = z.input<typeof imageGenerationRequestSchema>;
export type VirtualTryOnRequest = z.input<typeof virtualTryOnRequestSchema>;
export type TextToVideoRequest = z.input<typeof textToVideoRequestSchema>;
export type ImageToVideoRequest = z.input<typeof imageToVideoRequestSchema>;
export type MultiImageToVideoRequest = z.input<typeof multiImageToVideoRequestSchema>;
export type VideoExtensionRequest = z.input<typeof videoExtensionRequestSchema>;
export type LipSyncRequest = z.input<typeof lipSyncRequestSchema>;
export type VideoEffectsRequest = z.input<typeof videoEffectsRequestSchema>;

export const accountCostsQuerySchema = z
  .object({
    startTime: z.union([z.number().int().min(0), z.date().transform((date) => date.getTime())]),
    endTime: z.union([z.number().int().min(0), z.date().transform((date) => date.getTime())]),
    resourcePackName: z.string().min(1).optional()
  })
  .refine((query) => query.endTime >= query.startTime, {
    path: ['endTime'],
    message: 'endTime must not be before startTime'
  });

export type AccountCostsQuery = z.input<typeof accountCostsQuerySchema>;

export const resourcePackSchema = z.object({
  resource_pack_name: z.string(),
  resource_pack_id: z.string(),
  resource_pack_type: z.enum(['decreasing_total', 'constant_period']),
  total_quantity: z.number(),
  remaining_quantity: z.number(),
  purchase_time: z.number(),
  effective_time: z.number(),
  invalid_time: z.number(),
  status: z.enum(['toBeOnline', 'online', 'expired', 'runOut'])
});

export const accountCostsDataSchema = z.object({
  code: z.number(),
  msg: z.string().nullish(),
  resource_pack_subscribe_infos: z.array(resourcePackSchema).default([])
});

export interface ResourcePack {
  name: string;
  id: string;
  type: 'decreasing_total' | 'constant_period';
  totalQuantity: number;
  remainingQuantity: number;
  purchaseTime: number;
  effectiveTime: number;
  invalidTime: number;
  status: 'toBeOnline' | 'online' | 'expired' | 'runOut';
}
