import dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errorHandler';
import { fieldErrorsFromZod } from './validation';

// Load .env file from the working directory
dotenv.config();

export const DEFAULT_BASE_URL = 'https://api.klingai.com';

export const clientConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeoutSeconds: z.number().int().min(10).max(120).default(30),
  maxRetries: z.number().int().min(0).max(5).default(2)
});

export type ClientConfig = z.output<typeof clientConfigSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

export const serverConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(5000),
  nodeEnv: z.string().default('development'),
  callbackSecret: z.string().min(1).optional()
});

export type ServerConfig = z.output<typeof serverConfigSchema>;

type Env = Record<string, string | undefined>;

function getOptionalEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getOptionalEnvNumber(env: Env, key: string): number | undefined {
  const value = getOptionalEnv(env, key);
  return value === undefined ? undefined : Number(value);
}

function parseConfig<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${label} configuration`, fieldErrorsFromZod(parsed.error));
  }
  return parsed.data;
}

/**
 * Builds the client configuration, either from explicit values or from the
 * `KLING_*` environment variables.
 */
export function loadClientConfig(overrides: Partial<ClientConfigInput> = {}, env: Env = process.env): ClientConfig {
  return parseConfig(
    clientConfigSchema,
    {
      apiKey: getOptionalEnv(env, 'KLING_API_KEY'),
      baseUrl: getOptionalEnv(env, 'KLING_BASE_URL'),
      timeoutSeconds: getOptionalEnvNumber(env, 'KLING_TIMEOUT_SECONDS'),
      maxRetries: getOptionalEnvNumber(env, 'KLING_MAX_RETRIES'),
      ...overrides
    },
    'client'
  );
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return parseConfig(
    serverConfigSchema,
    {
      port: getOptionalEnvNumber(env, 'PORT'),
      nodeEnv: getOptionalEnv(env, 'NODE_ENV'),
      callbackSecret: getOptionalEnv(env, 'CALLBACK_SECRET')
    },
    'server'
  );
}
