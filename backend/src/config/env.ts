import { z } from 'zod';
import type { GeneratorConfig } from '../types/generation.js';
import { ConfigError } from '../utils/errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().min(1).default('*'),

  GEMINI_API_KEY: z.string().default(''),
  GEMINI_MODEL: z.string().min(1).default('gemini-1.5-flash'),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  GEMINI_MAX_TOKENS: z.coerce.number().int().positive().default(4096),

  STORAGE_DRIVER: z.enum(['s3', 'local']).default('s3'),
  OUTPUT_BUCKET_NAME: z.string().default(''),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  LOCAL_OUTPUT_DIR: z.string().min(1).default('./generated'),

  GENERATION_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(3),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join(', ');
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

export function buildGeneratorConfig(env: Env): GeneratorConfig {
  return Object.freeze({
    environment: env.NODE_ENV,
    bucket: env.OUTPUT_BUCKET_NAME.trim(),
    region: env.AWS_REGION,
    model: env.GEMINI_MODEL,
    temperature: env.GEMINI_TEMPERATURE,
    maxOutputTokens: env.GEMINI_MAX_TOKENS,
    storageDriver: env.STORAGE_DRIVER,
    localOutputDir: env.LOCAL_OUTPUT_DIR,
    concurrency: env.GENERATION_CONCURRENCY,
    inferenceTimeoutMs: env.INFERENCE_TIMEOUT_MS,
    storageTimeoutMs: env.STORAGE_TIMEOUT_MS,
  });
}
