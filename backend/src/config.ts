import { z } from 'zod';

import { ConfigError } from './errors';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  ANTHROPIC_API_KEY: z.string().trim().min(1, 'ANTHROPIC_API_KEY is required'),
  VISION_MODEL: z.string().trim().min(1).default('claude-sonnet-4-20250514'),
  VISION_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.3),
  VISION_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(90_000),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  MAX_IMAGE_DIMENSION: z.coerce.number().int().positive().optional(),
  CORS_ORIGIN: z.string().trim().min(1).optional(),
});

export interface AppConfig {
  port: number;
  anthropicApiKey: string;
  vision: {
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  upload: {
    maxBytes: number;
    /** Unset: uploads are forwarded without resizing. */
    maxDimension?: number;
  };
  corsOrigin?: string;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  // Blank values in .env files mean "not set".
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    vision: {
      model: vars.VISION_MODEL,
      temperature: vars.VISION_TEMPERATURE,
      maxTokens: vars.VISION_MAX_TOKENS,
      timeoutMs: vars.INFERENCE_TIMEOUT_MS,
    },
    upload: {
      maxBytes: vars.MAX_UPLOAD_BYTES,
      maxDimension: vars.MAX_IMAGE_DIMENSION,
    },
    corsOrigin: vars.CORS_ORIGIN,
  };
}
