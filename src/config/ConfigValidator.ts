// src/config/ConfigValidator.ts

import { z } from 'zod';
import { SOURCE_NAMES } from '../core/result/types';
import type { RateLimitConfig, RetryConfig } from '../core/http/types';
import type { SourceName } from '../core/result/types';

const SourceNameSchema = z.enum(SOURCE_NAMES, {
  errorMap: () => ({ message: `Source must be one of: ${SOURCE_NAMES.join(', ')}` }),
});

// Credentials are optional here: a missing one only fails the lists that need it
const CredentialsSchema = z.object({
  mdbListApiKey: z.string().optional(),
  tmdbApiKey: z.string().optional(),
  traktClientId: z.string().optional(),
});

const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

// Per-source overrides for the sources that send their own User-Agent
const SourceUserAgentsSchema = z.object({
  imdb: z.string().min(1).optional(),
  trakt: z.string().min(1).optional(),
});

const HttpConfigSchema = z.object({
  timeout: z.number().positive().optional(),
  userAgent: z.string().min(1).optional(),
  sourceUserAgents: SourceUserAgentsSchema.optional(),
  retry: RetryConfigSchema.optional(),
});

const LoggerConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  format: z.enum(['json', 'pretty']).optional(),
});

const MetricsConfigSchema = z.object({
  enabled: z.boolean().optional(),
  port: z.number().int().min(1024).max(65535).optional(),
  path: z.string().startsWith('/').optional(),
});

export const InitConfigSchema = z.object({
  credentials: CredentialsSchema.optional(),
  http: HttpConfigSchema.optional(),
  rateLimits: z.record(SourceNameSchema, RateLimitConfigSchema).optional(),
  // Registration order: the first adapter that accepts a URL fetches it
  sources: z
    .array(SourceNameSchema)
    .min(1, 'At least one source must be enabled')
    .refine((sources) => new Set(sources).size === sources.length, {
      message: 'Each source may be listed only once',
    })
    .optional(),
  metrics: MetricsConfigSchema.optional(),
  logging: LoggerConfigSchema.optional(),
});

export type InitConfig = z.infer<typeof InitConfigSchema>;
export type ListCredentials = z.infer<typeof CredentialsSchema>;
export type SourceUserAgents = z.infer<typeof SourceUserAgentsSchema>;

export const DEFAULT_SOURCES: readonly SourceName[] = SOURCE_NAMES;

// Only rate-limit responses are retried; timeouts are not
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 10000,
  retryableStatusCodes: [429],
};

export const DEFAULT_RATE_LIMITS: Partial<Record<SourceName, RateLimitConfig>> = {
  mdblist: { qps: 5, concurrency: 1 },
  imdb: { qps: 1, concurrency: 1 },
  tmdb: { qps: 20, concurrency: 1 },
  trakt: { qps: 3, concurrency: 1 },
};

/**
 * Validate SDK initialization configuration
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): InitConfig {
  return InitConfigSchema.parse(config);
}

/**
 * Validate configuration and return readable errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: InitConfig } | { success: false; errors: string[] } {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
