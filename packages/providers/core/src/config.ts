import { z } from 'zod';

import { ProviderError } from './types.ts';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Provider HTTP client configuration
 */
export interface HttpConfig {
  /**
   * Retries on 429 and 5xx responses
   * @default 3
   */
  retries: number;

  /**
   * Base delay for exponential backoff in milliseconds
   * @default 300
   */
  retryBaseMs: number;
}

export const DEFAULT_HTTP_CONFIG: HttpConfig = {
  retries: 3,
  retryBaseMs: 300,
};

const HttpEnvSchema = z.object({
  PROVIDER_HTTP_RETRIES: z.coerce.number().int().min(0).optional(),
  PROVIDER_HTTP_RETRY_BASE_MS: z.coerce.number().int().min(0).optional(),
});

const LogEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Drop keys whose value is undefined so they don't shadow defaults when spread
 */
export function compact<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = { ...value };
  for (const key in result) {
    if (result[key] === undefined) {
      delete result[key];
    }
  }
  return result;
}

/**
 * Turn a failed zod parse into a ProviderError naming every offending field
 */
export function configError(scope: string, error: z.ZodError): ProviderError {
  const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new ProviderError('config', `Invalid ${scope} configuration: ${issues.join('; ')}`);
}

/**
 * Get HTTP configuration from environment variables
 */
export function getHttpConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<HttpConfig> {
  const parsed = HttpEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw configError('provider HTTP', parsed.error);
  }
  return compact({
    retries: parsed.data.PROVIDER_HTTP_RETRIES,
    retryBaseMs: parsed.data.PROVIDER_HTTP_RETRY_BASE_MS,
  });
}

/**
 * Merge HTTP config with defaults
 */
export function resolveHttpConfig(
  overrides: Partial<HttpConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): HttpConfig {
  return {
    ...DEFAULT_HTTP_CONFIG,
    ...getHttpConfigFromEnv(env),
    ...compact(overrides),
  };
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = LogEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw configError('logging', parsed.error);
  }
  return parsed.data.LOG_LEVEL;
}
