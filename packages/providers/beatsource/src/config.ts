import { z } from 'zod';

import { compact, configError, resolveHttpConfig, type HttpConfig } from '@app/providers-core';

export const MAX_PAGE_SIZE = 100;
export const MAX_COVER_SIZE = 1400;

export const WEB_PLAYER_CLIENT_ID = 'ryZ8LuyQVPqbK2mBX2Hwt4qSMtnWuTYSqBPO92yQ';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/135.0.0.0 Safari/537.36';

/**
 * Beatsource provider configuration
 */
export interface BeatsourceConfig extends HttpConfig {
  /**
   * Versioned API root, trailing slash included
   * @default 'https://api.beatsource.com/v4/'
   */
  apiUrl: string;

  /**
   * OAuth client id registered for the authorization-code flow
   * @default the public id of the Beatsource web player
   */
  clientId: string;

  /**
   * User agent sent on the login/authorize/token calls
   */
  userAgent: string;

  /**
   * Page size for paginated catalog endpoints
   * @default 100
   */
  perPage: number;

  /**
   * Cover resolution used for album/track/playlist artwork
   * @default 1400
   */
  coverSize: number;

  /**
   * Skip the introspection call; quality stays at the non-pro mapping
   * @default false
   */
  disableSubscriptionCheck: boolean;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  BEATSOURCE_API_URL: z.string().url().optional(),
  BEATSOURCE_CLIENT_ID: z.string().min(1).optional(),
  BEATSOURCE_USER_AGENT: z.string().min(1).optional(),
  BEATSOURCE_PER_PAGE: z.coerce.number().int().positive().max(MAX_PAGE_SIZE).optional(),
  BEATSOURCE_COVER_SIZE: z.coerce.number().int().positive().optional(),
  BEATSOURCE_DISABLE_SUBSCRIPTION_CHECK: booleanFlag.optional(),
});

const ConfigSchema = z.object({
  apiUrl: z
    .string()
    .url()
    .transform((value) => (value.endsWith('/') ? value : `${value}/`)),
  clientId: z.string().min(1),
  userAgent: z.string().min(1),
  perPage: z.number().int().positive().max(MAX_PAGE_SIZE),
  coverSize: z.number().int().positive(),
  disableSubscriptionCheck: z.boolean(),
  retries: z.number().int().min(0),
  retryBaseMs: z.number().int().min(0),
});

export const DEFAULT_BEATSOURCE_CONFIG: Omit<BeatsourceConfig, keyof HttpConfig> = {
  apiUrl: 'https://api.beatsource.com/v4/',
  clientId: WEB_PLAYER_CLIENT_ID,
  userAgent: BROWSER_USER_AGENT,
  perPage: MAX_PAGE_SIZE,
  coverSize: MAX_COVER_SIZE,
  disableSubscriptionCheck: false,
};

/**
 * Get Beatsource configuration from environment variables
 */
export function getBeatsourceConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<BeatsourceConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw configError('Beatsource', parsed.error);
  }
  const data = parsed.data;
  return compact({
    apiUrl: data.BEATSOURCE_API_URL,
    clientId: data.BEATSOURCE_CLIENT_ID,
    userAgent: data.BEATSOURCE_USER_AGENT,
    perPage: data.BEATSOURCE_PER_PAGE,
    coverSize: data.BEATSOURCE_COVER_SIZE,
    disableSubscriptionCheck: data.BEATSOURCE_DISABLE_SUBSCRIPTION_CHECK,
  });
}

/**
 * Merge defaults, environment and explicit overrides, then validate the result
 */
export function resolveBeatsourceConfig(
  overrides: Partial<BeatsourceConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): BeatsourceConfig {
  const merged = {
    ...DEFAULT_BEATSOURCE_CONFIG,
    ...resolveHttpConfig({ retries: overrides.retries, retryBaseMs: overrides.retryBaseMs }, env),
    ...getBeatsourceConfigFromEnv(env),
    ...compact(overrides),
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw configError('Beatsource', parsed.error);
  }
  return parsed.data;
}
