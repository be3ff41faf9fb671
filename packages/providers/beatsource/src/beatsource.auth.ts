import { z } from 'zod';

import type { PersistedSession } from '@app/contracts';
import {
  AuthenticationError,
  CredentialsMissingError,
  NoActiveSubscriptionError,
  ProtocolError,
  type HttpClient,
  type Logger,
} from '@app/providers-core';

import type { BeatsourceClient } from './beatsource.client.ts';
import { classifySubscription, type SubscriptionTier } from './subscription.ts';

export interface Session {
  accessToken: string | null;
  refreshToken: string | null;
  expires: Date | null;
}

export type RefreshOutcome =
  | { status: 'success' }
  | { status: 'needs_reauth'; detail: unknown };

export interface BeatsourceAuthOptions {
  clientId: string;
  userAgent: string;
  apiUrl: string;
  logger: Logger;
  now?: () => Date;
}

const TokenPayloadSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_in: z.number(),
  })
  .passthrough();

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;

const RefreshPayloadSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).optional(),
    expires_in: z.number(),
  })
  .passthrough();

const LoginErrorSchema = z
  .object({
    username: z.array(z.unknown()).optional(),
    password: z.array(z.unknown()).optional(),
    non_field_errors: z.array(z.unknown()).optional(),
  })
  .passthrough();

const PersistedSessionSchema = z.object({
  access_token: z.string().nullable(),
  refresh_token: z.string().nullable(),
  expires: z.string().datetime({ offset: true }).nullable(),
});

export const createEmptySession = (): Session => ({
  accessToken: null,
  refreshToken: null,
  expires: null,
});

/**
 * An authorized call may only be made while `now < expires`
 */
export function isSessionValid(session: Session, now: Date = new Date()): boolean {
  if (!session.expires) return false;
  return now.getTime() < session.expires.getTime();
}

const mentionsBlank = (messages: unknown[] | undefined): boolean =>
  Array.isArray(messages) && messages.some((message) => String(message).toLowerCase().includes('blank'));

/**
 * Owns the token triple and runs the upstream protocol around it:
 * login (session cookie) -> authorize (302 with a code) -> token exchange,
 * plus refresh and subscription introspection.
 */
export class BeatsourceAuth {
  readonly session: Session = createEmptySession();

  private readonly now: () => Date;

  constructor(
    private readonly http: HttpClient,
    private readonly options: BeatsourceAuthOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async authorizationHeader(): Promise<string | undefined> {
    return this.session.accessToken ? `Bearer ${this.session.accessToken}` : undefined;
  }

  isValid(): boolean {
    return isSessionValid(this.session, this.now());
  }

  /**
   * Load a stored triple. Returns false (and leaves the session empty) when the
   * stored document does not have the expected shape.
   */
  restore(persisted: PersistedSession): boolean {
    const parsed = PersistedSessionSchema.safeParse(persisted);
    if (!parsed.success) {
      this.options.logger.warn({ issues: parsed.error.issues }, 'ignoring malformed persisted session');
      this.clear();
      return false;
    }
    this.session.accessToken = parsed.data.access_token;
    this.session.refreshToken = parsed.data.refresh_token;
    this.session.expires = parsed.data.expires ? new Date(parsed.data.expires) : null;
    return true;
  }

  toPersisted(): PersistedSession {
    return {
      access_token: this.session.accessToken,
      refresh_token: this.session.refreshToken,
      expires: this.session.expires ? this.session.expires.toISOString() : null,
    };
  }

  clear(): void {
    this.session.accessToken = null;
    this.session.refreshToken = null;
    this.session.expires = null;
    this.http.clearCookies();
  }

  async authenticate(username: string, password: string): Promise<TokenPayload> {
    const { logger } = this.options;

    // 1. Login to get the sessionid cookie
    logger.debug('logging in');
    const login = await this.http.request('POST', 'auth/login/', {
      json: { username, password },
      headers: { 'user-agent': this.options.userAgent },
    });

    if (login.status !== 200) {
      const body = LoginErrorSchema.safeParse(login.json<unknown>());
      if (body.success && mentionsBlank(body.data.username) && mentionsBlank(body.data.password)) {
        throw new CredentialsMissingError(
          'Beatsource credentials are missing. Please fill in: username, password.',
        );
      }
      throw new AuthenticationError(`Login failed (${login.status}): ${login.text}`, login.status);
    }

    if (!this.http.getCookie('sessionid')) {
      const body = LoginErrorSchema.safeParse(login.json<unknown>());
      const firstError = body.success ? body.data.non_field_errors?.[0] : undefined;
      if (firstError !== undefined) {
        throw new AuthenticationError(`Login failed: ${String(firstError)}`);
      }
      throw new AuthenticationError('Could not find sessionid cookie after successful login attempt.');
    }

    // 2. Authorize with the session cookie; the code arrives in the redirect
    logger.debug('authorizing with session cookie');
    const authorize = await this.http.request('GET', 'auth/o/authorize/', {
      query: { client_id: this.options.clientId, response_type: 'code' },
      headers: { 'user-agent': this.options.userAgent },
      followRedirects: false,
    });

    if (authorize.status !== 302) {
      throw new ProtocolError(
        `Authorization step failed (${authorize.status}), expected 302 redirect. Response: ${authorize.text}`,
        authorize.status,
      );
    }

    const location = authorize.headers.get('location');
    if (!location) {
      throw new ProtocolError('Authorization step did not return a Location header.', authorize.status);
    }

    let code: string | null;
    try {
      code = new URL(location, this.options.apiUrl).searchParams.get('code');
    } catch (error) {
      throw new ProtocolError(
        `Failed to parse authorization code from redirect Location '${location}': ${String(error)}`,
      );
    }
    if (!code) {
      throw new ProtocolError(`Could not extract authorization code from redirect Location: ${location}`);
    }

    // 3. Exchange the code for tokens
    logger.debug('exchanging authorization code for tokens');
    const token = await this.http.request('POST', 'auth/o/token/', {
      form: {
        client_id: this.options.clientId,
        code,
        grant_type: 'authorization_code',
      },
      headers: { 'user-agent': this.options.userAgent },
    });

    if (token.status !== 200) {
      throw new AuthenticationError(`Token exchange failed (${token.status}): ${token.text}`, token.status);
    }

    const payload = TokenPayloadSchema.safeParse(token.json<unknown>());
    if (!payload.success) {
      throw new AuthenticationError(`Token response missing required fields: ${token.text.slice(0, 200)}`);
    }

    this.session.accessToken = payload.data.access_token;
    this.session.refreshToken = payload.data.refresh_token;
    this.session.expires = new Date(this.now().getTime() + payload.data.expires_in * 1000);
    logger.info('login successful');

    return payload.data;
  }

  async refresh(): Promise<RefreshOutcome> {
    const { logger } = this.options;
    if (!this.session.refreshToken) {
      return { status: 'needs_reauth', detail: { error: 'missing_refresh_token' } };
    }

    logger.debug('refreshing access token');
    const response = await this.http.request('POST', 'auth/o/token/', {
      form: {
        client_id: this.options.clientId,
        refresh_token: this.session.refreshToken,
        grant_type: 'refresh_token',
      },
      headers: { 'user-agent': this.options.userAgent },
    });

    if (response.status !== 200) {
      const detail = response.json<unknown>() ?? { error: 'refresh_failed', detail: response.text };
      logger.warn({ status: response.status, detail }, 'token refresh failed');
      return { status: 'needs_reauth', detail };
    }

    const payload = RefreshPayloadSchema.safeParse(response.json<unknown>());
    if (!payload.success) {
      logger.warn('token refresh response missing required fields');
      return { status: 'needs_reauth', detail: { error: 'invalid_refresh_response', detail: response.text } };
    }

    this.session.accessToken = payload.data.access_token;
    // the refresh token itself is sometimes rotated
    this.session.refreshToken = payload.data.refresh_token ?? this.session.refreshToken;
    this.session.expires = new Date(this.now().getTime() + payload.data.expires_in * 1000);
    logger.info('token refresh successful');
    return { status: 'success' };
  }

  async validateSubscription(client: BeatsourceClient): Promise<SubscriptionTier> {
    const account = await client.getAccount();
    const subscription = account.subscription?.trim();
    if (!subscription) {
      throw new NoActiveSubscriptionError("Beatsource: Account does not have an active 'Link' subscription");
    }
    const tier = classifySubscription(subscription);
    if (tier.kind === 'pro') {
      this.options.logger.info({ subscription }, 'Professional subscription detected, allowing high and lossless quality');
    }
    return tier;
  }
}
