export type ProviderErrorCode =
  | 'credentials_missing'
  | 'authentication'
  | 'protocol'
  | 'unauthorized'
  | 'region_locked'
  | 'no_subscription'
  | 'upstream'
  | 'stream_unavailable'
  | 'fetch_failed'
  | 'not_found'
  | 'unsupported'
  | 'invalid_url'
  | 'config';

export class ProviderError extends Error {
  code: ProviderErrorCode;
  status?: number;
  constructor(code: ProviderErrorCode, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ProviderError';
    this.code = code;
    this.status = options?.status;
  }
}

/** Login rejected because required credential fields were blank */
export class CredentialsMissingError extends ProviderError {
  constructor(message: string) {
    super('credentials_missing', message);
    this.name = 'CredentialsMissingError';
  }
}

export class AuthenticationError extends ProviderError {
  constructor(message: string, status?: number) {
    super('authentication', message, { status });
    this.name = 'AuthenticationError';
  }
}

/** Upstream answered with a shape or redirect the flow does not expect */
export class ProtocolError extends ProviderError {
  constructor(message: string, status?: number) {
    super('protocol', message, { status });
    this.name = 'ProtocolError';
  }
}

export class UnauthorizedError extends ProviderError {
  constructor(public readonly body: string) {
    super('unauthorized', `Unauthorized: ${body.slice(0, 200)}`, { status: 401 });
    this.name = 'UnauthorizedError';
  }
}

export class RegionLockedError extends ProviderError {
  constructor(public readonly detail: string) {
    super('region_locked', 'region locked', { status: 403 });
    this.name = 'RegionLockedError';
  }
}

export class NoActiveSubscriptionError extends ProviderError {
  constructor(message: string) {
    super('no_subscription', message);
    this.name = 'NoActiveSubscriptionError';
  }
}

export class UpstreamError extends ProviderError {
  constructor(status: number, public readonly body: string) {
    super('upstream', `HTTP ${status}: ${body.slice(0, 200)}`, { status });
    this.name = 'UpstreamError';
  }
}

export class StreamUnavailableError extends ProviderError {
  constructor(message: string) {
    super('stream_unavailable', message);
    this.name = 'StreamUnavailableError';
  }
}

/** A top-level fetch failed; `cause` carries the upstream failure */
export class CatalogFetchError extends ProviderError {
  constructor(message: string, cause: unknown) {
    super('fetch_failed', message, { cause, status: cause instanceof ProviderError ? cause.status : undefined });
    this.name = 'CatalogFetchError';
  }
}

export const isNotFound = (error: unknown): boolean =>
  error instanceof UpstreamError && error.status === 404;
