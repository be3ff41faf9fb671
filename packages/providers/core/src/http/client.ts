import type { Logger } from 'pino';

export type HttpMethod = 'GET' | 'POST';

export type QueryValue = string | number | undefined;

export interface HttpClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  getAuthHeader?: () => Promise<string | undefined>;
  retries?: number;
  retryBaseMs?: number;
  logger?: Logger;
}

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  json?: unknown;
  form?: Record<string, string>;
  headers?: Record<string, string>;
  /** attach the header from `getAuthHeader` */
  authorized?: boolean;
  /** when false, 3xx responses are returned as-is */
  followRedirects?: boolean;
}

export interface HttpResponse {
  status: number;
  headers: Headers;
  text: string;
  json<T>(): T | undefined;
}

function sleep(ms: number) { return new Promise((r) => setTimeout(r, ms)); }

const parseRetryAfter = (value: string | null): number | undefined => {
  if (!value) return undefined;
  const numeric = Number(value);
  if (Number.isFinite(numeric)) {
    return Math.max(0, numeric) * 1000;
  }
  const parsedDate = Date.parse(value);
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - Date.now());
  }
  return undefined;
};

// a comma followed by `name=` starts the next cookie; commas inside Expires do not
const COOKIE_SEPARATOR = /,(?=\s*[^;=\s]+=)/;

const readSetCookies = (headers: Headers): string[] => {
  if (typeof headers.getSetCookie === 'function') {
    return headers.getSetCookie().flatMap((entry) => entry.split(COOKIE_SEPARATOR));
  }
  const raw = headers.get('set-cookie');
  return raw ? raw.split(COOKIE_SEPARATOR) : [];
};

const toResponse = (status: number, headers: Headers, text: string): HttpResponse => ({
  status,
  headers,
  text,
  json<T>(): T | undefined {
    if (!text) return undefined;
    try {
      return JSON.parse(text) as T;
    } catch {
      return undefined;
    }
  },
});

/**
 * fetch-based transport shared by a provider's auth flow and catalog calls.
 * Keeps the cookies the upstream sets, retries 429/5xx with backoff and hands
 * every final response back to the caller, which owns status interpretation.
 */
export class HttpClient {
  private readonly cookies = new Map<string, string>();

  constructor(private opts: HttpClientOptions) {}

  getCookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  clearCookies(): void {
    this.cookies.clear();
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(path, this.opts.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined || value === null) continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private storeCookies(headers: Headers): void {
    for (const raw of readSetCookies(headers)) {
      const pair = raw.split(';')[0]?.trim();
      if (!pair) continue;
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (value) {
        this.cookies.set(name, value);
      } else {
        this.cookies.delete(name);
      }
    }
  }

  private cookieHeader(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const { retries = 3, retryBaseMs = 300 } = this.opts;
    const url = this.buildUrl(path, options.query);

    let attempt = 0;

    while (true) {
      const hdrs = new Headers(this.opts.headers);
      if (options.authorized && this.opts.getAuthHeader) {
        const h = await this.opts.getAuthHeader();
        if (h) hdrs.set('authorization', h);
      }
      const cookie = this.cookieHeader();
      if (cookie) hdrs.set('cookie', cookie);

      let body: string | undefined;
      if (options.json !== undefined) {
        hdrs.set('content-type', 'application/json');
        body = JSON.stringify(options.json);
      } else if (options.form) {
        hdrs.set('content-type', 'application/x-www-form-urlencoded');
        body = new URLSearchParams(options.form).toString();
      }
      if (options.headers) {
        for (const [k, v] of Object.entries(options.headers)) hdrs.set(k, v);
      }

      const resp = await fetch(url, {
        method,
        headers: hdrs,
        body,
        redirect: options.followRedirects === false ? 'manual' : 'follow',
      });
      this.storeCookies(resp.headers);

      if ((resp.status === 429 || resp.status >= 500) && attempt < retries) {
        const retryAfter = parseRetryAfter(resp.headers.get('retry-after'));
        const backoff = retryAfter ?? retryBaseMs * Math.pow(2, attempt);
        attempt++;
        this.opts.logger?.warn({ method, path, status: resp.status, attempt, backoffMs: backoff }, 'retrying upstream request');
        await resp.body?.cancel();
        await sleep(backoff);
        continue;
      }

      const text = await resp.text();
      return toResponse(resp.status, resp.headers, text);
    }
  }
}
