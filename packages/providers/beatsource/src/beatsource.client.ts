import type { EntityId } from '@app/contracts';
import {
  RegionLockedError,
  UnauthorizedError,
  UpstreamError,
  type HttpClient,
  type QueryValue,
} from '@app/providers-core';

import type {
  BeatsourceAccount,
  BeatsourceArtist,
  BeatsourceChart,
  BeatsourceDownload,
  BeatsourceLabel,
  BeatsourcePage,
  BeatsourcePlaylist,
  BeatsourcePlaylistItem,
  BeatsourceRelease,
  BeatsourceSearchResponse,
  BeatsourceSearchType,
  BeatsourceTrack,
  UpstreamQuality,
} from './beatsource.types.ts';
import { MAX_PAGE_SIZE } from './config.ts';

export type CatalogKind = 'tracks' | 'releases' | 'playlists' | 'charts' | 'artists' | 'labels';

export interface PageOptions {
  page?: number;
  perPage?: number;
}

export interface BeatsourceClientOptions {
  perPage?: number;
}

const SUCCESS_STATUSES = new Set([200, 201, 202]);

const DEFAULT_SEARCH_PAGE_SIZE = 50;

const readDetail = (body: unknown): string | undefined => {
  if (body && typeof body === 'object' && 'detail' in body) {
    const { detail } = body;
    return typeof detail === 'string' ? detail : undefined;
  }
  return undefined;
};

/**
 * Bearer-authenticated GETs against the v4 catalog. Each call is independent;
 * token state lives with the auth manager that feeds the transport's auth header.
 */
export class BeatsourceClient {
  private readonly perPage: number;

  constructor(
    private readonly http: HttpClient,
    options: BeatsourceClientOptions = {},
  ) {
    this.perPage = options.perPage ?? MAX_PAGE_SIZE;
  }

  get pageSize(): number {
    return this.perPage;
  }

  private async get<T>(path: string, query?: Record<string, QueryValue>): Promise<T> {
    const response = await this.http.request('GET', path, { query, authorized: true });

    // access_token expired or revoked
    if (response.status === 401) {
      throw new UnauthorizedError(response.text);
    }

    if (response.status === 403) {
      const detail = readDetail(response.json<unknown>());
      if (detail?.includes('Territory')) {
        throw new RegionLockedError(detail);
      }
    }

    if (!SUCCESS_STATUSES.has(response.status)) {
      throw new UpstreamError(response.status, response.text);
    }

    const body = response.json<T>();
    if (body === undefined || body === null) {
      throw new UpstreamError(response.status, `invalid JSON body: ${response.text.slice(0, 200)}`);
    }
    return body;
  }

  getEntity<T>(kind: CatalogKind, id: EntityId): Promise<T> {
    return this.get<T>(`catalog/${kind}/${encodeURIComponent(String(id))}`);
  }

  getEntityPage<T>(
    kind: CatalogKind,
    id: EntityId,
    child: 'tracks' | 'releases',
    opts: PageOptions = {},
  ): Promise<BeatsourcePage<T>> {
    return this.get<BeatsourcePage<T>>(`catalog/${kind}/${encodeURIComponent(String(id))}/${child}`, {
      page: opts.page ?? 1,
      per_page: opts.perPage ?? this.perPage,
    });
  }

  getAccount(): Promise<BeatsourceAccount> {
    return this.get('auth/o/introspect');
  }

  getTrack(id: EntityId): Promise<BeatsourceTrack> {
    return this.getEntity('tracks', id);
  }

  getRelease(id: EntityId): Promise<BeatsourceRelease> {
    return this.getEntity('releases', id);
  }

  getReleaseTracks(id: EntityId, opts?: PageOptions): Promise<BeatsourcePage<BeatsourceTrack>> {
    return this.getEntityPage('releases', id, 'tracks', opts);
  }

  getPlaylist(id: EntityId): Promise<BeatsourcePlaylist> {
    return this.getEntity('playlists', id);
  }

  getPlaylistTracks(id: EntityId, opts?: PageOptions): Promise<BeatsourcePage<BeatsourcePlaylistItem>> {
    return this.getEntityPage('playlists', id, 'tracks', opts);
  }

  getChart(id: EntityId): Promise<BeatsourceChart> {
    return this.getEntity('charts', id);
  }

  getChartTracks(id: EntityId, opts?: PageOptions): Promise<BeatsourcePage<BeatsourceTrack>> {
    return this.getEntityPage('charts', id, 'tracks', opts);
  }

  getArtist(id: EntityId): Promise<BeatsourceArtist> {
    return this.getEntity('artists', id);
  }

  getArtistTracks(id: EntityId, opts?: PageOptions): Promise<BeatsourcePage<BeatsourceTrack>> {
    return this.getEntityPage('artists', id, 'tracks', opts);
  }

  getLabel(id: EntityId): Promise<BeatsourceLabel> {
    return this.getEntity('labels', id);
  }

  getLabelReleases(id: EntityId, opts?: PageOptions): Promise<BeatsourcePage<BeatsourceRelease>> {
    return this.getEntityPage('labels', id, 'releases', opts);
  }

  getLabelTracks(id: EntityId, opts?: PageOptions): Promise<BeatsourcePage<BeatsourceTrack>> {
    return this.getEntityPage('labels', id, 'tracks', opts);
  }

  search(
    query: string,
    type: BeatsourceSearchType = 'tracks',
    perPage: number = DEFAULT_SEARCH_PAGE_SIZE,
  ): Promise<BeatsourceSearchResponse> {
    return this.get('catalog/search', { q: query, type, per_page: perPage });
  }

  /** 128k HLS preview stream */
  getTrackStream(id: EntityId): Promise<BeatsourceDownload> {
    return this.get(`catalog/tracks/${encodeURIComponent(String(id))}/stream`);
  }

  getTrackDownload(id: EntityId, quality: UpstreamQuality): Promise<BeatsourceDownload> {
    return this.get(`catalog/tracks/${encodeURIComponent(String(id))}/download`, { quality });
  }
}
