import {
  DownloadType,
  EntityCache,
  InMemorySessionStore,
  type AlbumInfo,
  type ArtistInfo,
  type CoverInfo,
  type CoverOptions,
  type EntityId,
  type LabelInfo,
  type MediaIdentification,
  type ModuleInformation,
  type PlaylistInfo,
  type QualityTier,
  type SearchResult,
  type SessionStore,
  type TrackDownloadInfo,
  type TrackInfo,
} from '@app/contracts';
import {
  CatalogFetchError,
  HttpClient,
  NoActiveSubscriptionError,
  ProviderError,
  RegionLockedError,
  StreamUnavailableError,
  UnauthorizedError,
  createLogger,
  type Logger,
} from '@app/providers-core';

import { generateArtworkUrl } from './artwork.ts';
import { BeatsourceAuth } from './beatsource.auth.ts';
import { BeatsourceClient } from './beatsource.client.ts';
import type {
  BeatsourceRecord,
  BeatsourceRelease,
  BeatsourceSearchType,
  BeatsourceTrack,
} from './beatsource.types.ts';
import { resolveBeatsourceConfig, type BeatsourceConfig } from './config.ts';
import {
  normalizeAlbum,
  normalizeSearchResult,
  normalizeTrack,
  playlistMetadata,
  type BeatsourceExtra,
  type SearchableType,
} from './normalize.ts';
import {
  cacheRecords,
  fetchAllPages,
  fetchPlaylistSource,
  idsOf,
  reconcileTracks,
  summarizeTracks,
  type FetchAllOptions,
} from './pagination.ts';
import { UNVALIDATED, resolveUpstreamQuality, type SubscriptionTier } from './subscription.ts';
import { parseCatalogUrl } from './url.ts';

export const moduleInformation: ModuleInformation = {
  serviceName: 'Beatsource',
  supportedModes: ['download', 'covers'],
  sessionSettings: { username: '', password: '' },
  sessionStorageVariables: ['access_token', 'refresh_token', 'expires'],
  netlocationConstant: 'beatsource',
  testUrl: 'https://www.beatsource.com/track/sweet-caroline/11575544',
};

export type AuthState = 'no_session' | 'session_loaded' | 'session_expired' | 'authenticated' | 'auth_failed';

export interface BeatsourceCredentials {
  username: string;
  password: string;
}

export interface BeatsourceModuleOptions {
  credentials: BeatsourceCredentials;
  sessionStore?: SessionStore;
  config?: Partial<BeatsourceConfig>;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  now?: () => Date;
}

const SEARCH_TYPES: Record<SearchableType, BeatsourceSearchType> = {
  [DownloadType.TRACK]: 'tracks',
  [DownloadType.ALBUM]: 'releases',
  [DownloadType.PLAYLIST]: 'charts',
  [DownloadType.ARTIST]: 'artists',
};

const isSearchable = (type: DownloadType): type is SearchableType => type in SEARCH_TYPES;

const isUnauthorized = (error: unknown): boolean =>
  error instanceof UnauthorizedError ||
  (error instanceof CatalogFetchError && error.cause instanceof UnauthorizedError);

// a restored session whose account check fails this way gets one fresh login
const isAccountRejection = (error: unknown): boolean =>
  error instanceof UnauthorizedError || error instanceof NoActiveSubscriptionError;

const cachedTrack = (extra: BeatsourceExtra | undefined, id: EntityId): BeatsourceTrack | undefined =>
  extra?.cache.get('track', id);

const cachedRelease = (extra: BeatsourceExtra | undefined, id: EntityId): BeatsourceRelease | undefined =>
  extra?.cache.get('release', id);

/**
 * Host-facing Beatsource module. `create` restores or establishes a session
 * before returning. Every catalog call afterwards refreshes an expired token
 * first and retries once after a 401.
 */
export class BeatsourceModule {
  static readonly parseUrl: (link: string) => MediaIdentification = parseCatalogUrl;

  private currentState: AuthState = 'no_session';
  private tier: SubscriptionTier = UNVALIDATED;

  private readonly http: HttpClient;
  private readonly auth: BeatsourceAuth;
  private readonly client: BeatsourceClient;

  private constructor(
    private readonly config: BeatsourceConfig,
    private readonly credentials: BeatsourceCredentials,
    private readonly store: SessionStore,
    private readonly logger: Logger,
    now: () => Date,
  ) {
    this.http = new HttpClient({
      baseUrl: config.apiUrl,
      headers: { 'user-agent': 'beatsource-catalog-provider' },
      getAuthHeader: () => this.auth.authorizationHeader(),
      retries: config.retries,
      retryBaseMs: config.retryBaseMs,
      logger,
    });
    this.auth = new BeatsourceAuth(this.http, {
      clientId: config.clientId,
      userAgent: config.userAgent,
      apiUrl: config.apiUrl,
      logger,
      now,
    });
    this.client = new BeatsourceClient(this.http, { perPage: config.perPage });
  }

  static async create(options: BeatsourceModuleOptions): Promise<BeatsourceModule> {
    const config = resolveBeatsourceConfig(options.config, options.env);
    const provider = new BeatsourceModule(
      config,
      options.credentials,
      options.sessionStore ?? new InMemorySessionStore(),
      options.logger ?? createLogger('beatsource'),
      options.now ?? (() => new Date()),
    );
    try {
      await provider.establishSession();
    } catch (error) {
      provider.transition('auth_failed', 'session could not be established');
      throw error;
    }
    return provider;
  }

  get state(): AuthState {
    return this.currentState;
  }

  get subscription(): SubscriptionTier {
    return this.tier;
  }

  private transition(next: AuthState, reason: string): void {
    if (next === this.currentState) return;
    this.logger.debug({ from: this.currentState, to: next, reason }, 'auth state transition');
    this.currentState = next;
  }

  private async establishSession(): Promise<void> {
    const persisted = await this.store.load();
    if (persisted) {
      this.auth.restore(persisted);
    }

    if (!this.auth.session.refreshToken) {
      await this.login('no persisted session');
      return;
    }
    this.transition('session_loaded', 'persisted session restored');

    if (!this.auth.isValid()) {
      this.transition('session_expired', 'access token expired');
      const outcome = await this.auth.refresh();
      if (outcome.status === 'needs_reauth') {
        await this.reauthenticate(outcome.detail);
        return;
      }
      await this.saveSession();
    }

    try {
      await this.validateAccount();
    } catch (error) {
      if (!isAccountRejection(error)) throw error;
      await this.reauthenticate(error);
      return;
    }
    this.transition('authenticated', 'restored session accepted');
  }

  private async login(reason: string): Promise<void> {
    this.transition('no_session', reason);
    await this.auth.authenticate(this.credentials.username, this.credentials.password);
    await this.validateAccount();
    await this.saveSession();
    this.transition('authenticated', 'login succeeded');
  }

  private async reauthenticate(detail: unknown): Promise<void> {
    this.logger.warn({ detail }, 'stored session rejected, logging in again');
    await this.store.clear();
    this.auth.clear();
    this.tier = UNVALIDATED;
    await this.login('stored session discarded');
  }

  private async validateAccount(): Promise<void> {
    if (this.config.disableSubscriptionCheck) {
      this.logger.debug('subscription check disabled');
      return;
    }
    this.tier = await this.auth.validateSubscription(this.client);
  }

  private async saveSession(): Promise<void> {
    await this.store.save(this.auth.toPersisted());
  }

  private async recoverSession(): Promise<void> {
    const outcome = await this.auth.refresh();
    if (outcome.status === 'success') {
      await this.saveSession();
      return;
    }
    await this.reauthenticate(outcome.detail);
  }

  private async recover(): Promise<void> {
    try {
      await this.recoverSession();
    } catch (error) {
      this.transition('auth_failed', 'session recovery failed');
      throw error;
    }
    this.transition('authenticated', 'session recovered');
  }

  // the token is checked against its expiry before every call, and a 401 still gets one retry
  private async withAuthRecovery<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.auth.isValid()) {
      this.transition('session_expired', 'access token expired');
      await this.recover();
    }
    try {
      return await fn();
    } catch (error) {
      if (!isUnauthorized(error)) throw error;
      this.logger.warn('access token rejected, refreshing session');
      await this.recover();
      return fn();
    }
  }

  private pageOptions(label: string): FetchAllOptions {
    return { perPage: this.client.pageSize, logger: this.logger, label };
  }

  async search(type: DownloadType, query: string, limit = 20): Promise<SearchResult<BeatsourceExtra>[]> {
    if (!isSearchable(type)) {
      throw new ProviderError('unsupported', `Query type '${type}' is not supported for Beatsource search!`);
    }
    const apiType = SEARCH_TYPES[type];
    const response = await this.withAuthRecovery(() => this.client.search(query, apiType, limit));

    const cache = new EntityCache<BeatsourceRecord>();
    const results: SearchResult<BeatsourceExtra>[] = [];
    for (const hit of response[apiType] ?? []) {
      const result = normalizeSearchResult(type, hit, cache);
      if (result) results.push(result);
    }
    return results;
  }

  async getPlaylistInfo(playlistId: string): Promise<PlaylistInfo<BeatsourceExtra>> {
    const label = `playlist ${playlistId}`;
    const source = await this.withAuthRecovery(() =>
      fetchPlaylistSource(this.client, playlistId, this.pageOptions(label)),
    );
    const { tracks, cache } = reconcileTracks(source.tracks, this.logger);
    const { ids, duration } = summarizeTracks(tracks, this.logger, label);

    return {
      ...playlistMetadata(playlistId, source, this.config.coverSize, this.logger),
      duration,
      tracks: ids,
      trackExtra: { cache },
    };
  }

  async getArtistInfo(artistId: string): Promise<ArtistInfo<BeatsourceExtra>> {
    const artist = await this.withAuthRecovery(() => this.client.getArtist(artistId));
    const { items } = await this.withAuthRecovery(() =>
      fetchAllPages(
        (page) => this.client.getArtistTracks(artistId, { page }),
        (results) => results,
        this.pageOptions(`artist ${artistId}`),
      ),
    );

    const cache = new EntityCache<BeatsourceRecord>();
    cache.set('artist', artistId, artist);
    cacheRecords('track', items, cache, this.logger);

    return {
      name: artist.name ?? `Beatsource artist ${artistId}`,
      tracks: idsOf(items),
      trackExtra: { cache },
    };
  }

  private async fetchLabelPart<T>(labelId: string, part: string, fetch: () => Promise<T[]>): Promise<T[]> {
    try {
      return await this.withAuthRecovery(fetch);
    } catch (error) {
      this.logger.error({ labelId, part, err: error }, `failed to fetch label ${part}, continuing without them`);
      return [];
    }
  }

  async getLabelInfo(labelId: string): Promise<LabelInfo<BeatsourceExtra>> {
    const label = await this.withAuthRecovery(() => this.client.getLabel(labelId));

    const releases = await this.fetchLabelPart(labelId, 'releases', async () => {
      const { items } = await fetchAllPages(
        (page) => this.client.getLabelReleases(labelId, { page }),
        (results) => results,
        this.pageOptions(`label ${labelId} releases`),
      );
      return items;
    });
    const tracks = await this.fetchLabelPart(labelId, 'tracks', async () => {
      const { items } = await fetchAllPages(
        (page) => this.client.getLabelTracks(labelId, { page }),
        (results) => results,
        this.pageOptions(`label ${labelId} tracks`),
      );
      return items;
    });

    const cache = new EntityCache<BeatsourceRecord>();
    cache.set('label', labelId, label);
    cacheRecords('release', releases, cache, this.logger);
    cacheRecords('track', tracks, cache, this.logger);

    return {
      name: label.name ?? `Beatsource label ${labelId}`,
      albums: idsOf(releases),
      tracks: idsOf(tracks),
      albumExtra: { cache },
      trackExtra: { cache },
    };
  }

  /** Resolves to null when the release is not available in the account's territory */
  async getAlbumInfo(albumId: string, extra?: BeatsourceExtra): Promise<AlbumInfo<BeatsourceExtra> | null> {
    let release = cachedRelease(extra, albumId);
    if (!release) {
      try {
        release = await this.withAuthRecovery(() => this.client.getRelease(albumId));
      } catch (error) {
        if (error instanceof RegionLockedError) {
          this.logger.info({ albumId, detail: error.detail }, `Album ${albumId} is region locked`);
          return null;
        }
        throw error;
      }
    }

    const { items } = await this.withAuthRecovery(() =>
      fetchAllPages(
        (page) => this.client.getReleaseTracks(albumId, { page }),
        (results) => results,
        this.pageOptions(`release ${albumId}`),
      ),
    );

    const cache = new EntityCache<BeatsourceRecord>();
    cache.set('release', albumId, release);
    const { tracks } = reconcileTracks(items, this.logger, cache);

    return normalizeAlbum(albumId, release, tracks, cache, this.config.coverSize, this.logger);
  }

  async getTrackInfo(trackId: string, quality: QualityTier, extra?: BeatsourceExtra): Promise<TrackInfo> {
    const track = cachedTrack(extra, trackId) ?? (await this.withAuthRecovery(() => this.client.getTrack(trackId)));

    const albumId = track.release?.id;
    let release: BeatsourceRelease | null = null;
    let releaseError: string | null = null;

    if (albumId !== undefined && albumId !== null) {
      const cached = cachedRelease(extra, albumId);
      if (cached) {
        release = cached;
      } else {
        try {
          release = await this.withAuthRecovery(() => this.client.getRelease(albumId));
        } catch (error) {
          if (!(error instanceof RegionLockedError)) throw error;
          releaseError = `Album ${albumId} is region locked`;
        }
      }
    }

    return normalizeTrack(track, release, {
      trackId,
      quality,
      tier: this.tier,
      coverSize: this.config.coverSize,
      releaseError,
    });
  }

  async getTrackCover(trackId: string, options: CoverOptions, extra?: BeatsourceExtra): Promise<CoverInfo> {
    const track = cachedTrack(extra, trackId) ?? (await this.withAuthRecovery(() => this.client.getTrack(trackId)));
    const uri = track.release?.image?.dynamic_uri;
    if (!uri) {
      throw new ProviderError('not_found', `No cover image found for track ${trackId}`);
    }
    return { url: generateArtworkUrl(uri, options.resolution), fileType: 'jpg' };
  }

  async getTrackDownload(trackId: string, quality: QualityTier): Promise<TrackDownloadInfo> {
    const upstreamQuality = resolveUpstreamQuality(this.tier, quality);
    const stream = await this.withAuthRecovery(() => this.client.getTrackDownload(trackId, upstreamQuality));
    if (!stream.location) {
      throw new StreamUnavailableError('Could not get stream');
    }
    return { downloadType: 'url', fileUrl: stream.location };
  }
}
