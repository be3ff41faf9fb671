import {
  DownloadType,
  type AlbumInfo,
  type EntityCache,
  type EntityKind,
  type QualityTier,
  type SearchResult,
  type Tags,
  type TrackInfo,
} from '@app/contracts';
import type { Logger } from '@app/providers-core';

import { generateArtworkUrl } from './artwork.ts';
import type {
  BeatsourceImage,
  BeatsourceNamed,
  BeatsourceRecord,
  BeatsourceRelease,
  BeatsourceSearchHit,
  BeatsourceTrack,
} from './beatsource.types.ts';
import { summarizeTracks, type PlaylistSource } from './pagination.ts';
import { resolveCodec, type SubscriptionTier } from './subscription.ts';

/** What the host hands back when it asks for the tracks of a listing */
export interface BeatsourceExtra {
  cache: EntityCache<BeatsourceRecord>;
}

export const extractYear = (date: string | null | undefined): string | null =>
  date && date.length >= 4 ? date.slice(0, 4) : null;

const idOf = (entity: BeatsourceNamed | null | undefined): string | null =>
  entity?.id === undefined || entity.id === null ? null : String(entity.id);

const namesOf = (entities: BeatsourceNamed[] | null | undefined): string[] =>
  (entities ?? [])
    .map((entity) => entity?.name?.trim())
    .filter((name): name is string => Boolean(name));

export function composeTrackName(track: Pick<BeatsourceTrack, 'name' | 'mix_name'>): string {
  const name = track.name ?? 'Unknown Track';
  return track.mix_name ? `${name} (${track.mix_name})` : name;
}

const coverFrom = (image: BeatsourceImage | null | undefined, size: number): string | null => {
  const uri = image?.dynamic_uri;
  return uri ? generateArtworkUrl(uri, size) : null;
};

export interface TrackContext {
  trackId: string;
  quality: QualityTier;
  tier: SubscriptionTier;
  coverSize: number;
  /** soft error raised while resolving the release, e.g. a territory restriction */
  releaseError?: string | null;
}

export function normalizeTrack(
  track: BeatsourceTrack,
  release: BeatsourceRelease | null,
  ctx: TrackContext,
): TrackInfo {
  const releaseYear = extractYear(track.publish_date);
  const labelName = track.release?.label?.name ?? release?.label?.name ?? null;

  const genres = namesOf([track.genre ?? {}, ...(track.sub_genre ? [track.sub_genre] : [])]);

  const extraTags: Record<string, string> = {};
  if (track.bpm) {
    extraTags.BPM = String(track.bpm);
  }
  if (track.key?.name) {
    extraTags.Key = track.key.name;
  }
  if (track.catalog_number) {
    extraTags['Catalog number'] = track.catalog_number;
  }

  const tags: Tags = {
    albumArtist: release?.artists?.[0]?.name ?? null,
    trackNumber: track.track_number ?? track.number ?? null,
    totalTracks: track.total_tracks ?? release?.track_count ?? null,
    upc: release?.upc ?? null,
    isrc: track.isrc ?? null,
    genres,
    releaseDate: track.publish_date ?? null,
    copyright: labelName ? `© ${releaseYear ? `${releaseYear} ` : ''}${labelName}` : null,
    label: labelName,
    extraTags,
  };

  let error = ctx.releaseError ?? null;
  if (track.is_available_for_streaming === false) {
    error = `Track '${track.name ?? ctx.trackId}' is not streamable!`;
  } else if (track.preorder === true) {
    error = `Track '${track.name ?? ctx.trackId}' is not yet released!`;
  }

  const { codec, bitrate, bitDepth, sampleRate } = resolveCodec(ctx.quality, ctx.tier);
  const lengthMs = track.length_ms;

  return {
    name: composeTrackName(track),
    album: release?.name ?? track.release?.name ?? null,
    albumId: idOf(release) ?? idOf(track.release),
    artists: namesOf(track.artists),
    artistId: idOf(track.artists?.[0]),
    releaseYear,
    duration: typeof lengthMs === 'number' ? Math.floor(lengthMs / 1000) : null,
    codec,
    bitrate,
    bitDepth,
    sampleRate,
    coverUrl: coverFrom(track.release?.image ?? release?.image, ctx.coverSize),
    tags,
    download: { trackId: ctx.trackId, qualityTier: ctx.quality },
    error,
  };
}

export function normalizeAlbum(
  albumId: string,
  release: BeatsourceRelease,
  tracks: BeatsourceTrack[],
  cache: EntityCache<BeatsourceRecord>,
  coverSize: number,
  logger: Logger,
): AlbumInfo<BeatsourceExtra> {
  const { ids, duration } = summarizeTracks(tracks, logger, `release ${albumId}`);
  const primaryArtist = release.artists?.[0];

  return {
    name: release.name ?? `Beatsource release ${albumId}`,
    artist: primaryArtist?.name ?? null,
    artistId: idOf(primaryArtist),
    releaseYear: extractYear(release.publish_date),
    duration,
    upc: release.upc ?? null,
    coverUrl: coverFrom(release.image, coverSize),
    tracks: ids,
    trackExtra: { cache },
  };
}

export interface PlaylistMetadata {
  name: string;
  creator: string;
  releaseYear: string | null;
  coverUrl: string | null;
}

const firstReleaseImage = (images: Array<BeatsourceImage | string | null> | null | undefined): string | null => {
  const first = Array.isArray(images) && images.length > 0 ? images[0] : null;
  if (typeof first === 'string') return first || null;
  return first?.dynamic_uri ?? null;
};

/**
 * Creator, year and cover come from different fields depending on whether the
 * id resolved as a user playlist or as a chart.
 */
export function playlistMetadata(
  id: string,
  source: PlaylistSource,
  coverSize: number,
  logger: Logger,
): PlaylistMetadata {
  let creator: string;
  let date: string | null;
  let rawCover: string | null;

  if (source.kind === 'chart') {
    creator = source.metadata.person?.owner_name || 'Beatsource';
    date = source.metadata.change_date ?? null;
    rawCover = source.metadata.image?.dynamic_uri ?? null;
  } else {
    creator = 'User';
    date = source.metadata.updated_date ?? null;
    rawCover = firstReleaseImage(source.metadata.release_images);
  }

  const releaseYear = extractYear(date);
  if (!releaseYear) {
    logger.warn({ id, kind: source.kind }, 'no date found for playlist');
  }
  if (!rawCover) {
    logger.warn({ id, kind: source.kind }, 'no cover image found for playlist');
  }

  return {
    name: source.metadata.name ?? `Beatsource ${source.kind} ${id}`,
    creator,
    releaseYear,
    coverUrl: rawCover ? generateArtworkUrl(rawCover, coverSize) : null,
  };
}

export type SearchableType = DownloadType.TRACK | DownloadType.ALBUM | DownloadType.PLAYLIST | DownloadType.ARTIST;

const CACHE_KIND: Record<SearchableType, EntityKind> = {
  [DownloadType.TRACK]: 'track',
  [DownloadType.ALBUM]: 'release',
  [DownloadType.PLAYLIST]: 'chart',
  [DownloadType.ARTIST]: 'artist',
};

export function normalizeSearchResult(
  type: SearchableType,
  hit: BeatsourceSearchHit,
  cache: EntityCache<BeatsourceRecord>,
): SearchResult<BeatsourceExtra> | undefined {
  if (hit.id === undefined || hit.id === null) return undefined;

  const additional: string[] = [];
  let artists: string[] | null = null;
  let year: string | null = null;
  let duration: number | null = null;

  switch (type) {
    case DownloadType.PLAYLIST:
      artists = [hit.person?.owner_name || 'Beatsource'];
      year = extractYear(hit.change_date);
      break;
    case DownloadType.TRACK:
      artists = namesOf(hit.artists);
      year = extractYear(hit.publish_date);
      duration = typeof hit.length_ms === 'number' ? Math.floor(hit.length_ms / 1000) : null;
      if (hit.bpm) additional.push(`${hit.bpm}BPM`);
      break;
    case DownloadType.ALBUM:
      artists = namesOf(hit.artists);
      year = extractYear(hit.publish_date);
      break;
    case DownloadType.ARTIST:
      break;
  }

  if (hit.exclusive === true) additional.push('Exclusive');

  cache.set(CACHE_KIND[type], hit.id, hit);

  return {
    resultId: String(hit.id),
    name: composeTrackName(hit),
    artists,
    year,
    duration,
    additional: additional.length > 0 ? additional : null,
    extra: { cache },
  };
}
