import { EntityCache, type EntityId, type EntityKind } from '@app/contracts';
import { CatalogFetchError, isNotFound, type Logger } from '@app/providers-core';

import type { BeatsourceClient } from './beatsource.client.ts';
import type {
  BeatsourceChart,
  BeatsourceNamed,
  BeatsourcePage,
  BeatsourcePlaylist,
  BeatsourcePlaylistItem,
  BeatsourceRecord,
  BeatsourceTrack,
} from './beatsource.types.ts';

export interface FetchAllOptions {
  perPage: number;
  logger: Logger;
  /** used in log lines, e.g. `playlist 123` */
  label: string;
}

export interface FetchAllResult<T> {
  items: T[];
  /** upstream `count`, or the first page size when `count` is unusable */
  expected: number;
  pagesFetched: number;
  truncated: boolean;
}

const resultsOf = <R>(page: BeatsourcePage<R> | undefined): R[] =>
  Array.isArray(page?.results) ? page.results : [];

/**
 * Fetch page 1, read `count`, then walk pages 2..ceil(count / perPage) one at a
 * time. A failing, empty or short page ends the walk with whatever was collected.
 * `extract` maps a page's raw results to the items kept.
 */
export async function fetchAllPages<R, T>(
  fetchPage: (page: number) => Promise<BeatsourcePage<R>>,
  extract: (results: R[]) => T[],
  options: FetchAllOptions,
): Promise<FetchAllResult<T>> {
  const { perPage, logger, label } = options;

  const first = await fetchPage(1);
  const firstResults = resultsOf(first);
  const items = extract(firstResults);

  let expected = first.count ?? 0;
  if (!Number.isInteger(expected) || expected <= 0) {
    if (firstResults.length > 0) {
      logger.warn({ label, count: first.count }, 'invalid or missing count, assuming only the first page');
    }
    expected = firstResults.length;
  }

  const totalPages = Math.ceil(expected / perPage);
  let received = firstResults.length;
  let pagesFetched = 1;
  let truncated = false;

  for (let page = 2; page <= totalPages && received < expected; page++) {
    logger.debug({ label, received, expected }, `Fetching ${received}/${expected}`);

    let results: R[];
    try {
      results = resultsOf(await fetchPage(page));
      pagesFetched++;
    } catch (error) {
      logger.error({ label, page, err: error }, 'failed to fetch page, returning partial results');
      truncated = true;
      break;
    }

    if (results.length === 0) {
      logger.warn({ label, page, received, expected }, 'no more items found before reaching count');
      truncated = true;
      break;
    }

    items.push(...extract(results));
    received += results.length;

    const expectedOnPage = Math.min(perPage, expected - (page - 1) * perPage);
    if (results.length < expectedOnPage) {
      logger.warn(
        { label, page, got: results.length, expectedOnPage, received, expected },
        'page returned fewer items than expected, stopping',
      );
      truncated = true;
      break;
    }
  }

  return { items, expected, pagesFetched, truncated };
}

/** Playlist endpoint items wrap the track; null tracks are dropped */
export const unwrapPlaylistItems = (results: BeatsourcePlaylistItem[]): BeatsourceTrack[] =>
  results
    .map((item) => item?.track ?? null)
    .filter((track): track is BeatsourceTrack => track !== null);

/** Chart endpoint items are the tracks themselves */
export const chartItems = (results: BeatsourceTrack[]): BeatsourceTrack[] =>
  results.filter((track): track is BeatsourceTrack => track !== null && track !== undefined);

export type PlaylistSource =
  | { kind: 'playlist'; metadata: BeatsourcePlaylist; tracks: BeatsourceTrack[] }
  | { kind: 'chart'; metadata: BeatsourceChart; tracks: BeatsourceTrack[] };

export type FetchOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'not_found'; error: unknown }
  | { ok: false; reason: 'failed'; error: unknown };

async function attempt<T>(fn: () => Promise<T>): Promise<FetchOutcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, reason: isNotFound(error) ? 'not_found' : 'failed', error };
  }
}

/**
 * Resolve an id as a user playlist, or as a chart when the playlist endpoint
 * answers 404. Exactly one fallback hop.
 */
export async function fetchPlaylistSource(
  client: BeatsourceClient,
  id: EntityId,
  options: FetchAllOptions,
): Promise<PlaylistSource> {
  const { logger } = options;

  logger.debug({ id }, 'fetching playlist info as playlist');
  const asPlaylist = await attempt(async (): Promise<PlaylistSource> => {
    const metadata = await client.getPlaylist(id);
    const { items } = await fetchAllPages(
      (page) => client.getPlaylistTracks(id, { page, perPage: options.perPage }),
      unwrapPlaylistItems,
      options,
    );
    return { kind: 'playlist', metadata, tracks: items };
  });

  if (asPlaylist.ok) return asPlaylist.value;

  if (asPlaylist.reason === 'failed') {
    throw new CatalogFetchError(
      `Failed to get playlist info for ${id} (playlist endpoint): ${String(asPlaylist.error)}`,
      asPlaylist.error,
    );
  }

  logger.warn({ id }, 'fetching as playlist failed (404), trying chart endpoint');
  const asChart = await attempt(async (): Promise<PlaylistSource> => {
    const metadata = await client.getChart(id);
    const { items } = await fetchAllPages(
      (page) => client.getChartTracks(id, { page, perPage: options.perPage }),
      chartItems,
      options,
    );
    return { kind: 'chart', metadata, tracks: items };
  });

  if (asChart.ok) return asChart.value;

  throw new CatalogFetchError(
    `Failed to get playlist info for ${id} (tried both playlist and chart endpoints): ${String(asChart.error)}`,
    asChart.error,
  );
}

const hasId = (record: BeatsourceNamed): record is BeatsourceNamed & { id: EntityId } =>
  record.id !== undefined && record.id !== null && String(record.id).trim() !== '';

/**
 * Put every record that has an id into `cache` under `kind`; records without
 * one are skipped with a warning.
 */
export function cacheRecords<T extends BeatsourceRecord>(
  kind: EntityKind,
  records: T[],
  cache: EntityCache<BeatsourceRecord>,
  logger: Logger,
): void {
  records.forEach((record, index) => {
    if (!hasId(record)) {
      logger.warn({ kind, index }, `skipping ${kind} without id`);
      return;
    }
    cache.set(kind, record.id, record);
  });
}

export const idsOf = (records: BeatsourceNamed[]): string[] =>
  records.filter(hasId).map((record) => String(record.id));

export interface ReconciledTracks {
  tracks: BeatsourceTrack[];
  cache: EntityCache<BeatsourceRecord>;
}

/**
 * Number tracks by their final position and cache them by id. Returns copies;
 * the fetched records are left untouched.
 */
export function reconcileTracks(
  fetched: BeatsourceTrack[],
  logger: Logger,
  cache: EntityCache<BeatsourceRecord> = new EntityCache<BeatsourceRecord>(),
): ReconciledTracks {
  const total = fetched.length;
  const tracks = fetched.map((track, index) => ({
    ...track,
    track_number: index + 1,
    total_tracks: total,
  }));

  cacheRecords('track', tracks, cache, logger);

  return { tracks, cache };
}

export interface PlayableTracks {
  ids: string[];
  /** seconds */
  duration: number;
}

/**
 * Track ids and total duration over tracks that have both an id and a length
 */
export function summarizeTracks(tracks: BeatsourceTrack[], logger: Logger, label: string): PlayableTracks {
  const ids: string[] = [];
  let duration = 0;
  let excluded = 0;

  for (const track of tracks) {
    const lengthMs = track.length_ms;
    if (!hasId(track) || typeof lengthMs !== 'number') {
      excluded++;
      continue;
    }
    ids.push(String(track.id));
    duration += Math.floor(lengthMs / 1000);
  }

  if (excluded > 0) {
    logger.warn({ label, excluded }, 'excluded tracks without id or length from totals');
  }

  return { ids, duration };
}
