import type { EntityId } from '@app/contracts';

/*
 * Raw catalog documents as the v4 API returns them. Nothing is guaranteed to be
 * present, so every field is optional and nullable and readers state a default.
 */

export interface BeatsourceImage {
  id?: EntityId | null;
  uri?: string | null;
  dynamic_uri?: string | null;
}

export interface BeatsourceNamed {
  id?: EntityId | null;
  name?: string | null;
}

export interface BeatsourceLabel extends BeatsourceNamed {
  image?: BeatsourceImage | null;
}

export interface BeatsourceRelease extends BeatsourceNamed {
  publish_date?: string | null;
  upc?: string | null;
  catalog_number?: string | null;
  track_count?: number | null;
  image?: BeatsourceImage | null;
  artists?: BeatsourceNamed[] | null;
  label?: BeatsourceLabel | null;
  exclusive?: boolean | null;
}

export interface BeatsourceTrack extends BeatsourceNamed {
  mix_name?: string | null;
  publish_date?: string | null;
  length_ms?: number | null;
  bpm?: number | null;
  isrc?: string | null;
  catalog_number?: string | null;
  key?: BeatsourceNamed | null;
  genre?: BeatsourceNamed | null;
  sub_genre?: BeatsourceNamed | null;
  artists?: BeatsourceNamed[] | null;
  release?: BeatsourceRelease | null;
  is_available_for_streaming?: boolean | null;
  preorder?: boolean | null;
  exclusive?: boolean | null;
  /** position inside its release */
  number?: number | null;
  /** position inside the list it was fetched for */
  track_number?: number | null;
  total_tracks?: number | null;
}

export interface BeatsourcePlaylist extends BeatsourceNamed {
  updated_date?: string | null;
  release_images?: Array<BeatsourceImage | string | null> | null;
  track_count?: number | null;
}

export interface BeatsourceChart extends BeatsourceNamed {
  change_date?: string | null;
  person?: { owner_name?: string | null } | null;
  image?: BeatsourceImage | null;
  track_count?: number | null;
}

export interface BeatsourceArtist extends BeatsourceNamed {
  image?: BeatsourceImage | null;
}

export interface BeatsourcePlaylistItem {
  id?: EntityId | null;
  position?: number | null;
  track?: BeatsourceTrack | null;
}

export interface BeatsourcePage<T> {
  count?: number | null;
  page?: string | null;
  per_page?: number | null;
  next?: string | null;
  previous?: string | null;
  results?: T[] | null;
}

export interface BeatsourceAccount {
  subscription?: string | null;
  username?: string | null;
}

export interface BeatsourceDownload {
  location?: string | null;
  stream_quality?: string | null;
}

export type BeatsourceSearchType = 'tracks' | 'releases' | 'charts' | 'artists';

export type BeatsourceSearchResponse = Partial<Record<BeatsourceSearchType, BeatsourceSearchHit[] | null>>;

export type BeatsourceSearchHit = BeatsourceTrack & BeatsourceChart;

/** Quality strings the download endpoint understands */
export type UpstreamQuality = 'medium' | 'high' | 'lossless';

export type BeatsourceRecord =
  | BeatsourceTrack
  | BeatsourceRelease
  | BeatsourcePlaylist
  | BeatsourceChart
  | BeatsourceArtist
  | BeatsourceLabel;
