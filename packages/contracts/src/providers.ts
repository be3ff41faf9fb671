// packages/contracts/src/providers.ts

/** Media kinds the host can ask a provider for */
export enum DownloadType {
  TRACK = 'track',
  ALBUM = 'album',
  PLAYLIST = 'playlist',
  ARTIST = 'artist',
  LABEL = 'label',
}

/** Abstract fidelity levels requested by the host, independent of any upstream vocabulary */
export enum QualityTier {
  MINIMUM = 'minimum',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  LOSSLESS = 'lossless',
  HIFI = 'hifi',
}

export const QUALITY_TIERS: readonly QualityTier[] = [
  QualityTier.MINIMUM,
  QualityTier.LOW,
  QualityTier.MEDIUM,
  QualityTier.HIGH,
  QualityTier.LOSSLESS,
  QualityTier.HIFI,
];

export enum Codec {
  FLAC = 'flac',
  AAC = 'aac',
}

export type ImageFileType = 'jpg' | 'png' | 'webp';

export type ModuleMode = 'download' | 'covers' | 'lyrics' | 'credits';

export interface MediaIdentification {
  mediaType: DownloadType;
  mediaId: string;
}

export interface Tags {
  albumArtist: string | null;
  trackNumber: number | null;
  totalTracks: number | null;
  upc: string | null;
  isrc: string | null;
  genres: string[];
  releaseDate: string | null;
  copyright: string | null;
  label: string | null;
  extraTags: Record<string, string>;
}

export interface DownloadRequest {
  trackId: string;
  qualityTier: QualityTier;
}

export interface TrackInfo {
  name: string;
  album: string | null;
  albumId: string | null;
  artists: string[];
  artistId: string | null;
  releaseYear: string | null;
  /** seconds */
  duration: number | null;
  codec: Codec;
  /** kbps */
  bitrate: number;
  bitDepth: number | null;
  /** kHz */
  sampleRate: number;
  coverUrl: string | null;
  tags: Tags;
  download: DownloadRequest;
  /** Set when the track cannot be downloaded; the host decides whether to skip it */
  error: string | null;
}

/** `TExtra` is handed back to the provider unchanged when the host asks for the listed tracks */
export interface AlbumInfo<TExtra = unknown> {
  name: string;
  artist: string | null;
  artistId: string | null;
  releaseYear: string | null;
  duration: number;
  upc: string | null;
  coverUrl: string | null;
  tracks: string[];
  trackExtra: TExtra;
}

export interface PlaylistInfo<TExtra = unknown> {
  name: string;
  creator: string;
  releaseYear: string | null;
  duration: number;
  coverUrl: string | null;
  tracks: string[];
  trackExtra: TExtra;
}

export interface ArtistInfo<TExtra = unknown> {
  name: string;
  tracks: string[];
  trackExtra: TExtra;
}

export interface LabelInfo<TExtra = unknown> {
  name: string;
  albums: string[];
  tracks: string[];
  albumExtra: TExtra;
  trackExtra: TExtra;
}

export interface SearchResult<TExtra = unknown> {
  resultId: string;
  name: string;
  artists: string[] | null;
  year: string | null;
  duration: number | null;
  additional: string[] | null;
  extra: TExtra;
}

export interface CoverInfo {
  url: string;
  fileType: ImageFileType;
}

export interface CoverOptions {
  resolution: number;
}

export interface TrackDownloadInfo {
  downloadType: 'url';
  fileUrl: string;
}

/** Static description a provider module hands to the host */
export interface ModuleInformation {
  serviceName: string;
  supportedModes: ModuleMode[];
  sessionSettings: Record<string, string>;
  sessionStorageVariables: string[];
  netlocationConstant: string;
  testUrl: string;
}
