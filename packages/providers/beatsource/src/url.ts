import { DownloadType, type MediaIdentification } from '@app/contracts';
import { ProviderError } from '@app/providers-core';

const CATALOG_URL_PATTERN =
  /https?:\/\/(?:www\.)?beatsource\.com\/(?:[a-z]{2}\/)?(?<type>track|release|artist|playlists|playlist|chart|label).*\/(?<id>\d+)[^/]*?(?:$|\?)/;

// charts resolve through the playlist lookup, which falls back to the chart endpoint
const MEDIA_TYPES: Record<string, DownloadType> = {
  track: DownloadType.TRACK,
  release: DownloadType.ALBUM,
  artist: DownloadType.ARTIST,
  playlist: DownloadType.PLAYLIST,
  playlists: DownloadType.PLAYLIST,
  chart: DownloadType.PLAYLIST,
  label: DownloadType.LABEL,
};

/**
 * Map a beatsource.com web URL (optionally with a locale segment) to its media
 * type and numeric id, e.g. `https://www.beatsource.com/track/some-title/123`.
 */
export function parseCatalogUrl(link: string): MediaIdentification {
  const match = CATALOG_URL_PATTERN.exec(link);
  const type = match?.groups?.type;
  const id = match?.groups?.id;
  if (!type || !id) {
    throw new ProviderError('invalid_url', `Could not parse Beatsource URL: ${link}`);
  }

  const mediaType = MEDIA_TYPES[type];
  if (!mediaType) {
    throw new ProviderError('invalid_url', `Unknown Beatsource media type in URL: ${link}`);
  }

  return { mediaType, mediaId: id };
}
