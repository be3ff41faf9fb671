import { MAX_COVER_SIZE } from './config.ts';

const RESOLUTION_PATTERN = /\d{3,4}x\d{3,4}/g;

/**
 * Cover URLs come either as a `{w}x{h}` template or with a literal resolution
 * such as `500x500`; both are turned into a square image of `size`, capped at `maxSize`.
 */
export function generateArtworkUrl(coverUrl: string, size: number, maxSize: number = MAX_COVER_SIZE): string {
  const capped = Math.min(size, maxSize);
  return coverUrl
    .replace(RESOLUTION_PATTERN, '{w}x{h}')
    .replace(/\{w\}/g, String(capped))
    .replace(/\{h\}/g, String(capped));
}
