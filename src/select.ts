import type { DownloadPreference, EncodingDescriptor, FormatTag } from './types.js';

/**
 * Fallback order used when the preferred format is not offered. Lower index wins.
 */
export const FORMAT_PRIORITY: readonly FormatTag[] = ['flac', 'mp3', 'aac', 'other'];

export const DEFAULT_PREFERENCE: DownloadPreference = { preferred: 'mp3' };

const FORMAT_ALIASES: Readonly<Record<string, FormatTag>> = {
  flac: 'flac',
  lossless: 'flac',
  mp3: 'mp3',
  'lossy-a': 'mp3',
  aac: 'aac',
  'lossy-b': 'aac',
  other: 'other',
};

/**
 * Parses a user-supplied format name, returning null for anything unrecognised.
 */
export const parseFormatTag = (value: string): FormatTag | null =>
  FORMAT_ALIASES[value.trim().toLowerCase()] ?? null;

/**
 * Maps a codec name reported by the catalog onto a format tag.
 */
export const formatFromCodec = (codec: string): FormatTag => {
  const normalized = codec.trim().toLowerCase();
  if (normalized.startsWith('flac')) {
    return 'flac';
  }
  if (normalized === 'mp3') {
    return 'mp3';
  }
  if (/^(he-)?aac(-mp4)?$/u.test(normalized)) {
    return 'aac';
  }
  return 'other';
};

// Absent or zero bitrate is lossless/unknown and outranks any concrete value.
const bitrateRank = (encoding: EncodingDescriptor): number =>
  encoding.bitrate && encoding.bitrate > 0 ? encoding.bitrate : Number.POSITIVE_INFINITY;

/**
 * Picks the encoding to download: the preferred format when offered, otherwise the
 * highest-priority format present; within that format the highest bitrate, first one on ties.
 * Returns null only when nothing is available.
 */
export const selectEncoding = (
  available: readonly EncodingDescriptor[],
  preference: DownloadPreference = DEFAULT_PREFERENCE,
): EncodingDescriptor | null => {
  if (available.length === 0) {
    return null;
  }

  let candidates = available.filter((encoding) => encoding.format === preference.preferred);
  if (candidates.length === 0) {
    const fallback = FORMAT_PRIORITY.find((format) => available.some((encoding) => encoding.format === format));
    candidates = available.filter((encoding) => encoding.format === fallback);
  }

  let best: EncodingDescriptor | null = null;
  for (const encoding of candidates) {
    if (!best || bitrateRank(encoding) > bitrateRank(best)) {
      best = encoding;
    }
  }
  return best;
};
