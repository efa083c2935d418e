import path from 'node:path';
import fs from 'fs-extra';
import type { EncodingDescriptor, FormatTag } from './types.js';

export const DEFAULT_OUTPUT_DIR = 'downloads';
export const LOG_FILE_NAME = 'download.log';
export const DEFAULT_RATE_LIMIT_MS = 500;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const TRACK_BATCH_SIZE = 100;
export const MAX_SEGMENT_LENGTH = 200;
export const MAX_FILE_NAME_BYTES = 255;
export const PARTIAL_SUFFIX = '.part';
export const UNKNOWN_PLACEHOLDER = 'Unknown';
export const LIKED_ALIASES: readonly string[] = ['liked', 'favorites', 'my'];

const EXTENSIONS: Readonly<Record<FormatTag, string>> = {
  flac: 'flac',
  mp3: 'mp3',
  aac: 'aac',
  other: 'bin',
};

const FORBIDDEN_CHARACTERS = /[/\\:*?"<>|\u0000-\u001f\u007f]/gu;

/**
 * Makes free text safe to use as a single path segment on common filesystems.
 */
export const sanitizeFileName = (value: string, placeholder: string = UNKNOWN_PLACEHOLDER): string => {
  const cleaned = value
    .replace(FORBIDDEN_CHARACTERS, '_')
    .replace(/\s+/gu, ' ')
    .replace(/^[\s.]+|[\s.]+$/gu, '');

  const capped = Array.from(cleaned).slice(0, MAX_SEGMENT_LENGTH).join('').replace(/[\s.]+$/u, '');
  return capped.length > 0 ? capped : placeholder;
};

/**
 * File extension for an encoding; codecs delivered in an MP4 container are written as `.m4a`.
 */
export const extensionFor = (encoding: EncodingDescriptor): string =>
  /-mp4$/iu.test(encoding.codec.trim()) ? 'm4a' : EXTENSIONS[encoding.format];

const truncateUtf8 = (value: string, maxBytes: number): string => {
  let bytes = 0;
  let result = '';
  for (const char of value) {
    bytes += Buffer.byteLength(char, 'utf8');
    if (bytes > maxBytes) {
      break;
    }
    result += char;
  }
  return result;
};

/**
 * Returns the absolute destination for a track rendered as "{artist} - {title}.{ext}".
 * The joined name is capped so that it and its `.part` twin fit in one filename.
 */
export const buildTrackPath = (
  directory: string,
  artist: string,
  title: string,
  encoding: EncodingDescriptor,
): string => {
  const extension = extensionFor(encoding);
  const budget = MAX_FILE_NAME_BYTES - Buffer.byteLength(`.${extension}${PARTIAL_SUFFIX}`, 'utf8');
  const joined = `${sanitizeFileName(artist)} - ${sanitizeFileName(title)}`;
  const capped = Array.from(joined).slice(0, MAX_SEGMENT_LENGTH).join('');
  const stem = truncateUtf8(capped, budget).replace(/[\s.]+$/u, '');
  return path.resolve(directory, `${stem || UNKNOWN_PLACEHOLDER}.${extension}`);
};

/**
 * Checks whether the given track file has already been downloaded.
 */
export const isAlreadyDownloaded = async (filePath: string): Promise<boolean> =>
  fs.pathExists(filePath);

export type PlaylistLocator =
  | { readonly kind: 'liked' }
  | { readonly kind: 'playlist'; readonly owner: string; readonly id: string };

const PLAYLIST_URL = /^https?:\/\/music\.yandex\.[a-z]+\/users\/([^/]+)\/playlists\/(\d+)/iu;

/**
 * Accepts a playlist URL, an "owner:id" pair, or one of the liked-tracks aliases.
 */
export const parsePlaylistReference = (input: string): PlaylistLocator | null => {
  const value = input.trim();
  if (LIKED_ALIASES.includes(value.toLowerCase())) {
    return { kind: 'liked' };
  }

  const match = PLAYLIST_URL.exec(value);
  if (match?.[1] && match[2]) {
    return { kind: 'playlist', owner: decodeURIComponent(match[1]), id: match[2] };
  }

  if (/^https?:\/\//iu.test(value)) {
    return null;
  }

  const parts = value.split(':');
  if (parts.length === 2 && parts[0] && parts[1]) {
    return { kind: 'playlist', owner: parts[0], id: parts[1] };
  }
  return null;
};

/**
 * Splits a list into consecutive slices of at most `size` entries.
 */
export const chunked = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;
