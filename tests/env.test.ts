import { describe, expect, it } from 'vitest';
import { parseEnv } from '../src/env.js';

describe('parseEnv', () => {
  it('applies defaults when nothing is set', () => {
    expect(parseEnv({})).toEqual({
      ok: true,
      env: {
        YANDEX_MUSIC_TOKEN: undefined,
        DOWNLOAD_FORMAT: 'mp3',
        DOWNLOAD_DIR: 'downloads',
        DOWNLOAD_DELAY_MS: 500,
        DOWNLOAD_MAX_RETRIES: 3,
        DOWNLOAD_TIMEOUT_MS: 30_000,
      },
    });
  });

  it('reads format aliases and numeric settings', () => {
    const result = parseEnv({
      YANDEX_MUSIC_TOKEN: ' test-token ',
      DOWNLOAD_FORMAT: 'Lossless',
      DOWNLOAD_DELAY_MS: '1200',
      DOWNLOAD_MAX_RETRIES: '0',
    });

    expect(result).toMatchObject({
      ok: true,
      env: { YANDEX_MUSIC_TOKEN: 'test-token', DOWNLOAD_FORMAT: 'flac', DOWNLOAD_DELAY_MS: 1200, DOWNLOAD_MAX_RETRIES: 0 },
    });
  });

  it('lists every invalid variable', () => {
    const result = parseEnv({ DOWNLOAD_FORMAT: 'wav', DOWNLOAD_MAX_RETRIES: '-1' });

    expect(result).toEqual({
      ok: false,
      problems: ['DOWNLOAD_FORMAT: must be one of flac, mp3, aac, other', 'DOWNLOAD_MAX_RETRIES: must be a whole number'],
    });
  });

  it('rejects a zero request timeout', () => {
    const result = parseEnv({ DOWNLOAD_TIMEOUT_MS: '0' });

    expect(result.ok).toBe(false);
  });
});
