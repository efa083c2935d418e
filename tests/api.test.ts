import { createHash } from 'node:crypto';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MusicServiceClient, buildDirectLink, errorForStatus } from '../src/api.js';
import {
  ForbiddenError,
  InvalidReferenceError,
  NotFoundError,
  PermanentRemoteError,
  TransientNetworkError,
  UnauthorizedError,
} from '../src/errors.js';
import { track } from './fakes.js';

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const DOWNLOAD_INFO_XML =
  '<?xml version="1.0" encoding="utf-8"?><download-info><host>storage.example</host>' +
  '<path>/music/track.mp3</path><ts>00abc</ts><region>-1</region><s>secret-s</s></download-info>';

describe('errorForStatus', () => {
  it('maps statuses onto error kinds', () => {
    expect(errorForStatus(401, 'Playlist a:1')).toBeInstanceOf(UnauthorizedError);
    expect(errorForStatus(403, 'Playlist a:1')).toBeInstanceOf(ForbiddenError);
    expect(errorForStatus(404, 'Playlist a:1')).toBeInstanceOf(NotFoundError);
    expect(errorForStatus(503, 'Playlist a:1').kind).toBe('transient-network');
    expect(errorForStatus(408, 'Playlist a:1').kind).toBe('transient-network');
    expect(errorForStatus(400, 'Playlist a:1').kind).toBe('permanent-remote');
  });

  it('names the failed request and status', () => {
    expect(errorForStatus(400, 'Playlist a:1').message).toBe('Playlist a:1 failed: HTTP 400');
  });

  it('honours Retry-After on rate limiting', () => {
    const limited = errorForStatus(429, 'Track details', '7');

    expect(limited).toBeInstanceOf(TransientNetworkError);
    expect(limited instanceof TransientNetworkError && limited.retryAfterMs).toBe(7000);
  });
});

describe('buildDirectLink', () => {
  it('signs the storage path', () => {
    const sign = createHash('md5').update('XGRlBW9FXlekgbPrRHuSiAmusic/track.mp3secret-s').digest('hex');

    expect(buildDirectLink(DOWNLOAD_INFO_XML)).toBe(`https://storage.example/get-mp3/${sign}/00abc/music/track.mp3`);
  });

  it('rejects documents without a signature', () => {
    expect(() => buildDirectLink('<download-info><host>h</host><path>/p</path><ts>1</ts></download-info>')).toThrow(
      new PermanentRemoteError('Download info is missing <s>'),
    );
  });
});

describe('MusicServiceClient', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const warnings: string[] = [];
  const client = (token?: string) =>
    new MusicServiceClient({ token, onWarning: (message) => void warnings.push(message) });

  const calledUrl = (call: number): string => String(fetchMock.mock.calls[call]?.[0]);
  const calledInit = (call: number): RequestInit | undefined => fetchMock.mock.calls[call]?.[1];

  beforeEach(() => {
    warnings.length = 0;
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('resolvePlaylist', () => {
    it('rejects malformed references without any request', async () => {
      await expect(client().resolvePlaylist('not a playlist')).rejects.toBeInstanceOf(InvalidReferenceError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('combines embedded tracks with tracks loaded separately', async () => {
      fetchMock
        .mockResolvedValueOnce(
          json({
            result: {
              title: 'Evening Mix',
              tracks: [
                {
                  id: 1,
                  track: {
                    id: 1,
                    title: 'One',
                    artists: [{ name: 'Alpha' }, { name: 'Beta' }],
                    albums: [{ title: 'First Album' }],
                    durationMs: 185_500,
                  },
                },
                { id: 2 },
              ],
            },
          }),
        )
        .mockResolvedValueOnce(json({ result: [{ id: 2, title: 'Two', artists: [] }] }));

      const playlist = await client().resolvePlaylist('owner:7');

      expect(playlist).toEqual({
        owner: 'owner',
        id: '7',
        title: 'Evening Mix',
        tracks: [
          { id: '1', artist: 'Alpha, Beta', title: 'One', album: 'First Album', durationSeconds: 185 },
          { id: '2', artist: 'Unknown Artist', title: 'Two', album: undefined, durationSeconds: undefined },
        ],
      });
      expect(calledUrl(0)).toBe('https://api.music.yandex.net/users/owner/playlists/7');
      expect(calledUrl(1)).toBe('https://api.music.yandex.net/tracks');
      expect(calledInit(1)?.method).toBe('POST');
      expect(String(calledInit(1)?.body)).toBe('track-ids=2');
    });

    it('accepts playlist URLs and falls back to a generated title', async () => {
      fetchMock.mockResolvedValueOnce(json({ result: { tracks: [] } }));

      const playlist = await client().resolvePlaylist('https://music.yandex.ru/users/someone/playlists/3');

      expect(playlist).toEqual({ owner: 'someone', id: '3', title: 'Playlist 3', tracks: [] });
    });

    it('reports forbidden playlists', async () => {
      fetchMock.mockResolvedValueOnce(json({ error: 'forbidden' }, 403));

      await expect(client().resolvePlaylist('owner:7')).rejects.toEqual(
        new ForbiddenError('Playlist owner:7 failed: HTTP 403'),
      );
    });

    it('needs a token for liked tracks', async () => {
      await expect(client().resolvePlaylist('liked')).rejects.toBeInstanceOf(UnauthorizedError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('loads liked tracks of the token owner', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ result: { account: { uid: 42, login: 'listener' } } }))
        .mockResolvedValueOnce(json({ result: { library: { tracks: [{ id: '5' }] } } }))
        .mockResolvedValueOnce(json({ result: [{ id: 5, title: 'Five', artists: [{ name: 'Gamma' }] }] }));

      const playlist = await client('test-token').resolvePlaylist('Favorites');

      expect(playlist.owner).toBe('42');
      expect(playlist.id).toBe('liked');
      expect(playlist.title).toBe('Liked Tracks');
      expect(playlist.tracks.map((entry) => `${entry.artist} - ${entry.title}`)).toEqual(['Gamma - Five']);
      expect(calledUrl(1)).toBe('https://api.music.yandex.net/users/42/likes/tracks');
    });

    it('rejects unexpected payloads as permanent', async () => {
      fetchMock.mockResolvedValueOnce(json({ result: { tracks: 'nope' } }));

      await expect(client().resolvePlaylist('owner:7')).rejects.toBeInstanceOf(PermanentRemoteError);
    });

    it('treats connection failures as transient', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client().resolvePlaylist('owner:7')).rejects.toBeInstanceOf(TransientNetworkError);
    });
  });

  describe('fetchTracks', () => {
    it('falls back to single requests when a batch fails', async () => {
      fetchMock
        .mockResolvedValueOnce(json({}, 500))
        .mockResolvedValueOnce(json({ result: [{ id: 'a', title: 'Kept' }] }))
        .mockResolvedValueOnce(json({}, 404));

      const tracks = await client().fetchTracks(['a', 'b']);

      expect(tracks.map((entry) => entry.id)).toEqual(['a']);
      expect(warnings).toEqual([
        'Track batch failed (Track details failed: HTTP 500), loading 2 tracks one by one',
        'Skipping track b: Track details failed: HTTP 404',
      ]);
    });

    it('does not hide authorization failures', async () => {
      fetchMock.mockResolvedValueOnce(json({}, 401));

      await expect(client().fetchTracks(['a'])).rejects.toBeInstanceOf(UnauthorizedError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('getEncodings', () => {
    it('lists full-length encodings and sends the token', async () => {
      fetchMock.mockResolvedValueOnce(
        json({
          result: [
            { codec: 'mp3', bitrateInKbps: 320, downloadInfoUrl: 'https://info.example/320' },
            { codec: 'mp3', bitrateInKbps: 128, downloadInfoUrl: 'https://info.example/preview', preview: true },
            { codec: 'aac', bitrateInKbps: 64, downloadInfoUrl: 'https://info.example/aac' },
          ],
        }),
      );

      const encodings = await client('test-token').getEncodings(track('9', 'Artist', 'Title'));

      expect(encodings).toEqual([
        { format: 'mp3', codec: 'mp3', bitrate: 320, handle: 'https://info.example/320' },
        { format: 'aac', codec: 'aac', bitrate: 64, handle: 'https://info.example/aac' },
      ]);
      expect(calledUrl(0)).toBe('https://api.music.yandex.net/tracks/9/download-info');
      expect(calledInit(0)?.headers).toMatchObject({ Authorization: 'OAuth test-token' });
    });

    it('omits the authorization header without a token', async () => {
      fetchMock.mockResolvedValueOnce(json({ result: [] }));

      await client().getEncodings(track('9', 'Artist', 'Title'));

      expect(calledInit(0)?.headers).not.toHaveProperty('Authorization');
    });
  });

  describe('fetchBytes', () => {
    it('resolves the direct link and streams the audio', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response(DOWNLOAD_INFO_XML))
        .mockResolvedValueOnce(new Response('audio-bytes'));

      const chunks: Uint8Array[] = [];
      for await (const chunk of await client('test-token').fetchBytes('https://info.example/320')) {
        chunks.push(chunk);
      }

      expect(Buffer.concat(chunks).toString('utf-8')).toBe('audio-bytes');
      expect(calledUrl(0)).toBe('https://info.example/320');
      expect(calledUrl(1)).toBe(buildDirectLink(DOWNLOAD_INFO_XML));
    });

    it('cancels the transfer when the reader stops early', async () => {
      let cancelled = false;
      const body = new ReadableStream<Uint8Array>({
        pull: (controller) => controller.enqueue(new TextEncoder().encode('chunk')),
        cancel: () => {
          cancelled = true;
        },
      });
      fetchMock.mockResolvedValueOnce(new Response(DOWNLOAD_INFO_XML)).mockResolvedValueOnce(new Response(body));

      const sizes: number[] = [];
      for await (const chunk of await client().fetchBytes('https://info.example/320')) {
        sizes.push(chunk.byteLength);
        break;
      }

      expect(sizes).toEqual([5]);
      expect(cancelled).toBe(true);
    });

    it('reports a connection lost mid-transfer as transient', async () => {
      let sent = false;
      const body = new ReadableStream<Uint8Array>({
        pull: (controller) => {
          if (sent) {
            controller.error(new Error('connection lost'));
            return;
          }
          sent = true;
          controller.enqueue(new TextEncoder().encode('partial'));
        },
      });
      fetchMock.mockResolvedValueOnce(new Response(DOWNLOAD_INFO_XML)).mockResolvedValueOnce(new Response(body));

      const received: Uint8Array[] = [];
      const drain = async (): Promise<void> => {
        for await (const chunk of await client().fetchBytes('https://info.example/320')) {
          received.push(chunk);
        }
      };

      await expect(drain()).rejects.toMatchObject({ kind: 'transient-network', message: 'connection lost' });
      expect(received).toHaveLength(1);
    });

    it('reports a missing file as not found', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response(DOWNLOAD_INFO_XML))
        .mockResolvedValueOnce(new Response('', { status: 404 }));

      await expect(client().fetchBytes('https://info.example/320')).rejects.toEqual(
        new NotFoundError('Audio download failed: HTTP 404'),
      );
    });
  });

  describe('describeAccount', () => {
    it('prefers the display name and falls back to the login', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ result: { account: { uid: 1, login: 'listener', displayName: 'Listener One' } } }))
        .mockResolvedValueOnce(json({ result: { account: { login: 'listener' } } }));

      await expect(client('test-token').describeAccount()).resolves.toEqual({ uid: '1', displayName: 'Listener One' });
      await expect(client('test-token').describeAccount()).resolves.toEqual({ uid: null, displayName: 'listener' });
    });
  });
});
