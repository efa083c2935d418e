import { createHash } from 'node:crypto';
import { z } from 'zod';
import {
  DownloadError,
  ForbiddenError,
  InvalidReferenceError,
  NotFoundError,
  PermanentRemoteError,
  TransientNetworkError,
  UnauthorizedError,
  classifyError,
  errorMessage,
} from './errors.js';
import { formatFromCodec } from './select.js';
import type { EncodingDescriptor, MusicApiClient, PlaylistInfo, TrackReference } from './types.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, TRACK_BATCH_SIZE, chunked, parsePlaylistReference } from './utils.js';

export const API_BASE_URL = 'https://api.music.yandex.net';

// Salt the storage hosts expect when signing a direct download link.
const SIGN_SALT = 'XGRlBW9FXlekgbPrRHuSiA';

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept-Language': 'en',
};

const envelope = <T extends z.ZodTypeAny>(result: T) => z.object({ result });

const trackSchema = z.object({
  id: z.union([z.string(), z.number()]),
  title: z.string().nullish(),
  artists: z.array(z.object({ name: z.string().nullish() })).nullish(),
  albums: z.array(z.object({ title: z.string().nullish() })).nullish(),
  durationMs: z.number().nullish(),
});

const accountSchema = envelope(
  z.object({
    account: z.object({
      uid: z.number().nullish(),
      login: z.string().nullish(),
      displayName: z.string().nullish(),
    }),
  }),
);

const playlistSchema = envelope(
  z.object({
    title: z.string().nullish(),
    tracks: z
      .array(
        z.object({
          id: z.union([z.string(), z.number()]),
          track: trackSchema.nullish(),
        }),
      )
      .nullish(),
  }),
);

const likesSchema = envelope(
  z.object({
    library: z.object({
      tracks: z.array(z.object({ id: z.union([z.string(), z.number()]) })).nullish(),
    }),
  }),
);

const tracksSchema = envelope(z.array(trackSchema));

const downloadInfoSchema = envelope(
  z.array(
    z.object({
      codec: z.string(),
      bitrateInKbps: z.number().nullish(),
      downloadInfoUrl: z.string(),
      preview: z.boolean().nullish(),
    }),
  ),
);

type RawTrack = z.infer<typeof trackSchema>;

export interface AccountInfo {
  readonly uid: string | null;
  readonly displayName: string;
}

export interface MusicServiceClientOptions {
  readonly token?: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly downloadTimeoutMs?: number;
  readonly onWarning?: (message: string) => void;
}

/**
 * Maps an unsuccessful HTTP status onto the download error taxonomy.
 */
export const errorForStatus = (status: number, context: string, retryAfter?: string | null): DownloadError => {
  const message = `${context} failed: HTTP ${status}`;
  if (status === 401) {
    return new UnauthorizedError(message);
  }
  if (status === 403) {
    return new ForbiddenError(message);
  }
  if (status === 404) {
    return new NotFoundError(message);
  }
  if (status === 429) {
    const seconds = Number.parseInt(retryAfter ?? '', 10);
    return new TransientNetworkError(message, Number.isNaN(seconds) ? undefined : seconds * 1000);
  }
  if (status === 408 || status >= 500) {
    return new TransientNetworkError(message);
  }
  return new PermanentRemoteError(message);
};

/**
 * Builds the signed direct link from the XML document a download-info URL returns.
 */
export const buildDirectLink = (xml: string): string => {
  const field = (name: string): string => {
    const match = new RegExp(`<${name}>([^<]*)</${name}>`, 'u').exec(xml);
    const value = match?.[1]?.trim();
    if (!value) {
      throw new PermanentRemoteError(`Download info is missing <${name}>`);
    }
    return value;
  };

  const host = field('host');
  const filePath = field('path');
  const ts = field('ts');
  const s = field('s');
  const sign = createHash('md5').update(`${SIGN_SALT}${filePath.slice(1)}${s}`).digest('hex');
  return `https://${host}/get-mp3/${sign}/${ts}${filePath}`;
};

const toTrackReference = (raw: RawTrack): TrackReference => {
  const artistNames = (raw.artists ?? [])
    .map((artist) => artist.name?.trim() ?? '')
    .filter((name) => name.length > 0);
  const album = raw.albums?.[0]?.title ?? undefined;

  return {
    id: String(raw.id),
    artist: artistNames.length > 0 ? artistNames.join(', ') : 'Unknown Artist',
    title: raw.title?.trim() || 'Unknown Title',
    album,
    durationSeconds: raw.durationMs ? Math.floor(raw.durationMs / 1000) : undefined,
  };
};

async function* readBody(body: NonNullable<Response['body']>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } catch (error) {
    finished = true;
    // Mid-transfer failures count as network failures.
    const classified = classifyError(error);
    throw classified.kind === 'permanent-remote' ? new TransientNetworkError(classified.message) : classified;
  } finally {
    if (!finished) {
      // The consumer stopped early; release the connection.
      try {
        await reader.cancel();
      } catch (error) {
        console.warn(`Could not cancel audio download: ${errorMessage(error)}`);
      }
    }
    reader.releaseLock();
  }
}

/**
 * HTTP client for the music catalog. Every method performs plain requests without retrying;
 * retry policy belongs to the caller.
 */
export class MusicServiceClient implements MusicApiClient {
  private readonly token?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly onWarning: (message: string) => void;

  constructor(options: MusicServiceClientOptions = {}) {
    this.token = options.token?.trim() || undefined;
    this.baseUrl = options.baseUrl ?? API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? this.timeoutMs * 10;
    this.onWarning = options.onWarning ?? ((message) => console.warn(message));
  }

  get authenticated(): boolean {
    return this.token !== undefined;
  }

  private headers(): Record<string, string> {
    return this.token ? { ...REQUEST_HEADERS, Authorization: `OAuth ${this.token}` } : { ...REQUEST_HEADERS };
  }

  private async request(url: string, context: string, init: RequestInit = {}, timeoutMs = this.timeoutMs): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        headers: this.headers(),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw classifyError(error);
    }

    if (!response.ok) {
      throw errorForStatus(response.status, context, response.headers.get('Retry-After'));
    }
    return response;
  }

  private async getJson<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    context: string,
    init: RequestInit = {},
  ): Promise<T> {
    const response = await this.request(`${this.baseUrl}${path}`, context, init);
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new PermanentRemoteError(`${context} returned invalid JSON: ${errorMessage(error)}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentRemoteError(`${context} returned an unexpected payload: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async describeAccount(): Promise<AccountInfo> {
    const { result } = await this.getJson('/account/status', accountSchema, 'Account status');
    const { uid, login, displayName } = result.account;
    return {
      uid: typeof uid === 'number' ? String(uid) : null,
      displayName: displayName || login || 'anonymous',
    };
  }

  async resolvePlaylist(reference: string): Promise<PlaylistInfo> {
    const locator = parsePlaylistReference(reference);
    if (!locator) {
      throw new InvalidReferenceError(reference);
    }

    if (locator.kind === 'liked') {
      if (!this.authenticated) {
        throw new UnauthorizedError('A token is required to read liked tracks');
      }
      const account = await this.describeAccount();
      if (!account.uid) {
        throw new UnauthorizedError('Account has no user id; the token is not valid');
      }
      const { result } = await this.getJson(
        `/users/${encodeURIComponent(account.uid)}/likes/tracks`,
        likesSchema,
        'Liked tracks',
      );
      const ids = (result.library.tracks ?? []).map((entry) => String(entry.id));
      return { owner: account.uid, id: 'liked', title: 'Liked Tracks', tracks: await this.fetchTracks(ids) };
    }

    const { result } = await this.getJson(
      `/users/${encodeURIComponent(locator.owner)}/playlists/${encodeURIComponent(locator.id)}`,
      playlistSchema,
      `Playlist ${locator.owner}:${locator.id}`,
    );

    const entries = result.tracks ?? [];
    const missing = entries.filter((entry) => !entry.track).map((entry) => String(entry.id));
    const fetched = new Map((await this.fetchTracks(missing)).map((track) => [track.id, track]));

    const tracks: TrackReference[] = [];
    for (const entry of entries) {
      const track = entry.track ? toTrackReference(entry.track) : fetched.get(String(entry.id));
      if (track) {
        tracks.push(track);
      }
    }

    return {
      owner: locator.owner,
      id: locator.id,
      title: result.title?.trim() || `Playlist ${locator.id}`,
      tracks,
    };
  }

  /**
   * Loads track details in batches; a failed batch is retried one track at a time and
   * tracks that still fail are left out.
   */
  async fetchTracks(ids: readonly string[]): Promise<TrackReference[]> {
    const tracks: TrackReference[] = [];

    for (const batch of chunked(ids, TRACK_BATCH_SIZE)) {
      try {
        tracks.push(...(await this.loadTracks(batch)));
      } catch (error) {
        if (error instanceof UnauthorizedError || error instanceof ForbiddenError) {
          throw error;
        }
        this.onWarning(`Track batch failed (${errorMessage(error)}), loading ${batch.length} tracks one by one`);
        for (const id of batch) {
          try {
            tracks.push(...(await this.loadTracks([id])));
          } catch (single) {
            this.onWarning(`Skipping track ${id}: ${errorMessage(single)}`);
          }
        }
      }
    }

    return tracks;
  }

  private async loadTracks(ids: readonly string[]): Promise<TrackReference[]> {
    const { result } = await this.getJson('/tracks', tracksSchema, 'Track details', {
      method: 'POST',
      body: new URLSearchParams({ 'track-ids': ids.join(',') }),
    });
    return result.map(toTrackReference);
  }

  async getEncodings(track: TrackReference): Promise<EncodingDescriptor[]> {
    const { result } = await this.getJson(
      `/tracks/${encodeURIComponent(track.id)}/download-info`,
      downloadInfoSchema,
      `Download info for track ${track.id}`,
    );

    return result
      .filter((info) => !info.preview)
      .map((info) => ({
        format: formatFromCodec(info.codec),
        codec: info.codec,
        bitrate: info.bitrateInKbps ?? undefined,
        handle: info.downloadInfoUrl,
      }));
  }

  async fetchBytes(handle: string): Promise<AsyncIterable<Uint8Array>> {
    const infoResponse = await this.request(handle, 'Download link');
    const directLink = buildDirectLink(await infoResponse.text());

    const response = await this.request(directLink, 'Audio download', {}, this.downloadTimeoutMs);
    if (!response.body) {
      throw new PermanentRemoteError('Audio download returned an empty body');
    }
    return readBody(response.body);
  }
}
