export type FormatTag = 'flac' | 'mp3' | 'aac' | 'other';

export type ErrorKind =
  | 'invalid-reference'
  | 'unauthorized'
  | 'not-found'
  | 'forbidden'
  | 'transient-network'
  | 'permanent-remote'
  | 'filesystem'
  | 'exhausted-retries';

/**
 * One downloadable rendition of a track. A missing or zero bitrate means lossless or unknown.
 */
export interface EncodingDescriptor {
  readonly format: FormatTag;
  readonly codec: string;
  readonly bitrate?: number;
  readonly handle: string;
}

export interface TrackReference {
  readonly id: string;
  readonly artist: string;
  readonly title: string;
  readonly album?: string;
  readonly durationSeconds?: number;
  readonly encodings?: readonly EncodingDescriptor[];
}

export interface PlaylistInfo {
  readonly owner: string;
  readonly id: string;
  readonly title: string;
  readonly tracks: readonly TrackReference[];
}

export interface DownloadPreference {
  readonly preferred: FormatTag;
}

export type SkipReason = 'already-exists' | 'no-encodings-available' | 'cancelled';

interface OutcomeBase {
  readonly index: number;
  readonly track: TrackReference;
}

export interface SucceededOutcome extends OutcomeBase {
  readonly status: 'succeeded';
  readonly path: string;
  readonly bytes: number;
  readonly format: FormatTag;
  readonly bitrate?: number;
}

export interface SkippedOutcome extends OutcomeBase {
  readonly status: 'skipped';
  readonly reason: SkipReason;
  readonly path?: string;
}

export interface FailedOutcome extends OutcomeBase {
  readonly status: 'failed';
  readonly kind: ErrorKind;
  readonly message: string;
}

export type DownloadOutcome = SucceededOutcome | SkippedOutcome | FailedOutcome;

export type OutcomeStatus = DownloadOutcome['status'];

export interface BatchError {
  readonly kind: ErrorKind;
  readonly message: string;
}

export interface BatchSummary {
  readonly reference: string;
  readonly playlist?: Omit<PlaylistInfo, 'tracks'>;
  readonly outcomes: readonly DownloadOutcome[];
  readonly counts: Readonly<Record<OutcomeStatus, number>>;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly error?: BatchError;
}

export type BatchPhase = 'pending' | 'fetching-metadata' | 'per-track-loop' | 'finalizing' | 'done';

export interface BatchProgress {
  readonly index: number;
  readonly total: number;
  readonly outcome: DownloadOutcome;
}

/**
 * Remote catalog contract the orchestrator drives. Implementations throw `DownloadError`
 * subclasses (or raw network errors, which are classified on the way out).
 */
export interface MusicApiClient {
  resolvePlaylist(reference: string): Promise<PlaylistInfo>;
  getEncodings(track: TrackReference): Promise<readonly EncodingDescriptor[]>;
  fetchBytes(handle: string): Promise<AsyncIterable<Uint8Array>>;
}
