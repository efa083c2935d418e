import path from 'node:path';
import { MusicServiceClient } from './api.js';
import { classifyError } from './errors.js';
import { type LogEvent, createDownloadLog } from './log.js';
import { createRateLimiter } from './rateLimiter.js';
import { type RetryPolicy, withRetry } from './retry.js';
import { DEFAULT_PREFERENCE, selectEncoding } from './select.js';
import { writeTrackFile } from './download.js';
import type {
  BatchError,
  BatchPhase,
  BatchProgress,
  BatchSummary,
  DownloadOutcome,
  DownloadPreference,
  MusicApiClient,
  OutcomeStatus,
  PlaylistInfo,
  SkipReason,
  TrackReference,
} from './types.js';
import { LOG_FILE_NAME, buildTrackPath, isAlreadyDownloaded } from './utils.js';

export interface BatchRequest {
  readonly reference: string;
  readonly outputDirectory: string;
  readonly preference?: DownloadPreference;
  /** Restricts the run to these track ids, keeping playlist order. */
  readonly trackIds?: readonly string[];
  /** Checked between tracks; tracks not started when it fires are recorded as cancelled. */
  readonly signal?: AbortSignal;
}

export interface BatchSettings {
  readonly intervalMs?: number;
  readonly retry?: Omit<RetryPolicy, 'onRetry'>;
  readonly logFile?: string;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
}

export interface BatchHooks {
  readonly onPhase?: (phase: BatchPhase) => void;
  readonly onPlaylist?: (playlist: PlaylistInfo, total: number) => void;
  readonly onTrackStart?: (index: number, total: number, track: TrackReference) => void;
  readonly onOutcome?: (progress: BatchProgress) => void;
}

const describeOutcome = (outcome: DownloadOutcome): LogEvent => {
  switch (outcome.status) {
    case 'succeeded':
      return {
        kind: 'SUCCESS',
        track: outcome.track,
        detail: `${outcome.path} (${outcome.format}${outcome.bitrate ? ` ${outcome.bitrate}kbps` : ''}, ${outcome.bytes} bytes)`,
      };
    case 'skipped':
      return { kind: 'SKIP', track: outcome.track, detail: outcome.reason };
    case 'failed':
      return { kind: 'FAILURE', track: outcome.track, detail: `${outcome.kind}: ${outcome.message}` };
  }
};

const countOutcomes = (outcomes: readonly DownloadOutcome[]): Record<OutcomeStatus, number> =>
  outcomes.reduce<Record<OutcomeStatus, number>>(
    (acc, outcome) => {
      acc[outcome.status] += 1;
      return acc;
    },
    { succeeded: 0, skipped: 0, failed: 0 },
  );

/**
 * Downloads every track of one playlist sequentially and returns the frozen run summary.
 * Per-track problems become outcomes; only a playlist that cannot be resolved ends the run early.
 */
export const runBatch = async (
  client: MusicApiClient,
  request: BatchRequest,
  settings: BatchSettings = {},
  hooks: BatchHooks = {},
): Promise<BatchSummary> => {
  const startedAt = new Date();
  const preference = request.preference ?? DEFAULT_PREFERENCE;
  const log = createDownloadLog(settings.logFile ?? path.resolve(request.outputDirectory, LOG_FILE_NAME));
  const limiter = createRateLimiter({ intervalMs: settings.intervalMs, sleep: settings.sleep, now: settings.now });

  let current: TrackReference | undefined;
  const retryPolicy: RetryPolicy = {
    sleep: settings.sleep,
    ...settings.retry,
    onRetry: ({ retry, delayMs, error }) =>
      log.write({
        kind: 'RETRY',
        track: current,
        detail: `retry ${retry} in ${delayMs}ms after ${error.kind}: ${error.message}`,
      }),
  };

  const enterPhase = (phase: BatchPhase): void => hooks.onPhase?.(phase);

  const finalize = async (
    outcomes: readonly DownloadOutcome[],
    playlist?: PlaylistInfo,
    error?: BatchError,
  ): Promise<BatchSummary> => {
    enterPhase('finalizing');
    const counts = countOutcomes(outcomes);
    const summary: BatchSummary = Object.freeze({
      reference: request.reference,
      playlist: playlist ? { owner: playlist.owner, id: playlist.id, title: playlist.title } : undefined,
      outcomes: Object.freeze([...outcomes]),
      counts: Object.freeze(counts),
      startedAt,
      finishedAt: new Date(),
      error,
    });
    await log.write({
      kind: 'SUMMARY',
      detail: error
        ? `aborted ${error.kind}: ${error.message}`
        : `succeeded=${counts.succeeded} skipped=${counts.skipped} failed=${counts.failed}`,
    });
    enterPhase('done');
    return summary;
  };

  const skipped = (index: number, track: TrackReference, reason: SkipReason, filePath?: string): DownloadOutcome => ({
    status: 'skipped',
    index,
    track,
    reason,
    path: filePath,
  });

  const processTrack = async (index: number, track: TrackReference): Promise<DownloadOutcome> => {
    await limiter.wait();
    current = track;

    let encodings = track.encodings;
    if (!encodings) {
      await log.write({ kind: 'FETCH', track, detail: 'encodings' });
      const fetched = await withRetry(() => client.getEncodings(track), retryPolicy);
      if (!fetched.ok) {
        return { status: 'failed', index, track, kind: fetched.kind, message: fetched.message };
      }
      encodings = fetched.value;
    }

    const chosen = selectEncoding(encodings, preference);
    if (!chosen) {
      return skipped(index, track, 'no-encodings-available');
    }

    const target = buildTrackPath(request.outputDirectory, track.artist, track.title, chosen);
    if (await isAlreadyDownloaded(target)) {
      return skipped(index, track, 'already-exists', target);
    }

    await log.write({
      kind: 'FETCH',
      track,
      detail: `${chosen.codec}${chosen.bitrate ? ` ${chosen.bitrate}kbps` : ''} -> ${target}`,
    });
    const written = await withRetry(
      async () => writeTrackFile(await client.fetchBytes(chosen.handle), target),
      retryPolicy,
    );
    if (!written.ok) {
      return { status: 'failed', index, track, kind: written.kind, message: written.message };
    }

    return {
      status: 'succeeded',
      index,
      track,
      path: target,
      bytes: written.value,
      format: chosen.format,
      bitrate: chosen.bitrate,
    };
  };

  enterPhase('pending');
  await log.write({
    kind: 'RUN',
    detail: `${request.reference} preferred=${preference.preferred} output=${request.outputDirectory}`,
  });

  enterPhase('fetching-metadata');
  const resolved = await withRetry(() => client.resolvePlaylist(request.reference), retryPolicy);
  if (!resolved.ok) {
    const error: BatchError = { kind: resolved.kind, message: resolved.message };
    await log.write({ kind: 'FAILURE', detail: `playlist ${request.reference} ${error.kind}: ${error.message}` });
    return finalize([], undefined, error);
  }

  const playlist = resolved.value;
  const selection = request.trackIds ? new Set(request.trackIds) : null;
  const tracks = selection ? playlist.tracks.filter((track) => selection.has(track.id)) : playlist.tracks;
  const total = tracks.length;
  hooks.onPlaylist?.(playlist, total);

  enterPhase('per-track-loop');
  const outcomes: DownloadOutcome[] = [];
  for (const [index, track] of tracks.entries()) {
    let outcome: DownloadOutcome;
    if (request.signal?.aborted) {
      outcome = skipped(index, track, 'cancelled');
    } else {
      hooks.onTrackStart?.(index, total, track);
      try {
        outcome = await processTrack(index, track);
      } catch (thrown) {
        const error = classifyError(thrown);
        outcome = { status: 'failed', index, track, kind: error.kind, message: error.message };
      }
    }

    outcomes.push(outcome);
    await log.write(describeOutcome(outcome));
    hooks.onOutcome?.({ index, total, outcome });
  }

  return finalize(outcomes, playlist);
};

export interface PlaylistDownloadRequest extends BatchRequest {
  readonly credential?: string;
  readonly timeoutMs?: number;
}

/**
 * Entry point for hosts: builds a catalog client from the credential and runs one batch.
 */
export const downloadPlaylist = async (
  request: PlaylistDownloadRequest,
  settings: BatchSettings = {},
  hooks: BatchHooks = {},
): Promise<BatchSummary> => {
  const client = new MusicServiceClient({ token: request.credential, timeoutMs: request.timeoutMs });
  return runBatch(client, request, settings, hooks);
};
