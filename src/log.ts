import path from 'node:path';
import fs from 'fs-extra';
import { errorMessage } from './errors.js';
import type { TrackReference } from './types.js';

export type LogEventKind = 'RUN' | 'FETCH' | 'RETRY' | 'SKIP' | 'SUCCESS' | 'FAILURE' | 'SUMMARY';

export interface LogEvent {
  readonly kind: LogEventKind;
  readonly track?: TrackReference;
  readonly detail: string;
}

/**
 * Formats one event as a single log line, e.g.
 * `[2024-05-01T10:00:00.000Z] SKIP track=42 "Artist - Title" already-exists`.
 */
export const formatLogLine = (event: LogEvent, at: Date): string => {
  const identity = event.track ? ` track=${event.track.id} "${event.track.artist} - ${event.track.title}"` : '';
  return `[${at.toISOString()}] ${event.kind}${identity} ${event.detail}\n`;
};

export interface DownloadLog {
  readonly filePath: string;
  readonly write: (event: LogEvent) => Promise<void>;
}

/**
 * Append-only event log owned by a single batch run.
 */
export const createDownloadLog = (filePath: string, now: () => Date = () => new Date()): DownloadLog => {
  let warned = false;

  const write = async (event: LogEvent): Promise<void> => {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.appendFile(filePath, formatLogLine(event, now()));
    } catch (error) {
      // Losing a log line must not lose the track's outcome.
      if (!warned) {
        warned = true;
        console.warn(`Could not write to ${filePath}: ${errorMessage(error)}`);
      }
    }
  };

  return { filePath, write };
};
