#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import cliProgress from 'cli-progress';
import { MusicServiceClient } from './api.js';
import { runBatch } from './batch.js';
import { type Env, loadEnv } from './env.js';
import { errorMessage } from './errors.js';
import { withRetry } from './retry.js';
import { parseFormatTag } from './select.js';
import type { BatchSummary, DownloadOutcome, FormatTag, PlaylistInfo } from './types.js';
import { parsePlaylistReference, truncateTitle } from './utils.js';

const VERSION = '1.0.0';

interface CliConfig {
  readonly reference?: string;
  readonly token?: string;
  readonly outputDir: string;
  readonly format: FormatTag;
  readonly delayMs: number;
  readonly maxRetries: number;
  readonly timeoutMs: number;
  readonly trackIds?: readonly string[];
  readonly listOnly: boolean;
}

/**
 * Parses a non-negative integer flag value, keeping the fallback when it does not parse.
 */
const parseCount = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
};

/**
 * Parses incoming CLI arguments on top of the environment defaults.
 */
const parseArgs = (argv: string[], env: Env): CliConfig => {
  let reference: string | undefined;
  let token = env.YANDEX_MUSIC_TOKEN;
  let outputDir = env.DOWNLOAD_DIR;
  let format: FormatTag = env.DOWNLOAD_FORMAT;
  let delayMs = env.DOWNLOAD_DELAY_MS;
  let maxRetries = env.DOWNLOAD_MAX_RETRIES;
  let trackIds: string[] | undefined;
  let listOnly = false;

  const args = [...argv];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? '';
    const next = args[i + 1];
    switch (arg) {
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;
      case '--version':
        console.log(`Playlist downloader ${VERSION}`);
        process.exit(0);
        break;
      case '--token':
      case '-t':
        if (next) {
          token = next;
          i += 1;
        }
        break;
      case '--output':
      case '-o':
        if (next) {
          outputDir = next;
          i += 1;
        }
        break;
      case '--format':
      case '-f': {
        const parsed = next ? parseFormatTag(next) : null;
        if (!parsed) {
          console.error(`Unknown format "${next ?? ''}". Use flac, mp3, aac or other.`);
          process.exit(1);
        }
        format = parsed;
        i += 1;
        break;
      }
      case '--delay':
        delayMs = parseCount(next, delayMs);
        i += 1;
        break;
      case '--retries':
        maxRetries = parseCount(next, maxRetries);
        i += 1;
        break;
      case '--tracks':
        if (next) {
          trackIds = next
            .split(',')
            .map((id) => id.trim())
            .filter((id) => id.length > 0);
          i += 1;
        }
        break;
      case '--list':
        listOnly = true;
        break;
      default:
        if (!reference && !arg.startsWith('-')) {
          reference = arg;
        }
        break;
    }
  }

  return {
    reference,
    token: token || undefined,
    outputDir: path.resolve(process.cwd(), outputDir),
    format,
    delayMs,
    maxRetries,
    timeoutMs: env.DOWNLOAD_TIMEOUT_MS,
    trackIds,
    listOnly,
  };
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
const printHelp = (): void => {
  console.log('\nPlaylist downloader\n');
  console.log('Usage:');
  console.log('  tsx src/index.ts <playlist>               # Download a playlist');
  console.log('  tsx src/index.ts owner:123 -f flac        # Prefer lossless files');
  console.log('  tsx src/index.ts liked --token <token>    # Download your liked tracks');
  console.log('  tsx src/index.ts <playlist> --list        # Show the tracks without downloading');
  console.log('\nPlaylist: https://music.yandex.ru/users/<owner>/playlists/<id>, owner:id, or "liked"');
  console.log('\nOptions:');
  console.log('  -t, --token <token>      OAuth token (or YANDEX_MUSIC_TOKEN)');
  console.log('  -o, --output <dir>       Output directory (default downloads)');
  console.log('  -f, --format <format>    Preferred format: flac, mp3, aac, other (default mp3)');
  console.log('      --delay <ms>         Minimum pause between tracks (default 500)');
  console.log('      --retries <n>        Retries for transient network errors (default 3)');
  console.log('      --tracks <id,id>     Only download the listed track ids');
  console.log('      --list               Print the playlist and exit');
  console.log('      --version            Print the version');
  console.log('  -h, --help               Show this help message');
};

/**
 * Prompts the user for a playlist reference when none was passed on the command line.
 */
const promptForReference = async (): Promise<string> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    for (;;) {
      const answer = await rl.question('Enter a playlist URL, owner:id, or "liked": ');
      const normalized = answer.trim();
      if (normalized && parsePlaylistReference(normalized)) {
        return normalized;
      }
      console.log('Please provide a valid playlist reference.');
    }
  } finally {
    rl.close();
  }
};

const formatDuration = (seconds?: number): string =>
  seconds === undefined ? '' : `${Math.floor(seconds / 60)}:${String(seconds % 60).padStart(2, '0')}`;

/**
 * Prints the tracks of a playlist without downloading anything.
 */
const printPlaylist = (playlist: PlaylistInfo): void => {
  console.log(`\n${playlist.title} (${playlist.tracks.length} tracks)`);
  console.table(
    playlist.tracks.map((track, index) => ({
      '#': index + 1,
      ID: track.id,
      Artist: track.artist,
      Title: track.title,
      Duration: formatDuration(track.durationSeconds),
    })),
  );
};

const outcomeDetail = (outcome: DownloadOutcome): string => {
  switch (outcome.status) {
    case 'succeeded':
      return outcome.path;
    case 'skipped':
      return outcome.reason;
    case 'failed':
      return `${outcome.kind}: ${outcome.message}`;
  }
};

/**
 * Summarizes overall processing results at the end of the execution.
 */
const printSummary = (summary: BatchSummary): void => {
  if (summary.error) {
    console.error(`\nCould not load playlist (${summary.error.kind}): ${summary.error.message}`);
    return;
  }

  console.log('\nDownload summary');
  console.table(
    summary.outcomes.map((outcome) => ({
      '#': outcome.index + 1,
      Track: `${outcome.track.artist} - ${outcome.track.title}`,
      Status: outcome.status,
      Detail: outcomeDetail(outcome),
    })),
  );
  const { succeeded, skipped, failed } = summary.counts;
  console.log(
    `Totals => processed: ${summary.outcomes.length}, succeeded: ${succeeded}, skipped: ${skipped}, failed: ${failed}`,
  );
};

/**
 * Entry point: resolves configuration, checks the account, then runs one download batch.
 */
const main = async (): Promise<void> => {
  const config = parseArgs(process.argv.slice(2), loadEnv());
  const reference = config.reference ?? (await promptForReference());
  const client = new MusicServiceClient({ token: config.token, timeoutMs: config.timeoutMs });

  if (client.authenticated) {
    try {
      const account = await client.describeAccount();
      console.log(`Authenticated as: ${account.displayName}`);
    } catch (error) {
      console.warn(`Account check failed: ${errorMessage(error)}`);
    }
  } else {
    console.log('No token provided; only public playlists are available.');
    console.log('Tip: set YANDEX_MUSIC_TOKEN or pass --token.');
  }

  if (config.listOnly) {
    const resolved = await withRetry(() => client.resolvePlaylist(reference), { maxRetries: config.maxRetries });
    if (!resolved.ok) {
      console.error(`Could not load playlist (${resolved.kind}): ${resolved.message}`);
      process.exitCode = 1;
      return;
    }
    printPlaylist(resolved.value);
    return;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nStopping after the current track (press Ctrl+C again to quit now)...');
    controller.abort();
  });

  const bar = new cliProgress.SingleBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {value}/{total} | {title}',
    },
    cliProgress.Presets.shades_grey,
  );

  let barStarted = false;
  console.log(`Saving to: ${config.outputDir}`);
  const summary = await runBatch(
    client,
    {
      reference,
      outputDirectory: config.outputDir,
      preference: { preferred: config.format },
      trackIds: config.trackIds,
      signal: controller.signal,
    },
    { intervalMs: config.delayMs, retry: { maxRetries: config.maxRetries } },
    {
      onPlaylist: (playlist, total) => {
        console.log(`Found playlist: ${playlist.title} (${total} tracks)`);
        bar.start(total, 0, { title: '' });
        barStarted = true;
      },
      onTrackStart: (_index, _total, track) => {
        bar.update({ title: truncateTitle(`${track.artist} - ${track.title}`) });
      },
      onOutcome: ({ outcome }) => {
        bar.increment(1, { title: truncateTitle(`${outcome.track.artist} - ${outcome.track.title}`) });
      },
    },
  );

  if (barStarted) {
    bar.stop();
  }
  process.stdout.write('\n');
  printSummary(summary);

  if (summary.error) {
    process.exitCode = 1;
  }
};

void main().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
