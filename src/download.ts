import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import fs from 'fs-extra';
import { FilesystemError, errorMessage } from './errors.js';
import { PARTIAL_SUFFIX } from './utils.js';

/**
 * Removes a partial file, reporting (not throwing) if that fails.
 */
const discardPartial = async (tempPath: string): Promise<void> => {
  try {
    await fs.remove(tempPath);
  } catch (error) {
    console.warn(`Could not remove partial file ${tempPath}: ${errorMessage(error)}`);
  }
};

const asFilesystemError = (error: unknown, action: string): FilesystemError =>
  new FilesystemError(`${action}: ${errorMessage(error)}`);

/**
 * Streams audio bytes into `targetPath` through a `.part` file and returns the byte count.
 * Errors raised by the byte source propagate unchanged; local write failures become FilesystemError.
 */
export const writeTrackFile = async (chunks: AsyncIterable<Uint8Array>, targetPath: string): Promise<number> => {
  const tempPath = `${targetPath}${PARTIAL_SUFFIX}`;

  try {
    await fs.ensureDir(path.dirname(targetPath));
    await fs.remove(tempPath);
  } catch (error) {
    throw asFilesystemError(error, `Cannot prepare ${path.dirname(targetPath)}`);
  }

  let bytes = 0;
  let sourceFailed = false;
  let sourceError: unknown;

  async function* counted(): AsyncGenerator<Uint8Array> {
    try {
      for await (const chunk of chunks) {
        bytes += chunk.byteLength;
        yield chunk;
      }
    } catch (error) {
      sourceFailed = true;
      sourceError = error;
      throw error;
    }
  }

  try {
    await pipeline(counted(), fs.createWriteStream(tempPath));
  } catch (error) {
    await discardPartial(tempPath);
    if (sourceFailed) {
      throw sourceError;
    }
    throw asFilesystemError(error, `Cannot write ${tempPath}`);
  }

  try {
    await fs.move(tempPath, targetPath, { overwrite: true });
  } catch (error) {
    await discardPartial(tempPath);
    throw asFilesystemError(error, `Cannot move file into ${targetPath}`);
  }

  return bytes;
};
