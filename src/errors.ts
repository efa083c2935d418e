import type { ErrorKind } from './types.js';

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

export class InvalidReferenceError extends DownloadError {
  constructor(reference: string) {
    super(`Invalid playlist URL or ID: ${reference}`, 'invalid-reference', false);
    this.name = 'InvalidReferenceError';
  }
}

export class UnauthorizedError extends DownloadError {
  constructor(message = 'Token is missing, invalid or expired') {
    super(message, 'unauthorized', false);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends DownloadError {
  constructor(message = 'Resource not found') {
    super(message, 'not-found', false);
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends DownloadError {
  constructor(message = 'Access denied') {
    super(message, 'forbidden', false);
    this.name = 'ForbiddenError';
  }
}

export class TransientNetworkError extends DownloadError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message, 'transient-network', true);
    this.name = 'TransientNetworkError';
  }
}

export class PermanentRemoteError extends DownloadError {
  constructor(message: string) {
    super(message, 'permanent-remote', false);
    this.name = 'PermanentRemoteError';
  }
}

export class FilesystemError extends DownloadError {
  constructor(message: string) {
    super(message, 'filesystem', false);
    this.name = 'FilesystemError';
  }
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED', 'EPIPE', 'UND_ERR_SOCKET']);
const FILESYSTEM_CODES = new Set(['EACCES', 'EPERM', 'ENOSPC', 'EROFS', 'EISDIR', 'ENOTDIR', 'EMFILE', 'EEXIST', 'EDQUOT']);

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
};

/**
 * Maps anything thrown by a network or filesystem operation onto the download error taxonomy.
 */
export const classifyError = (error: unknown): DownloadError => {
  if (error instanceof DownloadError) {
    return error;
  }

  const message = errorMessage(error);
  const code = errorCode(error) ?? errorCode(error instanceof Error ? error.cause : undefined);

  if (code && FILESYSTEM_CODES.has(code)) {
    return new FilesystemError(message);
  }
  if (code && TRANSIENT_CODES.has(code)) {
    return new TransientNetworkError(message);
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TransientNetworkError(message);
  }
  if (error instanceof TypeError && /fetch failed/i.test(message)) {
    return new TransientNetworkError(message);
  }
  return new PermanentRemoteError(message);
};
