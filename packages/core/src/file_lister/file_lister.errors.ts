/**
 * Error codes for FileLister operations.
 */
export type FileListerErrorCode =
  | 'FILE_NOT_FOUND'
  | 'READ_ERROR'
  | 'PERMISSION_DENIED'
  | 'INVALID_PATH';

/**
 * Error thrown when a walk cannot start or its root cannot be read.
 */
export class FileListerError extends Error {
  constructor(
    message: string,
    public readonly code: FileListerErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'FileListerError';
  }
}

/**
 * Maps a Node.js errno error on `filePath` to a FileListerError.
 */
export function toFileListerError(error: unknown, filePath: string): FileListerError {
  if (error instanceof FileListerError) {
    return error;
  }
  const code = getErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code === 'ENOENT') {
    return new FileListerError(`Directory not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
  }
  if (code === 'ENOTDIR') {
    return new FileListerError(`Not a directory: ${filePath}`, 'INVALID_PATH', filePath);
  }
  return new FileListerError(`Read error: ${message}`, 'READ_ERROR', filePath);
}

function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
