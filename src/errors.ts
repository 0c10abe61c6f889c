/**
 * Errors raised at the file-location boundary.
 *
 * These propagate out of a direct single-file scan. Batch scans and the
 * analyzers themselves turn them into error records instead.
 */

/**
 * The path does not exist (or, for sample lookups, exists in neither place)
 */
export class FileNotFoundError extends Error {
  constructor(public readonly filePath: string, message = `File not found: ${filePath}`) {
    super(message);
    this.name = 'FileNotFoundError';
  }
}

/**
 * The path exists but is not a regular file (or, for a directory scan, not a directory)
 */
export class NotAFileError extends Error {
  constructor(public readonly filePath: string, message = `Path is not a file: ${filePath}`) {
    super(message);
    this.name = 'NotAFileError';
  }
}

export class UnsupportedFileTypeError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly fileType: string
  ) {
    super(`No analyzer found for file type: ${fileType || '(none)'}`);
    this.name = 'UnsupportedFileTypeError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
