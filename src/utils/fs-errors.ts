/**
 * Helpers for classifying file-system errors
 */

/**
 * True for fs errors raised because a path does not exist
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Message of an unknown thrown value, for logs
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
