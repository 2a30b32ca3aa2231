/**
 * Video File Store
 *
 * Owns the app-private documents directory (permanent videos and thumbnails)
 * and the temp directory (capture, import and trim outputs). File names are
 * UUID-based so concurrent saves never collide.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logFileOperation } from '../utils/logger';
import { errorMessage, isFileNotFound } from '../utils/fs-errors';

export interface VideoFileStoreOptions {
  documentsDir: string;
  tempDir: string;
}

/**
 * Video File Store
 * Provides path allocation, copy and idempotent removal of clip files
 */
export class VideoFileStore {
  readonly documentsDir: string;
  readonly tempDir: string;

  constructor(options: VideoFileStoreOptions) {
    this.documentsDir = path.resolve(options.documentsDir);
    this.tempDir = path.resolve(options.tempDir);
  }

  /**
   * Create the documents and temp directories if missing
   */
  async ensureDirectories(): Promise<void> {
    await fs.mkdir(this.documentsDir, { recursive: true });
    await fs.mkdir(this.tempDir, { recursive: true });
  }

  permanentVideoPath(): string {
    return path.join(this.documentsDir, `${uuidv4()}.mov`);
  }

  thumbnailPath(): string {
    return path.join(this.documentsDir, `thumb_${uuidv4()}.jpg`);
  }

  tempPath(extension = '.mov'): string {
    const ext = extension.startsWith('.') ? extension : `.${extension}`;
    return path.join(this.tempDir, `${uuidv4()}${ext}`);
  }

  /**
   * True when the path lives inside the temp directory
   */
  isTemporary(filePath: string): boolean {
    const relative = path.relative(this.tempDir, path.resolve(filePath));
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  }

  /**
   * Copy a source video into permanent storage
   *
   * @returns Absolute path of the permanent copy
   */
  async copyToPermanent(sourcePath: string, athleteId?: string): Promise<string> {
    const destination = this.permanentVideoPath();

    try {
      await fs.mkdir(this.documentsDir, { recursive: true });
      await fs.copyFile(sourcePath, destination);
    } catch (error) {
      logFileOperation({
        operation: 'copy',
        path: destination,
        success: false,
        athleteId,
        errorMessage: errorMessage(error),
      });
      await this.remove(destination);
      throw error;
    }

    logFileOperation({ operation: 'copy', path: destination, success: true, athleteId });
    return destination;
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch (error) {
      if (isFileNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async sizeOf(filePath: string): Promise<number> {
    return (await fs.stat(filePath)).size;
  }

  /**
   * Delete a file; a missing path is a no-op
   *
   * @returns true when a file was removed
   */
  async remove(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isFileNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Delete every given path, logging instead of throwing
   *
   * Used on discard, cancellation, failure and after a permanent copy.
   */
  async cleanup(paths: Array<string | undefined>, athleteId?: string): Promise<void> {
    for (const filePath of new Set(paths)) {
      if (!filePath) {
        continue;
      }
      try {
        const removed = await this.remove(filePath);
        if (removed) {
          logFileOperation({ operation: 'delete', path: filePath, success: true, athleteId });
        }
      } catch (error) {
        logFileOperation({
          operation: 'delete',
          path: filePath,
          success: false,
          athleteId,
          errorMessage: errorMessage(error),
        });
      }
    }
  }
}
