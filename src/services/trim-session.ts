/**
 * Trim Session
 *
 * One re-encode of a sub-range of a source video into a new temp file.
 *
 * States: idle -> exporting -> completed | failed | cancelled. Failure and
 * cancellation delete the partial output and are terminal until reset(),
 * which returns the session to idle so the whole trim can be retried.
 */

import { MediaToolkit, TimeRange } from '../models/media';
import { BadRequestError, ExportError } from '../models/errors';
import { VideoFileStore } from './video-file-store';
import { logFileOperation } from '../utils/logger';
import { errorMessage } from '../utils/fs-errors';
import { MetricName, measureDuration } from '../utils/metrics';

export type TrimState = 'idle' | 'exporting' | 'completed' | 'failed' | 'cancelled';

export interface TrimStartOptions {
  /** Source duration; read from the file when omitted */
  durationSeconds?: number;
  onProgress?: (fraction: number) => void;
  /** External cancellation, in addition to cancel() */
  signal?: AbortSignal;
}

/**
 * Check 0 <= start < end <= duration
 *
 * @throws BadRequestError (code INVALID_TRIM_RANGE)
 */
export function validateTrimRange(range: TimeRange, durationSeconds: number): void {
  const { startSeconds, endSeconds } = range;

  if (!Number.isFinite(startSeconds) || !Number.isFinite(endSeconds)) {
    throw new BadRequestError('Trim range must be finite', 'INVALID_TRIM_RANGE', range);
  }
  if (startSeconds < 0) {
    throw new BadRequestError('Trim start cannot be negative', 'INVALID_TRIM_RANGE', range);
  }
  if (startSeconds >= endSeconds) {
    throw new BadRequestError('Trim start must be before trim end', 'INVALID_TRIM_RANGE', range);
  }
  if (endSeconds > durationSeconds) {
    throw new BadRequestError('Trim end is past the end of the video', 'INVALID_TRIM_RANGE', {
      ...range,
      durationSeconds,
    });
  }
}

export class TrimSession {
  private currentState: TrimState = 'idle';
  private controller: AbortController | null = null;
  private output: string | undefined;
  private lastError: ExportError | undefined;

  constructor(private toolkit: MediaToolkit, private files: VideoFileStore) {}

  get state(): TrimState {
    return this.currentState;
  }

  /** Path of the trimmed file once completed */
  get outputPath(): string | undefined {
    return this.currentState === 'completed' ? this.output : undefined;
  }

  get error(): ExportError | undefined {
    return this.lastError;
  }

  /**
   * Export the range to a new temp file
   *
   * @returns Path of the trimmed file
   * @throws BadRequestError when not idle or the range is invalid
   * @throws ExportError with reason 'failed' or 'cancelled'
   */
  async start(sourcePath: string, range: TimeRange, options: TrimStartOptions = {}): Promise<string> {
    if (this.currentState !== 'idle') {
      throw new BadRequestError(`Trim session is ${this.currentState}`, 'INVALID_TRIM_STATE');
    }

    const controller = new AbortController();
    this.controller = controller;
    this.currentState = 'exporting';
    this.lastError = undefined;

    const external = options.signal;
    const forwardAbort = () => controller.abort();
    if (external?.aborted) {
      controller.abort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    const outputPath = this.files.tempPath('.mov');
    this.output = outputPath;

    try {
      const duration = options.durationSeconds ?? (await this.toolkit.probeDuration(sourcePath));
      validateTrimRange(range, duration);

      await this.files.ensureDirectories();
      await measureDuration(
        () =>
          this.toolkit.exportRange(sourcePath, outputPath, range, {
            signal: controller.signal,
            onProgress: options.onProgress,
          }),
        MetricName.TRIM_EXPORT_DURATION
      );

      if (controller.signal.aborted) {
        throw new ExportError('Trim was cancelled', 'cancelled');
      }

      this.currentState = 'completed';
      logFileOperation({ operation: 'export', path: outputPath, success: true });
      return outputPath;
    } catch (error) {
      await this.files.cleanup([outputPath]);
      this.output = undefined;

      if (error instanceof BadRequestError) {
        this.currentState = 'idle';
        throw error;
      }

      const exportError = controller.signal.aborted
        ? new ExportError('Trim was cancelled', 'cancelled', error)
        : new ExportError(`Trim failed: ${errorMessage(error)}`, 'failed', error);

      this.currentState = exportError.reason;
      this.lastError = exportError;
      logFileOperation({
        operation: 'export',
        path: outputPath,
        success: false,
        errorMessage: exportError.message,
      });
      throw exportError;
    } finally {
      external?.removeEventListener('abort', forwardAbort);
      this.controller = null;
    }
  }

  /**
   * Abort the running export; a no-op in any other state
   */
  cancel(): void {
    if (this.currentState === 'exporting') {
      this.controller?.abort();
    }
  }

  /**
   * Return a terminal session to idle
   *
   * A completed output belongs to the caller and is not deleted.
   */
  reset(): void {
    if (this.currentState === 'exporting') {
      throw new BadRequestError('Cannot reset a trim while exporting', 'INVALID_TRIM_STATE');
    }
    this.currentState = 'idle';
    this.output = undefined;
    this.lastError = undefined;
  }
}
