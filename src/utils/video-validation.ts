/**
 * Video Validation Module
 *
 * Checks a video file against the fixed limits before it may be persisted:
 * the file exists, is at most 500 MiB and at most 10 minutes long. There is
 * no soft-fail mode; any violation blocks the pipeline.
 */

import { promises as fs } from 'fs';
import { VideoProbe, ValidatedVideo } from '../models/media';
import { MAX_VIDEO_DURATION_SECONDS, MAX_VIDEO_SIZE_BYTES } from '../models/recording';
import { VideoValidationError, VideoValidationReason } from '../models/errors';
import { isFileNotFound } from './fs-errors';

/**
 * Validation result
 */
export type VideoValidationResult =
  | { ok: true; video: ValidatedVideo }
  | {
      ok: false;
      reason: VideoValidationReason;
      message: string;
      sizeBytes?: number;
      durationSeconds?: number;
    };

function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Validate a video file's existence, size and duration
 *
 * @param path - Absolute path to the video
 * @param probe - Duration reader
 */
export async function validateVideo(path: string, probe: VideoProbe): Promise<VideoValidationResult> {
  let sizeBytes: number;
  try {
    const stats = await fs.stat(path);
    if (!stats.isFile()) {
      return { ok: false, reason: 'file-not-found', message: 'Video file not found.' };
    }
    sizeBytes = stats.size;
  } catch (error) {
    if (isFileNotFound(error)) {
      return { ok: false, reason: 'file-not-found', message: 'Video file not found.' };
    }
    throw error;
  }

  if (sizeBytes > MAX_VIDEO_SIZE_BYTES) {
    return {
      ok: false,
      reason: 'file-too-large',
      message: `Video file is too large (${formatMegabytes(sizeBytes)}). Please select a video under 500MB.`,
      sizeBytes,
    };
  }

  let durationSeconds: number;
  try {
    durationSeconds = await probe.probeDuration(path);
  } catch {
    return { ok: false, reason: 'unreadable', message: 'Video format is not supported.', sizeBytes };
  }

  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    return { ok: false, reason: 'unreadable', message: 'Video format is not supported.', sizeBytes };
  }

  if (durationSeconds > MAX_VIDEO_DURATION_SECONDS) {
    return {
      ok: false,
      reason: 'duration-too-long',
      message: `Video is too long (${Math.floor(durationSeconds / 60)} minutes). Please select a video under 10 minutes.`,
      sizeBytes,
      durationSeconds,
    };
  }

  return { ok: true, video: { path, sizeBytes, durationSeconds } };
}

/**
 * Validate a video, throwing when any bound is violated
 *
 * @throws VideoValidationError with the failing reason
 */
export async function assertValidVideo(path: string, probe: VideoProbe): Promise<ValidatedVideo> {
  const result = await validateVideo(path, probe);

  if (!result.ok) {
    throw new VideoValidationError(result.message, result.reason, {
      path,
      sizeBytes: result.sizeBytes,
      durationSeconds: result.durationSeconds,
    });
  }

  return result.video;
}
