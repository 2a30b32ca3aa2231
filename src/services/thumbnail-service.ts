/**
 * Thumbnail Service
 *
 * Best-effort, independently retryable side task run after a clip is
 * committed. A failure is logged and counted; it never rolls back the clip
 * and never rejects.
 */

import { MediaToolkit } from '../models/media';
import { NotFoundError } from '../models/errors';
import { ThumbnailOutcome, VideoClip } from '../models/video-clip';
import { VideoClipRepository } from '../repositories/video-clip-repository';
import { ClipEventBus } from './clip-event-bus';
import { VideoFileStore } from './video-file-store';
import { logFileOperation } from '../utils/logger';
import { emitThumbnailFailure } from '../utils/metrics';
import { errorMessage } from '../utils/fs-errors';

export const THUMBNAIL_WIDTH = 160;
export const THUMBNAIL_HEIGHT = 120;

/**
 * Frame time for a thumbnail: 1s in, or 10% of a shorter clip capped at 0.5s
 */
export function thumbnailTime(durationSeconds: number): number {
  if (durationSeconds >= 1) {
    return 1;
  }
  return Math.max(0, Math.min(durationSeconds * 0.1, 0.5));
}

export class ThumbnailService {
  constructor(
    private toolkit: MediaToolkit,
    private files: VideoFileStore,
    private clipRepository: VideoClipRepository,
    private events: ClipEventBus
  ) {}

  /**
   * Extract a frame, store it and attach it to the clip
   */
  async generateFor(clip: VideoClip, signal?: AbortSignal): Promise<ThumbnailOutcome> {
    if (signal?.aborted) {
      return { status: 'cancelled', clipId: clip.id };
    }

    const thumbnailPath = this.files.thumbnailPath();

    try {
      const duration = clip.duration_seconds ?? (await this.probeOrZero(clip.file_path));

      await this.toolkit.extractFrame(
        clip.file_path,
        thumbnailPath,
        { atSeconds: thumbnailTime(duration), width: THUMBNAIL_WIDTH, height: THUMBNAIL_HEIGHT },
        signal
      );

      if (signal?.aborted) {
        await this.files.cleanup([thumbnailPath]);
        return { status: 'cancelled', clipId: clip.id };
      }

      const attached = await this.clipRepository.updateThumbnail(clip.id, thumbnailPath);
      if (!attached) {
        throw new Error('Clip no longer exists');
      }

      if (clip.thumbnail_path && clip.thumbnail_path !== thumbnailPath) {
        await this.files.cleanup([clip.thumbnail_path], clip.athlete_id);
      }

      logFileOperation({
        operation: 'thumbnail',
        path: thumbnailPath,
        success: true,
        athleteId: clip.athlete_id,
      });
      this.events.emit('thumbnail-attached', { clipId: clip.id, thumbnailPath });

      return { status: 'attached', clipId: clip.id, thumbnailPath };
    } catch (error) {
      await this.files.cleanup([thumbnailPath]);

      if (signal?.aborted) {
        return { status: 'cancelled', clipId: clip.id };
      }

      logFileOperation({
        operation: 'thumbnail',
        path: thumbnailPath,
        success: false,
        athleteId: clip.athlete_id,
        errorMessage: errorMessage(error),
      });
      await emitThumbnailFailure();

      return { status: 'failed', clipId: clip.id, error: errorMessage(error) };
    }
  }

  /**
   * Re-run thumbnail generation for a stored clip
   *
   * @throws NotFoundError if the clip doesn't exist
   */
  async retry(clipId: string, signal?: AbortSignal): Promise<ThumbnailOutcome> {
    const clip = await this.clipRepository.findById(clipId);

    if (!clip) {
      throw new NotFoundError('Clip not found');
    }

    return this.generateFor(clip, signal);
  }

  private async probeOrZero(videoPath: string): Promise<number> {
    try {
      return await this.toolkit.probeDuration(videoPath);
    } catch {
      return 0;
    }
  }
}
