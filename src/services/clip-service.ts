/**
 * Clip Service
 *
 * Reads, flags and deletes saved clips. Deleting a clip removes its record,
 * its play result and its files; statistics counters keep the increments
 * the clip contributed.
 */

import { transaction } from '../config/database';
import { VideoClipRepository } from '../repositories/video-clip-repository';
import { ClipEventBus } from './clip-event-bus';
import { VideoFileStore } from './video-file-store';
import { VideoClip, VideoClipFilters } from '../models/video-clip';
import { NotFoundError } from '../models/errors';
import { log, LogLevel } from '../utils/logger';

/**
 * Clip Service
 * Provides business logic for clip operations
 */
export class ClipService {
  constructor(
    private clipRepository: VideoClipRepository,
    private files: VideoFileStore,
    private events: ClipEventBus
  ) {}

  /**
   * Get a clip by ID with 404 handling
   *
   * @throws NotFoundError if the clip doesn't exist
   */
  async getClip(clipId: string): Promise<VideoClip> {
    const clip = await this.clipRepository.findById(clipId);

    if (!clip) {
      throw new NotFoundError('Clip not found');
    }

    return clip;
  }

  async listClips(athleteId: string, filters: VideoClipFilters = {}): Promise<VideoClip[]> {
    return this.clipRepository.findByAthleteId(athleteId, filters);
  }

  /**
   * @throws NotFoundError if the clip doesn't exist
   */
  async setHighlight(clipId: string, isHighlight: boolean): Promise<VideoClip> {
    const clip = await this.clipRepository.setHighlight(clipId, isHighlight);

    if (!clip) {
      throw new NotFoundError('Clip not found');
    }

    return clip;
  }

  /**
   * Delete a clip record, then its video and thumbnail files
   *
   * @throws NotFoundError if the clip doesn't exist
   */
  async deleteClip(clipId: string): Promise<void> {
    const clip = await this.getClip(clipId);

    const deleted = await transaction((client) => this.clipRepository.delete(clipId, client));
    if (!deleted) {
      throw new NotFoundError('Clip not found');
    }

    await this.files.cleanup([clip.file_path, clip.thumbnail_path], clip.athlete_id);

    log(LogLevel.INFO, 'Clip deleted', {
      clip_id: clipId,
      athlete_id: clip.athlete_id,
      had_play_result: clip.play_result !== undefined,
    });

    this.events.emit('clip-deleted', { clipId, athleteId: clip.athlete_id });
  }
}
