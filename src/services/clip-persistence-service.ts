/**
 * Clip Persistence Service
 *
 * Saves a validated video as a clip. The file is copied to permanent storage
 * first; the clip, its play result, the season link and every statistics
 * increment are then written in one transaction. Any failure before commit
 * rolls back the rows and removes the permanent copy.
 *
 * Thumbnail generation runs after commit as an independent best-effort task.
 * Cancelling after commit leaves the clip saved without a thumbnail.
 */

import * as path from 'path';
import { transaction } from '../config/database';
import { AthleteRepository } from '../repositories/athlete-repository';
import { GameRepository } from '../repositories/game-repository';
import { PracticeRepository } from '../repositories/practice-repository';
import { StatisticsRepository } from '../repositories/statistics-repository';
import { VideoClipRepository } from '../repositories/video-clip-repository';
import { SeasonService } from './season-service';
import { ThumbnailService } from './thumbnail-service';
import { ClipEventBus } from './clip-event-bus';
import { VideoFileStore } from './video-file-store';
import { ThumbnailOutcome, VideoClip } from '../models/video-clip';
import { isHighlight } from '../models/play-result';
import { Statistics, StatisticsOwner } from '../models/statistics';
import {
  BadRequestError,
  NotFoundError,
  OperationCancelledError,
  PersistenceError,
  VideoValidationError,
} from '../models/errors';
import { validateSaveClipRequest } from '../utils/request-validation';
import { statisticsDeltaFor } from '../utils/play-result-statistics';
import { checkpoint } from '../utils/cancellation';
import { errorMessage } from '../utils/fs-errors';
import { logPipelineStage } from '../utils/logger';
import { MetricName, measureDuration } from '../utils/metrics';

export interface SaveClipResult {
  clip: VideoClip;
  /** Settles once the thumbnail task ends; never rejects */
  thumbnail: Promise<ThumbnailOutcome>;
}

export interface ClipPersistenceDependencies {
  files: VideoFileStore;
  clipRepository: VideoClipRepository;
  statisticsRepository: StatisticsRepository;
  athleteRepository: AthleteRepository;
  gameRepository: GameRepository;
  practiceRepository: PracticeRepository;
  seasonService: SeasonService;
  thumbnails: ThumbnailService;
  events: ClipEventBus;
}

function isPassThrough(error: unknown): boolean {
  return (
    error instanceof OperationCancelledError ||
    error instanceof NotFoundError ||
    error instanceof BadRequestError ||
    error instanceof PersistenceError
  );
}

/**
 * Clip Persistence Service
 * Copies, records and counts a clip as one unit of work
 */
export class ClipPersistenceService {
  constructor(private deps: ClipPersistenceDependencies) {}

  /**
   * Save a clip
   *
   * @param request - Unvalidated save request
   * @param signal - Cooperative cancellation, checked before and after each step
   * @throws BadRequestError if the request is invalid
   * @throws VideoValidationError if the source file is missing
   * @throws NotFoundError if the athlete, game or practice doesn't exist
   * @throws OperationCancelledError if cancelled before commit
   * @throws PersistenceError if the copy or transaction fails
   */
  async saveClip(request: unknown, signal?: AbortSignal): Promise<SaveClipResult> {
    const startTime = Date.now();
    const valid = validateSaveClipRequest(request);
    const { files } = this.deps;

    if (valid.pitchSpeed !== undefined && !valid.playResult) {
      throw new BadRequestError('Pitch speed requires a play result', 'INVALID_CLIP_REQUEST', {
        pitchSpeed: 'Requires playResult',
      });
    }

    if (!(await files.exists(valid.sourcePath))) {
      throw new VideoValidationError('Video file not found.', 'file-not-found', { path: valid.sourcePath });
    }

    checkpoint(signal, 'copy');

    let permanentPath: string;
    try {
      permanentPath = await files.copyToPermanent(valid.sourcePath, valid.athleteId);
    } catch (error) {
      throw new PersistenceError('Failed to copy the video to storage', error);
    }

    let clip: VideoClip;
    let athleteStatistics: Statistics | null;
    try {
      checkpoint(signal, 'copy');

      ({ clip, athleteStatistics } = await measureDuration(
        () =>
          transaction(async (client) => {
            const { clipRepository, statisticsRepository } = this.deps;

            const athlete = await this.deps.athleteRepository.findById(valid.athleteId, client);
            if (!athlete) {
              throw new NotFoundError('Athlete not found');
            }

            const season = await this.deps.seasonService.ensureActiveSeason(valid.athleteId, client);

            if (valid.gameId) {
              const game = await this.deps.gameRepository.findById(valid.gameId, client);
              if (!game || game.athlete_id !== valid.athleteId) {
                throw new NotFoundError('Game not found');
              }
            }

            if (valid.practiceId) {
              const practice = await this.deps.practiceRepository.findById(valid.practiceId, client);
              if (!practice || practice.athlete_id !== valid.athleteId) {
                throw new NotFoundError('Practice not found');
              }
            }

            const playResult = valid.playResult
              ? await clipRepository.insertPlayResult(
                  {
                    type: valid.playResult,
                    pitch_speed:
                      valid.pitchSpeed === undefined ? undefined : Math.round(valid.pitchSpeed * 10) / 10,
                  },
                  client
                )
              : undefined;

            const inserted = await clipRepository.insert(
              {
                athlete_id: valid.athleteId,
                season_id: season.id,
                game_id: valid.gameId,
                practice_id: valid.practiceId,
                play_result_id: playResult?.id,
                file_name: path.basename(permanentPath),
                file_path: permanentPath,
                duration_seconds: valid.durationSeconds,
                is_highlight: playResult ? isHighlight(playResult.type) : false,
              },
              client
            );

            let updatedStatistics: Statistics | null = null;
            if (playResult) {
              const delta = statisticsDeltaFor(playResult.type);
              updatedStatistics = await statisticsRepository.increment(
                StatisticsOwner.ATHLETE,
                valid.athleteId,
                delta,
                client
              );
              if (valid.gameId) {
                await statisticsRepository.increment(StatisticsOwner.GAME, valid.gameId, delta, client);
              }
              await statisticsRepository.increment(StatisticsOwner.SEASON, season.id, delta, client);
            }

            if (!(await files.exists(permanentPath))) {
              throw new PersistenceError('The video file is missing from storage');
            }

            checkpoint(signal, 'commit');

            return { clip: inserted, athleteStatistics: updatedStatistics };
          }),
        MetricName.CLIP_SAVE_DURATION
      ));
    } catch (error) {
      await files.cleanup([permanentPath], valid.athleteId);

      logPipelineStage({
        athleteId: valid.athleteId,
        stage: 'persist',
        outcome: error instanceof OperationCancelledError ? 'cancelled' : 'failed',
        durationMs: Date.now() - startTime,
        errorMessage: errorMessage(error),
      });

      if (isPassThrough(error)) {
        throw error;
      }
      throw new PersistenceError('Failed to save the clip', error);
    }

    logPipelineStage({
      athleteId: valid.athleteId,
      stage: 'persist',
      outcome: 'completed',
      durationMs: Date.now() - startTime,
    });

    if (files.isTemporary(valid.sourcePath)) {
      await files.cleanup([valid.sourcePath], valid.athleteId);
    }

    this.deps.events.emit('clip-saved', { clip });
    if (clip.play_result && athleteStatistics) {
      this.deps.events.emit('statistics-updated', {
        athleteId: clip.athlete_id,
        gameId: clip.game_id,
        seasonId: clip.season_id,
        playResult: clip.play_result.type,
        statistics: athleteStatistics,
      });
    }

    const thumbnail = this.deps.thumbnails.generateFor(clip, signal);

    return { clip, thumbnail };
  }
}
