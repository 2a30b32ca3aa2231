/**
 * Athlete Service
 *
 * Business logic for athlete profiles and their aggregate statistics.
 */

import { transaction } from '../config/database';
import { AthleteRepository } from '../repositories/athlete-repository';
import { StatisticsRepository } from '../repositories/statistics-repository';
import { VideoClipRepository } from '../repositories/video-clip-repository';
import { GameRepository } from '../repositories/game-repository';
import { SeasonService } from './season-service';
import { VideoFileStore } from './video-file-store';
import { Athlete } from '../models/athlete';
import { StatisticsOwner, StatisticsWithRates } from '../models/statistics';
import { BadRequestError, NotFoundError } from '../models/errors';
import {
  ManualStatisticsEntry,
  manualStatisticsDelta,
  withRates,
} from '../utils/play-result-statistics';
import { log, LogLevel } from '../utils/logger';

/**
 * Athlete Service
 * Provides business logic for athlete operations
 */
export class AthleteService {
  constructor(
    private athleteRepository: AthleteRepository,
    private statisticsRepository: StatisticsRepository,
    private clipRepository: VideoClipRepository,
    private gameRepository: GameRepository,
    private seasonService: SeasonService,
    private files: VideoFileStore
  ) {}

  /**
   * Create an athlete with a zeroed statistics record
   *
   * @throws BadRequestError if the name is blank
   */
  async createAthlete(name: string): Promise<Athlete> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new BadRequestError('Athlete name is required', 'INVALID_ATHLETE');
    }

    return transaction(async (client) => {
      const athlete = await this.athleteRepository.create(trimmed, client);
      await this.statisticsRepository.create(StatisticsOwner.ATHLETE, athlete.id, client);
      return athlete;
    });
  }

  /**
   * Get an athlete by ID with 404 handling
   *
   * @throws NotFoundError if the athlete doesn't exist
   */
  async getAthlete(athleteId: string): Promise<Athlete> {
    const athlete = await this.athleteRepository.findById(athleteId);

    if (!athlete) {
      throw new NotFoundError('Athlete not found');
    }

    return athlete;
  }

  /**
   * Get the athlete's counters with rate stats
   *
   * @throws NotFoundError if the athlete doesn't exist
   */
  async getStatistics(athleteId: string): Promise<StatisticsWithRates> {
    await this.getAthlete(athleteId);

    const statistics =
      (await this.statisticsRepository.find(StatisticsOwner.ATHLETE, athleteId)) ??
      (await this.statisticsRepository.create(StatisticsOwner.ATHLETE, athleteId));

    return withRates(statistics);
  }

  /**
   * Add a manually entered batting line to the athlete, the active season
   * and optionally a game
   *
   * @throws BadRequestError if any count is negative or fractional
   * @throws NotFoundError if the athlete or game doesn't exist
   */
  async addManualStatistics(
    athleteId: string,
    entry: ManualStatisticsEntry,
    gameId?: string
  ): Promise<StatisticsWithRates> {
    for (const [field, value] of Object.entries(entry)) {
      if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
        throw new BadRequestError('Statistics must be non-negative whole numbers', 'INVALID_STATISTICS', {
          [field]: 'Must be a non-negative integer',
        });
      }
    }

    const delta = manualStatisticsDelta(entry);

    const statistics = await transaction(async (client) => {
      const athlete = await this.athleteRepository.findById(athleteId, client);
      if (!athlete) {
        throw new NotFoundError('Athlete not found');
      }

      if (gameId) {
        const game = await this.gameRepository.findById(gameId, client);
        if (!game || game.athlete_id !== athleteId) {
          throw new NotFoundError('Game not found');
        }
        await this.statisticsRepository.increment(StatisticsOwner.GAME, gameId, delta, client);
      }

      const season = await this.seasonService.ensureActiveSeason(athleteId, client);
      await this.statisticsRepository.increment(StatisticsOwner.SEASON, season.id, delta, client);

      return this.statisticsRepository.increment(StatisticsOwner.ATHLETE, athleteId, delta, client);
    });

    return withRates(statistics);
  }

  /**
   * Delete an athlete, every clip file and thumbnail it owns, then its
   * records
   *
   * @throws NotFoundError if the athlete doesn't exist
   */
  async deleteAthlete(athleteId: string): Promise<void> {
    await this.getAthlete(athleteId);

    const clips = await this.clipRepository.findByAthleteId(athleteId);
    await this.files.cleanup(
      clips.flatMap((clip) => [clip.file_path, clip.thumbnail_path]),
      athleteId
    );

    await transaction((client) => this.athleteRepository.delete(athleteId, client));

    log(LogLevel.INFO, 'Athlete deleted', {
      athlete_id: athleteId,
      clips_removed: clips.length,
    });
  }
}
