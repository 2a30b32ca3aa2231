/**
 * Season Service
 *
 * Business logic for seasons. New games, practices and clips link to the
 * athlete's active season; when there is none a default season named after
 * the current month is created.
 */

import { PoolClient } from 'pg';
import { transaction } from '../config/database';
import { SeasonRepository } from '../repositories/season-repository';
import { StatisticsRepository } from '../repositories/statistics-repository';
import { Season, defaultSeasonName } from '../models/season';
import { StatisticsOwner, StatisticsWithRates } from '../models/statistics';
import { BadRequestError, NotFoundError } from '../models/errors';
import { withRates } from '../utils/play-result-statistics';
import { log, LogLevel } from '../utils/logger';

/**
 * Season Service
 * Provides business logic for season operations
 */
export class SeasonService {
  constructor(
    private seasonRepository: SeasonRepository,
    private statisticsRepository: StatisticsRepository,
    private now: () => Date = () => new Date()
  ) {}

  async getSeasons(athleteId: string): Promise<Season[]> {
    return this.seasonRepository.findByAthleteId(athleteId);
  }

  /**
   * Return the active season, creating a default one if there is none
   *
   * @param client - Transaction to run in; the clip save passes its own
   */
  async ensureActiveSeason(athleteId: string, client?: PoolClient): Promise<Season> {
    if (client) {
      await this.seasonRepository.lockAthlete(athleteId, client);
    }
    const active = await this.seasonRepository.findActive(athleteId, client);
    if (active) {
      return active;
    }

    const startDate = this.now();
    const season = await this.seasonRepository.create(
      { athlete_id: athleteId, name: defaultSeasonName(startDate), start_date: startDate },
      client
    );
    await this.statisticsRepository.create(StatisticsOwner.SEASON, season.id, client);

    log(LogLevel.INFO, 'Default season created', {
      athlete_id: athleteId,
      season_id: season.id,
      season_name: season.name,
    });

    return season;
  }

  /**
   * Start a new season, ending the current one
   *
   * @throws BadRequestError if the name is blank
   */
  async startSeason(athleteId: string, name: string, startDate?: Date): Promise<Season> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new BadRequestError('Season name is required', 'INVALID_SEASON');
    }

    return transaction(async (client) => {
      const begin = startDate ?? this.now();
      await this.seasonRepository.lockAthlete(athleteId, client);
      const active = await this.seasonRepository.findActive(athleteId, client);
      if (active) {
        await this.seasonRepository.deactivate(active.id, begin, client);
      }

      const season = await this.seasonRepository.create(
        { athlete_id: athleteId, name: trimmed, start_date: begin },
        client
      );
      await this.statisticsRepository.create(StatisticsOwner.SEASON, season.id, client);
      return season;
    });
  }

  /**
   * End the athlete's active season
   *
   * @throws NotFoundError if no season is active
   */
  async endSeason(athleteId: string): Promise<Season> {
    const active = await this.seasonRepository.findActive(athleteId);

    if (!active) {
      throw new NotFoundError('No active season');
    }

    const ended = await this.seasonRepository.deactivate(active.id, this.now());
    if (!ended) {
      throw new NotFoundError('No active season');
    }
    return ended;
  }

  /**
   * Get a season's counters with rate stats
   *
   * @throws NotFoundError if the season doesn't exist
   */
  async getSeasonStatistics(seasonId: string): Promise<StatisticsWithRates> {
    const season = await this.seasonRepository.findById(seasonId);

    if (!season) {
      throw new NotFoundError('Season not found');
    }

    const statistics =
      (await this.statisticsRepository.find(StatisticsOwner.SEASON, seasonId)) ??
      (await this.statisticsRepository.create(StatisticsOwner.SEASON, seasonId));

    return withRates(statistics);
  }
}
