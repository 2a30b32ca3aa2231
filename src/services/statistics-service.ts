/**
 * Statistics Service
 *
 * Rebuilds stored counters from the recorded data when the incremental
 * totals have drifted, e.g. after clips were deleted.
 *
 * - Game: the play results of the game's clips; total_games is 1 once the
 *   game is complete
 * - Season and athlete: the stored statistics of their completed games plus
 *   the play results of clips that belong to no game
 *
 * Manual batting lines that were not attached to a game are not part of
 * the recorded data and do not survive a recalculation.
 */

import { PoolClient } from 'pg';
import { transaction } from '../config/database';
import { AthleteRepository } from '../repositories/athlete-repository';
import { GameRepository } from '../repositories/game-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { StatisticsRepository } from '../repositories/statistics-repository';
import { VideoClipRepository } from '../repositories/video-clip-repository';
import { Game } from '../models/game';
import { PlayResultType } from '../models/play-result';
import { VideoClip } from '../models/video-clip';
import {
  Statistics,
  StatisticsCounters,
  StatisticsOwner,
  StatisticsWithRates,
  emptyCounters,
} from '../models/statistics';
import { NotFoundError } from '../models/errors';
import { countersFromPlayResults, sumCounters, withRates } from '../utils/play-result-statistics';
import { log, LogLevel } from '../utils/logger';

function playResultTypes(clips: VideoClip[]): PlayResultType[] {
  return clips.flatMap((clip) => (clip.play_result ? [clip.play_result.type] : []));
}

/**
 * Statistics Service
 * Provides recalculation of stored statistics
 */
export class StatisticsService {
  constructor(
    private statisticsRepository: StatisticsRepository,
    private gameRepository: GameRepository,
    private clipRepository: VideoClipRepository,
    private athleteRepository: AthleteRepository,
    private seasonRepository: SeasonRepository
  ) {}

  /**
   * @throws NotFoundError if the game doesn't exist
   */
  async recalculateGameStatistics(gameId: string): Promise<StatisticsWithRates> {
    return transaction(async (client) => {
      const game = await this.gameRepository.findById(gameId, client);
      if (!game) {
        throw new NotFoundError('Game not found');
      }
      return withRates(await this.rebuildGame(game, client));
    });
  }

  /**
   * @throws NotFoundError if the season doesn't exist
   */
  async recalculateSeasonStatistics(seasonId: string): Promise<StatisticsWithRates> {
    return transaction(async (client) => {
      const season = await this.seasonRepository.findById(seasonId, client);
      if (!season) {
        throw new NotFoundError('Season not found');
      }

      const games = await this.gameRepository.findByAthleteId(season.athlete_id, { seasonId }, client);
      const clips = await this.clipRepository.findByAthleteId(season.athlete_id, { seasonId }, client);
      const counters = await this.aggregate(games, clips, client);

      log(LogLevel.INFO, 'Statistics recalculated', { owner_type: StatisticsOwner.SEASON, owner_id: seasonId });
      return withRates(
        await this.statisticsRepository.replace(StatisticsOwner.SEASON, seasonId, counters, client)
      );
    });
  }

  /**
   * @throws NotFoundError if the athlete doesn't exist
   */
  async recalculateAthleteStatistics(athleteId: string): Promise<StatisticsWithRates> {
    return transaction(async (client) => {
      await this.requireAthlete(athleteId, client);
      return withRates(await this.rebuildAthlete(athleteId, client));
    });
  }

  /**
   * Rebuild every game, then every season, then the athlete, in one
   * transaction
   *
   * @throws NotFoundError if the athlete doesn't exist
   */
  async recalculateAll(athleteId: string): Promise<StatisticsWithRates> {
    return transaction(async (client) => {
      await this.requireAthlete(athleteId, client);

      for (const game of await this.gameRepository.findByAthleteId(athleteId, {}, client)) {
        await this.rebuildGame(game, client);
      }

      for (const season of await this.seasonRepository.findByAthleteId(athleteId, client)) {
        const games = await this.gameRepository.findByAthleteId(athleteId, { seasonId: season.id }, client);
        const clips = await this.clipRepository.findByAthleteId(athleteId, { seasonId: season.id }, client);
        await this.statisticsRepository.replace(
          StatisticsOwner.SEASON,
          season.id,
          await this.aggregate(games, clips, client),
          client
        );
      }

      return withRates(await this.rebuildAthlete(athleteId, client));
    });
  }

  private async requireAthlete(athleteId: string, client: PoolClient): Promise<void> {
    const athlete = await this.athleteRepository.findById(athleteId, client);
    if (!athlete) {
      throw new NotFoundError('Athlete not found');
    }
  }

  private async rebuildGame(game: Game, client: PoolClient): Promise<Statistics> {
    const clips = await this.clipRepository.findByAthleteId(game.athlete_id, { gameId: game.id }, client);
    const counters = countersFromPlayResults(playResultTypes(clips));
    counters.total_games = game.is_complete ? 1 : 0;

    log(LogLevel.INFO, 'Statistics recalculated', { owner_type: StatisticsOwner.GAME, owner_id: game.id });
    return this.statisticsRepository.replace(StatisticsOwner.GAME, game.id, counters, client);
  }

  private async rebuildAthlete(athleteId: string, client: PoolClient): Promise<Statistics> {
    const games = await this.gameRepository.findByAthleteId(athleteId, {}, client);
    const clips = await this.clipRepository.findByAthleteId(athleteId, {}, client);
    const counters = await this.aggregate(games, clips, client);

    log(LogLevel.INFO, 'Statistics recalculated', { owner_type: StatisticsOwner.ATHLETE, owner_id: athleteId });
    return this.statisticsRepository.replace(StatisticsOwner.ATHLETE, athleteId, counters, client);
  }

  /**
   * Completed games' stored counters plus the play results of clips outside
   * any game
   */
  private async aggregate(games: Game[], clips: VideoClip[], client: PoolClient): Promise<StatisticsCounters> {
    const completed = games.filter((game) => game.is_complete);
    const gameCounters: StatisticsCounters[] = [];
    for (const game of completed) {
      gameCounters.push(
        (await this.statisticsRepository.find(StatisticsOwner.GAME, game.id, client)) ?? emptyCounters()
      );
    }

    const outsideGames = countersFromPlayResults(playResultTypes(clips.filter((clip) => !clip.game_id)));
    const counters = sumCounters([...gameCounters, outsideGames]);
    counters.total_games = completed.length;
    return counters;
  }
}
