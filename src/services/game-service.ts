/**
 * Game Service
 *
 * Business logic for games and tournaments. A game counts toward the
 * athlete's total_games once, when it is first marked complete.
 */

import { transaction } from '../config/database';
import { GameRepository } from '../repositories/game-repository';
import { StatisticsRepository } from '../repositories/statistics-repository';
import { AthleteRepository } from '../repositories/athlete-repository';
import { SeasonService } from './season-service';
import { CreateGameParams, Game, Tournament } from '../models/game';
import { StatisticsOwner, StatisticsWithRates } from '../models/statistics';
import { BadRequestError, NotFoundError } from '../models/errors';
import { withRates } from '../utils/play-result-statistics';

/**
 * Game Service
 * Provides business logic for game operations
 */
export class GameService {
  constructor(
    private gameRepository: GameRepository,
    private statisticsRepository: StatisticsRepository,
    private athleteRepository: AthleteRepository,
    private seasonService: SeasonService
  ) {}

  /**
   * Create a game linked to the athlete's active season
   *
   * @throws NotFoundError if the athlete or tournament doesn't exist
   * @throws BadRequestError if the opponent is blank
   */
  async createGame(params: CreateGameParams): Promise<Game> {
    const opponent = params.opponent.trim();
    if (!opponent) {
      throw new BadRequestError('Opponent is required', 'INVALID_GAME');
    }

    return transaction(async (client) => {
      const athlete = await this.athleteRepository.findById(params.athlete_id, client);
      if (!athlete) {
        throw new NotFoundError('Athlete not found');
      }

      if (params.tournament_id) {
        const tournament = await this.gameRepository.findTournamentById(params.tournament_id, client);
        if (!tournament || tournament.athlete_id !== params.athlete_id) {
          throw new NotFoundError('Tournament not found');
        }
      }

      const season = await this.seasonService.ensureActiveSeason(params.athlete_id, client);
      const game = await this.gameRepository.create(
        { ...params, opponent, season_id: season.id },
        client
      );
      await this.statisticsRepository.create(StatisticsOwner.GAME, game.id, client);

      return game;
    });
  }

  /**
   * Get a game by ID with 404 handling
   *
   * @throws NotFoundError if the game doesn't exist
   */
  async getGame(gameId: string): Promise<Game> {
    const game = await this.gameRepository.findById(gameId);

    if (!game) {
      throw new NotFoundError('Game not found');
    }

    return game;
  }

  async listGames(
    athleteId: string,
    filters: { seasonId?: string; tournamentId?: string } = {}
  ): Promise<Game[]> {
    return this.gameRepository.findByAthleteId(athleteId, filters);
  }

  /**
   * Toggle the live flag of a game that is not complete
   *
   * @throws NotFoundError if the game doesn't exist
   * @throws BadRequestError if the game is already complete
   */
  async markLive(gameId: string, isLive = true): Promise<Game> {
    const game = await this.getGame(gameId);

    if (game.is_complete) {
      throw new BadRequestError('Game is already complete', 'GAME_COMPLETE');
    }

    const updated = await this.gameRepository.setLive(gameId, isLive);
    if (!updated) {
      throw new BadRequestError('Game is already complete', 'GAME_COMPLETE');
    }
    return updated;
  }

  /**
   * Mark a game complete and count it once toward total_games
   *
   * Completing an already complete game returns it unchanged.
   *
   * @throws NotFoundError if the game doesn't exist
   */
  async markComplete(gameId: string): Promise<Game> {
    return transaction(async (client) => {
      const game = await this.gameRepository.findById(gameId, client);
      if (!game) {
        throw new NotFoundError('Game not found');
      }

      const completed = await this.gameRepository.markComplete(gameId, client);
      if (!completed) {
        return game;
      }

      await this.statisticsRepository.increment(
        StatisticsOwner.ATHLETE,
        completed.athlete_id,
        { total_games: 1 },
        client
      );
      await this.statisticsRepository.increment(StatisticsOwner.GAME, completed.id, { total_games: 1 }, client);
      if (completed.season_id) {
        await this.statisticsRepository.increment(
          StatisticsOwner.SEASON,
          completed.season_id,
          { total_games: 1 },
          client
        );
      }

      return completed;
    });
  }

  /**
   * @throws NotFoundError if the game doesn't exist
   */
  async getGameStatistics(gameId: string): Promise<StatisticsWithRates> {
    await this.getGame(gameId);

    const statistics =
      (await this.statisticsRepository.find(StatisticsOwner.GAME, gameId)) ??
      (await this.statisticsRepository.create(StatisticsOwner.GAME, gameId));

    return withRates(statistics);
  }

  /**
   * Create a tournament linked to the athlete's active season
   *
   * @throws BadRequestError if the name is blank
   */
  async createTournament(
    athleteId: string,
    params: { name: string; location?: string; date?: Date }
  ): Promise<Tournament> {
    const name = params.name.trim();
    if (!name) {
      throw new BadRequestError('Tournament name is required', 'INVALID_TOURNAMENT');
    }

    return transaction(async (client) => {
      const athlete = await this.athleteRepository.findById(athleteId, client);
      if (!athlete) {
        throw new NotFoundError('Athlete not found');
      }

      const season = await this.seasonService.ensureActiveSeason(athleteId, client);
      return this.gameRepository.createTournament(
        { athlete_id: athleteId, season_id: season.id, name, location: params.location, date: params.date },
        client
      );
    });
  }
}
