/**
 * Game Repository
 *
 * Data access layer for games and the tournaments that group them.
 */

import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { queryWith } from '../config/database';
import {
  CreateGameParams,
  Game,
  GameRow,
  Tournament,
  TournamentRow,
  mapGameRow,
  mapTournamentRow,
} from '../models/game';

const GAME_COLUMNS = `
  id,
  athlete_id,
  season_id,
  tournament_id,
  opponent,
  location,
  date,
  is_live,
  is_complete,
  created_at,
  updated_at
`;

const TOURNAMENT_COLUMNS = `
  id,
  athlete_id,
  season_id,
  name,
  location,
  date,
  is_active,
  created_at
`;

/**
 * Game Repository
 * Provides data access methods for games and tournaments
 */
export class GameRepository {
  async create(
    params: CreateGameParams & { season_id?: string },
    client?: PoolClient
  ): Promise<Game> {
    const query = `
      INSERT INTO games (id, athlete_id, season_id, tournament_id, opponent, location, date)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${GAME_COLUMNS}
    `;

    const result = await queryWith<GameRow>(client, query, [
      uuidv4(),
      params.athlete_id,
      params.season_id ?? null,
      params.tournament_id ?? null,
      params.opponent,
      params.location ?? null,
      params.date,
    ]);
    return mapGameRow(result.rows[0]);
  }

  /**
   * Find a game by ID
   *
   * @returns Game if found, null otherwise
   */
  async findById(gameId: string, client?: PoolClient): Promise<Game | null> {
    const query = `
      SELECT ${GAME_COLUMNS}
      FROM games
      WHERE id = $1
    `;

    const result = await queryWith<GameRow>(client, query, [gameId]);
    return result.rows[0] ? mapGameRow(result.rows[0]) : null;
  }

  /**
   * Find games for an athlete, most recent first
   */
  async findByAthleteId(
    athleteId: string,
    filters: { seasonId?: string; tournamentId?: string } = {},
    client?: PoolClient
  ): Promise<Game[]> {
    const params: unknown[] = [athleteId];
    let query = `
      SELECT ${GAME_COLUMNS}
      FROM games
      WHERE athlete_id = $1
    `;

    if (filters.seasonId) {
      params.push(filters.seasonId);
      query += ` AND season_id = $${params.length}`;
    }

    if (filters.tournamentId) {
      params.push(filters.tournamentId);
      query += ` AND tournament_id = $${params.length}`;
    }

    query += ' ORDER BY date DESC';

    const result = await queryWith<GameRow>(client, query, params);
    return result.rows.map(mapGameRow);
  }

  async setLive(gameId: string, isLive: boolean, client?: PoolClient): Promise<Game | null> {
    const query = `
      UPDATE games
      SET is_live = $2, updated_at = NOW()
      WHERE id = $1 AND is_complete = false
      RETURNING ${GAME_COLUMNS}
    `;

    const result = await queryWith<GameRow>(client, query, [gameId, isLive]);
    return result.rows[0] ? mapGameRow(result.rows[0]) : null;
  }

  /**
   * Mark a game complete
   *
   * @returns The updated game, or null when it was already complete
   */
  async markComplete(gameId: string, client?: PoolClient): Promise<Game | null> {
    const query = `
      UPDATE games
      SET is_complete = true, is_live = false, updated_at = NOW()
      WHERE id = $1 AND is_complete = false
      RETURNING ${GAME_COLUMNS}
    `;

    const result = await queryWith<GameRow>(client, query, [gameId]);
    return result.rows[0] ? mapGameRow(result.rows[0]) : null;
  }

  async createTournament(
    params: { athlete_id: string; season_id?: string; name: string; location?: string; date?: Date },
    client?: PoolClient
  ): Promise<Tournament> {
    const query = `
      INSERT INTO tournaments (id, athlete_id, season_id, name, location, date)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${TOURNAMENT_COLUMNS}
    `;

    const result = await queryWith<TournamentRow>(client, query, [
      uuidv4(),
      params.athlete_id,
      params.season_id ?? null,
      params.name,
      params.location ?? null,
      params.date ?? null,
    ]);
    return mapTournamentRow(result.rows[0]);
  }

  async findTournamentById(tournamentId: string, client?: PoolClient): Promise<Tournament | null> {
    const query = `
      SELECT ${TOURNAMENT_COLUMNS}
      FROM tournaments
      WHERE id = $1
    `;

    const result = await queryWith<TournamentRow>(client, query, [tournamentId]);
    return result.rows[0] ? mapTournamentRow(result.rows[0]) : null;
  }
}
