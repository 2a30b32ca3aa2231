/**
 * Season Repository
 *
 * Data access layer for seasons. At most one season per athlete has
 * is_active = true; a partial unique index in the schema enforces it.
 */

import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { queryWith } from '../config/database';
import { Season, SeasonRow, mapSeasonRow } from '../models/season';

const SEASON_COLUMNS = `
  id,
  athlete_id,
  name,
  start_date,
  end_date,
  is_active,
  created_at,
  updated_at
`;

/**
 * Season Repository
 * Provides data access methods for seasons
 */
export class SeasonRepository {
  /**
   * Find all seasons for an athlete, newest first
   */
  async findByAthleteId(athleteId: string, client?: PoolClient): Promise<Season[]> {
    const query = `
      SELECT ${SEASON_COLUMNS}
      FROM seasons
      WHERE athlete_id = $1
      ORDER BY start_date DESC
    `;

    const result = await queryWith<SeasonRow>(client, query, [athleteId]);
    return result.rows.map(mapSeasonRow);
  }

  /**
   * Find the athlete's active season
   *
   * Locks the row when called inside a transaction so concurrent saves link
   * to the same season.
   */
  async findActive(athleteId: string, client?: PoolClient): Promise<Season | null> {
    const query = `
      SELECT ${SEASON_COLUMNS}
      FROM seasons
      WHERE athlete_id = $1 AND is_active = true
      ${client ? 'FOR UPDATE' : ''}
    `;

    const result = await queryWith<SeasonRow>(client, query, [athleteId]);
    return result.rows[0] ? mapSeasonRow(result.rows[0]) : null;
  }

  /**
   * Serialize season changes for one athlete until the transaction ends
   *
   * FOR UPDATE cannot lock an active season that does not exist yet, so
   * concurrent first saves would both insert one.
   */
  async lockAthlete(athleteId: string, client: PoolClient): Promise<void> {
    await queryWith(client, 'SELECT pg_advisory_xact_lock(hashtext($1))', [athleteId]);
  }

  async findById(seasonId: string, client?: PoolClient): Promise<Season | null> {
    const query = `
      SELECT ${SEASON_COLUMNS}
      FROM seasons
      WHERE id = $1
    `;

    const result = await queryWith<SeasonRow>(client, query, [seasonId]);
    return result.rows[0] ? mapSeasonRow(result.rows[0]) : null;
  }

  /**
   * Insert a new active season
   */
  async create(
    params: { athlete_id: string; name: string; start_date: Date },
    client?: PoolClient
  ): Promise<Season> {
    const query = `
      INSERT INTO seasons (id, athlete_id, name, start_date, is_active)
      VALUES ($1, $2, $3, $4, true)
      RETURNING ${SEASON_COLUMNS}
    `;

    const result = await queryWith<SeasonRow>(client, query, [
      uuidv4(),
      params.athlete_id,
      params.name,
      params.start_date,
    ]);
    return mapSeasonRow(result.rows[0]);
  }

  /**
   * Close a season
   *
   * @returns The ended season, or null if it was not active
   */
  async deactivate(seasonId: string, endDate: Date, client?: PoolClient): Promise<Season | null> {
    const query = `
      UPDATE seasons
      SET is_active = false, end_date = $2, updated_at = NOW()
      WHERE id = $1 AND is_active = true
      RETURNING ${SEASON_COLUMNS}
    `;

    const result = await queryWith<SeasonRow>(client, query, [seasonId, endDate]);
    return result.rows[0] ? mapSeasonRow(result.rows[0]) : null;
  }
}
