/**
 * Athlete Repository
 *
 * Data access layer for athletes. Uses parameterized queries; every method
 * accepts an optional transaction client.
 */

import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { queryWith } from '../config/database';
import { Athlete, AthleteRow, mapAthleteRow } from '../models/athlete';

/**
 * Athlete Repository
 * Provides data access methods for athletes
 */
export class AthleteRepository {
  async create(name: string, client?: PoolClient): Promise<Athlete> {
    const query = `
      INSERT INTO athletes (id, name)
      VALUES ($1, $2)
      RETURNING id, name, created_at, updated_at
    `;

    const result = await queryWith<AthleteRow>(client, query, [uuidv4(), name]);
    return mapAthleteRow(result.rows[0]);
  }

  /**
   * Find an athlete by ID
   *
   * @returns Athlete if found, null otherwise
   */
  async findById(athleteId: string, client?: PoolClient): Promise<Athlete | null> {
    const query = `
      SELECT id, name, created_at, updated_at
      FROM athletes
      WHERE id = $1
    `;

    const result = await queryWith<AthleteRow>(client, query, [athleteId]);
    return result.rows[0] ? mapAthleteRow(result.rows[0]) : null;
  }

  /**
   * Delete an athlete and everything it owns
   *
   * Games, practices, tournaments, seasons, clips and play results cascade
   * through foreign keys. Statistics rows are keyed by owner and are removed
   * explicitly.
   *
   * @returns true when the athlete existed
   */
  async delete(athleteId: string, client?: PoolClient): Promise<boolean> {
    await queryWith(
      client,
      `
      DELETE FROM statistics
      WHERE owner_id = $1
         OR owner_id IN (SELECT id FROM games WHERE athlete_id = $1)
         OR owner_id IN (SELECT id FROM seasons WHERE athlete_id = $1)
      `,
      [athleteId]
    );

    await queryWith(
      client,
      `
      DELETE FROM play_results
      WHERE id IN (SELECT play_result_id FROM video_clips WHERE athlete_id = $1)
      `,
      [athleteId]
    );

    const result = await queryWith(client, 'DELETE FROM athletes WHERE id = $1', [athleteId]);
    return (result.rowCount ?? 0) > 0;
  }
}
