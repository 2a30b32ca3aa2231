/**
 * Practice Repository
 *
 * Data access layer for practice sessions.
 */

import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { queryWith } from '../config/database';
import { Practice, PracticeRow, mapPracticeRow } from '../models/game';

const PRACTICE_COLUMNS = 'id, athlete_id, season_id, date, notes, created_at';

export class PracticeRepository {
  async create(
    params: { athlete_id: string; season_id?: string; date: Date; notes?: string },
    client?: PoolClient
  ): Promise<Practice> {
    const query = `
      INSERT INTO practices (id, athlete_id, season_id, date, notes)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING ${PRACTICE_COLUMNS}
    `;

    const result = await queryWith<PracticeRow>(client, query, [
      uuidv4(),
      params.athlete_id,
      params.season_id ?? null,
      params.date,
      params.notes ?? null,
    ]);
    return mapPracticeRow(result.rows[0]);
  }

  async findById(practiceId: string, client?: PoolClient): Promise<Practice | null> {
    const query = `SELECT ${PRACTICE_COLUMNS} FROM practices WHERE id = $1`;

    const result = await queryWith<PracticeRow>(client, query, [practiceId]);
    return result.rows[0] ? mapPracticeRow(result.rows[0]) : null;
  }

  async findByAthleteId(athleteId: string, client?: PoolClient): Promise<Practice[]> {
    const query = `
      SELECT ${PRACTICE_COLUMNS}
      FROM practices
      WHERE athlete_id = $1
      ORDER BY date DESC
    `;

    const result = await queryWith<PracticeRow>(client, query, [athleteId]);
    return result.rows.map(mapPracticeRow);
  }
}
