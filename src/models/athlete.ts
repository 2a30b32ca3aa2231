/**
 * Athlete Models
 *
 * An athlete owns games, practices, tournaments, seasons, clips and an
 * aggregate statistics record.
 */

/**
 * Athlete entity from database
 */
export interface Athlete {
  id: string;                    // UUID
  name: string;
  created_at: Date;
  updated_at: Date;
}

/**
 * Athlete database row (matches PostgreSQL schema)
 */
export interface AthleteRow {
  id: string;
  name: string;
  created_at: Date;
  updated_at: Date;
}

/**
 * Convert database row to Athlete model
 */
export function mapAthleteRow(row: AthleteRow): Athlete {
  return {
    id: row.id,
    name: row.name,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}
