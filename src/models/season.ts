/**
 * Season Models
 *
 * Time-bounded grouping of an athlete's games, practices, tournaments and
 * clips. At most one season per athlete is active; new records are linked to
 * it when they are created.
 */

/**
 * Season entity from database
 */
export interface Season {
  id: string;                    // UUID
  athlete_id: string;            // UUID - Owning athlete
  name: string;                  // Season name (e.g., "Spring 2025")
  start_date: Date;              // Season start date
  end_date?: Date;               // Set when the season is ended
  is_active: boolean;            // Whether season is currently active
  created_at: Date;              // Creation timestamp
  updated_at: Date;              // Last update timestamp
}

/**
 * Season database row (matches PostgreSQL schema)
 */
export interface SeasonRow {
  id: string;
  athlete_id: string;
  name: string;
  start_date: Date;
  end_date: Date | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

/**
 * Convert database row to Season model
 */
export function mapSeasonRow(row: SeasonRow): Season {
  return {
    id: row.id,
    athlete_id: row.athlete_id,
    name: row.name,
    start_date: row.start_date,
    end_date: row.end_date || undefined,
    is_active: row.is_active,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Default season name for a date: Feb-Jun is spring, Jul-Oct is fall,
 * January belongs to the current winter and Nov-Dec to next year's.
 */
export function defaultSeasonName(date: Date): string {
  const year = date.getFullYear();
  const month = date.getMonth() + 1;

  if (month >= 2 && month <= 6) {
    return `Spring ${year}`;
  }
  if (month >= 7 && month <= 10) {
    return `Fall ${year}`;
  }
  if (month === 1) {
    return `Winter ${year}`;
  }
  return `Winter ${year + 1}`;
}
