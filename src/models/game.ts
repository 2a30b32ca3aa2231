/**
 * Game, Practice and Tournament Models
 *
 * Scheduling/context records an athlete creates. Games carry live/complete
 * flags and own a statistics record.
 */

/**
 * Game entity from database
 */
export interface Game {
  id: string;                    // UUID
  athlete_id: string;            // UUID - Owning athlete
  season_id?: string;            // UUID - Season active at creation
  tournament_id?: string;        // UUID - Optional tournament
  opponent: string;
  location?: string;
  date: Date;                    // Game date
  is_live: boolean;
  is_complete: boolean;
  created_at: Date;
  updated_at: Date;
}

/**
 * Game database row (matches PostgreSQL schema)
 */
export interface GameRow {
  id: string;
  athlete_id: string;
  season_id: string | null;
  tournament_id: string | null;
  opponent: string;
  location: string | null;
  date: Date;
  is_live: boolean;
  is_complete: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface CreateGameParams {
  athlete_id: string;
  opponent: string;
  date: Date;
  location?: string;
  tournament_id?: string;
}

/**
 * Convert database row to Game model
 */
export function mapGameRow(row: GameRow): Game {
  return {
    id: row.id,
    athlete_id: row.athlete_id,
    season_id: row.season_id || undefined,
    tournament_id: row.tournament_id || undefined,
    opponent: row.opponent,
    location: row.location || undefined,
    date: row.date,
    is_live: row.is_live,
    is_complete: row.is_complete,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Practice entity from database
 */
export interface Practice {
  id: string;
  athlete_id: string;
  season_id?: string;
  date: Date;
  notes?: string;
  created_at: Date;
}

export interface PracticeRow {
  id: string;
  athlete_id: string;
  season_id: string | null;
  date: Date;
  notes: string | null;
  created_at: Date;
}

export function mapPracticeRow(row: PracticeRow): Practice {
  return {
    id: row.id,
    athlete_id: row.athlete_id,
    season_id: row.season_id || undefined,
    date: row.date,
    notes: row.notes || undefined,
    created_at: row.created_at,
  };
}

/**
 * Tournament entity from database
 */
export interface Tournament {
  id: string;
  athlete_id: string;
  season_id?: string;
  name: string;
  location?: string;
  date?: Date;
  is_active: boolean;
  created_at: Date;
}

export interface TournamentRow {
  id: string;
  athlete_id: string;
  season_id: string | null;
  name: string;
  location: string | null;
  date: Date | null;
  is_active: boolean;
  created_at: Date;
}

export function mapTournamentRow(row: TournamentRow): Tournament {
  return {
    id: row.id,
    athlete_id: row.athlete_id,
    season_id: row.season_id || undefined,
    name: row.name,
    location: row.location || undefined,
    date: row.date || undefined,
    is_active: row.is_active,
    created_at: row.created_at,
  };
}
