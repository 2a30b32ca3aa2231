/**
 * Statistics Models
 *
 * Counter records owned by an athlete, a game or a season. Counters are
 * incremented one play result at a time; rate stats are derived on read.
 */

/**
 * Owners of a statistics record
 */
export enum StatisticsOwner {
  ATHLETE = 'athlete',
  GAME = 'game',
  SEASON = 'season',
}

/**
 * Counter fields, in column order
 */
export const COUNTER_FIELDS = [
  'total_games',
  'at_bats',
  'hits',
  'doubles',
  'triples',
  'home_runs',
  'runs',
  'rbis',
  'walks',
  'strikeouts',
  'ground_outs',
  'fly_outs',
  'total_pitches',
  'balls',
  'strikes',
  'hit_by_pitches',
  'wild_pitches',
] as const;

export type CounterField = (typeof COUNTER_FIELDS)[number];

export type StatisticsCounters = Record<CounterField, number>;

/**
 * Increment applied to a counter record; missing fields mean +0
 */
export type StatisticsDelta = Partial<StatisticsCounters>;

/**
 * Statistics entity from database
 */
export interface Statistics extends StatisticsCounters {
  id: string;                    // UUID
  owner_type: StatisticsOwner;
  owner_id: string;              // UUID of the athlete, game or season
  updated_at: Date;
}

/**
 * Statistics database row (matches PostgreSQL schema)
 */
export interface StatisticsRow extends StatisticsCounters {
  id: string;
  owner_type: string;
  owner_id: string;
  updated_at: Date;
}

/**
 * Rate stats computed from counters
 */
export interface RateStatistics {
  batting_average: number;
  on_base_percentage: number;
  slugging_percentage: number;
  /** On-base plus slugging */
  ops: number;
  strike_percentage: number;
}

export type StatisticsWithRates = Statistics & RateStatistics;

export function emptyCounters(): StatisticsCounters {
  return {
    total_games: 0,
    at_bats: 0,
    hits: 0,
    doubles: 0,
    triples: 0,
    home_runs: 0,
    runs: 0,
    rbis: 0,
    walks: 0,
    strikeouts: 0,
    ground_outs: 0,
    fly_outs: 0,
    total_pitches: 0,
    balls: 0,
    strikes: 0,
    hit_by_pitches: 0,
    wild_pitches: 0,
  };
}

function isStatisticsOwner(value: string): value is StatisticsOwner {
  return (Object.values(StatisticsOwner) as string[]).includes(value);
}

/**
 * Convert database row to Statistics model
 */
export function mapStatisticsRow(row: StatisticsRow): Statistics {
  if (!isStatisticsOwner(row.owner_type)) {
    throw new Error(`Unknown statistics owner: ${row.owner_type}`);
  }

  const counters = emptyCounters();
  for (const field of COUNTER_FIELDS) {
    counters[field] = Number(row[field]);
  }

  return {
    id: row.id,
    owner_type: row.owner_type,
    owner_id: row.owner_id,
    updated_at: row.updated_at,
    ...counters,
  };
}
