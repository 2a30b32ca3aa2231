/**
 * Play Result Models
 *
 * Enumerated outcome of one at-bat or pitch event, attached to a clip.
 */

/**
 * Play result types
 */
export enum PlayResultType {
  SINGLE = 'single',
  DOUBLE = 'double',
  TRIPLE = 'triple',
  HOME_RUN = 'home_run',
  WALK = 'walk',
  STRIKEOUT = 'strikeout',
  GROUND_OUT = 'ground_out',
  FLY_OUT = 'fly_out',
  BALL = 'ball',
  STRIKE = 'strike',
  HIT_BY_PITCH = 'hit_by_pitch',
  WILD_PITCH = 'wild_pitch',
}

export const PLAY_RESULT_TYPES: readonly PlayResultType[] = Object.values(PlayResultType);

/**
 * Upper bound accepted for a recorded pitch speed (mph)
 */
export const MAX_PITCH_SPEED_MPH = 120;

const HIT_BASES: Partial<Record<PlayResultType, number>> = {
  [PlayResultType.SINGLE]: 1,
  [PlayResultType.DOUBLE]: 2,
  [PlayResultType.TRIPLE]: 3,
  [PlayResultType.HOME_RUN]: 4,
};

const AT_BAT_OUTS: readonly PlayResultType[] = [
  PlayResultType.STRIKEOUT,
  PlayResultType.GROUND_OUT,
  PlayResultType.FLY_OUT,
];

const PITCH_EVENTS: readonly PlayResultType[] = [
  PlayResultType.BALL,
  PlayResultType.STRIKE,
  PlayResultType.HIT_BY_PITCH,
  PlayResultType.WILD_PITCH,
];

const DISPLAY_NAMES: Record<PlayResultType, string> = {
  [PlayResultType.SINGLE]: 'Single',
  [PlayResultType.DOUBLE]: 'Double',
  [PlayResultType.TRIPLE]: 'Triple',
  [PlayResultType.HOME_RUN]: 'Home Run',
  [PlayResultType.WALK]: 'Walk',
  [PlayResultType.STRIKEOUT]: 'Strikeout',
  [PlayResultType.GROUND_OUT]: 'Ground Out',
  [PlayResultType.FLY_OUT]: 'Fly Out',
  [PlayResultType.BALL]: 'Ball',
  [PlayResultType.STRIKE]: 'Strike',
  [PlayResultType.HIT_BY_PITCH]: 'Hit By Pitch',
  [PlayResultType.WILD_PITCH]: 'Wild Pitch',
};

export function isHit(type: PlayResultType): boolean {
  return HIT_BASES[type] !== undefined;
}

/**
 * Bases reached on the play (0 for anything that is not a hit)
 */
export function basesFor(type: PlayResultType): number {
  return HIT_BASES[type] ?? 0;
}

/**
 * Hits are flagged as highlights when the clip is saved
 */
export function isHighlight(type: PlayResultType): boolean {
  return isHit(type);
}

export function countsAsAtBat(type: PlayResultType): boolean {
  return isHit(type) || AT_BAT_OUTS.includes(type);
}

export function isPitchEvent(type: PlayResultType): boolean {
  return PITCH_EVENTS.includes(type);
}

export function displayName(type: PlayResultType): string {
  return DISPLAY_NAMES[type];
}

export function isPlayResultType(value: unknown): value is PlayResultType {
  return typeof value === 'string' && (PLAY_RESULT_TYPES as readonly string[]).includes(value);
}

/**
 * Play result entity from database
 */
export interface PlayResult {
  id: string;                    // UUID
  type: PlayResultType;
  pitch_speed?: number;          // mph, pitch events only in practice
  created_at: Date;
}

/**
 * Play result database row (matches PostgreSQL schema)
 */
export interface PlayResultRow {
  id: string;
  type: string;
  pitch_speed: string | number | null;
  created_at: Date;
}

/**
 * Convert database row to PlayResult model
 *
 * NUMERIC columns come back from pg as strings.
 */
export function mapPlayResultRow(row: PlayResultRow): PlayResult {
  if (!isPlayResultType(row.type)) {
    throw new Error(`Unknown play result type: ${row.type}`);
  }

  return {
    id: row.id,
    type: row.type,
    pitch_speed: row.pitch_speed === null ? undefined : Number(row.pitch_speed),
    created_at: row.created_at,
  };
}
