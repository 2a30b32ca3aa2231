/**
 * Clip Schema Migration (V001)
 *
 * Creates the object graph behind the capture-to-persistence pipeline.
 *
 * Tables created:
 * - athletes: Clip owners
 * - seasons: Time-bounded groupings, at most one active per athlete
 * - tournaments: Optional grouping of games
 * - games / practices: Context records clips are linked to
 * - play_results: Outcome tag of one at-bat or pitch event
 * - video_clips: References to video and thumbnail files on disk
 * - statistics: Counter records owned by an athlete, game or season
 */

import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';
import { COUNTER_FIELDS } from '../src/models/statistics';
import { PLAY_RESULT_TYPES } from '../src/models/play-result';

export const shorthands: ColumnDefinitions | undefined = undefined;

const timestamps = (pgm: MigrationBuilder) => ({
  created_at: {
    type: 'timestamp',
    notNull: true,
    default: pgm.func('NOW()'),
  },
  updated_at: {
    type: 'timestamp',
    notNull: true,
    default: pgm.func('NOW()'),
  },
});

export async function up(pgm: MigrationBuilder): Promise<void> {
  // Create athletes table
  pgm.createTable('athletes', {
    id: { type: 'uuid', primaryKey: true },
    name: { type: 'varchar(255)', notNull: true },
    ...timestamps(pgm),
  });

  // Create seasons table
  pgm.createTable('seasons', {
    id: { type: 'uuid', primaryKey: true },
    athlete_id: {
      type: 'uuid',
      notNull: true,
      references: 'athletes(id)',
      onDelete: 'CASCADE',
    },
    name: { type: 'varchar(100)', notNull: true },
    start_date: { type: 'timestamp', notNull: true },
    end_date: { type: 'timestamp' },
    is_active: { type: 'boolean', notNull: true, default: true },
    ...timestamps(pgm),
  });

  pgm.createIndex('seasons', 'athlete_id');
  pgm.createIndex('seasons', 'athlete_id', {
    name: 'uq_seasons_one_active_per_athlete',
    unique: true,
    where: 'is_active = true',
  });

  // Create tournaments table
  pgm.createTable('tournaments', {
    id: { type: 'uuid', primaryKey: true },
    athlete_id: {
      type: 'uuid',
      notNull: true,
      references: 'athletes(id)',
      onDelete: 'CASCADE',
    },
    season_id: {
      type: 'uuid',
      references: 'seasons(id)',
      onDelete: 'SET NULL',
    },
    name: { type: 'varchar(255)', notNull: true },
    location: { type: 'varchar(255)' },
    date: { type: 'timestamp' },
    is_active: { type: 'boolean', notNull: true, default: true },
    created_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createIndex('tournaments', 'athlete_id');

  // Create games table
  pgm.createTable('games', {
    id: { type: 'uuid', primaryKey: true },
    athlete_id: {
      type: 'uuid',
      notNull: true,
      references: 'athletes(id)',
      onDelete: 'CASCADE',
    },
    season_id: {
      type: 'uuid',
      references: 'seasons(id)',
      onDelete: 'SET NULL',
    },
    tournament_id: {
      type: 'uuid',
      references: 'tournaments(id)',
      onDelete: 'SET NULL',
    },
    opponent: { type: 'varchar(255)', notNull: true },
    location: { type: 'varchar(255)' },
    date: { type: 'timestamp', notNull: true },
    is_live: { type: 'boolean', notNull: true, default: false },
    is_complete: { type: 'boolean', notNull: true, default: false },
    ...timestamps(pgm),
  });

  pgm.createIndex('games', 'athlete_id');
  pgm.createIndex('games', 'season_id');

  // Create practices table
  pgm.createTable('practices', {
    id: { type: 'uuid', primaryKey: true },
    athlete_id: {
      type: 'uuid',
      notNull: true,
      references: 'athletes(id)',
      onDelete: 'CASCADE',
    },
    season_id: {
      type: 'uuid',
      references: 'seasons(id)',
      onDelete: 'SET NULL',
    },
    date: { type: 'timestamp', notNull: true },
    notes: { type: 'text' },
    created_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createIndex('practices', 'athlete_id');

  // Create play_results table
  pgm.createTable('play_results', {
    id: { type: 'uuid', primaryKey: true },
    type: {
      type: 'varchar(20)',
      notNull: true,
      check: `type IN (${PLAY_RESULT_TYPES.map((type) => `'${type}'`).join(', ')})`,
    },
    pitch_speed: {
      type: 'numeric(4,1)',
      check: 'pitch_speed IS NULL OR (pitch_speed > 0 AND pitch_speed <= 120)',
    },
    created_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  // Create video_clips table
  pgm.createTable('video_clips', {
    id: { type: 'uuid', primaryKey: true },
    athlete_id: {
      type: 'uuid',
      notNull: true,
      references: 'athletes(id)',
      onDelete: 'CASCADE',
    },
    season_id: {
      type: 'uuid',
      references: 'seasons(id)',
      onDelete: 'SET NULL',
    },
    game_id: {
      type: 'uuid',
      references: 'games(id)',
      onDelete: 'SET NULL',
    },
    practice_id: {
      type: 'uuid',
      references: 'practices(id)',
      onDelete: 'SET NULL',
    },
    play_result_id: {
      type: 'uuid',
      references: 'play_results(id)',
      onDelete: 'SET NULL',
    },
    file_name: { type: 'varchar(255)', notNull: true },
    file_path: { type: 'text', notNull: true },
    thumbnail_path: { type: 'text' },
    duration_seconds: { type: 'numeric(8,3)' },
    is_highlight: { type: 'boolean', notNull: true, default: false },
    created_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.addConstraint('video_clips', 'chk_video_clips_single_context', {
    check: 'game_id IS NULL OR practice_id IS NULL',
  });

  pgm.createIndex('video_clips', ['athlete_id', 'created_at']);
  pgm.createIndex('video_clips', 'game_id');
  pgm.createIndex('video_clips', 'season_id');

  // Create statistics table; one counter column per field
  const counterColumns: ColumnDefinitions = {};
  for (const field of COUNTER_FIELDS) {
    counterColumns[field] = { type: 'integer', notNull: true, default: 0 };
  }

  pgm.createTable('statistics', {
    id: { type: 'uuid', primaryKey: true },
    owner_type: {
      type: 'varchar(20)',
      notNull: true,
      check: "owner_type IN ('athlete', 'game', 'season')",
    },
    owner_id: { type: 'uuid', notNull: true },
    ...counterColumns,
    updated_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.addConstraint('statistics', 'uq_statistics_owner', {
    unique: ['owner_type', 'owner_id'],
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  // Drop tables in reverse order to respect foreign key constraints
  pgm.dropTable('statistics', { cascade: true });
  pgm.dropTable('video_clips', { cascade: true });
  pgm.dropTable('play_results', { cascade: true });
  pgm.dropTable('practices', { cascade: true });
  pgm.dropTable('games', { cascade: true });
  pgm.dropTable('tournaments', { cascade: true });
  pgm.dropTable('seasons', { cascade: true });
  pgm.dropTable('athletes', { cascade: true });
}
