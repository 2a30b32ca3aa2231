/**
 * Video Clip Models
 *
 * A clip references a video file in the app's documents directory, an
 * optional thumbnail, an optional play result and its game/practice/season
 * context.
 */

import { PlayResult, PlayResultType, mapPlayResultRow } from './play-result';

/**
 * Video clip entity from database
 */
export interface VideoClip {
  id: string;                    // UUID
  athlete_id: string;            // UUID - Owning athlete
  season_id?: string;            // UUID - Season active when saved
  game_id?: string;
  practice_id?: string;
  file_name: string;             // UUID-based file name
  file_path: string;             // Absolute path in permanent storage
  thumbnail_path?: string;
  duration_seconds?: number;
  is_highlight: boolean;
  play_result?: PlayResult;
  created_at: Date;
}

/**
 * Video clip row joined with its play result
 */
export interface VideoClipRow {
  id: string;
  athlete_id: string;
  season_id: string | null;
  game_id: string | null;
  practice_id: string | null;
  play_result_id: string | null;
  file_name: string;
  file_path: string;
  thumbnail_path: string | null;
  duration_seconds: string | number | null;
  is_highlight: boolean;
  created_at: Date;
  play_result_type: string | null;
  play_result_pitch_speed: string | number | null;
  play_result_created_at: Date | null;
}

/**
 * Values inserted for a new clip
 */
export interface CreateVideoClipParams {
  athlete_id: string;
  season_id?: string;
  game_id?: string;
  practice_id?: string;
  play_result_id?: string;
  file_name: string;
  file_path: string;
  duration_seconds?: number;
  is_highlight: boolean;
}

/**
 * Filters for listing clips
 */
export interface VideoClipFilters {
  seasonId?: string;
  gameId?: string;
  practiceId?: string;
  highlightsOnly?: boolean;
}

/**
 * Request accepted by the persistence service
 */
export interface SaveClipRequest {
  sourcePath: string;
  athleteId: string;
  gameId?: string;
  practiceId?: string;
  playResult?: PlayResultType;
  pitchSpeed?: number;
  durationSeconds?: number;
}

/**
 * Result of a thumbnail task; failures are reported, never thrown
 */
export type ThumbnailOutcome =
  | { status: 'attached'; clipId: string; thumbnailPath: string }
  | { status: 'failed'; clipId: string; error: string }
  | { status: 'cancelled'; clipId: string };

/**
 * Convert joined database row to VideoClip model
 */
export function mapVideoClipRow(row: VideoClipRow): VideoClip {
  const clip: VideoClip = {
    id: row.id,
    athlete_id: row.athlete_id,
    season_id: row.season_id || undefined,
    game_id: row.game_id || undefined,
    practice_id: row.practice_id || undefined,
    file_name: row.file_name,
    file_path: row.file_path,
    thumbnail_path: row.thumbnail_path || undefined,
    duration_seconds: row.duration_seconds === null ? undefined : Number(row.duration_seconds),
    is_highlight: row.is_highlight,
    created_at: row.created_at,
  };

  if (row.play_result_id && row.play_result_type && row.play_result_created_at) {
    clip.play_result = mapPlayResultRow({
      id: row.play_result_id,
      type: row.play_result_type,
      pitch_speed: row.play_result_pitch_speed,
      created_at: row.play_result_created_at,
    });
  }

  return clip;
}
