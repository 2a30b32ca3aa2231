/**
 * Video Clip Repository
 *
 * Data access layer for clips and their play results. Clip reads join the
 * play result so callers get the complete record in one query.
 */

import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { queryWith } from '../config/database';
import { PlayResult, PlayResultRow, PlayResultType, mapPlayResultRow } from '../models/play-result';
import {
  CreateVideoClipParams,
  VideoClip,
  VideoClipFilters,
  VideoClipRow,
  mapVideoClipRow,
} from '../models/video-clip';

const CLIP_SELECT = `
  SELECT
    c.id,
    c.athlete_id,
    c.season_id,
    c.game_id,
    c.practice_id,
    c.play_result_id,
    c.file_name,
    c.file_path,
    c.thumbnail_path,
    c.duration_seconds,
    c.is_highlight,
    c.created_at,
    p.type AS play_result_type,
    p.pitch_speed AS play_result_pitch_speed,
    p.created_at AS play_result_created_at
  FROM video_clips c
  LEFT JOIN play_results p ON p.id = c.play_result_id
`;

/**
 * Video Clip Repository
 * Provides data access methods for clips and play results
 */
export class VideoClipRepository {
  async insertPlayResult(
    params: { type: PlayResultType; pitch_speed?: number },
    client?: PoolClient
  ): Promise<PlayResult> {
    const query = `
      INSERT INTO play_results (id, type, pitch_speed)
      VALUES ($1, $2, $3)
      RETURNING id, type, pitch_speed, created_at
    `;

    const result = await queryWith<PlayResultRow>(client, query, [
      uuidv4(),
      params.type,
      params.pitch_speed ?? null,
    ]);
    return mapPlayResultRow(result.rows[0]);
  }

  /**
   * Insert a clip
   *
   * @returns The new clip, re-read with its play result joined
   */
  async insert(params: CreateVideoClipParams, client?: PoolClient): Promise<VideoClip> {
    const id = uuidv4();
    const query = `
      INSERT INTO video_clips (
        id, athlete_id, season_id, game_id, practice_id, play_result_id,
        file_name, file_path, duration_seconds, is_highlight
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
    `;

    await queryWith(client, query, [
      id,
      params.athlete_id,
      params.season_id ?? null,
      params.game_id ?? null,
      params.practice_id ?? null,
      params.play_result_id ?? null,
      params.file_name,
      params.file_path,
      params.duration_seconds ?? null,
      params.is_highlight,
    ]);

    const clip = await this.findById(id, client);
    if (!clip) {
      throw new Error(`Inserted clip ${id} could not be read back`);
    }
    return clip;
  }

  async findById(clipId: string, client?: PoolClient): Promise<VideoClip | null> {
    const result = await queryWith<VideoClipRow>(client, `${CLIP_SELECT} WHERE c.id = $1`, [clipId]);
    return result.rows[0] ? mapVideoClipRow(result.rows[0]) : null;
  }

  /**
   * Find an athlete's clips, newest first
   */
  async findByAthleteId(
    athleteId: string,
    filters: VideoClipFilters = {},
    client?: PoolClient
  ): Promise<VideoClip[]> {
    const params: unknown[] = [athleteId];
    let query = `${CLIP_SELECT} WHERE c.athlete_id = $1`;

    if (filters.seasonId) {
      params.push(filters.seasonId);
      query += ` AND c.season_id = $${params.length}`;
    }

    if (filters.gameId) {
      params.push(filters.gameId);
      query += ` AND c.game_id = $${params.length}`;
    }

    if (filters.practiceId) {
      params.push(filters.practiceId);
      query += ` AND c.practice_id = $${params.length}`;
    }

    if (filters.highlightsOnly) {
      query += ' AND c.is_highlight = true';
    }

    query += ' ORDER BY c.created_at DESC';

    const result = await queryWith<VideoClipRow>(client, query, params);
    return result.rows.map(mapVideoClipRow);
  }

  /**
   * @returns true when the clip still exists
   */
  async updateThumbnail(clipId: string, thumbnailPath: string, client?: PoolClient): Promise<boolean> {
    const result = await queryWith(
      client,
      'UPDATE video_clips SET thumbnail_path = $2 WHERE id = $1',
      [clipId, thumbnailPath]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async setHighlight(clipId: string, isHighlight: boolean, client?: PoolClient): Promise<VideoClip | null> {
    const result = await queryWith(
      client,
      'UPDATE video_clips SET is_highlight = $2 WHERE id = $1',
      [clipId, isHighlight]
    );
    if ((result.rowCount ?? 0) === 0) {
      return null;
    }
    return this.findById(clipId, client);
  }

  /**
   * Delete a clip and its play result
   *
   * @returns true when the clip existed
   */
  async delete(clipId: string, client?: PoolClient): Promise<boolean> {
    const result = await queryWith<{ play_result_id: string | null }>(
      client,
      'DELETE FROM video_clips WHERE id = $1 RETURNING play_result_id',
      [clipId]
    );

    const row = result.rows[0];
    if (!row) {
      return false;
    }

    if (row.play_result_id) {
      await queryWith(client, 'DELETE FROM play_results WHERE id = $1', [row.play_result_id]);
    }
    return true;
  }
}
