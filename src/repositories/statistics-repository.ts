/**
 * Statistics Repository
 *
 * Counter records keyed by (owner_type, owner_id). Increments are applied in
 * SQL as `column = column + n` so concurrent saves never lose an update.
 * Counters only go down through replace(), which recalculation uses.
 */

import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { queryWith } from '../config/database';
import {
  COUNTER_FIELDS,
  Statistics,
  StatisticsCounters,
  StatisticsDelta,
  StatisticsOwner,
  StatisticsRow,
  mapStatisticsRow,
} from '../models/statistics';
import { nonZeroFields } from '../utils/play-result-statistics';

const STATISTICS_COLUMNS = ['id', 'owner_type', 'owner_id', ...COUNTER_FIELDS, 'updated_at'].join(', ');

/**
 * Statistics Repository
 * Provides data access methods for athlete, game and season counters
 */
export class StatisticsRepository {
  /**
   * Create a zeroed record; an existing record is left untouched
   */
  async create(ownerType: StatisticsOwner, ownerId: string, client?: PoolClient): Promise<Statistics> {
    await queryWith(
      client,
      `
      INSERT INTO statistics (id, owner_type, owner_id)
      VALUES ($1, $2, $3)
      ON CONFLICT (owner_type, owner_id) DO NOTHING
      `,
      [uuidv4(), ownerType, ownerId]
    );

    const statistics = await this.find(ownerType, ownerId, client);
    if (!statistics) {
      throw new Error(`Statistics for ${ownerType} ${ownerId} could not be read back`);
    }
    return statistics;
  }

  async find(ownerType: StatisticsOwner, ownerId: string, client?: PoolClient): Promise<Statistics | null> {
    const query = `
      SELECT ${STATISTICS_COLUMNS}
      FROM statistics
      WHERE owner_type = $1 AND owner_id = $2
    `;

    const result = await queryWith<StatisticsRow>(client, query, [ownerType, ownerId]);
    return result.rows[0] ? mapStatisticsRow(result.rows[0]) : null;
  }

  /**
   * Add a delta to an owner's counters, creating the record if missing
   *
   * @throws Error if the delta contains a negative increment
   */
  async increment(
    ownerType: StatisticsOwner,
    ownerId: string,
    delta: StatisticsDelta,
    client?: PoolClient
  ): Promise<Statistics> {
    const fields = nonZeroFields(delta);

    if (fields.length === 0) {
      return this.create(ownerType, ownerId, client);
    }

    for (const [field, amount] of fields) {
      if (amount < 0 || !Number.isInteger(amount)) {
        throw new Error(`Invalid statistics increment for ${field}: ${amount}`);
      }
    }

    // Column names come from COUNTER_FIELDS, never from input
    const columns = fields.map(([field]) => field);
    const placeholders = fields.map((_, index) => `$${index + 4}`);
    const updates = columns.map((column) => `${column} = statistics.${column} + EXCLUDED.${column}`);

    const query = `
      INSERT INTO statistics (id, owner_type, owner_id, ${columns.join(', ')})
      VALUES ($1, $2, $3, ${placeholders.join(', ')})
      ON CONFLICT (owner_type, owner_id) DO UPDATE
      SET ${updates.join(', ')}, updated_at = NOW()
      RETURNING ${STATISTICS_COLUMNS}
    `;

    const result = await queryWith<StatisticsRow>(client, query, [
      uuidv4(),
      ownerType,
      ownerId,
      ...fields.map(([, amount]) => amount),
    ]);
    return mapStatisticsRow(result.rows[0]);
  }

  /**
   * Overwrite every counter of an owner, creating the record if missing
   *
   * @throws Error if a counter is negative or fractional
   */
  async replace(
    ownerType: StatisticsOwner,
    ownerId: string,
    counters: StatisticsCounters,
    client?: PoolClient
  ): Promise<Statistics> {
    for (const field of COUNTER_FIELDS) {
      const value = counters[field];
      if (value < 0 || !Number.isInteger(value)) {
        throw new Error(`Invalid statistics value for ${field}: ${value}`);
      }
    }

    const placeholders = COUNTER_FIELDS.map((_, index) => `$${index + 4}`);
    const updates = COUNTER_FIELDS.map((column) => `${column} = EXCLUDED.${column}`);

    const query = `
      INSERT INTO statistics (id, owner_type, owner_id, ${COUNTER_FIELDS.join(', ')})
      VALUES ($1, $2, $3, ${placeholders.join(', ')})
      ON CONFLICT (owner_type, owner_id) DO UPDATE
      SET ${updates.join(', ')}, updated_at = NOW()
      RETURNING ${STATISTICS_COLUMNS}
    `;

    const result = await queryWith<StatisticsRow>(client, query, [
      uuidv4(),
      ownerType,
      ownerId,
      ...COUNTER_FIELDS.map((field) => counters[field]),
    ]);
    return mapStatisticsRow(result.rows[0]);
  }
}
