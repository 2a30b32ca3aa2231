/**
 * Season Repository Tests
 */

import { PoolClient } from 'pg';
import { SeasonRepository } from '../../src/repositories/season-repository';
import * as database from '../../src/config/database';

jest.mock('../../src/config/database');

const mockQueryWith = database.queryWith as jest.MockedFunction<typeof database.queryWith>;

const seasonRow = {
  id: 'season-1',
  athlete_id: 'athlete-1',
  name: 'Spring 2025',
  start_date: new Date('2025-02-01'),
  end_date: null,
  is_active: true,
  created_at: new Date('2025-02-01'),
  updated_at: new Date('2025-02-01'),
};

function rows<T>(values: T[]): any {
  return { rows: values, rowCount: values.length, command: 'SELECT', oid: 0, fields: [] };
}

describe('SeasonRepository', () => {
  let repository: SeasonRepository;

  beforeEach(() => {
    repository = new SeasonRepository();
    jest.clearAllMocks();
  });

  describe('findActive', () => {
    it('should lock the active season inside a transaction', async () => {
      const client = {} as PoolClient;
      mockQueryWith.mockResolvedValue(rows([seasonRow]));

      const season = await repository.findActive('athlete-1', client);

      const [usedClient, query, params] = mockQueryWith.mock.calls[0];
      expect(usedClient).toBe(client);
      expect(query).toContain('WHERE athlete_id = $1 AND is_active = true');
      expect(query).toContain('FOR UPDATE');
      expect(params).toEqual(['athlete-1']);
      expect(season?.end_date).toBeUndefined();
    });

    it('should not lock outside a transaction', async () => {
      mockQueryWith.mockResolvedValue(rows([]));

      await expect(repository.findActive('athlete-1')).resolves.toBeNull();
      expect(mockQueryWith.mock.calls[0][1]).not.toContain('FOR UPDATE');
    });
  });

  describe('lockAthlete', () => {
    it('should take a transaction-scoped advisory lock on the athlete', async () => {
      const client = {} as PoolClient;
      mockQueryWith.mockResolvedValue(rows([]));

      await repository.lockAthlete('athlete-1', client);

      expect(mockQueryWith).toHaveBeenCalledWith(
        client,
        'SELECT pg_advisory_xact_lock(hashtext($1))',
        ['athlete-1']
      );
    });
  });

  describe('deactivate', () => {
    it('should only end an active season', async () => {
      const endDate = new Date('2025-06-30');
      mockQueryWith.mockResolvedValue(rows([{ ...seasonRow, is_active: false, end_date: endDate }]));

      const season = await repository.deactivate('season-1', endDate);

      expect(mockQueryWith.mock.calls[0][1]).toContain('WHERE id = $1 AND is_active = true');
      expect(mockQueryWith.mock.calls[0][2]).toEqual(['season-1', endDate]);
      expect(season?.is_active).toBe(false);
      expect(season?.end_date).toBe(endDate);
    });

    it('should return null when the season was already ended', async () => {
      mockQueryWith.mockResolvedValue(rows([]));

      await expect(repository.deactivate('season-1', new Date())).resolves.toBeNull();
    });
  });

  describe('findByAthleteId', () => {
    it('should order seasons newest first', async () => {
      mockQueryWith.mockResolvedValue(rows([seasonRow]));

      const seasons = await repository.findByAthleteId('athlete-1');

      expect(mockQueryWith.mock.calls[0][1]).toContain('ORDER BY start_date DESC');
      expect(seasons).toHaveLength(1);
      expect(seasons[0].name).toBe('Spring 2025');
    });
  });
});
