/**
 * In-memory stand-ins for the PostgreSQL repositories
 *
 * Each fake implements the same methods as its repository over shared
 * in-memory tables. runTransaction() snapshots the tables and restores them
 * when the callback throws, so rollback behaves as it does in PostgreSQL.
 */

import { PoolClient } from 'pg';
import { Athlete } from '../../src/models/athlete';
import { Season } from '../../src/models/season';
import { CreateGameParams, Game, Practice, Tournament } from '../../src/models/game';
import { PlayResult, PlayResultType } from '../../src/models/play-result';
import {
  COUNTER_FIELDS,
  Statistics,
  StatisticsCounters,
  StatisticsDelta,
  StatisticsOwner,
  emptyCounters,
} from '../../src/models/statistics';
import { CreateVideoClipParams, VideoClip, VideoClipFilters } from '../../src/models/video-clip';
import { AthleteRepository } from '../../src/repositories/athlete-repository';
import { GameRepository } from '../../src/repositories/game-repository';
import { PracticeRepository } from '../../src/repositories/practice-repository';
import { SeasonRepository } from '../../src/repositories/season-repository';
import { StatisticsRepository } from '../../src/repositories/statistics-repository';
import { VideoClipRepository } from '../../src/repositories/video-clip-repository';

interface Tables {
  athletes: Athlete[];
  seasons: Season[];
  games: Game[];
  practices: Practice[];
  tournaments: Tournament[];
  playResults: PlayResult[];
  clips: Array<Omit<VideoClip, 'play_result'> & { play_result_id?: string }>;
  statistics: Statistics[];
}

const emptyTables = (): Tables => ({
  athletes: [],
  seasons: [],
  games: [],
  practices: [],
  tournaments: [],
  playResults: [],
  clips: [],
  statistics: [],
});

export const fakeClient = {} as unknown as PoolClient;

export class InMemoryDatabase {
  tables: Tables = emptyTables();
  private nextId = 1;
  private clock = 0;

  /** Deterministic UUID-shaped ids, accepted by request validation */
  id(): string {
    const n = this.nextId++;
    return `00000000-0000-4000-8000-${n.toString().padStart(12, '0')}`;
  }

  /** Strictly increasing timestamps so ordering is deterministic */
  now(): Date {
    this.clock += 1000;
    return new Date(Date.UTC(2025, 3, 1) + this.clock);
  }

  async runTransaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.tables);
    try {
      return await callback(fakeClient);
    } catch (error) {
      this.tables = snapshot;
      throw error;
    }
  }

  repositories() {
    return {
      athleteRepository: new FakeAthleteRepository(this) as unknown as AthleteRepository,
      seasonRepository: new FakeSeasonRepository(this) as unknown as SeasonRepository,
      gameRepository: new FakeGameRepository(this) as unknown as GameRepository,
      practiceRepository: new FakePracticeRepository(this) as unknown as PracticeRepository,
      clipRepository: new FakeVideoClipRepository(this) as unknown as VideoClipRepository,
      statisticsRepository: new FakeStatisticsRepository(this) as unknown as StatisticsRepository,
    };
  }

  statisticsFor(ownerType: StatisticsOwner, ownerId: string): Statistics | undefined {
    return this.tables.statistics.find((s) => s.owner_type === ownerType && s.owner_id === ownerId);
  }
}

export class FakeAthleteRepository {
  constructor(private db: InMemoryDatabase) {}

  async create(name: string): Promise<Athlete> {
    const now = this.db.now();
    const athlete: Athlete = { id: this.db.id(), name, created_at: now, updated_at: now };
    this.db.tables.athletes.push(athlete);
    return athlete;
  }

  async findById(athleteId: string): Promise<Athlete | null> {
    return this.db.tables.athletes.find((a) => a.id === athleteId) ?? null;
  }

  async delete(athleteId: string): Promise<boolean> {
    const t = this.db.tables;
    const existed = t.athletes.some((a) => a.id === athleteId);
    const gameIds = t.games.filter((g) => g.athlete_id === athleteId).map((g) => g.id);
    const seasonIds = t.seasons.filter((s) => s.athlete_id === athleteId).map((s) => s.id);
    const owned = new Set([athleteId, ...gameIds, ...seasonIds]);
    const playResultIds = new Set(t.clips.filter((c) => c.athlete_id === athleteId).map((c) => c.play_result_id));

    t.statistics = t.statistics.filter((s) => !owned.has(s.owner_id));
    t.playResults = t.playResults.filter((p) => !playResultIds.has(p.id));
    t.clips = t.clips.filter((c) => c.athlete_id !== athleteId);
    t.games = t.games.filter((g) => g.athlete_id !== athleteId);
    t.practices = t.practices.filter((p) => p.athlete_id !== athleteId);
    t.tournaments = t.tournaments.filter((x) => x.athlete_id !== athleteId);
    t.seasons = t.seasons.filter((s) => s.athlete_id !== athleteId);
    t.athletes = t.athletes.filter((a) => a.id !== athleteId);
    return existed;
  }
}

export class FakeSeasonRepository {
  /** Athletes locked, in call order */
  lockedAthletes: string[] = [];

  constructor(private db: InMemoryDatabase) {}

  async lockAthlete(athleteId: string): Promise<void> {
    this.lockedAthletes.push(athleteId);
  }

  async findByAthleteId(athleteId: string): Promise<Season[]> {
    return this.db.tables.seasons
      .filter((s) => s.athlete_id === athleteId)
      .sort((a, b) => b.start_date.getTime() - a.start_date.getTime());
  }

  async findActive(athleteId: string): Promise<Season | null> {
    return this.db.tables.seasons.find((s) => s.athlete_id === athleteId && s.is_active) ?? null;
  }

  async findById(seasonId: string): Promise<Season | null> {
    return this.db.tables.seasons.find((s) => s.id === seasonId) ?? null;
  }

  async create(params: { athlete_id: string; name: string; start_date: Date }): Promise<Season> {
    if (this.db.tables.seasons.some((s) => s.athlete_id === params.athlete_id && s.is_active)) {
      throw new Error('duplicate key value violates unique constraint "uq_seasons_one_active_per_athlete"');
    }
    const now = this.db.now();
    const season: Season = { id: this.db.id(), ...params, is_active: true, created_at: now, updated_at: now };
    this.db.tables.seasons.push(season);
    return season;
  }

  async deactivate(seasonId: string, endDate: Date): Promise<Season | null> {
    const season = this.db.tables.seasons.find((s) => s.id === seasonId && s.is_active);
    if (!season) {
      return null;
    }
    season.is_active = false;
    season.end_date = endDate;
    return season;
  }
}

export class FakeGameRepository {
  constructor(private db: InMemoryDatabase) {}

  async create(params: CreateGameParams & { season_id?: string }): Promise<Game> {
    const now = this.db.now();
    const game: Game = {
      id: this.db.id(),
      ...params,
      is_live: false,
      is_complete: false,
      created_at: now,
      updated_at: now,
    };
    this.db.tables.games.push(game);
    return game;
  }

  async findById(gameId: string): Promise<Game | null> {
    return this.db.tables.games.find((g) => g.id === gameId) ?? null;
  }

  async findByAthleteId(athleteId: string, filters: { seasonId?: string; tournamentId?: string } = {}): Promise<Game[]> {
    return this.db.tables.games
      .filter(
        (g) =>
          g.athlete_id === athleteId &&
          (!filters.seasonId || g.season_id === filters.seasonId) &&
          (!filters.tournamentId || g.tournament_id === filters.tournamentId)
      )
      .sort((a, b) => b.date.getTime() - a.date.getTime());
  }

  async setLive(gameId: string, isLive: boolean): Promise<Game | null> {
    const game = this.db.tables.games.find((g) => g.id === gameId && !g.is_complete);
    if (!game) {
      return null;
    }
    game.is_live = isLive;
    return game;
  }

  async markComplete(gameId: string): Promise<Game | null> {
    const game = this.db.tables.games.find((g) => g.id === gameId && !g.is_complete);
    if (!game) {
      return null;
    }
    game.is_complete = true;
    game.is_live = false;
    return game;
  }

  async createTournament(params: {
    athlete_id: string;
    season_id?: string;
    name: string;
    location?: string;
    date?: Date;
  }): Promise<Tournament> {
    const tournament: Tournament = {
      id: this.db.id(),
      ...params,
      is_active: true,
      created_at: this.db.now(),
    };
    this.db.tables.tournaments.push(tournament);
    return tournament;
  }

  async findTournamentById(tournamentId: string): Promise<Tournament | null> {
    return this.db.tables.tournaments.find((t) => t.id === tournamentId) ?? null;
  }
}

export class FakePracticeRepository {
  constructor(private db: InMemoryDatabase) {}

  async create(params: { athlete_id: string; season_id?: string; date: Date; notes?: string }): Promise<Practice> {
    const practice: Practice = { id: this.db.id(), ...params, created_at: this.db.now() };
    this.db.tables.practices.push(practice);
    return practice;
  }

  async findById(practiceId: string): Promise<Practice | null> {
    return this.db.tables.practices.find((p) => p.id === practiceId) ?? null;
  }

  async findByAthleteId(athleteId: string): Promise<Practice[]> {
    return this.db.tables.practices.filter((p) => p.athlete_id === athleteId);
  }
}

export class FakeVideoClipRepository {
  constructor(private db: InMemoryDatabase) {}

  async insertPlayResult(params: { type: PlayResultType; pitch_speed?: number }): Promise<PlayResult> {
    const playResult: PlayResult = { id: this.db.id(), ...params, created_at: this.db.now() };
    this.db.tables.playResults.push(playResult);
    return playResult;
  }

  async insert(params: CreateVideoClipParams): Promise<VideoClip> {
    const { play_result_id, ...rest } = params;
    const row = { id: this.db.id(), ...rest, play_result_id, created_at: this.db.now() };
    this.db.tables.clips.push(row);
    return this.toClip(row);
  }

  async findById(clipId: string): Promise<VideoClip | null> {
    const row = this.db.tables.clips.find((c) => c.id === clipId);
    return row ? this.toClip(row) : null;
  }

  async findByAthleteId(athleteId: string, filters: VideoClipFilters = {}): Promise<VideoClip[]> {
    return this.db.tables.clips
      .filter(
        (c) =>
          c.athlete_id === athleteId &&
          (!filters.seasonId || c.season_id === filters.seasonId) &&
          (!filters.gameId || c.game_id === filters.gameId) &&
          (!filters.practiceId || c.practice_id === filters.practiceId) &&
          (!filters.highlightsOnly || c.is_highlight)
      )
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map((row) => this.toClip(row));
  }

  async updateThumbnail(clipId: string, thumbnailPath: string): Promise<boolean> {
    const row = this.db.tables.clips.find((c) => c.id === clipId);
    if (!row) {
      return false;
    }
    row.thumbnail_path = thumbnailPath;
    return true;
  }

  async setHighlight(clipId: string, isHighlight: boolean): Promise<VideoClip | null> {
    const row = this.db.tables.clips.find((c) => c.id === clipId);
    if (!row) {
      return null;
    }
    row.is_highlight = isHighlight;
    return this.toClip(row);
  }

  async delete(clipId: string): Promise<boolean> {
    const row = this.db.tables.clips.find((c) => c.id === clipId);
    if (!row) {
      return false;
    }
    this.db.tables.clips = this.db.tables.clips.filter((c) => c.id !== clipId);
    this.db.tables.playResults = this.db.tables.playResults.filter((p) => p.id !== row.play_result_id);
    return true;
  }

  private toClip(row: Tables['clips'][number]): VideoClip {
    const { play_result_id, ...clip } = row;
    const playResult = this.db.tables.playResults.find((p) => p.id === play_result_id);
    return playResult ? { ...clip, play_result: playResult } : { ...clip };
  }
}

export class FakeStatisticsRepository {
  constructor(private db: InMemoryDatabase) {}

  async create(ownerType: StatisticsOwner, ownerId: string): Promise<Statistics> {
    const existing = this.db.statisticsFor(ownerType, ownerId);
    if (existing) {
      return existing;
    }
    const statistics: Statistics = {
      id: this.db.id(),
      owner_type: ownerType,
      owner_id: ownerId,
      updated_at: this.db.now(),
      ...emptyCounters(),
    };
    this.db.tables.statistics.push(statistics);
    return statistics;
  }

  async find(ownerType: StatisticsOwner, ownerId: string): Promise<Statistics | null> {
    return this.db.statisticsFor(ownerType, ownerId) ?? null;
  }

  async increment(ownerType: StatisticsOwner, ownerId: string, delta: StatisticsDelta): Promise<Statistics> {
    const statistics = await this.create(ownerType, ownerId);
    for (const field of COUNTER_FIELDS) {
      statistics[field] += delta[field] ?? 0;
    }
    return { ...statistics };
  }

  async replace(ownerType: StatisticsOwner, ownerId: string, counters: StatisticsCounters): Promise<Statistics> {
    const statistics = await this.create(ownerType, ownerId);
    for (const field of COUNTER_FIELDS) {
      statistics[field] = counters[field];
    }
    return { ...statistics };
  }
}
