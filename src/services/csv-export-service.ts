/**
 * CSV Export Service
 *
 * Renders an athlete's statistics, game log, play-by-play and season
 * summaries as CSV documents and writes them to the temp directory for
 * sharing. Exports only read; they never recalculate.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { AthleteRepository } from '../repositories/athlete-repository';
import { GameRepository } from '../repositories/game-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { StatisticsRepository } from '../repositories/statistics-repository';
import { VideoClipRepository } from '../repositories/video-clip-repository';
import { VideoFileStore } from './video-file-store';
import { Athlete } from '../models/athlete';
import { Game } from '../models/game';
import { Season } from '../models/season';
import { displayName } from '../models/play-result';
import { Statistics, StatisticsOwner } from '../models/statistics';
import { BadRequestError, NotFoundError } from '../models/errors';
import { CsvValue, csvDocument, csvRow, formatCsvDate, formatCsvDateTime } from '../utils/csv';
import {
  battingAverage,
  formatOps,
  formatRate,
  onBasePercentage,
  onBasePlusSlugging,
  singlesFrom,
  sluggingPercentage,
} from '../utils/play-result-statistics';
import { errorMessage } from '../utils/fs-errors';
import { logFileOperation } from '../utils/logger';

const BATTING_LINE_HEADER = ['AB', 'H', '1B', '2B', '3B', 'HR', 'R', 'RBI', 'BB', 'K', 'AVG', 'OBP', 'SLG', 'OPS'];

function battingLine(statistics: Statistics): CsvValue[] {
  return [
    statistics.at_bats,
    statistics.hits,
    singlesFrom(statistics),
    statistics.doubles,
    statistics.triples,
    statistics.home_runs,
    statistics.runs,
    statistics.rbis,
    statistics.walks,
    statistics.strikeouts,
    formatRate(battingAverage(statistics)),
    formatRate(onBasePercentage(statistics)),
    formatRate(sluggingPercentage(statistics)),
    formatOps(onBasePlusSlugging(statistics)),
  ];
}

export interface PlayByPlayFilters {
  seasonId?: string;
  gameId?: string;
}

/**
 * CSV Export Service
 * Provides CSV documents for sharing outside the app
 */
export class CsvExportService {
  constructor(
    private athleteRepository: AthleteRepository,
    private seasonRepository: SeasonRepository,
    private gameRepository: GameRepository,
    private clipRepository: VideoClipRepository,
    private statisticsRepository: StatisticsRepository,
    private files: VideoFileStore,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Profile, career totals and one row per season with statistics
   *
   * @throws NotFoundError if the athlete doesn't exist
   */
  async exportAthleteStatistics(athleteId: string): Promise<string> {
    const athlete = await this.requireAthlete(athleteId);
    const rows = [
      'Athlete Statistics Export',
      this.generatedRow(),
      '',
      csvRow(['Athlete Name', athlete.name]),
      csvRow(['Profile Created', formatCsvDate(athlete.created_at)]),
      '',
    ];

    const statistics = await this.statisticsRepository.find(StatisticsOwner.ATHLETE, athleteId);
    if (statistics) {
      rows.push(
        'Overall Career Statistics',
        'Metric,Value',
        csvRow(['Total Games', statistics.total_games]),
        csvRow(['At Bats', statistics.at_bats]),
        csvRow(['Hits', statistics.hits]),
        csvRow(['Singles', singlesFrom(statistics)]),
        csvRow(['Doubles', statistics.doubles]),
        csvRow(['Triples', statistics.triples]),
        csvRow(['Home Runs', statistics.home_runs]),
        csvRow(['Runs', statistics.runs]),
        csvRow(['RBIs', statistics.rbis]),
        csvRow(['Walks', statistics.walks]),
        csvRow(['Strikeouts', statistics.strikeouts]),
        csvRow(['Ground Outs', statistics.ground_outs]),
        csvRow(['Fly Outs', statistics.fly_outs]),
        csvRow(['Batting Average', formatRate(battingAverage(statistics))]),
        csvRow(['On-Base Percentage', formatRate(onBasePercentage(statistics))]),
        csvRow(['Slugging Percentage', formatRate(sluggingPercentage(statistics))]),
        csvRow(['OPS', formatOps(onBasePlusSlugging(statistics))]),
        ''
      );
    }

    const seasons = await this.seasonRepository.findByAthleteId(athleteId);
    if (seasons.length > 0) {
      rows.push('Season-by-Season Statistics', csvRow(['Season', 'Games', ...BATTING_LINE_HEADER]));
      for (const season of seasons) {
        const seasonStatistics = await this.statisticsRepository.find(StatisticsOwner.SEASON, season.id);
        if (seasonStatistics) {
          rows.push(csvRow([season.name, seasonStatistics.total_games, ...battingLine(seasonStatistics)]));
        }
      }
      rows.push('');
    }

    return csvDocument(rows);
  }

  /**
   * One row per completed game, most recent first
   *
   * @throws NotFoundError if the athlete or season doesn't exist
   */
  async exportGameLog(athleteId: string, seasonId?: string): Promise<string> {
    const athlete = await this.requireAthlete(athleteId);
    const season = seasonId ? await this.requireSeason(seasonId, athleteId) : undefined;

    const rows = ['Game Log Export', this.generatedRow(), csvRow([`Athlete: ${athlete.name}`])];
    if (season) {
      rows.push(csvRow([`Season: ${season.name}`]));
    }
    rows.push('', csvRow(['Date', 'Opponent', 'Result', ...BATTING_LINE_HEADER]));

    const games = await this.gameRepository.findByAthleteId(athleteId, { seasonId });
    for (const game of games) {
      if (!game.is_complete) {
        continue;
      }
      const statistics = await this.statisticsRepository.find(StatisticsOwner.GAME, game.id);
      if (statistics) {
        rows.push(csvRow([formatCsvDate(game.date), game.opponent, 'Complete', ...battingLine(statistics)]));
      }
    }

    return csvDocument(rows);
  }

  /**
   * One row per clip, newest first
   *
   * @throws NotFoundError if the athlete, season or game doesn't exist
   */
  async exportPlayByPlay(athleteId: string, filters: PlayByPlayFilters = {}): Promise<string> {
    const athlete = await this.requireAthlete(athleteId);
    const season = filters.seasonId ? await this.requireSeason(filters.seasonId, athleteId) : undefined;
    const games = new Map(
      (await this.gameRepository.findByAthleteId(athleteId)).map((game): [string, Game] => [game.id, game])
    );
    const game = filters.gameId ? games.get(filters.gameId) : undefined;
    if (filters.gameId && !game) {
      throw new NotFoundError('Game not found');
    }

    const rows = ['Play-by-Play Export', this.generatedRow(), csvRow([`Athlete: ${athlete.name}`])];
    if (season) {
      rows.push(csvRow([`Season: ${season.name}`]));
    }
    if (game) {
      rows.push(csvRow([`Game: vs ${game.opponent}`]));
    }
    rows.push('', csvRow(['Date', 'Context', 'Play Result', 'Is Highlight', 'Video File']));

    const clips = await this.clipRepository.findByAthleteId(athleteId, {
      seasonId: filters.seasonId,
      gameId: filters.gameId,
    });
    for (const clip of clips) {
      const clipGame = clip.game_id ? games.get(clip.game_id) : undefined;
      rows.push(
        csvRow([
          formatCsvDateTime(clip.created_at),
          clipGame ? `vs ${clipGame.opponent}` : 'Practice',
          clip.play_result ? displayName(clip.play_result.type) : 'Unrecorded',
          clip.is_highlight ? 'Yes' : 'No',
          clip.file_name,
        ])
      );
    }

    return csvDocument(rows);
  }

  /**
   * Season details, its totals and every game in it
   *
   * @throws NotFoundError if the season doesn't exist
   */
  async exportSeasonSummary(seasonId: string): Promise<string> {
    const season = await this.seasonRepository.findById(seasonId);
    if (!season) {
      throw new NotFoundError('Season not found');
    }

    const rows = [
      'Season Summary Export',
      this.generatedRow(),
      '',
      csvRow(['Season Name', season.name]),
      csvRow(['Start Date', formatCsvDate(season.start_date)]),
    ];
    if (season.end_date) {
      rows.push(csvRow(['End Date', formatCsvDate(season.end_date)]));
    }
    rows.push(csvRow(['Status', season.is_active ? 'Active' : 'Completed']), '');

    const statistics = await this.statisticsRepository.find(StatisticsOwner.SEASON, seasonId);
    if (statistics) {
      rows.push(
        'Season Statistics',
        'Metric,Value',
        csvRow(['Total Games', statistics.total_games]),
        csvRow(['At Bats', statistics.at_bats]),
        csvRow(['Hits', statistics.hits]),
        csvRow(['Batting Average', formatRate(battingAverage(statistics))]),
        csvRow(['On-Base Percentage', formatRate(onBasePercentage(statistics))]),
        csvRow(['Slugging Percentage', formatRate(sluggingPercentage(statistics))]),
        csvRow(['OPS', formatOps(onBasePlusSlugging(statistics))]),
        ''
      );
    }

    const games = await this.gameRepository.findByAthleteId(season.athlete_id, { seasonId });
    if (games.length > 0) {
      rows.push('Games in Season', csvRow(['Date', 'Opponent', 'Status', 'AB', 'H', 'AVG']));
      for (const game of games) {
        const status = game.is_complete ? 'Complete' : game.is_live ? 'Live' : 'Scheduled';
        const gameStatistics = await this.statisticsRepository.find(StatisticsOwner.GAME, game.id);
        const line: CsvValue[] = gameStatistics
          ? [gameStatistics.at_bats, gameStatistics.hits, formatRate(battingAverage(gameStatistics))]
          : ['', '', ''];
        rows.push(csvRow([formatCsvDate(game.date), game.opponent, status, ...line]));
      }
    }

    return csvDocument(rows);
  }

  /**
   * Write an export to the temp directory
   *
   * Only the base name of fileName is used.
   *
   * @returns Absolute path of the written file
   * @throws BadRequestError if the name is empty
   */
  async saveToFile(csv: string, fileName: string): Promise<string> {
    const baseName = path.basename(fileName.trim());
    if (!baseName || baseName === '.' || baseName === '..') {
      throw new BadRequestError('Export file name is required', 'INVALID_EXPORT_NAME');
    }
    const filePath = path.join(this.files.tempDir, baseName);

    try {
      await fs.mkdir(this.files.tempDir, { recursive: true });
      await fs.writeFile(filePath, csv, 'utf8');
    } catch (error) {
      logFileOperation({ operation: 'export', path: filePath, success: false, errorMessage: errorMessage(error) });
      throw error;
    }

    logFileOperation({ operation: 'export', path: filePath, success: true });
    return filePath;
  }

  private generatedRow(): string {
    return csvRow([`Generated: ${this.now().toISOString()}`]);
  }

  private async requireAthlete(athleteId: string): Promise<Athlete> {
    const athlete = await this.athleteRepository.findById(athleteId);
    if (!athlete) {
      throw new NotFoundError('Athlete not found');
    }
    return athlete;
  }

  private async requireSeason(seasonId: string, athleteId: string): Promise<Season> {
    const season = await this.seasonRepository.findById(seasonId);
    if (!season || season.athlete_id !== athleteId) {
      throw new NotFoundError('Season not found');
    }
    return season;
  }
}
