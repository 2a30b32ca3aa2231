/**
 * Practice Service
 */

import { transaction } from '../config/database';
import { PracticeRepository } from '../repositories/practice-repository';
import { AthleteRepository } from '../repositories/athlete-repository';
import { SeasonService } from './season-service';
import { Practice } from '../models/game';
import { NotFoundError } from '../models/errors';

export class PracticeService {
  constructor(
    private practiceRepository: PracticeRepository,
    private athleteRepository: AthleteRepository,
    private seasonService: SeasonService,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Create a practice linked to the athlete's active season
   *
   * @throws NotFoundError if the athlete doesn't exist
   */
  async createPractice(athleteId: string, params: { date?: Date; notes?: string } = {}): Promise<Practice> {
    return transaction(async (client) => {
      const athlete = await this.athleteRepository.findById(athleteId, client);
      if (!athlete) {
        throw new NotFoundError('Athlete not found');
      }

      const season = await this.seasonService.ensureActiveSeason(athleteId, client);
      return this.practiceRepository.create(
        {
          athlete_id: athleteId,
          season_id: season.id,
          date: params.date ?? this.now(),
          notes: params.notes?.trim() || undefined,
        },
        client
      );
    });
  }

  async listPractices(athleteId: string): Promise<Practice[]> {
    return this.practiceRepository.findByAthleteId(athleteId);
  }
}
