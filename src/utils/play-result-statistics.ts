/**
 * Play Result Statistics Module
 *
 * Counter arithmetic for play results. A play result maps to a delta that is
 * added to the athlete, game and season counters; counters never decrease.
 * Rate stats are derived from the counters on read.
 */

import { PlayResultType } from '../models/play-result';
import {
  COUNTER_FIELDS,
  RateStatistics,
  Statistics,
  StatisticsCounters,
  StatisticsDelta,
  StatisticsWithRates,
  emptyCounters,
} from '../models/statistics';

/**
 * Counter increments for a single play result
 *
 * - Hits: at_bats and hits; extra-base hits also bump their own counter
 *   (singles are derived, see singlesFrom)
 * - WALK: walks only (not an at-bat)
 * - STRIKEOUT, GROUND_OUT, FLY_OUT: at_bats and their own counter
 * - Pitch events: total_pitches and their own counter
 */
export function statisticsDeltaFor(type: PlayResultType): StatisticsDelta {
  switch (type) {
    case PlayResultType.SINGLE:
      return { at_bats: 1, hits: 1 };
    case PlayResultType.DOUBLE:
      return { at_bats: 1, hits: 1, doubles: 1 };
    case PlayResultType.TRIPLE:
      return { at_bats: 1, hits: 1, triples: 1 };
    case PlayResultType.HOME_RUN:
      return { at_bats: 1, hits: 1, home_runs: 1 };
    case PlayResultType.WALK:
      return { walks: 1 };
    case PlayResultType.STRIKEOUT:
      return { at_bats: 1, strikeouts: 1 };
    case PlayResultType.GROUND_OUT:
      return { at_bats: 1, ground_outs: 1 };
    case PlayResultType.FLY_OUT:
      return { at_bats: 1, fly_outs: 1 };
    case PlayResultType.BALL:
      return { total_pitches: 1, balls: 1 };
    case PlayResultType.STRIKE:
      return { total_pitches: 1, strikes: 1 };
    case PlayResultType.HIT_BY_PITCH:
      return { total_pitches: 1, hit_by_pitches: 1 };
    case PlayResultType.WILD_PITCH:
      return { total_pitches: 1, wild_pitches: 1 };
  }
}

/**
 * Manually entered batting line, as on a box score
 */
export interface ManualStatisticsEntry {
  singles?: number;
  doubles?: number;
  triples?: number;
  homeRuns?: number;
  runs?: number;
  rbis?: number;
  strikeouts?: number;
  walks?: number;
}

/**
 * Counter increments for a manual entry; hits and at-bats are derived
 */
export function manualStatisticsDelta(entry: ManualStatisticsEntry): StatisticsDelta {
  const singles = entry.singles ?? 0;
  const doubles = entry.doubles ?? 0;
  const triples = entry.triples ?? 0;
  const homeRuns = entry.homeRuns ?? 0;
  const strikeouts = entry.strikeouts ?? 0;
  const hits = singles + doubles + triples + homeRuns;

  return {
    doubles,
    triples,
    home_runs: homeRuns,
    hits,
    at_bats: hits + strikeouts,
    runs: entry.runs ?? 0,
    rbis: entry.rbis ?? 0,
    strikeouts,
    walks: entry.walks ?? 0,
  };
}

/**
 * Counters produced by a list of play results, starting from zero
 */
export function countersFromPlayResults(types: PlayResultType[]): StatisticsCounters {
  return types.reduce((counters, type) => applyDelta(counters, statisticsDeltaFor(type)), emptyCounters());
}

/**
 * Field-by-field sum of counter sets
 */
export function sumCounters(sets: StatisticsCounters[]): StatisticsCounters {
  const total = emptyCounters();
  for (const counters of sets) {
    for (const field of COUNTER_FIELDS) {
      total[field] += counters[field];
    }
  }
  return total;
}

/**
 * Fields of a delta that actually change something
 */
export function nonZeroFields(delta: StatisticsDelta): Array<[keyof StatisticsCounters, number]> {
  const fields: Array<[keyof StatisticsCounters, number]> = [];
  for (const field of COUNTER_FIELDS) {
    const amount = delta[field] ?? 0;
    if (amount !== 0) {
      fields.push([field, amount]);
    }
  }
  return fields;
}

/**
 * Add a delta to a counter set, returning a new set
 *
 * @throws Error if the delta contains a negative increment
 */
export function applyDelta(counters: StatisticsCounters, delta: StatisticsDelta): StatisticsCounters {
  const updated: StatisticsCounters = { ...counters };
  for (const [field, amount] of nonZeroFields(delta)) {
    if (amount < 0) {
      throw new Error(`Statistics counters cannot be decremented (${field}: ${amount})`);
    }
    updated[field] = counters[field] + amount;
  }
  return updated;
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function battingAverage(counters: StatisticsCounters): number {
  return ratio(counters.hits, counters.at_bats);
}

export function onBasePercentage(counters: StatisticsCounters): number {
  return ratio(counters.hits + counters.walks, counters.at_bats + counters.walks);
}

/**
 * Singles are not stored; they are the hits that went for one base
 */
export function singlesFrom(counters: StatisticsCounters): number {
  return Math.max(0, counters.hits - counters.doubles - counters.triples - counters.home_runs);
}

export function sluggingPercentage(counters: StatisticsCounters): number {
  const totalBases =
    singlesFrom(counters) + counters.doubles * 2 + counters.triples * 3 + counters.home_runs * 4;
  return ratio(totalBases, counters.at_bats);
}

export function strikePercentage(counters: StatisticsCounters): number {
  return ratio(counters.strikes, counters.total_pitches);
}

export function onBasePlusSlugging(counters: StatisticsCounters): number {
  return onBasePercentage(counters) + sluggingPercentage(counters);
}

export function rateStatistics(counters: StatisticsCounters): RateStatistics {
  return {
    batting_average: battingAverage(counters),
    on_base_percentage: onBasePercentage(counters),
    slugging_percentage: sluggingPercentage(counters),
    ops: onBasePlusSlugging(counters),
    strike_percentage: strikePercentage(counters),
  };
}

export function withRates(statistics: Statistics): StatisticsWithRates {
  return { ...statistics, ...rateStatistics(statistics) };
}

/**
 * Format a rate the way a scorebook prints it: ".333", "1.000"
 */
export function formatRate(value: number): string {
  const fixed = value.toFixed(3);
  return fixed.startsWith('0.') ? fixed.substring(1) : fixed;
}

/**
 * OPS keeps its leading digit: "0.750", "1.250"
 */
export function formatOps(value: number): string {
  return value.toFixed(3);
}
