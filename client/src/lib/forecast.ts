import * as d3 from 'd3';
import {
  PLACEHOLDER_ACREAGE,
  PLACEHOLDER_STRUCTURES_DESTROYED,
  PRESENT_YEAR,
} from '../config';
import type { FireRecord, FireSeason, SeasonMap } from '../types';
import { fitLinear } from './regression';
import { weightedChoice, type RandomSource } from './sampling';

export interface ForecastOptions {
  /** Last year of real data; forecasts start the year after. */
  presentYear?: number;
  random?: RandomSource;
}

export function isForecastYear(year: number, presentYear: number = PRESENT_YEAR): boolean {
  return year > presentYear;
}

/**
 * Fire counts for the `n` years after `presentYear`, from a line fitted to
 * (year, fire count). Predictions are truncated toward zero.
 */
export function extrapolateFireCounts(
  years: readonly number[],
  fireCounts: readonly number[],
  n: number,
  presentYear: number = PRESENT_YEAR
): number[] {
  const fit = fitLinear(years, fireCounts);
  return d3.range(n).map(i => Math.trunc(fit.predict(presentYear + i + 1)));
}

/**
 * Acreages for the given predicted fire counts. The line is fitted to
 * historical (fire count, acreage), so these chain off the fire count forecast.
 */
export function extrapolateAcreages(
  fireCounts: readonly number[],
  acreages: readonly number[],
  nextFireCounts: readonly number[]
): number[] {
  const fit = fitLinear(fireCounts, acreages);
  return nextFireCounts.map(count => Math.trunc(fit.predict(count)));
}

/**
 * Five counties drawn with replacement, so the same county may come up twice.
 */
export function predictVulnerableCounties(counties: readonly string[], random?: RandomSource): string[] {
  return d3.range(5).map(() => weightedChoice(counties, random));
}

export function predictCause(causes: readonly string[], random?: RandomSource): string {
  return weightedChoice(causes, random);
}

export function predictTopFive(
  year: number,
  counties: readonly string[],
  countyCauses: ReadonlyMap<string, readonly string[]>,
  random?: RandomSource
): FireRecord[] {
  return predictVulnerableCounties(counties, random).map(county => {
    const causes = countyCauses.get(county) ?? [];
    return {
      year,
      county,
      acreage: PLACEHOLDER_ACREAGE,
      cause: predictCause(causes, random),
      structuresDestroyed: PLACEHOLDER_STRUCTURES_DESTROYED,
    };
  });
}

/**
 * Project the `n` seasons after the present year. Does not touch `seasons`.
 * Values are not clamped, so a falling trend can predict counts or acreage of zero or below.
 */
export function predictFireSeasons(seasons: SeasonMap, n: number, options: ForecastOptions = {}): FireSeason[] {
  const presentYear = options.presentYear ?? PRESENT_YEAR;
  const history = [...seasons.values()];

  const years = history.map(season => season.year);
  const fireCounts = history.map(season => season.fireCount);
  const acreages = history.map(season => season.acreage);

  // Every top-five appearance counts once, for both the county and its cause
  const counties: string[] = [];
  const countyCauses = new Map<string, string[]>();
  for (const season of history) {
    for (const fire of season.topFive) {
      counties.push(fire.county);
      const causes = countyCauses.get(fire.county);
      if (causes) {
        causes.push(fire.cause);
      } else {
        countyCauses.set(fire.county, [fire.cause]);
      }
    }
  }

  const nextFireCounts = extrapolateFireCounts(years, fireCounts, n, presentYear);
  const nextAcreages = extrapolateAcreages(fireCounts, acreages, nextFireCounts);

  return nextFireCounts.map((fireCount, i) => {
    const year = presentYear + i + 1;
    return {
      year,
      fireCount,
      acreage: nextAcreages[i],
      topFive: predictTopFive(year, counties, countyCauses, options.random),
    };
  });
}

/**
 * Add seasons for years not already present. Existing entries are kept as they are.
 */
export function registerFireSeasons(seasons: SeasonMap, predicted: readonly FireSeason[]): void {
  for (const season of predicted) {
    if (!seasons.has(season.year)) {
      seasons.set(season.year, season);
    }
  }
}

export function forecastFireSeasons(seasons: SeasonMap, n: number, options: ForecastOptions = {}): FireSeason[] {
  const predicted = predictFireSeasons(seasons, n, options);
  registerFireSeasons(seasons, predicted);
  return predicted;
}
