import type { FireRecord, FireSeason, SeasonMap } from '../types';

export function fire(year: number, county: string, acreage: number, cause = 'Lightning', destroyed = 0): FireRecord {
  return { year, county, acreage, cause, structuresDestroyed: destroyed };
}

export function season(year: number, fireCount: number, acreage: number, topFive: FireRecord[]): FireSeason {
  return { year, fireCount, acreage, topFive };
}

export function seasonMap(...seasons: FireSeason[]): SeasonMap {
  return new Map(seasons.map(s => [s.year, s]));
}
