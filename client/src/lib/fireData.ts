import type { FireRecord, SeasonMap } from '../types';
import { FireDataParseError } from './errors';

const INTEGER = /^-?\d+$/;
const UNSIGNED = /^\d+$/;

function parseInteger(field: string, line: number, what: string): number {
  if (!INTEGER.test(field)) {
    throw new FireDataParseError(line, `Expected an integer ${what}, got "${field}"`);
  }
  return Number(field);
}

/**
 * Counts and areas carry no sign. `min` is 1 for values that must be positive.
 */
function parseCount(field: string, line: number, what: string, min: 0 | 1): number {
  const value = Number(field);
  if (!UNSIGNED.test(field) || value < min) {
    const kind = min === 1 ? 'a positive' : 'a non-negative';
    throw new FireDataParseError(line, `Expected ${kind} integer ${what}, got "${field}"`);
  }
  return value;
}

/**
 * Parse the fire season text format.
 *
 * A season is a bare year line, five `county,acreage,cause,structures_destroyed`
 * lines, then a closing `fire_count,acreage` line:
 *
 *   2008
 *   Butte,47647,Lightning,117
 *   ...four more fires...
 *   6255,1593690
 *
 * Fires are sorted largest first, keeping input order between equal acreages.
 */
export function parseFireData(text: string): SeasonMap {
  const seasons: SeasonMap = new Map();
  let currentYear: number | null = null;
  let topFive: FireRecord[] = [];
  const lines = text.split(/\r?\n/);

  for (const [index, raw] of lines.entries()) {
    const line = index + 1;
    if (raw.trim() === '') continue;

    const fields = raw.split(',').map(field => field.trim());

    // A single field introduces a year
    if (fields.length === 1) {
      if (currentYear !== null) {
        throw new FireDataParseError(line, `Season ${currentYear} has no fire_count,acreage line`);
      }
      const year = parseInteger(fields[0], line, 'year');
      if (year === 0) {
        throw new FireDataParseError(line, 'Year 0 does not exist');
      }
      currentYear = year;
      topFive = [];
      continue;
    }

    if (currentYear === null) {
      throw new FireDataParseError(line, 'Data appears outside a season');
    }

    // A county name up front means this is a fire, otherwise it closes the season
    if (!INTEGER.test(fields[0])) {
      if (fields.length !== 4) {
        throw new FireDataParseError(line, `Expected 4 fields for a fire, got ${fields.length}`);
      }
      const [county, acreage, cause, destroyed] = fields;
      if (cause === '') {
        throw new FireDataParseError(line, 'Fire is missing a cause');
      }
      topFive.push({
        year: currentYear,
        county,
        acreage: parseCount(acreage, line, 'acreage', 1),
        cause,
        structuresDestroyed: parseCount(destroyed, line, 'structure count', 0),
      });
      continue;
    }

    if (fields.length !== 2) {
      throw new FireDataParseError(line, `Expected 2 fields for a season total, got ${fields.length}`);
    }
    if (topFive.length !== 5) {
      throw new FireDataParseError(line, `Season ${currentYear} has ${topFive.length} fires, expected 5`);
    }

    seasons.set(currentYear, {
      year: currentYear,
      fireCount: parseCount(fields[0], line, 'fire count', 1),
      acreage: parseCount(fields[1], line, 'acreage', 1),
      topFive: [...topFive].sort((a, b) => b.acreage - a.acreage),
    });
    currentYear = null;
    topFive = [];
  }

  if (currentYear !== null) {
    throw new FireDataParseError(lines.length, `Season ${currentYear} has no fire_count,acreage line`);
  }
  return seasons;
}

export async function loadFireData(url: string): Promise<SeasonMap> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`HTTP error! status: ${response.status}`);
  }
  const seasons = parseFireData(await response.text());
  console.log(`Loaded ${seasons.size} fire seasons from ${url}`);
  return seasons;
}
