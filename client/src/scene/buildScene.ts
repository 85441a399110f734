import { CANVAS_WIDTH, PRESENT_YEAR, SECTION_LABEL_Y, SUMMARY_LABEL_Y } from '../config';
import countyOffsetData from '../data/county-offsets.json';
import type { CountyOffsets, FireRecord, FireSeason, Point } from '../types';
import { UnknownCountyError } from '../lib/errors';
import { isForecastYear } from '../lib/forecast';
import { DEFAULT_THEME, type Theme } from '../lib/theme';
import { FireCircle, ScrollableImage, ScrollableObject, TextLabel } from './scrollables';
import type { TextMeasurer } from './surface';

export const COUNTY_OFFSETS: CountyOffsets = countyOffsetData;

export interface SceneContext {
  measurer: TextMeasurer;
  theme?: Theme;
  countyOffsets?: CountyOffsets;
  canvasWidth?: number;
  presentYear?: number;
}

export function countyPixelOffset(county: string, offsets: CountyOffsets = COUNTY_OFFSETS): Point {
  if (!Object.prototype.hasOwnProperty.call(offsets, county)) {
    throw new UnknownCountyError(county);
  }
  const [x, y] = offsets[county];
  return { x, y };
}

export function seasonSummaryText(season: FireSeason, forecast: boolean): string {
  const approx = forecast ? '~' : '';
  return `Total # of fires: ${approx}${season.fireCount}    Total acreage burned: ${approx}${season.acreage}`;
}

export function sectionTitleText(forecast: boolean): string {
  return forecast ? 'Five Vulnerable Counties:' : 'Top Five Fires:';
}

/**
 * One circle per county in the season's top five, in the order counties first
 * appear. Each circle sits at the map origin plus the county's offset.
 */
export function getCountiesOnMap(
  season: FireSeason,
  mapImage: ScrollableImage,
  theme: Theme,
  forecast: boolean,
  offsets: CountyOffsets = COUNTY_OFFSETS
): FireCircle[] {
  const firesByCounty = new Map<string, FireRecord[]>();
  for (const fire of season.topFive) {
    const fires = firesByCounty.get(fire.county);
    if (fires) {
      fires.push(fire);
    } else {
      firesByCounty.set(fire.county, [fire]);
    }
  }

  const origin = mapImage.position();
  return [...firesByCounty].map(([county, fires]) => {
    const offset = countyPixelOffset(county, offsets);
    return new FireCircle(origin.x + offset.x, origin.y + offset.y, fires, { forecast, theme });
  });
}

/**
 * Everything drawn for one season, back to front: the summary line, the section
 * title, the map, then the county circles.
 */
export function buildScene(season: FireSeason, mapImage: ScrollableImage, context: SceneContext): ScrollableObject[] {
  const theme = context.theme ?? DEFAULT_THEME;
  const canvasWidth = context.canvasWidth ?? CANVAS_WIDTH;
  const forecast = isForecastYear(season.year, context.presentYear ?? PRESENT_YEAR);

  const summaryLabel = new TextLabel(0, SUMMARY_LABEL_Y, seasonSummaryText(season, forecast), theme.fonts.large, theme.colors.black);
  summaryLabel.centerWidth(canvasWidth, context.measurer);

  const sectionLabel = new TextLabel(0, SECTION_LABEL_Y, sectionTitleText(forecast), theme.fonts.large, theme.colors.black);
  sectionLabel.centerWidth(canvasWidth, context.measurer);

  const circles = getCountiesOnMap(season, mapImage, theme, forecast, context.countyOffsets);
  return [summaryLabel, sectionLabel, mapImage, ...circles];
}
