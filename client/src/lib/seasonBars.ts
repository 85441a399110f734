import * as d3 from 'd3';
import { PRESENT_YEAR } from '../config';
import type { ComponentSize, FireSeason, Margin, Rect } from '../types';
import { isForecastYear } from './forecast';

export interface SeasonBar {
  year: number;
  forecast: boolean;
  section: Rect;
  countBar: Rect;
  acreageBar: Rect;
  isMaxCount: boolean;
  isMaxAcreage: boolean;
}

export interface SeasonBarOptions {
  margin?: Margin;
  /** Gap between the bars and the edge of their section. */
  sectionPadding?: number;
  presentYear?: number;
}

const DEFAULT_MARGIN: Margin = { top: 10, right: 20, bottom: 20, left: 20 };

/**
 * Layout for the severity chart: one section per season holding a fire count bar
 * and an acreage bar side by side, each scaled to its own maximum.
 */
export function seasonBars(
  seasons: readonly FireSeason[],
  size: ComponentSize,
  options: SeasonBarOptions = {}
): SeasonBar[] {
  if (seasons.length === 0) return [];

  const margin = options.margin ?? DEFAULT_MARGIN;
  const padding = options.sectionPadding ?? 5;
  const presentYear = options.presentYear ?? PRESENT_YEAR;

  const xScale = d3.scaleBand<number>()
    .domain(seasons.map(season => season.year))
    .range([margin.left, size.width - margin.right]);

  const chartHeight = size.height - margin.top - margin.bottom;
  const baseline = margin.top + chartHeight;
  const maxCount = d3.max(seasons, season => season.fireCount) ?? 0;
  const maxAcreage = d3.max(seasons, season => season.acreage) ?? 0;

  const countScale = d3.scaleLinear().domain([0, maxCount]).range([0, chartHeight]);
  const acreageScale = d3.scaleLinear().domain([0, maxAcreage]).range([0, chartHeight]);

  const sectionWidth = xScale.bandwidth();
  const barWidth = (sectionWidth - 2 * padding) / 2;

  return seasons.map(season => {
    const sectionX = xScale(season.year) ?? margin.left;
    // Forecasts on a falling trend can go below zero; those draw as empty bars
    const countHeight = Math.max(0, Math.trunc(countScale(season.fireCount)));
    const acreageHeight = Math.max(0, Math.trunc(acreageScale(season.acreage)));

    return {
      year: season.year,
      forecast: isForecastYear(season.year, presentYear),
      section: { x: sectionX, y: 0, width: sectionWidth, height: size.height },
      countBar: { x: sectionX + padding, y: baseline - countHeight, width: barWidth, height: countHeight },
      acreageBar: { x: sectionX + padding + barWidth, y: baseline - acreageHeight, width: barWidth, height: acreageHeight },
      isMaxCount: season.fireCount === maxCount,
      isMaxAcreage: season.acreage === maxAcreage,
    };
  });
}
