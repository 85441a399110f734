import { PRESENT_YEAR } from '../config';
import type { FireRecord, Rect, Rgb } from '../types';
import { isForecastYear } from '../lib/forecast';
import type { Theme } from '../lib/theme';
import type { FireCircle } from './scrollables';
import type { RenderSurface } from './surface';

const PANEL_WIDTH = 200;
const ROW_HEIGHT = 90;
const FORECAST_ROW_HEIGHT = 45;
const TEXT_GAP = 20;

export function drawRectOutline(surface: RenderSurface, rect: Rect, color: Rgb, thickness: number): void {
  const { x, y, width: w, height: h } = rect;
  surface.drawLine({ x, y }, { x: x + w, y }, color, thickness);
  surface.drawLine({ x, y: y + h }, { x: x + w, y: y + h }, color, thickness);
  surface.drawLine({ x, y }, { x, y: y + h }, color, thickness);
  surface.drawLine({ x: x + w, y }, { x: x + w, y: y + h }, color, thickness);
}

/**
 * The lines shown for one fire in the hover panel. Forecast fires only have a
 * county and a likely cause; their acreage and damage are placeholders.
 */
export function fireInfoLines(fire: FireRecord, forecast: boolean): string[] {
  if (forecast) {
    return [`County: ${fire.county}`, `Most Likely Cause: ${fire.cause}`];
  }
  return [
    `County: ${fire.county}`,
    `Acreage: ${fire.acreage}`,
    `Cause: ${fire.cause}`,
    `Structures destroyed: ${fire.structuresDestroyed}`,
  ];
}

/**
 * Panel anchored at the circle's centre listing each of the county's fires.
 */
export function drawCountyFireInfo(
  surface: RenderSurface,
  circle: FireCircle,
  theme: Theme,
  presentYear: number = PRESENT_YEAR
): void {
  const fires = circle.getFires();
  const forecast = isForecastYear(fires[0].year, presentYear);
  const rowHeight = forecast ? FORECAST_ROW_HEIGHT : ROW_HEIGHT;
  const { x, y } = circle.position();
  const edgeOffset = PANEL_WIDTH / 25;
  const { black, white } = theme.colors;

  const panel: Rect = { x, y, width: PANEL_WIDTH, height: rowHeight * fires.length };
  surface.fillRect(panel, white);

  fires.forEach((fire, i) => {
    const top = y + i * rowHeight;
    if (i >= 1) {
      surface.drawLine({ x, y: top }, { x: x + PANEL_WIDTH, y: top }, black, 1);
    }
    fireInfoLines(fire, forecast).forEach((line, row) => {
      surface.drawText(line, x + edgeOffset, top + edgeOffset + row * TEXT_GAP, theme.fonts.small, black);
    });
  });

  drawRectOutline(surface, panel, black, 1);
}
