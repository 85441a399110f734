import * as d3 from 'd3';
import type { FontSpec, Rgb } from '../types';

export interface ThemeColors {
  readonly white: Rgb;
  readonly black: Rgb;
  readonly red: Rgb;
  readonly lightRed: Rgb;
  readonly orange: Rgb;
  readonly lightOrange: Rgb;
  readonly yellow: Rgb;
  readonly lightBlue: Rgb;
}

export interface ThemeFonts {
  readonly small: FontSpec;
  readonly large: FontSpec;
}

/**
 * Colors and fonts shared by the scene builder and the canvas overlays.
 * Passed around explicitly so nothing reads a global.
 */
export interface Theme {
  readonly colors: ThemeColors;
  readonly fonts: ThemeFonts;
}

export const DEFAULT_THEME: Theme = Object.freeze({
  colors: Object.freeze({
    white: [255, 255, 255],
    black: [0, 0, 0],
    red: [255, 0, 0],
    lightRed: [255, 125, 125],
    orange: [255, 127, 0],
    lightOrange: [255, 190, 125],
    yellow: [245, 206, 66],
    lightBlue: [200, 234, 247],
  } as const),
  fonts: Object.freeze({
    small: { family: 'Calibri, Carlito, sans-serif', size: 14, bold: true },
    large: { family: 'Calibri, Carlito, sans-serif', size: 24, bold: true },
  }),
});

export function toCssColor([r, g, b]: Rgb): string {
  return d3.rgb(r, g, b).formatRgb();
}

export function toCssFont(font: FontSpec): string {
  return `${font.bold ? 'bold ' : ''}${font.size}px ${font.family}`;
}
