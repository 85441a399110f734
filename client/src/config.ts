import type { Point } from './types';

// Canvas the season scene is drawn on
export const CANVAS_WIDTH = 800;
export const CANVAS_HEIGHT = 800;

/**
 * The last year the dataset covers. Anything after it is a forecast season.
 */
export const PRESENT_YEAR = 2020;

// Predict this many seasons past PRESENT_YEAR
export const FUTURE_YEARS = 10;

export const SCROLL_STEP = 15;
export const MAX_SCROLL = 600;

export const MAP_ORIGIN: Point = { x: 190, y: 240 };

export const SUMMARY_LABEL_Y = 160;
export const SECTION_LABEL_Y = 200;

export const FIRE_DATA_URL = import.meta.env.VITE_FIRE_DATA_URL ?? '/cali_fire_data.txt';
export const COUNTY_MAP_URL = import.meta.env.VITE_COUNTY_MAP_URL ?? '/county_map.jpg';

// Stand-in values for forecast fires; they are never shown
export const PLACEHOLDER_ACREAGE = 90000;
export const PLACEHOLDER_STRUCTURES_DESTROYED = 32;
