import type { FireRecord, FontSpec, Point, Rect, Rgb } from '../types';
import { UnimplementedOperationFault } from '../lib/errors';
import type { Theme, ThemeColors } from '../lib/theme';
import type { Bitmap, RenderSurface, TextMeasurer } from './surface';

/**
 * Something drawn on the canvas that moves with the rest of the scene when it scrolls.
 * Whether (x, y) is the top-left corner or the centre depends on the variant.
 */
export class ScrollableObject {
  protected x: number;
  protected y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  position(): Point {
    return { x: this.x, y: this.y };
  }

  translate(dx: number, dy: number): void {
    this.x += dx;
    this.y += dy;
  }

  moveTo(x: number, y: number): void {
    this.x = x;
    this.y = y;
  }

  draw(_surface: RenderSurface): void {
    throw new UnimplementedOperationFault('ScrollableObject.draw');
  }
}

export class ScrollableImage extends ScrollableObject {
  private readonly bitmap: Bitmap;

  constructor(x: number, y: number, bitmap: Bitmap) {
    super(x, y);
    this.bitmap = bitmap;
  }

  get width(): number {
    return this.bitmap.width;
  }

  get height(): number {
    return this.bitmap.height;
  }

  draw(surface: RenderSurface): void {
    surface.blit(this.bitmap, this.x, this.y);
  }
}

export class TextLabel extends ScrollableObject {
  readonly text: string;
  private readonly font: FontSpec;
  private readonly color: Rgb;

  constructor(x: number, y: number, text: string, font: FontSpec, color: Rgb) {
    super(x, y);
    this.text = text;
    this.font = font;
    this.color = color;
  }

  draw(surface: RenderSurface): void {
    surface.drawText(this.text, this.x, this.y, this.font, this.color);
  }

  /**
   * Centre the label horizontally across `width` pixels. Leaves y alone.
   */
  centerWidth(width: number, measurer: TextMeasurer): void {
    const textWidth = measurer.measureText(this.text, this.font).width;
    this.x = Math.trunc(width / 2 - textWidth / 2);
  }
}

export interface AcreageThreshold {
  readonly bound: number;
  readonly color: keyof ThemeColors;
  readonly radius: number;
}

/**
 * Circle styles by total acreage, lowest bound first.
 */
export const ACREAGE_THRESHOLDS: readonly AcreageThreshold[] = [
  { bound: 0, color: 'yellow', radius: 10 },
  { bound: 10000, color: 'yellow', radius: 12 },
  { bound: 20000, color: 'yellow', radius: 15 },
  { bound: 40000, color: 'orange', radius: 18 },
  { bound: 60000, color: 'orange', radius: 20 },
  { bound: 80000, color: 'red', radius: 22 },
  { bound: 100000, color: 'red', radius: 25 },
];

export const FORECAST_CIRCLE_STYLE = { color: 'lightRed', radius: 25 } as const;

/**
 * The highest threshold whose bound the acreage reaches.
 */
export function thresholdFor(acreage: number): AcreageThreshold {
  let match = ACREAGE_THRESHOLDS[0];
  for (const threshold of ACREAGE_THRESHOLDS) {
    if (acreage >= threshold.bound) {
      match = threshold;
    }
  }
  return match;
}

export interface FireCircleOptions {
  /** Forecast circles get a fixed style since per-county acreage is not predicted. */
  forecast: boolean;
  theme: Theme;
}

/**
 * Marker for every top-five fire of the season that burned in one county.
 * Positioned by its centre.
 */
export class FireCircle extends ScrollableObject {
  readonly county: string;
  readonly acreage: number;
  readonly radius: number;
  readonly color: Rgb;
  private readonly fires: readonly FireRecord[];
  private readonly theme: Theme;

  constructor(x: number, y: number, fires: readonly FireRecord[], options: FireCircleOptions) {
    super(x, y);
    if (fires.length === 0) {
      throw new RangeError('A FireCircle needs at least one fire');
    }
    this.county = fires[0].county;
    this.fires = fires;
    this.theme = options.theme;

    if (options.forecast) {
      this.acreage = 0;
      this.radius = FORECAST_CIRCLE_STYLE.radius;
      this.color = options.theme.colors[FORECAST_CIRCLE_STYLE.color];
    } else {
      this.acreage = fires.reduce((total, fire) => total + fire.acreage, 0);
      const threshold = thresholdFor(this.acreage);
      this.radius = threshold.radius;
      this.color = options.theme.colors[threshold.color];
    }
  }

  draw(surface: RenderSurface): void {
    const font = this.theme.fonts.small;
    surface.drawCircle(this.position(), this.radius, this.color);

    const { width, height } = surface.measureText(this.county, font);
    surface.drawText(this.county, this.x - width / 2, this.y - height / 2, font, this.theme.colors.black);
  }

  /**
   * The square the circle occupies.
   */
  bounds(): Rect {
    return {
      x: this.x - this.radius,
      y: this.y - this.radius,
      width: this.radius * 2,
      height: this.radius * 2,
    };
  }

  getFires(): readonly FireRecord[] {
    return this.fires;
  }
}

export function drawScene(surface: RenderSurface, objects: readonly ScrollableObject[]): void {
  for (const object of objects) {
    object.draw(surface);
  }
}
