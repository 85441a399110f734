import type { ComponentSize, FontSpec, Point, Rect, Rgb } from '../types';
import { toCssColor, toCssFont } from '../lib/theme';

/**
 * Anything with pixel dimensions that a surface knows how to blit.
 */
export interface Bitmap {
  readonly width: number;
  readonly height: number;
}

export interface TextMeasurer {
  measureText(text: string, font: FontSpec): ComponentSize;
}

/**
 * The draw primitives scene objects are allowed to use.
 */
export interface RenderSurface extends TextMeasurer {
  blit(bitmap: Bitmap, x: number, y: number): void;
  fillRect(rect: Rect, color: Rgb): void;
  drawLine(from: Point, to: Point, color: Rgb, thickness: number): void;
  drawCircle(center: Point, radius: number, color: Rgb): void;
  /** Draws with (x, y) as the top-left corner of the text. */
  drawText(text: string, x: number, y: number, font: FontSpec, color: Rgb): void;
}

function isCanvasImage(bitmap: Bitmap): bitmap is HTMLImageElement | HTMLCanvasElement | ImageBitmap {
  return bitmap instanceof HTMLImageElement
    || bitmap instanceof HTMLCanvasElement
    || (typeof ImageBitmap !== 'undefined' && bitmap instanceof ImageBitmap);
}

export class CanvasSurface implements RenderSurface {
  private readonly context: CanvasRenderingContext2D;

  constructor(context: CanvasRenderingContext2D) {
    this.context = context;
  }

  clear(color: Rgb): void {
    const { width, height } = this.context.canvas;
    this.fillRect({ x: 0, y: 0, width, height }, color);
  }

  blit(bitmap: Bitmap, x: number, y: number): void {
    if (!isCanvasImage(bitmap)) {
      throw new TypeError('CanvasSurface can only blit images, canvases and image bitmaps');
    }
    this.context.drawImage(bitmap, x, y);
  }

  fillRect(rect: Rect, color: Rgb): void {
    this.context.fillStyle = toCssColor(color);
    this.context.fillRect(rect.x, rect.y, rect.width, rect.height);
  }

  drawLine(from: Point, to: Point, color: Rgb, thickness: number): void {
    const ctx = this.context;
    ctx.strokeStyle = toCssColor(color);
    ctx.lineWidth = thickness;
    ctx.beginPath();
    ctx.moveTo(from.x, from.y);
    ctx.lineTo(to.x, to.y);
    ctx.stroke();
  }

  drawCircle(center: Point, radius: number, color: Rgb): void {
    const ctx = this.context;
    ctx.fillStyle = toCssColor(color);
    ctx.beginPath();
    ctx.arc(center.x, center.y, radius, 0, Math.PI * 2);
    ctx.fill();
  }

  drawText(text: string, x: number, y: number, font: FontSpec, color: Rgb): void {
    const ctx = this.context;
    ctx.font = toCssFont(font);
    ctx.fillStyle = toCssColor(color);
    ctx.textBaseline = 'top';
    ctx.fillText(text, x, y);
  }

  measureText(text: string, font: FontSpec): ComponentSize {
    this.context.font = toCssFont(font);
    const metrics = this.context.measureText(text);
    const height = metrics.actualBoundingBoxAscent + metrics.actualBoundingBoxDescent;
    return {
      width: metrics.width,
      height: height > 0 ? height : font.size,
    };
  }
}
