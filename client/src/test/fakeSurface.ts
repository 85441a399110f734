import type { Bitmap, RenderSurface } from '../scene/surface';
import type { ComponentSize, FontSpec, Point, Rect, Rgb } from '../types';

export type SurfaceCall =
  | { op: 'blit'; bitmap: Bitmap; x: number; y: number }
  | { op: 'fillRect'; rect: Rect; color: Rgb }
  | { op: 'drawLine'; from: Point; to: Point; color: Rgb; thickness: number }
  | { op: 'drawCircle'; center: Point; radius: number; color: Rgb }
  | { op: 'drawText'; text: string; x: number; y: number; font: FontSpec; color: Rgb };

/**
 * Records every primitive instead of drawing. Text measures 8px per character
 * and the font size tall.
 */
export class RecordingSurface implements RenderSurface {
  readonly calls: SurfaceCall[] = [];

  blit(bitmap: Bitmap, x: number, y: number): void {
    this.calls.push({ op: 'blit', bitmap, x, y });
  }

  fillRect(rect: Rect, color: Rgb): void {
    this.calls.push({ op: 'fillRect', rect, color });
  }

  drawLine(from: Point, to: Point, color: Rgb, thickness: number): void {
    this.calls.push({ op: 'drawLine', from, to, color, thickness });
  }

  drawCircle(center: Point, radius: number, color: Rgb): void {
    this.calls.push({ op: 'drawCircle', center, radius, color });
  }

  drawText(text: string, x: number, y: number, font: FontSpec, color: Rgb): void {
    this.calls.push({ op: 'drawText', text, x, y, font, color });
  }

  measureText(text: string, font: FontSpec): ComponentSize {
    return { width: text.length * 8, height: font.size };
  }

  texts(): string[] {
    return this.calls.flatMap(call => (call.op === 'drawText' ? [call.text] : []));
  }
}

export const FAKE_MAP: Bitmap = { width: 420, height: 480 };
