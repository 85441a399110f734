import { MAX_SCROLL, SCROLL_STEP } from '../config';
import type { Point } from '../types';
import { FireCircle, ScrollableObject } from './scrollables';

/**
 * Move every object vertically. Positive amounts move content down.
 */
export function scrollScene(objects: readonly ScrollableObject[], amount: number): void {
  for (const object of objects) {
    object.translate(0, amount);
  }
}

/**
 * The scroll offset after moving by `delta`, or null when that would leave [0, maxScroll].
 * Negative deltas scroll back toward the top.
 */
export function nextScrollOffset(offset: number, delta: number, maxScroll: number = MAX_SCROLL): number | null {
  const next = offset + delta;
  return next >= 0 && next <= maxScroll ? next : null;
}

/**
 * The first fire circle, in draw order, whose bounding box strictly contains (x, y).
 */
export function hitTest(x: number, y: number, objects: readonly ScrollableObject[]): FireCircle | null {
  for (const object of objects) {
    if (object instanceof FireCircle) {
      const box = object.bounds();
      if (box.x < x && x < box.x + box.width && box.y < y && y < box.y + box.height) {
        return object;
      }
    }
  }
  return null;
}

export interface ViewerState {
  readonly running: boolean;
  readonly scrollOffset: number;
  readonly seasonIndex: number;
  readonly pointer: Point | null;
}

export interface ViewerFrame {
  readonly state: ViewerState;
  readonly scene: readonly ScrollableObject[];
}

export type ViewerEvent =
  | { type: 'scroll'; direction: 'up' | 'down' }
  | { type: 'navigate'; step: 1 | -1 }
  | { type: 'select'; seasonIndex: number }
  | { type: 'pointer'; x: number; y: number }
  | { type: 'pointerLeave' }
  | { type: 'quit' };

export interface ViewerSettings {
  seasonCount: number;
  scrollStep?: number;
  maxScroll?: number;
}

export const INITIAL_VIEWER_STATE: ViewerState = {
  running: true,
  scrollOffset: 0,
  seasonIndex: 0,
  pointer: null,
};

function wrapIndex(index: number, count: number): number {
  return ((index % count) + count) % count;
}

/**
 * Advance the viewer by one input event. Navigation asks `rebuild` for the new
 * season's scene; accepted scrolls move the current scene in place.
 */
export function applyViewerEvent(
  frame: ViewerFrame,
  event: ViewerEvent,
  rebuild: (seasonIndex: number) => ScrollableObject[],
  settings: ViewerSettings
): ViewerFrame {
  const { state, scene } = frame;

  switch (event.type) {
    case 'quit':
      return { state: { ...state, running: false }, scene };

    case 'pointer':
      return { state: { ...state, pointer: { x: event.x, y: event.y } }, scene };

    case 'pointerLeave':
      return { state: { ...state, pointer: null }, scene };

    case 'scroll': {
      const step = settings.scrollStep ?? SCROLL_STEP;
      const delta = event.direction === 'down' ? step : -step;
      const offset = nextScrollOffset(state.scrollOffset, delta, settings.maxScroll ?? MAX_SCROLL);
      if (offset === null) {
        return frame;
      }
      // Scrolling down moves the content up
      scrollScene(scene, -delta);
      return { state: { ...state, scrollOffset: offset }, scene };
    }

    case 'navigate': {
      if (settings.seasonCount <= 0) {
        return frame;
      }
      const seasonIndex = wrapIndex(state.seasonIndex + event.step, settings.seasonCount);
      return {
        state: { ...state, seasonIndex, scrollOffset: 0 },
        scene: rebuild(seasonIndex),
      };
    }

    case 'select': {
      const { seasonIndex } = event;
      if (seasonIndex === state.seasonIndex || seasonIndex < 0 || seasonIndex >= settings.seasonCount) {
        return frame;
      }
      return {
        state: { ...state, seasonIndex, scrollOffset: 0 },
        scene: rebuild(seasonIndex),
      };
    }
  }
}

export function hoveredCircle(frame: ViewerFrame): FireCircle | null {
  const { pointer } = frame.state;
  return pointer ? hitTest(pointer.x, pointer.y, frame.scene) : null;
}
