import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_THEME } from '../lib/theme';
import { FAKE_MAP } from '../test/fakeSurface';
import { fire } from '../test/fixtures';
import {
  INITIAL_VIEWER_STATE,
  applyViewerEvent,
  hitTest,
  hoveredCircle,
  nextScrollOffset,
  scrollScene,
  type ViewerFrame,
} from './interaction';
import { FireCircle, ScrollableImage, ScrollableObject } from './scrollables';

// Radius 18, so the bounding box spans x 82..118 and y 182..218
function circleAt(x: number, y: number, county = 'Kern'): FireCircle {
  return new FireCircle(x, y, [fire(2018, county, 40000)], { forecast: false, theme: DEFAULT_THEME });
}

describe('scrollScene', () => {
  it('moves every object by the same vertical amount', () => {
    const objects = [new ScrollableObject(0, 0), new ScrollableImage(190, 240, FAKE_MAP), circleAt(100, 200)];

    scrollScene(objects, -15);

    expect(objects.map(o => o.position())).toEqual([
      { x: 0, y: -15 },
      { x: 190, y: 225 },
      { x: 100, y: 185 },
    ]);
  });
});

describe('nextScrollOffset', () => {
  it('refuses to scroll above the top', () => {
    expect(nextScrollOffset(0, -15, 600)).toBeNull();
  });

  it('refuses to scroll past the maximum', () => {
    expect(nextScrollOffset(600, 15, 600)).toBeNull();
    expect(nextScrollOffset(590, 15, 600)).toBeNull();
  });

  it('allows moves that stay within bounds', () => {
    expect(nextScrollOffset(0, 15, 600)).toBe(15);
    expect(nextScrollOffset(585, 15, 600)).toBe(600);
    expect(nextScrollOffset(15, -15, 600)).toBe(0);
  });
});

describe('hitTest', () => {
  it('does not count the edge of the bounding box', () => {
    expect(hitTest(82, 200, [circleAt(100, 200)])).toBeNull();
    expect(hitTest(100, 218, [circleAt(100, 200)])).toBeNull();
  });

  it('counts a point one pixel inside the edge', () => {
    const circle = circleAt(100, 200);

    expect(hitTest(83, 200, [circle])).toBe(circle);
    expect(hitTest(117, 217, [circle])).toBe(circle);
  });

  it('returns the first circle in draw order', () => {
    const first = circleAt(100, 200, 'Kern');
    const second = circleAt(105, 200, 'Inyo');

    expect(hitTest(100, 200, [new ScrollableImage(0, 0, FAKE_MAP), first, second])).toBe(first);
  });

  it('ignores everything that is not a circle', () => {
    expect(hitTest(10, 10, [new ScrollableImage(0, 0, FAKE_MAP)])).toBeNull();
    expect(hitTest(10, 10, [])).toBeNull();
  });
});

describe('applyViewerEvent', () => {
  const settings = { seasonCount: 3, scrollStep: 15, maxScroll: 600 };

  function startFrame(): ViewerFrame {
    return { state: INITIAL_VIEWER_STATE, scene: [circleAt(100, 200)] };
  }

  it('refuses to scroll up from the top', () => {
    const frame = startFrame();
    const rebuild = vi.fn();

    const next = applyViewerEvent(frame, { type: 'scroll', direction: 'up' }, rebuild, settings);

    expect(next).toBe(frame);
    expect(next.state.scrollOffset).toBe(0);
    expect(next.scene[0].position()).toEqual({ x: 100, y: 200 });
  });

  it('moves content up when scrolling down', () => {
    const next = applyViewerEvent(startFrame(), { type: 'scroll', direction: 'down' }, vi.fn(), settings);

    expect(next.state.scrollOffset).toBe(15);
    expect(next.scene[0].position()).toEqual({ x: 100, y: 185 });
  });

  it('stops at the maximum scroll', () => {
    let frame = startFrame();
    for (let i = 0; i < 50; i++) {
      frame = applyViewerEvent(frame, { type: 'scroll', direction: 'down' }, vi.fn(), settings);
    }

    expect(frame.state.scrollOffset).toBe(600);
    expect(frame.scene[0].position()).toEqual({ x: 100, y: -400 });
  });

  it('wraps navigation and rebuilds the scene from the top', () => {
    const rebuilt = [circleAt(300, 300)];
    const rebuild = vi.fn((_index: number) => rebuilt);
    const scrolled = applyViewerEvent(startFrame(), { type: 'scroll', direction: 'down' }, rebuild, settings);

    const next = applyViewerEvent(scrolled, { type: 'navigate', step: -1 }, rebuild, settings);

    expect(rebuild).toHaveBeenCalledWith(2);
    expect(next.state.seasonIndex).toBe(2);
    expect(next.state.scrollOffset).toBe(0);
    expect(next.scene).toBe(rebuilt);
  });

  it('wraps forward past the last season', () => {
    const frame: ViewerFrame = { state: { ...INITIAL_VIEWER_STATE, seasonIndex: 2 }, scene: [] };

    const next = applyViewerEvent(frame, { type: 'navigate', step: 1 }, () => [], settings);

    expect(next.state.seasonIndex).toBe(0);
  });

  it('ignores a selection of the season already shown', () => {
    const frame = startFrame();
    const rebuild = vi.fn((_index: number): ScrollableObject[] => []);

    expect(applyViewerEvent(frame, { type: 'select', seasonIndex: 0 }, rebuild, settings)).toBe(frame);
    expect(applyViewerEvent(frame, { type: 'select', seasonIndex: 7 }, rebuild, settings)).toBe(frame);
    expect(rebuild).not.toHaveBeenCalled();
  });

  it('jumps straight to a selected season', () => {
    const next = applyViewerEvent(startFrame(), { type: 'select', seasonIndex: 1 }, () => [], settings);

    expect(next.state.seasonIndex).toBe(1);
    expect(next.scene).toEqual([]);
  });

  it('stops running on quit', () => {
    const next = applyViewerEvent(startFrame(), { type: 'quit' }, vi.fn(), settings);

    expect(next.state.running).toBe(false);
  });

  it('tracks the pointer for hover detection', () => {
    let frame = applyViewerEvent(startFrame(), { type: 'pointer', x: 100, y: 200 }, vi.fn(), settings);
    expect(hoveredCircle(frame)?.county).toBe('Kern');

    frame = applyViewerEvent(frame, { type: 'pointerLeave' }, vi.fn(), settings);
    expect(hoveredCircle(frame)).toBeNull();
  });
});
