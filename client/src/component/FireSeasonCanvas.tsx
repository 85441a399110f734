import { useEffect, useRef, useState } from 'react';
import { CANVAS_HEIGHT, CANVAS_WIDTH, MAP_ORIGIN, PRESENT_YEAR } from '../config';
import { DEFAULT_THEME, type Theme } from '../lib/theme';
import { buildScene } from '../scene/buildScene';
import {
  INITIAL_VIEWER_STATE,
  applyViewerEvent,
  hoveredCircle,
  type ViewerEvent,
  type ViewerFrame,
} from '../scene/interaction';
import { drawCountyFireInfo } from '../scene/overlays';
import { ScrollableImage, drawScene } from '../scene/scrollables';
import { CanvasSurface } from '../scene/surface';
import type { FireSeason } from '../types';

interface FireSeasonCanvasProps {
  seasons: readonly FireSeason[];
  mapImage: HTMLImageElement;
  seasonIndex: number;
  onSeasonIndexChange: (index: number) => void;
  theme?: Theme;
}

export default function FireSeasonCanvas({
  seasons,
  mapImage,
  seasonIndex,
  onSeasonIndexChange,
  theme = DEFAULT_THEME
}: FireSeasonCanvasProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const eventsRef = useRef<ViewerEvent[]>([]);
  const seasonIndexRef = useRef(seasonIndex);
  const onChangeRef = useRef(onSeasonIndexChange);
  const [status, setStatus] = useState<'running' | 'closed' | 'failed'>('running');

  onChangeRef.current = onSeasonIndexChange;

  // Selections made outside the canvas (chart, slider) go through the same event queue
  useEffect(() => {
    seasonIndexRef.current = seasonIndex;
    eventsRef.current.push({ type: 'select', seasonIndex });
  }, [seasonIndex]);

  /**
   * Frame loop: drain queued input, advance the viewer state, then redraw the
   * whole scene followed by the hover panel. Runs until Escape or unmount.
   */
  useEffect(() => {
    const canvas = canvasRef.current;
    const context = canvas?.getContext('2d');
    if (!canvas || !context || seasons.length === 0) return;

    const surface = new CanvasSurface(context);
    const settings = { seasonCount: seasons.length };
    const rebuild = (index: number) =>
      buildScene(seasons[index], new ScrollableImage(MAP_ORIGIN.x, MAP_ORIGIN.y, mapImage), {
        measurer: surface,
        theme,
      });

    let frame: ViewerFrame;
    try {
      const startIndex = Math.min(seasonIndexRef.current, seasons.length - 1);
      frame = {
        state: { ...INITIAL_VIEWER_STATE, seasonIndex: startIndex },
        scene: rebuild(startIndex),
      };
    } catch (error) {
      console.error('Failed to build the season scene:', error);
      setStatus('failed');
      return;
    }
    setStatus('running');

    let rafId: number | null = null;

    const tick = () => {
      try {
        const events = eventsRef.current.splice(0);
        for (const event of events) {
          const previousIndex = frame.state.seasonIndex;
          frame = applyViewerEvent(frame, event, rebuild, settings);
          if (event.type === 'navigate' && frame.state.seasonIndex !== previousIndex) {
            seasonIndexRef.current = frame.state.seasonIndex;
            onChangeRef.current(frame.state.seasonIndex);
          }
        }

        surface.clear(theme.colors.white);
        drawScene(surface, frame.scene);

        const circle = hoveredCircle(frame);
        if (circle) {
          drawCountyFireInfo(surface, circle, theme, PRESENT_YEAR);
        }
      } catch (error) {
        console.error('Season viewer stopped:', error);
        setStatus('failed');
        rafId = null;
        return;
      }

      if (!frame.state.running) {
        console.log('Season viewer closed');
        setStatus('closed');
        rafId = null;
        return;
      }
      rafId = requestAnimationFrame(tick);
    };

    const toCanvasPoint = (event: MouseEvent) => {
      const rect = canvas.getBoundingClientRect();
      return {
        x: Math.round((event.clientX - rect.left) * (canvas.width / rect.width)),
        y: Math.round((event.clientY - rect.top) * (canvas.height / rect.height)),
      };
    };

    const handleWheel = (event: WheelEvent) => {
      event.preventDefault();
      if (event.deltaY !== 0) {
        eventsRef.current.push({ type: 'scroll', direction: event.deltaY > 0 ? 'down' : 'up' });
      }
    };
    const handleMouseMove = (event: MouseEvent) => {
      eventsRef.current.push({ type: 'pointer', ...toCanvasPoint(event) });
    };
    const handleMouseLeave = () => {
      eventsRef.current.push({ type: 'pointerLeave' });
    };
    const handleKeyDown = (event: KeyboardEvent) => {
      if (event.key === 'ArrowRight') {
        eventsRef.current.push({ type: 'navigate', step: 1 });
      } else if (event.key === 'ArrowLeft') {
        eventsRef.current.push({ type: 'navigate', step: -1 });
      } else if (event.key === 'Escape') {
        eventsRef.current.push({ type: 'quit' });
      }
    };

    canvas.addEventListener('wheel', handleWheel, { passive: false });
    canvas.addEventListener('mousemove', handleMouseMove);
    canvas.addEventListener('mouseleave', handleMouseLeave);
    window.addEventListener('keydown', handleKeyDown);
    rafId = requestAnimationFrame(tick);

    return () => {
      if (rafId !== null) cancelAnimationFrame(rafId);
      canvas.removeEventListener('wheel', handleWheel);
      canvas.removeEventListener('mousemove', handleMouseMove);
      canvas.removeEventListener('mouseleave', handleMouseLeave);
      window.removeEventListener('keydown', handleKeyDown);
      eventsRef.current = [];
    };
  }, [seasons, mapImage, theme]);

  return (
    <div className="relative">
      <canvas
        ref={canvasRef}
        width={CANVAS_WIDTH}
        height={CANVAS_HEIGHT}
        className="block max-w-full h-auto bg-white rounded"
      />
      {status !== 'running' && (
        <div className="absolute inset-0 flex items-center justify-center bg-slate-900/70 rounded">
          <p className="text-slate-200 text-sm">
            {status === 'closed' ? 'Viewer closed. Reload the page to reopen it.' : 'The season scene could not be drawn. See the console for details.'}
          </p>
        </div>
      )}
    </div>
  );
}
