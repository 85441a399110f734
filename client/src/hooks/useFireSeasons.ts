import { useEffect, useState } from 'react';
import { loadFireData } from '../lib/fireData';
import { forecastFireSeasons } from '../lib/forecast';
import type { SeasonMap } from '../types';

interface FireSeasonsState {
  seasons: SeasonMap | null;
  loading: boolean;
  error: string | null;
}

/**
 * Load the historical seasons once and extend them with `futureYears` forecast seasons.
 * Forecasting happens here and nowhere else, so it runs a single time per load.
 */
export function useFireSeasons(url: string, futureYears: number): FireSeasonsState {
  const [state, setState] = useState<FireSeasonsState>({ seasons: null, loading: true, error: null });

  useEffect(() => {
    let cancelled = false;

    const loadSeasons = async () => {
      try {
        const seasons = await loadFireData(url);
        forecastFireSeasons(seasons, futureYears);
        if (!cancelled) {
          setState({ seasons, loading: false, error: null });
        }
      } catch (error) {
        console.error('Failed to load fire seasons:', error);
        if (!cancelled) {
          const message = error instanceof Error ? error.message : String(error);
          setState({ seasons: null, loading: false, error: message });
        }
      }
    };

    void loadSeasons();
    return () => {
      cancelled = true;
    };
  }, [url, futureYears]);

  return state;
}
