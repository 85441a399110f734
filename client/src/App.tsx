import { useMemo, useState } from 'react';
import { Flame, TrendingUp, Map as MapIcon, Loader2 } from 'lucide-react';
import { COUNTY_MAP_URL, FIRE_DATA_URL, FUTURE_YEARS } from './config';
import { useFireSeasons } from './hooks/useFireSeasons';
import { useMapImage } from './hooks/useMapImage';
import FireSeasonCanvas from './component/FireSeasonCanvas';
import SeasonSeverityChart from './component/SeasonSeverityChart';
import SeasonSlider from './component/SeasonSlider';

export default function App() {
  const { seasons, loading, error } = useFireSeasons(FIRE_DATA_URL, FUTURE_YEARS);
  const { image: mapImage, error: mapError } = useMapImage(COUNTY_MAP_URL);
  const [seasonIndex, setSeasonIndex] = useState(0);

  /**
   * Seasons in year order. Historical years come first and forecast years
   * follow, which is the order the chart, slider and arrow keys step through.
   */
  const seasonList = useMemo(
    () => (seasons ? [...seasons.values()].sort((a, b) => a.year - b.year) : []),
    [seasons]
  );

  const problem = error ?? mapError;

  return (
    <div className="min-h-screen bg-slate-900 flex flex-col">
      <div className="bg-slate-800 px-2 py-1 flex items-center justify-center gap-2 text-xs">
        <Flame className="w-4 h-4 text-orange-400" />
        <span className="font-semibold text-white text-sm">California Fire Seasons</span>
      </div>

      <div className="flex-1 p-2 flex flex-col items-center gap-2">
        {problem ? (
          <div className="flex items-center justify-center h-64">
            <p className="text-red-400 text-sm">{problem}</p>
          </div>
        ) : loading || !mapImage ? (
          <div className="flex items-center justify-center h-64 gap-2">
            <Loader2 className="w-4 h-4 text-slate-400 animate-spin" />
            <p className="text-slate-400 text-xs">Loading...</p>
          </div>
        ) : (
          <>
            {/* Fire count and acreage for every season, forecasts included */}
            <div className="bg-white rounded overflow-hidden w-full max-w-[800px]">
              <div className="bg-slate-700 px-1 py-0.5 text-xs font-semibold text-white flex items-center gap-1">
                <TrendingUp className="w-3 h-3 text-red-400" />
                Season Severity
              </div>
              <SeasonSeverityChart
                seasons={seasonList}
                selectedIndex={seasonIndex}
                onSelectSeason={setSeasonIndex}
              />
            </div>

            <div className="w-full max-w-[800px]">
              <SeasonSlider
                seasons={seasonList}
                selectedIndex={seasonIndex}
                onSelectSeason={setSeasonIndex}
              />
            </div>

            <div className="bg-slate-800 rounded overflow-hidden w-full max-w-[800px]">
              <div className="bg-slate-700 px-1 py-0.5 text-xs font-semibold text-white flex items-center gap-1">
                <MapIcon className="w-3 h-3 text-orange-400" />
                County Fires (scroll to pan, arrow keys to change season, Esc to close)
              </div>
              <FireSeasonCanvas
                seasons={seasonList}
                mapImage={mapImage}
                seasonIndex={seasonIndex}
                onSeasonIndexChange={setSeasonIndex}
              />
            </div>
          </>
        )}
      </div>
    </div>
  );
}
