import type { FireSeason } from '../types';
import { isForecastYear } from '../lib/forecast';

interface SeasonSliderProps {
  seasons: readonly FireSeason[];
  selectedIndex: number;
  onSelectSeason: (index: number) => void;
}

export default function SeasonSlider({ seasons, selectedIndex, onSelectSeason }: SeasonSliderProps) {
  // Nothing to slide across until the seasons are loaded
  if (seasons.length === 0) {
    return <p className="text-red-500">No seasons loaded</p>;
  }

  const first = seasons[0];
  const last = seasons[seasons.length - 1];
  const current = seasons[selectedIndex] ?? first;
  const isForecast = isForecastYear(current.year);

  return (
    <div className="w-full px-4">
      {/* First season, the selected one, and the last */}
      <div className="flex justify-between mb-1">
        <span className="text-xs text-slate-300">{first.year}</span>
        <span className={`text-sm font-bold ${isForecast ? 'text-red-300' : 'text-orange-400'}`}>
          {current.year}{isForecast ? ' (forecast)' : ''}
        </span>
        <span className="text-xs text-slate-300">{last.year}</span>
      </div>
      <input
        type="range"
        min={0}
        max={seasons.length - 1}
        value={selectedIndex}
        onChange={(e) => onSelectSeason(parseInt(e.target.value))}
        className="w-full accent-orange-500"
      />
    </div>
  );
}
