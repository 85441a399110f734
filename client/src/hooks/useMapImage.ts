import { useEffect, useState } from 'react';

interface MapImageState {
  image: HTMLImageElement | null;
  error: string | null;
}

export function useMapImage(url: string): MapImageState {
  const [state, setState] = useState<MapImageState>({ image: null, error: null });

  useEffect(() => {
    const image = new Image();
    let cancelled = false;

    image.onload = () => {
      if (!cancelled) setState({ image, error: null });
    };
    image.onerror = () => {
      console.error(`Failed to load map image: ${url}`);
      if (!cancelled) setState({ image: null, error: `Could not load map image ${url}` });
    };
    image.src = url;

    return () => {
      cancelled = true;
    };
  }, [url]);

  return state;
}
