import { useState, useEffect, useCallback, useMemo } from 'react';
import type { Dataset, GridConfig } from '../types';
import { getOrLoad, sourceOf } from '../services/dataset';
import { buildConfig } from '../utils/gridConfig';

export interface GridDataState {
  dataset: Dataset | null;
  config: GridConfig | null;
  // Payload as fetched, without the orphan bucket
  source: unknown;
  loading: boolean;
  error: Error | null;
  reload: () => void;
}

export function useGridData(url: string): GridDataState {
  const [dataset, setDataset] = useState<Dataset | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<Error | null>(null);
  const [attempt, setAttempt] = useState(0);

  useEffect(() => {
    let cancelled = false;
    setLoading(true);
    setError(null);

    getOrLoad(url)
      .then((loaded) => {
        if (!cancelled) setDataset(loaded);
      })
      .catch((err: unknown) => {
        console.error('Failed to load data:', err);
        if (!cancelled) setError(err instanceof Error ? err : new Error(String(err)));
      })
      .finally(() => {
        if (!cancelled) setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, [url, attempt]);

  const config = useMemo(() => {
    if (!dataset) return null;
    console.log('Building grid options...');
    const built = buildConfig(dataset);
    console.log('Grid options built.');
    return built;
  }, [dataset]);

  const source = useMemo(() => (dataset ? sourceOf(dataset) : null), [dataset]);

  // Failed loads are never cached, so a retry runs the pipeline again
  const reload = useCallback(() => {
    setAttempt((prev) => prev + 1);
  }, []);

  return { dataset, config, source, loading, error, reload };
}
