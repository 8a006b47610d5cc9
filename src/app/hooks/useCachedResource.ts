import { useCallback, useEffect, useRef, useState, type DependencyList } from 'react';
import { isAbortError } from '@lib/loaders';

export type Loader<T> = (signal: AbortSignal) => Promise<T>;

type UseCachedResourceResult<T> = {
  data: T | null;
  loading: boolean;
  error: string | null;
  retry: () => void;
};

function errorMessage(e: unknown): string {
  if (e instanceof Error && e.message) return e.message;
  return 'Something went wrong. Please try again.';
}

/**
 * Runs `load` when the component mounts (and whenever `deps` change), cancelling it on unmount.
 * A failure is kept as a message until the user calls `retry`; nothing is retried on its own.
 */
export function useCachedResource<T>(load: Loader<T>, deps: DependencyList = []): UseCachedResourceResult<T> {
  const [data, setData] = useState<T | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [attempt, setAttempt] = useState(0);

  const loadRef = useRef(load);
  loadRef.current = load;

  useEffect(() => {
    const controller = new AbortController();
    setLoading(true);
    setError(null);
    loadRef.current(controller.signal).then(
      (result) => {
        if (controller.signal.aborted) return;
        setData(result);
        setLoading(false);
      },
      (e: unknown) => {
        if (controller.signal.aborted || isAbortError(e)) return;
        console.warn('[loader] load failed', e);
        setError(errorMessage(e));
        setLoading(false);
      },
    );
    return () => controller.abort();
  }, [attempt, ...deps]);

  const retry = useCallback(() => setAttempt((n) => n + 1), []);

  return { data, loading, error, retry };
}
