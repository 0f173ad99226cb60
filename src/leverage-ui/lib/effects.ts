/**
 * Runs `task` and hands its result to `apply` unless the returned cancel
 * function was called first. Used as a useEffect cleanup so that only the
 * response for the latest dependencies lands.
 */
export function runUnlessCancelled<T>(
  task: () => Promise<T>,
  apply: (result: T) => void,
  onError: (err: unknown) => void = (err) => console.error('[UI]', err),
): () => void {
  let cancelled = false;
  void task().then(
    (result) => {
      if (!cancelled) apply(result);
    },
    (err: unknown) => {
      if (!cancelled) onError(err);
    },
  );
  return () => {
    cancelled = true;
  };
}
