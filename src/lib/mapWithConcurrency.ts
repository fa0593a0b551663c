import { isAbortError } from './errors.js';

export type MapSettled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface MapWithConcurrencyOptions<T, R> {
  /** Called after each started item settles, in completion order. */
  onSettled?: (settled: MapSettled<R>, index: number, item: T) => void;
  /** Checked before every item is started; returning true stops the pool. */
  shouldStop?: () => boolean;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Results keep input order. Items never started because `shouldStop` fired are
 * reported as `skipped`. When the pool stops, in-flight workers are awaited so
 * callers can read shared counters without racing them.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  options: MapWithConcurrencyOptions<T, R> = {},
): Promise<MapSettled<R>[]> {
  const list = Array.isArray(items) ? items : [];
  if (list.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(list.length, Math.floor(Number(concurrency)) || 1));
  const results: MapSettled<R>[] = list.map(() => ({ status: 'skipped' }));
  const { onSettled, shouldStop } = options;
  let cursor = 0;
  let stopped = false;

  const checkStop = (): boolean => {
    if (stopped) return true;
    if (typeof shouldStop !== 'function') return false;
    try {
      stopped = shouldStop();
    } catch (err: unknown) {
      console.warn(`[mapWithConcurrency] stop check failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    return stopped;
  };

  async function runOneWorker(): Promise<void> {
    while (cursor < list.length) {
      if (checkStop()) return;
      const currentIndex = cursor;
      cursor += 1;
      const item = list[currentIndex];
      try {
        results[currentIndex] = { status: 'fulfilled', value: await worker(item, currentIndex) };
      } catch (err: unknown) {
        results[currentIndex] = { status: 'rejected', reason: err };
        if (isAbortError(err) && checkStop()) return;
      }
      if (typeof onSettled === 'function') {
        try {
          onSettled(results[currentIndex], currentIndex, item);
        } catch (err: unknown) {
          console.warn(`[mapWithConcurrency] onSettled failed: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}
