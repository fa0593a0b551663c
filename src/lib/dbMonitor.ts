/**
 * Database query monitoring: wraps pg Pool.query() with timing
 * and logs slow queries via console.warn (captured by Pino as structured JSON).
 */

const SLOW_QUERY_THRESHOLD_MS = Math.max(0, Number(process.env.SLOW_QUERY_THRESHOLD_MS) || 500);

export function extractSql(args: unknown[]): string {
  const first = args[0];
  let raw = '';
  if (typeof first === 'string') {
    raw = first;
  } else if (first && typeof first === 'object' && 'text' in first) {
    raw = String(first.text ?? '');
  }
  return raw.replace(/\s+/g, ' ').trim().slice(0, 200);
}

interface QueryablePool {
  query: (...args: never[]) => unknown;
}

export function instrumentPool<P extends QueryablePool>(
  pool: P,
  poolName = 'warehouse',
  thresholdMs = SLOW_QUERY_THRESHOLD_MS,
): P {
  if (!pool || typeof pool.query !== 'function') return pool;

  const originalQuery = pool.query;

  // Patched in place so every holder of the pool reference is timed.
  Object.defineProperty(pool, 'query', {
    configurable: true,
    writable: true,
    value: async function monitoredQuery(...args: unknown[]) {
      const start = performance.now();
      try {
        const result: unknown = await Reflect.apply(originalQuery, pool, args);
        const durationMs = performance.now() - start;
        if (durationMs >= thresholdMs) {
          console.warn(`[slow-query] pool=${poolName} duration=${Math.round(durationMs)}ms sql=${extractSql(args)}`);
        }
        return result;
      } catch (err: unknown) {
        const durationMs = performance.now() - start;
        console.error(
          `[query-error] pool=${poolName} duration=${Math.round(durationMs)}ms sql=${extractSql(args)} error=${err instanceof Error ? err.message : String(err)}`,
        );
        throw err;
      }
    },
  });

  return pool;
}
